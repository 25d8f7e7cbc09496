import { expect, test } from "vitest";
import { EditorController, RegisterMap, parseKeyNotation } from "../src";

function makeController(
  initialContent: string,
  initialCursorRow = 0,
  initialCursorCol = 0,
): EditorController {
  return new EditorController({
    initialContent,
    initialCursorRow,
    initialCursorCol,
  });
}

test("dd stores deleted line in register for paste", () => {
  const controller = makeController("one\ntwo\nthree");
  controller.processKeys("dd");
  expect(controller.extractContent()).toBe("two\nthree");
  expect(controller.getYankRegister()).toBe("one\n");
  controller.processKeys("P");
  expect(controller.extractContent()).toBe("one\ntwo\nthree");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 0 });
});

test("d$ stores deleted characters for paste", () => {
  const controller = makeController("abcd", 0, 1);
  controller.processKeys("d$");
  expect(controller.extractContent()).toBe("a");
  controller.processKeys("p");
  expect(controller.extractContent()).toBe("abcd");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 3 });
});

test("yy and p paste the line below", () => {
  const controller = makeController("abc\ndef");
  controller.processKeys("yyp");
  expect(controller.extractContent()).toBe("abc\nabc\ndef");
  expect(controller.getCursorPosition()).toEqual({ row: 1, col: 0 });
});

test("counted Y yanks several lines", () => {
  const controller = makeController("a\nb\nc");
  controller.processKeys("2YP");
  expect(controller.extractContent()).toBe("a\nb\na\nb\nc");
});

test("yw and P paste before the cursor", () => {
  const controller = makeController("foo bar");
  controller.processKeys("yw");
  expect(controller.getYankRegister()).toBe("foo ");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 0 });
  controller.processKeys("$P");
  expect(controller.extractContent()).toBe("foo bafoo r");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 9 });
});

test("counted paste repeats the text", () => {
  const controller = makeController("ab");
  controller.processKeys("x3p");
  expect(controller.extractContent()).toBe("baaa");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 3 });
});

test("paste with an empty register is an error", () => {
  const controller = makeController("ab");
  expect(controller.processKeys("p")).toEqual([
    { status: "error", reason: "Nothing to paste" },
  ]);
});

test("macro registers hold keys in notation", () => {
  const controller = makeController("");
  expect(controller.setRegister("a", "dw<Esc>")).toBe(true);
  expect(controller.getRegister("a")).toBe("dw<Esc>");
  expect(controller.setRegister("A", "<C-a>")).toBe(true);
  expect(controller.getRegister("a")).toBe("dw<Esc><C-a>");
  expect(controller.setRegister("!", "x")).toBe(false);
  expect(controller.getRegister("b")).toBe("");
});

test("register map names and clearing", () => {
  const registers = new RegisterMap();
  registers.set("Q", parseKeyNotation("x"));
  registers.set("1", parseKeyNotation("y"));
  expect(registers.has("q")).toBe(true);
  expect(registers.names().sort()).toEqual(["1", "q"]);
  registers.clear("q");
  expect(registers.has("Q")).toBe(false);
  expect(registers.get("q")).toEqual([]);
});

test("a shared register map is visible to the editor", () => {
  const registers = new RegisterMap();
  registers.set("m", parseKeyNotation("x"));
  const controller = new EditorController({ initialContent: "xyz", registers });
  controller.processKeys("@m");
  expect(controller.extractContent()).toBe("yz");
});
