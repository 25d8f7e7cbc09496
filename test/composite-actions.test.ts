import { expect, test } from "vitest";
import { EditorController, incrementNumberInLine } from "../src";

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

test("counted motions move multiple steps", () => {
  const controller = makeController(
    "line0\nline1\nline2\nline3\nline4\nline5\nline6",
  );
  controller.processKeys("5j3l");
  expect(controller.getCursorPosition()).toEqual({ row: 5, col: 3 });
});

test("d4j deletes the current line and the next four", () => {
  const controller = makeController("a\nb\nc\nd\ne\nf");
  controller.processKeys("d4j");
  expect(controller.extractContent()).toBe("f");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 0 });
});

test("d0 deletes to the start of the line without touching the cursor char", () => {
  const controller = makeController("abcde");
  controller.processKeys("3l");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 3 });
  controller.processKeys("d0");
  expect(controller.extractContent()).toBe("de");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 0 });
});

test("d$ deletes from the cursor through the end of the line", () => {
  const controller = makeController("abcdef");
  controller.processKeys("2ld$");
  expect(controller.extractContent()).toBe("ab");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 1 });
});

test("d$ deletes last character when already at end of line", () => {
  const controller = makeController("xyz");
  controller.processKeys("$d$");
  expect(controller.extractContent()).toBe("xy");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 1 });
});

test("dd removes the current line and keeps the row index", () => {
  const controller = makeController("first\nsecond\nthird");
  controller.processKeys("jdd");
  expect(controller.extractContent()).toBe("first\nthird");
  expect(controller.getCursorPosition()).toEqual({ row: 1, col: 0 });
});

test("dw and counted dw delete words", () => {
  const controller = makeController("one two three four");
  controller.processKeys("dw");
  expect(controller.extractContent()).toBe("two three four");
  controller.processKeys("2dw");
  expect(controller.extractContent()).toBe("four");
});

test("dw on the last word deletes to the end of the line", () => {
  const controller = makeController("hello world", 0, 6);
  controller.processKeys("dw");
  expect(controller.extractContent()).toBe("hello ");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 5 });
});

test("operator and motion counts multiply", () => {
  const controller = makeController("a b c d e f g");
  controller.processKeys("2d3w");
  expect(controller.extractContent()).toBe("g");
});

test("an operator is pending until its motion arrives", () => {
  const controller = makeController("ab\ncd");
  expect(controller.processKeys("d")).toEqual([{ status: "handled" }]);
  controller.processKeys("<Esc>j");
  expect(controller.extractContent()).toBe("ab\ncd");
  expect(controller.getCursorPosition()).toEqual({ row: 1, col: 0 });
});

test("counted x deletes several characters", () => {
  const controller = makeController("abcdef");
  controller.processKeys("3x");
  expect(controller.extractContent()).toBe("def");
  expect(controller.getYankRegister()).toBe("abc");
});

test("tilde toggles case and advances", () => {
  const controller = makeController("abC");
  controller.processKeys("~");
  expect(controller.extractContent()).toBe("AbC");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 1 });
  controller.processKeys("5~");
  expect(controller.extractContent()).toBe("ABc");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 2 });
});

test("r replaces characters under the cursor", () => {
  const controller = makeController("abc");
  controller.processKeys("rx");
  expect(controller.extractContent()).toBe("xbc");
  controller.processKeys("3rY");
  expect(controller.extractContent()).toBe("YYY");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 2 });
  expect(controller.processKeys("2rz")).toEqual([
    { status: "handled" },
    { status: "handled" },
    { status: "error", reason: "Not enough characters to replace" },
  ]);
});

test("r followed by a control key is not handled", () => {
  const controller = makeController("abc");
  expect(controller.processKeys("r<C-a>")).toEqual([
    { status: "handled" },
    { status: "not-handled" },
  ]);
  expect(controller.extractContent()).toBe("abc");
});

test("ctrl-a and ctrl-x adjust the number after the cursor", () => {
  const controller = makeController("x 7 y");
  controller.processKeys("<C-a>");
  expect(controller.extractContent()).toBe("x 8 y");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 2 });
  controller.processKeys("10<C-x>");
  expect(controller.extractContent()).toBe("x -2 y");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 3 });
  expect(controller.processKeys("$<C-a>")).toEqual([
    { status: "handled" },
    { status: "error", reason: "No number at or after the cursor" },
  ]);
});

test("number increments", () => {
  expect(incrementNumberInLine("a-1", 0, 1)).toEqual({ text: "a0", col: 1 });
  expect(incrementNumberInLine("12 34", 2, 5)).toEqual({ text: "12 39", col: 4 });
  expect(incrementNumberInLine("12", 2, 1)).toBeNull();
});

test("extra normal commands can be registered", () => {
  const controller = new EditorController({
    initialContent: "abc",
    extendNormalCommands: (commands) => {
      commands.set("Z", {
        repeatable: true,
        run: (state) => {
          state.buffer.setLineText(0, "zzz");
        },
      });
    },
  });
  controller.processKeys("Z");
  expect(controller.extractContent()).toBe("zzz");
  expect(controller.getRepeatableChange()).toMatchObject({ type: "normal" });
});
