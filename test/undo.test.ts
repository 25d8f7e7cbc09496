import { expect, test } from "vitest";
import { EditorController } from "../src";

function makeController(initialContent: string): EditorController {
  return new EditorController({ initialContent });
}

test("undo and redo restore content changes", () => {
  const controller = makeController("Hello");
  controller.processKeys("i!<Esc>");
  expect(controller.extractContent()).toBe("!Hello");
  expect(controller.getMode()).toBe("normal");

  controller.processKeys("u");
  expect(controller.extractContent()).toBe("Hello");
  expect(controller.getMode()).toBe("normal");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 0 });

  controller.processKeys("<C-r>");
  expect(controller.extractContent()).toBe("!Hello");
  expect(controller.getMode()).toBe("normal");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 0 });
});

test("redo stack is cleared after a new edit", () => {
  const controller = makeController("Hello");
  controller.processKeys("i!<Esc>");
  expect(controller.extractContent()).toBe("!Hello");

  controller.processKeys("u");
  expect(controller.extractContent()).toBe("Hello");

  controller.processKeys("i?<Esc>");
  expect(controller.extractContent()).toBe("?Hello");

  controller.processKeys("<C-r>");
  expect(controller.extractContent()).toBe("?Hello");
});

test("undo treats one insert session as a single action", () => {
  const controller = makeController("Hello");
  controller.processKeys("iabc<Esc>");
  expect(controller.extractContent()).toBe("abcHello");

  controller.processKeys("u");
  expect(controller.extractContent()).toBe("Hello");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 0 });

  controller.processKeys("<C-r>");
  expect(controller.extractContent()).toBe("abcHello");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 2 });
});

test("undo with nothing to undo is a no-op", () => {
  const controller = makeController("Hello");
  expect(controller.processKeys("u<C-r>")).toEqual([
    { status: "handled" },
    { status: "handled" },
  ]);
  expect(controller.extractContent()).toBe("Hello");
});

test("counted undo and redo", () => {
  const controller = makeController("one\ntwo\nthree");
  controller.processKeys("dddd");
  expect(controller.extractContent()).toBe("three");

  controller.processKeys("2u");
  expect(controller.extractContent()).toBe("one\ntwo\nthree");
  expect(controller.getCursorPosition()).toEqual({ row: 0, col: 0 });

  controller.processKeys("2<C-r>");
  expect(controller.extractContent()).toBe("three");
});

test("cursor motions are not undo steps", () => {
  const controller = makeController("abc\ndef");
  controller.processKeys("xjlx");
  expect(controller.extractContent()).toBe("bc\ndf");
  controller.processKeys("u");
  expect(controller.extractContent()).toBe("bc\ndef");
  expect(controller.getCursorPosition()).toEqual({ row: 1, col: 1 });
});
