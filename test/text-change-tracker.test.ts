import { beforeEach, expect, test } from "vitest";
import {
  TextBuffer,
  TextChangeTracker,
  createBlankNormalizer,
  describeTextChange,
  isCombination,
  isDeleteLeft,
  isDeleteRight,
  isInsert,
  makeCombination,
  makeDeleteLeft,
  makeInsert,
} from "../src";
import type { TextChange } from "../src";

let buffer: TextBuffer;
let tracker: TextChangeTracker;
let caret: number;
let completed: TextChange[];

function create(content: string, normalizeBlanks?: (text: string) => string) {
  buffer = new TextBuffer(content);
  tracker = new TextChangeTracker({ normalizeBlanks });
  caret = 0;
  completed = [];
  buffer.onDidChange((edit) => {
    tracker.onBufferEdit({ ...edit, caretBefore: caret });
    caret = edit.start + edit.insertedText.length;
  });
  tracker.onChangeCompleted((change) => completed.push(change));
  tracker.setEnabled(true);
}

function insert(offset: number, text: string) {
  buffer.replace(offset, 0, text);
}

function remove(offset: number, length: number) {
  buffer.replace(offset, length, "");
}

beforeEach(() => {
  create("the quick brown fox");
});

test("nothing is tracked while disabled", () => {
  tracker.setEnabled(false);
  insert(0, "a");
  expect(tracker.getCurrent()).toBeNull();
  expect(completed).toEqual([]);
});

test("disabling discards the pending change without an event", () => {
  insert(0, "a");
  tracker.setEnabled(false);
  expect(tracker.getCurrent()).toBeNull();
  expect(completed).toEqual([]);
  expect(tracker.getState()).toEqual({
    enabled: false,
    current: null,
    lastCaretAfterEdit: null,
  });
});

test("typing forward accumulates one insert", () => {
  insert(0, "a");
  expect(tracker.getCurrent()).toEqual(makeInsert("a"));
  insert(1, "b");
  insert(2, "c");
  expect(tracker.getCurrent()).toEqual(makeInsert("abc"));
  expect(completed).toEqual([]);
});

test("multi character inserts merge", () => {
  insert(0, "ab");
  insert(2, "cde");
  expect(tracker.getCurrent()).toEqual(makeInsert("abcde"));
});

test("backspace trims the typed text", () => {
  insert(0, "abc");
  remove(2, 1);
  expect(tracker.getCurrent()).toEqual(makeInsert("ab"));
  remove(1, 1);
  expect(tracker.getCurrent()).toEqual(makeInsert("a"));
});

test("deleting before the caret is a delete left", () => {
  remove(2, 1);
  expect(tracker.getCurrent()).toEqual(makeDeleteLeft(1));
  remove(1, 1);
  expect(tracker.getCurrent()).toEqual(makeDeleteLeft(2));
});

test("a wider delete left", () => {
  remove(2, 2);
  expect(tracker.getCurrent()).toEqual(makeDeleteLeft(2));
});

test("deleting at the caret is a delete right", () => {
  create("cat dog");
  remove(0, 3);
  const current = tracker.getCurrent();
  expect(current !== null && isDeleteRight(current, 3)).toBe(true);
  remove(0, 1);
  expect(describeTextChange(tracker.getCurrent() ?? makeInsert(""))).toBe(
    "DeleteRight(4)",
  );
});

test("deleting a span the caret sits inside is a delete left", () => {
  create("cat dog");
  caret = 1;
  remove(0, 3);
  const current = tracker.getCurrent();
  expect(current !== null && isDeleteLeft(current, 3)).toBe(true);
});

test("a replace is a delete left followed by the new text", () => {
  for (const [content, replacement] of [
    ["cat", "dog"],
    ["house", "dog"],
    ["dog", "house"],
  ]) {
    create(content);
    caret = 1;
    buffer.replace(0, content.length, replacement);
    expect(tracker.getCurrent()).toEqual(
      makeCombination(makeDeleteLeft(content.length), makeInsert(replacement)),
    );
  }
});

test("a replace after an insert combines with it", () => {
  create("dog");
  insert(0, "i");
  buffer.replace(1, 3, "cat");
  const change = tracker.getCurrent();
  expect(change).not.toBeNull();
  if (change === null || !isCombination(change)) return;
  expect(isInsert(change.first, "i")).toBe(true);
  expect(isCombination(change.second)).toBe(true);
  expect(describeTextChange(change)).toBe(
    'Combination(Insert("i"), Combination(DeleteLeft(3), Insert("cat")))',
  );
});

test("a blank-only replace is a no-op that keeps the change contiguous", () => {
  create("    hello", createBlankNormalizer({ tabStop: 4, expandTab: false }));
  insert(9, "!");
  buffer.replace(0, 4, "\t");
  expect(tracker.getCurrent()).toEqual(makeInsert("!"));
  expect(tracker.getState().lastCaretAfterEdit).toBe(7);
  insert(7, "?");
  expect(tracker.getCurrent()).toEqual(makeInsert("!?"));
  expect(buffer.extractContent()).toBe("\thello!?");
});

test("replacing spaces with an extra tab is an insert of the tab", () => {
  create("    hello", createBlankNormalizer({ tabStop: 4, expandTab: false }));
  buffer.replace(0, 4, "\t\t");
  expect(tracker.getCurrent()).toEqual(makeInsert("\t"));
  expect(buffer.extractContent()).toBe("\t\thello");
});

test("a blank-only replace as the first edit publishes nothing", () => {
  create("    hello", createBlankNormalizer({ tabStop: 4, expandTab: false }));
  buffer.replace(0, 4, "\t");
  expect(tracker.getCurrent()).toBeNull();
  tracker.completeChange();
  expect(completed).toEqual([]);
});

test("a non-contiguous edit completes the change and starts another", () => {
  insert(0, "ab");
  insert(10, "x");
  expect(completed).toEqual([makeInsert("ab")]);
  expect(tracker.getCurrent()).toEqual(makeInsert("x"));
});

test("moving the caret away completes the change", () => {
  insert(0, "ab");
  tracker.onCaretMoved(2);
  expect(completed).toEqual([]);
  tracker.onCaretMoved(5);
  expect(completed).toEqual([makeInsert("ab")]);
  expect(tracker.getCurrent()).toBeNull();
});

test("complete change publishes once and returns to idle", () => {
  const changed: TextChange[] = [];
  const unsubscribe = tracker.onChanged((change) => changed.push(change));
  insert(0, "a");
  unsubscribe();
  insert(1, "b");
  tracker.completeChange();
  tracker.completeChange();
  expect(changed).toEqual([makeInsert("a")]);
  expect(completed).toEqual([makeInsert("ab")]);
  expect(tracker.isEnabled()).toBe(true);
  expect(tracker.getCurrent()).toBeNull();
});
