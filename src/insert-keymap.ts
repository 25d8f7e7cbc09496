import { fail } from "./errors";
import type { Command, EditorState } from "./types";

const wordPattern = /\w+/g;

/**
 * Text completing the word prefix that ends at `offset`. The candidate is the
 * first longer word starting with the prefix, searching forward from the
 * cursor and wrapping around.
 */
export const findCompletion = (
  content: string,
  offset: number,
): string | null => {
  const prefix = /\w+$/.exec(content.slice(0, offset))?.[0] ?? "";
  if (prefix === "") return null;
  const prefixStart = offset - prefix.length;
  const after: string[] = [];
  const before: string[] = [];
  for (const match of content.matchAll(wordPattern)) {
    const start = match.index ?? 0;
    if (start === prefixStart) continue;
    const word = match[0];
    if (word.length <= prefix.length || !word.startsWith(prefix)) continue;
    (start > prefixStart ? after : before).push(word);
  }
  const candidate: string | undefined = after[0] ?? before[0];
  return candidate === undefined ? null : candidate.slice(prefix.length);
};

export const createInsertKeymap = <TState extends EditorState = EditorState>({
  tabStop,
  expandTab,
}: {
  tabStop: number;
  expandTab: boolean;
}): Map<string, Command<TState>> => {
  const keymap = new Map<string, Command<TState>>();

  keymap.set("Escape", (state) => {
    state.cursor.moveLeft();
    state.mode = "normal";
  });

  keymap.set("Back", (state) => {
    const offset = state.cursor.getOffset(state.buffer);
    if (offset === 0) return;
    state.buffer.replace(offset - 1, 1, "");
    state.cursor.setOffset(offset - 1, state.buffer);
  });

  keymap.set("Delete", (state) => {
    const offset = state.cursor.getOffset(state.buffer);
    state.buffer.replace(offset, 1, "");
  });

  const newline: Command<TState> = (state) => {
    const offset = state.cursor.getOffset(state.buffer);
    state.buffer.replace(offset, 0, "\n");
    state.cursor.setOffset(offset + 1, state.buffer);
  };
  keymap.set("Enter", newline);
  keymap.set("KeypadEnter", newline);

  keymap.set("Tab", (state) => {
    const text = expandTab ? " ".repeat(tabStop) : "\t";
    const offset = state.cursor.getOffset(state.buffer);
    state.buffer.replace(offset, 0, text);
    state.cursor.setOffset(offset + text.length, state.buffer);
  });

  keymap.set("Left", (state) => {
    if (!state.cursor.moveLeft()) fail("Already at the start of the line");
  });
  keymap.set("Right", (state) => {
    if (!state.cursor.moveRight(state.buffer)) {
      fail("Already at the end of the line");
    }
  });
  keymap.set("Up", (state) => {
    if (!state.cursor.moveUp(state.buffer)) fail("Already on the first line");
  });
  keymap.set("Down", (state) => {
    if (!state.cursor.moveDown(state.buffer)) fail("Already on the last line");
  });
  keymap.set("Home", (state) => {
    state.cursor.moveToLineStart();
  });
  keymap.set("End", (state) => {
    state.cursor.moveToLineEnd(state.buffer);
  });

  keymap.set("Ctrl+n", (state) => {
    const offset = state.cursor.getOffset(state.buffer);
    const suffix = findCompletion(state.buffer.extractContent(), offset);
    if (suffix === null) return;
    state.buffer.replace(offset, 0, suffix);
    state.cursor.setOffset(offset + suffix.length, state.buffer);
  });

  return keymap;
};

export const insertTextCommand: Command = (state, key) => {
  const text = key.char ?? "";
  const offset = state.cursor.getOffset(state.buffer);
  state.buffer.replace(offset, 0, text);
  state.cursor.setOffset(offset + text.length, state.buffer);
};
