import { fail } from "./errors";
import { createMotions } from "./motions";
import type { EditorState, MotionDefinition, NormalCommand } from "./types";

export interface NormalModeActions {
  setRegister(text: string): void;
  paste(before: boolean, count: number): void;
  repeatLastChange(count: number): void;
  runMacro(name: string, count: number): void;
  runLastMacro(count: number): void;
  startRecording(name: string): void;
  stopRecording(): void;
  isRecording(): boolean;
}

const toggleCase = (char: string): string => {
  const upper = char.toUpperCase();
  return char === upper ? char.toLowerCase() : upper;
};

/**
 * Add `delta` to the first number that ends at or after `col`. Returns the
 * new line and the column of the number's last digit, or null.
 */
export const incrementNumberInLine = (
  text: string,
  col: number,
  delta: number,
): { text: string; col: number } | null => {
  for (const match of text.matchAll(/-?\d+/g)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (end <= col) continue;
    const replacement = String(Number(match[0]) + delta);
    return {
      text: text.slice(0, start) + replacement + text.slice(end),
      col: start + replacement.length - 1,
    };
  }
  return null;
};

export const createNormalKeymap = <TState extends EditorState = EditorState>(
  actions: NormalModeActions,
): {
  motions: Map<string, MotionDefinition<TState>>;
  normalCommands: Map<string, NormalCommand<TState>>;
} => {
  const normalCommands = new Map<string, NormalCommand<TState>>();

  normalCommands.set("i", {
    startsInsert: true,
    run: (state) => {
      state.mode = "insert";
    },
  });

  normalCommands.set("a", {
    startsInsert: true,
    run: (state) => {
      state.cursor.moveRight(state.buffer);
      state.mode = "insert";
    },
  });

  normalCommands.set("A", {
    startsInsert: true,
    run: (state) => {
      state.cursor.moveToLineEnd(state.buffer);
      state.mode = "insert";
    },
  });

  normalCommands.set("o", {
    startsInsert: true,
    run: (state) => {
      const { row } = state.cursor.getPosition();
      state.buffer.insertLineAfter(row, "");
      state.cursor.setPosition(row + 1, 0, state.buffer);
      state.mode = "insert";
    },
  });

  normalCommands.set("O", {
    startsInsert: true,
    run: (state) => {
      const { row } = state.cursor.getPosition();
      state.buffer.insertLineBefore(row, "");
      state.cursor.setPosition(row, 0, state.buffer);
      state.mode = "insert";
    },
  });

  normalCommands.set("x", {
    repeatable: true,
    run: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      const lineLength = state.buffer.getLineLength(row);
      if (col >= lineLength) fail("Nothing to delete");
      const length = Math.min(count, lineLength - col);
      const offset = state.buffer.offsetOf(row, col);
      actions.setRegister(state.buffer.getLineText(row).slice(col, col + length));
      state.buffer.replace(offset, length, "");
    },
  });

  normalCommands.set("D", {
    repeatable: true,
    run: (state) => {
      const { row, col } = state.cursor.getPosition();
      const text = state.buffer.getLineText(row);
      if (col >= text.length) return;
      actions.setRegister(text.slice(col));
      state.buffer.replace(
        state.buffer.offsetOf(row, col),
        text.length - col,
        "",
      );
    },
  });

  normalCommands.set("~", {
    repeatable: true,
    run: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      const text = state.buffer.getLineText(row);
      if (text.length === 0) fail("Nothing to toggle");
      const end = Math.min(text.length, col + count);
      const toggled = Array.from(text.slice(col, end), toggleCase).join("");
      state.buffer.replace(state.buffer.offsetOf(row, col), end - col, toggled);
      state.cursor.setPosition(row, Math.min(end, text.length - 1), state.buffer);
    },
  });

  normalCommands.set("Y", {
    run: (state, count) => {
      const { row } = state.cursor.getPosition();
      const lastRow = Math.min(state.buffer.lineCount() - 1, row + count - 1);
      const lines: string[] = [];
      for (let i = row; i <= lastRow; i += 1) {
        lines.push(state.buffer.getLineText(i));
      }
      actions.setRegister(`${lines.join("\n")}\n`);
    },
  });

  normalCommands.set("p", {
    repeatable: true,
    run: (_state, count) => actions.paste(false, count),
  });

  normalCommands.set("P", {
    repeatable: true,
    run: (_state, count) => actions.paste(true, count),
  });

  const adjustNumber =
    (sign: number): NormalCommand<TState>["run"] =>
    (state, count) => {
      const { row, col } = state.cursor.getPosition();
      const text = state.buffer.getLineText(row);
      const result = incrementNumberInLine(text, col, sign * count);
      if (result === null) fail("No number at or after the cursor");
      state.buffer.setLineText(row, result.text);
      state.cursor.setPosition(row, result.col, state.buffer);
    };

  normalCommands.set("Ctrl+a", { repeatable: true, run: adjustNumber(1) });
  normalCommands.set("Ctrl+x", { repeatable: true, run: adjustNumber(-1) });

  normalCommands.set(".", {
    run: (_state, count) => actions.repeatLastChange(count),
  });

  return {
    motions: createMotions<TState>(),
    normalCommands,
  };
};
