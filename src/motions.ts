import { fail } from "./errors";
import type {
  BufferAdapter,
  CursorPosition,
  EditorState,
  MotionDefinition,
} from "./types";

type CharClass = "blank" | "word" | "punctuation";

const charClass = (char: string): CharClass => {
  if (/\s/.test(char)) return "blank";
  if (/\w/.test(char)) return "word";
  return "punctuation";
};

export const nextWordStartInLine = (
  text: string,
  col: number,
): number | null => {
  let index = col;
  if (index < text.length && charClass(text[index]) !== "blank") {
    const startClass = charClass(text[index]);
    while (index < text.length && charClass(text[index]) === startClass) {
      index += 1;
    }
  }
  while (index < text.length && charClass(text[index]) === "blank") {
    index += 1;
  }
  return index < text.length ? index : null;
};

const nextWordStart = (
  buffer: BufferAdapter,
  { row, col }: CursorPosition,
): CursorPosition | null => {
  const inLine = nextWordStartInLine(buffer.getLineText(row), col);
  if (inLine !== null) return { row, col: inLine };
  for (let next = row + 1; next < buffer.lineCount(); next += 1) {
    const text = buffer.getLineText(next);
    if (text === "") return { row: next, col: 0 };
    const firstNonBlank = text.search(/\S/);
    if (firstNonBlank !== -1) return { row: next, col: firstNonBlank };
  }
  return null;
};

const lastCol = (buffer: BufferAdapter, row: number): number =>
  Math.max(0, buffer.getLineLength(row) - 1);

export const createMotions = <TState extends EditorState = EditorState>(): Map<
  string,
  MotionDefinition<TState>
> => {
  const motions = new Map<string, MotionDefinition<TState>>();
  const define = (
    aliases: string[],
    definition: MotionDefinition<TState>,
  ): void => {
    motions.set(definition.key, definition);
    for (const alias of aliases) {
      motions.set(alias, definition);
    }
  };

  define(["Left"], {
    key: "h",
    move: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      if (col === 0) fail("Already at the start of the line");
      state.cursor.setPosition(row, Math.max(0, col - count), state.buffer);
    },
    toRange: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      if (col === 0) fail("Already at the start of the line");
      const targetCol = Math.max(0, col - count);
      return { type: "character", row, startCol: targetCol, endCol: col };
    },
  });

  define(["Right"], {
    key: "l",
    move: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      const maxCol = lastCol(state.buffer, row);
      if (col >= maxCol) fail("Already at the end of the line");
      state.cursor.setPosition(row, Math.min(maxCol, col + count), state.buffer);
    },
    toRange: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      const lineLength = state.buffer.getLineLength(row);
      if (lineLength === 0) fail("Line is empty");
      const targetCol = Math.min(lineLength, col + count);
      return { type: "character", row, startCol: col, endCol: targetCol };
    },
  });

  define(["Down"], {
    key: "j",
    move: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      const lastRow = state.buffer.lineCount() - 1;
      if (row >= lastRow) fail("Already on the last line");
      state.cursor.setPosition(Math.min(lastRow, row + count), col, state.buffer);
    },
    toRange: (state, count) => {
      const { row } = state.cursor.getPosition();
      const lastRow = state.buffer.lineCount() - 1;
      if (row >= lastRow) fail("Already on the last line");
      return { type: "line", startRow: row, endRow: Math.min(lastRow, row + count) };
    },
  });

  define(["Up"], {
    key: "k",
    move: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      if (row === 0) fail("Already on the first line");
      state.cursor.setPosition(Math.max(0, row - count), col, state.buffer);
    },
    toRange: (state, count) => {
      const { row } = state.cursor.getPosition();
      if (row === 0) fail("Already on the first line");
      return { type: "line", startRow: Math.max(0, row - count), endRow: row };
    },
  });

  define(["Home"], {
    key: "0",
    move: (state) => {
      const { row } = state.cursor.getPosition();
      state.cursor.setPosition(row, 0, state.buffer);
    },
    toRange: (state) => {
      const { row, col } = state.cursor.getPosition();
      return { type: "character", row, startCol: 0, endCol: col };
    },
  });

  define(["End"], {
    key: "$",
    move: (state) => {
      const { row } = state.cursor.getPosition();
      state.cursor.setPosition(row, lastCol(state.buffer, row), state.buffer);
    },
    toRange: (state) => {
      const { row, col } = state.cursor.getPosition();
      const lineLength = state.buffer.getLineLength(row);
      return { type: "character", row, startCol: col, endCol: lineLength };
    },
  });

  define([], {
    key: "w",
    move: (state, count) => {
      let position = state.cursor.getPosition();
      for (let i = 0; i < count; i += 1) {
        const next = nextWordStart(state.buffer, position);
        if (next === null) {
          if (i === 0) fail("No next word");
          break;
        }
        position = next;
      }
      state.cursor.setPosition(position.row, position.col, state.buffer);
    },
    toRange: (state, count) => {
      const { row, col } = state.cursor.getPosition();
      const text = state.buffer.getLineText(row);
      let endCol = col;
      for (let i = 0; i < count; i += 1) {
        const next = nextWordStartInLine(text, endCol);
        if (next === null) {
          endCol = text.length;
          break;
        }
        endCol = next;
      }
      if (endCol <= col) fail("No word under the cursor");
      return { type: "character", row, startCol: col, endCol };
    },
  });

  return motions;
};
