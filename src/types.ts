import type { CursorState } from "./cursor-state";
import type { KeyEvent } from "./key-input";

export type Mode = "insert" | "normal";

export interface CursorPosition {
  row: number;
  col: number;
}

export interface BufferEdit {
  start: number;
  deletedText: string;
  insertedText: string;
}

export interface BufferAdapter {
  extractContent(): string;
  replaceContent(content: string): void;
  lineCount(): number;
  getLineText(row: number): string;
  getLineLength(row: number): number;
  offsetOf(row: number, col: number): number;
  positionOf(offset: number): CursorPosition;
  replace(start: number, length: number, text: string): void;
  setLineText(row: number, text: string): void;
  insertLineAfter(row: number, text: string): void;
  insertLineBefore(row: number, text: string): void;
  removeLine(row: number): void;
}

export interface EditorSnapshot {
  content: string;
  cursor: CursorPosition;
  mode: Mode;
}

export interface EditorState<TBuffer extends BufferAdapter = BufferAdapter> {
  mode: Mode;
  cursor: CursorState;
  buffer: TBuffer;
}

export type Command<TState extends EditorState = EditorState> = (
  state: TState,
  key: KeyEvent,
) => void;

export interface ResolvedCommand<TState extends EditorState = EditorState> {
  command: Command<TState>;
  isUndo?: boolean;
  isRedo?: boolean;
  repeatable?: boolean;
  startsInsert?: boolean;
}

export type DispatchResult =
  | { status: "handled" }
  | { status: "not-handled" }
  | { status: "error"; reason: string };

export interface NormalCommand<TState extends EditorState = EditorState> {
  run: (state: TState, count: number) => void;
  repeatable?: boolean;
  startsInsert?: boolean;
}

export type MotionRange =
  | { type: "line"; startRow: number; endRow: number }
  | { type: "character"; row: number; startCol: number; endCol: number };

export interface MotionDefinition<TState extends EditorState = EditorState> {
  key: string;
  move: (state: TState, count: number) => void;
  toRange: (state: TState, count: number) => MotionRange;
}
