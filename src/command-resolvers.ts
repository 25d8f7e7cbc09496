import { fail } from "./errors";
import type { KeyEvent } from "./key-input";
import { KeyModifier } from "./key-input";
import type { NormalModeActions } from "./normal-keymap";
import type {
  Command,
  EditorState,
  MotionDefinition,
  NormalCommand,
  ResolvedCommand,
} from "./types";
import type { UndoManager } from "./undo-manager";
import { clampNumber, makeKey } from "./utils";

type PendingOperator = "delete" | "yank";
type PendingArgument = "replace" | "record" | "run";

const noop: Command = () => {};

const argumentChar = (keyEvent: KeyEvent): string | null => {
  if (keyEvent.key !== "RawCharacter") return null;
  if ((keyEvent.modifiers & ~KeyModifier.Shift) !== 0) return null;
  return keyEvent.char;
};

export class NormalModeCommandResolver<
  TState extends EditorState = EditorState,
> {
  private countBuffer = "";
  private operatorCount: number | null = null;
  private pendingOperator: PendingOperator | null = null;
  private pendingArgument: PendingArgument | null = null;

  constructor(
    private motions: Map<string, MotionDefinition<TState>>,
    private normalCommands: Map<string, NormalCommand<TState>>,
    private undoManager: UndoManager<TState>,
    private actions: NormalModeActions,
  ) {}

  public isPending(): boolean {
    return (
      this.countBuffer !== "" ||
      this.pendingOperator !== null ||
      this.pendingArgument !== null
    );
  }

  public canResolve(keyEvent: KeyEvent): boolean {
    const key = makeKey(keyEvent);
    if (key === "Escape") return true;
    if (this.pendingArgument !== null) return argumentChar(keyEvent) !== null;
    if (this.isCountDigit(key) || this.motions.has(key)) return true;
    if (key === "u" || key === "Ctrl+r") return true;
    if (key === "d" || key === "y") {
      const operator = key === "d" ? "delete" : "yank";
      return this.pendingOperator === null || this.pendingOperator === operator;
    }
    if (this.pendingOperator !== null) return false;
    return (
      key === "r" || key === "q" || key === "@" || this.normalCommands.has(key)
    );
  }

  public resolve(keyEvent: KeyEvent): ResolvedCommand<TState> | null {
    const key = makeKey(keyEvent);

    if (key === "Escape") {
      this.resetPending();
      return { command: noop };
    }

    if (this.pendingArgument !== null) {
      return this.resolveArgument(this.pendingArgument, keyEvent);
    }

    if (this.isCountDigit(key)) {
      this.countBuffer += key;
      return null;
    }

    if (key === "d") return this.resolveOperator("delete");
    if (key === "y") return this.resolveOperator("yank");

    if (key === "u") {
      const count = this.consumeTotalCount();
      this.resetPending();
      return { command: this.buildUndoCommand(count), isUndo: true };
    }

    if (key === "Ctrl+r") {
      const count = this.consumeTotalCount();
      this.resetPending();
      return { command: this.buildRedoCommand(count), isRedo: true };
    }

    const motionResult = this.resolveMotionKey(key);
    if (motionResult) return motionResult;

    if (this.pendingOperator === null) {
      const argument = this.resolveArgumentPrefix(key);
      if (argument !== undefined) return argument;

      const definition = this.normalCommands.get(key);
      if (definition) {
        const count = this.consumeTotalCount();
        this.resetPending();
        return {
          command: (state) => definition.run(state, count),
          repeatable: definition.repeatable,
          startsInsert: definition.startsInsert,
        };
      }
    }

    this.resetPending();
    return null;
  }

  private resolveArgumentPrefix(
    key: string,
  ): ResolvedCommand<TState> | null | undefined {
    switch (key) {
      case "r":
        this.pendingArgument = "replace";
        return null;
      case "@":
        this.pendingArgument = "run";
        return null;
      case "q":
        if (this.actions.isRecording()) {
          this.resetPending();
          return { command: () => this.actions.stopRecording() };
        }
        this.pendingArgument = "record";
        return null;
      default:
        return undefined;
    }
  }

  private resolveArgument(
    argument: PendingArgument,
    keyEvent: KeyEvent,
  ): ResolvedCommand<TState> | null {
    const count = this.consumeTotalCount();
    this.resetPending();
    const char = argumentChar(keyEvent);
    if (char === null) return null;

    switch (argument) {
      case "replace":
        return { command: this.buildReplaceCommand(char, count), repeatable: true };
      case "record":
        return { command: () => this.actions.startRecording(char) };
      case "run":
        return {
          command: () =>
            char === "@"
              ? this.actions.runLastMacro(count)
              : this.actions.runMacro(char, count),
        };
    }
  }

  private resolveOperator(
    operator: PendingOperator,
  ): ResolvedCommand<TState> | null {
    if (this.pendingOperator === operator) {
      const count = this.consumeTotalCount();
      this.resetPending();
      return operator === "delete"
        ? { command: this.buildDeleteLinesCommand(count), repeatable: true }
        : { command: this.buildYankLinesCommand(count) };
    }
    if (this.pendingOperator !== null) {
      this.resetPending();
      return null;
    }
    this.operatorCount = this.consumeCount();
    this.pendingOperator = operator;
    return null;
  }

  private resolveMotionKey(key: string): ResolvedCommand<TState> | null {
    const motion = this.motions.get(key);
    if (!motion) return null;
    const count = this.consumeTotalCount();
    const operator = this.pendingOperator;
    this.resetPending();
    if (operator === "delete") {
      return {
        command: this.buildDeleteWithMotionCommand(motion, count),
        repeatable: true,
      };
    }
    if (operator === "yank") {
      return { command: this.buildYankWithMotionCommand(motion, count) };
    }
    return { command: this.buildMotionCommand(motion, count) };
  }

  private buildMotionCommand(
    motion: MotionDefinition<TState>,
    count: number,
  ): Command<TState> {
    return (state) => {
      motion.move(state, count);
    };
  }

  private buildDeleteWithMotionCommand(
    motion: MotionDefinition<TState>,
    count: number,
  ): Command<TState> {
    return (state) => {
      const range = motion.toRange(state, count);
      if (range.type === "line") {
        this.deleteLineRange(state, range.startRow, range.endRow);
      } else {
        this.deleteCharacterRange(
          state,
          range.row,
          range.startCol,
          range.endCol,
        );
      }
    };
  }

  private buildYankWithMotionCommand(
    motion: MotionDefinition<TState>,
    count: number,
  ): Command<TState> {
    return (state) => {
      const range = motion.toRange(state, count);
      if (range.type === "line") {
        this.yankLineRange(state, range.startRow, range.endRow);
      } else {
        this.yankCharacterRange(state, range.row, range.startCol, range.endCol);
      }
    };
  }

  private buildDeleteLinesCommand(count: number): Command<TState> {
    return (state) => {
      const { row } = state.cursor.getPosition();
      const endRow = clampNumber(
        row + count - 1,
        0,
        state.buffer.lineCount() - 1,
      );
      this.deleteLineRange(state, row, endRow);
    };
  }

  private buildYankLinesCommand(count: number): Command<TState> {
    return (state) => {
      const { row } = state.cursor.getPosition();
      const endRow = clampNumber(
        row + count - 1,
        0,
        state.buffer.lineCount() - 1,
      );
      this.yankLineRange(state, row, endRow);
    };
  }

  private buildReplaceCommand(char: string, count: number): Command<TState> {
    return (state) => {
      const { row, col } = state.cursor.getPosition();
      if (col + count > state.buffer.getLineLength(row)) {
        fail("Not enough characters to replace");
      }
      const offset = state.buffer.offsetOf(row, col);
      state.buffer.replace(offset, count, char.repeat(count));
      state.cursor.setPosition(row, col + count - 1, state.buffer);
    };
  }

  private buildUndoCommand(count: number): Command<TState> {
    return (state) => {
      for (let i = 0; i < count; i += 1) {
        if (!this.undoManager.undo(state)) break;
      }
      state.mode = "normal";
    };
  }

  private buildRedoCommand(count: number): Command<TState> {
    return (state) => {
      for (let i = 0; i < count; i += 1) {
        if (!this.undoManager.redo(state)) break;
      }
      state.mode = "normal";
    };
  }

  private deleteLineRange(
    state: TState,
    startRow: number,
    endRow: number,
  ): void {
    this.yankLineRange(state, startRow, endRow);
    for (let i = startRow; i <= endRow; i += 1) {
      state.buffer.removeLine(startRow);
    }
    const targetRow = clampNumber(startRow, 0, state.buffer.lineCount() - 1);
    const currentCol = state.cursor.getPosition().col;
    state.cursor.setPosition(targetRow, currentCol, state.buffer);
  }

  private yankLineRange(state: TState, startRow: number, endRow: number): void {
    const lines: string[] = [];
    for (let i = startRow; i <= endRow; i += 1) {
      lines.push(state.buffer.getLineText(i));
    }
    this.actions.setRegister(`${lines.join("\n")}\n`);
  }

  private deleteCharacterRange(
    state: TState,
    row: number,
    startCol: number,
    endCol: number,
  ): void {
    const lineLength = state.buffer.getLineLength(row);
    const clampedStart = clampNumber(startCol, 0, lineLength);
    const clampedEnd = clampNumber(endCol, clampedStart, lineLength);
    if (clampedStart === clampedEnd) return;
    this.yankCharacterRange(state, row, clampedStart, clampedEnd);
    state.buffer.replace(
      state.buffer.offsetOf(row, clampedStart),
      clampedEnd - clampedStart,
      "",
    );
    state.cursor.setPosition(row, clampedStart, state.buffer);
  }

  private yankCharacterRange(
    state: TState,
    row: number,
    startCol: number,
    endCol: number,
  ): void {
    const lineText = state.buffer.getLineText(row);
    const clampedStart = clampNumber(startCol, 0, lineText.length);
    const clampedEnd = clampNumber(endCol, clampedStart, lineText.length);
    if (clampedStart === clampedEnd) return;
    this.actions.setRegister(lineText.slice(clampedStart, clampedEnd));
  }

  private isCountDigit(key: string): boolean {
    if (key === "0") return this.countBuffer !== "";
    return /^[1-9]$/.test(key);
  }

  private consumeCount(): number | null {
    const parsed = this.countBuffer === "" ? null : Number(this.countBuffer);
    this.countBuffer = "";
    return parsed;
  }

  /** Operator count times motion count, as in `2d3w`. */
  private consumeTotalCount(): number {
    const count = (this.operatorCount ?? 1) * (this.consumeCount() ?? 1);
    this.operatorCount = null;
    return count;
  }

  private resetPending(): void {
    this.countBuffer = "";
    this.operatorCount = null;
    this.pendingOperator = null;
    this.pendingArgument = null;
  }
}
