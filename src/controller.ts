import type { Logger } from "pino";
import { CommandExecutor } from "./command-executor";
import type { EditorOptions, EditorOptionsInput } from "./config";
import { editorOptionsSchema } from "./config";
import { CursorState } from "./cursor-state";
import { createDefaultKeyMapper } from "./default-key-mapper";
import { fail } from "./errors";
import type { HostCommandData } from "./host-command";
import { decodeHostCommand } from "./host-command";
import type { KeyEvent } from "./key-input";
import { namedKeyToKeyEvent } from "./key-input";
import type { KeyMapper } from "./key-mapper";
import { formatKeyNotation, parseKeyNotation } from "./key-notation";
import { getLogger } from "./logger";
import type { KeyDispatcher, MacroState } from "./macro-engine";
import { MacroEngine, describeMacroError } from "./macro-engine";
import type { NormalModeActions } from "./normal-keymap";
import { RegisterMap } from "./register-map";
import type { Result } from "./result";
import { TextBuffer } from "./text-buffer";
import type { TextChange } from "./text-change";
import { TextChangeTracker } from "./text-change-tracker";
import type {
  CursorPosition,
  DispatchResult,
  EditorState,
  Mode,
  NormalCommand,
} from "./types";
import type { UndoTransaction } from "./undo-manager";
import { UndoManager } from "./undo-manager";
import { createBlankNormalizer } from "./utils";

type ControllerState = EditorState<TextBuffer>;

export type RepeatableChange =
  | { type: "normal"; keys: KeyEvent[] }
  | { type: "insert"; keys: KeyEvent[]; change: TextChange | null };

export interface EditorControllerOptions {
  initialContent?: string;
  initialMode?: Mode;
  initialCursorRow?: number;
  initialCursorCol?: number;
  options?: EditorOptionsInput;
  normalizeBlanks?: (text: string) => string;
  registers?: RegisterMap;
  logger?: Logger;
  extendNormalCommands?: (
    commands: Map<string, NormalCommand<ControllerState>>,
  ) => void;
}

const HANDLED: DispatchResult = { status: "handled" };
const escapeKey = namedKeyToKeyEvent("Escape");
let nextEditorId = 1;

export class EditorController implements KeyDispatcher {
  private state: ControllerState;
  private options: EditorOptions;
  private logger: Logger;
  private registers: RegisterMap;
  private yankRegister = "";
  private keyMapper: KeyMapper<ControllerState>;
  private executor: CommandExecutor<ControllerState>;
  private undoManager: UndoManager<ControllerState>;
  private tracker: TextChangeTracker;
  private macros: MacroEngine;
  private commandKeys: KeyEvent[] = [];
  private insertEntryKeys: KeyEvent[] = [];
  private insertTransaction: UndoTransaction | null = null;
  private lastRepeatable: RepeatableChange | null = null;
  private lastCompletedChange: TextChange | null = null;
  private caretBeforeEdit = 0;
  private repeating = false;

  constructor(controllerOptions: EditorControllerOptions = {}) {
    const {
      initialContent = "",
      initialMode = "normal",
      initialCursorRow = 0,
      initialCursorCol = 0,
    } = controllerOptions;

    this.options = editorOptionsSchema.parse(controllerOptions.options ?? {});
    this.logger =
      controllerOptions.logger ??
      getLogger({ component: "editor", editorId: nextEditorId++ }, this.options.logLevel);

    const buffer = new TextBuffer(initialContent);
    const cursor = new CursorState(initialCursorRow, initialCursorCol);
    cursor.clampToBuffer(buffer, initialMode === "insert");
    this.state = { mode: initialMode, cursor, buffer };

    this.undoManager = new UndoManager<ControllerState>();
    this.registers = controllerOptions.registers ?? new RegisterMap();
    this.tracker = new TextChangeTracker({
      normalizeBlanks:
        controllerOptions.normalizeBlanks ?? createBlankNormalizer(this.options),
      logger: this.logger.child({ component: "text-change-tracker" }),
    });
    this.tracker.onChangeCompleted((change) => {
      this.lastCompletedChange = change;
    });
    buffer.onDidChange((edit) => {
      this.tracker.onBufferEdit({ ...edit, caretBefore: this.caretBeforeEdit });
      this.caretBeforeEdit = edit.start + edit.insertedText.length;
    });

    this.macros = new MacroEngine({
      dispatcher: this,
      registers: this.registers,
      undo: this.undoManager.bind(this.state),
      maxDepth: this.options.maxMacroDepth,
      logger: this.logger.child({ component: "macro-engine" }),
    });
    this.keyMapper = createDefaultKeyMapper<ControllerState>(
      this.undoManager,
      this.createActions(),
      {
        tabStop: this.options.tabStop,
        expandTab: this.options.expandTab,
        extendNormalCommands: controllerOptions.extendNormalCommands,
      },
    );
    this.executor = new CommandExecutor<ControllerState>(
      this.state,
      this.undoManager,
      this.logger,
    );

    if (initialMode === "insert") {
      this.enterInsertSession([]);
    }
  }

  public getMode(): Mode {
    return this.state.mode;
  }

  public getCursorPosition(): CursorPosition {
    return this.state.cursor.getPosition();
  }

  public setCursorPosition(row: number, col: number): void {
    this.state.cursor.setPosition(row, col, this.state.buffer);
    this.clampCursor();
    this.syncTracker();
  }

  public extractContent(): string {
    return this.state.buffer.extractContent();
  }

  public setContent(content: string): void {
    this.tracker.completeChange();
    this.state.buffer.replaceContent(content);
    this.clampCursor();
  }

  public getOptions(): EditorOptions {
    return { ...this.options };
  }

  public getLastChange(): TextChange | null {
    return this.lastCompletedChange;
  }

  public getRepeatableChange(): RepeatableChange | null {
    return this.lastRepeatable;
  }

  public getMacroState(): MacroState {
    return this.macros.getState();
  }

  public getRegister(name: string): string {
    return formatKeyNotation(this.registers.get(name));
  }

  public setRegister(name: string, notation: string): boolean {
    return this.registers.set(name, parseKeyNotation(notation));
  }

  public getYankRegister(): string {
    return this.yankRegister;
  }

  public runMacro(name: string, count = 1): Result<void, string> {
    const result = this.macros.run(name, count);
    return result.success
      ? result
      : { success: false, error: describeMacroError(result.error) };
  }

  public dispatch(key: KeyEvent): DispatchResult {
    const modeBefore = this.state.mode;
    if (modeBefore === "normal") {
      this.commandKeys.push(key);
    }

    const resolved = this.keyMapper.resolve(this.state, key);
    if (!resolved) {
      if (this.keyMapper.isPending(this.state)) return HANDLED;
      this.commandKeys = [];
      return { status: "not-handled" };
    }

    const keys = this.commandKeys;
    this.commandKeys = [];
    if (resolved.startsInsert) {
      this.insertTransaction = this.undoManager.open(this.state, "insert");
    }

    this.caretBeforeEdit = this.cursorOffset();
    const result = this.executor.run(resolved, key);

    if (resolved.startsInsert && this.state.mode !== "insert") {
      this.closeInsertTransaction();
    }
    if (this.state.mode === "insert" && !this.tracker.isEnabled()) {
      this.enterInsertSession(keys);
    } else if (this.state.mode === "normal" && this.tracker.isEnabled()) {
      this.leaveInsertSession();
    }

    if (
      result.status === "handled" &&
      resolved.repeatable &&
      modeBefore === "normal" &&
      !this.repeating
    ) {
      this.lastRepeatable = { type: "normal", keys };
    }

    this.clampCursor();
    this.syncTracker();
    return result;
  }

  public canProcess(key: KeyEvent): boolean {
    return this.keyMapper.canResolve(this.state, key);
  }

  public processKey(key: KeyEvent): DispatchResult {
    const wasRecording = this.macros.isRecording();
    const result = this.dispatch(key);
    if (wasRecording && this.macros.isRecording()) {
      this.macros.recordKey(key);
    }
    return result;
  }

  public processKeys(notation: string): DispatchResult[] {
    return parseKeyNotation(notation).map((key) => this.processKey(key));
  }

  /**
   * Feed a host command. Returns false when the host should run it
   * natively.
   */
  public processHostCommand(data: HostCommandData): boolean {
    const decoded = decodeHostCommand(data);
    if (!decoded.success) {
      this.logger.debug({ failure: decoded.error }, "Host command not decoded");
      return false;
    }
    if (decoded.data.kind === "host-command") return false;
    return this.processKey(decoded.data.keyEvent).status !== "not-handled";
  }

  private createActions(): NormalModeActions {
    return {
      setRegister: (text) => {
        this.yankRegister = text;
      },
      paste: (before, count) => this.pasteFromRegister(before, count),
      repeatLastChange: (count) => this.repeatLastChange(count),
      runMacro: (name, count) => {
        const result = this.macros.run(name, count);
        if (!result.success) fail(describeMacroError(result.error));
      },
      runLastMacro: (count) => {
        const result = this.macros.runLast(count);
        if (!result.success) fail(describeMacroError(result.error));
      },
      startRecording: (name) => {
        const result = this.macros.startRecording(name);
        if (!result.success) fail(describeMacroError(result.error));
      },
      stopRecording: () => {
        const result = this.macros.stopRecording();
        if (!result.success) fail(describeMacroError(result.error));
      },
      isRecording: () => this.macros.isRecording(),
    };
  }

  private enterInsertSession(entryKeys: KeyEvent[]): void {
    this.insertEntryKeys = entryKeys;
    this.lastCompletedChange = null;
    if (!this.insertTransaction) {
      this.insertTransaction = this.undoManager.open(this.state, "insert");
    }
    this.tracker.setEnabled(true);
  }

  private leaveInsertSession(): void {
    this.tracker.completeChange();
    this.tracker.setEnabled(false);
    this.closeInsertTransaction();
    if (!this.repeating) {
      this.lastRepeatable = {
        type: "insert",
        keys: this.insertEntryKeys,
        change: this.lastCompletedChange,
      };
    }
  }

  private closeInsertTransaction(): void {
    if (!this.insertTransaction) return;
    this.undoManager.complete(this.insertTransaction, this.state);
    this.insertTransaction = null;
  }

  private repeatLastChange(count: number): void {
    const last = this.lastRepeatable;
    if (last === null) fail("No previous change to repeat");
    const wasRepeating = this.repeating;
    this.repeating = true;
    try {
      for (let i = 0; i < count; i += 1) {
        this.replayKeys(last.keys);
        if (last.type === "insert") {
          if (last.change) this.applyTextChange(last.change);
          this.replayKeys([escapeKey]);
        }
      }
    } finally {
      this.repeating = wasRepeating;
    }
  }

  private replayKeys(keys: readonly KeyEvent[]): void {
    for (const key of keys) {
      const result = this.dispatch(key);
      if (result.status === "error") fail(result.reason);
    }
  }

  private applyTextChange(change: TextChange): void {
    const { buffer, cursor } = this.state;
    const caret = this.cursorOffset();
    this.caretBeforeEdit = caret;
    switch (change.type) {
      case "insert":
        buffer.replace(caret, 0, change.text);
        cursor.setOffset(caret + change.text.length, buffer);
        break;
      case "delete-left": {
        const count = Math.min(change.count, caret);
        buffer.replace(caret - count, count, "");
        cursor.setOffset(caret - count, buffer);
        break;
      }
      case "delete-right":
        buffer.replace(caret, change.count, "");
        break;
      case "combination":
        this.applyTextChange(change.first);
        this.applyTextChange(change.second);
        break;
    }
  }

  private pasteFromRegister(before: boolean, count: number): void {
    if (this.yankRegister === "") fail("Nothing to paste");
    const { buffer, cursor } = this.state;
    const { row, col } = cursor.getPosition();
    const text = this.yankRegister.repeat(count);

    if (text.endsWith("\n")) {
      const lines = text.slice(0, -1);
      if (before) {
        buffer.insertLineBefore(row, lines);
        cursor.setPosition(row, 0, buffer);
      } else {
        buffer.insertLineAfter(row, lines);
        cursor.setPosition(row + 1, 0, buffer);
      }
      return;
    }

    const insertCol = before ? col : Math.min(col + 1, buffer.getLineLength(row));
    const offset = buffer.offsetOf(row, insertCol);
    buffer.replace(offset, 0, text);
    cursor.setOffset(offset + text.length - 1, buffer);
  }

  private cursorOffset(): number {
    return this.state.cursor.getOffset(this.state.buffer);
  }

  private clampCursor(): void {
    this.state.cursor.clampToBuffer(
      this.state.buffer,
      this.state.mode === "insert",
    );
  }

  private syncTracker(): void {
    if (this.state.mode === "insert") {
      this.tracker.onCaretMoved(this.cursorOffset());
    }
  }
}
