import type { Logger } from "pino";
import { getErrorMessage } from "./errors";
import type { KeyEvent } from "./key-input";
import { formatKeyEvent, formatKeyNotation } from "./key-notation";
import { getLogger, logError } from "./logger";
import type { RegisterMap } from "./register-map";
import { isAppendRegisterName, isValidRegisterName } from "./register-map";
import type { Result } from "./result";
import { Err, Ok } from "./result";
import type { DispatchResult } from "./types";
import type { UndoTransactionScope } from "./undo-manager";

export interface KeyDispatcher {
  dispatch(key: KeyEvent): DispatchResult;
}

export interface MacroState {
  recordingRegister: string | null;
  isReplaying: boolean;
  replayDepth: number;
  lastRunRegister: string | null;
}

export type MacroError =
  | { type: "invalid_register"; name: string }
  | { type: "already_recording"; name: string }
  | { type: "not_recording" }
  | { type: "unknown_register"; name: string }
  | { type: "no_last_macro" }
  | { type: "recursion_limit"; limit: number }
  | { type: "dispatch_error"; reason: string; key: string | null };

export const describeMacroError = (error: MacroError): string => {
  switch (error.type) {
    case "invalid_register":
      return `Invalid register "${error.name}"`;
    case "already_recording":
      return `Already recording into register "${error.name}"`;
    case "not_recording":
      return "Not recording";
    case "unknown_register":
      return `Register "${error.name}" is empty`;
    case "no_last_macro":
      return "No previously used register";
    case "recursion_limit":
      return `Macro nesting exceeds ${error.limit}`;
    case "dispatch_error":
      return error.key === null
        ? `Macro stopped: ${error.reason}`
        : `Macro stopped at ${error.key}: ${error.reason}`;
  }
};

export interface MacroEngineOptions {
  dispatcher: KeyDispatcher;
  registers: RegisterMap;
  undo: UndoTransactionScope;
  maxDepth?: number;
  logger?: Logger;
}

/**
 * Records keys into registers and replays them through the dispatcher.
 * A replay, including every nested one, is a single undo step.
 */
export class MacroEngine {
  private dispatcher: KeyDispatcher;
  private registers: RegisterMap;
  private undo: UndoTransactionScope;
  private maxDepth: number;
  private logger: Logger;
  private recordingRegister: string | null = null;
  private recordedKeys: KeyEvent[] = [];
  private replayDepth = 0;
  private lastRunRegister: string | null = null;

  constructor(options: MacroEngineOptions) {
    this.dispatcher = options.dispatcher;
    this.registers = options.registers;
    this.undo = options.undo;
    this.maxDepth = options.maxDepth ?? 100;
    this.logger = options.logger ?? getLogger({ component: "macro-engine" });
  }

  public getState(): MacroState {
    return {
      recordingRegister: this.recordingRegister,
      isReplaying: this.replayDepth > 0,
      replayDepth: this.replayDepth,
      lastRunRegister: this.lastRunRegister,
    };
  }

  public isRecording(): boolean {
    return this.recordingRegister !== null;
  }

  public startRecording(name: string): Result<void, MacroError> {
    if (this.recordingRegister !== null) {
      return Err({ type: "already_recording", name: this.recordingRegister });
    }
    if (!isValidRegisterName(name)) {
      return Err({ type: "invalid_register", name });
    }
    this.recordingRegister = name;
    this.recordedKeys = [];
    this.logger.debug({ register: name }, "Recording started");
    return Ok(undefined);
  }

  public recordKey(key: KeyEvent): void {
    if (this.recordingRegister === null || this.replayDepth > 0) return;
    this.recordedKeys.push(key);
  }

  public stopRecording(): Result<void, MacroError> {
    const name = this.recordingRegister;
    if (name === null) {
      return Err({ type: "not_recording" });
    }
    this.registers.set(name, this.recordedKeys);
    this.logger.debug(
      {
        register: name,
        append: isAppendRegisterName(name),
        keys: formatKeyNotation(this.recordedKeys),
      },
      "Recording stopped",
    );
    this.recordingRegister = null;
    this.recordedKeys = [];
    return Ok(undefined);
  }

  public run(name: string, count = 1): Result<void, MacroError> {
    if (!isValidRegisterName(name)) {
      return Err({ type: "invalid_register", name });
    }
    // Copied so a replay that rewrites its own register is unaffected.
    const keys = [...this.registers.get(name)];
    if (keys.length === 0) {
      return Err({ type: "unknown_register", name });
    }
    if (this.replayDepth >= this.maxDepth) {
      return Err({ type: "recursion_limit", limit: this.maxDepth });
    }

    this.lastRunRegister = name.toLowerCase();
    const transaction = this.undo.open(`macro ${this.lastRunRegister}`);
    this.replayDepth += 1;
    try {
      const repetitions = Math.max(1, count);
      for (let i = 0; i < repetitions; i += 1) {
        for (const key of keys) {
          const result = this.dispatcher.dispatch(key);
          if (result.status === "error") {
            this.undo.complete(transaction);
            this.logger.debug(
              { register: name, key: formatKeyEvent(key), reason: result.reason },
              "Macro stopped on error",
            );
            return Err({
              type: "dispatch_error",
              reason: result.reason,
              key: formatKeyEvent(key),
            });
          }
        }
      }
      this.undo.complete(transaction);
      return Ok(undefined);
    } catch (error) {
      this.undo.cancel(transaction);
      logError(this.logger, error, "Macro replay failed", { register: name });
      return Err({
        type: "dispatch_error",
        reason: getErrorMessage(error),
        key: null,
      });
    } finally {
      this.replayDepth -= 1;
    }
  }

  public runLast(count = 1): Result<void, MacroError> {
    if (this.lastRunRegister === null) {
      return Err({ type: "no_last_macro" });
    }
    return this.run(this.lastRunRegister, count);
  }
}
