import type { Logger } from "pino";
import { CommandFailure, getErrorMessage } from "./errors";
import type { KeyEvent } from "./key-input";
import { formatKeyEvent } from "./key-notation";
import { logError } from "./logger";
import type { DispatchResult, EditorState, ResolvedCommand } from "./types";
import type { UndoManager } from "./undo-manager";

export class CommandExecutor<TState extends EditorState = EditorState> {
  constructor(
    private state: TState,
    private undoManager: UndoManager<TState>,
    private logger: Logger,
  ) {}

  public run(resolved: ResolvedCommand<TState>, key: KeyEvent): DispatchResult {
    const transaction =
      resolved.isUndo || resolved.isRedo
        ? null
        : this.undoManager.open(this.state, formatKeyEvent(key));
    try {
      resolved.command(this.state, key);
      return { status: "handled" };
    } catch (error) {
      if (error instanceof CommandFailure) {
        this.logger.debug(
          { key: formatKeyEvent(key), reason: error.message },
          "Command failed",
        );
        return { status: "error", reason: error.message };
      }
      logError(this.logger, error, "Command threw unexpectedly", {
        key: formatKeyEvent(key),
      });
      return { status: "error", reason: getErrorMessage(error) };
    } finally {
      if (transaction) {
        this.undoManager.complete(transaction, this.state);
      }
    }
  }
}
