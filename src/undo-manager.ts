import type { EditorSnapshot, EditorState } from "./types";

export class UndoTransaction {
  public closed = false;

  constructor(
    public readonly label: string,
    public readonly generation: number,
  ) {}
}

export interface UndoTransactionScope {
  open(label: string): UndoTransaction;
  complete(transaction: UndoTransaction): void;
  cancel(transaction: UndoTransaction): void;
}

/**
 * Snapshot based undo. Transactions nest: the outermost open takes the
 * snapshot and the matching completion records a single undo step.
 */
export class UndoManager<TState extends EditorState = EditorState> {
  private undoStack: EditorSnapshot[] = [];
  private redoStack: EditorSnapshot[] = [];
  private pendingSnapshot: EditorSnapshot | null = null;
  private openCount = 0;
  // Bumped by cancel so handles opened before it become inert.
  private generation = 0;

  public createSnapshot(state: TState): EditorSnapshot {
    return {
      content: state.buffer.extractContent(),
      cursor: state.cursor.getPosition(),
      mode: state.mode,
    };
  }

  public recordChange(previousSnapshot: EditorSnapshot, state: TState): void {
    const currentContent = state.buffer.extractContent();
    if (previousSnapshot.content !== currentContent) {
      this.undoStack.push(previousSnapshot);
      this.redoStack = [];
    }
  }

  public open(state: TState, label: string): UndoTransaction {
    if (this.openCount === 0) {
      this.pendingSnapshot = this.createSnapshot(state);
    }
    this.openCount += 1;
    return new UndoTransaction(label, this.generation);
  }

  public complete(transaction: UndoTransaction, state: TState): void {
    if (!this.isLive(transaction)) return;
    transaction.closed = true;
    this.openCount -= 1;
    if (this.openCount > 0 || !this.pendingSnapshot) return;
    this.recordChange(this.pendingSnapshot, state);
    this.pendingSnapshot = null;
  }

  public cancel(transaction: UndoTransaction, state: TState): void {
    if (!this.isLive(transaction)) return;
    transaction.closed = true;
    if (this.pendingSnapshot) {
      this.applySnapshot(state, this.pendingSnapshot);
    }
    this.pendingSnapshot = null;
    this.openCount = 0;
    this.generation += 1;
  }

  public bind(state: TState): UndoTransactionScope {
    return {
      open: (label) => this.open(state, label),
      complete: (transaction) => this.complete(transaction, state),
      cancel: (transaction) => this.cancel(transaction, state),
    };
  }

  public undo(state: TState): boolean {
    const snapshot = this.undoStack.pop();
    if (!snapshot) return false;
    const currentSnapshot = this.createSnapshot(state);
    this.redoStack.push(currentSnapshot);
    this.applySnapshot(state, snapshot);
    return true;
  }

  public redo(state: TState): boolean {
    const snapshot = this.redoStack.pop();
    if (!snapshot) return false;
    const currentSnapshot = this.createSnapshot(state);
    this.undoStack.push(currentSnapshot);
    this.applySnapshot(state, snapshot);
    return true;
  }

  private isLive(transaction: UndoTransaction): boolean {
    return !transaction.closed && transaction.generation === this.generation;
  }

  private applySnapshot(state: TState, snapshot: EditorSnapshot): void {
    state.buffer.replaceContent(snapshot.content);
    state.mode = snapshot.mode;
    state.cursor.setFromSnapshot(snapshot.cursor, state.buffer);
  }
}
