import type { Logger } from "pino";
import { getLogger } from "./logger";
import type { TextChange } from "./text-change";
import {
  describeTextChange,
  makeCombination,
  makeDeleteLeft,
  makeDeleteRight,
  makeInsert,
  mergeTextChanges,
} from "./text-change";

export interface TrackedEdit {
  start: number;
  deletedText: string;
  insertedText: string;
  caretBefore: number;
}

export interface ChangeTrackerState {
  enabled: boolean;
  current: TextChange | null;
  lastCaretAfterEdit: number | null;
}

type ChangeListener = (change: TextChange) => void;

interface ClassifiedEdit {
  change: TextChange;
  end: number;
  isContiguousWith: (previousEnd: number) => boolean;
  noOpShift: number | null;
}

const identity = (text: string): string => text;

/**
 * Watches buffer edits during an insertion run and folds them into one
 * {@link TextChange}, the value replayed by repeat-last-insert.
 */
export class TextChangeTracker {
  private enabled = false;
  private current: TextChange | null = null;
  private lastCaretAfterEdit: number | null = null;
  private changedListeners = new Set<ChangeListener>();
  private completedListeners = new Set<ChangeListener>();
  private normalizeBlanks: (text: string) => string;
  private logger: Logger;

  constructor(options?: {
    normalizeBlanks?: (text: string) => string;
    logger?: Logger;
  }) {
    this.normalizeBlanks = options?.normalizeBlanks ?? identity;
    this.logger =
      options?.logger ?? getLogger({ component: "text-change-tracker" });
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public setEnabled(enabled: boolean): void {
    if (!enabled) {
      this.reset();
    }
    this.enabled = enabled;
  }

  public getCurrent(): TextChange | null {
    return this.current;
  }

  public getState(): ChangeTrackerState {
    return {
      enabled: this.enabled,
      current: this.current,
      lastCaretAfterEdit: this.lastCaretAfterEdit,
    };
  }

  public onChanged(listener: ChangeListener): () => void {
    this.changedListeners.add(listener);
    return () => this.changedListeners.delete(listener);
  }

  public onChangeCompleted(listener: ChangeListener): () => void {
    this.completedListeners.add(listener);
    return () => this.completedListeners.delete(listener);
  }

  public onBufferEdit(edit: TrackedEdit): void {
    if (!this.enabled) return;
    if (edit.deletedText === "" && edit.insertedText === "") return;

    const classified = this.classify(edit);
    const current = this.current;
    const previousEnd = this.lastCaretAfterEdit;

    if (current === null || previousEnd === null) {
      // A no-op replace does not start an insertion run.
      if (classified.noOpShift !== null) return;
      this.update(classified.change, classified.end);
      return;
    }

    if (classified.noOpShift !== null) {
      const shiftsEnd = edit.start + edit.deletedText.length <= previousEnd;
      this.lastCaretAfterEdit = shiftsEnd
        ? previousEnd + classified.noOpShift
        : previousEnd;
      return;
    }

    if (classified.isContiguousWith(previousEnd)) {
      this.update(mergeTextChanges(current, classified.change), classified.end);
      return;
    }

    this.completeChange();
    this.update(classified.change, classified.end);
  }

  public onCaretMoved(offset: number): void {
    if (this.current === null) return;
    if (offset !== this.lastCaretAfterEdit) {
      this.completeChange();
    }
  }

  public completeChange(): void {
    const change = this.current;
    this.reset();
    if (change === null) return;
    this.logger.debug(
      { change: describeTextChange(change) },
      "Text change completed",
    );
    for (const listener of this.completedListeners) {
      listener(change);
    }
  }

  private update(change: TextChange, end: number): void {
    this.current = change;
    this.lastCaretAfterEdit = end;
    for (const listener of this.changedListeners) {
      listener(change);
    }
  }

  private reset(): void {
    this.current = null;
    this.lastCaretAfterEdit = null;
  }

  private classify(edit: TrackedEdit): ClassifiedEdit {
    const { start, deletedText, insertedText, caretBefore } = edit;
    const deleted = deletedText.length;

    if (deleted === 0) {
      return {
        change: makeInsert(insertedText),
        end: start + insertedText.length,
        isContiguousWith: (previousEnd) => start === previousEnd,
        noOpShift: null,
      };
    }

    if (insertedText === "") {
      // The caret position relative to the span decides the direction.
      if (caretBefore === start) {
        return {
          change: makeDeleteRight(deleted),
          end: start,
          isContiguousWith: (previousEnd) => start === previousEnd,
          noOpShift: null,
        };
      }
      return {
        change: makeDeleteLeft(deleted),
        end: start,
        isContiguousWith: (previousEnd) => start + deleted === previousEnd,
        noOpShift: null,
      };
    }

    const end = start + insertedText.length;
    const suffix = this.blankPrefixSuffix(deletedText, insertedText);
    if (suffix === "") {
      return {
        change: makeInsert(""),
        end,
        isContiguousWith: () => true,
        noOpShift: insertedText.length - deleted,
      };
    }
    if (suffix !== null) {
      return {
        change: makeInsert(suffix),
        end,
        isContiguousWith: (previousEnd) =>
          start === previousEnd || start + deleted === previousEnd,
        noOpShift: null,
      };
    }

    return {
      change: makeCombination(
        makeDeleteLeft(deleted),
        makeInsert(insertedText),
      ),
      end,
      isContiguousWith: (previousEnd) =>
        start === previousEnd || start + deleted === previousEnd,
      noOpShift: null,
    };
  }

  private blankPrefixSuffix(
    deletedText: string,
    insertedText: string,
  ): string | null {
    const normalizedDeleted = this.normalizeBlanks(deletedText);
    if (normalizedDeleted !== "" && insertedText.startsWith(normalizedDeleted)) {
      return insertedText.slice(normalizedDeleted.length);
    }
    if (normalizedDeleted === this.normalizeBlanks(insertedText)) return "";
    return null;
  }
}
