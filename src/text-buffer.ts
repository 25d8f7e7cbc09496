import type { BufferAdapter, BufferEdit, CursorPosition } from "./types";
import { clampNumber } from "./utils";

type EditListener = (edit: BufferEdit) => void;

export class TextBuffer implements BufferAdapter {
  private lines: string[];
  private listeners = new Set<EditListener>();

  constructor(content = "") {
    this.lines = content.split("\n");
  }

  public onDidChange(listener: EditListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public extractContent(): string {
    return this.lines.join("\n");
  }

  public replaceContent(content: string): void {
    this.lines = content.split("\n");
  }

  public lineCount(): number {
    return this.lines.length;
  }

  public getLineText(row: number): string {
    return this.lines[row] ?? "";
  }

  public getLineLength(row: number): number {
    return this.getLineText(row).length;
  }

  public offsetOf(row: number, col: number): number {
    const lastRow = this.lines.length - 1;
    const clampedRow = clampNumber(row, 0, lastRow);
    let offset = 0;
    for (let i = 0; i < clampedRow; i += 1) {
      offset += this.lines[i].length + 1;
    }
    return offset + clampNumber(col, 0, this.lines[clampedRow].length);
  }

  public positionOf(offset: number): CursorPosition {
    let remaining = Math.max(0, offset);
    for (let row = 0; row < this.lines.length; row += 1) {
      const length = this.lines[row].length;
      if (remaining <= length) return { row, col: remaining };
      remaining -= length + 1;
    }
    const lastRow = this.lines.length - 1;
    return { row: lastRow, col: this.lines[lastRow].length };
  }

  public replace(start: number, length: number, text: string): void {
    const content = this.extractContent();
    const from = clampNumber(start, 0, content.length);
    const to = clampNumber(from + length, from, content.length);
    const deletedText = content.slice(from, to);
    if (deletedText === "" && text === "") return;
    this.lines = (content.slice(0, from) + text + content.slice(to)).split(
      "\n",
    );
    const edit: BufferEdit = { start: from, deletedText, insertedText: text };
    for (const listener of this.listeners) {
      listener(edit);
    }
  }

  public setLineText(row: number, text: string): void {
    this.replace(this.offsetOf(row, 0), this.getLineLength(row), text);
  }

  public insertLineAfter(row: number, text: string): void {
    this.replace(this.offsetOf(row, this.getLineLength(row)), 0, `\n${text}`);
  }

  public insertLineBefore(row: number, text: string): void {
    this.replace(this.offsetOf(row, 0), 0, `${text}\n`);
  }

  public removeLine(row: number): void {
    const start = this.offsetOf(row, 0);
    const length = this.getLineLength(row);
    if (this.lines.length === 1) {
      this.replace(start, length, "");
    } else if (row < this.lines.length - 1) {
      this.replace(start, length + 1, "");
    } else {
      this.replace(start - 1, length + 1, "");
    }
  }
}
