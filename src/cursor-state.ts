import type { BufferAdapter, CursorPosition } from "./types";

export class CursorState {
  private position: CursorPosition;

  constructor(row: number, col: number) {
    this.position = { row, col };
  }

  public getPosition(): CursorPosition {
    return { ...this.position };
  }

  public clampToBuffer(buffer: BufferAdapter, allowPastEnd = true): void {
    const maxRow = Math.max(0, buffer.lineCount() - 1);
    const clampedRow = Math.min(Math.max(this.position.row, 0), maxRow);
    const lineLength = buffer.getLineLength(clampedRow);
    const maxCol = allowPastEnd ? lineLength : Math.max(0, lineLength - 1);
    const clampedCol = Math.min(Math.max(this.position.col, 0), maxCol);
    this.position = { row: clampedRow, col: clampedCol };
  }

  public setPosition(row: number, col: number, buffer: BufferAdapter): void {
    this.position = { row, col };
    this.clampToBuffer(buffer);
  }

  public setOffset(offset: number, buffer: BufferAdapter): void {
    const { row, col } = buffer.positionOf(offset);
    this.setPosition(row, col, buffer);
  }

  public getOffset(buffer: BufferAdapter): number {
    return buffer.offsetOf(this.position.row, this.position.col);
  }

  public setFromSnapshot(
    position: CursorPosition,
    buffer: BufferAdapter,
  ): void {
    this.position = { ...position };
    this.clampToBuffer(buffer);
  }

  public moveLeft(): boolean {
    if (this.position.col === 0) return false;
    this.position.col -= 1;
    return true;
  }

  public moveRight(buffer: BufferAdapter): boolean {
    const lineLength = buffer.getLineLength(this.position.row);
    if (this.position.col >= lineLength) return false;
    this.position.col += 1;
    return true;
  }

  public moveUp(buffer: BufferAdapter): boolean {
    if (this.position.row === 0) return false;
    this.position.row -= 1;
    const lineLength = buffer.getLineLength(this.position.row);
    this.position.col = Math.min(lineLength, this.position.col);
    return true;
  }

  public moveDown(buffer: BufferAdapter): boolean {
    if (this.position.row >= buffer.lineCount() - 1) return false;
    this.position.row += 1;
    const lineLength = buffer.getLineLength(this.position.row);
    this.position.col = Math.min(lineLength, this.position.col);
    return true;
  }

  public moveToLineStart(): void {
    this.position.col = 0;
  }

  public moveToLineEnd(buffer: BufferAdapter): void {
    this.position.col = buffer.getLineLength(this.position.row);
  }
}
