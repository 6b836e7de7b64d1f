/**
 * Terminal Canvas
 *
 * Drawing primitives over a character-cell terminal. Every call appends to
 * an in-memory buffer; nothing reaches the terminal until `flush()`, so a
 * whole redraw lands in one write and the screen never shows a half-drawn
 * frame.
 *
 * The canvas also tracks where the terminal cursor will be once the buffer
 * is written, which is what the form uses to check its own bookkeeping.
 */

import {
  CLEAR_SCREEN,
  HIDE_CURSOR,
  SHOW_CURSOR,
  charCount,
  cursorTo,
} from './ansi.js';

/** Where flushed output goes. Write errors propagate to the caller. */
export interface TerminalOutput {
  write(data: string): void;
}

export interface Size {
  columns: number;
  rows: number;
}

export interface Point {
  x: number;
  y: number;
}

const BOX = {
  horizontal: '─',
  vertical: '│',
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
} as const;

export class Canvas {
  private buffer = '';
  private position: Point = { x: 0, y: 0 };

  constructor(
    private readonly output: TerminalOutput,
    private columns: number,
    private rows: number
  ) {}

  size(): Size {
    return { columns: this.columns, rows: this.rows };
  }

  resize(columns: number, rows: number): void {
    this.columns = columns;
    this.rows = rows;
  }

  /** Cursor position after everything buffered so far is written. */
  cursor(): Point {
    return { ...this.position };
  }

  /** Text queued since the last flush. */
  pending(): string {
    return this.buffer;
  }

  moveTo(x: number, y: number): this {
    this.buffer += cursorTo(x, y);
    this.position = { x, y };
    return this;
  }

  /**
   * Queue text at the cursor. Returns the number of characters written,
   * not bytes, so callers can advance column math for multi-byte glyphs.
   */
  writeText(s: string): number {
    const count = charCount(s);
    this.buffer += s;
    this.position = { x: this.position.x + count, y: this.position.y };
    return count;
  }

  /**
   * Draw a rectangle with (x1, y1) as the top-left and (x2, y2) as the
   * bottom-right corner, both inclusive.
   */
  drawRect(x1: number, y1: number, x2: number, y2: number): this {
    if (x2 < x1 || y2 < y1) return this;

    for (let x = x1 + 1; x < x2; x++) {
      this.moveTo(x, y1).writeText(BOX.horizontal);
      this.moveTo(x, y2).writeText(BOX.horizontal);
    }
    for (let y = y1 + 1; y < y2; y++) {
      this.moveTo(x1, y).writeText(BOX.vertical);
      this.moveTo(x2, y).writeText(BOX.vertical);
    }
    this.moveTo(x1, y1).writeText(BOX.topLeft);
    this.moveTo(x2, y1).writeText(BOX.topRight);
    this.moveTo(x1, y2).writeText(BOX.bottomLeft);
    this.moveTo(x2, y2).writeText(BOX.bottomRight);
    return this;
  }

  /** Clear the whole screen. The cursor position is left unchanged. */
  clear(): this {
    this.buffer += CLEAR_SCREEN;
    return this;
  }

  hideCursor(): this {
    this.buffer += HIDE_CURSOR;
    return this;
  }

  showCursor(): this {
    this.buffer += SHOW_CURSOR;
    return this;
  }

  /** Write everything queued to the output in a single call. */
  flush(): void {
    if (this.buffer.length === 0) return;
    const data = this.buffer;
    this.buffer = '';
    this.output.write(data);
  }
}
