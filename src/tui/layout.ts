/**
 * Screen layout
 *
 * Pure geometry: given the terminal size, where each piece of the two
 * screens goes. All coordinates are 0-based cells.
 *
 *   ┌──────────────────────────────┐
 *   │                              │
 *   │  Food Name: ┌─────────────┐  │
 *   │             │             │  │
 *   │  ...        └─────────────┘  │
 *   └──────────────────────────────┘
 *    Tab Next     S-Tab Prev   ...      ← help area (3 rows)
 */

import { charCount } from '../terminal/ansi.js';
import type { Point, Size } from '../terminal/canvas.js';

/** Rows reserved below the border for the help line. */
export const HELP_HEIGHT = 3;
/** Gap between help labels. */
export const HELP_PAD = 5;
/** Widest field label ("Food Name:"). */
export const LABEL_WIDTH = 10;
/** Input box width, border to border. */
export const INPUT_WIDTH = 50;
/** Vertical distance between consecutive fields. */
export const FIELD_SPACING = 3;
/** Characters that fit inside an input box. */
export const FIELD_CAPACITY = INPUT_WIDTH - 1;

export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export function borderRect({ columns, rows }: Size): Rect {
  return { x1: 0, y1: 0, x2: Math.max(0, columns - 1), y2: Math.max(0, rows - HELP_HEIGHT) };
}

export function helpRow({ rows }: Size): number {
  return Math.max(0, rows - HELP_HEIGHT + 1);
}

/**
 * Positions of the help labels: each starts after the text of the ones
 * before it plus HELP_PAD per gap.
 */
export function helpPositions(labels: readonly string[], size: Size): Point[] {
  const y = helpRow(size);
  let written = 0;
  return labels.map((label, i) => {
    const point = { x: 1 + written + i * HELP_PAD, y };
    written += charCount(label);
    return point;
  });
}

/** Start of a line of `text` centered on row `y`. */
export function centeredX(text: string, { columns }: Size): number {
  return Math.max(0, Math.floor(columns / 2) - Math.floor(charCount(text) / 2));
}

export function centerRow({ rows }: Size): number {
  return Math.floor(rows / 2);
}

export interface FieldSlot {
  /** Where the label starts */
  label: Point;
  /** Box around the input */
  box: Rect;
  /** First cell inside the box; typed text starts here */
  input: Point;
}

/**
 * Place `count` labeled input boxes, centered as a block.
 */
export function formSlots(count: number, { columns, rows }: Size): FieldSlot[] {
  const blockWidth = LABEL_WIDTH + INPUT_WIDTH + 1;
  const blockHeight = FIELD_SPACING * count + 1;
  const x = Math.max(0, Math.floor(columns / 2) - Math.floor(blockWidth / 2));
  // y is at least 1 so the first box's top edge stays on screen
  const y = Math.max(1, Math.floor(rows / 2) - Math.floor(blockHeight / 2));

  return Array.from({ length: count }, (_, i) => {
    const row = y + FIELD_SPACING * i;
    const left = x + LABEL_WIDTH + 1;
    return {
      label: { x, y: row },
      box: { x1: left, y1: row - 1, x2: left + INPUT_WIDTH, y2: row + 1 },
      input: { x: left + 1, y: row },
    };
  });
}
