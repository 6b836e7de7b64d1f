import { describe, it, expect, beforeEach } from 'vitest';
import { Canvas } from '../terminal/canvas.js';
import { HIDE_CURSOR, SHOW_CURSOR, bold, cursorTo, cyan, dim } from '../terminal/ansi.js';
import { MacroAccumulator } from '../macros/accumulator.js';
import { FoodLogController, type ControllerOptions } from '../tui/controller.js';
import { FIELD_CAPACITY } from '../tui/layout.js';
import type { FoodRecord, Key } from '../shared/types.js';
import { FakeOutput } from './fake-terminal.js';

// On an 80x24 screen the input boxes start at column 22, rows 1, 4, ..., 19
const INPUT_X = 22;
const fieldRow = (field: number): number => 1 + 3 * field;

const catalog: FoodRecord[] = [
  { name: 'Egg', calories: 70, carbs: 1, fat: 5, protein: 6, unit: 'each' },
  { name: 'Oats', calories: 150, carbs: 27, fat: 3, protein: 5, unit: '40 g' },
];

const ch = (char: string): Key => ({ name: 'char', char, alt: false });
const TAB: Key = { name: 'tab' };
const BACKTAB: Key = { name: 'backtab' };
const ENTER: Key = { name: 'enter' };
const ESCAPE: Key = { name: 'escape' };
const BACKSPACE: Key = { name: 'backspace' };

interface Harness {
  output: FakeOutput;
  canvas: Canvas;
  accumulator: MacroAccumulator;
  controller: FoodLogController;
}

function setup(options: ControllerOptions = {}): Harness {
  const output = new FakeOutput();
  const canvas = new Canvas(output, 80, 24);
  const accumulator = new MacroAccumulator();
  const controller = new FoodLogController(canvas, catalog, accumulator, options);
  controller.renderOverview();
  return { output, canvas, accumulator, controller };
}

function press(controller: FoodLogController, ...keys: Key[]): void {
  for (const key of keys) controller.handleKey(key);
}

function type(controller: FoodLogController, text: string): void {
  press(controller, ...[...text].map(ch));
}

/** Fill the form field by field, tabbing between entries. */
function fill(controller: FoodLogController, values: string[]): void {
  values.forEach((value, i) => {
    if (i > 0) press(controller, TAB);
    type(controller, value);
  });
}

// name, calories, protein, carbs, fat, unit, quantity
const EGG_FORM = ['Egg', '70', '6', '1', '5', 'each', '2'];

// ---------------------------------------------------------------------------
// Overview
// ---------------------------------------------------------------------------

describe('overview', () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
  });

  it('should start in the overview with the cursor hidden', () => {
    expect(h.controller.snapshot().view).toBe('overview');
    expect(h.output.writes).toHaveLength(1);
    expect(h.output.writes[0].startsWith(HIDE_CURSOR)).toBe(true);
  });

  it('should draw the help line', () => {
    expect(h.output.text).toContain(cursorTo(1, 22) + 'q Quit');
    expect(h.output.text).toContain(cursorTo(12, 22) + 'a Add Food');
  });

  it('should center the totals', () => {
    expect(h.output.text).toContain(cursorTo(21, 12) + bold('Today:'));
    expect(h.output.text).toContain(
      cursorTo(21, 13) + cyan('Calories: 0 Protein: 0 Carbs: 0 Fat: 0')
    );
    expect(h.output.text).toContain(cursorTo(21, 14) + dim('2 foods in catalog'));
  });

  it('should quit on q', () => {
    expect(h.controller.handleKey(ch('q'))).toBe('quit');
  });

  it('should ignore other keys', () => {
    const writes = h.output.writes.length;
    expect(h.controller.handleKey(ch('x'))).toBe('continue');
    expect(h.controller.handleKey(TAB)).toBe('continue');
    expect(h.controller.snapshot().view).toBe('overview');
    expect(h.output.writes).toHaveLength(writes);
  });

  it('should only accept q and a', () => {
    expect(h.controller.accepts(ch('q'))).toBe(true);
    expect(h.controller.accepts(ch('a'))).toBe(true);
    expect(h.controller.accepts(ch('b'))).toBe(false);
    expect(h.controller.accepts({ name: 'char', char: 'q', alt: true })).toBe(false);
    expect(h.controller.accepts(ENTER)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Entering the form
// ---------------------------------------------------------------------------

describe('opening the form', () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
    press(h.controller, ch('a'));
  });

  it('should switch to the form on a', () => {
    expect(h.controller.snapshot()).toEqual({
      view: 'form',
      activeField: 0,
      fields: ['', '', '', '', '', '', ''],
      cursor: { x: INPUT_X, y: fieldRow(0) },
    });
  });

  it('should draw the labels and help in one flush', () => {
    expect(h.output.writes).toHaveLength(2);
    const frame = h.output.writes[1];
    expect(frame).toContain(cursorTo(10, 1) + 'Food Name:');
    expect(frame).toContain(cursorTo(10, 19) + ' Quantity:');
    expect(frame).toContain(cursorTo(1, 22) + 'Tab Next');
    expect(frame).toContain(cursorTo(14, 22) + 'S-Tab Prev');
  });

  it('should place a visible cursor in the first box', () => {
    const frame = h.output.writes[1];
    expect(frame.endsWith(cursorTo(INPUT_X, 1) + SHOW_CURSOR)).toBe(true);
    expect(h.canvas.cursor()).toEqual({ x: INPUT_X, y: fieldRow(0) });
  });

  it('should not quit on q while typing', () => {
    expect(h.controller.handleKey(ch('q'))).toBe('continue');
    expect(h.controller.snapshot().fields[0]).toBe('q');
  });

  it('should accept editing keys but not arrows', () => {
    expect(h.controller.accepts(TAB)).toBe(true);
    expect(h.controller.accepts(ESCAPE)).toBe(true);
    expect(h.controller.accepts(ch('z'))).toBe(true);
    expect(h.controller.accepts({ name: 'up' })).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Editing
// ---------------------------------------------------------------------------

describe('editing a field', () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
    press(h.controller, ch('a'));
  });

  it('should echo each character at the cursor', () => {
    type(h.controller, 'Eg');
    expect(h.output.writes.slice(2)).toEqual([
      cursorTo(INPUT_X, 1) + 'E',
      cursorTo(INPUT_X + 1, 1) + 'g',
    ]);
    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X + 2, y: 1 });
  });

  it('should count a multi-byte character as one cell', () => {
    type(h.controller, 'é🍳');
    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X + 2, y: 1 });
    expect(h.canvas.cursor()).toEqual({ x: INPUT_X + 2, y: 1 });
  });

  it('should erase the last character on backspace', () => {
    type(h.controller, 'ab');
    press(h.controller, BACKSPACE);

    expect(h.controller.snapshot().fields[0]).toBe('a');
    expect(h.output.writes.at(-1)).toBe(
      cursorTo(INPUT_X + 1, 1) + ' ' + cursorTo(INPUT_X + 1, 1)
    );
    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X + 1, y: 1 });
  });

  it('should ignore backspace on an empty field', () => {
    const writes = h.output.writes.length;
    press(h.controller, BACKSPACE, BACKSPACE);
    expect(h.output.writes).toHaveLength(writes);
    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X, y: 1 });

    type(h.controller, 'x');
    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X + 1, y: 1 });
  });

  it('should stop at the box capacity', () => {
    type(h.controller, 'x'.repeat(FIELD_CAPACITY + 3));
    expect(h.controller.snapshot().fields[0]).toHaveLength(FIELD_CAPACITY);
    expect(h.controller.snapshot().cursor.x).toBe(INPUT_X + FIELD_CAPACITY);
  });

  it('should ignore Alt-modified characters', () => {
    press(h.controller, { name: 'char', char: 'x', alt: true });
    expect(h.controller.snapshot().fields[0]).toBe('');
  });
});

// ---------------------------------------------------------------------------
// Field navigation
// ---------------------------------------------------------------------------

describe('field navigation', () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
    press(h.controller, ch('a'));
  });

  it('should not move before the first field', () => {
    press(h.controller, BACKTAB);
    expect(h.controller.snapshot().activeField).toBe(0);
    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X, y: fieldRow(0) });
  });

  it('should not move past the last field', () => {
    press(h.controller, TAB, TAB, TAB, TAB, TAB, TAB);
    expect(h.controller.snapshot().activeField).toBe(6);

    press(h.controller, TAB);
    expect(h.controller.snapshot().activeField).toBe(6);
    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X, y: fieldRow(6) });
  });

  it('should land at the start of an empty field', () => {
    type(h.controller, 'abc');
    press(h.controller, TAB);
    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X, y: fieldRow(1) });
    expect(h.canvas.cursor()).toEqual({ x: INPUT_X, y: fieldRow(1) });
  });

  it('should return to the end of the earlier field', () => {
    type(h.controller, 'abc');
    press(h.controller, TAB);
    type(h.controller, 'd');
    press(h.controller, BACKTAB);

    expect(h.controller.snapshot().cursor).toEqual({ x: INPUT_X + 3, y: fieldRow(0) });
    expect(h.canvas.cursor()).toEqual({ x: INPUT_X + 3, y: fieldRow(0) });

    type(h.controller, 'e');
    expect(h.controller.snapshot().fields.slice(0, 2)).toEqual(['abce', 'd']);
    expect(h.output.writes.at(-1)).toBe(cursorTo(INPUT_X + 3, fieldRow(0)) + 'e');
  });
});

// ---------------------------------------------------------------------------
// Submit and cancel
// ---------------------------------------------------------------------------

describe('submitting the form', () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
    press(h.controller, ch('a'));
  });

  it('should add the scaled food to the totals', () => {
    fill(h.controller, EGG_FORM);
    press(h.controller, ENTER);

    expect(h.accumulator.totals).toEqual({ calories: 140, carbs: 2, fat: 10, protein: 12 });
    expect(h.controller.snapshot().view).toBe('overview');
    expect(h.controller.lastSubmission).toEqual({
      success: true,
      value: {
        food: { name: 'Egg', calories: 70, carbs: 1, fat: 5, protein: 6, unit: 'each' },
        quantity: 2,
      },
    });
  });

  it('should redraw the overview with the new totals', () => {
    fill(h.controller, EGG_FORM);
    press(h.controller, ENTER);

    const frame = h.output.writes.at(-1) ?? '';
    expect(frame.startsWith(HIDE_CURSOR)).toBe(true);
    expect(frame).toContain(cyan('Calories: 140 Protein: 12 Carbs: 2 Fat: 10'));
  });

  it('should discard a non-numeric quantity', () => {
    fill(h.controller, ['Egg', '70', '6', '1', '5', 'each', 'two']);
    press(h.controller, ENTER);

    expect(h.accumulator.totals).toEqual({ calories: 0, carbs: 0, fat: 0, protein: 0 });
    expect(h.controller.snapshot().view).toBe('overview');
    expect(h.controller.lastSubmission).toEqual({
      success: false,
      error: 'quantity: not a number',
    });
  });

  it('should discard an empty form', () => {
    press(h.controller, ENTER);
    expect(h.accumulator.totals.calories).toBe(0);
    expect(h.controller.lastSubmission?.success).toBe(false);
  });

  it('should clear the form for the next entry', () => {
    fill(h.controller, EGG_FORM);
    press(h.controller, ENTER, ch('a'));

    expect(h.controller.snapshot().fields).toEqual(['', '', '', '', '', '', '']);
    expect(h.controller.snapshot().activeField).toBe(0);
  });
});

describe('cancelling the form', () => {
  it('should return to the overview without committing', () => {
    const h = setup();
    press(h.controller, ch('a'));
    fill(h.controller, EGG_FORM);
    press(h.controller, ESCAPE);

    expect(h.controller.snapshot().view).toBe('overview');
    expect(h.accumulator.totals.calories).toBe(0);
    expect(h.controller.lastSubmission).toBeUndefined();
  });

  it('should discard the typed text', () => {
    const h = setup();
    press(h.controller, ch('a'));
    type(h.controller, 'Egg');
    press(h.controller, ESCAPE, ch('a'));

    expect(h.controller.snapshot().fields[0]).toBe('');
  });

  it('should keep the typed text with retainInput', () => {
    const h = setup({ retainInput: true });
    press(h.controller, ch('a'));
    type(h.controller, 'Egg');
    press(h.controller, TAB);
    type(h.controller, '70');
    press(h.controller, ESCAPE, ch('a'));

    const snapshot = h.controller.snapshot();
    expect(snapshot.fields.slice(0, 2)).toEqual(['Egg', '70']);
    expect(snapshot.activeField).toBe(0);
    expect(snapshot.cursor).toEqual({ x: INPUT_X + 3, y: fieldRow(0) });
    expect(h.output.writes.at(-1)).toContain(cursorTo(INPUT_X, fieldRow(1)) + '70');
  });
});

// ---------------------------------------------------------------------------
// Resize
// ---------------------------------------------------------------------------

describe('resize', () => {
  it('should redraw the overview at the new size', () => {
    const h = setup();
    h.controller.resize(100, 30);

    expect(h.canvas.size()).toEqual({ columns: 100, rows: 30 });
    // Help line moves to rows - 2
    expect(h.output.writes.at(-1)).toContain(cursorTo(1, 28) + 'q Quit');
    expect(h.controller.snapshot().view).toBe('overview');
  });

  it('should redraw the form and keep its state', () => {
    const h = setup();
    press(h.controller, ch('a'));
    type(h.controller, 'Egg');
    press(h.controller, TAB);
    type(h.controller, '7');

    h.controller.resize(100, 30);

    // Block origin moves to (20, 4): inputs start at column 32
    const snapshot = h.controller.snapshot();
    expect(snapshot.view).toBe('form');
    expect(snapshot.activeField).toBe(1);
    expect(snapshot.fields.slice(0, 2)).toEqual(['Egg', '7']);
    expect(snapshot.cursor).toEqual({ x: 33, y: 7 });
    expect(h.canvas.cursor()).toEqual({ x: 33, y: 7 });
    expect(h.output.writes.at(-1)).toContain(cursorTo(32, 4) + 'Egg');
  });
});
