/**
 * View Controller
 *
 * Owns every piece of screen state: which view is up, which form field is
 * active, what has been typed, and the canvas it all draws on. Keystrokes
 * come in through `handleKey`, which runs a transition to completion,
 * including its terminal writes, before returning.
 *
 *   overview ──a──▶ form ──Enter/Esc──▶ overview
 *      │
 *      q──▶ quit
 *
 * The form cursor is never moved by relative steps. Its position is
 * recomputed from the active field's slot and the buffered text length on
 * every change, so switching fields can't leave it drifting.
 */

import type { Canvas, Point } from '../terminal/canvas.js';
import { bold, cyan, dim } from '../terminal/ansi.js';
import { isPrintable } from '../terminal/keys.js';
import type { FoodQuantity, FoodRecord, Key, ParseResult } from '../shared/types.js';
import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import type { MacroAccumulator } from '../macros/accumulator.js';
import { formatTotals } from '../macros/accumulator.js';
import { FIELD_COUNT, FORM_FIELDS, FormBuffer, parseSubmission } from './form.js';
import {
  FIELD_CAPACITY,
  borderRect,
  centerRow,
  centeredX,
  formSlots,
  helpPositions,
  type FieldSlot,
} from './layout.js';

export type ViewState = 'overview' | 'form';

export type KeyOutcome = 'continue' | 'quit';

export const OVERVIEW_HELP = ['q Quit', 'a Add Food'] as const;
export const FORM_HELP = ['Tab Next', 'S-Tab Prev', 'Ret Submit', 'Esc Cancel'] as const;

export interface ControllerOptions {
  /** Keep typed text when the form closes (default: false) */
  retainInput?: boolean;
  logger?: Logger;
}

export interface ControllerSnapshot {
  view: ViewState;
  activeField: number;
  fields: string[];
  /** Where the form cursor belongs; only meaningful in the form view */
  cursor: Point;
}

export class FoodLogController {
  private view: ViewState = 'overview';
  private activeField = 0;
  private readonly form = new FormBuffer();
  private slots: FieldSlot[];
  private submission: ParseResult<FoodQuantity> | undefined;
  private readonly retainInput: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly canvas: Canvas,
    private readonly catalog: readonly FoodRecord[],
    private readonly accumulator: MacroAccumulator,
    options: ControllerOptions = {}
  ) {
    this.retainInput = options.retainInput ?? false;
    this.logger = options.logger ?? silentLogger;
    this.slots = formSlots(FIELD_COUNT, canvas.size());
  }

  /** Result of the most recent Enter in the form, with the reason if it failed. */
  get lastSubmission(): ParseResult<FoodQuantity> | undefined {
    return this.submission;
  }

  snapshot(): ControllerSnapshot {
    return {
      view: this.view,
      activeField: this.activeField,
      fields: FORM_FIELDS.map((_, i) => this.form.value(i)),
      cursor: this.fieldCursor(this.activeField),
    };
  }

  /** Whether the current view does anything with this key. */
  accepts(key: Key): boolean {
    if (this.view === 'overview') {
      return key.name === 'char' && !key.alt && (key.char === 'q' || key.char === 'a');
    }
    switch (key.name) {
      case 'char':
        return !key.alt;
      case 'tab':
      case 'backtab':
      case 'backspace':
      case 'enter':
      case 'escape':
        return true;
      default:
        return false;
    }
  }

  handleKey(key: Key): KeyOutcome {
    if (this.view === 'overview') {
      if (isPrintable(key) && key.char === 'q') return 'quit';
      if (isPrintable(key) && key.char === 'a') this.openForm();
      return 'continue';
    }

    switch (key.name) {
      case 'char':
        if (isPrintable(key)) this.typeChar(key.char);
        break;
      case 'backspace':
        this.eraseChar();
        break;
      case 'tab':
        this.focusField(this.activeField + 1);
        break;
      case 'backtab':
        this.focusField(this.activeField - 1);
        break;
      case 'enter':
        this.submit();
        break;
      case 'escape':
        this.cancel();
        break;
      default:
        break;
    }
    return 'continue';
  }

  /** New terminal size: recompute layout and redraw whichever view is up. */
  resize(columns: number, rows: number): void {
    this.canvas.resize(columns, rows);
    this.slots = formSlots(FIELD_COUNT, this.canvas.size());
    if (this.view === 'form') {
      this.drawForm();
    } else {
      this.renderOverview();
    }
  }

  // -------------------------------------------------------------------------
  // Overview
  // -------------------------------------------------------------------------

  renderOverview(): void {
    this.view = 'overview';
    this.canvas.hideCursor().clear();
    this.drawFrame(OVERVIEW_HELP);
    this.drawTotals();
    this.canvas.flush();
  }

  private drawTotals(): void {
    const size = this.canvas.size();
    const line = formatTotals(this.accumulator.totals);
    const x = centeredX(line, size);
    const y = centerRow(size);

    this.canvas.moveTo(x, y).writeText(bold('Today:'));
    this.canvas.moveTo(x, y + 1).writeText(cyan(line));
    const count = this.catalog.length;
    this.canvas.moveTo(x, y + 2).writeText(dim(`${count} ${count === 1 ? 'food' : 'foods'} in catalog`));
  }

  // -------------------------------------------------------------------------
  // Form
  // -------------------------------------------------------------------------

  private openForm(): void {
    this.view = 'form';
    this.activeField = 0;
    this.submission = undefined;
    if (!this.retainInput) {
      this.form.clear();
    }
    this.drawForm();
  }

  private drawForm(): void {
    this.canvas.clear();
    this.drawFrame(FORM_HELP);

    FORM_FIELDS.forEach(({ label }, i) => {
      const slot = this.slotFor(i);
      this.canvas.moveTo(slot.label.x, slot.label.y).writeText(label);
      const { x1, y1, x2, y2 } = slot.box;
      this.canvas.drawRect(x1, y1, x2, y2);
      const text = this.form.value(i);
      if (text.length > 0) {
        this.canvas.moveTo(slot.input.x, slot.input.y).writeText(text);
      }
    });

    this.placeCursor();
    this.canvas.showCursor().flush();
  }

  private typeChar(char: string): void {
    if (this.form.length(this.activeField) >= FIELD_CAPACITY) return;
    this.placeCursor();
    this.form.append(this.activeField, char);
    this.canvas.writeText(char);
    this.canvas.flush();
  }

  private eraseChar(): void {
    if (!this.form.removeLast(this.activeField)) return;
    // The ledger now points at the cell that held the removed character
    const { x, y } = this.fieldCursor(this.activeField);
    this.canvas.moveTo(x, y).writeText(' ');
    this.canvas.moveTo(x, y);
    this.canvas.flush();
  }

  /** Move to `field` if it exists. Never wraps past either end. */
  private focusField(field: number): void {
    if (field < 0 || field >= FIELD_COUNT) return;
    this.activeField = field;
    this.placeCursor();
    this.canvas.flush();
  }

  private submit(): void {
    const result = parseSubmission(this.form.values());
    this.submission = result;

    if (result.success) {
      const { food, quantity } = result.value;
      this.accumulator.addScaled(food, quantity);
      this.logger.info('food logged', { name: food.name, unit: food.unit, quantity });
    } else {
      this.logger.debug('submission discarded', { reason: result.error });
    }

    this.closeForm();
  }

  private cancel(): void {
    this.logger.debug('form cancelled');
    this.closeForm();
  }

  private closeForm(): void {
    if (!this.retainInput) {
      this.form.clear();
    }
    this.activeField = 0;
    this.renderOverview();
  }

  // -------------------------------------------------------------------------
  // Shared drawing and cursor ledger
  // -------------------------------------------------------------------------

  private drawFrame(help: readonly string[]): void {
    const size = this.canvas.size();
    const { x1, y1, x2, y2 } = borderRect(size);
    this.canvas.drawRect(x1, y1, x2, y2);
    helpPositions(help, size).forEach(({ x, y }, i) => {
      this.canvas.moveTo(x, y).writeText(help[i]);
    });
  }

  private slotFor(field: number): FieldSlot {
    const slot = this.slots[field];
    if (slot === undefined) {
      throw new RangeError(`form field ${field} out of range [0, ${FIELD_COUNT})`);
    }
    return slot;
  }

  /** End of the buffered text in `field`: where the next character goes. */
  private fieldCursor(field: number): Point {
    const { input } = this.slotFor(field);
    return { x: input.x + this.form.length(field), y: input.y };
  }

  private placeCursor(): void {
    const { x, y } = this.fieldCursor(this.activeField);
    this.canvas.moveTo(x, y);
  }
}
