/**
 * Macro Accumulator
 *
 * Running totals for the session. The only way in is `addScaled`; there is
 * no removal, so every total only grows.
 */

import type { FoodRecord, MacroTotals } from '../shared/types.js';

export function emptyTotals(): MacroTotals {
  return { calories: 0, carbs: 0, fat: 0, protein: 0 };
}

/** Multiply the four nutrients by `quantity`; name and unit are kept. */
export function scaleRecord(record: FoodRecord, quantity: number): FoodRecord {
  return {
    ...record,
    calories: record.calories * quantity,
    carbs: record.carbs * quantity,
    fat: record.fat * quantity,
    protein: record.protein * quantity,
  };
}

export function formatTotals(totals: MacroTotals): string {
  return (
    `Calories: ${totals.calories.toFixed(0)} ` +
    `Protein: ${totals.protein.toFixed(0)} ` +
    `Carbs: ${totals.carbs.toFixed(0)} ` +
    `Fat: ${totals.fat.toFixed(0)}`
  );
}

export class MacroAccumulator {
  private readonly current: MacroTotals = emptyTotals();

  /** Snapshot of the current totals. */
  get totals(): Readonly<MacroTotals> {
    return { ...this.current };
  }

  /**
   * Add `record` scaled by `quantity`.
   * @throws RangeError for a negative or non-finite quantity
   */
  addScaled(record: FoodRecord, quantity: number): void {
    if (!Number.isFinite(quantity) || quantity < 0) {
      throw new RangeError(`quantity must be a non-negative number, got ${quantity}`);
    }
    const scaled = scaleRecord(record, quantity);
    this.current.calories += scaled.calories;
    this.current.carbs += scaled.carbs;
    this.current.fat += scaled.fat;
    this.current.protein += scaled.protein;
  }
}
