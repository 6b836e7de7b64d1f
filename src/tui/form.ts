/**
 * Food entry form
 *
 * Seven text fields in a fixed order. Lengths are counted in code points,
 * the same unit the canvas uses, so the cursor column for a field is
 * always `input.x + length(field)`.
 */

import { parseFoodRecord, parseQuantity } from '../catalog/record.js';
import type { FoodQuantity, ParseResult } from '../shared/types.js';

export const FORM_FIELDS = [
  { key: 'name', label: 'Food Name:' },
  { key: 'calories', label: ' Calories:' },
  { key: 'protein', label: '  Protein:' },
  { key: 'carbs', label: '    Carbs:' },
  { key: 'fat', label: '      Fat:' },
  { key: 'unit', label: '    Units:' },
  { key: 'quantity', label: ' Quantity:' },
] as const;

export type FieldKey = (typeof FORM_FIELDS)[number]['key'];

export const FIELD_COUNT = FORM_FIELDS.length;

export type FormValues = Record<FieldKey, string>;

export class FormBuffer {
  // Code points per field, so removal never splits a surrogate pair
  private fields: string[][] = FORM_FIELDS.map(() => []);

  value(field: number): string {
    return this.slot(field).join('');
  }

  length(field: number): number {
    return this.slot(field).length;
  }

  append(field: number, char: string): void {
    this.slot(field).push(char);
  }

  /** Remove the last character. False (and no change) when already empty. */
  removeLast(field: number): boolean {
    return this.slot(field).pop() !== undefined;
  }

  clear(): void {
    this.fields = FORM_FIELDS.map(() => []);
  }

  /** Every field's text, keyed by what the field means. */
  values(): FormValues {
    // Same order as FORM_FIELDS
    const [name, calories, protein, carbs, fat, unit, quantity] = FORM_FIELDS.map((_, i) =>
      this.value(i)
    );
    return { name, calories, protein, carbs, fat, unit, quantity };
  }

  private slot(field: number): string[] {
    const slot = this.fields[field];
    if (slot === undefined) {
      throw new RangeError(`form field ${field} out of range [0, ${FIELD_COUNT})`);
    }
    return slot;
  }
}

/**
 * Turn the form's text into a food and a quantity. Each nutrient is read
 * from the box labeled with it.
 */
export function parseSubmission(values: FormValues): ParseResult<FoodQuantity> {
  const food = parseFoodRecord({
    name: values.name,
    calories: values.calories,
    carbs: values.carbs,
    fat: values.fat,
    protein: values.protein,
    unit: values.unit,
  });
  const quantity = parseQuantity(values.quantity);

  const errors = [food, quantity].flatMap((r) => (r.success ? [] : [r.error]));
  if (!food.success || !quantity.success) {
    return { success: false, error: errors.join('; ') };
  }
  return { success: true, value: { food: food.value, quantity: quantity.value } };
}
