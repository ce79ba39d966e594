/**
 * Pantry Ledger
 *
 * Read-only view of what is on hand for one planning run. The ledger copies its
 * input on construction and exposes no writes; depleting the pantry after a week
 * is the inventory source's job between runs.
 */

import { readFileSync } from 'fs';
import { ConflictingPantryEntryError } from '../errors.js';
import { pantryFileSchema, parseOrThrow, type PantryItemInput } from '../schemas.js';
import type { Ingredient, Measure, PantryEntry } from '../types.js';
import { detectCategory, fromMeasure, normalizeIngredientName, normalizeUnitName, toMeasure } from './ingredients.js';
import { parseQuantityLine } from './quantityParser.js';

interface LedgerRow {
  entry: PantryEntry;
  measure: Measure;
}

export class PantryLedger {
  private readonly rows: ReadonlyMap<string, LedgerRow>;

  private constructor(rows: Map<string, LedgerRow>) {
    this.rows = rows;
  }

  /**
   * Build a ledger from raw entries. The same canonical ingredient twice
   * (e.g. "2 lb flour" and "500 g flour") or a bad quantity is rejected.
   */
  static fromEntries(entries: readonly PantryEntry[]): PantryLedger {
    const rows = new Map<string, LedgerRow>();

    for (const raw of entries) {
      const name = normalizeIngredientName(raw.ingredient.name);
      const unit = normalizeUnitName(raw.ingredient.unit);

      if (!Number.isFinite(raw.quantity) || raw.quantity < 0) {
        throw new ConflictingPantryEntryError(
          `Pantry quantity for "${name}" must be a non-negative number`,
          { ingredient: name, key: `${name}|${unit}`, reason: 'malformed' },
        );
      }

      const measure = toMeasure(name, raw.quantity, unit);
      if (rows.has(measure.key)) {
        throw new ConflictingPantryEntryError(
          `Pantry lists "${name}" more than once`,
          { ingredient: name, key: measure.key, reason: 'duplicate' },
        );
      }

      const ingredient: Ingredient = Object.freeze({
        name,
        unit,
        category: raw.ingredient.category ?? detectCategory(name),
        ...(raw.ingredient.unitPrice !== undefined && { unitPrice: raw.ingredient.unitPrice }),
      });
      rows.set(measure.key, {
        entry: Object.freeze({ ingredient, quantity: raw.quantity }),
        measure: Object.freeze(measure),
      });
    }

    return new PantryLedger(rows);
  }

  static empty(): PantryLedger {
    return new PantryLedger(new Map());
  }

  get size(): number {
    return this.rows.size;
  }

  /**
   * Quantity on hand in the ingredient's own unit; zero when unknown or
   * when the units cannot be reconciled.
   */
  quantityOf(ingredient: Pick<Ingredient, 'name' | 'unit'>): number {
    const wanted = toMeasure(ingredient.name, 0, ingredient.unit);
    const row = this.rows.get(wanted.key);
    if (!row) return 0;
    return fromMeasure(row.measure, ingredient.unit) ?? 0;
  }

  /**
   * Amount on hand in storage units (grams, millilitres or the count unit)
   */
  amountFor(key: string): number {
    return this.rows.get(key)?.measure.amount ?? 0;
  }

  /**
   * Entries ordered by canonical key
   */
  snapshot(): readonly PantryEntry[] {
    return Object.freeze(
      [...this.rows.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([, row]) => row.entry),
    );
  }
}

// ============================================================================
// Pantry source
// ============================================================================

/**
 * Convert boundary input (structured entries or free-text lines) to entries
 */
export function toPantryEntries(items: readonly PantryItemInput[]): PantryEntry[] {
  return items.map(item => {
    if (typeof item !== 'string') {
      const { quantity, ...ingredient } = item;
      return { ingredient, quantity };
    }

    const parsed = parseQuantityLine(item);
    if (parsed.quantity === null) {
      throw new ConflictingPantryEntryError(
        `Pantry line "${parsed.raw}" has no quantity`,
        { ingredient: parsed.name, key: parsed.name, reason: 'malformed' },
      );
    }
    return {
      ingredient: { name: parsed.name, unit: parsed.unit ?? 'pcs' },
      quantity: parsed.quantity,
    };
  });
}

export function loadPantryFromFile(filePath: string): PantryLedger {
  const items = parseOrThrow(pantryFileSchema, JSON.parse(readFileSync(filePath, 'utf-8')), `pantry file ${filePath}`);
  return PantryLedger.fromEntries(toPantryEntries(items));
}
