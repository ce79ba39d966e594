/**
 * Reference prices
 *
 * Maps canonical ingredient names to the price of one purchase unit.
 */

import { readFileSync } from 'fs';
import { parseOrThrow, priceBookFileSchema } from '../schemas.js';
import type { Ingredient, Measure, PriceBook, ReferencePrice } from '../types.js';
import { fromMeasure, normalizeIngredientName, normalizeUnitName } from './ingredients.js';

export function createPriceBook(entries: Record<string, ReferencePrice>): PriceBook {
  const book = new Map<string, ReferencePrice>();
  for (const [name, price] of Object.entries(entries)) {
    book.set(
      normalizeIngredientName(name),
      Object.freeze({ unit: normalizeUnitName(price.unit), unitPrice: price.unitPrice }),
    );
  }
  return book;
}

export function loadPriceBook(filePath: string): PriceBook {
  const entries = parseOrThrow(priceBookFileSchema, JSON.parse(readFileSync(filePath, 'utf-8')), `price book ${filePath}`);
  const book = createPriceBook(entries);
  console.log(`[Prices] Loaded ${book.size} reference prices`);
  return book;
}

/**
 * Price book entry first, then the ingredient's own unit price
 */
export function resolvePrice(ingredient: Ingredient, priceBook: PriceBook): ReferencePrice | null {
  const listed = priceBook.get(normalizeIngredientName(ingredient.name));
  if (listed) return listed;
  if (ingredient.unitPrice !== undefined) {
    return { unit: normalizeUnitName(ingredient.unit), unitPrice: ingredient.unitPrice };
  }
  return null;
}

/**
 * Cost of a stored amount, or null when it has no price or the price is
 * quoted in a unit the amount cannot be converted to
 */
export function costOf(measure: Measure, price: ReferencePrice | null): number | null {
  if (!price) return null;
  const quantity = fromMeasure(measure, price.unit);
  if (quantity === null) return null;
  return quantity * price.unitPrice;
}
