/**
 * Pantry line parsing
 *
 * Turns free-text inventory lines such as "flour, 2 lb", "2 cups rice" or
 * "1 (14 ounce) can diced tomatoes" into structured quantities.
 */

import { normalizeIngredientName, normalizeUnitName } from './ingredients.js';

export interface ParsedQuantityLine {
  quantity: number | null;
  unit: string | null;
  name: string;
  raw: string;
}

const QTY_PATTERN = /^(\d+(?:\.\d+)?(?:\s*[-/]\s*\d+(?:\.\d+)?)?(?:\s+\d+\/\d+)?)\s*/;
const UNIT_PATTERN = /^(cups?|tablespoons?|tbsps?|teaspoons?|tsps?|fl\.? oz|fluid ounces?|ounces?|oz|pounds?|lbs?|grams?|g|kilograms?|kg|milliliters?|ml|liters?|l|cloves?|stalks?|heads?|bunch(?:es)?|pieces?|pcs?|slices?|whole|pinch|dash|sprigs?|leaves|cans?|bottles?|packages?|bags?|boxes|jars?)\b\.?\s*/i;
const PAREN_PATTERN = /^\((\d+(?:\.\d+)?(?:\s*[-/]\s*\d+)?)\s*([a-z. ]+?)\)\s*/i;
const CONTAINER_PATTERN = /^(cans?|bottles?|packages?|bags?|boxes|jars?)\s+/i;

/**
 * Parse quantity string like "1", "1/2", "1 1/2", "1-2", "0.5"
 */
export function parseQuantity(str: string): number {
  const trimmed = str.trim();

  // Handle range: "1-2" -> take average
  if (trimmed.includes('-') && !trimmed.includes('/')) {
    const [low, high] = trimmed.split('-').map(s => parseQuantity(s));
    return (low + high) / 2;
  }

  // Handle mixed number: "1 1/2"
  const mixedMatch = trimmed.match(/^(\d+)\s+(\d+)\/(\d+)$/);
  if (mixedMatch) {
    return parseInt(mixedMatch[1], 10) + parseInt(mixedMatch[2], 10) / parseInt(mixedMatch[3], 10);
  }

  // Handle fraction: "1/2"
  const fracMatch = trimmed.match(/^(\d+)\/(\d+)$/);
  if (fracMatch) {
    return parseInt(fracMatch[1], 10) / parseInt(fracMatch[2], 10);
  }

  return parseFloat(trimmed) || 0;
}

/**
 * Parse the "2 cups rice" shape: quantity, optional unit, then the name
 */
function parseLeadingQuantity(str: string, raw: string): ParsedQuantityLine {
  let rest = str;
  let quantity: number | null = null;

  const qtyMatch = rest.match(QTY_PATTERN);
  if (qtyMatch) {
    quantity = parseQuantity(qtyMatch[1]);
    rest = rest.slice(qtyMatch[0].length);
  }

  let unit: string | null = null;

  // "(14 ounce) can diced tomatoes" -> 14 oz
  const parenMatch = rest.match(PAREN_PATTERN);
  if (parenMatch) {
    const parenQty = parseQuantity(parenMatch[1]);
    unit = normalizeUnitName(parenMatch[2]);
    rest = rest.slice(parenMatch[0].length);

    const containerMatch = rest.match(CONTAINER_PATTERN);
    if (containerMatch) {
      rest = rest.slice(containerMatch[0].length);
    }
    quantity = (quantity ?? 1) * parenQty;
  } else {
    const unitMatch = rest.match(UNIT_PATTERN);
    if (unitMatch) {
      unit = normalizeUnitName(unitMatch[1]);
      rest = rest.slice(unitMatch[0].length);
    }
  }

  return {
    quantity,
    unit,
    name: normalizeIngredientName(rest.replace(/^of\s+/i, '')),
    raw,
  };
}

/**
 * Parse an inventory line. Both "flour, 2 lb" and "2 lb flour" are accepted;
 * a line without a number keeps a null quantity.
 */
export function parseQuantityLine(line: string): ParsedQuantityLine {
  const raw = line.trim();

  if (/^\d/.test(raw)) {
    // Anything after a comma is a preparation note: "2 cups rice, rinsed"
    const commaIdx = raw.indexOf(',');
    return parseLeadingQuantity(commaIdx > 0 ? raw.slice(0, commaIdx).trim() : raw, raw);
  }

  const commaIdx = raw.indexOf(',');
  if (commaIdx > 0) {
    const name = raw.slice(0, commaIdx).trim();
    const amount = parseLeadingQuantity(raw.slice(commaIdx + 1).trim(), raw);
    return { quantity: amount.quantity, unit: amount.unit, name: normalizeIngredientName(name), raw };
  }

  return { quantity: null, unit: null, name: normalizeIngredientName(raw), raw };
}
