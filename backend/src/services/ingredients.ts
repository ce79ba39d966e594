/**
 * Canonical Ingredient Knowledge
 *
 * Normalized ingredient names, unit conversions and categorization.
 * This is the source of truth for ingredient matching across recipes, pantry and shopping list.
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { IngredientCategory, Measure } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const hintList = z.array(z.string().min(1));

const ingredientDataSchema = z.object({
  aliases: z.record(z.array(z.string())),
  densities: z.record(z.number().positive()),
  dietHints: z.object({
    meat: hintList,
    fish: hintList,
    nuts: hintList,
    gluten: hintList,
    dairy: hintList,
    animal: hintList,
  }),
  // Names that contain a hint word without belonging to the group, e.g. "almond milk"
  dietHintExceptions: z.record(hintList).default({}),
});

type IngredientData = z.infer<typeof ingredientDataSchema>;

export type DietHint = keyof IngredientData['dietHints'];

function loadIngredientData(): IngredientData {
  // Source tree and dist/ both resolve to backend/data
  const possiblePaths = [
    join(__dirname, '../../data/ingredients.json'),
    join(__dirname, '../../../../backend/data/ingredients.json'),
  ];

  for (const filePath of possiblePaths) {
    if (existsSync(filePath)) {
      return ingredientDataSchema.parse(JSON.parse(readFileSync(filePath, 'utf-8')));
    }
  }

  throw new Error(`Ingredient data not found (looked in ${possiblePaths.join(', ')})`);
}

const data = loadIngredientData();

const aliasIndex = new Map<string, string>();
for (const [canonical, aliases] of Object.entries(data.aliases)) {
  aliasIndex.set(canonical, canonical);
  for (const alias of aliases) {
    aliasIndex.set(alias, canonical);
  }
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Normalize an ingredient name to its canonical form
 */
export function normalizeIngredientName(name: string): string {
  let normalized = name.toLowerCase().trim().replace(/\s+/g, ' ');

  // Remove common preparation words at the end
  normalized = normalized
    .replace(/,?\s*(chopped|diced|minced|sliced|shredded|grated|crushed|cooked|packed|firmly packed|loosely packed)\s*$/gi, '')
    .replace(/,?\s*(to taste|for garnish|optional|as needed|divided|or more|or less)\s*$/gi, '')
    .trim();

  return aliasIndex.get(normalized) ?? normalized;
}

/**
 * Normalize unit names to standard forms
 */
export function normalizeUnitName(unit: string): string {
  const lower = unit.toLowerCase().trim().replace(/\.$/, '');

  const mappings: Record<string, string> = {
    'cup': 'cup', 'cups': 'cup', 'c': 'cup',
    'tablespoon': 'tbsp', 'tablespoons': 'tbsp', 'tbsp': 'tbsp', 'tbsps': 'tbsp', 'tbs': 'tbsp',
    'teaspoon': 'tsp', 'teaspoons': 'tsp', 'tsp': 'tsp', 'tsps': 'tsp',
    'fluid ounce': 'fl oz', 'fluid ounces': 'fl oz', 'fl oz': 'fl oz', 'fl. oz': 'fl oz',
    'ounce': 'oz', 'ounces': 'oz', 'oz': 'oz',
    'pound': 'lb', 'pounds': 'lb', 'lb': 'lb', 'lbs': 'lb',
    'gram': 'g', 'grams': 'g', 'g': 'g',
    'kilogram': 'kg', 'kilograms': 'kg', 'kg': 'kg',
    'milliliter': 'ml', 'milliliters': 'ml', 'millilitre': 'ml', 'millilitres': 'ml', 'ml': 'ml',
    'liter': 'l', 'liters': 'l', 'litre': 'l', 'litres': 'l', 'l': 'l',
    'clove': 'clove', 'cloves': 'clove',
    'stalk': 'stalk', 'stalks': 'stalk',
    'head': 'head', 'heads': 'head',
    'bunch': 'bunch', 'bunches': 'bunch',
    'piece': 'pcs', 'pieces': 'pcs', 'pc': 'pcs', 'pcs': 'pcs', 'whole': 'pcs', 'each': 'pcs', '': 'pcs',
    'slice': 'slice', 'slices': 'slice',
    'can': 'can', 'cans': 'can',
    'bottle': 'bottle', 'bottles': 'bottle',
    'package': 'package', 'packages': 'package',
    'bag': 'bag', 'bags': 'bag',
    'box': 'box', 'boxes': 'box',
    'jar': 'jar', 'jars': 'jar',
    'sprig': 'sprig', 'sprigs': 'sprig',
    'leaf': 'leaf', 'leaves': 'leaf',
    'pinch': 'pinch', 'dash': 'dash',
  };

  return mappings[lower] ?? lower;
}

// ============================================================================
// Unit Conversions
// ============================================================================

const POUND_IN_GRAMS = 453.59237;
const ML_PER_CUP = 240;

/** Weight units in grams */
const massUnits: Record<string, number> = {
  'g': 1,
  'kg': 1000,
  'lb': POUND_IN_GRAMS,
  'oz': POUND_IN_GRAMS / 16,
};

/** Volume units in millilitres */
const volumeUnits: Record<string, number> = {
  'ml': 1,
  'l': 1000,
  'tsp': 5,
  'tbsp': 15,
  'fl oz': 30,
  'cup': ML_PER_CUP,
};

/**
 * Grams in one cup of the ingredient, when its density is known
 */
export function gramsPerCup(canonicalName: string): number | undefined {
  return data.densities[canonicalName];
}

/**
 * Storage unit and multiplier for a (canonical name, unit) pair.
 *
 * Volume of an ingredient with a known density is stored as grams so that
 * "2 cups rice" and "370 g rice" land on the same ledger key.
 */
function resolveUnit(canonicalName: string, unit: string): { storageUnit: string; factor: number } {
  const normalizedUnit = normalizeUnitName(unit);

  const grams = massUnits[normalizedUnit];
  if (grams !== undefined) {
    return { storageUnit: 'g', factor: grams };
  }

  const ml = volumeUnits[normalizedUnit];
  if (ml !== undefined) {
    const density = gramsPerCup(canonicalName);
    if (density !== undefined) {
      return { storageUnit: 'g', factor: (ml / ML_PER_CUP) * density };
    }
    return { storageUnit: 'ml', factor: ml };
  }

  return { storageUnit: normalizedUnit, factor: 1 };
}

/**
 * Convert a quantity of an ingredient into its storage-unit measure
 */
export function toMeasure(name: string, quantity: number, unit: string): Measure {
  const canonicalName = normalizeIngredientName(name);
  const { storageUnit, factor } = resolveUnit(canonicalName, unit);
  return {
    key: `${canonicalName}|${storageUnit}`,
    name: canonicalName,
    storageUnit,
    amount: quantity * factor,
  };
}

/**
 * Express a stored amount in another unit. Returns null when the target
 * unit does not share the measure's storage unit.
 */
export function fromMeasure(measure: Pick<Measure, 'name' | 'storageUnit' | 'amount'>, targetUnit: string): number | null {
  const { storageUnit, factor } = resolveUnit(measure.name, targetUnit);
  if (storageUnit !== measure.storageUnit) return null;
  return measure.amount / factor;
}

/** Trim float noise from reported quantities */
export function roundQuantity(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============================================================================
// Category Detection
// ============================================================================

export function detectCategory(name: string): IngredientCategory {
  const lower = normalizeIngredientName(name);

  // Salt & pepper before produce, which also matches "pepper"
  if (/^salt$|^black pepper$|^white pepper$/.test(lower)) {
    return 'spice';
  }

  // Proteins
  if (/chicken|beef|pork|lamb|fish|salmon|tuna|cod|shrimp|prawn|turkey|duck|bacon|sausage|ham|steak|ground|meatball|tofu|tempeh|seitan/.test(lower)) {
    return 'protein';
  }

  // Dairy
  if (/milk|cream|cheese|butter|yogurt|eggs?$|egg yolks|egg whites|half-and-half|buttermilk/.test(lower)) {
    return 'dairy';
  }

  // Canned goods
  if (/^canned|tomato sauce|tomato paste|broth|stock|coconut milk/.test(lower)) {
    return 'canned';
  }

  // Frozen
  if (/^frozen/.test(lower)) {
    return 'frozen';
  }

  // Produce
  if (/onion|garlic|tomato|potato|carrot|celery|pepper|broccoli|spinach|lettuce|cabbage|zucchini|squash|cucumber|mushroom|asparagus|corn|peas|eggplant|cauliflower|kale|chard|apple|banana|orange|lemon|lime|berry|grape|mango|pineapple|peach|pear|cherry|melon|avocado|ginger|jalapeño|scallion|vegetables/.test(lower)) {
    return 'produce';
  }

  // Fresh herbs (produce)
  if (/^fresh\s|parsley|cilantro|basil|thyme|rosemary|dill|mint|chives/.test(lower)) {
    return 'produce';
  }

  // Grains
  if (/flour|rice|pasta|noodle|bread|oat|cereal|quinoa|couscous|barley|lentil|spaghetti|penne|fusilli|macaroni|fettuccine|linguine|tortilla/.test(lower)) {
    return 'grains';
  }

  // Baking
  if (/sugar|baking powder|baking soda|yeast|vanilla|cocoa|chocolate chip|cornstarch/.test(lower)) {
    return 'baking';
  }

  // Spices (dried)
  if (/cumin|paprika|cinnamon|oregano|cayenne|chili powder|curry|turmeric|nutmeg|allspice|cardamom|coriander|dried|powder/.test(lower)) {
    return 'spice';
  }

  // Condiments
  if (/sauce|ketchup|mustard|mayo|vinegar|oil|dressing|syrup|honey|hot sauce|sriracha|salsa|pesto/.test(lower)) {
    return 'condiment';
  }

  // Beverages
  if (/juice|wine|beer|coffee|tea(?!spoon)/.test(lower)) {
    return 'beverage';
  }

  return 'other';
}

// ============================================================================
// Diet Hints
// ============================================================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Whole words only, optionally plural: "egg" matches "eggs" but not "eggplant"
function wordPattern(words: readonly string[], flags = ''): RegExp | null {
  if (words.length === 0) return null;
  return new RegExp(`\\b(?:${words.map(escapeRegExp).join('|')})(?:e?s)?\\b`, flags);
}

const hintPatterns = new Map<DietHint, { hint: RegExp | null; exceptions: RegExp | null }>();

function patternsFor(hint: DietHint): { hint: RegExp | null; exceptions: RegExp | null } {
  let patterns = hintPatterns.get(hint);
  if (!patterns) {
    patterns = {
      hint: wordPattern(data.dietHints[hint]),
      exceptions: wordPattern(data.dietHintExceptions[hint] ?? [], 'g'),
    };
    hintPatterns.set(hint, patterns);
  }
  return patterns;
}

/**
 * Whether a canonical ingredient name belongs to a hint group,
 * e.g. "chicken thighs" → meat, "pine nuts" → nuts, but "peanut butter" is not dairy
 */
export function matchesDietHint(name: string, hint: DietHint): boolean {
  const { hint: pattern, exceptions } = patternsFor(hint);
  if (!pattern) return false;

  const lower = normalizeIngredientName(name);
  const remaining = exceptions ? lower.replace(exceptions, ' ') : lower;
  return pattern.test(remaining);
}
