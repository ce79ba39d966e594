/**
 * Shopping List Aggregator
 *
 * Consolidates the week's requirements per canonical ingredient, converts them
 * to the unit the ingredient is bought in, and diffs against the pantry.
 */

import type {
  Degradation,
  Ingredient,
  IngredientCategory,
  PriceBook,
  Recipe,
  ReferencePrice,
  ShoppingListItem,
  ShoppingListResult,
} from '../types.js';
import { detectCategory, fromMeasure, roundMoney, roundQuantity, toMeasure } from './ingredients.js';
import type { PantryLedger } from './pantryLedger.js';
import { resolvePrice } from './priceBook.js';

/**
 * Smallest purchasable amount per unit. Category entries override the
 * defaults; units with no entry are bought as-is.
 */
export interface RoundingPolicy {
  defaults: Record<string, number>;
  categories?: Partial<Record<IngredientCategory, Record<string, number>>>;
}

export const DEFAULT_ROUNDING_POLICY: RoundingPolicy = {
  defaults: {
    pcs: 1,
    can: 1,
    clove: 1,
    head: 1,
    bunch: 1,
    stalk: 1,
    slice: 1,
    bottle: 1,
    package: 1,
    bag: 1,
    box: 1,
    jar: 1,
  },
  categories: {
    produce: { lb: 0.25 },
    protein: { lb: 0.25 },
  },
};

export interface AggregateOptions {
  householdServings: number;
  priceBook?: PriceBook;
  rounding?: RoundingPolicy;
}

interface RequirementGroup {
  key: string;
  name: string;
  storageUnit: string;
  amount: number;
  ingredients: Ingredient[];
  recipeIds: string[];
}

function incrementFor(policy: RoundingPolicy, category: IngredientCategory, unit: string): number | undefined {
  return policy.categories?.[category]?.[unit] ?? policy.defaults[unit];
}

export function roundUpTo(value: number, increment: number): number {
  // Trim float noise first so 2.0000000001 cans stays 2
  return roundQuantity(Math.ceil(roundQuantity(value / increment)) * increment);
}

function groupRequirements(recipes: readonly Recipe[], householdServings: number): RequirementGroup[] {
  const groups = new Map<string, RequirementGroup>();

  for (const recipe of recipes) {
    const scale = householdServings / recipe.servings;
    for (const { ingredient, quantity } of recipe.requirements) {
      const measure = toMeasure(ingredient.name, quantity * scale, ingredient.unit);
      const group = groups.get(measure.key);
      if (group) {
        group.amount += measure.amount;
        group.ingredients.push(ingredient);
        if (!group.recipeIds.includes(recipe.id)) group.recipeIds.push(recipe.id);
      } else {
        groups.set(measure.key, {
          key: measure.key,
          name: measure.name,
          storageUnit: measure.storageUnit,
          amount: measure.amount,
          ingredients: [ingredient],
          recipeIds: [recipe.id],
        });
      }
    }
  }

  return [...groups.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * Price that applies to a group, if it is quoted in a unit the group converts to
 */
function priceForGroup(group: RequirementGroup, priceBook: PriceBook): ReferencePrice | null {
  const withPrice = group.ingredients.find(ing => ing.unitPrice !== undefined) ?? group.ingredients[0];
  const price = resolvePrice(withPrice, priceBook);
  if (!price) return null;
  return fromMeasure(group, price.unit) === null ? null : price;
}

export function aggregate(
  recipes: readonly Recipe[],
  pantry: PantryLedger,
  options: AggregateOptions,
): ShoppingListResult {
  const { householdServings, priceBook = new Map<string, ReferencePrice>(), rounding = DEFAULT_ROUNDING_POLICY } = options;

  const groups = groupRequirements(recipes, householdServings);
  const lines: Array<{ key: string; item: ShoppingListItem }> = [];
  const rounded = new Map<string, Degradation>();
  const unitsByName = new Map<string, string[]>();

  for (const group of groups) {
    const first = group.ingredients[0];
    const category = first.category ?? detectCategory(group.name);
    const price = priceForGroup(group, priceBook);

    // Bought in the price's unit, else in the unit the first recipe used
    let unit = price ? price.unit : first.unit;
    let required = fromMeasure(group, unit);
    if (required === null) {
      unit = group.storageUnit;
      required = group.amount;
    }
    unitsByName.set(group.name, [...(unitsByName.get(group.name) ?? []), unit]);

    const totalRequired = roundQuantity(required);
    const onHand = roundQuantity(fromMeasure({ ...group, amount: pantry.amountFor(group.key) }, unit) ?? 0);
    const shortfall = roundQuantity(Math.max(0, totalRequired - onHand));
    if (shortfall <= 0) continue;

    // Only what is bought gets rounded; the pantry covers the rest exactly
    let deficit = shortfall;
    const increment = incrementFor(rounding, category, unit);
    if (increment !== undefined && increment > 0) {
      deficit = roundUpTo(shortfall, increment);
      if (deficit !== shortfall) {
        rounded.set(group.key, {
          code: 'PURCHASE_ROUNDED',
          message: `${group.name}: ${shortfall} ${unit} rounded up to ${deficit} ${unit}`,
          ingredient: group.name,
          from: shortfall,
          to: deficit,
          unit,
        });
      }
    }

    lines.push({ key: group.key, item: {
      ingredient: group.name,
      category,
      unit,
      totalRequired,
      onHand,
      deficit,
      unitPrice: price ? price.unitPrice : null,
      estimatedCost: price ? roundMoney(deficit * price.unitPrice) : 0,
      recipeIds: group.recipeIds,
    } });
  }

  lines.sort(({ item: a }, { item: b }) => {
    if (a.estimatedCost !== b.estimatedCost) return b.estimatedCost - a.estimatedCost;
    if (a.ingredient !== b.ingredient) return a.ingredient < b.ingredient ? -1 : 1;
    return a.unit < b.unit ? -1 : a.unit > b.unit ? 1 : 0;
  });

  const items = lines.map(line => line.item);
  const degradations: Degradation[] = [];
  for (const { key, item } of lines) {
    const note = rounded.get(key);
    if (note) degradations.push(note);
    if (item.unitPrice === null) {
      degradations.push({
        code: 'UNPRICED_INGREDIENT',
        message: `No reference price for ${item.ingredient}; counted as 0`,
        ingredient: item.ingredient,
      });
    }
  }

  for (const [name, units] of [...unitsByName.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (units.length > 1) {
      degradations.push({
        code: 'UNRECONCILED_UNITS',
        message: `${name} is needed in units that cannot be combined (${units.join(', ')}); listed separately`,
        ingredient: name,
        units,
      });
    }
  }

  return {
    items,
    totalCost: roundMoney(items.reduce((sum, item) => sum + item.estimatedCost, 0)),
    degradations,
  };
}
