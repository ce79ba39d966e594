/**
 * Test builders. Every recipe defaults to two servings and every profile to a
 * two-person household, so requirement quantities are used as written.
 */

import type { PreferenceProfileInput } from '../schemas.js';
import { createPriceBook } from '../services/priceBook.js';
import { createPreferenceProfile } from '../services/preferenceProfile.js';
import { RecipeCatalog, toRecipe } from '../services/recipeCatalog.js';
import type { PreferenceProfile, PriceBook, Recipe } from '../types.js';

export type RequirementRow = [name: string, quantity: number, unit: string];

export interface RecipeFixtureOptions {
  title?: string;
  servings?: number;
  cuisine?: string | null;
  dietaryFlags?: string[];
  prepTimeMinutes?: number | null;
  tags?: string[];
}

export function makeRecipe(id: string, rows: RequirementRow[], options: RecipeFixtureOptions = {}): Recipe {
  return toRecipe({
    id,
    title: options.title ?? id,
    servings: options.servings ?? 2,
    ingredients: rows.map(([name, quantity, unit]) => ({ name, quantity, unit })),
    cuisine: options.cuisine ?? null,
    dietaryFlags: options.dietaryFlags ?? [],
    prepTimeMinutes: options.prepTimeMinutes ?? null,
    tags: options.tags ?? [],
  });
}

export function makeProfile(overrides: Partial<PreferenceProfileInput> = {}): PreferenceProfile {
  return createPreferenceProfile(
    {
      id: 'test-household',
      dislikedIngredients: [],
      dislikedTags: [],
      dietaryConstraints: [],
      recentRecipeIds: [],
      maxPrepTimeMinutes: null,
      weeklyBudget: null,
      ...overrides,
    },
    { householdServings: 2 },
  );
}

export const testPrices: PriceBook = createPriceBook({
  rice: { unit: 'cup', unitPrice: 0.6 },
  zucchini: { unit: 'pcs', unitPrice: 1 },
  eggs: { unit: 'pcs', unitPrice: 0.35 },
  'chicken breast': { unit: 'lb', unitPrice: 4 },
});

/**
 * Ten vegetarian recipes and five that are not. Two of the vegetarian ones
 * need rice (1 and 3 cups); five are free, three cost 3.00 each.
 */
export function vegetarianScenarioRecipes(): Recipe[] {
  const veg = { dietaryFlags: ['vegetarian'] };
  return [
    makeRecipe('veg-rice-bowl', [['rice', 1, 'cup']], veg),
    makeRecipe('veg-rice-pilaf', [['rice', 3, 'cups']], veg),
    makeRecipe('veg-a', [['leek', 1, 'pcs']], veg),
    makeRecipe('veg-b', [['beet', 1, 'pcs']], veg),
    makeRecipe('veg-c', [['radish', 1, 'pcs']], veg),
    makeRecipe('veg-d', [['turnip', 1, 'pcs']], veg),
    makeRecipe('veg-e', [['parsnip', 1, 'pcs']], veg),
    makeRecipe('veg-f', [['zucchini', 3, 'pcs']], veg),
    makeRecipe('veg-g', [['zucchini', 3, 'pcs']], veg),
    makeRecipe('veg-h', [['zucchini', 3, 'pcs']], veg),
    makeRecipe('meat-1', [['chicken breast', 1, 'lb']]),
    makeRecipe('meat-2', [['ground beef', 1, 'lb']]),
    makeRecipe('meat-3', [['pork chops', 2, 'pcs']], { dietaryFlags: ['gluten-free'] }),
    makeRecipe('meat-4', [['salmon', 1, 'lb']], { dietaryFlags: ['pescatarian'] }),
    // Flagged vegetarian but the bacon gives it away
    makeRecipe('meat-5', [['bacon', 4, 'slices'], ['rice', 1, 'cup']], veg),
  ];
}

export function vegetarianScenarioCatalog(): RecipeCatalog {
  return RecipeCatalog.fromRecipes(vegetarianScenarioRecipes(), testPrices);
}

export const VEGETARIAN_SCENARIO_IDS = [
  'veg-rice-bowl',
  'veg-a',
  'veg-b',
  'veg-c',
  'veg-d',
  'veg-e',
  'veg-rice-pilaf',
];
