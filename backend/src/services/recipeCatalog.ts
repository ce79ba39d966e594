/**
 * Recipe Catalog
 *
 * Immutable set of recipes loaded from the catalog file, with search,
 * stats and per-household cost estimates from the price book.
 */

import { readFileSync, existsSync } from 'fs';
import { AppError } from '../errors.js';
import { catalogFileSchema, parseOrThrow, type RecipeFileEntry } from '../schemas.js';
import type { PriceBook, Recipe, RecipeSearchOptions } from '../types.js';
import { detectCategory, normalizeIngredientName, normalizeUnitName, roundMoney, toMeasure } from './ingredients.js';
import { costOf, resolvePrice } from './priceBook.js';

export interface CatalogStats {
  total: number;
  cuisines: Record<string, number>;
  dietaryFlags: Record<string, number>;
}

/**
 * Convert a validated catalog file entry into a frozen recipe
 */
export function toRecipe(entry: RecipeFileEntry): Recipe {
  const requirements = entry.ingredients.map(ing => {
    const name = normalizeIngredientName(ing.name);
    return Object.freeze({
      ingredient: Object.freeze({
        name,
        unit: normalizeUnitName(ing.unit),
        category: ing.category ?? detectCategory(name),
        ...(ing.unitPrice !== undefined && { unitPrice: ing.unitPrice }),
      }),
      quantity: ing.quantity,
    });
  });

  return Object.freeze({
    id: entry.id,
    title: entry.title,
    servings: entry.servings,
    requirements: Object.freeze(requirements),
    tags: Object.freeze({
      cuisine: entry.cuisine ? entry.cuisine.toLowerCase() : null,
      dietaryFlags: Object.freeze(entry.dietaryFlags.map(flag => flag.toLowerCase())),
      prepTimeMinutes: entry.prepTimeMinutes,
      labels: Object.freeze(entry.tags.map(tag => tag.toLowerCase())),
    }),
  });
}

/**
 * Price of cooking a recipe for `servings` people; unpriced requirements
 * contribute nothing
 */
export function estimateRecipeCost(recipe: Recipe, priceBook: PriceBook, servings: number = recipe.servings): number {
  const scale = servings / recipe.servings;
  let total = 0;
  for (const { ingredient, quantity } of recipe.requirements) {
    const measure = toMeasure(ingredient.name, quantity * scale, ingredient.unit);
    total += costOf(measure, resolvePrice(ingredient, priceBook)) ?? 0;
  }
  return roundMoney(total);
}

/**
 * Read-only recipe index for one planning run
 */
export class RecipeCatalog {
  readonly priceBook: PriceBook;
  private readonly recipes: readonly Recipe[];
  private readonly byId: ReadonlyMap<string, Recipe>;
  private readonly costs: ReadonlyMap<string, number>;

  private constructor(recipes: Recipe[], priceBook: PriceBook) {
    this.recipes = Object.freeze(recipes);
    this.priceBook = priceBook;
    this.byId = new Map(recipes.map(r => [r.id, r]));
    this.costs = new Map(recipes.map(r => [r.id, estimateRecipeCost(r, priceBook)]));
  }

  static fromRecipes(recipes: readonly Recipe[], priceBook: PriceBook = new Map()): RecipeCatalog {
    const seen = new Set<string>();
    for (const recipe of recipes) {
      if (seen.has(recipe.id)) {
        throw new AppError('VALIDATION_ERROR', `Recipe id "${recipe.id}" appears more than once`, { recipeId: recipe.id });
      }
      if (!Number.isInteger(recipe.servings) || recipe.servings <= 0) {
        throw new AppError('VALIDATION_ERROR', `Recipe "${recipe.id}" must serve at least one person`, { recipeId: recipe.id });
      }
      seen.add(recipe.id);
    }
    return new RecipeCatalog([...recipes], priceBook);
  }

  get size(): number {
    return this.recipes.length;
  }

  all(): readonly Recipe[] {
    return this.recipes;
  }

  get(id: string): Recipe | undefined {
    return this.byId.get(id);
  }

  /**
   * Estimated cost at the recipe's own serving count, or scaled to `servings`
   */
  estimatedCost(id: string, servings?: number): number {
    const recipe = this.byId.get(id);
    if (!recipe) {
      throw new AppError('NOT_FOUND', `Recipe "${id}" is not in the catalog`, { recipeId: id });
    }
    if (servings === undefined || servings === recipe.servings) {
      return this.costs.get(id) ?? 0;
    }
    return estimateRecipeCost(recipe, this.priceBook, servings);
  }

  /**
   * Search recipes with various filters
   */
  search(options: RecipeSearchOptions = {}): Recipe[] {
    const {
      cuisines,
      dietaryFlags,
      maxPrepTime,
      excludeIngredients,
      searchText,
      limit = 20,
      offset = 0,
    } = options;

    const filtered = this.recipes.filter(recipe => {
      // Cuisine filter
      if (cuisines && cuisines.length > 0) {
        const cuisine = recipe.tags.cuisine;
        if (!cuisine || !cuisines.some(c => cuisine.includes(c.toLowerCase()))) return false;
      }

      // Dietary flags filter
      if (dietaryFlags && dietaryFlags.length > 0) {
        const hasFlags = dietaryFlags.every(flag => recipe.tags.dietaryFlags.includes(flag.toLowerCase()));
        if (!hasFlags) return false;
      }

      // Time filter
      if (maxPrepTime !== undefined && recipe.tags.prepTimeMinutes !== null && recipe.tags.prepTimeMinutes > maxPrepTime) {
        return false;
      }

      // Exclude ingredients filter
      if (excludeIngredients && excludeIngredients.length > 0) {
        const hasExcluded = recipe.requirements.some(req =>
          excludeIngredients.some(ex => req.ingredient.name.includes(ex.toLowerCase()))
        );
        if (hasExcluded) return false;
      }

      // Text search filter
      if (searchText) {
        const text = searchText.toLowerCase();
        const inTitle = recipe.title.toLowerCase().includes(text);
        const inIngredients = recipe.requirements.some(r => r.ingredient.name.includes(text));
        if (!inTitle && !inIngredients) return false;
      }

      return true;
    });

    return filtered.slice(offset, offset + limit);
  }

  stats(): CatalogStats {
    const cuisines: Record<string, number> = {};
    const dietaryFlags: Record<string, number> = {};
    for (const recipe of this.recipes) {
      if (recipe.tags.cuisine) {
        cuisines[recipe.tags.cuisine] = (cuisines[recipe.tags.cuisine] || 0) + 1;
      }
      for (const flag of recipe.tags.dietaryFlags) {
        dietaryFlags[flag] = (dietaryFlags[flag] || 0) + 1;
      }
    }
    return { total: this.recipes.length, cuisines, dietaryFlags };
  }
}

/**
 * Load and validate a catalog JSON file
 */
export function loadCatalogFromFile(filePath: string, priceBook: PriceBook = new Map()): RecipeCatalog {
  if (!existsSync(filePath)) {
    throw new AppError('NOT_FOUND', `Recipe catalog not found at ${filePath}`);
  }

  console.log(`[Recipes] Loading recipes from ${filePath}...`);
  const entries = parseOrThrow(catalogFileSchema, JSON.parse(readFileSync(filePath, 'utf-8')), `recipe catalog ${filePath}`);
  const catalog = RecipeCatalog.fromRecipes(entries.map(toRecipe), priceBook);
  console.log(`[Recipes] Loaded ${catalog.size} recipes`);
  return catalog;
}
