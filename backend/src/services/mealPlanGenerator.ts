/**
 * Meal Plan Generator
 *
 * Picks one recipe per meal slot:
 * 1. Hard filters (dietary constraints, dislikes, prep time)
 * 2. Recent-use exclusion, relaxed when too few fresh recipes remain
 * 3. Rank by pantry affinity, then lower estimated cost, then id
 * 4. Take the best without replacement; round-robin by rank when short
 *
 * Same inputs, same plan: there is no randomness anywhere in here.
 */

import { AppError, InsufficientCatalogError } from '../errors.js';
import type { Degradation, GeneratedPlan, PreferenceProfile, RankedRecipe, RecentUsePolicy, Recipe } from '../types.js';
import { toMeasure } from './ingredients.js';
import type { PantryLedger } from './pantryLedger.js';
import { isRecipeCompatible } from './preferenceProfile.js';
import type { RecipeCatalog } from './recipeCatalog.js';

export interface GeneratePlanOptions {
  slots?: number;
  recentUsePolicy?: RecentUsePolicy;
}

export const DEFAULT_SLOT_COUNT = 7;

// Float noise from unit conversion must not turn "exactly enough" into a miss
const COVERAGE_EPSILON = 1e-9;

/**
 * Fraction of requirements the pantry fully covers at the household's serving size
 */
export function pantryAffinity(recipe: Recipe, pantry: PantryLedger, householdServings: number): number {
  if (recipe.requirements.length === 0) return 0;

  const scale = householdServings / recipe.servings;
  let covered = 0;
  for (const { ingredient, quantity } of recipe.requirements) {
    const needed = toMeasure(ingredient.name, quantity * scale, ingredient.unit);
    if (pantry.amountFor(needed.key) + COVERAGE_EPSILON >= needed.amount) {
      covered++;
    }
  }
  return covered / recipe.requirements.length;
}

export function compareRanked(a: RankedRecipe, b: RankedRecipe): number {
  if (a.pantryAffinity !== b.pantryAffinity) return b.pantryAffinity - a.pantryAffinity;
  if (a.estimatedCost !== b.estimatedCost) return a.estimatedCost - b.estimatedCost;
  return a.recipe.id < b.recipe.id ? -1 : a.recipe.id > b.recipe.id ? 1 : 0;
}

export function generatePlan(
  catalog: RecipeCatalog,
  pantry: PantryLedger,
  profile: PreferenceProfile,
  options: GeneratePlanOptions = {},
): GeneratedPlan {
  const { slots = DEFAULT_SLOT_COUNT, recentUsePolicy = 'relax' } = options;

  if (!Number.isInteger(slots) || slots <= 0) {
    throw new AppError('VALIDATION_ERROR', `Slot count must be a positive integer, got ${slots}`);
  }

  const eligible = catalog.all().filter(recipe => isRecipeCompatible(recipe, profile));
  if (eligible.length === 0) {
    throw new InsufficientCatalogError(
      `No recipe in the catalog satisfies the constraints of profile "${profile.id}"`,
      { catalogSize: catalog.size, eligible: 0, reason: 'hard-constraints' },
    );
  }

  const recent = new Set(profile.recentRecipeIds);
  const ranked: RankedRecipe[] = eligible
    .map(recipe => ({
      recipe,
      pantryAffinity: pantryAffinity(recipe, pantry, profile.householdServings),
      estimatedCost: catalog.estimatedCost(recipe.id, profile.householdServings),
      recentlyUsed: recent.has(recipe.id),
    }))
    .sort(compareRanked);

  const fresh = ranked.filter(r => !r.recentlyUsed);
  const stale = ranked.filter(r => r.recentlyUsed);
  const degradations: Degradation[] = [];

  let pool = fresh;
  if (fresh.length < slots && stale.length > 0) {
    if (recentUsePolicy === 'strict') {
      if (fresh.length === 0) {
        throw new InsufficientCatalogError(
          `Every eligible recipe was used recently and recent-use relaxation is disabled`,
          { catalogSize: catalog.size, eligible: eligible.length, reason: 'recent-use' },
        );
      }
    } else {
      pool = [...fresh, ...stale];
      const relaxed = stale.slice(0, slots - fresh.length).map(r => r.recipe.id);
      degradations.push({
        code: 'RECENT_USE_RELAXED',
        message: `Only ${fresh.length} eligible recipes were not used recently; reusing ${relaxed.join(', ')}`,
        recipeIds: relaxed,
      });
    }
  }

  // Round-robin by rank: slot i gets pool[i % n], so neighbours differ whenever n >= 2
  const selections: Recipe[] = [];
  for (let i = 0; i < slots; i++) {
    selections.push(pool[i % pool.length].recipe);
  }

  if (pool.length < slots) {
    const repeated = pool.slice(0, slots - pool.length).map(r => r.recipe.id);
    degradations.push({
      code: 'RECIPE_REPEATED',
      message: `Only ${pool.length} eligible recipes for ${slots} meals; repeating ${repeated.join(', ')}`,
      recipeIds: repeated,
    });
  }

  return {
    selections,
    ranking: [...fresh, ...stale],
    degradations,
  };
}
