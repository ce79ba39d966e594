/**
 * Preference Profile
 *
 * Snapshots of a household's constraints and history, and the hard filters
 * a recipe must pass before the generator will consider it.
 */

import type { PreferenceProfileInput } from '../schemas.js';
import type { PreferenceProfile, Recipe, RecentUseUpdate } from '../types.js';
import { matchesDietHint, normalizeIngredientName, type DietHint } from './ingredients.js';

export interface ProfileDefaults {
  householdServings: number;
}

const DEFAULT_RECENT_USE_LIMIT = 14;

// Ingredient groups a constraint rules out, on top of the recipe declaring the flag
const CONSTRAINT_HINTS: Record<string, DietHint[]> = {
  'vegetarian': ['meat', 'fish'],
  'vegan': ['meat', 'fish', 'dairy', 'animal'],
  'pescatarian': ['meat'],
  'nut-free': ['nuts'],
  'gluten-free': ['gluten'],
  'dairy-free': ['dairy'],
};

function uniqueLower(values: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const lower = value.toLowerCase().trim();
    if (lower) seen.add(lower);
  }
  return [...seen];
}

/**
 * Build a frozen, normalized profile snapshot
 */
export function createPreferenceProfile(input: PreferenceProfileInput, defaults: ProfileDefaults): PreferenceProfile {
  return Object.freeze({
    id: input.id,
    dislikedIngredients: Object.freeze(uniqueLower(input.dislikedIngredients)),
    dislikedTags: Object.freeze(uniqueLower(input.dislikedTags)),
    dietaryConstraints: Object.freeze(uniqueLower(input.dietaryConstraints)),
    recentRecipeIds: Object.freeze([...new Set(input.recentRecipeIds)]),
    householdServings: input.householdServings ?? defaults.householdServings,
    maxPrepTimeMinutes: input.maxPrepTimeMinutes,
    weeklyBudget: input.weeklyBudget,
  });
}

/**
 * Reasons a recipe fails the profile's hard constraints; empty when it passes
 */
export function recipeViolations(recipe: Recipe, profile: PreferenceProfile): string[] {
  const violations: string[] = [];

  for (const constraint of profile.dietaryConstraints) {
    if (!recipe.tags.dietaryFlags.includes(constraint)) {
      violations.push(`not marked ${constraint}`);
      continue;
    }
    for (const hint of CONSTRAINT_HINTS[constraint] ?? []) {
      const offender = recipe.requirements.find(req => matchesDietHint(req.ingredient.name, hint));
      if (offender) {
        violations.push(`${offender.ingredient.name} is not ${constraint}`);
      }
    }
  }

  for (const disliked of profile.dislikedIngredients) {
    const canonical = normalizeIngredientName(disliked);
    const offender = recipe.requirements.find(req =>
      req.ingredient.name.includes(disliked) || req.ingredient.name === canonical
    );
    if (offender) {
      violations.push(`contains disliked ${offender.ingredient.name}`);
    }
  }

  const tags = recipe.tags.cuisine ? [recipe.tags.cuisine, ...recipe.tags.labels] : recipe.tags.labels;
  for (const tag of profile.dislikedTags) {
    if (tags.includes(tag)) {
      violations.push(`tagged ${tag}`);
    }
  }

  const prep = recipe.tags.prepTimeMinutes;
  if (profile.maxPrepTimeMinutes !== null && prep !== null && prep > profile.maxPrepTimeMinutes) {
    violations.push(`takes ${prep} minutes`);
  }

  return violations;
}

export function isRecipeCompatible(recipe: Recipe, profile: PreferenceProfile): boolean {
  return recipeViolations(recipe, profile).length === 0;
}

/**
 * The recent-use history a profile would have after cooking `selectedIds`:
 * this week's recipes in slot order, then the older history, without
 * duplicates and capped at `limit`.
 */
export function suggestRecentUseUpdate(
  profile: PreferenceProfile,
  selectedIds: readonly string[],
  limit: number = DEFAULT_RECENT_USE_LIMIT,
): RecentUseUpdate {
  const merged = [...new Set([...selectedIds, ...profile.recentRecipeIds])];
  return {
    profileId: profile.id,
    recipeIds: merged.slice(0, limit),
  };
}
