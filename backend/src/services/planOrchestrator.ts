/**
 * Plan Orchestrator
 *
 * One planning run: generator, then aggregator, then a frozen artifact.
 * Errors from either step reach the caller untouched.
 */

import { AppError } from '../errors.js';
import type { PreferenceProfile, RecentUsePolicy, RecentUseUpdate, WeeklyPlanArtifact } from '../types.js';
import { roundMoney } from './ingredients.js';
import { generatePlan } from './mealPlanGenerator.js';
import type { PantryLedger } from './pantryLedger.js';
import { suggestRecentUseUpdate } from './preferenceProfile.js';
import type { RecipeCatalog } from './recipeCatalog.js';
import { aggregate, type RoundingPolicy } from './shoppingListAggregator.js';

/**
 * Receives the recent-use history the owner of the profile may want to store
 */
export interface PreferenceUpdateSink {
  suggestRecentUse(update: RecentUseUpdate): void;
}

export interface RunWeeklyPlanOptions {
  weekStart?: string | null; // YYYY-MM-DD of day 0
  slots?: number;
  recentUsePolicy?: RecentUsePolicy;
  recentUseLimit?: number;
  rounding?: RoundingPolicy;
  preferenceSink?: PreferenceUpdateSink;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse a YYYY-MM-DD date as midnight UTC
 */
export function parseWeekStart(weekStart: string): Date {
  const match = weekStart.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  const date = match
    ? new Date(Date.UTC(parseInt(match[1], 10), parseInt(match[2], 10) - 1, parseInt(match[3], 10)))
    : null;
  if (!date || date.toISOString().slice(0, 10) !== weekStart) {
    throw new AppError('VALIDATION_ERROR', `Week start must be a YYYY-MM-DD date, got "${weekStart}"`);
  }
  return date;
}

export function slotDate(weekStart: Date, dayIndex: number): string {
  return new Date(weekStart.getTime() + dayIndex * DAY_MS).toISOString().slice(0, 10);
}

export function runWeeklyPlan(
  catalog: RecipeCatalog,
  pantry: PantryLedger,
  profile: PreferenceProfile,
  options: RunWeeklyPlanOptions = {},
): WeeklyPlanArtifact {
  const { weekStart = null, slots, recentUsePolicy, recentUseLimit, rounding, preferenceSink } = options;
  const start = weekStart === null ? null : parseWeekStart(weekStart);

  const plan = generatePlan(catalog, pantry, profile, { slots, recentUsePolicy });
  const shopping = aggregate(plan.selections, pantry, {
    householdServings: profile.householdServings,
    priceBook: catalog.priceBook,
    rounding,
  });

  const affinityById = new Map(plan.ranking.map(r => [r.recipe.id, r.pantryAffinity]));
  const degradations = [...plan.degradations, ...shopping.degradations];

  if (profile.weeklyBudget !== null && shopping.totalCost > profile.weeklyBudget) {
    degradations.push({
      code: 'OVER_BUDGET',
      message: `Estimated shopping cost ${shopping.totalCost.toFixed(2)} exceeds the weekly budget of ${profile.weeklyBudget.toFixed(2)}`,
      budget: profile.weeklyBudget,
      totalCost: roundMoney(shopping.totalCost),
    });
  }

  const artifact: WeeklyPlanArtifact = {
    profileId: profile.id,
    weekStart,
    slots: plan.selections.map((recipe, dayIndex) => ({
      dayIndex,
      date: start ? slotDate(start, dayIndex) : null,
      recipe,
      pantryAffinity: affinityById.get(recipe.id) ?? 0,
    })),
    shoppingList: shopping.items,
    totalCost: shopping.totalCost,
    degradations,
  };

  if (preferenceSink) {
    preferenceSink.suggestRecentUse(
      suggestRecentUseUpdate(profile, plan.selections.map(r => r.id), recentUseLimit),
    );
  }

  return deepFreeze(artifact);
}
