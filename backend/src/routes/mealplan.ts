import { Router } from 'express';
import type { AppDependencies } from '../app.js';
import { AppError } from '../errors.js';
import { generatePlanRequestSchema, parseOrThrow } from '../schemas.js';
import { PantryLedger, toPantryEntries } from '../services/pantryLedger.js';
import { runWeeklyPlan } from '../services/planOrchestrator.js';
import { createPreferenceProfile } from '../services/preferenceProfile.js';
import { buildCookingReminders, getNextWeekStart, toDateString } from '../services/reminders.js';
import type { PreferenceProfile, RecentUseUpdate } from '../types.js';

export default function mealPlanRouter({ config, catalog, preferences, reminders: scheduler }: AppDependencies): Router {
  const router = Router();

  /**
   * POST /api/meal-plan/generate
   * Plan a week of dinners and the shopping list for it
   *
   * Body:
   * {
   *   pantry: [{ name, unit, quantity } | "flour, 2 lb"],
   *   profile: { id, dislikedIngredients, ... } | undefined,
   *   profileId: string | undefined,   // a stored profile
   *   weekStart: "YYYY-MM-DD" | undefined,
   *   autoSchedule: boolean
   * }
   */
  router.post('/generate', (req, res) => {
    const request = parseOrThrow(generatePlanRequestSchema, req.body, 'meal plan request');

    let profile: PreferenceProfile | undefined;
    if (request.profile) {
      profile = createPreferenceProfile(request.profile, { householdServings: config.HOUSEHOLD_SERVINGS });
    } else if (request.profileId) {
      profile = preferences.get(request.profileId);
    }
    if (!profile) {
      throw new AppError('NOT_FOUND', 'Profile not found', { profileId: request.profileId });
    }

    const pantry = PantryLedger.fromEntries(toPantryEntries(request.pantry));
    const weekStart = request.weekStart ?? toDateString(getNextWeekStart(new Date(), config.PLAN_START_DAY));

    const suggestions: RecentUseUpdate[] = [];
    const plan = runWeeklyPlan(catalog, pantry, profile, {
      weekStart,
      recentUsePolicy: config.RECENT_USE_POLICY,
      recentUseLimit: config.RECENT_USE_LIMIT,
      preferenceSink: {
        suggestRecentUse: update => {
          suggestions.push(update);
        },
      },
    });
    const suggestedRecentUse = suggestions[0] ?? null;

    // Stored profiles take the suggestion; inline ones hand it back to the caller
    if (suggestedRecentUse && !request.profile && preferences.get(plan.profileId)) {
      preferences.suggestRecentUse(suggestedRecentUse);
    }

    const reminders = request.autoSchedule
      ? buildCookingReminders(plan, { hour: config.DINNER_HOUR })
      : [];
    if (scheduler && reminders.length > 0) {
      scheduler.schedule(reminders).catch((error: unknown) => {
        console.error(`[Reminders] Scheduling failed: ${error instanceof Error ? error.message : String(error)}`);
      });
    }

    console.log(
      `[Plan] ${plan.profileId}: ${plan.slots.length} dinners, ${plan.shoppingList.length} items, $${plan.totalCost.toFixed(2)}, ${plan.degradations.length} notes`,
    );

    res.json({ plan, suggestedRecentUse, reminders });
  });

  return router;
}
