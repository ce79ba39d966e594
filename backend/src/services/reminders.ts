/**
 * Cooking reminders
 *
 * Turns the meal slots of a plan into dinner-time reminders. Delivering them
 * is up to whatever implements ReminderScheduler.
 */

import type { CookingReminder, WeeklyPlanArtifact } from '../types.js';
import { parseWeekStart } from './planOrchestrator.js';

export interface ReminderScheduler {
  schedule(reminders: readonly CookingReminder[]): Promise<void>;
}

/**
 * Writes reminders to the log; stands in until a notification channel exists
 */
export class LoggingReminderScheduler implements ReminderScheduler {
  async schedule(reminders: readonly CookingReminder[]): Promise<void> {
    for (const reminder of reminders) {
      console.log(`[Reminders] ${reminder.startsAt} ${reminder.title}`);
    }
  }
}

export interface ReminderOptions {
  weekStart?: string; // falls back to the artifact's week start
  hour?: number; // 0-23
  minute?: number; // 0-59
  leadMinutes?: number; // used when a recipe has no prep time
}

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

// Get the start of the week containing `date` (UTC midnight)
export function getWeekStart(date: Date, startDay: number): Date {
  const result = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

  // Calculate days to go back to reach the start day
  let daysBack = result.getUTCDay() - startDay;
  if (daysBack < 0) {
    daysBack += 7; // Go back to previous week's start day
  }

  result.setUTCDate(result.getUTCDate() - daysBack);
  return result;
}

// Get the NEXT occurrence of the start day (for forward-focused planning)
export function getNextWeekStart(date: Date, startDay: number): Date {
  const currentWeekStart = getWeekStart(date, startDay);
  return new Date(currentWeekStart.getTime() + 7 * DAY_MS);
}

export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildCookingReminders(artifact: WeeklyPlanArtifact, options: ReminderOptions = {}): CookingReminder[] {
  const { hour = 19, minute = 0, leadMinutes = 30 } = options;
  const weekStart = options.weekStart ?? artifact.weekStart;
  if (!weekStart) return [];

  const start = parseWeekStart(weekStart);

  return artifact.slots.map(slot => {
    const dinnerAt = new Date(start.getTime() + slot.dayIndex * DAY_MS + (hour * 60 + minute) * MINUTE_MS);
    const prep = slot.recipe.tags.prepTimeMinutes ?? leadMinutes;
    const startsAt = new Date(dinnerAt.getTime() - prep * MINUTE_MS);

    return {
      dayIndex: slot.dayIndex,
      recipeId: slot.recipe.id,
      title: `Cook: ${slot.recipe.title}`,
      startsAt: startsAt.toISOString(),
      dinnerAt: dinnerAt.toISOString(),
      notes: `Start ${prep} minutes before dinner. Serves ${slot.recipe.servings}.`,
    };
  });
}
