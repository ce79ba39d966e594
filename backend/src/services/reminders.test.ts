import { describe, it } from 'node:test';
import assert from 'node:assert';
import { makeProfile, makeRecipe } from '../__fixtures__/recipes.js';
import { PantryLedger } from './pantryLedger.js';
import { runWeeklyPlan } from './planOrchestrator.js';
import { RecipeCatalog } from './recipeCatalog.js';
import { buildCookingReminders, getNextWeekStart, getWeekStart, toDateString } from './reminders.js';

function planFor(weekStart: string | null) {
  const catalog = RecipeCatalog.fromRecipes([
    makeRecipe('curry', [['lentils', 1, 'cup']], { title: 'Lentil Curry', prepTimeMinutes: 45 }),
    makeRecipe('toast', [['bread', 2, 'slices']], { title: 'Cheese Toast' }),
  ]);
  return runWeeklyPlan(catalog, PantryLedger.empty(), makeProfile(), { weekStart });
}

describe('buildCookingReminders', () => {
  it('schedules one reminder per night, counting back the prep time', () => {
    const reminders = buildCookingReminders(planFor('2026-01-05'));

    assert.strictEqual(reminders.length, 7);
    assert.deepStrictEqual(reminders[0], {
      dayIndex: 0,
      recipeId: 'curry',
      title: 'Cook: Lentil Curry',
      startsAt: '2026-01-05T18:15:00.000Z',
      dinnerAt: '2026-01-05T19:00:00.000Z',
      notes: 'Start 45 minutes before dinner. Serves 2.',
    });
    // No prep time on the toast, so the default lead applies
    assert.strictEqual(reminders[1].startsAt, '2026-01-06T18:30:00.000Z');
    assert.strictEqual(reminders[6].dinnerAt, '2026-01-11T19:00:00.000Z');
  });

  it('honours the dinner time and an explicit week start', () => {
    const reminders = buildCookingReminders(planFor(null), { weekStart: '2026-03-02', hour: 18, minute: 30, leadMinutes: 10 });
    assert.strictEqual(reminders[0].dinnerAt, '2026-03-02T18:30:00.000Z');
    assert.strictEqual(reminders[1].startsAt, '2026-03-03T18:20:00.000Z');
  });

  it('has nothing to schedule without a week start', () => {
    assert.deepStrictEqual(buildCookingReminders(planFor(null)), []);
  });
});

describe('week starts', () => {
  // 2026-01-07 is a Wednesday
  const wednesday = new Date('2026-01-07T12:00:00Z');

  it('finds the start of the current week', () => {
    assert.strictEqual(toDateString(getWeekStart(wednesday, 1)), '2026-01-05');
    assert.strictEqual(toDateString(getWeekStart(wednesday, 6)), '2026-01-03');
    assert.strictEqual(toDateString(getWeekStart(wednesday, 3)), '2026-01-07');
  });

  it('plans forward to the next week', () => {
    assert.strictEqual(toDateString(getNextWeekStart(wednesday, 1)), '2026-01-12');
  });
});
