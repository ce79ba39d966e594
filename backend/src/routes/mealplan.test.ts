import { after, before, describe, it } from 'node:test';
import assert from 'node:assert';
import { once } from 'events';
import type { Server } from 'http';
import { z } from 'zod';
import { createApp } from '../app.js';
import { loadConfig } from '../config.js';
import { InMemoryPreferenceStore } from '../services/preferenceStore.js';
import { loadPriceBook } from '../services/priceBook.js';
import { loadCatalogFromFile } from '../services/recipeCatalog.js';
import type { CookingReminder } from '../types.js';
import { makeProfile } from '../__fixtures__/recipes.js';

const errorBody = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

const planBody = z.object({
  plan: z.object({
    profileId: z.string(),
    weekStart: z.string().nullable(),
    slots: z.array(z.object({ dayIndex: z.number(), date: z.string().nullable(), recipe: z.object({ id: z.string() }) })),
    shoppingList: z.array(z.object({ ingredient: z.string(), deficit: z.number() })),
    totalCost: z.number(),
  }),
  suggestedRecentUse: z.object({ profileId: z.string(), recipeIds: z.array(z.string()) }).nullable(),
  reminders: z.array(z.object({ title: z.string(), startsAt: z.string() })),
});

const config = loadConfig({});
const store = new InMemoryPreferenceStore([makeProfile({ id: 'stored' })], config.RECENT_USE_LIMIT);
const catalog = loadCatalogFromFile(config.RECIPES_PATH, loadPriceBook(config.PRICES_PATH));

const scheduled: CookingReminder[] = [];
const scheduler = {
  schedule: async (reminders: readonly CookingReminder[]) => {
    scheduled.push(...reminders);
  },
};

let server: Server;
let baseUrl: string;

before(async () => {
  server = createApp({ config, catalog, preferences: store, reminders: scheduler }).listen(0, '127.0.0.1');
  await once(server, 'listening');
  const { port } = z.object({ port: z.number() }).parse(server.address());
  baseUrl = `http://127.0.0.1:${port}`;
});

after(() => {
  server.closeAllConnections();
  server.close();
});

async function post(path: string, body: unknown): Promise<{ status: number; json: unknown }> {
  const res = await fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
  return { status: res.status, json: await res.json() };
}

describe('GET /health', () => {
  it('reports the catalog size', async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body = z.object({ status: z.string(), recipes: z.number() }).parse(await res.json());

    assert.strictEqual(res.status, 200);
    assert.strictEqual(body.status, 'ok');
    assert.strictEqual(body.recipes, 15);
  });
});

describe('/api/recipes', () => {
  it('filters by dietary flag and pages', async () => {
    const res = await fetch(`${baseUrl}/api/recipes?dietaryFlags=vegetarian&limit=2`);
    const body = z
      .object({
        count: z.number(),
        total: z.number(),
        results: z.array(
          z.object({
            id: z.string(),
            tags: z.object({ dietaryFlags: z.array(z.string()) }),
            estimatedCost: z.number(),
          }),
        ),
      })
      .parse(await res.json());

    assert.strictEqual(res.status, 200);
    assert.strictEqual(body.count, 2);
    assert.strictEqual(body.total, 15);
    assert.ok(body.results.every(recipe => recipe.tags.dietaryFlags.includes('vegetarian')));
  });

  it('returns a recipe by id', async () => {
    const res = await fetch(`${baseUrl}/api/recipes/black-bean-tacos`);
    const body = z.object({ id: z.string() }).parse(await res.json());
    assert.strictEqual(res.status, 200);
    assert.strictEqual(body.id, 'black-bean-tacos');
  });

  it('answers 404 for an unknown recipe', async () => {
    const res = await fetch(`${baseUrl}/api/recipes/nope`);
    const body = errorBody.parse(await res.json());
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(body.error, { code: 'NOT_FOUND', message: 'Recipe not found' });
  });

  it('rejects a bad page size', async () => {
    const res = await fetch(`${baseUrl}/api/recipes?limit=0`);
    assert.strictEqual(res.status, 400);
    assert.strictEqual(errorBody.parse(await res.json()).error.code, 'VALIDATION_ERROR');
  });
});

describe('/api/preferences', () => {
  it('saves a profile under the id in the path', async () => {
    const put = await fetch(`${baseUrl}/api/preferences/guest`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ id: 'ignored', dislikedIngredients: ['Cilantro'] }),
    });
    assert.strictEqual(put.status, 200);

    const res = await fetch(`${baseUrl}/api/preferences/guest`);
    const body = z
      .object({ id: z.string(), dislikedIngredients: z.array(z.string()), householdServings: z.number() })
      .parse(await res.json());
    assert.strictEqual(body.id, 'guest');
    assert.deepStrictEqual(body.dislikedIngredients, ['cilantro']);
    assert.strictEqual(body.householdServings, 2);
  });

  it('answers 404 for an unknown profile', async () => {
    const res = await fetch(`${baseUrl}/api/preferences/ghost`);
    assert.strictEqual(res.status, 404);
  });
});

describe('POST /api/meal-plan/generate', () => {
  it('plans a week for an inline profile', async () => {
    const { status, json } = await post('/api/meal-plan/generate', {
      pantry: ['rice, 2 cups', { name: 'eggs', unit: 'pcs', quantity: 6 }],
      profile: { id: 'visitor', dietaryConstraints: ['vegetarian'] },
      weekStart: '2026-01-05',
      autoSchedule: true,
    });
    const body = planBody.parse(json);

    assert.strictEqual(status, 200);
    assert.strictEqual(body.plan.profileId, 'visitor');
    assert.strictEqual(body.plan.weekStart, '2026-01-05');
    assert.strictEqual(body.plan.slots.length, 7);
    assert.strictEqual(body.plan.slots[6].date, '2026-01-11');
    assert.strictEqual(body.reminders.length, 7);
    assert.strictEqual(body.reminders[0].title.startsWith('Cook: '), true);
    assert.deepStrictEqual(scheduled.map(r => r.startsAt), body.reminders.map(r => r.startsAt));
    assert.deepStrictEqual(body.suggestedRecentUse?.recipeIds, body.plan.slots.map(slot => slot.recipe.id));
    assert.strictEqual(store.get('visitor'), undefined);
  });

  it('records the week on a stored profile', async () => {
    const { status, json } = await post('/api/meal-plan/generate', { profileId: 'stored', weekStart: '2026-01-05' });
    const body = planBody.parse(json);

    assert.strictEqual(status, 200);
    assert.deepStrictEqual(body.reminders, []);
    assert.deepStrictEqual(store.get('stored')?.recentRecipeIds, body.plan.slots.map(slot => slot.recipe.id));
  });

  it('rejects a request without a profile', async () => {
    const { status, json } = await post('/api/meal-plan/generate', { pantry: [] });
    assert.strictEqual(status, 400);
    assert.strictEqual(errorBody.parse(json).error.code, 'VALIDATION_ERROR');
  });

  it('answers 404 for an unknown stored profile', async () => {
    const { status } = await post('/api/meal-plan/generate', { profileId: 'ghost' });
    assert.strictEqual(status, 404);
  });

  it('answers 409 when the pantry lists an ingredient twice', async () => {
    const { status, json } = await post('/api/meal-plan/generate', {
      pantry: ['rice, 2 cups', 'rice, 1 cup'],
      profileId: 'stored',
    });
    assert.strictEqual(status, 409);
    assert.strictEqual(errorBody.parse(json).error.code, 'CONFLICTING_PANTRY_ENTRY');
  });

  it('answers 422 when no recipe fits the profile', async () => {
    const { status, json } = await post('/api/meal-plan/generate', {
      profile: { id: 'hurried', maxPrepTimeMinutes: 5 },
    });
    assert.strictEqual(status, 422);
    assert.strictEqual(errorBody.parse(json).error.code, 'INSUFFICIENT_CATALOG');
  });

  it('answers 400 for a body that is not JSON', async () => {
    const { status, json } = await post('/api/meal-plan/generate', '{"pantry": [');
    assert.strictEqual(status, 400);
    assert.deepStrictEqual(errorBody.parse(json).error, {
      code: 'VALIDATION_ERROR',
      message: 'Request body is not valid JSON',
    });
  });
});
