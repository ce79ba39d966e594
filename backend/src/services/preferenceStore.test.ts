import { describe, it } from 'node:test';
import assert from 'node:assert';
import { fileURLToPath } from 'url';
import { makeProfile } from '../__fixtures__/recipes.js';
import { AppError } from '../errors.js';
import { InMemoryPreferenceStore, loadProfilesFromFile } from './preferenceStore.js';

describe('InMemoryPreferenceStore', () => {
  it('hands out frozen snapshots', () => {
    const store = new InMemoryPreferenceStore([makeProfile({ id: 'p1', recentRecipeIds: ['a'] })]);
    const profile = store.get('p1');

    assert.ok(profile);
    assert.ok(Object.isFrozen(profile));
    assert.ok(Object.isFrozen(profile.recentRecipeIds));
    assert.strictEqual(store.get('p2'), undefined);
  });

  it('replaces a profile on put and lists by id', () => {
    const store = new InMemoryPreferenceStore([makeProfile({ id: 'b' }), makeProfile({ id: 'a' })]);
    store.put(makeProfile({ id: 'b', householdServings: 5 }));

    assert.deepStrictEqual(store.list().map(p => p.id), ['a', 'b']);
    assert.strictEqual(store.get('b')?.householdServings, 5);
  });

  it('merges suggested recent use, newest first and capped', () => {
    const store = new InMemoryPreferenceStore([makeProfile({ id: 'p1', recentRecipeIds: ['x', 'y'] })], 3);
    store.suggestRecentUse({ profileId: 'p1', recipeIds: ['a', 'x'] });

    assert.deepStrictEqual(store.get('p1')?.recentRecipeIds, ['a', 'x', 'y']);
  });

  it('refuses suggestions for unknown profiles', () => {
    const store = new InMemoryPreferenceStore();
    assert.throws(
      () => store.suggestRecentUse({ profileId: 'ghost', recipeIds: ['a'] }),
      (error: unknown) => error instanceof AppError && error.code === 'NOT_FOUND',
    );
  });
});

describe('loadProfilesFromFile', () => {
  it('loads the sample profile', () => {
    const profiles = loadProfilesFromFile(
      fileURLToPath(new URL('../../data/profile.json', import.meta.url)),
      { householdServings: 2 },
    );

    assert.strictEqual(profiles.length, 1);
    assert.strictEqual(profiles[0].id, 'household');
    assert.strictEqual(profiles[0].householdServings, 4);
    assert.deepStrictEqual(profiles[0].dietaryConstraints, ['vegetarian']);
  });
});
