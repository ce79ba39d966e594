/**
 * Preference store
 *
 * In-memory profile store. Hands out snapshots; nothing it returns can be
 * used to change what it holds.
 */

import { readFileSync } from 'fs';
import { AppError } from '../errors.js';
import { parseOrThrow, profileFileSchema } from '../schemas.js';
import type { PreferenceProfile, RecentUseUpdate } from '../types.js';
import type { PreferenceUpdateSink } from './planOrchestrator.js';
import { createPreferenceProfile, type ProfileDefaults } from './preferenceProfile.js';

export interface PreferenceStore extends PreferenceUpdateSink {
  get(id: string): PreferenceProfile | undefined;
  put(profile: PreferenceProfile): void;
  list(): PreferenceProfile[];
}

function snapshot(profile: PreferenceProfile): PreferenceProfile {
  return Object.freeze({
    ...profile,
    dislikedIngredients: Object.freeze([...profile.dislikedIngredients]),
    dislikedTags: Object.freeze([...profile.dislikedTags]),
    dietaryConstraints: Object.freeze([...profile.dietaryConstraints]),
    recentRecipeIds: Object.freeze([...profile.recentRecipeIds]),
  });
}

export class InMemoryPreferenceStore implements PreferenceStore {
  private profiles = new Map<string, PreferenceProfile>();

  constructor(
    initial: readonly PreferenceProfile[] = [],
    private readonly recentUseLimit = 14,
  ) {
    for (const profile of initial) {
      this.put(profile);
    }
  }

  get(id: string): PreferenceProfile | undefined {
    return this.profiles.get(id);
  }

  put(profile: PreferenceProfile): void {
    this.profiles.set(profile.id, snapshot(profile));
  }

  list(): PreferenceProfile[] {
    return [...this.profiles.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  /**
   * Merge a suggested history into the stored profile, newest first
   */
  suggestRecentUse(update: RecentUseUpdate): void {
    const profile = this.profiles.get(update.profileId);
    if (!profile) {
      throw new AppError('NOT_FOUND', `Profile "${update.profileId}" not found`, { profileId: update.profileId });
    }

    const recentRecipeIds = [...new Set([...update.recipeIds, ...profile.recentRecipeIds])].slice(0, this.recentUseLimit);
    this.put({ ...profile, recentRecipeIds });
    console.log(`[Preferences] ${update.profileId}: ${recentRecipeIds.length} recent recipes`);
  }
}

export function loadProfilesFromFile(filePath: string, defaults: ProfileDefaults): PreferenceProfile[] {
  const parsed = parseOrThrow(profileFileSchema, JSON.parse(readFileSync(filePath, 'utf-8')), `profile file ${filePath}`);
  const inputs = Array.isArray(parsed) ? parsed : [parsed];
  return inputs.map(input => createPreferenceProfile(input, defaults));
}
