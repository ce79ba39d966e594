import { Router } from 'express';
import type { AppConfig } from '../config.js';
import { AppError } from '../errors.js';
import { parseOrThrow, preferenceProfileSchema } from '../schemas.js';
import { createPreferenceProfile } from '../services/preferenceProfile.js';
import type { PreferenceStore } from '../services/preferenceStore.js';

export default function preferencesRouter(store: PreferenceStore, config: AppConfig): Router {
  const router = Router();

  /**
   * GET /api/preferences/:id
   */
  router.get('/:id', (req, res) => {
    const profile = store.get(req.params.id);
    if (!profile) {
      throw new AppError('NOT_FOUND', 'Profile not found', { profileId: req.params.id });
    }
    res.json(profile);
  });

  /**
   * PUT /api/preferences/:id
   * Replace a profile; the id in the path wins over one in the body
   */
  router.put('/:id', (req, res) => {
    const body: unknown = req.body;
    const input = parseOrThrow(
      preferenceProfileSchema,
      typeof body === 'object' && body !== null ? { ...body, id: req.params.id } : body,
      'preference profile',
    );

    const profile = createPreferenceProfile(input, { householdServings: config.HOUSEHOLD_SERVINGS });
    store.put(profile);
    console.log(`[Preferences] Saved profile ${profile.id}`);
    res.json(store.get(profile.id));
  });

  return router;
}
