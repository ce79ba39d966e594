import { Router } from 'express';
import { z } from 'zod';
import { AppError } from '../errors.js';
import { parseOrThrow } from '../schemas.js';
import type { RecipeCatalog } from '../services/recipeCatalog.js';

const list = z
  .string()
  .transform(value => value.split(',').map(s => s.trim()).filter(Boolean))
  .optional();

const searchQuerySchema = z.object({
  q: z.string().optional(),
  cuisines: list,
  dietaryFlags: list,
  excludeIngredients: list,
  maxPrepTime: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export default function recipesRouter(catalog: RecipeCatalog): Router {
  const router = Router();

  /**
   * GET /api/recipes
   * Search recipes with filters
   */
  router.get('/', (req, res) => {
    const query = parseOrThrow(searchQuerySchema, req.query, 'recipe search');

    const results = catalog.search({
      cuisines: query.cuisines,
      dietaryFlags: query.dietaryFlags,
      maxPrepTime: query.maxPrepTime,
      excludeIngredients: query.excludeIngredients,
      searchText: query.q,
      limit: query.limit,
      offset: query.offset,
    });

    res.json({
      count: results.length,
      total: catalog.size,
      results: results.map(recipe => ({
        ...recipe,
        estimatedCost: catalog.estimatedCost(recipe.id),
      })),
    });
  });

  /**
   * GET /api/recipes/stats
   * Cuisine and dietary flag counts
   */
  router.get('/stats', (_req, res) => {
    res.json(catalog.stats());
  });

  /**
   * GET /api/recipes/:id
   */
  router.get('/:id', (req, res) => {
    const recipe = catalog.get(req.params.id);
    if (!recipe) {
      throw new AppError('NOT_FOUND', 'Recipe not found', { recipeId: req.params.id });
    }

    res.json({ ...recipe, estimatedCost: catalog.estimatedCost(recipe.id) });
  });

  return router;
}
