/**
 * Boundary schemas
 *
 * Everything that enters the planner from a file or a request body is parsed
 * here; the services behind it assume well-typed snapshots.
 */

import { z } from 'zod';
import { AppError } from './errors.js';

export const ingredientCategorySchema = z.enum([
  'protein',
  'produce',
  'dairy',
  'grains',
  'canned',
  'condiment',
  'spice',
  'baking',
  'frozen',
  'beverage',
  'other',
]);

const ingredientFields = {
  name: z.string().trim().min(1),
  unit: z.string().trim().default('pcs'),
  category: ingredientCategorySchema.optional(),
  unitPrice: z.number().nonnegative().optional(),
};

export const recipeIngredientSchema = z.object({
  ...ingredientFields,
  quantity: z.number().positive(),
});

export const recipeSchema = z.object({
  id: z.string().trim().min(1),
  title: z.string().trim().min(1),
  servings: z.number().int().positive(),
  ingredients: z.array(recipeIngredientSchema),
  cuisine: z.string().trim().min(1).nullable().default(null),
  dietaryFlags: z.array(z.string()).default([]),
  prepTimeMinutes: z.number().int().nonnegative().nullable().default(null),
  tags: z.array(z.string()).default([]),
});

export const catalogFileSchema = z.array(recipeSchema);

export const referencePriceSchema = z.object({
  unit: z.string().trim().min(1),
  unitPrice: z.number().nonnegative(),
});

export const priceBookFileSchema = z.record(referencePriceSchema);

// Pantry entries may be structured or a free-text line such as "flour, 2 lb"
export const pantryItemSchema = z.union([
  z.string().trim().min(1),
  z.object({
    ...ingredientFields,
    quantity: z.number(),
  }),
]);

export const pantryFileSchema = z.array(pantryItemSchema);

export const preferenceProfileSchema = z.object({
  id: z.string().trim().min(1),
  dislikedIngredients: z.array(z.string()).default([]),
  dislikedTags: z.array(z.string()).default([]),
  dietaryConstraints: z.array(z.string()).default([]),
  recentRecipeIds: z.array(z.string()).default([]),
  householdServings: z.number().int().positive().optional(),
  maxPrepTimeMinutes: z.number().int().positive().nullable().default(null),
  weeklyBudget: z.number().positive().nullable().default(null),
});

// A profile file holds one profile or a list of them
export const profileFileSchema = z.union([preferenceProfileSchema, z.array(preferenceProfileSchema)]);

export const generatePlanRequestSchema = z
  .object({
    pantry: pantryFileSchema.default([]),
    profile: preferenceProfileSchema.optional(),
    profileId: z.string().trim().min(1).optional(),
    weekStart: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
    autoSchedule: z.boolean().default(false),
  })
  .refine(body => body.profile !== undefined || body.profileId !== undefined, {
    message: 'Either profile or profileId is required',
    path: ['profile'],
  });

export type RecipeFileEntry = z.infer<typeof recipeSchema>;
export type PantryItemInput = z.infer<typeof pantryItemSchema>;
export type PreferenceProfileInput = z.infer<typeof preferenceProfileSchema>;
export type GeneratePlanRequest = z.infer<typeof generatePlanRequestSchema>;

/**
 * Parse boundary input, turning zod issues into a VALIDATION_ERROR
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new AppError('VALIDATION_ERROR', `Invalid ${what}`, {
      issues: result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
