import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { AppError } from './errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// backend/data, from both backend/src and dist/backend/src
const DATA_DIR = __dirname.includes(join('dist', 'backend'))
  ? join(__dirname, '../../../backend/data')
  : join(__dirname, '../data');

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const configSchema = z.object({
  PORT: intFromEnv(3001, 1, 65535),
  RECIPES_PATH: z.string().min(1).default(join(DATA_DIR, 'recipes.json')),
  PRICES_PATH: z.string().min(1).default(join(DATA_DIR, 'prices.json')),
  PANTRY_PATH: z.string().min(1).default(join(DATA_DIR, 'pantry.json')),
  PROFILE_PATH: z.string().min(1).default(join(DATA_DIR, 'profile.json')),
  RECENT_USE_POLICY: z.enum(['relax', 'strict']).default('relax'),
  RECENT_USE_LIMIT: intFromEnv(14, 1, 365),
  HOUSEHOLD_SERVINGS: intFromEnv(2, 1, 50),
  DINNER_HOUR: intFromEnv(19, 0, 23),
  PLAN_START_DAY: intFromEnv(1, 0, 6), // 0 = Sunday
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Read configuration from the environment. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const values: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') values[key] = value.trim();
  }

  const result = configSchema.safeParse(values);
  if (!result.success) {
    const fields = result.error.issues.map(issue => issue.path.join('.'));
    throw new AppError('CONFIG_INVALID', `Invalid configuration: ${fields.join(', ')}`, {
      issues: result.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message })),
    });
  }
  return result.data;
}
