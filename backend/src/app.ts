import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import { httpStatusFor, isAppError } from './errors.js';
import recipesRouter from './routes/recipes.js';
import preferencesRouter from './routes/preferences.js';
import mealPlanRouter from './routes/mealplan.js';
import type { PreferenceStore } from './services/preferenceStore.js';
import type { RecipeCatalog } from './services/recipeCatalog.js';
import type { ReminderScheduler } from './services/reminders.js';

export interface AppDependencies {
  config: AppConfig;
  catalog: RecipeCatalog;
  preferences: PreferenceStore;
  reminders?: ReminderScheduler;
}

const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (isAppError(err)) {
    res.status(httpStatusFor(err)).json({ error: err.toJSON() });
    return;
  }

  // express.json() rejects malformed bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' } });
    return;
  }

  const message = err instanceof Error ? err.message : 'Unknown error';
  console.error(`[Server] Unhandled error: ${message}`);
  res.status(500).json({ error: { code: 'INTERNAL', message: 'Internal server error' } });
};

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/recipes', recipesRouter(deps.catalog));
  app.use('/api/preferences', preferencesRouter(deps.preferences, deps.config));
  app.use('/api/meal-plan', mealPlanRouter(deps));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', recipes: deps.catalog.size, timestamp: new Date().toISOString() });
  });

  app.use(errorHandler);

  return app;
}
