#!/usr/bin/env node
/**
 * Weekly Plan CLI
 *
 * Plans a week of dinners from the catalog, pantry and profile files and
 * prints the plan, the shopping list and (with --remind) cooking reminders.
 *
 * Usage: plan-week [--pantry file] [--recipes file] [--prices file]
 *                  [--profile file] [--profile-id id] [--week-start YYYY-MM-DD]
 *                  [--strict] [--remind] [--json]
 */

import { existsSync } from 'fs';
import dotenv from 'dotenv';
import { loadConfig } from '../backend/src/config.js';
import { isAppError } from '../backend/src/errors.js';
import { formatPlan } from '../backend/src/services/formatting.js';
import { loadPantryFromFile, PantryLedger } from '../backend/src/services/pantryLedger.js';
import { runWeeklyPlan } from '../backend/src/services/planOrchestrator.js';
import { createPriceBook, loadPriceBook } from '../backend/src/services/priceBook.js';
import { loadProfilesFromFile } from '../backend/src/services/preferenceStore.js';
import { loadCatalogFromFile } from '../backend/src/services/recipeCatalog.js';
import { buildCookingReminders, getNextWeekStart, toDateString } from '../backend/src/services/reminders.js';
import type { RecentUsePolicy } from '../backend/src/types.js';

interface CliOptions {
  pantryPath: string;
  recipesPath: string;
  pricesPath: string;
  profilePath: string;
  profileId?: string;
  weekStart?: string;
  policy: RecentUsePolicy;
  remind: boolean;
  json: boolean;
}

function parseArgs(args: string[], defaults: CliOptions): CliOptions {
  const options = { ...defaults };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--pantry' || arg === '-p') {
      options.pantryPath = args[++i];
    } else if (arg === '--recipes' || arg === '-r') {
      options.recipesPath = args[++i];
    } else if (arg === '--prices') {
      options.pricesPath = args[++i];
    } else if (arg === '--profile') {
      options.profilePath = args[++i];
    } else if (arg === '--profile-id') {
      options.profileId = args[++i];
    } else if (arg === '--week-start' || arg === '-w') {
      options.weekStart = args[++i];
    } else if (arg === '--strict') {
      options.policy = 'strict';
    } else if (arg === '--remind') {
      options.remind = true;
    } else if (arg === '--json') {
      options.json = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

function main(): void {
  dotenv.config();
  const config = loadConfig();

  const options = parseArgs(process.argv.slice(2), {
    pantryPath: config.PANTRY_PATH,
    recipesPath: config.RECIPES_PATH,
    pricesPath: config.PRICES_PATH,
    profilePath: config.PROFILE_PATH,
    policy: config.RECENT_USE_POLICY,
    remind: false,
    json: false,
  });

  const priceBook = existsSync(options.pricesPath) ? loadPriceBook(options.pricesPath) : createPriceBook({});
  const catalog = loadCatalogFromFile(options.recipesPath, priceBook);
  const pantry = existsSync(options.pantryPath) ? loadPantryFromFile(options.pantryPath) : PantryLedger.empty();

  const profiles = loadProfilesFromFile(options.profilePath, { householdServings: config.HOUSEHOLD_SERVINGS });
  const profile = options.profileId ? profiles.find(p => p.id === options.profileId) : profiles[0];
  if (!profile) {
    throw new Error(`No profile ${options.profileId ?? ''} in ${options.profilePath}`);
  }

  const weekStart = options.weekStart ?? toDateString(getNextWeekStart(new Date(), config.PLAN_START_DAY));
  console.log(`[Plan] Planning week of ${weekStart} for ${profile.id} (${pantry.size} pantry items)`);

  const plan = runWeeklyPlan(catalog, pantry, profile, {
    weekStart,
    recentUsePolicy: options.policy,
    recentUseLimit: config.RECENT_USE_LIMIT,
  });
  const reminders = options.remind ? buildCookingReminders(plan, { hour: config.DINNER_HOUR }) : [];

  if (options.json) {
    console.log(JSON.stringify({ plan, reminders }, null, 2));
  } else {
    console.log(`\n${formatPlan(plan, reminders)}`);
  }
}

try {
  main();
} catch (error) {
  if (isAppError(error)) {
    console.error(`[Plan] ${error.code}: ${error.safeMessage}`);
  } else {
    console.error(`[Plan] ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
}
