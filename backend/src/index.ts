import { existsSync } from 'fs';
import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createPriceBook, loadPriceBook } from './services/priceBook.js';
import { InMemoryPreferenceStore, loadProfilesFromFile } from './services/preferenceStore.js';
import { loadCatalogFromFile } from './services/recipeCatalog.js';
import { LoggingReminderScheduler } from './services/reminders.js';

dotenv.config();

const config = loadConfig();
const priceBook = existsSync(config.PRICES_PATH) ? loadPriceBook(config.PRICES_PATH) : createPriceBook({});
const catalog = loadCatalogFromFile(config.RECIPES_PATH, priceBook);

const profiles = existsSync(config.PROFILE_PATH)
  ? loadProfilesFromFile(config.PROFILE_PATH, { householdServings: config.HOUSEHOLD_SERVINGS })
  : [];
const preferences = new InMemoryPreferenceStore(profiles, config.RECENT_USE_LIMIT);

const app = createApp({ config, catalog, preferences, reminders: new LoggingReminderScheduler() });

app.listen(config.PORT, () => {
  console.log(`[Server] Dinner planner API running on http://localhost:${config.PORT}`);
  console.log(`[Server] ${catalog.size} recipes, ${profiles.length} stored profiles`);
});
