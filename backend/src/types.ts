// Shared types for the planning engine and the API around it

// ============================================================================
// Ingredients
// ============================================================================

export type IngredientCategory =
  | 'protein'
  | 'produce'
  | 'dairy'
  | 'grains'
  | 'canned'
  | 'condiment'
  | 'spice'
  | 'baking'
  | 'frozen'
  | 'beverage'
  | 'other';

export interface Ingredient {
  name: string;
  unit: string;
  category?: IngredientCategory;
  unitPrice?: number; // price for one `unit`
}

/**
 * An amount of one canonical ingredient, expressed in its storage unit.
 * Mass is kept in grams, volume in millilitres, anything else in its own unit.
 */
export interface Measure {
  key: string;          // "all-purpose flour|g"
  name: string;         // canonical name
  storageUnit: string;  // "g", "ml", "pcs", "clove", ...
  amount: number;
}

export interface ReferencePrice {
  unit: string;
  unitPrice: number;
}

export type PriceBook = ReadonlyMap<string, ReferencePrice>;

// ============================================================================
// Recipes
// ============================================================================

export interface RecipeRequirement {
  ingredient: Ingredient;
  quantity: number;
}

export interface RecipeTags {
  cuisine: string | null;
  dietaryFlags: readonly string[];
  prepTimeMinutes: number | null;
  labels: readonly string[];
}

export interface Recipe {
  id: string;
  title: string;
  servings: number;
  requirements: readonly RecipeRequirement[];
  tags: RecipeTags;
}

export interface RecipeSearchOptions {
  cuisines?: string[];
  dietaryFlags?: string[];
  maxPrepTime?: number;
  excludeIngredients?: string[];
  searchText?: string;
  limit?: number;
  offset?: number;
}

// ============================================================================
// Pantry & preferences
// ============================================================================

export interface PantryEntry {
  ingredient: Ingredient;
  quantity: number;
}

export type RecentUsePolicy = 'relax' | 'strict';

export interface PreferenceProfile {
  id: string;
  dislikedIngredients: readonly string[];
  dislikedTags: readonly string[];
  dietaryConstraints: readonly string[];
  recentRecipeIds: readonly string[];
  householdServings: number;
  maxPrepTimeMinutes: number | null;
  weeklyBudget: number | null;
}

export interface RecentUseUpdate {
  profileId: string;
  recipeIds: string[];
}

// ============================================================================
// Planning output
// ============================================================================

export type Degradation =
  | { code: 'RECENT_USE_RELAXED'; message: string; recipeIds: string[] }
  | { code: 'RECIPE_REPEATED'; message: string; recipeIds: string[] }
  | { code: 'PURCHASE_ROUNDED'; message: string; ingredient: string; from: number; to: number; unit: string }
  | { code: 'UNPRICED_INGREDIENT'; message: string; ingredient: string }
  | { code: 'UNRECONCILED_UNITS'; message: string; ingredient: string; units: string[] }
  | { code: 'OVER_BUDGET'; message: string; budget: number; totalCost: number };

export type DegradationCode = Degradation['code'];

export interface RankedRecipe {
  recipe: Recipe;
  pantryAffinity: number;
  estimatedCost: number;
  recentlyUsed: boolean;
}

export interface GeneratedPlan {
  selections: Recipe[];
  ranking: RankedRecipe[];
  degradations: Degradation[];
}

export interface MealSlot {
  dayIndex: number;
  date: string | null; // YYYY-MM-DD when the run has a week start
  recipe: Recipe;
  pantryAffinity: number;
}

export interface ShoppingListItem {
  ingredient: string;
  category: IngredientCategory;
  unit: string;
  totalRequired: number;
  onHand: number;
  deficit: number;
  unitPrice: number | null;
  estimatedCost: number;
  recipeIds: string[];
}

export interface ShoppingListResult {
  items: ShoppingListItem[];
  totalCost: number;
  degradations: Degradation[];
}

export interface WeeklyPlanArtifact {
  profileId: string;
  weekStart: string | null;
  slots: MealSlot[];
  shoppingList: ShoppingListItem[];
  totalCost: number;
  degradations: Degradation[];
}

// ============================================================================
// Reminders
// ============================================================================

export interface CookingReminder {
  dayIndex: number;
  recipeId: string;
  title: string;
  startsAt: string; // ISO timestamp of the reminder
  dinnerAt: string; // ISO timestamp of dinner
  notes: string;
}
