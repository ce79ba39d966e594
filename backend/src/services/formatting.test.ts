import { describe, it } from 'node:test';
import assert from 'node:assert';
import { makeProfile, vegetarianScenarioCatalog } from '../__fixtures__/recipes.js';
import type { ShoppingListItem } from '../types.js';
import { formatPlan, formatQuantity, formatShoppingLine } from './formatting.js';
import { PantryLedger } from './pantryLedger.js';
import { runWeeklyPlan } from './planOrchestrator.js';

const riceLine: ShoppingListItem = {
  ingredient: 'long-grain rice',
  category: 'grains',
  unit: 'cup',
  totalRequired: 4,
  onHand: 2,
  deficit: 2,
  unitPrice: 0.6,
  estimatedCost: 1.2,
  recipeIds: ['a', 'b'],
};

describe('formatQuantity', () => {
  it('shows common fractions', () => {
    assert.strictEqual(formatQuantity(0.5), '1/2');
    assert.strictEqual(formatQuantity(1.333), '1 1/3');
    assert.strictEqual(formatQuantity(2), '2');
  });

  it('falls back to one decimal', () => {
    assert.strictEqual(formatQuantity(0.4), '0.4');
    assert.strictEqual(formatQuantity(null), '');
  });
});

describe('formatShoppingLine', () => {
  it('prints the deficit and cost', () => {
    assert.strictEqual(formatShoppingLine(riceLine), 'long-grain rice: 2 cup ($1.20)');
    assert.strictEqual(
      formatShoppingLine({ ...riceLine, ingredient: 'leek', unit: 'pcs', deficit: 1, unitPrice: null, estimatedCost: 0 }),
      'leek: 1 pcs (unpriced)',
    );
  });
});

describe('formatPlan', () => {
  it('lists the nights, the shopping list and the total', () => {
    const artifact = runWeeklyPlan(
      vegetarianScenarioCatalog(),
      PantryLedger.fromEntries([{ ingredient: { name: 'rice', unit: 'cup' }, quantity: 2 }]),
      makeProfile({ dietaryConstraints: ['vegetarian'] }),
      { weekStart: '2026-01-05' },
    );
    const lines = formatPlan(artifact).split('\n');

    assert.strictEqual(lines[0], 'Weekly plan for test-household');
    assert.strictEqual(lines[2], 'Monday 2026-01-05: veg-rice-bowl (100% from pantry)');
    assert.strictEqual(lines[8], 'Sunday 2026-01-11: veg-rice-pilaf (0% from pantry)');
    assert.ok(lines.includes('  - long-grain rice: 2 cup ($1.20)'));
    assert.ok(lines.includes('Total: $1.20'));
    assert.ok(lines.includes('  * No reference price for leek; counted as 0'));
  });
});
