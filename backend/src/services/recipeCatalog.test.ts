import { describe, it } from 'node:test';
import assert from 'node:assert';
import { fileURLToPath } from 'url';
import { makeRecipe } from '../__fixtures__/recipes.js';
import { AppError } from '../errors.js';
import { costOf, createPriceBook, loadPriceBook, resolvePrice } from './priceBook.js';
import { toMeasure } from './ingredients.js';
import { estimateRecipeCost, loadCatalogFromFile, RecipeCatalog, toRecipe } from './recipeCatalog.js';

const dataFile = (name: string) => fileURLToPath(new URL(`../../data/${name}`, import.meta.url));

const prices = createPriceBook({
  rice: { unit: 'cups', unitPrice: 0.6 },
  onion: { unit: 'pcs', unitPrice: 0.8 },
});

function sampleCatalog(): RecipeCatalog {
  return RecipeCatalog.fromRecipes(
    [
      makeRecipe('tacos', [['black beans', 1, 'can'], ['onion', 1, 'pcs']], {
        title: 'Bean Tacos',
        cuisine: 'Mexican',
        dietaryFlags: ['Vegetarian'],
        prepTimeMinutes: 20,
      }),
      makeRecipe('fried-rice', [['rice', 1, 'cup'], ['eggs', 2, 'pcs']], {
        title: 'Fried Rice',
        cuisine: 'chinese',
        dietaryFlags: ['vegetarian', 'dairy-free'],
        prepTimeMinutes: 25,
      }),
      makeRecipe('chili', [['ground beef', 1, 'lb'], ['onion', 1, 'pcs']], {
        title: 'Chili',
        cuisine: 'american',
        prepTimeMinutes: 60,
      }),
    ],
    prices,
  );
}

describe('toRecipe', () => {
  it('normalizes names, units and tags', () => {
    const recipe = toRecipe({
      id: 'soup',
      title: 'Soup',
      servings: 4,
      ingredients: [{ name: 'Onions, diced', unit: 'Cups', quantity: 1 }],
      cuisine: 'French',
      dietaryFlags: ['Vegan'],
      prepTimeMinutes: null,
      tags: ['Cozy'],
    });

    assert.deepStrictEqual(recipe.requirements[0].ingredient, { name: 'yellow onion', unit: 'cup', category: 'produce' });
    assert.deepStrictEqual(recipe.tags, { cuisine: 'french', dietaryFlags: ['vegan'], prepTimeMinutes: null, labels: ['cozy'] });
    assert.ok(Object.isFrozen(recipe.requirements[0].ingredient));
  });
});

describe('RecipeCatalog', () => {
  it('rejects duplicate recipe ids', () => {
    const recipe = makeRecipe('dup', [['rice', 1, 'cup']]);
    assert.throws(
      () => RecipeCatalog.fromRecipes([recipe, recipe]),
      (error: unknown) => error instanceof AppError && error.code === 'VALIDATION_ERROR',
    );
  });

  it('looks recipes up by id', () => {
    const catalog = sampleCatalog();
    assert.strictEqual(catalog.size, 3);
    assert.strictEqual(catalog.get('chili')?.title, 'Chili');
    assert.strictEqual(catalog.get('missing'), undefined);
  });

  it('filters searches', () => {
    const catalog = sampleCatalog();
    const ids = (options: Parameters<RecipeCatalog['search']>[0]) => catalog.search(options).map(r => r.id);

    assert.deepStrictEqual(ids({ cuisines: ['mex'] }), ['tacos']);
    assert.deepStrictEqual(ids({ dietaryFlags: ['vegetarian'] }), ['tacos', 'fried-rice']);
    assert.deepStrictEqual(ids({ maxPrepTime: 30 }), ['tacos', 'fried-rice']);
    assert.deepStrictEqual(ids({ excludeIngredients: ['onion'] }), ['fried-rice']);
    assert.deepStrictEqual(ids({ searchText: 'rice' }), ['fried-rice']);
    assert.deepStrictEqual(ids({ limit: 1, offset: 1 }), ['fried-rice']);
  });

  it('counts cuisines and dietary flags', () => {
    assert.deepStrictEqual(sampleCatalog().stats(), {
      total: 3,
      cuisines: { mexican: 1, chinese: 1, american: 1 },
      dietaryFlags: { vegetarian: 2, 'dairy-free': 1 },
    });
  });

  it('estimates cost from reference prices, scaled to servings', () => {
    const catalog = sampleCatalog();
    // rice 1 cup at 0.60; eggs have no price
    assert.strictEqual(catalog.estimatedCost('fried-rice'), 0.6);
    assert.strictEqual(catalog.estimatedCost('fried-rice', 4), 1.2);
    assert.throws(
      () => catalog.estimatedCost('missing'),
      (error: unknown) => error instanceof AppError && error.code === 'NOT_FOUND',
    );
  });
});

describe('estimateRecipeCost', () => {
  it('sums priced requirements', () => {
    const recipe = makeRecipe('bowl', [['rice', 1, 'cup'], ['onion', 2, 'pcs']]);
    assert.strictEqual(estimateRecipeCost(recipe, prices), 2.2);
    assert.strictEqual(estimateRecipeCost(recipe, prices, 4), 4.4);
  });
});

describe('price book', () => {
  it('prefers the price book over the ingredient price', () => {
    assert.deepStrictEqual(resolvePrice({ name: 'rice', unit: 'g', unitPrice: 0.01 }, prices), { unit: 'cup', unitPrice: 0.6 });
    assert.deepStrictEqual(resolvePrice({ name: 'pesto', unit: 'jars', unitPrice: 4 }, prices), { unit: 'jar', unitPrice: 4 });
    assert.strictEqual(resolvePrice({ name: 'pesto', unit: 'jar' }, prices), null);
  });

  it('prices an amount only in a unit it converts to', () => {
    assert.strictEqual(costOf(toMeasure('rice', 370, 'g'), { unit: 'cup', unitPrice: 0.6 }), 1.2);
    assert.strictEqual(costOf(toMeasure('garlic', 2, 'clove'), { unit: 'g', unitPrice: 0.01 }), null);
    assert.strictEqual(costOf(toMeasure('garlic', 2, 'clove'), null), null);
  });
});

describe('loading from files', () => {
  it('loads the sample catalog and prices', () => {
    const priceBook = loadPriceBook(dataFile('prices.json'));
    const catalog = loadCatalogFromFile(dataFile('recipes.json'), priceBook);

    assert.strictEqual(catalog.size, 15);
    assert.strictEqual(catalog.get('chickpea-curry')?.requirements[0].ingredient.name, 'canned chickpeas');
    assert.deepStrictEqual(priceBook.get('long-grain rice'), { unit: 'cup', unitPrice: 0.6 });
  });

  it('reports a missing catalog file', () => {
    assert.throws(
      () => loadCatalogFromFile(dataFile('no-such-file.json')),
      (error: unknown) => error instanceof AppError && error.code === 'NOT_FOUND',
    );
  });
});
