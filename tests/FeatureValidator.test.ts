import * as assert from 'assert';
import { test } from 'node:test';
import { validate } from '../src/FeatureValidator';
import { Feature, ScenarioOutline } from '../src/interfaces/IFeature';
import { loadFixture } from './helpers/fixtures';

function outline(overrides: Partial<ScenarioOutline>): ScenarioOutline {
    return {
        kind: 'outline',
        name: 'Add <product>',
        description: '',
        tags: ['@cart'],
        steps: [
            { keyword: 'When', text: 'I add "<product>" to the cart' },
            { keyword: 'Then', text: 'the cart badge should show "<count>"' },
        ],
        examples: [{
            name: '',
            tags: [],
            columns: ['product', 'count'],
            rows: [{ product: 'Sauce Labs Backpack', count: '1' }],
        }],
        ...overrides,
    };
}

function feature(overrides: Partial<Feature>): Feature {
    return {
        title: 'Shopping Cart',
        description: '',
        tags: [],
        language: 'en',
        scenarios: [outline({})],
        ...overrides,
    };
}

test('the bundled feature files have no violations', () => {
    assert.deepStrictEqual(validate(loadFixture('login.feature')), []);
    assert.deepStrictEqual(validate(loadFixture('shopping.feature')), []);
});

test('reports a placeholder without a column at the step that uses it', () => {
    const violations = validate(feature({
        scenarios: [outline({
            examples: [{ name: '', tags: [], columns: ['product'], rows: [{ product: 'Sauce Labs Backpack' }] }],
        })],
    }));

    assert.deepStrictEqual(violations, [{
        kind: 'missing-column',
        message: 'Step "the cart badge should show "<count>"" references <count> but the Examples table has no "count" column',
        location: { feature: 'Shopping Cart', scenario: 0, examples: 0, step: 1 },
    }]);
});

test('reports rows missing a value and columns nothing refers to', () => {
    const violations = validate(feature({
        scenarios: [outline({
            examples: [{
                name: '',
                tags: [],
                columns: ['product', 'count', 'price'],
                rows: [{ product: 'Sauce Labs Backpack', count: '1', price: '29.99' }, { product: 'Sauce Labs Onesie', count: '1' }],
            }],
        })],
    }));

    assert.deepStrictEqual(violations.map((v) => [v.kind, v.message, v.location.row]), [
        ['missing-value', 'Examples row 2 has no value for "price"', 1],
        ['unused-column', 'Examples column "price" is not used by any step', undefined],
    ]);
});

test('a column used only by the outline name or a doc string counts as used', () => {
    const violations = validate(feature({
        scenarios: [outline({
            steps: [
                { keyword: 'When', text: 'I add "<product>" to the cart' },
                { keyword: 'Then', text: 'the page shows', argument: { kind: 'docString', content: 'Items: <count>' } },
            ],
        })],
    }));

    assert.deepStrictEqual(violations, []);
});

test('reports an outline whose Examples have no rows', () => {
    const violations = validate(feature({
        scenarios: [outline({ examples: [] })],
    }));

    assert.deepStrictEqual(violations, [{
        kind: 'missing-examples',
        message: 'Scenario outline "Add <product>" has no Examples rows',
        location: { feature: 'Shopping Cart', scenario: 0 },
    }]);
});

test('reports repeated tags, columns and scenario names and empty step lists', () => {
    const violations = validate(feature({
        tags: ['@shopping', '@shopping'],
        background: { name: '', steps: [] },
        scenarios: [
            { kind: 'scenario', name: 'Empty cart', description: '', tags: ['@cart', '@smoke', '@cart'], steps: [] },
            { kind: 'scenario', name: 'Empty cart', description: '', tags: [], steps: [{ keyword: 'Then', text: 'the cart is empty' }] },
            outline({
                examples: [{
                    name: '',
                    tags: ['@fast', '@fast'],
                    columns: ['product', 'count', 'product'],
                    rows: [{ product: 'Sauce Labs Backpack', count: '1' }],
                }],
            }),
        ],
    }));

    assert.deepStrictEqual(violations.map((v) => `${v.kind}: ${v.message}`), [
        'duplicate-tag: Feature repeats the tag @shopping',
        'empty-steps: Background has no steps',
        'duplicate-tag: Scenario "Empty cart" repeats the tag @cart',
        'empty-steps: Scenario "Empty cart" has no steps',
        'duplicate-scenario-name: Scenario "Empty cart" is declared more than once',
        'duplicate-tag: Examples repeat the tag @fast',
        'duplicate-column: Examples table repeats the column "product"',
    ]);
    assert.deepStrictEqual(violations[1].location, { feature: 'Shopping Cart', background: true });
    assert.deepStrictEqual(violations[6].location, { feature: 'Shopping Cart', scenario: 2, examples: 0 });
});
