import * as assert from 'assert';
import { test } from 'node:test';
import { GherkinFeatureParser } from '../src/GherkinFeatureParser';
import { FeatureParseError, FeatureSyntaxError, StructureError } from '../src/errors';
import { parse } from '../src/FeatureModel';
import { readFixture } from './helpers/fixtures';

const parser = new GherkinFeatureParser();

function parseError(text: string, uri?: string): FeatureParseError {
    try {
        parser.parse(text, uri);
    } catch (err) {
        if (err instanceof FeatureParseError) {
            return err;
        }
        throw err;
    }
    throw new Error('expected the text to be rejected');
}

test('parses the login feature', () => {
    const feature = parse(readFixture('login.feature'), 'features/login.feature');

    assert.strictEqual(feature.title, 'User Login');
    assert.strictEqual(feature.language, 'en');
    assert.deepStrictEqual(feature.tags, []);
    assert.deepStrictEqual(feature.background, {
        name: '',
        steps: [{ keyword: 'Given', text: 'I am on the login page' }],
    });
    assert.strictEqual(feature.scenarios.length, 6);
    assert.deepStrictEqual(feature.scenarios[0], {
        kind: 'scenario',
        name: 'Successful login with valid credentials',
        description: '',
        tags: ['@smoke', '@login'],
        steps: [
            { keyword: 'When', text: 'I enter valid credentials' },
            { keyword: 'Then', text: 'I should be redirected to the home page' },
            { keyword: 'And', text: 'I should see the product inventory' },
        ],
    });

    const outline = feature.scenarios[5];
    assert.strictEqual(outline.kind, 'outline');
    if (outline.kind === 'outline') {
        assert.deepStrictEqual(outline.examples, [{
            name: '',
            tags: [],
            columns: ['username', 'password', 'result'],
            rows: [
                { username: 'standard_user', password: 'secret_sauce', result: 'success' },
                { username: 'locked_out_user', password: 'secret_sauce', result: 'locked_out' },
                { username: 'invalid_user', password: 'secret_sauce', result: 'invalid_credentials' },
            ],
        }]);
    }
});

test('keeps data tables and feature tags from the shopping feature', () => {
    const feature = parser.parse(readFixture('shopping.feature'));

    assert.deepStrictEqual(feature.tags, ['@shopping']);
    assert.strictEqual(feature.background?.steps.length, 2);
    assert.deepStrictEqual(feature.scenarios[1].steps[0].argument, {
        kind: 'dataTable',
        rows: [['Sauce Labs Backpack'], ['Sauce Labs Bike Light'], ['Sauce Labs Bolt T-Shirt']],
    });
});

test('a Scenario with Examples is an outline', () => {
    const feature = parser.parse([
        'Feature: Cart',
        '  Scenario: Badge',
        '    Then the cart badge should show "<count>"',
        '',
        '    @single',
        '    Examples: one item',
        '      | count |',
        '      | 1     |',
    ].join('\n'));

    assert.deepStrictEqual(feature.scenarios[0], {
        kind: 'outline',
        name: 'Badge',
        description: '',
        tags: [],
        steps: [{ keyword: 'Then', text: 'the cart badge should show "<count>"' }],
        examples: [{ name: 'one item', tags: ['@single'], columns: ['count'], rows: [{ count: '1' }] }],
    });
});

test('keeps doc strings with their media type and the * keyword', () => {
    const feature = parser.parse([
        'Feature: API',
        '  Scenario: Payload',
        '    * the request body is',
        '      """json',
        '      {"sku": "backpack"}',
        '      """',
        '    Then the response is',
        '      """',
        '      ok',
        '      """',
    ].join('\n'));

    assert.deepStrictEqual(feature.scenarios[0].steps, [
        { keyword: '*', text: 'the request body is', argument: { kind: 'docString', content: '{"sku": "backpack"}', mediaType: 'json' } },
        { keyword: 'Then', text: 'the response is', argument: { kind: 'docString', content: 'ok' } },
    ]);
});

test('maps localized keywords to their English equivalents', () => {
    const feature = parser.parse([
        '# language: fr',
        'Fonctionnalité: Panier',
        '  Scénario: Ajouter un produit',
        '    Soit un panier vide',
        '    Et un produit',
    ].join('\n'));

    assert.strictEqual(feature.language, 'fr');
    assert.strictEqual(feature.title, 'Panier');
    assert.deepStrictEqual(feature.scenarios[0].steps.map((s) => s.keyword), ['Given', 'And']);
});

test('empty text has no Feature line', () => {
    const err = parseError('', 'features/empty.feature');

    assert.ok(err instanceof FeatureSyntaxError);
    assert.strictEqual(err.reason, "expected a 'Feature:' line");
    assert.strictEqual(err.message, "features/empty.feature (1:1): expected a 'Feature:' line");
});

test('a scenario before the Feature line is a syntax error on line 1', () => {
    const err = parseError('Scenario: x\n  Given a step\n');

    assert.ok(err instanceof FeatureSyntaxError);
    assert.strictEqual(err.line, 1);
    assert.match(err.reason, /^expected: .*got 'Scenario: x'$/);
});

test('a feature without scenarios is a syntax error', () => {
    const err = parseError('Feature: Empty\n');

    assert.ok(err instanceof FeatureSyntaxError);
    assert.strictEqual(err.line, 1);
    assert.strictEqual(err.reason, `feature "Empty" has no 'Scenario:' or 'Scenario Outline:'`);
});

test('a ragged table is a syntax error at the offending row', () => {
    const err = parseError([
        'Feature: Cart',
        '  Scenario: Add products',
        '    When I add the following products to the cart:',
        '      | Sauce Labs Backpack | 1 |',
        '      | Sauce Labs Onesie |',
    ].join('\n'));

    assert.ok(err instanceof FeatureSyntaxError);
    assert.strictEqual(err.line, 5);
    assert.strictEqual(err.reason, 'inconsistent cell count within the table');
});

test('an outline without Examples is a structure error', () => {
    const err = parseError([
        'Feature: Cart',
        '  Scenario Outline: Add <product>',
        '    When I add "<product>" to the cart',
    ].join('\n'));

    assert.ok(err instanceof StructureError);
    assert.strictEqual(err.line, 2);
    assert.strictEqual(err.reason, 'Scenario outline "Add <product>" has no Examples rows');
});

test('a placeholder without a column is a structure error at the Examples line', () => {
    const err = parseError([
        'Feature: Login',
        '  Scenario Outline: Login',
        '    When I login with "<username>" and "<password>"',
        '',
        '    Examples:',
        '      | username      |',
        '      | standard_user |',
    ].join('\n'), 'features/login.feature');

    assert.ok(err instanceof StructureError);
    assert.strictEqual(err.line, 5);
    assert.strictEqual(err.uri, 'features/login.feature');
    assert.strictEqual(
        err.reason,
        'Scenario outline "Login" references <password> but the Examples table has no "password" column'
    );
});

test('a repeated Examples column is a structure error at the header', () => {
    const err = parseError([
        'Feature: Cart',
        '  Scenario Outline: Add <product>',
        '    When I add "<product>" to the cart',
        '',
        '    Examples:',
        '      | product | product |',
        '      | a       | b       |',
    ].join('\n'));

    assert.ok(err instanceof StructureError);
    assert.strictEqual(err.line, 6);
    assert.strictEqual(err.reason, 'Examples table repeats the column "product"');
});

test('Rule blocks are rejected', () => {
    const err = parseError([
        'Feature: Cart',
        '  Rule: Badges',
        '    Scenario: Badge',
        '      Then the cart badge should show "1"',
    ].join('\n'));

    assert.ok(err instanceof StructureError);
    assert.strictEqual(err.line, 2);
});
