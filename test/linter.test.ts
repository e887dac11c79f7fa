/**
 * Tests for the Rule Engine and the built-in rules
 */

import { normalize } from '../src/core/normalizer';
import { lint, compileRuleSet } from '../src/core/linter';
import { RECOMMENDED_RULES, loadRuleSet } from '../src/core/rules';
import { RuleConfigError } from '../src/core/errors';
import { RuleSet } from '../src/core/types';
import { document, object, jsonResponse, jsonBody, ordersDocument, captureError, removeIn } from './helpers';

function lintRecommended(raw: unknown) {
  return lint(normalize(raw), RECOMMENDED_RULES);
}

describe('Rule Engine', () => {
  // ─── Recommended Rules ────────────────────────────────────────────────

  describe('Recommended rules', () => {
    test('a well-designed document has no violations', () => {
      expect(lintRecommended(ordersDocument())).toEqual([]);
    });

    test('flags path segments that are not kebab-case', () => {
      const raw = document({
        '/User_Profiles': { get: { operationId: 'listProfiles', responses: { '204': { description: 'Empty' } } } },
      });
      expect(lintRecommended(raw)).toEqual([
        {
          ruleId: 'path-kebab-case',
          location: '/User_Profiles',
          severity: 'warning',
          category: 'naming',
          message: 'Path segment "User_Profiles" should be kebab-case',
        },
      ]);
    });

    test('reports a path template once, naming every bad segment', () => {
      const raw = document({ '/Foo/orders/Bar_Baz': { get: { operationId: 'listBars' } } });
      expect(lintRecommended(raw)).toEqual([
        {
          ruleId: 'path-kebab-case',
          location: '/Foo/orders/Bar_Baz',
          severity: 'warning',
          category: 'naming',
          message: 'Path segment "Foo, Bar_Baz" should be kebab-case',
        },
      ]);
    });

    test('ignores placeholder segments', () => {
      const raw = document({ '/user-profiles/{profileId}': { get: { operationId: 'getProfile' } } });
      expect(lintRecommended(raw)).toEqual([]);
    });

    test('flags response fields that are not snake_case', () => {
      const raw = document({
        '/users': {
          get: {
            operationId: 'listUsers',
            responses: {
              '200': jsonResponse(object({ id: { type: 'string' }, createdAt: { type: 'string', format: 'date-time' } })),
            },
          },
        },
      });
      expect(lintRecommended(raw)).toEqual([
        {
          ruleId: 'field-snake-case',
          location: 'GET /users.responses.200.createdAt',
          severity: 'warning',
          category: 'naming',
          message: 'Field "createdAt" should be snake_case',
        },
      ]);
    });

    test('walks nested objects, arrays and request bodies', () => {
      const line = object({ unitPrice: { type: 'number' } });
      const raw = document({
        '/orders': {
          post: {
            operationId: 'createOrder',
            requestBody: jsonBody(object({ customerId: { type: 'string' } })),
            responses: {
              '200': jsonResponse({ type: 'array', items: object({ lineItems: { type: 'array', items: line } }) }),
            },
          },
        },
      });
      expect(lintRecommended(raw).map((v) => v.location)).toEqual([
        'POST /orders.requestBody.customerId',
        'POST /orders.responses.200[].lineItems',
        'POST /orders.responses.200[].lineItems[].unitPrice',
      ]);
    });

    test('flags operations without an operationId', () => {
      const raw = document({ '/users': { get: {} } });
      expect(lintRecommended(raw)).toEqual([
        {
          ruleId: 'operation-id-required',
          location: 'GET /users',
          severity: 'error',
          category: 'metadata',
          message: 'GET /users is missing an operationId',
        },
      ]);
    });

    test('flags a missing API version at info.version', () => {
      const raw = document({});
      removeIn(raw, ['info', 'version']);
      expect(lintRecommended(raw)).toEqual([
        {
          ruleId: 'info-version-required',
          location: 'info.version',
          severity: 'error',
          category: 'metadata',
          message: 'API version (info.version) is required',
        },
      ]);
    });

    test('a blank version is treated as missing', () => {
      const raw = document({});
      removeIn(raw, ['info', 'version']);
      const blank = document({}, { info: { title: 'Orders API', version: '  ' } });
      expect(lintRecommended(blank)).toEqual(lintRecommended(raw));
    });
  });

  // ─── Evaluation ───────────────────────────────────────────────────────

  describe('Evaluation', () => {
    const messy = () =>
      document({ '/Bad_Path': { get: { responses: { '204': { description: 'Empty' } } } } }, { info: { title: 'Messy' } });

    test('reports every violation sorted by location', () => {
      expect(lintRecommended(messy()).map((v) => [v.location, v.ruleId])).toEqual([
        ['/Bad_Path', 'path-kebab-case'],
        ['GET /Bad_Path', 'operation-id-required'],
        ['info.version', 'info-version-required'],
      ]);
    });

    test('is idempotent', () => {
      const model = normalize(messy());
      expect(lint(model, RECOMMENDED_RULES)).toEqual(lint(model, RECOMMENDED_RULES));
    });

    test('an empty rule set finds nothing', () => {
      expect(lint(normalize(messy()), {})).toEqual([]);
    });

    test('breaks location ties by rule id', () => {
      const rules: RuleSet = {
        'z-summary': {
          selector: 'operation',
          check: { type: 'presence', property: 'summary' },
          severity: 'info',
          category: 'documentation',
          message: '{location} has no summary',
        },
        'a-description': {
          selector: 'operation',
          check: { type: 'presence', property: 'description' },
          severity: 'info',
          category: 'documentation',
          message: '{location} has no description',
        },
      };
      const violations = lint(normalize(document({ '/users': { get: {} } })), rules);
      expect(violations.map((v) => v.ruleId)).toEqual(['a-description', 'z-summary']);
      expect(violations.map((v) => v.message)).toEqual(['GET /users has no description', 'GET /users has no summary']);
    });
  });

  // ─── Custom Rules ─────────────────────────────────────────────────────

  describe('Custom rules', () => {
    test('membership checks on parameters', () => {
      const rules: RuleSet = {
        'no-cookie-params': {
          selector: 'parameter',
          check: { type: 'membership', property: 'in', values: ['path', 'query', 'header'] },
          severity: 'error',
          category: 'security',
          message: 'Parameter at {location} is sent as a {value}',
        },
      };
      const raw = document({
        '/session': {
          get: {
            parameters: [
              { name: 'sid', in: 'cookie' },
              { name: 'lang', in: 'query' },
            ],
          },
        },
      });
      expect(lint(normalize(raw), rules)).toEqual([
        {
          ruleId: 'no-cookie-params',
          location: 'GET /session.parameters.cookie.sid',
          severity: 'error',
          category: 'security',
          message: 'Parameter at GET /session.parameters.cookie.sid is sent as a cookie',
        },
      ]);
    });

    test('pattern checks honour flags', () => {
      const rules: RuleSet = {
        'verb-free-ids': {
          selector: 'operation',
          check: { type: 'pattern', property: 'operationId', pattern: 'list.*|get.*', flags: 'i' },
          severity: 'warning',
          category: 'naming',
          message: 'Unexpected operationId "{value}"',
        },
      };
      const raw = document({
        '/a': { get: { operationId: 'ListThings' } },
        '/b': { get: { operationId: 'fetchThings' } },
        '/c': { get: {} },
      });
      expect(lint(normalize(raw), rules).map((v) => v.message)).toEqual(['Unexpected operationId "fetchThings"']);
    });

    test('patterns must match the whole value', () => {
      const rules: RuleSet = {
        'short-segments': {
          selector: 'path_segment',
          check: { type: 'pattern', pattern: '[a-z]{1,5}' },
          severity: 'info',
          category: 'naming',
          message: 'Segment "{value}" is too long',
        },
      };
      const raw = document({ '/users/preferences': { get: { operationId: 'getPreferences' } } });
      expect(lint(normalize(raw), rules).map((v) => v.message)).toEqual(['Segment "preferences" is too long']);
    });

    test('malformed in-code rule sets fail before evaluation', () => {
      const error = captureError(
        () =>
          compileRuleSet({
            broken: {
              selector: 'field',
              check: { type: 'pattern', pattern: '([a-z' },
              severity: 'warning',
              category: 'naming',
              message: 'bad',
            },
          }),
        RuleConfigError
      );
      expect(error.ruleId).toBe('broken');
      expect(error.message).toBe('Rule "broken" has an invalid pattern');
    });

    test('a check on a property the selector does not expose is rejected', () => {
      const rules: RuleSet = {
        'field-ids': {
          selector: 'field',
          check: { type: 'presence', property: 'operationId' },
          severity: 'error',
          category: 'metadata',
          message: 'x',
        },
      };
      const error = captureError(() => lint(normalize(ordersDocument()), rules), RuleConfigError);
      expect(error.message).toBe('Rule "field-ids" checks "operationId", which field targets do not have');
      expect(error.issues).toEqual(['check.property: expected one of name']);
    });
  });
});

describe('Rule set loading', () => {
  test('defaults to the recommended rules', () => {
    expect(loadRuleSet(undefined)).toEqual(RECOMMENDED_RULES);
    expect(Object.keys(loadRuleSet({}, 'none'))).toEqual([]);
  });

  test('adds custom rules and fills in the category', () => {
    const rules = loadRuleSet(
      {
        'operation-summary': {
          selector: 'operation',
          check: { type: 'presence', property: 'summary' },
          severity: 'info',
          message: '{location} has no summary',
        },
      },
      'none'
    );
    expect(rules).toEqual({
      'operation-summary': {
        selector: 'operation',
        check: { type: 'presence', property: 'summary' },
        severity: 'info',
        category: 'custom',
        message: '{location} has no summary',
      },
    });
    expect(Object.isFrozen(rules)).toBe(true);
  });

  test('turns recommended rules off', () => {
    const rules = loadRuleSet({ 'field-snake-case': 'off', 'path-kebab-case': 'off' });
    expect(Object.keys(rules)).toEqual(['operation-id-required', 'info-version-required']);
  });

  test('refuses to turn off an unknown rule', () => {
    const error = captureError(() => loadRuleSet({ 'no-such-rule': 'off' }), RuleConfigError);
    expect(error.message).toBe('Cannot disable unknown rule "no-such-rule"');
    expect(error.ruleId).toBe('no-such-rule');
  });

  test('reports which rule is malformed and why', () => {
    const error = captureError(
      () =>
        loadRuleSet({
          'bad-rule': { selector: 'header', check: { type: 'presence', property: 'name' }, severity: 'error', message: 'x' },
        }),
      RuleConfigError
    );
    expect(error.message).toBe('Rule "bad-rule" is malformed');
    expect(error.ruleId).toBe('bad-rule');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^selector: /);
  });

  test('rejects unknown keys in a rule', () => {
    const error = captureError(
      () =>
        loadRuleSet({
          strict: {
            selector: 'field',
            check: { type: 'presence', property: 'name' },
            severity: 'error',
            message: 'x',
            level: 'high',
          },
        }),
      RuleConfigError
    );
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^\(root\): Unrecognized key/);
  });

  test('rejects a rule set that is not a mapping', () => {
    const error = captureError(() => loadRuleSet(['field-snake-case']), RuleConfigError);
    expect(error.message).toBe('Invalid rule set');
  });

  test('validates patterns when loading', () => {
    const error = captureError(
      () =>
        loadRuleSet({
          broken: { selector: 'field', check: { type: 'pattern', pattern: '(' }, severity: 'warning', message: 'x' },
        }),
      RuleConfigError
    );
    expect(error.ruleId).toBe('broken');
  });
});
