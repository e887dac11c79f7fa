/**
 * Built-in design rules and custom rule set loading.
 */

import { RuleSet, RuleDefinition } from './types';
import { RuleConfigError } from './errors';
import { ruleSetInputSchema, ruleDefinitionSchema, formatIssues } from './rule-schema';
import { compileRuleSet } from './linter';
import { defineEntry } from './refs';

// ─── Recommended Rules ──────────────────────────────────────────────────────

export const RECOMMENDED_RULES: RuleSet = Object.freeze({
  'path-kebab-case': {
    selector: 'path_segment',
    check: { type: 'pattern', pattern: '[a-z0-9]+(?:-[a-z0-9]+)*' },
    severity: 'warning',
    category: 'naming',
    message: 'Path segment "{value}" should be kebab-case',
  },
  'field-snake-case': {
    selector: 'field',
    check: { type: 'pattern', pattern: '[a-z0-9]+(?:_[a-z0-9]+)*' },
    severity: 'warning',
    category: 'naming',
    message: 'Field "{value}" should be snake_case',
  },
  'operation-id-required': {
    selector: 'operation',
    check: { type: 'presence', property: 'operationId' },
    severity: 'error',
    category: 'metadata',
    message: '{location} is missing an operationId',
  },
  'info-version-required': {
    selector: 'document',
    check: { type: 'presence', property: 'info.version' },
    severity: 'error',
    category: 'metadata',
    message: 'API version ({property}) is required',
  },
} satisfies Record<string, RuleDefinition>);

export type RuleSetBase = 'recommended' | 'none';

// ─── Loading ────────────────────────────────────────────────────────────────

/**
 * Build a RuleSet from custom rule data (e.g., the `rules` key of a config
 * file). Entries extend the base set; an entry of 'off' removes a rule.
 *
 * @throws RuleConfigError when any entry is malformed
 */
export function loadRuleSet(input: unknown, base: RuleSetBase = 'recommended'): RuleSet {
  const parsed = ruleSetInputSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new RuleConfigError('Invalid rule set', { issues: formatIssues(parsed.error) });
  }

  const rules: Record<string, RuleDefinition> = base === 'recommended' ? { ...RECOMMENDED_RULES } : {};

  for (const [id, entry] of Object.entries(parsed.data)) {
    if (entry === 'off') {
      if (!Object.hasOwn(rules, id)) {
        throw new RuleConfigError(`Cannot disable unknown rule "${id}"`, { ruleId: id });
      }
      delete rules[id];
      continue;
    }

    const definition = ruleDefinitionSchema.safeParse(entry);
    if (!definition.success) {
      throw new RuleConfigError(`Rule "${id}" is malformed`, {
        ruleId: id,
        issues: formatIssues(definition.error),
      });
    }
    defineEntry<RuleDefinition>(rules, id, definition.data);
  }

  // Surface bad patterns and properties now rather than at lint time
  compileRuleSet(rules);

  return Object.freeze(rules);
}
