/**
 * Rule Engine
 *
 * Evaluates a RuleSet against one SpecModel. Rules are data: a selector
 * names the locations to visit, a check decides whether each one passes.
 * Every selected location is visited once per rule; evaluation never stops
 * at the first failure.
 */

import {
  SpecModel,
  SchemaNode,
  RuleSet,
  RuleDefinition,
  RuleSelector,
  RuleViolation,
  HTTP_METHODS,
} from './types';
import { RuleConfigError } from './errors';
import { ruleDefinitionSchema, formatIssues } from './rule-schema';

// ─── Targets ────────────────────────────────────────────────────────────────

type Attributes = Readonly<Record<string, string | undefined>>;

/** A visited location. A path template carries one attribute set per literal segment. */
interface LintTarget {
  location: string;
  attributes: readonly Attributes[];
}

/** Attributes each selector exposes to checks */
const SELECTOR_ATTRIBUTES: Record<RuleSelector, readonly string[]> = {
  path_segment: ['name', 'path'],
  field: ['name'],
  parameter: ['name', 'in'],
  operation: ['method', 'path', 'operationId', 'summary', 'description', 'tags'],
  document: ['openapi', 'info.title', 'info.version'],
};

function walkFields(node: SchemaNode, location: string, out: LintTarget[]): void {
  switch (node.kind) {
    case 'object':
      for (const [name, child] of Object.entries(node.properties)) {
        const at = `${location}.${name}`;
        out.push({ location: at, attributes: [{ name }] });
        walkFields(child, at, out);
      }
      break;
    case 'array':
      walkFields(node.items, `${location}[]`, out);
      break;
    case 'scalar':
      break;
  }
}

function collectTargets(model: SpecModel, selector: RuleSelector): LintTarget[] {
  const targets: LintTarget[] = [];

  if (selector === 'document') {
    targets.push({
      location: '(document)',
      attributes: [{ openapi: model.openapi, 'info.title': model.title, 'info.version': model.version }],
    });
    return targets;
  }

  for (const item of Object.values(model.paths)) {
    if (selector === 'path_segment') {
      const segments = item.path.split('/').filter((segment) => segment !== '' && !segment.includes('{'));
      if (segments.length > 0) {
        targets.push({ location: item.path, attributes: segments.map((name) => ({ name, path: item.path })) });
      }
      continue;
    }

    for (const method of HTTP_METHODS) {
      const operation = item.operations[method];
      if (!operation) continue;
      const location = `${method.toUpperCase()} ${item.path}`;

      switch (selector) {
        case 'operation':
          targets.push({
            location,
            attributes: [
              {
                method,
                path: item.path,
                operationId: operation.operationId,
                summary: operation.summary,
                description: operation.description,
                tags: operation.tags.length > 0 ? operation.tags.join(',') : undefined,
              },
            ],
          });
          break;
        case 'parameter':
          for (const param of operation.parameters) {
            targets.push({
              location: `${location}.parameters.${param.in}.${param.name}`,
              attributes: [{ name: param.name, in: param.in }],
            });
          }
          break;
        case 'field':
          if (operation.requestBody) {
            walkFields(operation.requestBody.schema, `${location}.requestBody`, targets);
          }
          for (const status of Object.keys(operation.responses).sort()) {
            const body = operation.responses[status];
            if (body) walkFields(body, `${location}.responses.${status}`, targets);
          }
          break;
      }
    }
  }

  return targets;
}

// ─── Compilation ────────────────────────────────────────────────────────────

export interface CompiledRule {
  id: string;
  definition: RuleDefinition;
  property: string;

  /** True when the value passes the check */
  test(value: string | undefined): boolean;
}

function compileRule(id: string, input: unknown): CompiledRule {
  const parsed = ruleDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new RuleConfigError(`Rule "${id}" is malformed`, {
      ruleId: id,
      issues: formatIssues(parsed.error),
    });
  }

  const definition: RuleDefinition = parsed.data;
  const { check, selector } = definition;
  const property = check.property ?? 'name';

  if (!SELECTOR_ATTRIBUTES[selector].includes(property)) {
    throw new RuleConfigError(`Rule "${id}" checks "${property}", which ${selector} targets do not have`, {
      ruleId: id,
      issues: [`check.property: expected one of ${SELECTOR_ATTRIBUTES[selector].join(', ')}`],
    });
  }

  switch (check.type) {
    case 'pattern': {
      let regex: RegExp;
      try {
        regex = new RegExp(`^(?:${check.pattern})$`, check.flags);
      } catch (error) {
        throw new RuleConfigError(`Rule "${id}" has an invalid pattern`, {
          ruleId: id,
          issues: [error instanceof Error ? error.message : String(error)],
          cause: error,
        });
      }
      return { id, definition, property, test: (value) => value === undefined || regex.test(value) };
    }
    case 'membership': {
      const allowed = new Set(check.values);
      return { id, definition, property, test: (value) => value === undefined || allowed.has(value) };
    }
    case 'presence':
      return { id, definition, property, test: (value) => value !== undefined && value.trim() !== '' };
  }
}

/**
 * Validate and compile a whole rule set. Throws before anything is evaluated.
 *
 * @throws RuleConfigError
 */
export function compileRuleSet(ruleSet: RuleSet): CompiledRule[] {
  return Object.entries(ruleSet).map(([id, definition]) => compileRule(id, definition));
}

// ─── Evaluation ─────────────────────────────────────────────────────────────

function renderMessage(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(value|location|property)\}/g, (placeholder: string, key: string) =>
    Object.hasOwn(vars, key) ? vars[key] : placeholder
  );
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Lint a model against a rule set. Violations are sorted by location,
 * then rule id.
 *
 * @throws RuleConfigError when the rule set is malformed
 */
export function lint(model: SpecModel, ruleSet: RuleSet): RuleViolation[] {
  const rules = compileRuleSet(ruleSet);
  const targetCache = new Map<RuleSelector, LintTarget[]>();
  const violations: RuleViolation[] = [];

  for (const rule of rules) {
    const { selector, severity, category, message } = rule.definition;

    let targets = targetCache.get(selector);
    if (!targets) {
      targets = collectTargets(model, selector);
      targetCache.set(selector, targets);
    }

    for (const target of targets) {
      const failing = new Set<string>();
      for (const attributes of target.attributes) {
        const candidate = attributes[rule.property];
        if (!rule.test(candidate)) failing.add(candidate ?? '');
      }
      if (failing.size === 0) continue;
      const value = [...failing].join(', ');

      // Document-level findings point at the property that failed
      const location = selector === 'document' ? rule.property : target.location;
      violations.push({
        ruleId: rule.id,
        location,
        severity,
        category,
        message: renderMessage(message, { value, location, property: rule.property }),
      });
    }
  }

  return violations.sort((a, b) => compareText(a.location, b.location) || compareText(a.ruleId, b.ruleId));
}
