/**
 * Configuration loading
 *
 * A config file (JSON or YAML) customises the rule set, the diff severity
 * filter, which lint severities block, and the score weights:
 *
 *   extends: recommended          # or 'none'
 *   rules:
 *     field-snake-case: off
 *     operation-summary:
 *       selector: operation
 *       check: { type: presence, property: summary }
 *       severity: warning
 *       category: documentation
 *       message: "{location} has no summary"
 *   minSeverity: deprecation
 *   blockingSeverities: [error]
 *   weights: { error: 15 }
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { GuardOptions } from './core/types';
import { RuleConfigError } from './core/errors';
import { ruleSetInputSchema, ruleSeveritySchema, formatIssues } from './core/rule-schema';
import { loadRuleSet } from './core/rules';
import { loadDocument } from './formats';

export const CONFIG_FILE_NAMES = [
  '.contractguardrc.json',
  '.contractguardrc.yaml',
  '.contractguardrc.yml',
  'contract-guard.config.json',
] as const;

const weightSchema = z.number().nonnegative();

export const configFileSchema = z
  .object({
    extends: z.enum(['recommended', 'none']).default('recommended'),
    rules: ruleSetInputSchema.default({}),
    minSeverity: z.enum(['breaking', 'deprecation', 'compatible']).optional(),
    blockingSeverities: z.array(ruleSeveritySchema).optional(),
    weights: z
      .object({ error: weightSchema, warning: weightSchema, info: weightSchema })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.input<typeof configFileSchema>;

/**
 * Turn raw config data into GuardOptions.
 *
 * @throws RuleConfigError
 */
export function parseConfig(raw: unknown, source = '(config)'): GuardOptions {
  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new RuleConfigError(`Invalid configuration in ${source}`, {
      issues: formatIssues(parsed.error),
    });
  }

  const { extends: base, rules, minSeverity, blockingSeverities, weights } = parsed.data;
  return {
    rules: loadRuleSet(rules, base),
    minSeverity,
    blockingSeverities,
    weights,
  };
}

/**
 * Find the first known config file in a directory.
 */
export function findConfigFile(cwd: string = process.cwd()): string | undefined {
  return CONFIG_FILE_NAMES.map((name) => path.join(cwd, name)).find((file) => fs.existsSync(file));
}

/**
 * Load GuardOptions from an explicit path, or from a discovered config file.
 * Returns empty options when there is none.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): GuardOptions {
  const file = configPath ? path.resolve(cwd, configPath) : findConfigFile(cwd);
  if (!file) return {};

  let raw: unknown;
  try {
    raw = loadDocument(file);
  } catch (error) {
    throw new RuleConfigError(`Unable to load configuration from ${file}`, {
      issues: [error instanceof Error ? error.message : String(error)],
      cause: error,
    });
  }

  return parseConfig(raw, file);
}
