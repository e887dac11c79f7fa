/**
 * Validation schemas for rule definitions supplied as data
 * (config files, or RuleSets built in code).
 */

import { z } from 'zod';

export const ruleSelectorSchema = z.enum(['path_segment', 'field', 'parameter', 'operation', 'document']);

export const ruleSeveritySchema = z.enum(['error', 'warning', 'info']);

const propertySchema = z.string().min(1);

export const ruleCheckSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('pattern'),
      pattern: z.string().min(1),
      flags: z
        .string()
        .regex(/^[imsu]*$/, 'only the i, m, s and u flags are allowed')
        .optional(),
      property: propertySchema.optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('membership'),
      values: z.array(z.string()).min(1),
      property: propertySchema.optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('presence'),
      property: propertySchema,
    })
    .strict(),
]);

export const ruleDefinitionSchema = z
  .object({
    selector: ruleSelectorSchema,
    check: ruleCheckSchema,
    severity: ruleSeveritySchema,
    category: z.string().min(1).default('custom'),
    message: z.string().min(1),
  })
  .strict();

/**
 * Custom rules keyed by id. Each value is a rule definition, or 'off' to
 * disable a rule; entries are validated one by one so issues name the rule.
 */
export const ruleSetInputSchema = z.record(z.string().min(1), z.unknown());

export type RuleSetInput = Record<string, z.input<typeof ruleDefinitionSchema> | 'off'>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
