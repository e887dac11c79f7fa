/**
 * Canonical model definitions for openapi-contract-guard.
 * Every document is normalized into these types before it is diffed or linted.
 */

// ─── Schema Nodes ───────────────────────────────────────────────────────────

export type PrimitiveType = 'string' | 'number' | 'integer' | 'boolean' | 'null' | 'any';

export interface ScalarNode {
  readonly kind: 'scalar';

  /** Primitive type; 'any' when the schema declares no type */
  readonly type: PrimitiveType;

  /** Format qualifier (e.g., 'int32', 'date-time', 'uuid') */
  readonly format?: string;
}

export interface ObjectNode {
  readonly kind: 'object';

  /** Child fields in document order */
  readonly properties: Readonly<Record<string, SchemaNode>>;

  /** Names of required fields (set semantics) */
  readonly required: readonly string[];
}

export interface ArrayNode {
  readonly kind: 'array';
  readonly items: SchemaNode;
}

export type SchemaNode = ScalarNode | ObjectNode | ArrayNode;

// ─── Operations ─────────────────────────────────────────────────────────────

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie';

export const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface Parameter {
  readonly name: string;
  readonly in: ParameterLocation;
  readonly required: boolean;
  readonly deprecated: boolean;
  readonly schema: SchemaNode;
}

export interface RequestBody {
  readonly required: boolean;
  readonly schema: SchemaNode;
}

export interface Operation {
  readonly method: HttpMethod;
  readonly operationId?: string;
  readonly summary?: string;
  readonly description?: string;
  readonly tags: readonly string[];
  readonly deprecated: boolean;

  /** Unique by (name, in); path-level parameters already merged in */
  readonly parameters: readonly Parameter[];

  readonly requestBody?: RequestBody;

  /** Status code → response body schema, null when the response has no body */
  readonly responses: Readonly<Record<string, SchemaNode | null>>;
}

export interface PathItem {
  /** Template exactly as written (e.g., '/orders/{id}') */
  readonly path: string;

  /** Placeholder names in template order */
  readonly placeholders: readonly string[];

  readonly operations: Readonly<Partial<Record<HttpMethod, Operation>>>;
}

export interface SpecModel {
  /** The declared `openapi` or `swagger` version string */
  readonly openapi: string;
  readonly title?: string;
  readonly version?: string;
  readonly paths: Readonly<Record<string, PathItem>>;
}

// ─── Diff Output ────────────────────────────────────────────────────────────

export type ChangeSeverity = 'breaking' | 'deprecation' | 'compatible';

export type ChangeKind =
  | 'added'
  | 'removed'
  | 'type_changed'
  | 'requiredness_changed'
  | 'deprecated'
  | 'metadata_changed';

export interface ChangeRecord {
  /** Where the change happened (e.g., 'POST /orders/{id}.requestBody.amount') */
  location: string;
  kind: ChangeKind;
  severity: ChangeSeverity;

  /** Human-readable description of the change */
  message: string;
}

export interface DiffReport {
  changes: ChangeRecord[];
  summary: {
    breaking: number;
    deprecation: number;
    compatible: number;
    total: number;
  };
  hasBreakingChanges: boolean;
}

// ─── Rules ──────────────────────────────────────────────────────────────────

export type RuleSeverity = 'error' | 'warning' | 'info';

/** Which model locations a rule visits */
export type RuleSelector = 'path_segment' | 'field' | 'parameter' | 'operation' | 'document';

export interface PatternCheck {
  type: 'pattern';
  /** Must match the whole value */
  pattern: string;
  flags?: string;
  /** Attribute of the visited target (default: 'name') */
  property?: string;
}

export interface MembershipCheck {
  type: 'membership';
  values: string[];
  property?: string;
}

export interface PresenceCheck {
  type: 'presence';
  property: string;
}

export type RuleCheck = PatternCheck | MembershipCheck | PresenceCheck;

export interface RuleDefinition {
  selector: RuleSelector;
  check: RuleCheck;
  severity: RuleSeverity;

  /** Score breakdown bucket (e.g., 'naming', 'metadata') */
  category: string;

  /** Message template; supports {value}, {location} and {property} */
  message: string;
}

export type RuleSet = Readonly<Record<string, RuleDefinition>>;

export interface RuleViolation {
  ruleId: string;
  location: string;
  severity: RuleSeverity;
  category: string;
  message: string;
}

// ─── Scoring ────────────────────────────────────────────────────────────────

export type ScoreWeights = Record<RuleSeverity, number>;

export interface ScoreReport {
  /** Consistency score, 0–100 */
  score: number;

  /** Total penalty per rule category */
  breakdown: Record<string, number>;
}

export interface LintReport {
  violations: RuleViolation[];
  summary: {
    error: number;
    warning: number;
    info: number;
    total: number;
  };
  score: ScoreReport;
  hasBlockingViolations: boolean;
}

// ─── Report Format ──────────────────────────────────────────────────────────

/** `auto` picks `github` inside GitHub Actions and `console` elsewhere */
export type ReportFormat = 'auto' | 'console' | 'json' | 'markdown' | 'github';

// ─── Guard Options ──────────────────────────────────────────────────────────

export interface GuardOptions {
  /** Rule set used by lint and score (default: the recommended rules) */
  rules?: RuleSet;

  /** Minimum severity kept in diff reports (default: 'compatible') */
  minSeverity?: ChangeSeverity;

  /** Lint severities that should block a pipeline (default: ['error']) */
  blockingSeverities?: RuleSeverity[];

  /** Score penalty per violation severity */
  weights?: Partial<ScoreWeights>;
}
