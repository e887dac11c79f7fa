/**
 * openapi-contract-guard
 *
 * Catch breaking API changes before your clients do.
 *
 * @example
 * ```typescript
 * import { ContractGuard } from 'openapi-contract-guard';
 *
 * const guard = new ContractGuard();
 *
 * const report = guard.diffFiles('openapi.v1.yaml', 'openapi.v2.yaml');
 * if (report.hasBreakingChanges) {
 *   console.log(guard.format(report, 'console'));
 * }
 *
 * const lint = guard.lintFile('openapi.v2.yaml');
 * console.log(`Design score: ${lint.score.score}/100`);
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { ContractGuard, NamedDocument, SeriesReport } from './guard';
export { loadConfig, parseConfig, findConfigFile, CONFIG_FILE_NAMES } from './config';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  SchemaNode,
  ScalarNode,
  ObjectNode,
  ArrayNode,
  PrimitiveType,
  Parameter,
  ParameterLocation,
  RequestBody,
  Operation,
  PathItem,
  SpecModel,
  HttpMethod,
  HTTP_METHODS,
  ChangeRecord,
  ChangeKind,
  ChangeSeverity,
  DiffReport,
  RuleSelector,
  RuleCheck,
  RuleDefinition,
  RuleSet,
  RuleSeverity,
  RuleViolation,
  ScoreReport,
  ScoreWeights,
  LintReport,
  ReportFormat,
  GuardOptions,
} from './core/types';

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  ContractGuardError,
  ParseError,
  ReferenceResolutionError,
  RuleConfigError,
  ErrorCode,
  isContractGuardError,
} from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { normalize, templateKey, placeholderNames } from './core/normalizer';
export { diff, diffSchemas, SchemaSide } from './core/differ';
export { classifyScalarChange, scalarLabel } from './core/compatibility';
export { lint, compileRuleSet } from './core/linter';
export { RECOMMENDED_RULES, loadRuleSet } from './core/rules';
export { score, DEFAULT_WEIGHTS } from './core/scorer';
export { formatDiffReport, formatLintReport, resolveFormat } from './core/reporter';

// ─── Document Formats ───────────────────────────────────────────────────────
export { parseDocument, loadDocument, parseJson, parseYaml } from './formats';
