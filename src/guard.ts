/**
 * ContractGuard — Main API
 *
 * The primary entry point for openapi-contract-guard. Runs the pipelines
 * (normalize → diff, normalize → lint → score) and wraps the results in
 * reports with summary counts and a block/no-block verdict.
 */

import {
  GuardOptions,
  SpecModel,
  RuleSet,
  RuleSeverity,
  ScoreWeights,
  ChangeRecord,
  ChangeSeverity,
  DiffReport,
  LintReport,
  RuleViolation,
  ScoreReport,
  ReportFormat,
} from './core/types';
import { normalize } from './core/normalizer';
import { diff } from './core/differ';
import { lint, compileRuleSet } from './core/linter';
import { score } from './core/scorer';
import { RECOMMENDED_RULES } from './core/rules';
import { formatDiffReport, formatLintReport } from './core/reporter';
import { loadDocument } from './formats';

export interface NamedDocument {
  /** Label used in series reports (e.g., a file name or version) */
  name: string;
  document: unknown;
}

export interface SeriesReport {
  pairs: Array<{ from: string; to: string; report: DiffReport }>;

  /** Every pair's changes, concatenated in input order */
  changes: ChangeRecord[];
  hasBreakingChanges: boolean;
}

const SEVERITY_ORDER: Record<ChangeSeverity, number> = {
  compatible: 0,
  deprecation: 1,
  breaking: 2,
};

// ─── ContractGuard Class ────────────────────────────────────────────────────

export class ContractGuard {
  private readonly rules: RuleSet;
  private readonly minSeverity: ChangeSeverity;
  private readonly blockingSeverities: ReadonlySet<RuleSeverity>;
  private readonly weights: Partial<ScoreWeights>;

  /**
   * @throws RuleConfigError when `options.rules` is malformed
   */
  constructor(options: GuardOptions = {}) {
    this.rules = options.rules ?? RECOMMENDED_RULES;
    this.minSeverity = options.minSeverity ?? 'compatible';
    this.blockingSeverities = new Set(options.blockingSeverities ?? ['error']);
    this.weights = options.weights ?? {};

    compileRuleSet(this.rules);
  }

  // ─── Diff ───────────────────────────────────────────────────────────────

  /**
   * Compare two deserialized documents. Both are normalized before any
   * diffing starts, so a malformed document never yields a partial report.
   */
  diff(oldDocument: unknown, newDocument: unknown): DiffReport {
    const before = normalize(oldDocument);
    const after = normalize(newDocument);
    return this.diffModels(before, after);
  }

  diffModels(before: SpecModel, after: SpecModel): DiffReport {
    return this.createDiffReport(this.filterBySeverity(diff(before, after)));
  }

  /**
   * Compare two documents on disk (JSON or YAML).
   */
  diffFiles(oldPath: string, newPath: string): DiffReport {
    return this.diff(loadDocument(oldPath), loadDocument(newPath));
  }

  /**
   * Diff each consecutive pair of a document series (v1 → v2, v2 → v3, ...).
   */
  diffSeries(documents: NamedDocument[]): SeriesReport {
    const models = documents.map((entry) => normalize(entry.document));
    const pairs: SeriesReport['pairs'] = [];

    for (let i = 1; i < models.length; i++) {
      pairs.push({
        from: documents[i - 1].name,
        to: documents[i].name,
        report: this.diffModels(models[i - 1], models[i]),
      });
    }

    return {
      pairs,
      changes: pairs.flatMap((pair) => pair.report.changes),
      hasBreakingChanges: pairs.some((pair) => pair.report.hasBreakingChanges),
    };
  }

  // ─── Lint & Score ───────────────────────────────────────────────────────

  lint(document: unknown): LintReport {
    return this.lintModel(normalize(document));
  }

  lintModel(model: SpecModel): LintReport {
    return this.createLintReport(lint(model, this.rules));
  }

  lintFile(filePath: string): LintReport {
    return this.lint(loadDocument(filePath));
  }

  /**
   * Lint several independent documents; all are normalized first.
   */
  lintAll(documents: NamedDocument[]): Array<{ name: string; report: LintReport }> {
    const models = documents.map((entry) => normalize(entry.document));
    return models.map((model, i) => ({ name: documents[i].name, report: this.lintModel(model) }));
  }

  score(document: unknown): ScoreReport {
    return this.lint(document).score;
  }

  // ─── Verdicts & Formatting ──────────────────────────────────────────────

  /**
   * Whether a report should fail a pipeline: any breaking change, or any
   * violation of a blocking severity.
   */
  shouldBlock(report: DiffReport | LintReport): boolean {
    return 'changes' in report ? report.hasBreakingChanges : report.hasBlockingViolations;
  }

  format(report: DiffReport | LintReport, format: ReportFormat = 'console'): string {
    return 'changes' in report ? formatDiffReport(report, format) : formatLintReport(report, format);
  }

  getRules(): RuleSet {
    return this.rules;
  }

  // ─── Private Helpers ────────────────────────────────────────────────────

  private filterBySeverity(changes: ChangeRecord[]): ChangeRecord[] {
    const minOrder = SEVERITY_ORDER[this.minSeverity];
    return changes.filter((c) => SEVERITY_ORDER[c.severity] >= minOrder);
  }

  private createDiffReport(changes: ChangeRecord[]): DiffReport {
    return {
      changes,
      summary: {
        breaking: changes.filter((c) => c.severity === 'breaking').length,
        deprecation: changes.filter((c) => c.severity === 'deprecation').length,
        compatible: changes.filter((c) => c.severity === 'compatible').length,
        total: changes.length,
      },
      hasBreakingChanges: changes.some((c) => c.severity === 'breaking'),
    };
  }

  private createLintReport(violations: RuleViolation[]): LintReport {
    return {
      violations,
      summary: {
        error: violations.filter((v) => v.severity === 'error').length,
        warning: violations.filter((v) => v.severity === 'warning').length,
        info: violations.filter((v) => v.severity === 'info').length,
        total: violations.length,
      },
      score: score(violations, this.weights),
      hasBlockingViolations: violations.some((v) => this.blockingSeverities.has(v.severity)),
    };
  }
}
