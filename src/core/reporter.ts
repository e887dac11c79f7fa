/**
 * Report Generator
 *
 * Renders diff and lint reports in multiple formats:
 * Console (colored), JSON, Markdown (PR comments), GitHub Actions annotations.
 */

import chalk from 'chalk';
import { DiffReport, LintReport, ChangeSeverity, RuleSeverity, ReportFormat } from './types';

// ─── Severity Icons & Colors ────────────────────────────────────────────────

const CHANGE_ICON: Record<ChangeSeverity, string> = {
  breaking: '🔴',
  deprecation: '🟡',
  compatible: '🟢',
};

const CHANGE_LABEL: Record<ChangeSeverity, string> = {
  breaking: 'BREAKING',
  deprecation: 'DEPRECATION',
  compatible: 'COMPATIBLE',
};

const CHANGE_ORDER: Record<ChangeSeverity, number> = { breaking: 0, deprecation: 1, compatible: 2 };

const RULE_ICON: Record<RuleSeverity, string> = {
  error: '🔴',
  warning: '🟡',
  info: '🔵',
};

const GITHUB_CHANGE_LEVEL: Record<ChangeSeverity, string> = {
  breaking: 'error',
  deprecation: 'warning',
  compatible: 'notice',
};

const GITHUB_RULE_LEVEL: Record<RuleSeverity, string> = {
  error: 'error',
  warning: 'warning',
  info: 'notice',
};

function changeColor(severity: ChangeSeverity): (text: string) => string {
  switch (severity) {
    case 'breaking':
      return chalk.red;
    case 'deprecation':
      return chalk.yellow;
    case 'compatible':
      return chalk.green;
  }
}

function ruleColor(severity: RuleSeverity): (text: string) => string {
  switch (severity) {
    case 'error':
      return chalk.red;
    case 'warning':
      return chalk.yellow;
    case 'info':
      return chalk.blue;
  }
}

// ─── Format Reports ─────────────────────────────────────────────────────────

export function resolveFormat(
  format: ReportFormat,
  env: NodeJS.ProcessEnv = process.env
): Exclude<ReportFormat, 'auto'> {
  if (format !== 'auto') return format;
  return env.GITHUB_ACTIONS === 'true' ? 'github' : 'console';
}

/**
 * Format a diff report in the specified format.
 */
export function formatDiffReport(report: DiffReport, format: ReportFormat): string {
  switch (resolveFormat(format)) {
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'markdown':
      return diffMarkdown(report);
    case 'github':
      return diffGithub(report);
    case 'console':
    default:
      return diffConsole(report);
  }
}

/**
 * Format a lint report in the specified format.
 */
export function formatLintReport(report: LintReport, format: ReportFormat): string {
  switch (resolveFormat(format)) {
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'markdown':
      return lintMarkdown(report);
    case 'github':
      return lintGithub(report);
    case 'console':
    default:
      return lintConsole(report);
  }
}

// ─── Console Format ─────────────────────────────────────────────────────────

function diffConsole(report: DiffReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold('🔍 API Contract Diff'));
  lines.push(chalk.gray(bar));

  if (report.changes.length === 0) {
    lines.push(chalk.green('  ✅ No changes detected'));
  } else {
    // Breaking first; the engine's order is kept within a severity
    const sorted = [...report.changes].sort(
      (a, b) => CHANGE_ORDER[a.severity] - CHANGE_ORDER[b.severity]
    );

    for (const change of sorted) {
      const label = CHANGE_LABEL[change.severity].padEnd(11);
      lines.push(`${CHANGE_ICON[change.severity]} ${changeColor(change.severity)(label)} ${change.message}`);
      lines.push(chalk.gray(`   at ${change.location}`));
    }
  }

  lines.push(chalk.gray(bar));

  const { breaking, deprecation, compatible } = report.summary;
  lines.push(
    `Summary: ${chalk.red(`${breaking} breaking`)} | ${chalk.yellow(`${deprecation} deprecation`)} | ${chalk.green(`${compatible} compatible`)}`
  );
  if (report.hasBreakingChanges) {
    lines.push(chalk.bold.red('BLOCKED: breaking changes detected'));
  }
  lines.push('');

  return lines.join('\n');
}

function lintConsole(report: LintReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold('🧭 API Design Lint'));
  lines.push(chalk.gray(bar));

  if (report.violations.length === 0) {
    lines.push(chalk.green('  ✅ All design rules pass'));
  } else {
    for (const violation of report.violations) {
      const label = violation.severity.toUpperCase().padEnd(7);
      lines.push(
        `${RULE_ICON[violation.severity]} ${ruleColor(violation.severity)(label)} ${violation.message} ${chalk.gray(`(${violation.ruleId})`)}`
      );
      lines.push(chalk.gray(`   at ${violation.location}`));
    }
  }

  lines.push(chalk.gray(bar));

  const { error, warning, info } = report.summary;
  lines.push(
    `Summary: ${chalk.red(`${error} errors`)} | ${chalk.yellow(`${warning} warnings`)} | ${chalk.blue(`${info} info`)}`
  );
  lines.push(`Design Score: ${scoreColor(report.score.score)}`);

  const breakdown = Object.entries(report.score.breakdown);
  if (breakdown.length > 0) {
    lines.push(chalk.gray(`  ${breakdown.map(([category, penalty]) => `${category}: -${penalty}`).join(' | ')}`));
  }
  lines.push('');

  return lines.join('\n');
}

function scoreColor(score: number): string {
  if (score >= 80) return chalk.green(`${score}/100`);
  if (score >= 60) return chalk.yellow(`${score}/100`);
  return chalk.red(`${score}/100`);
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function diffMarkdown(report: DiffReport): string {
  const { breaking, deprecation, compatible } = report.summary;
  const lines: string[] = [
    '# 🛡️ API Contract Report',
    '',
    '## Summary',
    '',
    '| Category | Count |',
    '|----------|-------|',
    `| 🔴 Breaking | ${breaking} |`,
    `| 🟡 Deprecation | ${deprecation} |`,
    `| 🟢 Compatible | ${compatible} |`,
    '',
  ];

  if (report.changes.length === 0) {
    lines.push('✅ No changes detected.');
  } else {
    lines.push('## Details');
    lines.push('');
    for (const c of report.changes) {
      lines.push(`- ${CHANGE_ICON[c.severity]} **${c.kind}** \`${c.location}\` — ${c.message}`);
    }
  }
  lines.push('');

  return lines.join('\n');
}

function lintMarkdown(report: LintReport): string {
  const lines: string[] = ['# 🧭 API Design Report', '', `**Design Score:** ${report.score.score}/100`, ''];

  const breakdown = Object.entries(report.score.breakdown);
  if (breakdown.length > 0) {
    lines.push('| Category | Penalty |');
    lines.push('|----------|---------|');
    for (const [category, penalty] of breakdown) {
      lines.push(`| ${category} | -${penalty} |`);
    }
    lines.push('');
  }

  if (report.violations.length === 0) {
    lines.push('✅ All design rules pass.');
  } else {
    lines.push('## Violations');
    lines.push('');
    for (const v of report.violations) {
      lines.push(`- ${RULE_ICON[v.severity]} **${v.ruleId}** \`${v.location}\` — ${v.message}`);
    }
  }
  lines.push('');

  return lines.join('\n');
}

// ─── GitHub Actions Format ──────────────────────────────────────────────────

function escapeData(value: string): string {
  return value.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

function escapeProperty(value: string): string {
  return escapeData(value).replace(/:/g, '%3A').replace(/,/g, '%2C');
}

function diffGithub(report: DiffReport): string {
  if (report.changes.length === 0) {
    return '::notice ::No changes detected';
  }

  const lines = report.changes.map(
    (c) =>
      `::${GITHUB_CHANGE_LEVEL[c.severity]} title=${escapeProperty(c.kind)}::${escapeData(`${c.location}: ${c.message}`)}`
  );

  const { breaking, deprecation, compatible } = report.summary;
  const level = breaking > 0 ? 'error' : 'notice';
  lines.push(`::${level} ::Summary: ${breaking} breaking, ${deprecation} deprecation, ${compatible} compatible`);

  return lines.join('\n');
}

function lintGithub(report: LintReport): string {
  const lines = report.violations.map(
    (v) =>
      `::${GITHUB_RULE_LEVEL[v.severity]} title=${escapeProperty(v.ruleId)}::${escapeData(`${v.location}: ${v.message}`)}`
  );

  const level = report.hasBlockingViolations ? 'error' : 'notice';
  lines.push(`::${level} ::Design score: ${report.score.score}/100`);

  return lines.join('\n');
}
