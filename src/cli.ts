#!/usr/bin/env node

/**
 * openapi-contract-guard CLI
 *
 * Commands:
 *   diff   - Detect breaking changes between two API documents
 *   lint   - Check one document against the design rules
 *   score  - Print the design consistency score of one document
 *
 * Exit codes: 0 = clean, 1 = blocking result, 2 = input or config could not be read
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'fs';
import chalk from 'chalk';
import { ContractGuard } from './guard';
import { loadConfig } from './config';
import { RuleConfigError, isContractGuardError } from './core/errors';
import { formatDiffReport, formatLintReport } from './core/reporter';
import { ChangeSeverity, ReportFormat } from './core/types';

const EXIT_BLOCKED = 1;
const EXIT_INPUT_ERROR = 2;

interface DiffCommandOptions {
  format: ReportFormat;
  minSeverity?: ChangeSeverity;
  block: boolean;
  output?: string;
  config?: string;
}

interface LintCommandOptions {
  format: ReportFormat;
  output?: string;
  config?: string;
}

interface ScoreCommandOptions {
  minScore: number;
  json?: boolean;
  config?: string;
}

const program = new Command();

program
  .name('contract-guard')
  .description('Catch breaking API changes and enforce API design rules.')
  .version('1.0.0');

// ─── Common Options ─────────────────────────────────────────────────────────

function formatOption(): Option {
  return new Option('-f, --format <format>', 'Report format')
    .choices(['auto', 'console', 'json', 'markdown', 'github'])
    .default('console');
}

function configOption(): Option {
  return new Option('-c, --config <file>', 'Config file (default: discovered in the working directory)');
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function emit(output: string, file?: string): void {
  if (file) {
    fs.writeFileSync(file, output, 'utf-8');
    console.log(`📄 Report written to ${file}`);
  } else {
    console.log(output);
  }
}

function fail(error: unknown): never {
  console.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof RuleConfigError) {
    for (const issue of error.issues) {
      console.error(`   • ${issue}`);
    }
  }
  // Unexpected failure: show where it came from
  if (!isContractGuardError(error) && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
  process.exit(EXIT_INPUT_ERROR);
}

// ─── diff Command ───────────────────────────────────────────────────────────

program
  .command('diff')
  .description('Detect breaking changes between two API documents')
  .argument('<old>', 'Previous document (JSON or YAML)')
  .argument('<new>', 'Current document (JSON or YAML)')
  .addOption(formatOption())
  .addOption(
    new Option('--min-severity <severity>', 'Hide changes below this severity').choices([
      'breaking',
      'deprecation',
      'compatible',
    ])
  )
  .option('--no-block', 'Exit 0 even when breaking changes are found')
  .option('-o, --output <file>', 'Write report to file instead of stdout')
  .addOption(configOption())
  .action((oldPath: string, newPath: string, opts: DiffCommandOptions) => {
    let blocked = false;
    try {
      const options = loadConfig(opts.config);
      const guard = new ContractGuard({ ...options, minSeverity: opts.minSeverity ?? options.minSeverity });
      const report = guard.diffFiles(oldPath, newPath);

      emit(formatDiffReport(report, opts.format), opts.output);
      blocked = opts.block && guard.shouldBlock(report);
    } catch (error) {
      fail(error);
    }

    if (blocked) {
      process.exit(EXIT_BLOCKED);
    }
  });

// ─── lint Command ───────────────────────────────────────────────────────────

program
  .command('lint')
  .description('Check an API document against the design rules')
  .argument('<spec>', 'Document to lint (JSON or YAML)')
  .addOption(formatOption())
  .option('-o, --output <file>', 'Write report to file instead of stdout')
  .addOption(configOption())
  .action((specPath: string, opts: LintCommandOptions) => {
    let blocked = false;
    try {
      const guard = new ContractGuard(loadConfig(opts.config));
      const report = guard.lintFile(specPath);

      emit(formatLintReport(report, opts.format), opts.output);
      blocked = guard.shouldBlock(report);
    } catch (error) {
      fail(error);
    }

    if (blocked) {
      process.exit(EXIT_BLOCKED);
    }
  });

// ─── score Command ──────────────────────────────────────────────────────────

program
  .command('score')
  .description('Calculate the API design consistency score (0-100)')
  .argument('<spec>', 'Document to score (JSON or YAML)')
  .option('--min-score <n>', 'Exit with code 1 below this score', parseInteger, 60)
  .option('--json', 'Print the score and breakdown as JSON')
  .addOption(configOption())
  .action((specPath: string, opts: ScoreCommandOptions) => {
    let result = 0;
    try {
      const guard = new ContractGuard(loadConfig(opts.config));
      const report = guard.lintFile(specPath).score;
      result = report.score;

      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        const color = result >= 80 ? chalk.green : result >= 60 ? chalk.yellow : chalk.red;
        console.log(`API Design Score: ${color(`${result}/100`)}`);
      }
    } catch (error) {
      fail(error);
    }

    if (result < opts.minScore) {
      process.exit(EXIT_BLOCKED);
    }
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parse();
