#!/usr/bin/env node

import { existsSync, writeFileSync } from 'node:fs';
import { relative } from 'node:path';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { CONFIG_FILES, DEFAULT_CONFIG, parseFormat } from './config.js';
import { CrashScanError, describeError } from './errors.js';
import { createLogger, type Logger, type LogLevel } from './logger.js';
import { createBaseline, runScan } from './runner.js';
import { allRules } from './scanner/rules/index.js';
import { TOOL_VERSION } from './reporter/sarif.js';
import { parseSeverity, type OutputFormat, type Rule, type Severity } from './types.js';

interface ScanCommandOptions {
  format?: OutputFormat;
  severity?: Severity;
  enableRule?: string[];
  disableRule?: string[];
  ext?: string[];
  window?: number;
  concurrency?: number;
  output?: string;
  baseline?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseFormatOption(value: string): OutputFormat {
  const format = parseFormat(value);
  if (!format) throw new InvalidArgumentError('Expected terminal, json or sarif.');
  return format;
}

function parseSeverityOption(value: string): Severity {
  const severity = parseSeverity(value);
  if (!severity) throw new InvalidArgumentError('Expected high, medium or low.');
  return severity;
}

function loggerFor(options: { quiet?: boolean; verbose?: boolean }): Logger {
  let level: LogLevel = 'info';
  if (options.verbose) level = 'debug';
  if (options.quiet) level = 'error';
  return createLogger({ level });
}

/** Configuration and root-path problems end the run with status 2. */
function fail(err: unknown, logger: Logger): void {
  logger.error(describeError(err));
  if (!(err instanceof CrashScanError) && err instanceof Error && err.stack) {
    logger.debug(err.stack);
  }
  process.exitCode = 2;
}

const program = new Command();

program
  .name('crashscan')
  .description('Heuristic crash-pattern scanner for Android Kotlin and Java sources')
  .version(TOOL_VERSION)
  .exitOverride((err) => {
    process.exit(err.code === 'commander.invalidArgument' ? 2 : err.exitCode);
  });

program
  .command('scan', { isDefault: true })
  .description('Scan a source tree for crash-prone patterns')
  .argument('[path]', 'Path to scan', '.')
  .option('-f, --format <format>', 'Output format (terminal, json, sarif)', parseFormatOption)
  .option('-s, --severity <severity>', 'Minimum severity to report (high, medium, low)', parseSeverityOption)
  .option('-r, --enable-rule <name...>', 'Run only these rules')
  .option('-d, --disable-rule <name...>', 'Skip these rules')
  .option('-e, --ext <ext...>', 'File extensions to scan (default: .kt .java)')
  .option('-w, --window <n>', 'Context lines around each finding', parseInteger)
  .option('-c, --concurrency <n>', 'Files analyzed in parallel', parseInteger)
  .option('-o, --output <file>', 'Write the report to a file instead of stdout')
  .option('--baseline', 'Filter out baseline findings')
  .option('-q, --quiet', 'Quiet mode: only errors and the exit code')
  .option('-v, --verbose', 'Debug logging')
  .action(async (targetPath: string, options: ScanCommandOptions) => {
    const logger = loggerFor(options);
    try {
      const run = await runScan(
        {
          path: targetPath,
          format: options.format,
          severity: options.severity,
          enableRules: options.enableRule,
          disableRules: options.disableRule,
          extensions: options.ext,
          contextWindow: options.window,
          concurrency: options.concurrency,
          baseline: options.baseline,
        },
        logger,
      );

      if (options.output) {
        writeFileSync(options.output, `${run.output}\n`);
        logger.info(`Report written to ${options.output}`);
      } else if (!options.quiet) {
        console.log(run.output);
      }
      process.exitCode = run.exitCode;
    } catch (err) {
      fail(err, logger);
    }
  });

program
  .command('init')
  .description('Create a .crashscan.yml configuration file')
  .action(() => {
    const logger = loggerFor({});
    const target = CONFIG_FILES[0];
    if (existsSync(target)) {
      logger.warn(`${target} already exists; leaving it unchanged`);
      return;
    }
    writeFileSync(target, DEFAULT_CONFIG);
    console.log(`✅ Created ${target}`);
  });

program
  .command('baseline')
  .description('Save current findings as baseline (suppress known issues)')
  .argument('[path]', 'Path to scan', '.')
  .option('-v, --verbose', 'Debug logging')
  .action(async (targetPath: string, options: { verbose?: boolean }) => {
    const logger = loggerFor(options);
    try {
      const saved = await createBaseline({ path: targetPath }, logger);
      console.log(`✅ Saved ${saved.count} findings to ${relative(process.cwd(), saved.path) || saved.path}`);
      console.log('   Future scans with --baseline will only report new issues.');
    } catch (err) {
      fail(err, logger);
    }
  });

program
  .command('rules')
  .description('List all available rules')
  .option('-c, --category <cat>', 'Filter by category')
  .action((options: { category?: string }) => {
    const category = options.category?.toLowerCase();
    const rules = category ? allRules.filter((r) => r.category.toLowerCase().includes(category)) : allRules;

    console.log(chalk.bold(`\n📋 crashscan rules (${rules.length} total)\n`));

    const byCategory = new Map<string, Rule[]>();
    for (const r of rules) {
      const arr = byCategory.get(r.category) ?? [];
      arr.push(r);
      byCategory.set(r.category, arr);
    }

    for (const [cat, catRules] of byCategory) {
      console.log(chalk.bold.underline(`  ${cat} (${catRules.length})`));
      for (const r of catRules) {
        console.log(`    ${r.name}  ${chalk.cyan(r.extensions.join(' '))}`);
        console.log(chalk.gray(`          ${r.description}`));
      }
      console.log();
    }
  });

program.parseAsync().catch((err: unknown) => {
  fail(err, createLogger());
});
