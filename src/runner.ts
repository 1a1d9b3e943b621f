import { resolve } from 'node:path';
import { isInBaseline, loadBaseline, loadConfig, saveBaseline, type CrashScanConfig } from './config.js';
import { silentLogger, type Logger } from './logger.js';
import { renderJSON } from './reporter/json.js';
import { renderSARIF } from './reporter/sarif.js';
import { renderTerminal } from './reporter/terminal.js';
import { ScannerEngine } from './scanner/engine.js';
import { selectRules } from './scanner/rules/index.js';
import { SEVERITY_ORDER, Severity, type OutputFormat, type ScanOptions, type ScanResult } from './types.js';

export interface ScanRun {
  result: ScanResult;
  /** Wall-clock time of the scan; kept out of `result` so results stay reproducible */
  durationMs: number;
  output: string;
  exitCode: number;
}

export function renderReport(result: ScanResult, format: OutputFormat, durationMs?: number): string {
  switch (format) {
    case 'json':
      return renderJSON(result);
    case 'sarif':
      return renderSARIF(result);
    default:
      return renderTerminal(result, durationMs);
  }
}

function createEngine(options: ScanOptions, config: CrashScanConfig, logger: Logger): ScannerEngine {
  // CLI options take precedence over the configuration file
  const rules = selectRules({
    enable: options.enableRules ?? config.rules?.enable,
    disable: options.disableRules ?? config.rules?.disable,
  });
  return new ScannerEngine(rules, {
    extensions: options.extensions ?? config.extensions,
    ignore: config.ignore,
    contextWindow: options.contextWindow ?? config.contextWindow,
    concurrency: options.concurrency ?? config.concurrency,
    logger,
  });
}

/**
 * Scan `options.path`, apply the severity threshold and baseline, and render
 * the report. Exit code 1 means at least one HIGH finding remains.
 */
export async function runScan(options: ScanOptions, logger: Logger = silentLogger): Promise<ScanRun> {
  const root = resolve(options.path);
  const config = loadConfig(root);
  const engine = createEngine(options, config, logger);

  const startTime = Date.now();
  const scanned = await engine.scan(root);
  const durationMs = Date.now() - startTime;
  logger.debug(`Scanned ${scanned.filesScanned} file(s) in ${durationMs}ms`);

  const minOrder = SEVERITY_ORDER[options.severity ?? config.severity ?? Severity.Low];
  let findings = scanned.findings.filter((f) => SEVERITY_ORDER[f.severity] <= minOrder);

  if (options.baseline) {
    const baseline = loadBaseline(root, config.baseline);
    const before = findings.length;
    findings = findings.filter((f) => !isInBaseline(baseline, f.file, f.line, f.rule));
    logger.info(`Baseline suppressed ${before - findings.length} finding(s)`);
  }

  if (scanned.failures.length > 0) {
    logger.warn(`${scanned.failures.length} file/rule failure(s) during scan`);
  }

  const result: ScanResult = { ...scanned, findings };
  return {
    result,
    durationMs,
    output: renderReport(result, options.format ?? config.format ?? 'terminal', durationMs),
    exitCode: findings.some((f) => f.severity === Severity.High) ? 1 : 0,
  };
}

/** Scan with every configured rule and record all findings as the new baseline. */
export async function createBaseline(
  options: ScanOptions,
  logger: Logger = silentLogger,
): Promise<{ path: string; count: number }> {
  const root = resolve(options.path);
  const config = loadConfig(root);
  const result = await createEngine(options, config, logger).scan(root);
  return { path: saveBaseline(root, result.findings, config.baseline), count: result.findings.length };
}
