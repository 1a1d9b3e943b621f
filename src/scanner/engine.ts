import { ConfigurationError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Finding, Rule, RuleMatch, ScanFailure, ScanResult } from '../types.js';
import { DEFAULT_CONTEXT_WINDOW, extractContext, type LineReader } from './context.js';
import { DEFAULT_EXTENSIONS, FsSourceTree, type SourceTree } from './source.js';

const FILE_DIRECTIVE = /(?:\/\/|\/\*)\s*crashscan-disable-file\b/i;
const LINE_DIRECTIVE = /(?:\/\/|\/\*)\s*crashscan-disable-line\b([\w, \t]*)/i;
const NEXT_LINE_DIRECTIVE = /(?:\/\/|\/\*)\s*crashscan-disable-next-line\b([\w, \t]*)/i;

export interface EngineOptions {
  /** File extensions to scan; defaults to .kt and .java */
  extensions?: readonly string[];
  /** Extra gitignore-style patterns */
  ignore?: readonly string[];
  contextWindow?: number;
  /** Files read and analyzed at the same time */
  concurrency?: number;
  source?: SourceTree;
  logger?: Logger;
}

export interface FileScan {
  findings: Finding[];
  failures: ScanFailure[];
}

export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function compareFindings(a: Finding, b: Finding): number {
  return compareText(a.file, b.file) || a.line - b.line || compareText(a.rule, b.rule) || compareText(a.detail, b.detail);
}

/** Names listed after a suppression directive; an empty list silences every rule. */
function directiveCovers(directive: RegExpExecArray | null, rule: string): boolean {
  if (!directive) return false;
  const names = directive[1]
    .split(/[,\s]+/)
    .map((name) => name.trim().toUpperCase())
    .filter(Boolean);
  return names.length === 0 || names.includes('ALL') || names.includes(rule);
}

function isSuppressed(lines: readonly string[], line: number, rule: string): boolean {
  if (directiveCovers(LINE_DIRECTIVE.exec(lines[line - 1]), rule)) return true;
  return line > 1 && directiveCovers(NEXT_LINE_DIRECTIVE.exec(lines[line - 2]), rule);
}

/**
 * Walks a source tree and runs every active rule over every candidate file.
 * Rules are independent: a rule that throws on a file is recorded as a
 * failure for that file and the other rules still run.
 */
export class ScannerEngine {
  readonly rules: readonly Rule[];
  private readonly extensions: readonly string[];
  private readonly contextWindow: number;
  private readonly concurrency: number;
  private readonly source: SourceTree;
  private readonly logger: Logger;

  constructor(rules: readonly Rule[], options: EngineOptions = {}) {
    if (rules.length === 0) {
      throw new ConfigurationError('No rules are active; enable at least one rule');
    }
    const seen = new Set<string>();
    for (const rule of rules) {
      if (seen.has(rule.name)) throw new ConfigurationError(`Rule ${rule.name} is registered more than once`);
      seen.add(rule.name);
    }

    const contextWindow = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
    if (!Number.isInteger(contextWindow) || contextWindow < 0) {
      throw new ConfigurationError(`Context window must be a non-negative integer, got ${contextWindow}`);
    }
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    const extensions = (options.extensions ?? DEFAULT_EXTENSIONS).map(normalizeExtension);
    if (extensions.length === 0) {
      throw new ConfigurationError('At least one file extension is required');
    }

    this.rules = [...rules];
    this.extensions = extensions;
    this.contextWindow = contextWindow;
    this.concurrency = concurrency;
    this.source = options.source ?? new FsSourceTree(options.ignore);
    this.logger = options.logger ?? silentLogger;
  }

  async scan(root: string): Promise<ScanResult> {
    await this.source.assertRoot(root);

    const files = await this.source.list(root, this.extensions);
    this.logger.debug(`Scanning ${files.length} file(s) under ${root} with ${this.rules.length} rule(s)`);

    const findings: Finding[] = [];
    const failures: ScanFailure[] = [];
    let filesScanned = 0;

    for (let i = 0; i < files.length; i += this.concurrency) {
      const batch = files.slice(i, i + this.concurrency);
      const results = await Promise.all(batch.map((file) => this.scanPath(root, file)));
      for (const result of results) {
        if (result.read) filesScanned++;
        findings.push(...result.findings);
        failures.push(...result.failures);
      }
    }

    return {
      findings: findings.sort(compareFindings),
      failures: failures.sort((a, b) => compareText(a.file, b.file) || compareText(a.rule ?? '', b.rule ?? '')),
      filesScanned,
      rulesRun: this.rules.length,
    };
  }

  /**
   * Analyze one file already split into lines. `readLines` supplies the text
   * for context windows and defaults to `lines` itself.
   */
  async scanFile(file: string, lines: readonly string[], readLines?: LineReader): Promise<FileScan> {
    if (lines.some((line) => FILE_DIRECTIVE.test(line))) {
      this.logger.debug(`${file}: skipped by crashscan-disable-file`);
      return { findings: [], failures: [] };
    }

    const failures: ScanFailure[] = [];
    const matches: Array<{ rule: Rule; match: RuleMatch }> = [];

    for (const rule of this.rules) {
      if (!rule.appliesTo(file)) continue;
      const accepted: RuleMatch[] = [];
      try {
        for (const match of rule.analyze(file, lines)) {
          if (match.line < 1 || match.line > lines.length) {
            this.logger.debug(`${rule.name} reported line ${match.line} outside ${file}; dropped`);
            continue;
          }
          if (!isSuppressed(lines, match.line, rule.name)) accepted.push(match);
        }
      } catch (err) {
        const message = describeError(err);
        this.logger.warn(`Rule ${rule.name} failed on ${file}: ${message}`);
        failures.push({ file, rule: rule.name, message });
        continue;
      }
      for (const match of accepted) matches.push({ rule, match });
    }

    let cached: Promise<string[]> | undefined;
    const reader: LineReader = () => (cached ??= readLines ? readLines(file) : Promise.resolve([...lines]));

    const findings: Finding[] = [];
    for (const { rule, match } of matches) {
      findings.push({
        file,
        line: match.line,
        issueType: rule.issueType,
        matchedCode: match.matchedCode,
        detail: match.detail,
        severity: match.severity,
        suggestion: rule.suggestion,
        rule: rule.name,
        category: rule.category,
        context: await extractContext(file, match.line, this.contextWindow, reader),
      });
    }
    return { findings, failures };
  }

  private async scanPath(root: string, file: string): Promise<FileScan & { read: boolean }> {
    let lines: string[];
    try {
      lines = await this.source.readLines(root, file);
    } catch (err) {
      const message = describeError(err);
      this.logger.warn(`Skipping ${file}: ${message}`);
      return { findings: [], failures: [{ file, message }], read: false };
    }

    const result = await this.scanFile(file, lines, () => this.source.readLines(root, file));
    return { ...result, read: true };
  }
}
