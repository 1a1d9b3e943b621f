import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, describeError } from './errors.js';
import { OUTPUT_FORMATS, parseSeverity, type Finding, type OutputFormat, type Severity } from './types.js';

export interface CrashScanConfig {
  severity?: Severity;
  format?: OutputFormat;
  extensions?: string[];
  contextWindow?: number;
  concurrency?: number;
  ignore?: string[];
  rules?: {
    enable?: string[];
    disable?: string[];
  };
  baseline?: string;
}

export const CONFIG_FILES = ['.crashscan.yml', '.crashscan.yaml'];
export const DEFAULT_BASELINE = '.crashscan-baseline.json';

export const DEFAULT_CONFIG = `# crashscan configuration
severity: low          # Minimum severity: high, medium, low
format: terminal       # Output: terminal, json, sarif
extensions: [.kt, .java]
contextWindow: 10      # Lines of context on each side of a finding
concurrency: 4         # Files analyzed in parallel

# Ignore patterns (gitignore syntax)
ignore:
  - "**/generated/**"
  - "**/test/**"
  - "**/androidTest/**"

# Rule selection by name (see: crashscan rules)
rules:
  enable: []           # Only these rules; empty means all
  disable: []

# Baseline file for suppressing known issues
# baseline: .crashscan-baseline.json
`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, key: string, source: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new ConfigurationError(`${source}: "${key}" must be a list of strings`);
  const items: unknown[] = value;
  const strings = items.filter((item): item is string => typeof item === 'string');
  if (strings.length !== items.length) throw new ConfigurationError(`${source}: "${key}" must be a list of strings`);
  return strings;
}

function integer(value: unknown, key: string, source: string, min: number): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${source}: "${key}" must be an integer >= ${min}`);
  }
  return value;
}

function text(value: unknown, key: string, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ConfigurationError(`${source}: "${key}" must be a string`);
  return value;
}

export function parseFormat(value: string): OutputFormat | undefined {
  const normalized = value.trim().toLowerCase();
  return OUTPUT_FORMATS.find((format) => format === normalized);
}

/** Parse and validate the text of a configuration file. */
export function parseConfig(raw: string, source = CONFIG_FILES[0]): CrashScanConfig {
  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new ConfigurationError(`${source}: invalid YAML (${describeError(err)})`, { cause: err });
  }
  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) throw new ConfigurationError(`${source}: expected a mapping at the top level`);

  const config: CrashScanConfig = {};

  const severity = text(doc.severity, 'severity', source);
  if (severity !== undefined) {
    config.severity = parseSeverity(severity);
    if (!config.severity) throw new ConfigurationError(`${source}: unknown severity "${severity}"`);
  }

  const format = text(doc.format, 'format', source);
  if (format !== undefined) {
    config.format = parseFormat(format);
    if (!config.format) throw new ConfigurationError(`${source}: unknown format "${format}"`);
  }

  config.extensions = stringList(doc.extensions, 'extensions', source);
  config.contextWindow = integer(doc.contextWindow, 'contextWindow', source, 0);
  config.concurrency = integer(doc.concurrency, 'concurrency', source, 1);
  config.ignore = stringList(doc.ignore, 'ignore', source);
  config.baseline = text(doc.baseline, 'baseline', source);

  if (doc.rules !== undefined && doc.rules !== null) {
    if (!isRecord(doc.rules)) throw new ConfigurationError(`${source}: "rules" must be a mapping`);
    config.rules = {
      enable: stringList(doc.rules.enable, 'rules.enable', source),
      disable: stringList(doc.rules.disable, 'rules.disable', source),
    };
  }

  return config;
}

export function loadConfig(dir: string): CrashScanConfig {
  for (const name of CONFIG_FILES) {
    const p = join(dir, name);
    if (existsSync(p)) {
      return parseConfig(readFileSync(p, 'utf-8'), name);
    }
  }
  return {};
}

export interface BaselineEntry {
  file: string;
  line: number;
  rule: string;
}

function isBaselineEntry(value: unknown): value is BaselineEntry {
  return (
    isRecord(value) &&
    typeof value.file === 'string' &&
    typeof value.line === 'number' &&
    typeof value.rule === 'string'
  );
}

export function loadBaseline(dir: string, baselinePath?: string): BaselineEntry[] {
  const name = baselinePath ?? DEFAULT_BASELINE;
  const p = join(dir, name);
  if (!existsSync(p)) return [];

  let doc: unknown;
  try {
    doc = JSON.parse(readFileSync(p, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`${name}: cannot read baseline (${describeError(err)})`, { cause: err });
  }
  if (!Array.isArray(doc)) throw new ConfigurationError(`${name}: baseline must be a JSON array`);
  const entries: unknown[] = doc;
  return entries.filter(isBaselineEntry);
}

export function saveBaseline(dir: string, findings: readonly Finding[], baselinePath?: string): string {
  const p = join(dir, baselinePath ?? DEFAULT_BASELINE);
  const entries: BaselineEntry[] = findings.map((f) => ({
    file: f.file,
    line: f.line,
    rule: f.rule,
  }));
  writeFileSync(p, `${JSON.stringify(entries, null, 2)}\n`);
  return p;
}

/** A finding is baselined when an entry names the same file and rule within 3 lines of it. */
export function isInBaseline(baseline: readonly BaselineEntry[], file: string, line: number, rule: string): boolean {
  return baseline.some((b) => b.file === file && b.rule === rule && Math.abs(b.line - line) <= 3);
}
