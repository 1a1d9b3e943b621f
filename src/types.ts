export enum Severity {
  High = 'high',
  Medium = 'medium',
  Low = 'low',
}

export const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.High]: 0,
  [Severity.Medium]: 1,
  [Severity.Low]: 2,
};

export function parseSeverity(value: string): Severity | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(Severity).find((s) => s === normalized);
}

/** One occurrence reported by a rule, before the engine attaches file and rule metadata. */
export interface RuleMatch {
  /** 1-based line number */
  line: number;
  matchedCode: string;
  detail: string;
  severity: Severity;
}

export interface Finding {
  readonly file: string;
  readonly line: number;
  readonly issueType: string;
  readonly matchedCode: string;
  readonly detail: string;
  readonly severity: Severity;
  readonly suggestion: string;
  readonly rule: string;
  readonly category: string;
  readonly context: string;
}

export interface Rule {
  readonly name: string;
  readonly category: string;
  readonly issueType: string;
  readonly suggestion: string;
  readonly description: string;
  readonly extensions: readonly string[];
  appliesTo(filePath: string): boolean;
  /** Lazy and restartable: every iteration re-runs detection over `lines`. */
  analyze(filePath: string, lines: readonly string[]): Iterable<RuleMatch>;
}

export interface ScanFailure {
  file: string;
  /** Set when a rule failed; absent when the file itself could not be read */
  rule?: string;
  message: string;
}

export interface ScanResult {
  findings: Finding[];
  failures: ScanFailure[];
  filesScanned: number;
  rulesRun: number;
}

export const OUTPUT_FORMATS = ['terminal', 'json', 'sarif'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface ScanOptions {
  path: string;
  format?: OutputFormat;
  severity?: Severity;
  enableRules?: string[];
  disableRules?: string[];
  extensions?: string[];
  contextWindow?: number;
  concurrency?: number;
  baseline?: boolean;
}
