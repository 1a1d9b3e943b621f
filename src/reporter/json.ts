import { ScanResult, Severity } from '../types.js';

/** Finding record in the shape downstream tooling consumes. */
export interface JsonFinding {
  file_path: string;
  line_number: number;
  issue_type: string;
  severity: Severity;
  matched_code: string;
  detail: string;
  suggestion: string;
  rule_name: string;
  category: string;
  context: string;
}

export interface JsonFailure {
  file_path: string;
  rule_name?: string;
  message: string;
}

export interface JsonReport {
  files_scanned: number;
  rules_run: number;
  findings: JsonFinding[];
  failures: JsonFailure[];
}

export function toJSONReport(result: ScanResult): JsonReport {
  return {
    files_scanned: result.filesScanned,
    rules_run: result.rulesRun,
    findings: result.findings.map((f) => ({
      file_path: f.file,
      line_number: f.line,
      issue_type: f.issueType,
      severity: f.severity,
      matched_code: f.matchedCode,
      detail: f.detail,
      suggestion: f.suggestion,
      rule_name: f.rule,
      category: f.category,
      context: f.context,
    })),
    failures: result.failures.map((failure) => ({
      file_path: failure.file,
      ...(failure.rule ? { rule_name: failure.rule } : {}),
      message: failure.message,
    })),
  };
}

export function renderJSON(result: ScanResult): string {
  return JSON.stringify(toJSONReport(result), null, 2);
}

export function reportJSON(result: ScanResult): void {
  console.log(renderJSON(result));
}
