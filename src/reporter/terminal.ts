import chalk from 'chalk';
import { Finding, Severity, ScanResult } from '../types.js';

const SEVERITY_LABEL: Record<Severity, string> = {
  [Severity.High]: '  HIGH',
  [Severity.Medium]: '  MED ',
  [Severity.Low]: '  LOW ',
};

const SEVERITY_COLOR: Record<Severity, (s: string) => string> = {
  [Severity.High]: chalk.red,
  [Severity.Medium]: chalk.yellow,
  [Severity.Low]: chalk.blue,
};

const INDENT = '           ';

/** `durationMs` is wall-clock time measured by the caller; the summary omits it when absent. */
export function renderTerminal(result: ScanResult, durationMs?: number): string {
  const out: string[] = [];

  out.push('');
  out.push(chalk.bold('🔍 crashscan report'));
  out.push(chalk.gray('─'.repeat(60)));
  out.push('');

  if (result.findings.length === 0) {
    out.push(chalk.green('  ✅ No issues found'));
    out.push('');
    renderSummary(result, out, durationMs);
    return out.join('\n');
  }

  // Group by file
  const byFile = new Map<string, Finding[]>();
  for (const f of result.findings) {
    const arr = byFile.get(f.file) ?? [];
    arr.push(f);
    byFile.set(f.file, arr);
  }

  for (const file of [...byFile.keys()].sort()) {
    const fileFindings = (byFile.get(file) ?? []).slice().sort((a, b) => a.line - b.line);

    out.push(chalk.bold.underline(`  ${file}`));
    out.push('');

    for (const f of fileFindings) {
      const color = SEVERITY_COLOR[f.severity];
      out.push(`    ${color(SEVERITY_LABEL[f.severity])}  ${color(f.issueType)}`);
      out.push(chalk.gray(`${INDENT}${[`Line ${f.line}`, f.category, f.rule].join(' · ')}`));
      out.push(chalk.gray(`${INDENT}${f.matchedCode}`));

      if (f.context) {
        out.push('');
        for (const line of f.context.split('\n')) out.push(chalk.dim(`${INDENT}${line}`));
        out.push('');
      }

      out.push(chalk.green(`${INDENT}💡 Fix: ${f.suggestion}`));
      if (f.detail) out.push(`${INDENT}↳ ${f.detail}`);
      out.push('');
    }
  }

  renderSummary(result, out);
  return out.join('\n');
}

function renderSummary(result: ScanResult, out: string[], durationMs?: number): void {
  const { findings, failures, filesScanned, rulesRun } = result;

  const counts: Record<Severity, number> = {
    [Severity.High]: 0,
    [Severity.Medium]: 0,
    [Severity.Low]: 0,
  };
  for (const f of findings) {
    counts[f.severity]++;
  }

  out.push(chalk.gray('─'.repeat(60)));
  out.push(chalk.bold('  Summary'));
  out.push('');
  out.push(`    Files scanned:  ${filesScanned}`);
  out.push(`    Rules run:      ${rulesRun}`);
  out.push(`    Issues found:   ${findings.length}`);
  if (durationMs !== undefined) out.push(`    Duration:       ${(durationMs / 1000).toFixed(1)}s`);
  out.push('');

  if (counts[Severity.High] > 0) out.push(chalk.red(`    🟠 High:     ${counts[Severity.High]}`));
  if (counts[Severity.Medium] > 0) out.push(chalk.yellow(`    🟡 Medium:   ${counts[Severity.Medium]}`));
  if (counts[Severity.Low] > 0) out.push(chalk.blue(`    🔵 Low:      ${counts[Severity.Low]}`));

  if (failures.length > 0) {
    const files = new Set(failures.map((failure) => failure.file));
    out.push('');
    out.push(chalk.yellow(`    ⚠️  Could not fully analyze ${files.size} file(s):`));
    for (const failure of failures) {
      const where = failure.rule ? `${failure.file} (${failure.rule})` : failure.file;
      out.push(chalk.yellow(`       ${where}: ${failure.message}`));
    }
  }
  out.push('');
}

export function reportTerminal(result: ScanResult, durationMs?: number): void {
  console.log(renderTerminal(result, durationMs));
}
