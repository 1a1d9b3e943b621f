import chalk from 'chalk';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { Severity, type Finding, type ScanResult } from '../types.js';
import { renderJSON, toJSONReport } from './json.js';
import { TOOL_VERSION, toSARIF } from './sarif.js';
import { renderTerminal } from './terminal.js';

const INDENT = ' '.repeat(11);

function finding(overrides: Partial<Finding> = {}): Finding {
  return {
    file: 'app/Main.kt',
    line: 3,
    issueType: 'Nullable value dereferenced without check',
    matchedCode: 'x.length()',
    detail: '"x" is declared nullable at line 1 and dereferenced without a null check',
    severity: Severity.High,
    suggestion: 'Use a safe call (?.) or check for null first.',
    rule: 'NULLABLE_DEREFERENCE',
    category: 'Null Safety',
    context: '  2 | val y = 1\n> 3 | x.length()',
    ...overrides,
  };
}

function result(findings: Finding[], overrides: Partial<ScanResult> = {}): ScanResult {
  return { findings, failures: [], filesScanned: 2, rulesRun: 32, ...overrides };
}

describe('terminal reporter', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('renders each finding with its location, context and fix', () => {
    const lines = renderTerminal(result([finding()])).split('\n');

    expect(lines).toContain('  app/Main.kt');
    expect(lines).toContain('      HIGH  Nullable value dereferenced without check');
    expect(lines).toContain(`${INDENT}Line 3 · Null Safety · NULLABLE_DEREFERENCE`);
    expect(lines).toContain(`${INDENT}> 3 | x.length()`);
    expect(lines).toContain(`${INDENT}💡 Fix: Use a safe call (?.) or check for null first.`);
    expect(lines).toContain(`${INDENT}↳ "x" is declared nullable at line 1 and dereferenced without a null check`);
  });

  it('summarizes counts and duration', () => {
    const lines = renderTerminal(result([finding(), finding({ line: 9, severity: Severity.Low })]), 1234).split('\n');

    expect(lines).toContain('    Files scanned:  2');
    expect(lines).toContain('    Rules run:      32');
    expect(lines).toContain('    Issues found:   2');
    expect(lines).toContain('    Duration:       1.2s');
    expect(lines).toContain('    🟠 High:     1');
    expect(lines).toContain('    🔵 Low:      1');
    expect(lines.some((line) => line.includes('Medium:'))).toBe(false);
  });

  it('leaves the duration out when none is given', () => {
    const lines = renderTerminal(result([])).split('\n');
    expect(lines.some((line) => line.includes('Duration:'))).toBe(false);
  });

  it('orders findings by line within a file', () => {
    const output = renderTerminal(result([finding({ line: 20, matchedCode: 'late()' }), finding({ line: 4, matchedCode: 'early()' })]));
    expect(output.indexOf('early()')).toBeLessThan(output.indexOf('late()'));
  });

  it('says so when nothing was found', () => {
    expect(renderTerminal(result([])).split('\n')).toContain('  ✅ No issues found');
  });

  it('lists files that could not be fully analyzed', () => {
    const lines = renderTerminal(
      result([], {
        failures: [
          { file: 'app/Bad.kt', message: 'Cannot read app/Bad.kt: denied' },
          { file: 'app/Main.kt', rule: 'UNSAFE_CAST', message: 'boom' },
        ],
      }),
    ).split('\n');

    expect(lines).toContain('    ⚠️  Could not fully analyze 2 file(s):');
    expect(lines).toContain('       app/Bad.kt: Cannot read app/Bad.kt: denied');
    expect(lines).toContain('       app/Main.kt (UNSAFE_CAST): boom');
  });
});

describe('JSON reporter', () => {
  it('uses snake_case records', () => {
    const report = toJSONReport(
      result([finding()], { failures: [{ file: 'app/Bad.kt', message: 'denied' }, { file: 'app/Main.kt', rule: 'UNSAFE_CAST', message: 'boom' }] }),
    );

    expect(report).toEqual({
      files_scanned: 2,
      rules_run: 32,
      findings: [
        {
          file_path: 'app/Main.kt',
          line_number: 3,
          issue_type: 'Nullable value dereferenced without check',
          severity: 'high',
          matched_code: 'x.length()',
          detail: '"x" is declared nullable at line 1 and dereferenced without a null check',
          suggestion: 'Use a safe call (?.) or check for null first.',
          rule_name: 'NULLABLE_DEREFERENCE',
          category: 'Null Safety',
          context: '  2 | val y = 1\n> 3 | x.length()',
        },
      ],
      failures: [
        { file_path: 'app/Bad.kt', message: 'denied' },
        { file_path: 'app/Main.kt', rule_name: 'UNSAFE_CAST', message: 'boom' },
      ],
    });
  });

  it('renders parseable JSON', () => {
    const parsed: unknown = JSON.parse(renderJSON(result([])));
    expect(parsed).toEqual({ files_scanned: 2, rules_run: 32, findings: [], failures: [] });
  });
});

describe('SARIF reporter', () => {
  it('emits one rule per rule name and one result per finding', () => {
    const sarif = toSARIF(result([finding(), finding({ line: 8, severity: Severity.Medium })]));
    const [run] = sarif.runs;

    expect(sarif.version).toBe('2.1.0');
    expect(run.tool.driver).toMatchObject({ name: 'crashscan', version: TOOL_VERSION });
    expect(run.tool.driver.rules).toEqual([
      {
        id: 'NULLABLE_DEREFERENCE',
        shortDescription: { text: 'Nullable value dereferenced without check' },
        help: { text: 'Use a safe call (?.) or check for null first.' },
        properties: { category: 'Null Safety' },
        defaultConfiguration: { level: 'error' },
      },
    ]);
    expect(run.results.map((r) => r.level)).toEqual(['error', 'warning']);
    expect(run.results[1]).toEqual({
      ruleId: 'NULLABLE_DEREFERENCE',
      level: 'warning',
      message: {
        text: 'Nullable value dereferenced without check: "x" is declared nullable at line 1 and dereferenced without a null check',
      },
      locations: [
        {
          physicalLocation: {
            artifactLocation: { uri: 'app/Main.kt' },
            region: { startLine: 8, snippet: { text: 'x.length()' } },
          },
        },
      ],
    });
  });
});
