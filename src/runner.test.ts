import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError, DirectoryNotFoundError } from './errors.js';
import { createBaseline, runScan } from './runner.js';
import { Severity } from './types.js';

const SOURCE = ['fun load() {', '  val id = intent.getStringExtra("id")!!', '  val n = count!!', '}', ''].join('\n');

describe('runScan', () => {
  let dir: string;
  const only = ['NOT_NULL_ASSERTION'];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'crashscan-run-'));
    writeFileSync(join(dir, 'Loader.kt'), SOURCE);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('exits with 1 when a HIGH finding remains', async () => {
    const run = await runScan({ path: dir, enableRules: only });

    expect(run.result.findings.map((f) => [f.line, f.severity])).toEqual([
      [2, Severity.High],
      [3, Severity.Medium],
    ]);
    expect(run.exitCode).toBe(1);
  });

  it('filters by minimum severity', async () => {
    const run = await runScan({ path: dir, enableRules: only, severity: Severity.High });
    expect(run.result.findings.map((f) => f.line)).toEqual([2]);
  });

  it('exits with 0 when only lower severities are found', async () => {
    writeFileSync(join(dir, 'Loader.kt'), 'val n = count!!\n');
    const run = await runScan({ path: dir, enableRules: only });
    expect(run.result.findings).toHaveLength(1);
    expect(run.exitCode).toBe(0);
  });

  it('renders the requested format', async () => {
    const run = await runScan({ path: dir, enableRules: only, format: 'json' });
    const report: unknown = JSON.parse(run.output);
    expect(report).toMatchObject({ files_scanned: 1, rules_run: 1 });
  });

  it('keeps timing out of the result and the JSON export', async () => {
    const first = await runScan({ path: dir, enableRules: only, format: 'json' });
    const second = await runScan({ path: dir, enableRules: only, format: 'json' });

    expect(first.durationMs).toBeGreaterThanOrEqual(0);
    expect(Object.keys(first.result)).toEqual(['findings', 'failures', 'filesScanned', 'rulesRun']);
    expect(second.output).toBe(first.output);
  });

  it('takes defaults from the configuration file', async () => {
    writeFileSync(join(dir, '.crashscan.yml'), 'severity: high\nrules:\n  enable: [NOT_NULL_ASSERTION]\n');
    const run = await runScan({ path: dir });
    expect(run.result.rulesRun).toBe(1);
    expect(run.result.findings.map((f) => f.line)).toEqual([2]);
  });

  it('hides baselined findings', async () => {
    const saved = await createBaseline({ path: dir, enableRules: only });
    expect(saved).toEqual({ path: join(dir, '.crashscan-baseline.json'), count: 2 });

    const run = await runScan({ path: dir, enableRules: only, baseline: true });
    expect(run.result.findings).toEqual([]);
    expect(run.exitCode).toBe(0);
  });

  it('rejects unknown rule names', async () => {
    await expect(runScan({ path: dir, enableRules: ['NOPE'] })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a missing directory', async () => {
    await expect(runScan({ path: join(dir, 'missing') })).rejects.toBeInstanceOf(DirectoryNotFoundError);
  });
});
