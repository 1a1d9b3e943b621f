import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { extractContext, renderContext } from './context.js';

describe('renderContext', () => {
  const lines = ['a', 'b', 'c', 'd', 'e'];

  it('renders the window around the target line', () => {
    expect(renderContext(lines, 3, 1)).toBe(['  2 | b', '> 3 | c', '  4 | d'].join('\n'));
  });

  it('clips the window to the file', () => {
    expect(renderContext(lines, 1, 2)).toBe(['> 1 | a', '  2 | b', '  3 | c'].join('\n'));
    expect(renderContext(lines, 5, 0)).toBe('> 5 | e');
  });

  it('pads line numbers to the widest one shown', () => {
    const many = Array.from({ length: 12 }, (_, i) => `line ${i + 1}`);
    expect(renderContext(many, 10, 1)).toBe(['   9 | line 9', '> 10 | line 10', '  11 | line 11'].join('\n'));
  });
});

describe('extractContext', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'crashscan-context-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the file from disk', async () => {
    const file = join(dir, 'Main.kt');
    writeFileSync(file, 'one\ntwo\nthree\n');
    expect(await extractContext(file, 2, 1)).toBe(['  1 | one', '> 2 | two', '  3 | three'].join('\n'));
  });

  it('uses a placeholder when the file cannot be read', async () => {
    const context = await extractContext('Gone.kt', 1, 3, () => Promise.reject(new Error('permission denied')));
    expect(context).toBe('[context unavailable: permission denied]');
  });
});
