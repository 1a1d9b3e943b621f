import { readFile } from 'node:fs/promises';
import { describeError } from '../errors.js';
import { splitLines } from './source.js';

export const DEFAULT_CONTEXT_WINDOW = 10;

export type LineReader = (filePath: string) => Promise<string[]>;

const readFromDisk: LineReader = async (filePath) => splitLines(await readFile(filePath, 'utf-8'));

/**
 * Lines `[line - window, line + window]`, clipped to the file, each prefixed
 * with its 1-based number. The target line is marked with `>`.
 */
export function renderContext(lines: readonly string[], line: number, window: number = DEFAULT_CONTEXT_WINDOW): string {
  const start = Math.max(1, line - window);
  const end = Math.min(lines.length, line + window);
  const width = String(end).length;

  const rendered: string[] = [];
  for (let n = start; n <= end; n++) {
    const marker = n === line ? '>' : ' ';
    rendered.push(`${marker} ${String(n).padStart(width)} | ${lines[n - 1]}`);
  }
  return rendered.join('\n');
}

export async function extractContext(
  filePath: string,
  line: number,
  window: number = DEFAULT_CONTEXT_WINDOW,
  readLines: LineReader = readFromDisk,
): Promise<string> {
  try {
    return renderContext(await readLines(filePath), line, window);
  } catch (err) {
    return `[context unavailable: ${describeError(err)}]`;
  }
}
