import { Severity, type Rule, type RuleMatch } from '../../types.js';
import {
  codeOf,
  enclosedBy,
  escapeRegExp,
  maskedCode,
  rangeContains,
  requireEnclosingMethod,
  type MethodRange,
} from '../primitives.js';
import { BaseRule } from './base.js';

type CloseStatus = 'closed' | 'escapes' | 'unclosed' | 'outsideFinally';

/**
 * Whether the resource held in `name` (opened on line `from`) is released
 * before `method` ends.
 */
function closeStatus(lines: readonly string[], method: MethodRange, from: number, name: string): CloseStatus {
  const n = escapeRegExp(name);
  if (/\.use\s*\{|\buse\s*\(/.test(codeOf(lines[from]))) return 'closed';
  if (rangeContains(lines, from + 1, method.end, new RegExp(`\\b${n}\\??\\.use\\b`))) return 'closed';
  // Returned or stored elsewhere: the caller owns it now.
  if (rangeContains(lines, from + 1, method.end, new RegExp(`(?:\\breturn\\s+|=\\s*)${n}\\s*;?\\s*$`))) {
    return 'escapes';
  }

  const close = new RegExp(`\\b${n}\\??\\.close\\(\\)`);
  let closed = false;
  for (let j = from + 1; j <= method.end && j < lines.length; j++) {
    if (!close.test(codeOf(lines[j]))) continue;
    if (enclosedBy(lines, j, /\bfinally\b/, method.start)) return 'closed';
    closed = true;
  }
  return closed ? 'outsideFinally' : 'unclosed';
}

const CURSOR_ASSIGNMENT =
  /\b(?:val|var|Cursor|final\s+Cursor)\s+(\w+)\s*(?::\s*Cursor\??\s*)?=\s*[^;]*?\b(?:rawQuery|query)\s*\(/;

export class CursorNotClosedRule extends BaseRule {
  constructor() {
    super({
      name: 'CURSOR_NOT_CLOSED',
      category: 'Resource Management',
      issueType: 'Cursor not closed',
      suggestion: 'Close the cursor in a finally block, use try-with-resources (Java) or cursor.use { } (Kotlin).',
      description: 'Cursor from rawQuery/query that is never closed, or closed outside finally',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, CURSOR_ASSIGNMENT)) {
      const cursor = CURSOR_ASSIGNMENT.exec(maskedCode(lines[i]));
      if (!cursor) continue;
      if (/\btry\s*\(/.test(codeOf(lines[i]))) continue;
      const method = this.resolve(() => requireEnclosingMethod(lines, i));
      if (!method) continue;

      const status = closeStatus(lines, method, i, cursor[1]);
      if (status === 'unclosed') {
        yield this.match(
          lines,
          i,
          `Cursor "${cursor[1]}" is never closed in ${method.name}(); leaked cursors exhaust the CursorWindow`,
          Severity.Medium,
        );
      } else if (status === 'outsideFinally') {
        yield this.match(
          lines,
          i,
          `Cursor "${cursor[1]}" is closed outside finally and leaks when reading it throws`,
          Severity.Low,
        );
      }
    }
  }
}

const CURSOR_READ = /\b(\w+)\.get(?:String|Int|Long|Double|Float|Short|Blob)\s*\(/;
const CURSOR_NAME = /cursor|^c$/i;
const MOVE = /\.moveTo(?:First|Next|Position|Last|Previous)\s*\(/;

/** Column reads on a cursor still positioned before the first row. */
export class CursorUncheckedMoveRule extends BaseRule {
  constructor() {
    super({
      name: 'CURSOR_UNCHECKED_MOVE',
      category: 'Resource Management',
      issueType: 'Cursor read without moveToFirst/moveToNext',
      suggestion: 'Check the result of moveToFirst()/moveToNext() before reading columns; an empty cursor throws CursorIndexOutOfBoundsException.',
      description: 'cursor.getX() with no moveTo* call earlier in the method',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    const reported = new Set<string>();

    for (const i of this.matchingLines(lines, CURSOR_READ)) {
      const read = CURSOR_READ.exec(maskedCode(lines[i]));
      if (!read || !CURSOR_NAME.test(read[1])) continue;
      const method = this.resolve(() => requireEnclosingMethod(lines, i));
      if (!method) continue;

      const key = `${method.start}:${read[1]}`;
      if (reported.has(key)) continue;
      const move = new RegExp(`\\b${escapeRegExp(read[1])}\\??${MOVE.source}`);
      if (rangeContains(lines, method.start, i, move)) continue;

      reported.add(key);
      yield this.match(
        lines,
        i,
        `${read[1]} is read before any moveToFirst()/moveToNext() in ${method.name}()`,
        Severity.High,
      );
    }
  }
}

const STREAM_ASSIGNMENT =
  /\b(?:val|var|final\s+[\w.<>]+|[\w.<>]+)\s+(\w+)\s*(?::\s*[\w.<>]+\??\s*)?=\s*(?:new\s+)?(FileInputStream|FileOutputStream|BufferedReader|BufferedWriter|FileReader|FileWriter|InputStreamReader|OutputStreamWriter|ObjectInputStream|ObjectOutputStream|RandomAccessFile|PrintWriter)\s*\(/;

export class StreamNotClosedRule extends BaseRule {
  constructor() {
    super({
      name: 'STREAM_NOT_CLOSED',
      category: 'Resource Management',
      issueType: 'Stream or reader not closed',
      suggestion: 'Open streams in try-with-resources (Java) or with .use { } (Kotlin) so they are closed on every path.',
      description: 'File streams and readers opened outside try-with-resources/use and not closed in finally',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, STREAM_ASSIGNMENT)) {
      const stream = STREAM_ASSIGNMENT.exec(maskedCode(lines[i]));
      if (!stream) continue;
      // try-with-resources header, possibly spread over the previous line
      if (/\btry\s*\(/.test(codeOf(lines[i])) || (i > 0 && /\btry\s*\(\s*$/.test(codeOf(lines[i - 1])))) continue;
      const method = this.resolve(() => requireEnclosingMethod(lines, i));
      if (!method) continue;

      const [, name, type] = stream;
      const status = closeStatus(lines, method, i, name);
      if (status === 'unclosed') {
        yield this.match(lines, i, `${type} "${name}" is never closed in ${method.name}()`, Severity.Medium);
      } else if (status === 'outsideFinally') {
        yield this.match(lines, i, `${type} "${name}" is closed outside finally and leaks when an I/O call throws`, Severity.Low);
      }
    }
  }
}

export const resourceRules: Rule[] = [new CursorNotClosedRule(), new CursorUncheckedMoveRule(), new StreamNotClosedRule()];
