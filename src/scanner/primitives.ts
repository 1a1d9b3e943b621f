import { RuleEvaluationError } from '../errors.js';

/**
 * Line-oriented scanning helpers shared by every rule.
 *
 * None of these parse the language. They work on raw lines, skip string literal
 * contents and `//` comments where it matters, and give up (return `undefined`)
 * instead of guessing when a boundary cannot be found.
 */

export interface BlockRange {
  /** 0-based index of the line holding the declaration */
  start: number;
  /** 0-based index of the line holding the closing brace */
  end: number;
}

export interface MethodRange extends BlockRange {
  name: string;
}

export interface AccumulatedCall {
  text: string;
  endIndex: number;
}

export type WindowDirection = 'before' | 'after' | 'around';

const MAX_CALL_LINES = 30;
const MAX_BRACE_SEARCH = 10;

const KOTLIN_FUN = /\bfun\s+(?:<[^>]*>\s*)?(?:[\w.]+\.)?(\w+)\s*\(/;
const JAVA_METHOD =
  /^\s*(?:@\w+(?:\([^)]*\))?\s+)*(?:(?:public|protected|private|static|final|abstract|synchronized|native|default)\s+)*(?:<[^>]+>\s+)?([\w.$]+(?:<[^()]*>)?(?:\[\])*)\s+(\w+)\s*\(/;
const NOT_A_TYPE = new Set([
  'return', 'new', 'else', 'throw', 'case', 'package', 'import', 'yield',
  'class', 'interface', 'object', 'enum', 'record',
]);
const CONTROL_WORDS = new Set(['if', 'for', 'while', 'switch', 'catch', 'synchronized', 'when', 'try']);

export function isCommentLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.startsWith('//') || trimmed.startsWith('/*') || trimmed.startsWith('*');
}

/**
 * Blank out the contents of string and char literals, keeping the quotes and
 * the line length so that column positions stay valid.
 */
export function stripStrings(line: string): string {
  let out = '';
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === '\\' && i + 1 < line.length) {
        out += '  ';
        i++;
        continue;
      }
      if (ch === quote) {
        quote = null;
        out += ch;
      } else {
        out += ' ';
      }
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    out += ch;
  }
  return out;
}

/** Drop `//` tails and single-line block comments that sit outside string literals. */
export function stripComments(line: string): string {
  const masked = stripStrings(line);
  let result = line;
  const blockStart = masked.indexOf('/*');
  if (blockStart !== -1) {
    const blockEnd = masked.indexOf('*/', blockStart + 2);
    if (blockEnd !== -1) {
      const spaces = ' '.repeat(blockEnd + 2 - blockStart);
      return stripComments(result.slice(0, blockStart) + spaces + result.slice(blockEnd + 2));
    }
  }
  const lineComment = masked.indexOf('//');
  if (lineComment !== -1) result = result.slice(0, lineComment);
  return result;
}

/** Code portion of a line: comments removed, string contents kept. */
export function codeOf(line: string): string {
  return isCommentLine(line) ? '' : stripComments(line);
}

/** Code portion of a line with string contents blanked. */
export function maskedCode(line: string): string {
  return isCommentLine(line) ? '' : stripStrings(stripComments(line));
}

export function braceDelta(line: string): number {
  let delta = 0;
  for (const ch of maskedCode(line)) {
    if (ch === '{') delta++;
    else if (ch === '}') delta--;
  }
  return delta;
}

/**
 * From a line that opens a block (or whose block opens within the next few
 * lines), return the index of the line that closes it.
 */
export function findBlockEnd(lines: readonly string[], openIndex: number): number | undefined {
  let depth = 0;
  let opened = false;
  for (let i = openIndex; i < lines.length; i++) {
    if (!opened && i - openIndex > MAX_BRACE_SEARCH) return undefined;
    for (const ch of maskedCode(lines[i])) {
      if (ch === '{') {
        depth++;
        opened = true;
      } else if (ch === '}') {
        if (!opened) continue;
        depth--;
        if (depth === 0) return i;
      }
    }
  }
  return undefined;
}

/**
 * Indexes of lines that open a block enclosing `index`, innermost first.
 * Walks backward counting braces; stops at `stop` (inclusive).
 */
export function enclosingOpeners(lines: readonly string[], index: number, stop = 0): number[] {
  const openers: number[] = [];
  let depth = 0;
  // The target line itself is not inspected: its braces may open or close
  // around the match in either order, and callers check that line directly.
  for (let i = Math.min(index, lines.length) - 1; i >= Math.max(stop, 0); i--) {
    const text = maskedCode(lines[i]);
    let opensHere = false;
    for (let c = text.length - 1; c >= 0; c--) {
      const ch = text[c];
      if (ch === '}') depth++;
      else if (ch === '{') {
        if (depth > 0) depth--;
        else opensHere = true;
      }
    }
    if (opensHere) openers.push(i);
  }
  return openers;
}

/**
 * The header text of a block opened on `opener`. Allman-style braces put the
 * `{` alone on its line, so the previous non-blank line is joined in front.
 */
export function openerHeader(lines: readonly string[], opener: number): string {
  const own = codeOf(lines[opener]);
  if (own.trim() !== '{') return own;
  for (let i = opener - 1; i >= 0; i--) {
    const prev = codeOf(lines[i]);
    if (prev.trim()) return `${prev} ${own}`;
  }
  return own;
}

export function declaredMethodName(text: string): string | undefined {
  const kotlin = KOTLIN_FUN.exec(text);
  if (kotlin) return kotlin[1];
  const java = JAVA_METHOD.exec(text);
  if (!java) return undefined;
  const [, type, name] = java;
  if (NOT_A_TYPE.has(type) || CONTROL_WORDS.has(name) || CONTROL_WORDS.has(type)) return undefined;
  return name;
}

/** Nearest method or function declaration whose body contains `index`. */
export function findEnclosingMethod(lines: readonly string[], index: number): MethodRange | undefined {
  for (const opener of enclosingOpeners(lines, index)) {
    const name = declaredMethodName(openerHeader(lines, opener));
    if (!name) continue;
    const start = codeOf(lines[opener]).trim() === '{' ? previousCodeLine(lines, opener) : opener;
    const end = findBlockEnd(lines, opener);
    if (end === undefined || end < index) return undefined;
    return { start, end, name };
  }
  return undefined;
}

export function requireEnclosingMethod(lines: readonly string[], index: number): MethodRange {
  const method = findEnclosingMethod(lines, index);
  if (!method) {
    throw new RuleEvaluationError(`No enclosing method for line ${index + 1}`);
  }
  return method;
}

function previousCodeLine(lines: readonly string[], index: number): number {
  for (let i = index - 1; i >= 0; i--) {
    if (codeOf(lines[i]).trim()) return i;
  }
  return index;
}

/** True when any enclosing block header (up to `stop`) matches `pattern`. */
export function enclosedBy(lines: readonly string[], index: number, pattern: RegExp, stop = 0): boolean {
  return enclosingOpeners(lines, index, stop).some((opener) => pattern.test(openerHeader(lines, opener)));
}

export function isInsideTry(lines: readonly string[], index: number, stop = 0): boolean {
  return enclosedBy(lines, index, /\btry\b|\brunCatching\b/, stop);
}

export function rangeContains(lines: readonly string[], start: number, end: number, pattern: RegExp): boolean {
  const from = Math.max(0, start);
  const to = Math.min(lines.length - 1, end);
  for (let i = from; i <= to; i++) {
    if (pattern.test(codeOf(lines[i]))) return true;
  }
  return false;
}

/** Test `pattern` against the lines within `radius` of `index`, clipped to the file. */
export function windowContains(
  lines: readonly string[],
  index: number,
  radius: number,
  pattern: RegExp,
  direction: WindowDirection = 'before',
): boolean {
  const start = direction === 'after' ? index : index - radius;
  const end = direction === 'before' ? index : index + radius;
  return rangeContains(lines, start, end, pattern);
}

/**
 * Join lines from `index` until the parenthesis opened at or after column
 * `openAt` is balanced again. Returns `undefined` when it never closes.
 */
export function accumulateCall(lines: readonly string[], index: number, openAt = 0): AccumulatedCall | undefined {
  let depth = 0;
  let opened = false;
  const parts: string[] = [];
  for (let i = index; i < lines.length && i - index < MAX_CALL_LINES; i++) {
    const raw = lines[i];
    const text = maskedCode(raw);
    parts.push(i === index ? raw : raw.trim());
    for (let c = i === index ? openAt : 0; c < text.length; c++) {
      const ch = text[c];
      if (ch === '(') {
        depth++;
        opened = true;
      } else if (ch === ')' && opened) {
        depth--;
        if (depth === 0) return { text: parts.join(' '), endIndex: i };
      }
    }
  }
  return undefined;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
