import { Severity, type Rule, type RuleMatch } from '../../types.js';
import { accumulateCall, codeOf, escapeRegExp, maskedCode } from '../primitives.js';
import { BaseRule } from './base.js';
import { CONSTANT_NAME } from './patterns.js';

const SQL_CALL = /\b(rawQuery|execSQL|compileStatement)\s*\(|\.(query)\s*\(/;
const VARIABLE_LOOKBACK = 10;
const MAX_DECLARATION_LINES = 10;

/** How the SQL text of one argument was put together. */
type SqlBuild =
  | { kind: 'concatenation'; operand: string }
  | { kind: 'format' }
  | { kind: 'template'; expression: string }
  | { kind: 'constants'; operands: string[] };

/**
 * Split `text` at top-level occurrences of `separator`, ignoring separators
 * inside string literals and brackets.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (depth === 0 && ch === separator) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/** Text between the parenthesis at `open` and its partner. */
function argumentText(text: string, open: number): string | undefined {
  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '(') depth++;
    else if (ch === ')') {
      depth--;
      if (depth === 0) return text.slice(open + 1, i);
    }
  }
  return undefined;
}

const STRING_LITERAL = /^"(?:[^"\\]|\\.)*"$/;
const TEMPLATE = /\$\{([^}]*)\}|\$([A-Za-z_]\w*)/;

function isConstant(operand: string): boolean {
  return CONSTANT_NAME.test(operand) || /^-?\d+[LlFf]?$/.test(operand);
}

function classify(expression: string, kotlin: boolean): SqlBuild | undefined {
  const value = expression.trim();
  if (/^String\.format\s*\(|\.format\s*\(/.test(value)) return { kind: 'format' };

  const operands = splitTopLevel(value, '+');
  if (kotlin) {
    for (const operand of operands) {
      const template = STRING_LITERAL.test(operand) ? TEMPLATE.exec(operand) : null;
      if (template) return { kind: 'template', expression: template[1] ?? template[2] };
    }
  }
  if (operands.length < 2) return undefined;

  const dynamic = operands.find((operand) => !STRING_LITERAL.test(operand) && !isConstant(operand));
  if (dynamic) return { kind: 'concatenation', operand: dynamic };
  const constants = operands.filter((operand) => !STRING_LITERAL.test(operand));
  return constants.length > 0 ? { kind: 'constants', operands: constants } : undefined;
}

/**
 * SQL assembled from runtime values and handed to SQLite. Besides injection,
 * an apostrophe in the value makes the statement fail to compile.
 */
export class SqlStringConcatenationRule extends BaseRule {
  constructor() {
    super({
      name: 'SQL_STRING_CONCATENATION',
      category: 'SQL',
      issueType: 'SQL built by string concatenation',
      suggestion: 'Use "?" placeholders with selectionArgs/bindArgs (or Room @Query parameters) instead of building SQL from values.',
      description: 'rawQuery/execSQL/query/compileStatement whose SQL is concatenated, formatted or templated',
    });
  }

  protected *detect(lines: readonly string[], filePath: string): Generator<RuleMatch> {
    const kotlin = /\.kts?$/i.test(filePath);
    let skipUntil = -1;

    for (let i = 0; i < lines.length; i++) {
      if (i <= skipUntil) continue;
      const call = SQL_CALL.exec(maskedCode(lines[i]));
      if (!call) continue;
      const method = call[1] ?? call[2];

      const accumulated = accumulateCall(lines, i, call.index);
      if (!accumulated) continue;
      skipUntil = accumulated.endIndex;

      const open = accumulated.text.indexOf('(', call.index);
      const args = argumentText(accumulated.text, open);
      if (args === undefined) continue;

      const finding = this.inspect(lines, i, method, splitTopLevel(args, ','), kotlin);
      if (finding) yield finding;
    }
  }

  private inspect(
    lines: readonly string[],
    index: number,
    method: string,
    args: string[],
    kotlin: boolean,
  ): RuleMatch | undefined {
    let constants: string[] | undefined;
    for (const arg of args) {
      const build = classify(arg, kotlin);
      if (build && build.kind !== 'constants') {
        return this.match(lines, index, this.describe(method, build), Severity.High);
      }
      if (build) constants = build.operands;

      if (/^\w+$/.test(arg) && !isConstant(arg)) {
        const declared = this.declaredBuild(lines, index, arg, kotlin);
        if (declared && declared.build.kind !== 'constants') {
          return this.match(
            lines,
            index,
            `"${arg}" passed to ${method}() is built at line ${declared.line + 1}: ${this.describe(method, declared.build)}`,
            Severity.High,
          );
        }
      }
    }

    if (!constants) return undefined;
    return this.match(
      lines,
      index,
      `SQL passed to ${method}() only concatenates constants (${constants.join(', ')}); prefer a single literal or bind arguments`,
      Severity.Low,
    );
  }

  /** Look back for the declaration of a query variable and classify its initializer. */
  private declaredBuild(
    lines: readonly string[],
    index: number,
    name: string,
    kotlin: boolean,
  ): { line: number; build: SqlBuild } | undefined {
    const n = escapeRegExp(name);
    const declaration = new RegExp(`\\b(?:val|var|String)\\s+${n}\\s*(?::\\s*String\\s*)?=(?!=)|(?<![\\w.])${n}\\s*\\+=`);

    for (let j = index - 1; j >= Math.max(0, index - VARIABLE_LOOKBACK); j--) {
      const found = declaration.exec(codeOf(lines[j]));
      if (!found) continue;

      const parts = [codeOf(lines[j]).slice(found.index + found[0].length)];
      for (let k = j + 1; k < lines.length && k - j < MAX_DECLARATION_LINES; k++) {
        const previous = parts[parts.length - 1].trim();
        const next = codeOf(lines[k]).trim();
        if (previous.endsWith(';') || (!previous.endsWith('+') && !next.startsWith('+'))) break;
        parts.push(next);
      }
      const initializer = parts.join(' ').trim().replace(/;$/, '');
      const build = classify(initializer, kotlin);
      // `+=` appends to whatever came before, so any non-literal piece counts.
      if (!build && found[0].endsWith('+=') && !STRING_LITERAL.test(initializer) && !isConstant(initializer)) {
        return { line: j, build: { kind: 'concatenation', operand: initializer } };
      }
      if (build) return { line: j, build };
    }
    return undefined;
  }

  private describe(method: string, build: SqlBuild): string {
    switch (build.kind) {
      case 'concatenation':
        return `SQL passed to ${method}() concatenates ${build.operand}`;
      case 'format':
        return `SQL passed to ${method}() is built with String.format`;
      case 'template':
        return `SQL passed to ${method}() interpolates ${build.expression} through a string template`;
      case 'constants':
        return `SQL passed to ${method}() concatenates constants (${build.operands.join(', ')})`;
    }
  }
}

export const sqlRules: Rule[] = [new SqlStringConcatenationRule()];
