import { Severity, type Rule, type RuleMatch } from '../../types.js';
import {
  codeOf,
  findBlockEnd,
  findEnclosingMethod,
  isCommentLine,
  isInsideTry,
  maskedCode,
  rangeContains,
  windowContains,
  type MethodRange,
} from '../primitives.js';
import { BaseRule } from './base.js';

const TRY = /\btry\b|\brunCatching\b/;

/**
 * Severity shared by the "throws on bad input" rules: a try elsewhere in the
 * same method is a partial mitigation.
 */
function unguardedSeverity(lines: readonly string[], method: MethodRange | undefined): Severity {
  if (method && rangeContains(lines, method.start, method.end, TRY)) return Severity.Medium;
  return Severity.High;
}

const JAVA_PARSE =
  /\b(?:Integer\.parseInt|Integer\.valueOf|Long\.parseLong|Long\.valueOf|Double\.parseDouble|Double\.valueOf|Float\.parseFloat|Float\.valueOf|Short\.parseShort|Byte\.parseByte)\s*\(\s*(?![\d-])/;
const KOTLIN_PARSE =
  /(?:\.toString\(\)|\.text\b|\btext\b|\w*(?:[Ss]tr|[Ss]tring|[Ii]nput|[Tt]ext)\b|readLine\(\)!*|getString\([^)]*\)!*|\.trim\(\))\s*\.to(?:Int|Long|Double|Float|Short|Byte|BigDecimal|BigInteger)\(\)/;
const DIGITS_CHECKED = /isDigitsOnly|\.all\s*\{\s*it\.isDigit|matches\(|\\\\d\+|toIntOrNull|isNumeric/;

export class UnguardedNumberParseRule extends BaseRule {
  constructor() {
    super({
      name: 'UNGUARDED_NUMBER_PARSE',
      category: 'Exception Handling',
      issueType: 'Number parsing without NumberFormatException handling',
      suggestion: 'Use toIntOrNull()/toLongOrNull() in Kotlin or wrap parseInt/valueOf in try/catch(NumberFormatException) with a fallback.',
      description: 'String-to-number conversion outside any try block',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (let i = 0; i < lines.length; i++) {
      const code = codeOf(lines[i]);
      const call = JAVA_PARSE.exec(code) ?? KOTLIN_PARSE.exec(code);
      if (!call) continue;
      if (isInsideTry(lines, i)) continue;
      if (windowContains(lines, i, 3, DIGITS_CHECKED)) continue;

      const severity = unguardedSeverity(lines, findEnclosingMethod(lines, i));
      yield this.match(
        lines,
        i,
        `"${call[0].replace(/\s*\(\s*$/, '')}" throws NumberFormatException on empty or non-numeric input`,
        severity,
      );
    }
  }
}

function declaresThrows(lines: readonly string[], method: MethodRange): boolean {
  if (/\bthrows\b/.test(codeOf(lines[method.start]))) return true;
  return method.start > 0 && /@Throws\b/.test(codeOf(lines[method.start - 1]));
}

const JSON_PARSE = /\bJSON(?:Object|Array)\s*\(\s*[^)\s]|\.fromJson\s*\(|\bJsonParser\.parseString\s*\(/;

export class UnguardedJsonParseRule extends BaseRule {
  constructor() {
    super({
      name: 'UNGUARDED_JSON_PARSE',
      category: 'Exception Handling',
      issueType: 'JSON parsing without exception handling',
      suggestion: 'Wrap JSON parsing in try/catch (JSONException, JsonSyntaxException) or runCatching and handle malformed payloads.',
      description: 'JSONObject/JSONArray construction or Gson.fromJson outside any try block',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, JSON_PARSE)) {
      if (isInsideTry(lines, i)) continue;

      const method = findEnclosingMethod(lines, i);
      // A method declaring the exception hands it to its caller.
      if (method && declaresThrows(lines, method)) continue;

      yield this.match(
        lines,
        i,
        'Malformed or unexpected server payloads throw while parsing and crash the caller',
        unguardedSeverity(lines, method),
      );
    }
  }
}

const CATCH = /\bcatch\s*\(([^)]*)\)\s*\{?/;
const BROAD_CATCH = /\b(?:Throwable|Exception|RuntimeException)\b/;

/** Catch blocks that swallow the failure without logging or handling it. */
export class EmptyCatchBlockRule extends BaseRule {
  constructor() {
    super({
      name: 'EMPTY_CATCH_BLOCK',
      category: 'Exception Handling',
      issueType: 'Exception silently swallowed',
      suggestion: 'Log the exception and restore a consistent state, or let it propagate; never leave the catch block empty.',
      description: 'catch block whose body contains no statements',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, CATCH)) {
      const caught = CATCH.exec(codeOf(lines[i]));
      if (!caught) continue;
      const end = findBlockEnd(lines, i);
      if (end === undefined) continue;

      const body = this.body(lines, i, end);
      if (body === undefined || body.code.trim()) continue;

      const type = caught[1].trim();
      const broad = BROAD_CATCH.test(type);
      let severity = broad ? Severity.Medium : Severity.Low;
      if (body.commented) severity = Severity.Low;
      yield this.match(
        lines,
        i,
        body.commented
          ? `catch (${type}) only contains a comment; failures are hidden`
          : `catch (${type}) has an empty body${broad ? ' and hides every failure, including crashes' : ''}`,
        severity,
      );
    }
  }

  private body(lines: readonly string[], start: number, end: number): { code: string; commented: boolean } | undefined {
    const joined = lines.slice(start, end + 1).map(maskedCode).join('\n');
    const catchAt = joined.search(/\bcatch\b/);
    const open = joined.indexOf('{', catchAt);
    if (open === -1) return undefined;
    let depth = 0;
    for (let c = open; c < joined.length; c++) {
      if (joined[c] === '{') depth++;
      else if (joined[c] === '}') {
        depth--;
        if (depth === 0) {
          const commented = lines.slice(start, end + 1).some((line, k) => {
            if (k === 0) return /\{\s*(?:\/\/|\/\*)/.test(line);
            return isCommentLine(line) || (k === end - start && /\/\//.test(line));
          });
          return { code: joined.slice(open + 1, c), commented };
        }
      }
    }
    return undefined;
  }
}

export const exceptionRules: Rule[] = [
  new UnguardedNumberParseRule(),
  new UnguardedJsonParseRule(),
  new EmptyCatchBlockRule(),
];
