import { Severity, type Rule, type RuleMatch } from '../../types.js';
import {
  codeOf,
  enclosingOpeners,
  escapeRegExp,
  findBlockEnd,
  findEnclosingMethod,
  isInsideTry,
  maskedCode,
  rangeContains,
  windowContains,
} from '../primitives.js';
import { BaseRule, JAVA, KOTLIN } from './base.js';

const GUARD_WINDOW = 10;

const DECLARATION = /\b(?:val|var)\s+(\w+)(?:\s*:\s*([\w.]+(?:<[^>]*>)?\??))?/;
const PARAMETER = /(\w+)\s*:\s*([\w.]+(?:<[^>]*>)?\??)/g;

interface Declarations {
  nullable: string[];
  nonNull: string[];
}

interface TrackedNullable {
  declaredAt: number;
  /** Last line of the block the declaration lives in */
  scopeEnd: number;
  deref: RegExp;
  guard: RegExp;
}

function nullGuard(name: string): RegExp {
  const n = escapeRegExp(name);
  return new RegExp(
    [
      `\\b${n}\\s*[!=]==?\\s*null`,
      `\\bnull\\s*[!=]==?\\s*${n}\\b`,
      `\\b${n}\\?\\.(?:let|also|run|apply)\\b`,
      `\\b${n}\\s+is\\s`,
      `\\b${n}\\s*\\?:\\s*(?:return|throw|continue|break)`,
      `\\b(?:requireNotNull|checkNotNull)\\(\\s*${n}\\b`,
      `\\b${n}\\.isNullOrEmpty|\\b${n}\\.isNullOrBlank`,
      `(?<![\\w.:])${n}\\s*=\\s*(?!null\\b|=)`,
    ].join('|'),
  );
}

/**
 * Kotlin values declared nullable and then dereferenced with a plain `.`,
 * without a null check, safe call or early return nearby.
 */
export class NullableDereferenceRule extends BaseRule {
  constructor() {
    super({
      name: 'NULLABLE_DEREFERENCE',
      category: 'Null Safety',
      issueType: 'Nullable value dereferenced without null check',
      suggestion: 'Use a safe call (?.), an elvis fallback (?:) or check for null before dereferencing.',
      description: 'Dereference of a nullable declaration with no null guard in the preceding lines',
      extensions: KOTLIN,
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    const nullable = new Map<string, TrackedNullable>();

    for (let i = 0; i < lines.length; i++) {
      for (const [name, tracked] of nullable) {
        if (i > tracked.scopeEnd) nullable.delete(name);
      }

      const code = maskedCode(lines[i]);
      if (!code.trim()) continue;

      const declared = this.declarations(lines[i]);
      for (const name of declared.nonNull) nullable.delete(name);
      if (declared.nullable.length > 0) {
        const scopeEnd = this.scopeEnd(lines, i);
        for (const name of declared.nullable) {
          nullable.set(name, {
            declaredAt: i,
            scopeEnd,
            deref: new RegExp(`(?<![\\w.$:])${escapeRegExp(name)}\\.[A-Za-z_]`),
            guard: nullGuard(name),
          });
        }
      }

      for (const [name, tracked] of nullable) {
        if (tracked.declaredAt === i || !tracked.deref.test(code)) continue;
        if (windowContains(lines, i, GUARD_WINDOW, tracked.guard)) continue;

        const method = findEnclosingMethod(lines, i);
        const guardedIn =
          method && rangeContains(lines, method.start, method.end, tracked.guard) ? method.name : undefined;
        yield this.match(
          lines,
          i,
          guardedIn
            ? `"${name}" is nullable; a null check exists in ${guardedIn}() but not close to this dereference`
            : `"${name}" is declared nullable at line ${tracked.declaredAt + 1} and dereferenced without a null check`,
          guardedIn ? Severity.Medium : Severity.High,
        );
        break;
      }
    }
  }

  /** Names declared on `line`, split by whether their declared type is nullable. */
  private declarations(line: string): Declarations {
    const code = maskedCode(line);
    const found: Declarations = { nullable: [], nonNull: [] };
    const add = (name: string, type: string | undefined) => {
      if (found.nullable.includes(name) || found.nonNull.includes(name)) return;
      if (type?.endsWith('?')) found.nullable.push(name);
      else found.nonNull.push(name);
    };

    const declaration = DECLARATION.exec(code);
    if (declaration) add(declaration[1], declaration[2]);
    if (/\bfun\s/.test(code)) {
      for (const param of code.matchAll(PARAMETER)) add(param[1], param[2]);
    }
    return found;
  }

  /**
   * A `fun` line scopes its parameters to the function body; any other
   * declaration lives until its innermost enclosing block closes.
   */
  private scopeEnd(lines: readonly string[], index: number): number {
    const last = lines.length - 1;
    const code = maskedCode(lines[index]);
    if (/\bfun\s/.test(code)) {
      if (!code.includes('{') && /\)\s*(?::\s*[\w.<>?, ]+)?=/.test(code)) return index;
      return findBlockEnd(lines, index) ?? last;
    }
    const [opener] = enclosingOpeners(lines, index);
    if (opener === undefined) return last;
    return findBlockEnd(lines, opener) ?? last;
  }
}

const ASSERTION = /([\w.]+(?:\([^()]*\))?)!!/;
const PLATFORM_LOOKUP =
  /\b(?:intent|extras|arguments|savedInstanceState|findViewById|getSystemService|\w+Extra|body|activity|context|getParcelable\w*|getSerializable\w*)\b[^;]*!!/;

export class NotNullAssertionRule extends BaseRule {
  constructor() {
    super({
      name: 'NOT_NULL_ASSERTION',
      category: 'Null Safety',
      issueType: 'Non-null assertion (!!) may throw NullPointerException',
      suggestion: 'Replace !! with a safe call, an elvis fallback or an explicit null check with a meaningful error.',
      description: 'Use of the !! operator, stricter on values returned by platform lookups',
      extensions: KOTLIN,
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (let i = 0; i < lines.length; i++) {
      const code = maskedCode(lines[i]);
      if (!code.includes('!!')) continue;
      const assertion = ASSERTION.exec(codeOf(lines[i]));
      if (!assertion) continue;

      const subject = assertion[1];
      const simpleName = /^\w+$/.test(subject) ? subject : undefined;
      if (simpleName && windowContains(lines, i - 1, 3, new RegExp(`\\b${escapeRegExp(simpleName)}\\s*[!=]=\\s*null`))) {
        continue;
      }

      const platform = PLATFORM_LOOKUP.test(code);
      yield this.match(
        lines,
        i,
        platform
          ? `"${assertion[0]}" asserts a value the platform may return as null`
          : `"${assertion[0]}" throws if the value is null`,
        platform ? Severity.High : Severity.Medium,
      );
    }
  }
}

const EXTRA_DEREFERENCE =
  /\b(?:getExtras\(\)|getArguments\(\)|get\w*Extra\([^()]*\)|getString\(\s*"[^"]*"\s*\)|getBundle\([^()]*\))\s*\.\s*\w/;
const EXTRA_GUARD = /!=\s*null|\bhasExtra\(|\bcontainsKey\(|\bisNullOrEmpty\b/;

/** Chained calls on intent extras and fragment arguments, which are null when absent. */
export class IntentExtraDereferenceRule extends BaseRule {
  constructor() {
    super({
      name: 'INTENT_EXTRA_DEREFERENCE',
      category: 'Null Safety',
      issueType: 'Intent extra or argument dereferenced without null check',
      suggestion: 'Store the extra in a local, check it for null (or hasExtra/containsKey) and handle the missing case.',
      description: 'Chained dereference of getExtras(), getArguments() or get*Extra() results',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, EXTRA_DEREFERENCE)) {
      if (windowContains(lines, i, 3, EXTRA_GUARD)) continue;

      const caught = isInsideTry(lines, i);
      yield this.match(
        lines,
        i,
        caught
          ? 'Missing extra is dereferenced inside a try block; the failure is caught but the screen may be left half-initialized'
          : 'Missing extra or argument leads to a NullPointerException when the screen is opened without it',
        caught ? Severity.Medium : Severity.High,
      );
    }
  }
}

const FIND_VIEW_CHAIN = /\bfindViewById\s*\([^()]*\)\s*\)?\s*\.\s*\w+\s*\(/;

export class FindViewChainedCallRule extends BaseRule {
  constructor() {
    super({
      name: 'FIND_VIEW_CHAINED_CALL',
      category: 'Null Safety',
      issueType: 'findViewById result used without null check',
      suggestion: 'Assign the view to a field once in onCreate/onViewCreated and check it, or migrate to view binding.',
      description: 'Method called directly on the result of findViewById()',
      extensions: JAVA,
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, FIND_VIEW_CHAIN)) {
      yield this.match(
        lines,
        i,
        'findViewById() returns null when the id is not in the current layout (layout variants, include tags)',
        Severity.Medium,
      );
    }
  }
}

export const nullSafetyRules: Rule[] = [
  new NullableDereferenceRule(),
  new NotNullAssertionRule(),
  new IntentExtraDereferenceRule(),
  new FindViewChainedCallRule(),
];
