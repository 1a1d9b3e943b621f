import { Severity, type Rule, type RuleMatch } from '../../types.js';
import {
  codeOf,
  escapeRegExp,
  findBlockEnd,
  findEnclosingMethod,
  maskedCode,
  rangeContains,
  windowContains,
} from '../primitives.js';
import { BaseRule } from './base.js';

const FIRST_ELEMENT = /\b(\w+)(?:\(\))?(?:\.get\(\s*0\s*\)|\[\s*0\s*\]|\.first\(\)|\.last\(\)|\.getFirst\(\)|\.getLast\(\))/;
const SPLIT_FIRST = /\.split\([^)]*\)\s*(?:\[\s*0\s*\]|\.get\(\s*0\s*\)|\.first\(\))/;
const EMPTY_ARRAY = /\bnew\s+[\w.<>]+\s*\[\s*0\s*\]/;
const SIZE_GUARD =
  /\bisEmpty\b|\bisNotEmpty\b|\bisNullOrEmpty\b|\bsize(?:\(\))?\s*(?:>|>=|!=|==|<)|\blength\s*(?:>|>=|!=|==)|\.any\(\)|\bcount(?:\(\))?\s*>|\bgetCount\(\)\s*>|\bmoveToFirst\b/;

export class CollectionIndexUncheckedRule extends BaseRule {
  constructor() {
    super({
      name: 'COLLECTION_INDEX_UNCHECKED',
      category: 'Collection Access',
      issueType: 'Collection element accessed without emptiness check',
      suggestion: 'Check isEmpty()/size before indexing, or use firstOrNull()/getOrNull() and handle the empty case.',
      description: 'Access to the first or last element with no size or emptiness guard nearby',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (let i = 0; i < lines.length; i++) {
      const code = maskedCode(lines[i]);
      const access = FIRST_ELEMENT.exec(code);
      if (!access || SPLIT_FIRST.test(code) || EMPTY_ARRAY.test(code)) continue;
      if (windowContains(lines, i, 5, SIZE_GUARD)) continue;

      const method = findEnclosingMethod(lines, i);
      const partial = method !== undefined && rangeContains(lines, method.start, method.end, SIZE_GUARD);
      yield this.match(
        lines,
        i,
        partial
          ? `"${access[0]}" relies on a size check that is not next to the access`
          : `"${access[0]}" throws when ${access[1]} is empty`,
        partial ? Severity.Medium : Severity.High,
      );
    }
  }
}

const SPLIT_INDEX = /\.split\((?:[^()]|\([^()]*\))*\)\s*(?:\[\s*([1-9]\d*)\s*\]|\.get\(\s*([1-9]\d*)\s*\))/;
const SPLIT_GUARD = /\.size\b|\.length\b|\bsize\(\)|\bisNotEmpty\b|\bcontains\(|\bindexOf\(|\bgetOrNull\(|\bgetOrElse\(/;

export class SplitIndexUncheckedRule extends BaseRule {
  constructor() {
    super({
      name: 'SPLIT_INDEX_UNCHECKED',
      category: 'Collection Access',
      issueType: 'split() result indexed without size check',
      suggestion: 'Check the number of parts returned by split() before indexing, or use getOrNull().',
      description: 'Indexing past the first element of a split() result without verifying its size',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, SPLIT_INDEX)) {
      const split = SPLIT_INDEX.exec(codeOf(lines[i]));
      if (!split) continue;
      if (windowContains(lines, i - 1, 4, SPLIT_GUARD)) continue;

      const index = split[1] ?? split[2];
      yield this.match(
        lines,
        i,
        `Part ${index} of split() does not exist when the separator is missing from the input`,
        Severity.High,
      );
    }
  }
}

const FOR_EACH = /\bfor\s*\(\s*(?:(?:final\s+)?[\w.<>?,\s]+\s+)?(\w+)\s*(?::|\bin\b)\s*(?:this\.)?([\w.]*?)(\w+)\s*\)/;
const FOR_EACH_LAMBDA = /\b(?:this\.)?(\w+)\.forEach\s*[({]/;
const MUTATIONS = 'add|addAll|remove|removeAt|removeAll|removeIf|retainAll|clear|put';

/** Structural modification of a collection while a for-each loop iterates it. */
export class ConcurrentModificationRule extends BaseRule {
  constructor() {
    super({
      name: 'CONCURRENT_MODIFICATION',
      category: 'Collection Access',
      issueType: 'Collection modified while iterating',
      suggestion: 'Iterate over a copy, use an explicit Iterator with iterator.remove(), removeIf/removeAll, or collect changes and apply them after the loop.',
      description: 'add/remove/clear on the collection iterated by the enclosing for-each loop',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    const reported = new Set<number>();

    for (let i = 0; i < lines.length; i++) {
      const code = maskedCode(lines[i]);
      const loop = FOR_EACH.exec(code);
      const lambda = loop ? null : FOR_EACH_LAMBDA.exec(code);
      const collection = loop ? loop[3] : lambda?.[1];
      if (!collection || collection === 'indices') continue;
      if (loop && /\.\.|\buntil\b|\bdownTo\b/.test(code)) continue;

      const end = findBlockEnd(lines, i);
      if (end === undefined) continue;

      const mutation = new RegExp(`\\b${escapeRegExp(collection)}\\.(${MUTATIONS})\\s*\\(`);
      for (let j = i; j <= end; j++) {
        const body = maskedCode(lines[j]);
        const change = mutation.exec(j === i ? body.slice(body.indexOf('{') + 1) : body);
        if (!change || reported.has(j)) continue;
        // Leaving the loop right after the change never touches the iterator again.
        if (/\b(?:break|return)\b/.test(body) || /^\s*(?:break|return)\b/.test(maskedCode(lines[j + 1] ?? ''))) continue;

        reported.add(j);
        yield this.match(
          lines,
          j,
          `${collection}.${change[1]}() inside the loop over ${collection} started at line ${i + 1} throws ConcurrentModificationException`,
          Severity.High,
        );
      }
    }
  }
}

const SUBSTRING = /\.substring\(\s*(\d+)\s*(?:,\s*(\d+)\s*)?\)/;
const LENGTH_GUARD = /\.length\b|\blength\(\)|\bisEmpty\b|\bisNotEmpty\b|\bstartsWith\(|\bcoerceAtMost\b|\bminOf\(|\bMath\.min\(/;

export class SubstringLiteralBoundsRule extends BaseRule {
  constructor() {
    super({
      name: 'SUBSTRING_LITERAL_BOUNDS',
      category: 'Collection Access',
      issueType: 'substring() with fixed bounds on variable-length text',
      suggestion: 'Check the string length first or use take()/drop() (Kotlin) which clamp to the available length.',
      description: 'substring() with literal indexes and no length check nearby',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, SUBSTRING)) {
      const bounds = SUBSTRING.exec(maskedCode(lines[i]));
      if (!bounds) continue;
      const [, from, to] = bounds;
      if (to === undefined && from === '0') continue;
      if (windowContains(lines, i, 3, LENGTH_GUARD)) continue;

      yield this.match(
        lines,
        i,
        `substring(${to === undefined ? from : `${from}, ${to}`}) throws StringIndexOutOfBoundsException on shorter input`,
        Severity.Medium,
      );
    }
  }
}

const POSITION =
  /\b(?:getAdapterPosition\(\)|getBindingAdapterPosition\(\)|getAbsoluteAdapterPosition\(\)|(?:bindingAdapterPosition|absoluteAdapterPosition|adapterPosition)\b)/;
const NO_POSITION = /\bNO_POSITION\b|\bposition\s*(?:<|>=)\s*0|\b\w*[Pp]os\w*\s*(?:<|>=|!=|==)\s*-?\s*[0-9]/;

/** ViewHolder positions are NO_POSITION (-1) while the item is being removed or rebound. */
export class RecyclerPositionUncheckedRule extends BaseRule {
  constructor() {
    super({
      name: 'RECYCLER_POSITION_UNCHECKED',
      category: 'Collection Access',
      issueType: 'Adapter position used without NO_POSITION check',
      suggestion: 'Compare the position with RecyclerView.NO_POSITION before using it as an index.',
      description: 'Adapter position from a ViewHolder used as an index without checking NO_POSITION',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    const reported = new Set<number>();

    for (const i of this.matchingLines(lines, POSITION)) {
      const code = maskedCode(lines[i]);
      const assigned = /\b(?:val|var|int|final\s+int)\s+(\w+)\s*=\s*[^;]*/.exec(code);

      if (assigned && POSITION.test(assigned[0])) {
        const name = escapeRegExp(assigned[1]);
        const index = new RegExp(`\\[\\s*${name}\\s*\\]|\\.(?:get|removeAt|remove|set)\\(\\s*${name}\\s*[,)]`);
        for (let j = i + 1; j < Math.min(lines.length, i + 11); j++) {
          if (windowContains(lines, j, j - i, NO_POSITION)) break;
          if (!index.test(maskedCode(lines[j])) || reported.has(j)) continue;
          reported.add(j);
          yield this.match(lines, j, `${assigned[1]} comes from the adapter position at line ${i + 1} and may be NO_POSITION (-1)`, Severity.High);
          break;
        }
        continue;
      }

      const directIndex = new RegExp(`(?:\\[|\\.(?:get|removeAt|remove|set)\\()\\s*${POSITION.source}`);
      if (!directIndex.test(code) || reported.has(i)) continue;
      if (windowContains(lines, i, 5, NO_POSITION)) continue;
      reported.add(i);
      yield this.match(lines, i, 'Adapter position is used as an index and may be NO_POSITION (-1)', Severity.High);
    }
  }
}

const DIVISION =
  /[^/*]\/=?\s*(?:[\w]+\.)*(size\(\)|size|length\(\)|length|count\(\)|count|itemCount|getItemCount\(\)|getCount\(\))(?![\w(])/;
const ZERO_GUARD =
  /\b(?:size|length|count|itemCount|getItemCount|getCount)(?:\(\))?\s*(?:>|!=|==|<=)\s*0|\bisEmpty\b|\bisNotEmpty\b|\bcoerceAtLeast\b|\bMath\.max\(|\bmaxOf\(/;
const FLOATING = /\btoFloat\(\)|\btoDouble\(\)|\(\s*(?:float|double)\s*\)|\d\.\d|\d[fF]\b/;

export class DivisionBySizeRule extends BaseRule {
  constructor() {
    super({
      name: 'DIVISION_BY_SIZE',
      category: 'Arithmetic',
      issueType: 'Division by a size that can be zero',
      suggestion: 'Guard the division with an emptiness check or clamp the divisor with coerceAtLeast(1)/Math.max(1, n).',
      description: 'Division by size/length/count with no zero check in the preceding lines',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (let i = 0; i < lines.length; i++) {
      const code = maskedCode(lines[i]);
      const division = DIVISION.exec(code);
      if (!division) continue;
      if (windowContains(lines, i, 5, ZERO_GUARD)) continue;

      const floating = FLOATING.test(code);
      yield this.match(
        lines,
        i,
        floating
          ? `Floating-point division by ${division[1]} yields NaN or Infinity when it is 0`
          : `Integer division by ${division[1]} throws ArithmeticException when it is 0`,
        floating ? Severity.Low : Severity.Medium,
      );
    }
  }
}

export const collectionRules: Rule[] = [
  new CollectionIndexUncheckedRule(),
  new SplitIndexUncheckedRule(),
  new ConcurrentModificationRule(),
  new SubstringLiteralBoundsRule(),
  new RecyclerPositionUncheckedRule(),
  new DivisionBySizeRule(),
];
