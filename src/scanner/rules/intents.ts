import { Severity, type Rule, type RuleMatch } from '../../types.js';
import { codeOf, findEnclosingMethod, isInsideTry, rangeContains, windowContains } from '../primitives.js';
import { BaseRule } from './base.js';

const LOOKBACK = 10;

const START = /\bstartActivity(?:ForResult)?\s*\(/;
const IMPLICIT_INTENT =
  /\bIntent\s*\(\s*(?:Intent\.|Settings\.|MediaStore\.|android\.provider\.Settings\.)?ACTION_\w+|\.setAction\s*\(|\baction\s*=\s*(?:Intent\.)?ACTION_/;
const RESOLVED = /\bresolveActivity\s*\(|\bqueryIntentActivities\s*\(|\bcreateChooser\s*\(/;
const NOT_FOUND = /\bActivityNotFoundException\b/;

/** Implicit intents started with no handler check; nothing may be installed to receive them. */
export class ImplicitIntentUnresolvedRule extends BaseRule {
  constructor() {
    super({
      name: 'IMPLICIT_INTENT_UNRESOLVED',
      category: 'Intents',
      issueType: 'Implicit intent started without resolving a handler',
      suggestion: 'Catch ActivityNotFoundException around startActivity, or check resolveActivity(packageManager) first.',
      description: 'startActivity() on an ACTION_* intent with no resolveActivity check or ActivityNotFoundException handling',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, START)) {
      if (!windowContains(lines, i, LOOKBACK, IMPLICIT_INTENT)) continue;
      if (RESOLVED.test(codeOf(lines[i])) || windowContains(lines, i, LOOKBACK, RESOLVED)) continue;

      const method = findEnclosingMethod(lines, i);
      if (method && rangeContains(lines, method.start, method.end, NOT_FOUND)) continue;

      const caught = isInsideTry(lines, i);
      yield this.match(
        lines,
        i,
        caught
          ? 'The surrounding try does not name ActivityNotFoundException; check that it catches it'
          : 'startActivity throws ActivityNotFoundException when no installed app handles the action',
        caught ? Severity.Medium : Severity.High,
      );
    }
  }
}

export const intentRules: Rule[] = [new ImplicitIntentUnresolvedRule()];
