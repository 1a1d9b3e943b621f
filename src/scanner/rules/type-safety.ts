import { Severity, type Rule, type RuleMatch } from '../../types.js';
import { escapeRegExp, maskedCode, windowContains } from '../primitives.js';
import { BaseRule } from './base.js';

const CAST_SOURCE =
  'getSerializable\\w*|getParcelable\\w*|getSystemService|findViewById|getArguments|arguments|get\\w*Extra|getTag|getItem';
const KOTLIN_CAST = new RegExp(`\\b(?:${CAST_SOURCE})\\b[^;]*?\\sas\\s+([\\w.]+(?:<[^>]*>)?)(\\?)?`);
const JAVA_CAST = new RegExp(`\\(\\s*([A-Z][\\w.]*(?:<[^>]*>)?)\\s*\\)\\s*(?:[\\w.]+\\.)?(?:${CAST_SOURCE})\\s*\\(`);

/**
 * Hard casts on values whose runtime type the compiler cannot see: bundle
 * lookups, system services, views and adapter items.
 */
export class UnsafeCastRule extends BaseRule {
  constructor() {
    super({
      name: 'UNSAFE_CAST',
      category: 'Type Safety',
      issueType: 'Unchecked cast of a platform value',
      suggestion: 'Use a safe cast (as?) with a fallback, or check the type with is/instanceof before casting.',
      description: 'Hard cast of bundle extras, arguments, system services or views without a type check',
    });
  }

  protected *detect(lines: readonly string[], filePath: string): Generator<RuleMatch> {
    const kotlin = /\.kts?$/i.test(filePath);
    const cast = kotlin ? KOTLIN_CAST : JAVA_CAST;

    for (const i of this.matchingLines(lines, cast)) {
      const found = cast.exec(maskedCode(lines[i]));
      if (!found) continue;
      const [, type, nullable] = found;

      const simpleType = escapeRegExp(type.replace(/<.*$/, '').split('.').pop() ?? type);
      const checked = new RegExp(`\\bis\\s+(?:[\\w.]+\\.)?${simpleType}\\b|\\binstanceof\\s+(?:[\\w.]+\\.)?${simpleType}\\b`);
      if (windowContains(lines, i, 3, checked)) continue;

      if (kotlin) {
        yield this.match(
          lines,
          i,
          nullable
            ? `"as ${type}?" still throws ClassCastException when the value has another type`
            : `"as ${type}" throws ClassCastException (or NullPointerException when the value is absent)`,
          Severity.High,
        );
      } else {
        yield this.match(lines, i, `Cast to ${type} throws ClassCastException when the value has another type`, Severity.Medium);
      }
    }
  }
}

export const typeSafetyRules: Rule[] = [new UnsafeCastRule()];
