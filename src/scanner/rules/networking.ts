import { Severity, type Rule, type RuleMatch } from '../../types.js';
import {
  codeOf,
  escapeRegExp,
  findEnclosingMethod,
  isInsideTry,
  rangeContains,
  windowContains,
} from '../primitives.js';
import { BaseRule } from './base.js';

const BODY_DEREFERENCE = /\.body(?:\(\))?\s*(?:!!)?\s*\.\s*\w/;
const RESPONSE_CHECKED =
  /\bisSuccessful\b|\.code\(\)\s*(?:==|in\b)|\bcode\s*(?:==|in\b)|\bbody(?:\(\))?\s*[!=]==?\s*null|\.isSuccess\b/;

/** Retrofit/OkHttp response bodies are null for non-2xx responses. */
export class ResponseBodyUncheckedRule extends BaseRule {
  constructor() {
    super({
      name: 'RESPONSE_BODY_UNCHECKED',
      category: 'Networking',
      issueType: 'HTTP response body used without status check',
      suggestion: 'Check response.isSuccessful (and body != null) before reading the body; handle error responses explicitly.',
      description: 'Dereference of response.body() with no isSuccessful or null check earlier in the method',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, BODY_DEREFERENCE)) {
      const method = findEnclosingMethod(lines, i);
      const checked = method
        ? rangeContains(lines, method.start, i, RESPONSE_CHECKED)
        : windowContains(lines, i, 10, RESPONSE_CHECKED);
      if (checked) continue;

      const caught = isInsideTry(lines, i);
      yield this.match(
        lines,
        i,
        caught
          ? 'Body of an unchecked response is read inside a try block; error responses surface as caught NullPointerExceptions'
          : 'Body is null for error responses (4xx/5xx) and this dereference crashes',
        caught ? Severity.Medium : Severity.High,
      );
    }
  }
}

const JSON_GETTER = /\.get(?:String|Int|Long|Double|Boolean|JSONObject|JSONArray)\s*\(\s*"([^"]*)"/;

/**
 * Strict org.json getters throw when a field is missing. Scoped to the PeerTube
 * client sources, whose API omits fields depending on the instance version.
 */
export class JsonStrictGetterRule extends BaseRule {
  constructor() {
    super({
      name: 'JSON_STRICT_GETTER',
      category: 'Exception Handling',
      issueType: 'Strict JSON getter on optional field',
      suggestion: 'Use optString/optInt/optJSONObject with a default, or check has("field") before reading it.',
      description: 'getString/getInt/getJSONObject on server JSON outside a try block',
      pathSegments: ['peertube'],
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, JSON_GETTER)) {
      const getter = JSON_GETTER.exec(codeOf(lines[i]));
      if (!getter) continue;
      if (isInsideTry(lines, i)) continue;
      if (windowContains(lines, i, 3, new RegExp(`\\b(?:has|isNull)\\(\\s*"${escapeRegExp(getter[1])}"`))) continue;

      yield this.match(
        lines,
        i,
        `Field "${getter[1]}" is read with a strict getter; instances that omit it throw JSONException`,
        Severity.Medium,
      );
    }
  }
}

export const networkingRules: Rule[] = [new ResponseBodyUncheckedRule(), new JsonStrictGetterRule()];
