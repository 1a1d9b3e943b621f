import { Severity, type Rule, type RuleMatch } from '../../types.js';
import {
  codeOf,
  enclosedBy,
  escapeRegExp,
  findBlockEnd,
  maskedCode,
  rangeContains,
  requireEnclosingMethod,
} from '../primitives.js';
import { BaseRule, JAVA } from './base.js';

const PREPARE_ASYNC = /\b(\w+)\??\.prepareAsync\(\)/;
const RELEASE = /\b(\w+)\??\.release\(\)/;
const PREPARED_LISTENER = /\bsetOnPreparedListener\b|\bonPrepared\b/;
const PLAYER_CREATED = /\b(\w+)\s*=\s*(?:new\s+)?MediaPlayer\(\)/;

/**
 * MediaPlayer is a state machine: start() before the prepared callback, any
 * call after release(), and start() on a player that is never prepared all
 * throw IllegalStateException.
 */
export class MediaPlayerStateRule extends BaseRule {
  constructor() {
    super({
      name: 'MEDIA_PLAYER_STATE',
      category: 'State Machine',
      issueType: 'MediaPlayer used in an invalid state',
      suggestion: 'Call start() from OnPreparedListener after prepareAsync(), set the player to null after release(), and prepare before starting.',
      description: 'MediaPlayer start/use that violates the prepare/start/release state sequence',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    const reported = new Set<number>();

    for (let i = 0; i < lines.length; i++) {
      const code = maskedCode(lines[i]);

      const asyncPrepare = PREPARE_ASYNC.exec(code);
      if (asyncPrepare) {
        const method = this.resolve(() => requireEnclosingMethod(lines, i));
        if (!method) continue;
        const start = new RegExp(`\\b${escapeRegExp(asyncPrepare[1])}\\??\\.start\\(\\)`);
        for (let j = i + 1; j <= method.end; j++) {
          const later = maskedCode(lines[j]);
          if (!start.test(later) || reported.has(j)) continue;
          if (PREPARED_LISTENER.test(later) || enclosedBy(lines, j, PREPARED_LISTENER, i)) continue;
          reported.add(j);
          yield this.match(
            lines,
            j,
            `${asyncPrepare[1]}.start() runs right after prepareAsync() at line ${i + 1}, before the player is prepared`,
            Severity.High,
          );
        }
      }

      const release = RELEASE.exec(code);
      if (release) {
        const method = this.resolve(() => requireEnclosingMethod(lines, i));
        if (!method) continue;
        const name = escapeRegExp(release[1]);
        const reassigned = new RegExp(`(?<![\\w.])${name}\\s*=(?!=)`);
        const used = new RegExp(`(?<![\\w.])${name}\\.(?!release\\b)(\\w+)\\s*\\(`);
        for (let j = i + 1; j <= method.end; j++) {
          const later = maskedCode(lines[j]);
          if (reassigned.test(later)) break;
          const use = used.exec(later);
          if (!use || reported.has(j)) continue;
          reported.add(j);
          yield this.match(
            lines,
            j,
            `${release[1]}.${use[1]}() is called after ${release[1]}.release() at line ${i + 1}`,
            Severity.High,
          );
          break;
        }
      }
    }

    yield* this.startWithoutPrepare(lines, reported);
  }

  private *startWithoutPrepare(lines: readonly string[], reported: Set<number>): Generator<RuleMatch> {
    const created = new Set<string>();
    for (const line of lines) {
      const player = PLAYER_CREATED.exec(maskedCode(line));
      if (player) created.add(player[1]);
    }

    for (const name of created) {
      const n = escapeRegExp(name);
      if (rangeContains(lines, 0, lines.length - 1, new RegExp(`\\b${n}\\??\\.prepare(?:Async)?\\(\\)`))) continue;
      const start = new RegExp(`\\b${n}\\??\\.start\\(\\)`);
      for (let i = 0; i < lines.length; i++) {
        if (!start.test(maskedCode(lines[i])) || reported.has(i)) continue;
        reported.add(i);
        yield this.match(lines, i, `${name} is created with MediaPlayer() but never prepared before start()`, Severity.Medium);
      }
    }
  }
}

const SWITCH = /\bswitch\s*\(/;
const SWITCH_EXPRESSION = /(?:=|\breturn)\s*switch\s*\(/;
const DEFAULT_BRANCH = /\bdefault\s*(?::|->)/;

/** Java switch statements over state values with no default branch. */
export class SwitchWithoutDefaultRule extends BaseRule {
  constructor() {
    super({
      name: 'SWITCH_WITHOUT_DEFAULT',
      category: 'State Machine',
      issueType: 'State switch without default branch',
      suggestion: 'Add a default branch that logs or rejects unexpected states so new states are not silently ignored.',
      description: 'switch statement whose block contains no default label',
      extensions: JAVA,
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, SWITCH)) {
      const code = codeOf(lines[i]);
      if (SWITCH_EXPRESSION.test(code)) continue;
      const end = findBlockEnd(lines, i);
      if (end === undefined) continue;
      if (rangeContains(lines, i, end, DEFAULT_BRANCH)) continue;

      const subject = /\bswitch\s*\(([^)]*)\)/.exec(code)?.[1].trim() ?? 'value';
      yield this.match(lines, i, `switch (${subject}) ignores any value without a case label`, Severity.Low);
    }
  }
}

export const stateMachineRules: Rule[] = [new MediaPlayerStateRule(), new SwitchWithoutDefaultRule()];
