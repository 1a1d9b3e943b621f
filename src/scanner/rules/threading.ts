import { Severity, type Rule, type RuleMatch } from '../../types.js';
import { codeOf, declaredMethodName, enclosingOpeners, openerHeader } from '../primitives.js';
import { BaseRule } from './base.js';
import { BACKGROUND_THREAD, MAIN_THREAD_HOP, UI_LISTENER, UI_METHOD } from './patterns.js';

type ThreadContext = { thread: 'main' | 'background'; via: string };

/** Method names of anonymous callback bodies; the block around them decides the thread. */
const CALLBACK_BODY = /^(?:run|call|invoke|handleMessage)$/;

/**
 * Which thread the code at `index` runs on, judged from the innermost
 * enclosing block header that says anything about it.
 */
export function threadContext(lines: readonly string[], index: number): ThreadContext | undefined {
  for (const opener of enclosingOpeners(lines, index)) {
    const header = openerHeader(lines, opener);
    if (MAIN_THREAD_HOP.test(header)) return { thread: 'main', via: header.trim() };
    if (BACKGROUND_THREAD.test(header)) return { thread: 'background', via: header.trim() };
    if (UI_LISTENER.test(header)) return { thread: 'main', via: header.trim() };

    const method = declaredMethodName(header);
    if (!method || CALLBACK_BODY.test(method)) continue;
    return UI_METHOD.test(method) ? { thread: 'main', via: `${method}()` } : undefined;
  }
  return undefined;
}

const NETWORK_CALL =
  /\bopenConnection\s*\(\)|\bnewCall\s*\([^)]*\)\s*\.execute\s*\(\)|\bnew\s+Socket\s*\(|(?<![\w.])Socket\s*\(\s*\S|\bURL\s*\([^)]*\)\s*\.(?:readText|readBytes|openStream)\s*\(/;

export class NetworkOnMainThreadRule extends BaseRule {
  constructor() {
    super({
      name: 'NETWORK_ON_MAIN_THREAD',
      category: 'Threading',
      issueType: 'Network call on the main thread',
      suggestion: 'Move the call to a background dispatcher/executor (or use enqueue) and post the result back to the UI.',
      description: 'openConnection(), OkHttp execute() or sockets inside UI callbacks',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, NETWORK_CALL)) {
      const context = threadContext(lines, i);
      if (context?.thread !== 'main') continue;
      yield this.match(
        lines,
        i,
        `Network I/O in ${context.via} throws NetworkOnMainThreadException`,
        Severity.High,
      );
    }
  }
}

const BLOCKING = /\brunBlocking\b|\bThread\.sleep\s*\(|\bSystemClock\.sleep\s*\(|\.join\s*\(\)|\b\w*[Ff]uture\w*\.get\s*\(/;

export class MainThreadBlockingRule extends BaseRule {
  constructor() {
    super({
      name: 'MAIN_THREAD_BLOCKING',
      category: 'Threading',
      issueType: 'Blocking call on the main thread',
      suggestion: 'Do not block UI callbacks; use coroutines (launch/withContext), callbacks or a background executor instead.',
      description: 'Thread.sleep, runBlocking, join() or Future.get() inside UI callbacks',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, BLOCKING)) {
      const context = threadContext(lines, i);
      if (context?.thread !== 'main') continue;

      const call = BLOCKING.exec(codeOf(lines[i]))?.[0].replace(/\s*\($/, '') ?? 'blocking call';
      const coroutine = call === 'runBlocking';
      yield this.match(
        lines,
        i,
        coroutine
          ? `runBlocking in ${context.via} freezes the UI thread and deadlocks when the work needs Dispatchers.Main`
          : `${call} in ${context.via} blocks the UI thread and can trigger an ANR`,
        coroutine ? Severity.High : Severity.Medium,
      );
    }
  }
}

const VIEW_UPDATE =
  /\.setText\s*\(|\.text\s*=(?!=)|\.setVisibility\s*\(|\.(?:visibility|isVisible)\s*=(?!=)|\bToast\.makeText\s*\(|\bnotifyDataSetChanged\s*\(|\bnotifyItem\w*\s*\(|\.setImage\w*\s*\(/;

/** View mutations that run on a worker thread. */
export class UiUpdateFromBackgroundRule extends BaseRule {
  constructor() {
    super({
      name: 'UI_UPDATE_FROM_BACKGROUND',
      category: 'Threading',
      issueType: 'UI updated from a background thread',
      suggestion: 'Post view updates to the main thread with runOnUiThread, View.post or withContext(Dispatchers.Main).',
      description: 'setText/setVisibility/Toast/notifyDataSetChanged inside worker threads without hopping back to main',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, VIEW_UPDATE)) {
      const context = threadContext(lines, i);
      if (context?.thread !== 'background') continue;
      yield this.match(
        lines,
        i,
        `View update inside "${context.via}" throws CalledFromWrongThreadException`,
        Severity.High,
      );
    }
  }
}

const IMPLICIT_LOOPER_HANDLER = /(?<![\w.])(?:new\s+)?Handler\s*\(\s*\)/;

export class DeprecatedHandlerConstructorRule extends BaseRule {
  constructor() {
    super({
      name: 'DEPRECATED_HANDLER_CONSTRUCTOR',
      category: 'Threading',
      issueType: 'Handler created without an explicit Looper',
      suggestion: 'Pass a Looper explicitly, e.g. Handler(Looper.getMainLooper()).',
      description: 'Handler() picks up the current thread\'s Looper and throws on threads without one',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, IMPLICIT_LOOPER_HANDLER)) {
      yield this.match(
        lines,
        i,
        'Handler() is deprecated and throws "Can\'t create handler inside thread that has not called Looper.prepare()" off the main thread',
        Severity.Low,
      );
    }
  }
}

export const threadingRules: Rule[] = [
  new NetworkOnMainThreadRule(),
  new MainThreadBlockingRule(),
  new UiUpdateFromBackgroundRule(),
  new DeprecatedHandlerConstructorRule(),
];
