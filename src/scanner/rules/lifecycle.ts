import { Severity, type Rule, type RuleMatch } from '../../types.js';
import {
  codeOf,
  declaredMethodName,
  enclosedBy,
  escapeRegExp,
  findBlockEnd,
  findEnclosingMethod,
  isInsideTry,
  maskedCode,
  rangeContains,
  windowContains,
} from '../primitives.js';
import { BaseRule, KOTLIN } from './base.js';
import { ASYNC_CALLBACK, FRAGMENT_CLASS, TEARDOWN_METHOD } from './patterns.js';

const HOST_ACCESS =
  /\brequireActivity\(\)|\brequireContext\(\)|\bgetActivity\(\)\s*\.|\bgetContext\(\)\s*\.|\bactivity!!|\bcontext!!/;
const ATTACHED_GUARD =
  /\bisAdded\b|\bisDetached\b|\bisRemoving\b|\b(?:getActivity\(\)|activity|getContext\(\)|context)\s*[!=]=\s*null|\?:\s*return|\bviewLifecycleOwner\b|\blifecycle\.currentState\b|\bisVisible\b/;

/** Fragment code that reaches for its host from a callback that may outlive the attachment. */
export class FragmentDetachedContextRule extends BaseRule {
  constructor() {
    super({
      name: 'FRAGMENT_DETACHED_CONTEXT',
      category: 'Lifecycle',
      issueType: 'Fragment host accessed from async callback',
      suggestion: 'Check isAdded (or use viewLifecycleOwner-scoped observers/coroutines) before touching the activity or context from a callback.',
      description: 'requireActivity()/requireContext()/getActivity() inside async callbacks of a Fragment',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    if (!rangeContains(lines, 0, lines.length - 1, FRAGMENT_CLASS)) return;

    for (const i of this.matchingLines(lines, HOST_ACCESS)) {
      if (!enclosedBy(lines, i, ASYNC_CALLBACK)) continue;
      if (windowContains(lines, i, 5, ATTACHED_GUARD)) continue;

      const access = HOST_ACCESS.exec(codeOf(lines[i]))?.[0].replace(/\s*\.$/, '') ?? 'host access';
      yield this.match(
        lines,
        i,
        `${access} runs in a callback that can fire after the fragment is detached (IllegalStateException / NullPointerException)`,
        Severity.High,
      );
    }
  }
}

const COMMIT = /\.commit\(\)/;
const TRANSACTION = /\bbeginTransaction\(\)|FragmentTransaction\b|FragmentManager\b/i;
const STATE_GUARD = /\bisStateSaved\b|\bisFinishing\b|\bisDestroyed\b|\bisAdded\b|\blifecycle\.currentState\b|\bisAtLeast\(/;

export class FragmentCommitStateLossRule extends BaseRule {
  constructor() {
    super({
      name: 'FRAGMENT_COMMIT_STATE_LOSS',
      category: 'Lifecycle',
      issueType: 'Fragment transaction committed after state may be saved',
      suggestion: 'Commit transactions only while the host is started, check isStateSaved, or use commitAllowingStateLoss when losing the change is acceptable.',
      description: 'FragmentTransaction.commit() from teardown callbacks or async callbacks',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, COMMIT)) {
      if (!windowContains(lines, i, 5, TRANSACTION)) continue;
      if (/\bedit\(\)/.test(codeOf(lines[i]))) continue;
      if (windowContains(lines, i, 5, STATE_GUARD)) continue;

      const method = findEnclosingMethod(lines, i);
      if (method && TEARDOWN_METHOD.test(method.name)) {
        yield this.match(
          lines,
          i,
          `commit() in ${method.name}() runs after onSaveInstanceState and throws IllegalStateException`,
          Severity.High,
        );
      } else if (enclosedBy(lines, i, ASYNC_CALLBACK)) {
        yield this.match(
          lines,
          i,
          'commit() from an async callback throws IllegalStateException if the activity has saved its state',
          Severity.Medium,
        );
      }
    }
  }
}

const DIALOG_CALL = /\.(show|dismiss)\(\)/;
const DIALOG = /Dialog|\bBuilder\b|\bdialog\b/;
const NOT_A_DIALOG = /\bToast\b|\bSnackbar\b|\bPopupMenu\b/;
const WINDOW_GUARD = /\bisFinishing\b|\bisDestroyed\b|\bisAdded\b|\blifecycle\.currentState\b|\bisAtLeast\(/;

/** Dialogs shown or dismissed from callbacks after their window may be gone. */
export class DialogShowUnguardedRule extends BaseRule {
  constructor() {
    super({
      name: 'DIALOG_SHOW_UNGUARDED',
      category: 'Lifecycle',
      issueType: 'Dialog shown or dismissed without window check',
      suggestion: 'Check isFinishing/isDestroyed (or isAdded in fragments) before show(), and isShowing before dismiss(), in async callbacks.',
      description: 'Dialog show()/dismiss() inside async callbacks without a lifecycle guard',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    for (const i of this.matchingLines(lines, DIALOG_CALL)) {
      const code = codeOf(lines[i]);
      const call = DIALOG_CALL.exec(code);
      if (!call || NOT_A_DIALOG.test(code)) continue;
      if (!windowContains(lines, i, 3, DIALOG)) continue;
      if (!enclosedBy(lines, i, ASYNC_CALLBACK)) continue;

      const dismiss = call[1] === 'dismiss';
      const guard = dismiss ? /\bisShowing\b/ : WINDOW_GUARD;
      if (windowContains(lines, i, 5, guard)) continue;

      yield this.match(
        lines,
        i,
        dismiss
          ? 'dismiss() from a callback throws "View not attached to window manager" when the activity is already gone'
          : 'show() from a callback throws WindowManager$BadTokenException when the activity is finishing',
        Severity.Medium,
      );
    }
  }
}

const LATEINIT = /\blateinit\s+var\s+(\w+)/;

/**
 * lateinit properties read from teardown callbacks, which also run when
 * creation failed part-way and the property was never assigned.
 */
export class LateinitTeardownAccessRule extends BaseRule {
  constructor() {
    super({
      name: 'LATEINIT_TEARDOWN_ACCESS',
      category: 'Lifecycle',
      issueType: 'lateinit property used in teardown without initialization check',
      suggestion: 'Guard teardown access with ::property.isInitialized or make the property nullable.',
      description: 'lateinit property referenced in onDestroy/onPause/onStop without ::x.isInitialized',
      extensions: KOTLIN,
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    const lateinit: string[] = [];
    let teardown: { name: string; start: number; end: number; reported: Set<string> } | undefined;

    for (let i = 0; i < lines.length; i++) {
      const code = maskedCode(lines[i]);
      const declared = LATEINIT.exec(code);
      if (declared) lateinit.push(declared[1]);

      if (teardown && i > teardown.end) teardown = undefined;

      const methodName = /\bfun\s/.test(code) ? declaredMethodName(code) : undefined;
      if (methodName && TEARDOWN_METHOD.test(methodName)) {
        const end = findBlockEnd(lines, i);
        if (end !== undefined) teardown = { name: methodName, start: i, end, reported: new Set() };
        continue;
      }
      if (!teardown) continue;

      for (const name of lateinit) {
        if (teardown.reported.has(name)) continue;
        const n = escapeRegExp(name);
        if (!new RegExp(`(?<![\\w:])${n}\\b(?!\\s*=[^=])`).test(code)) continue;

        teardown.reported.add(name);
        if (rangeContains(lines, teardown.start, teardown.end, new RegExp(`::${n}\\.isInitialized`))) continue;
        yield this.match(
          lines,
          i,
          `lateinit ${name} is read in ${teardown.name}(); it throws UninitializedPropertyAccessException if setup did not complete`,
          Severity.Medium,
        );
      }
    }
  }
}

const REGISTER = /(?<![\w])registerReceiver\s*\(/;
const UNREGISTER = /\bunregisterReceiver\s*\(/;
const REGISTERED_FLAG = /\bisRegistered\b|\bregistered\b|\breceiverRegistered\b|!=\s*null/i;

export class ReceiverRegistrationRule extends BaseRule {
  constructor() {
    super({
      name: 'RECEIVER_REGISTRATION',
      category: 'Lifecycle',
      issueType: 'Unbalanced BroadcastReceiver registration',
      suggestion: 'Pair registerReceiver with unregisterReceiver in the matching lifecycle callback and track registration state before unregistering.',
      description: 'registerReceiver with no unregisterReceiver in the file, or unregister without a registration check',
    });
  }

  protected *detect(lines: readonly string[]): Generator<RuleMatch> {
    const unregisters = [...this.matchingLines(lines, UNREGISTER)];

    if (unregisters.length === 0) {
      for (const i of this.matchingLines(lines, REGISTER)) {
        yield this.match(lines, i, 'Receiver is registered but never unregistered; the component leaks it', Severity.Medium);
      }
      return;
    }

    for (const i of unregisters) {
      if (isInsideTry(lines, i)) continue;
      if (windowContains(lines, i, 3, REGISTERED_FLAG)) continue;
      yield this.match(
        lines,
        i,
        'unregisterReceiver throws IllegalArgumentException when the receiver was not registered',
        Severity.Low,
      );
    }
  }
}

export const lifecycleRules: Rule[] = [
  new FragmentDetachedContextRule(),
  new FragmentCommitStateLossRule(),
  new DialogShowUnguardedRule(),
  new LateinitTeardownAccessRule(),
  new ReceiverRegistrationRule(),
];
