import { describe, it, expect } from 'vitest';
import { Severity, type Rule } from '../../types.js';
import {
  DialogShowUnguardedRule,
  FragmentCommitStateLossRule,
  FragmentDetachedContextRule,
  LateinitTeardownAccessRule,
  ReceiverRegistrationRule,
} from './lifecycle.js';

function run(rule: Rule, lines: string[], file = 'app/Sample.kt') {
  return [...rule.analyze(file, lines)];
}

function fragmentWith(callbackBody: string[], header = 'class ProfileFragment : Fragment() {'): string[] {
  return [
    header,
    '  fun load() {',
    '    api.fetch(object : Callback {',
    '      override fun onResponse(body: String) {',
    ...callbackBody,
    '      }',
    '    })',
    '  }',
    '}',
  ];
}

describe('FRAGMENT_DETACHED_CONTEXT', () => {
  const rule = new FragmentDetachedContextRule();

  it('flags host access from a fragment callback', () => {
    const matches = run(rule, fragmentWith(['        Toast.makeText(requireContext(), body, Toast.LENGTH_SHORT).show()']));
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 5, severity: Severity.High });
    expect(matches[0].detail).toBe(
      'requireContext() runs in a callback that can fire after the fragment is detached (IllegalStateException / NullPointerException)',
    );
  });

  it('accepts an isAdded check', () => {
    const lines = fragmentWith(['        if (!isAdded) return', '        show(requireContext())']);
    expect(run(rule, lines)).toEqual([]);
  });

  it('only looks at fragments', () => {
    const lines = fragmentWith(['        show(requireContext())'], 'class ProfileActivity : AppCompatActivity() {');
    expect(run(rule, lines)).toEqual([]);
  });
});

describe('FRAGMENT_COMMIT_STATE_LOSS', () => {
  const rule = new FragmentCommitStateLossRule();

  it('is HIGH in a teardown callback', () => {
    const lines = [
      'override fun onStop() {',
      '  super.onStop()',
      '  supportFragmentManager.beginTransaction()',
      '    .remove(fragment)',
      '    .commit()',
      '}',
    ];
    const matches = run(rule, lines);
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 5, severity: Severity.High });
    expect(matches[0].detail).toBe('commit() in onStop() runs after onSaveInstanceState and throws IllegalStateException');
  });

  it('is MEDIUM from an async callback', () => {
    const lines = [
      'fun save() {',
      '  handler.postDelayed({',
      '    supportFragmentManager.beginTransaction().add(f, "tag").commit()',
      '  }, 100)',
      '}',
    ];
    const [match] = run(rule, lines);
    expect(match.severity).toBe(Severity.Medium);
    expect(match.detail).toBe('commit() from an async callback throws IllegalStateException if the activity has saved its state');
  });

  it('accepts an isStateSaved check', () => {
    const lines = [
      'override fun onStop() {',
      '  super.onStop()',
      '  if (supportFragmentManager.isStateSaved) return',
      '  supportFragmentManager.beginTransaction().remove(fragment).commit()',
      '}',
    ];
    expect(run(rule, lines)).toEqual([]);
  });

  it('ignores SharedPreferences commits', () => {
    expect(run(rule, ['override fun onStop() {', '  prefs.edit().putString("k", v).commit()', '}'])).toEqual([]);
  });
});

describe('DIALOG_SHOW_UNGUARDED', () => {
  const rule = new DialogShowUnguardedRule();
  const inCallback = (line: string) => [
    'fun done() {',
    '  api.enqueue(object : Callback {',
    '    override fun onResponse(r: String) {',
    line,
    '    }',
    '  })',
    '}',
  ];

  it('flags dismiss() from a callback', () => {
    const matches = run(rule, inCallback('      progressDialog.dismiss()'));
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 4, severity: Severity.Medium });
    expect(matches[0].detail).toBe(
      'dismiss() from a callback throws "View not attached to window manager" when the activity is already gone',
    );
  });

  it('flags show() from a callback', () => {
    const [match] = run(rule, inCallback('      AlertDialog.Builder(this).setMessage(r).show()'));
    expect(match.detail).toBe('show() from a callback throws WindowManager$BadTokenException when the activity is finishing');
  });

  it('accepts dismiss() behind isShowing', () => {
    expect(run(rule, inCallback('      if (progressDialog.isShowing) progressDialog.dismiss()'))).toEqual([]);
  });

  it('ignores dialogs shown outside callbacks', () => {
    expect(run(rule, ['fun a() {', '  dialog.show()', '}'])).toEqual([]);
  });
});

describe('LATEINIT_TEARDOWN_ACCESS', () => {
  const rule = new LateinitTeardownAccessRule();
  const activity = (line: string) => [
    'class Player : AppCompatActivity() {',
    '  private lateinit var player: MediaPlayer',
    '  override fun onDestroy() {',
    '    super.onDestroy()',
    line,
    '  }',
    '}',
  ];

  it('flags a lateinit read in onDestroy', () => {
    const matches = run(rule, activity('    player.release()'));
    expect(matches).toEqual([
      {
        line: 5,
        matchedCode: 'player.release()',
        detail: 'lateinit player is read in onDestroy(); it throws UninitializedPropertyAccessException if setup did not complete',
        severity: Severity.Medium,
      },
    ]);
  });

  it('accepts an isInitialized check', () => {
    expect(run(rule, activity('    if (::player.isInitialized) player.release()'))).toEqual([]);
  });
});

describe('RECEIVER_REGISTRATION', () => {
  const rule = new ReceiverRegistrationRule();

  it('flags a receiver that is never unregistered', () => {
    const [match] = run(rule, ['registerReceiver(receiver, filter)']);
    expect(match.severity).toBe(Severity.Medium);
    expect(match.detail).toBe('Receiver is registered but never unregistered; the component leaks it');
  });

  it('is LOW for an unguarded unregister', () => {
    const lines = [
      'override fun onStart() {',
      '  registerReceiver(receiver, filter)',
      '}',
      'override fun onStop() {',
      '  unregisterReceiver(receiver)',
      '}',
    ];
    const matches = run(rule, lines);
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 5, severity: Severity.Low });
  });

  it('accepts an unregister inside try', () => {
    const lines = [
      'registerReceiver(receiver, filter)',
      'fun stop() {',
      '  try {',
      '    unregisterReceiver(receiver)',
      '  } catch (e: IllegalArgumentException) {',
      '  }',
      '}',
    ];
    expect(run(rule, lines)).toEqual([]);
  });
});
