import { describe, it, expect } from 'vitest';
import { Severity, type Rule } from '../../types.js';
import { MediaPlayerStateRule, SwitchWithoutDefaultRule } from './state-machine.js';

function run(rule: Rule, lines: string[], file = 'app/Sample.kt') {
  return [...rule.analyze(file, lines)];
}

describe('MEDIA_PLAYER_STATE', () => {
  const rule = new MediaPlayerStateRule();

  it('flags start() right after prepareAsync()', () => {
    const lines = ['fun play(url: String) {', '  player.setDataSource(url)', '  player.prepareAsync()', '  player.start()', '}'];
    const matches = run(rule, lines);
    expect(matches).toEqual([
      {
        line: 4,
        matchedCode: 'player.start()',
        detail: 'player.start() runs right after prepareAsync() at line 3, before the player is prepared',
        severity: Severity.High,
      },
    ]);
  });

  it('accepts start() inside the prepared listener', () => {
    const lines = [
      'fun play() {',
      '  player.prepareAsync()',
      '  player.setOnPreparedListener {',
      '    player.start()',
      '  }',
      '}',
    ];
    expect(run(rule, lines)).toEqual([]);
  });

  it('flags use after release()', () => {
    const [match] = run(rule, ['fun stop() {', '  player.release()', '  player.seekTo(0)', '}']);
    expect(match).toMatchObject({ line: 3, severity: Severity.High });
    expect(match.detail).toBe('player.seekTo() is called after player.release() at line 2');
  });

  it('stops following a released player once it is reassigned', () => {
    const lines = ['fun stop() {', '  player.release()', '  player = MediaPlayer()', '  player.start()', '}'];
    const matches = run(rule, lines);
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 4, severity: Severity.Medium });
    expect(matches[0].detail).toBe('player is created with MediaPlayer() but never prepared before start()');
  });
});

describe('SWITCH_WITHOUT_DEFAULT', () => {
  const rule = new SwitchWithoutDefaultRule();

  it('flags a switch statement without default', () => {
    const lines = ['switch (state) {', '  case IDLE:', '    start();', '    break;', '}'];
    const [match] = run(rule, lines, 'app/Player.java');
    expect(match).toMatchObject({ line: 1, severity: Severity.Low });
    expect(match.detail).toBe('switch (state) ignores any value without a case label');
  });

  it('accepts a default label', () => {
    const lines = ['switch (state) {', '  case IDLE:', '    break;', '  default:', '    throw new IllegalStateException();', '}'];
    expect(run(rule, lines, 'app/Player.java')).toEqual([]);
  });

  it('skips switch expressions', () => {
    const lines = ['int x = switch (s) {', '  case A -> 1;', '  case B -> 2;', '};'];
    expect(run(rule, lines, 'app/Player.java')).toEqual([]);
  });
});
