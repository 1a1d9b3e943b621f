import { describe, it, expect } from 'vitest';
import { Severity, type Rule } from '../../types.js';
import { CursorNotClosedRule, CursorUncheckedMoveRule, StreamNotClosedRule } from './resources.js';

function run(rule: Rule, lines: string[], file = 'app/Sample.kt') {
  return [...rule.analyze(file, lines)];
}

describe('CURSOR_NOT_CLOSED', () => {
  const rule = new CursorNotClosedRule();

  it('flags a cursor that is never closed', () => {
    const lines = [
      'fun count(db: SQLiteDatabase): Int {',
      '  val cursor = db.rawQuery("SELECT COUNT(*) FROM t", null)',
      '  cursor.moveToFirst()',
      '  return cursor.getInt(0)',
      '}',
    ];
    const matches = run(rule, lines);
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 2, severity: Severity.Medium });
    expect(matches[0].detail).toBe('Cursor "cursor" is never closed in count(); leaked cursors exhaust the CursorWindow');
  });

  it('accepts close() in finally', () => {
    const lines = [
      'fun names(db: SQLiteDatabase) {',
      '  val cursor = db.query("t", null, null, null, null, null, null)',
      '  try {',
      '    while (cursor.moveToNext()) add(cursor.getString(0))',
      '  } finally {',
      '    cursor.close()',
      '  }',
      '}',
    ];
    expect(run(rule, lines)).toEqual([]);
  });

  it('is LOW when close() is outside finally', () => {
    const lines = [
      'fun names(db: SQLiteDatabase) {',
      '  val cursor = db.query("t", null, null, null, null, null, null)',
      '  read(cursor)',
      '  cursor.close()',
      '}',
    ];
    const [match] = run(rule, lines);
    expect(match.severity).toBe(Severity.Low);
    expect(match.detail).toBe('Cursor "cursor" is closed outside finally and leaks when reading it throws');
  });

  it('accepts use { }', () => {
    const lines = [
      'fun names(db: SQLiteDatabase) {',
      '  val cursor = db.rawQuery(sql, null)',
      '  cursor.use { read(it) }',
      '}',
    ];
    expect(run(rule, lines)).toEqual([]);
  });

  it('leaves returned cursors to the caller', () => {
    const lines = ['fun open(db: SQLiteDatabase): Cursor {', '  val cursor = db.rawQuery(sql, null)', '  return cursor', '}'];
    expect(run(rule, lines)).toEqual([]);
  });
});

describe('CURSOR_UNCHECKED_MOVE', () => {
  const rule = new CursorUncheckedMoveRule();

  it('flags a column read before any move', () => {
    const matches = run(rule, ['fun first(c: Cursor): String {', '  return c.getString(0)', '}']);
    expect(matches).toEqual([
      {
        line: 2,
        matchedCode: 'return c.getString(0)',
        detail: 'c is read before any moveToFirst()/moveToNext() in first()',
        severity: Severity.High,
      },
    ]);
  });

  it('accepts a moveToFirst check', () => {
    const lines = [
      'fun first(cursor: Cursor): String? {',
      '  if (!cursor.moveToFirst()) return null',
      '  return cursor.getString(0)',
      '}',
    ];
    expect(run(rule, lines)).toEqual([]);
  });

  it('ignores receivers that are not cursors', () => {
    expect(run(rule, ['fun read(bundle: Bundle) {', '  val k = bundle.getString("k")', '}'])).toEqual([]);
  });
});

describe('STREAM_NOT_CLOSED', () => {
  const rule = new StreamNotClosedRule();

  it('flags a Java stream that is never closed', () => {
    const lines = [
      'public void save(File f) throws IOException {',
      '    FileOutputStream out = new FileOutputStream(f);',
      '    out.write(data);',
      '}',
    ];
    const [match] = run(rule, lines, 'app/Store.java');
    expect(match).toMatchObject({ line: 2, severity: Severity.Medium });
    expect(match.detail).toBe('FileOutputStream "out" is never closed in save()');
  });

  it('accepts try-with-resources', () => {
    const lines = [
      'public void save(File f) throws IOException {',
      '    try (FileOutputStream out = new FileOutputStream(f)) {',
      '        out.write(data);',
      '    }',
      '}',
    ];
    expect(run(rule, lines, 'app/Store.java')).toEqual([]);
  });

  it('accepts Kotlin use { }', () => {
    const lines = ['fun load(f: File): String {', '  val text = BufferedReader(FileReader(f)).use { it.readText() }', '  return text', '}'];
    expect(run(rule, lines)).toEqual([]);
  });
});
