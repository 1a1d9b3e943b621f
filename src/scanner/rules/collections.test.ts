import { describe, it, expect } from 'vitest';
import { Severity, type Rule } from '../../types.js';
import {
  CollectionIndexUncheckedRule,
  ConcurrentModificationRule,
  DivisionBySizeRule,
  RecyclerPositionUncheckedRule,
  SplitIndexUncheckedRule,
  SubstringLiteralBoundsRule,
} from './collections.js';

function run(rule: Rule, lines: string[], file = 'app/Sample.kt') {
  return [...rule.analyze(file, lines)];
}

describe('COLLECTION_INDEX_UNCHECKED', () => {
  const rule = new CollectionIndexUncheckedRule();

  it('flags indexing without an emptiness check', () => {
    const [match] = run(rule, ['val first = items[0]']);
    expect(match.severity).toBe(Severity.High);
    expect(match.detail).toBe('"items[0]" throws when items is empty');
  });

  it('accepts a nearby emptiness check', () => {
    expect(run(rule, ['if (items.isNotEmpty()) {', '  show(items.first())', '}'])).toEqual([]);
  });

  it('is MEDIUM when the check is further up in the function', () => {
    const lines = [
      'fun top(items: List<String>): String {',
      '  if (items.isEmpty()) return ""',
      ...Array<string>(6).fill('  log()'),
      '  return items[0]',
      '}',
    ];
    const matches = run(rule, lines);
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 9, severity: Severity.Medium });
    expect(matches[0].detail).toBe('"items[0]" relies on a size check that is not next to the access');
  });

  it('leaves split()[0] to the split rule', () => {
    expect(run(rule, ['val head = line.split(",")[0]'])).toEqual([]);
  });
});

describe('SPLIT_INDEX_UNCHECKED', () => {
  const rule = new SplitIndexUncheckedRule();

  it('flags indexing past the first part', () => {
    const matches = run(rule, ['val value = line.split(":")[1]']);
    expect(matches).toEqual([
      {
        line: 1,
        matchedCode: 'val value = line.split(":")[1]',
        detail: 'Part 1 of split() does not exist when the separator is missing from the input',
        severity: Severity.High,
      },
    ]);
  });

  it('accepts a size check on the preceding lines', () => {
    const lines = ['val parts = line.split(":")', 'if (parts.size > 1) {', '  val v = line.split(":")[1]', '}'];
    expect(run(rule, lines)).toEqual([]);
  });
});

describe('CONCURRENT_MODIFICATION', () => {
  const rule = new ConcurrentModificationRule();

  it('flags removal from the collection being iterated', () => {
    const matches = run(rule, ['for (item in items) {', '  if (item.isBlank()) items.remove(item)', '}']);
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ line: 2, severity: Severity.High });
    expect(matches[0].detail).toBe(
      'items.remove() inside the loop over items started at line 1 throws ConcurrentModificationException',
    );
  });

  it('accepts a change followed by break', () => {
    const lines = ['for (item in items) {', '  if (item.isBlank()) { items.remove(item); break }', '}'];
    expect(run(rule, lines)).toEqual([]);
  });

  it('covers forEach lambdas', () => {
    const [match] = run(rule, ['list.forEach {', '  list.add(it)', '}']);
    expect(match.detail).toBe('list.add() inside the loop over list started at line 1 throws ConcurrentModificationException');
  });

  it('ignores index-based loops', () => {
    expect(run(rule, ['for (i in 0 until items.size) {', '  items.removeAt(i)', '}'])).toEqual([]);
  });
});

describe('SUBSTRING_LITERAL_BOUNDS', () => {
  const rule = new SubstringLiteralBoundsRule();

  it('flags fixed bounds without a length check', () => {
    const [match] = run(rule, ['val code = id.substring(0, 3)']);
    expect(match.severity).toBe(Severity.Medium);
    expect(match.detail).toBe('substring(0, 3) throws StringIndexOutOfBoundsException on shorter input');
  });

  it('ignores substring(0)', () => {
    expect(run(rule, ['val rest = s.substring(0)'])).toEqual([]);
  });

  it('accepts a length check', () => {
    expect(run(rule, ['if (id.length >= 3) {', '  val code = id.substring(0, 3)', '}'])).toEqual([]);
  });
});

describe('RECYCLER_POSITION_UNCHECKED', () => {
  const rule = new RecyclerPositionUncheckedRule();

  it('follows a position variable to the index that uses it', () => {
    const [match] = run(rule, ['val pos = adapterPosition', 'val item = items[pos]']);
    expect(match).toMatchObject({ line: 2, severity: Severity.High });
    expect(match.detail).toBe('pos comes from the adapter position at line 1 and may be NO_POSITION (-1)');
  });

  it('accepts a NO_POSITION check before the index', () => {
    const lines = ['val pos = adapterPosition', 'if (pos == RecyclerView.NO_POSITION) return', 'val item = items[pos]'];
    expect(run(rule, lines)).toEqual([]);
  });

  it('flags the position used directly as an index', () => {
    const [match] = run(rule, ['items.removeAt(bindingAdapterPosition)']);
    expect(match.detail).toBe('Adapter position is used as an index and may be NO_POSITION (-1)');
  });
});

describe('DIVISION_BY_SIZE', () => {
  const rule = new DivisionBySizeRule();

  it('is MEDIUM for integer division', () => {
    const [match] = run(rule, ['val avg = total / items.size']);
    expect(match.severity).toBe(Severity.Medium);
    expect(match.detail).toBe('Integer division by size throws ArithmeticException when it is 0');
  });

  it('is LOW for floating-point division', () => {
    const [match] = run(rule, ['val avg = total.toFloat() / items.size']);
    expect(match.severity).toBe(Severity.Low);
    expect(match.detail).toBe('Floating-point division by size yields NaN or Infinity when it is 0');
  });

  it('accepts an emptiness check', () => {
    expect(run(rule, ['if (items.isEmpty()) return 0', 'return total / items.size'])).toEqual([]);
  });
});
