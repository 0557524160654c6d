import { describe, it, expect } from 'vitest';
import { ValueListDiff, NO_CHANGES, ORDER_AND_CASE_ONLY } from '../src/diff/value-list.js';
import type { DiffValue, LineFormats } from '../src/diff/value-list.js';
import { classifyValue } from '../src/model/structure.js';

function entry(raw: string): DiffValue {
  const value = classifyValue(raw);
  return value.kind === 'path' ? { text: raw, path: value.path } : { text: raw };
}

function diffOf(left: string[], right: string[], formats?: LineFormats): ValueListDiff {
  const diff = new ValueListDiff(formats);
  const count = Math.max(left.length, right.length);
  for (let i = 0; i < count; i++) {
    diff.append(entry(left[i] ?? '<missing>'), entry(right[i] ?? '<missing>'));
  }
  return diff;
}

describe('ValueListDiff', () => {
  it('reports no changes for equal sequences', () => {
    expect(diffOf(['a', 'b'], ['a', 'b']).diff()).toEqual([NO_CHANGES]);
  });

  it('reports order-only differences', () => {
    expect(diffOf(['a', 'b', 'a'], ['b', 'a', 'a']).diff()).toEqual([
      'Only order of entries differs: [a, b, a] vs [b, a, a].',
    ]);
  });

  it('reports order and letter case differences', () => {
    expect(diffOf(['Apple', 'Banana'], ['banana', 'apple']).diff()).toEqual([
      ORDER_AND_CASE_ONLY,
      '-[Apple]',
      '+[apple]',
      '-[Banana]',
      '+[banana]',
    ]);
  });

  it('lists values present on one side only, without a remaining-order line', () => {
    expect(diffOf(['a', 'b', 'c'], ['a', 'c', 'd']).diff()).toEqual(['-[b]', '+[d]']);
  });

  it('sorts one-sided values', () => {
    expect(diffOf(['z', 'y', 'k'], ['k', 'b', 'a']).diff()).toEqual(['-[y]', '-[z]', '+[a]', '+[b]']);
  });

  it('reports remaining order differences after removing one-sided values', () => {
    expect(diffOf(['a', 'b', 'x'], ['b', 'a', 'y']).diff()).toEqual([
      '-[x]',
      '+[y]',
      'Only order of remaining entries differs: [a, b] vs [b, a].',
    ]);
  });

  it('reports repetition count differences', () => {
    const diff = new ValueListDiff();
    diff.append({ text: 'a' }, { text: 'a' });
    diff.append({ text: 'a' }, { text: 'y' });
    diff.append({ text: 'x' }, { text: 'y' });
    expect(diff.diff()).toEqual([
      '-[x]',
      '+[y]',
      'Order and repetition count of remaining entries differs: [a] vs [].',
    ]);
  });

  it('collects paths from one-sided values', () => {
    const diff = diffOf(['path(src/A.java:abc)', 'string("x")'], ['path(src/B.java:def)', 'string("x")']);
    expect(diff.diff()).toEqual(['-[path(src/A.java:abc)]', '+[path(src/B.java:def)]']);
    expect([...diff.interestingPaths()].sort()).toEqual(['src/A.java', 'src/B.java']);
  });

  it('takes paths from the values rather than their text', () => {
    const diff = new ValueListDiff();
    diff.append({ text: '"src"@path(src/A.java:abc)', path: 'src/A.java' }, { text: 'string("x")' });
    diff.append({ text: 'path(look:alike)' }, { text: 'path(look:alike)' });
    diff.append({ text: 'path(not/a:path)' }, { text: 'string("y")' });
    diff.diff();
    expect([...diff.interestingPaths()]).toEqual(['src/A.java']);
  });

  it('does not collect paths when only the order differs', () => {
    const diff = diffOf(['path(a:x)', 'path(b:y)'], ['path(b:y)', 'path(a:x)']);
    diff.diff();
    expect(diff.interestingPaths().size).toBe(0);
  });

  it('uses custom line formats', () => {
    expect(diffOf(['a'], ['b'], { left: '< %s', right: '> %s' }).diff()).toEqual(['< a', '> b']);
  });
});
