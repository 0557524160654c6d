import { describe, it, expect } from 'vitest';
import { parseLog, parseRuleKeyLine, parseInvocationInfo } from '../src/parser/line-parser.js';
import { ConsistencyError } from '../src/model/errors.js';
import { ruleLine, targetLine } from './helpers.js';

const raws = (values: readonly { raw: string }[] | undefined) => values?.map(v => v.raw);

describe('parseRuleKeyLine', () => {
  it('returns an empty structure for a key with no payload', () => {
    const record = parseRuleKeyLine('abc123=');
    expect(record.ruleKey).toBe('abc123');
    expect(record.structure.size).toBe(0);
  });

  it('attaches each value to the key marker that follows it', () => {
    const record = parseRuleKeyLine(
      'k1=string("//app:lib"):key(.name):string("java_library"):key(.type):ruleKey(sha1=bbb1):key(deps):',
    );

    expect(record.ruleKey).toBe('k1');
    expect([...record.structure.keys()]).toEqual(['deps', '.type', '.name']);
    expect(record.structure.get('.name')).toEqual([{ kind: 'literal', raw: 'string("//app:lib")' }]);
    expect(record.structure.get('deps')).toEqual([
      { kind: 'reference', raw: 'ruleKey(sha1=bbb1)', ruleKey: 'bbb1' },
    ]);
  });

  it('collects repeated values in reverse serialization order', () => {
    const record = parseRuleKeyLine('k1=string("a"):string("b"):key(srcs):');
    expect(raws(record.structure.get('srcs'))).toEqual(['string("b")', 'string("a")']);
  });

  it('classifies path values', () => {
    const record = parseRuleKeyLine('k1=path(src/Foo.java:abc123):key(srcs):');
    expect(record.structure.get('srcs')).toEqual([
      { kind: 'path', raw: 'path(src/Foo.java:abc123)', path: 'src/Foo.java' },
    ]);
  });

  it('keeps values without a following key under the null field', () => {
    const record = parseRuleKeyLine('k1=string("x"):key(a):string("tail"):');
    expect(raws(record.structure.get(null))).toEqual(['string("tail")']);
    expect(raws(record.structure.get('a'))).toEqual(['string("x")']);
  });
});

describe('parseInvocationInfo', () => {
  it('reads every key=[value] pair', () => {
    const info = parseInvocationInfo('BuildId=[b-1] Args=[build //app:bin] Empty=[]');
    expect([...info.entries()]).toEqual([
      ['BuildId', 'b-1'],
      ['Args', 'build //app:bin'],
      ['Empty', ''],
    ]);
  });
});

describe('parseLog', () => {
  const log = [
    '[2026-01-05 10:00:00.000][info][command:build][tid:01][com.example.Main] Starting build',
    '[2026-01-05 10:00:00.001][info][command:build][tid:01][com.example.Log] InvocationInfo BuildId=[b-1] Args=[build //app:bin]',
    '[2026-01-05 10:00:00.002][info][command:build][tid:01][com.example.Log] InvocationInfo BuildId=[b-2] Args=[test]',
    targetLine('aaa1', '//app:bin', [['deps', ['ruleKey(sha1=bbb1)']]]),
    'not a log line at all',
    targetLine('bbb1', '//app:lib'),
    '',
  ].join('\n');

  it('parses RuleKey lines and the first InvocationInfo line', () => {
    const parsed = parseLog(log);
    expect(parsed.entries.map(e => e.ruleKey)).toEqual(['aaa1', 'bbb1']);
    expect(parsed.invocationInfo.get('Args')).toBe('build //app:bin');
    expect(parsed.invocationInfo.get('BuildId')).toBe('b-1');
  });

  it('is deterministic', () => {
    expect(parseLog(log)).toEqual(parseLog(log));
  });

  it('uses an empty invocation map when no InvocationInfo line exists', () => {
    expect(parseLog(targetLine('aaa1', '//app:bin')).invocationInfo.size).toBe(0);
  });

  it('accepts the same RuleKey twice with an equal structure', () => {
    const line = targetLine('aaa1', '//app:bin');
    expect(parseLog([line, line].join('\n')).entries).toHaveLength(2);
  });

  it('rejects the same RuleKey with two different structures', () => {
    const text = [
      ruleLine('aaa1', [['flags', ['string("-g")']]]),
      ruleLine('aaa1', [['flags', ['string("-O2")']]]),
    ].join('\n');
    expect(() => parseLog(text)).toThrow(ConsistencyError);
  });

  it('yields the same field names regardless of whitespace around the tag', () => {
    const payload = 'k1=string("//a:b"):key(.name):string("java_library"):key(.type):';
    const compact = parseLog(`[x][debug] RuleKey ${payload}`);
    const padded = parseLog(`[x][debug][tid:7]    RuleKey \t ${payload}`);
    expect([...padded.entries[0].structure.keys()]).toEqual([...compact.entries[0].structure.keys()]);
  });
});
