import { parseLog } from '../src/parser/line-parser.js';
import { StructureIndex } from '../src/model/structure-index.js';

const PREFIX = '[2026-01-05 10:00:00.000][debug][command:build][tid:42][com.facebook.buck.rules.keys.RuleKeyBuilder]';

export type Fields = Array<[field: string, values: string[]]>;

/**
 * A RuleKey log line whose fields parse back with their values in the order
 * given here (the serializer writes values last-to-first before each key).
 */
export function ruleLine(ruleKey: string, fields: Fields): string {
  const body = fields
    .map(([field, values]) => [...values].reverse().map(v => `${v}:`).join('') + `key(${field}):`)
    .join('');
  return `${PREFIX} RuleKey ${ruleKey}=${body}`;
}

export function targetLine(ruleKey: string, name: string, fields: Fields = []): string {
  return ruleLine(ruleKey, [
    ...fields,
    ['.type', ['string("java_library")']],
    ['.name', [`string("${name}")`]],
  ]);
}

export const ref = (ruleKey: string) => `ruleKey(sha1=${ruleKey})`;

export function indexOf(...lines: string[]): StructureIndex {
  return new StructureIndex(parseLog(lines.join('\n')));
}
