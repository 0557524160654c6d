import { PATTERNS } from '../parser/patterns.js';

/** Opaque token naming one logged object within one log file. */
export type RuleKeyId = string;

export type FieldName = string;

export type FieldValue =
  | { kind: 'literal'; raw: string }
  | { kind: 'reference'; raw: string; ruleKey: RuleKeyId }
  | { kind: 'path'; raw: string; path: string };

/**
 * Field name → values, in the order the values were recovered from the line.
 * The `null` key holds values that were not preceded by any key marker.
 */
export type ObjectStructure = ReadonlyMap<FieldName | null, readonly FieldValue[]>;

export interface ObjectRecord {
  ruleKey: RuleKeyId;
  structure: ObjectStructure;
}

const NAME_FIELD = '.name';
const TYPE_FIELD = '.type';
const QUOTED_PREFIX = 'string("';
const QUOTED_SUFFIX = '")';

export function classifyValue(raw: string): FieldValue {
  if (raw.startsWith(PATTERNS.referencePrefix) && raw.endsWith(PATTERNS.referenceSuffix)) {
    return {
      kind: 'reference',
      raw,
      ruleKey: raw.slice(PATTERNS.referencePrefix.length, raw.length - PATTERNS.referenceSuffix.length),
    };
  }
  const pathMatch = PATTERNS.pathValue.exec(raw);
  if (pathMatch) {
    return { kind: 'path', raw, path: pathMatch[1] };
  }
  return { kind: 'literal', raw };
}

export function humanNameOf(structure: ObjectStructure): string | undefined {
  if (!structure.has(NAME_FIELD) || !structure.has(TYPE_FIELD)) return undefined;
  const first = structure.get(NAME_FIELD)?.[0];
  if (first === undefined) return undefined;
  const name = first.raw;
  if (name.startsWith(QUOTED_PREFIX)) {
    return name.slice(QUOTED_PREFIX.length, name.length - QUOTED_SUFFIX.length);
  }
  return name;
}

export function fieldNames(structure: ObjectStructure): Set<FieldName | null> {
  return new Set(structure.keys());
}

export function structuresEqual(a: ObjectStructure, b: ObjectStructure): boolean {
  if (a.size !== b.size) return false;
  for (const [field, values] of a) {
    const other = b.get(field);
    if (!other || other.length !== values.length) return false;
    for (let i = 0; i < values.length; i++) {
      if (values[i].raw !== other[i].raw) return false;
    }
  }
  return true;
}
