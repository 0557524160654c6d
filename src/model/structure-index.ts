import type { FieldValue, ObjectRecord, ObjectStructure, RuleKeyId } from './structure.js';
import { humanNameOf, structuresEqual } from './structure.js';
import { ConsistencyError } from './errors.js';
import type { InvocationInfo, ParsedLog } from '../parser/line-parser.js';

export const UNKNOWN_INVOCATION_VALUE = '<unknown>';

export interface ResolvedValue {
  value: string;
  ruleKey?: RuleKeyId;
  path?: string;
}

/**
 * Queryable view over the records parsed from one log. RuleKeys only have
 * meaning inside the index that produced them; compare across indexes by name.
 */
export class StructureIndex {
  private readonly entries: readonly ObjectRecord[];
  private readonly info: InvocationInfo;
  private readonly keyToStructure = new Map<RuleKeyId, ObjectStructure>();
  // Duplicate names: the last record parsed wins.
  private readonly nameToKey = new Map<string, RuleKeyId>();

  constructor(log: ParsedLog) {
    this.entries = log.entries;
    this.info = log.invocationInfo;

    for (const { ruleKey, structure } of this.entries) {
      const existing = this.keyToStructure.get(ruleKey);
      if (existing && !structuresEqual(existing, structure)) {
        throw new ConsistencyError(ruleKey);
      }
      this.keyToStructure.set(ruleKey, structure);

      const name = humanNameOf(structure);
      if (name !== undefined) this.nameToKey.set(name, ruleKey);
    }
  }

  byIdentifier(ruleKey: RuleKeyId): ObjectStructure | undefined {
    return this.keyToStructure.get(ruleKey);
  }

  identifierForName(name: string): RuleKeyId | undefined {
    return this.nameToKey.get(name);
  }

  byName(name: string): ObjectStructure | undefined {
    const key = this.nameToKey.get(name);
    return key === undefined ? undefined : this.byIdentifier(key);
  }

  nameFor(ruleKey: RuleKeyId | undefined): string | undefined {
    if (ruleKey === undefined) return undefined;
    const structure = this.byIdentifier(ruleKey);
    return structure ? humanNameOf(structure) : undefined;
  }

  allNames(): string[] {
    const names: string[] = [];
    for (const { ruleKey } of this.entries) {
      const name = this.nameFor(ruleKey);
      if (name !== undefined) names.push(name);
    }
    return names;
  }

  invocationInfo(key: string): string {
    return this.info.get(key) ?? UNKNOWN_INVOCATION_VALUE;
  }

  resolveReferences(values: readonly FieldValue[]): ResolvedValue[] {
    return values.map(v => {
      switch (v.kind) {
        case 'reference': return { value: v.raw, ruleKey: v.ruleKey };
        case 'path': return { value: v.raw, path: v.path };
        case 'literal': return { value: v.raw };
      }
    });
  }

  size(): number {
    return this.entries.length;
  }
}
