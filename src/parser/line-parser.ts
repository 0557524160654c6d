import { existsSync, readFileSync } from 'node:fs';
import { PATTERNS } from './patterns.js';
import { classifyValue, structuresEqual } from '../model/structure.js';
import type { FieldName, FieldValue, ObjectRecord, ObjectStructure, RuleKeyId } from '../model/structure.js';
import { ConsistencyError, InputError } from '../model/errors.js';
import { getLogger } from '../utils/logger.js';

export type InvocationInfo = ReadonlyMap<string, string>;

export interface ParsedLog {
  entries: ObjectRecord[];
  invocationInfo: InvocationInfo;
}

/**
 * Parses the `id=structure` payload of a RuleKey line.
 *
 * The serializer writes each value before its `key(name)` marker, so entries
 * are walked back to front to attach every value to the key that follows it.
 */
export function parseRuleKeyLine(payload: string): ObjectRecord {
  if (payload.endsWith('=')) {
    return { ruleKey: payload.slice(0, -1), structure: new Map() };
  }

  const eq = payload.indexOf('=');
  const ruleKey = eq === -1 ? payload : payload.slice(0, eq);
  const serialized = eq === -1 ? '' : payload.slice(eq + 1);

  const entries = serialized
    .split(PATTERNS.entryDelimiter)
    .filter(e => e.length > 0)
    .map(e => e + ')');

  const structure = new Map<FieldName | null, FieldValue[]>();
  let currentField: FieldName | null = null;

  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i];
    if (entry.startsWith(PATTERNS.keyMarkerPrefix)) {
      currentField = entry.slice(PATTERNS.keyMarkerPrefix.length, -1);
      continue;
    }
    const values = structure.get(currentField);
    if (values) {
      values.push(classifyValue(entry));
    } else {
      structure.set(currentField, [classifyValue(entry)]);
    }
  }

  return { ruleKey, structure };
}

export function parseInvocationInfo(payload: string): Map<string, string> {
  const info = new Map<string, string>();
  const pattern = new RegExp(PATTERNS.invocationValue.source, 'g');
  for (const match of payload.matchAll(pattern)) {
    info.set(match[1], match[2]);
  }
  return info;
}

/** Parse the RuleKey and InvocationInfo records out of a whole log. */
export function parseLog(text: string): ParsedLog {
  const entries: ObjectRecord[] = [];
  const seen = new Map<RuleKeyId, ObjectStructure>();
  let invocationPayload: string | undefined;
  let skipped = 0;

  for (const line of text.split(/\r?\n/)) {
    if (invocationPayload === undefined) {
      const invocation = PATTERNS.invocationLine.exec(line);
      if (invocation) invocationPayload = invocation[2];
    }

    const match = PATTERNS.ruleKeyLine.exec(line);
    if (!match) {
      if (line.length > 0) skipped++;
      continue;
    }

    const record = parseRuleKeyLine(match[2]);
    const previous = seen.get(record.ruleKey);
    if (previous && !structuresEqual(previous, record.structure)) {
      throw new ConsistencyError(record.ruleKey);
    }
    seen.set(record.ruleKey, record.structure);
    entries.push(record);
  }

  getLogger().debug(`Parsed ${entries.length} RuleKey lines, skipped ${skipped} other lines`);

  return {
    entries,
    invocationInfo: invocationPayload === undefined ? new Map<string, string>() : parseInvocationInfo(invocationPayload),
  };
}

export function loadLogFile(filePath: string): ParsedLog {
  if (!existsSync(filePath)) {
    throw new InputError(filePath);
  }
  return parseLog(readFileSync(filePath, 'utf-8'));
}
