import type { FieldName, ObjectStructure, RuleKeyId } from '../model/structure.js';
import { fieldNames } from '../model/structure.js';
import type { ResolvedValue, StructureIndex } from '../model/structure-index.js';
import { NotFoundError } from '../model/errors.js';
import { ValueListDiff, DEFAULT_FORMATS } from './value-list.js';
import type { LineFormats } from './value-list.js';
import { PATHS_HEADER, reportOnPaths } from '../report/paths.js';
import { getLogger } from '../utils/logger.js';

export interface DiffOptions {
  /** Add a `changed because of` line for every field whose references were followed. */
  verbose?: boolean;
  /** Report existence and hash of paths that appear in differing values. */
  checkPaths?: boolean;
  formats?: LineFormats;
}

/**
 * How a pair of references was judged to be the same logical object:
 * by equal build target names, or (when neither side has a name) by
 * both structures having the same field names.
 */
export type MatchKind = 'name' | 'shape';

export interface LabeledPair {
  label: string;
  left: RuleKeyId;
  right: RuleKeyId;
  matchedBy?: MatchKind;
}

export interface CompareResult {
  report: string[];
  /** Reference pairs to compare next, deduplicated and sorted. */
  changed: LabeledPair[];
}

export interface TraversalResult {
  report: string[];
  visited: Array<{ left: RuleKeyId; right: RuleKeyId }>;
  /** References reached in this run whose pair an earlier run had already compared. */
  explainedEarlier: number;
}

const DEPS_FIELD = /deps$/i;
const MISSING: ResolvedValue = { value: '<missing>' };

export const changeHeader = (label: string) => `Change details for [${label}]`;
export const SHAPE_MATCH_NOTE = '  (matched on field names only, the two objects may be unrelated)';
export const unexplained = (name: string) => `Unable to explain why RuleKeys for ${name} differ.`;

/** Set of (left, right) RuleKey pairs already scheduled for comparison. */
export class PairSet {
  private readonly keys = new Set<string>();

  private static key(left: RuleKeyId, right: RuleKeyId): string {
    return `${left}\u0000${right}`;
  }

  has(left: RuleKeyId, right: RuleKeyId): boolean {
    return this.keys.has(PairSet.key(left, right));
  }

  add(left: RuleKeyId, right: RuleKeyId): void {
    this.keys.add(PairSet.key(left, right));
  }

  get size(): number {
    return this.keys.size;
  }
}

/**
 * Reorders `right` in place so that entries whose target name matches the
 * left entry at the same position line up. Returns whether anything moved.
 */
export function alignByName(
  left: readonly ResolvedValue[],
  leftIndex: StructureIndex,
  right: ResolvedValue[],
  rightIndex: StructureIndex,
): boolean {
  let aligned = false;
  for (let leftIdx = 0; leftIdx < left.length; leftIdx++) {
    const name = leftIndex.nameFor(left[leftIdx].ruleKey);
    if (name === undefined || leftIdx >= right.length) continue;
    const rightIdx = right.findIndex(r => rightIndex.nameFor(r.ruleKey) === name);
    if (rightIdx === -1 || rightIdx === leftIdx) continue;
    [right[leftIdx], right[rightIdx]] = [right[rightIdx], right[leftIdx]];
    aligned = true;
  }
  return aligned;
}

function sameShape(a: ObjectStructure | undefined, b: ObjectStructure | undefined): boolean {
  if (!a || !b) return false;
  const fa = fieldNames(a);
  const fb = fieldNames(b);
  return fa.size === fb.size && [...fa].every(f => fb.has(f));
}

function comparePairs(a: LabeledPair, b: LabeledPair): number {
  if (a.label !== b.label) return a.label < b.label ? -1 : 1;
  if (a.left !== b.left) return a.left < b.left ? -1 : 1;
  if (a.right !== b.right) return a.right < b.right ? -1 : 1;
  return 0;
}

export function compareObjects(
  label: string,
  left: ObjectStructure,
  leftIndex: StructureIndex,
  right: ObjectStructure,
  rightIndex: StructureIndex,
  options: DiffOptions = {},
): CompareResult {
  const formats = options.formats ?? DEFAULT_FORMATS;
  const report: string[] = [];
  const valueDiffs = new Map<FieldName, ValueListDiff>();
  const changed = new Map<string, LabeledPair>();
  const followedByField = new Map<FieldName, Set<string>>();

  const follow = (field: FieldName, pair: LabeledPair) => {
    changed.set(`${pair.label}\u0000${pair.left}\u0000${pair.right}`, pair);
    const labels = followedByField.get(field) ?? new Set<string>();
    labels.add(pair.label);
    followedByField.set(field, labels);
  };

  const fields = new Set<FieldName | null>([...left.keys(), ...right.keys()]);
  for (const field of fields) {
    if (field === null) continue;

    const leftRefs = leftIndex.resolveReferences(left.get(field) ?? []);
    const rightRefs = rightIndex.resolveReferences(right.get(field) ?? []);

    if (DEPS_FIELD.test(field) && alignByName(leftRefs, leftIndex, rightRefs, rightIndex)) {
      report.push(`  (${field}): order of deps was name-aligned.`);
    }

    const count = Math.max(leftRefs.length, rightRefs.length);
    for (let i = 0; i < count; i++) {
      const l = leftRefs[i] ?? MISSING;
      const r = rightRefs[i] ?? MISSING;
      if (l.value === r.value) continue;

      const leftName = leftIndex.nameFor(l.ruleKey);
      const rightName = rightIndex.nameFor(r.ruleKey);

      if (l.ruleKey !== undefined && r.ruleKey !== undefined) {
        if (leftName !== undefined && leftName === rightName) {
          follow(field, { label: leftName, left: l.ruleKey, right: r.ruleKey, matchedBy: 'name' });
          continue;
        }
        if (
          leftName === undefined &&
          rightName === undefined &&
          sameShape(leftIndex.byIdentifier(l.ruleKey), rightIndex.byIdentifier(r.ruleKey))
        ) {
          follow(field, { label: `${label}->${field}`, left: l.ruleKey, right: r.ruleKey, matchedBy: 'shape' });
          continue;
        }
      }

      let values = valueDiffs.get(field);
      if (!values) {
        values = new ValueListDiff(formats);
        valueDiffs.set(field, values);
      }
      values.append(
        { text: leftName ? `"${leftName}"@${l.value}` : l.value, path: l.path },
        { text: rightName ? `"${rightName}"@${r.value}` : r.value, path: r.path },
      );
    }
  }

  const interestingPaths = new Set<string>();
  for (const field of [...valueDiffs.keys()].sort()) {
    const values = valueDiffs.get(field);
    if (!values) continue;
    report.push(`  (${field}):`);
    report.push(...values.diff().map(line => `    ${line}`));
    for (const path of values.interestingPaths()) interestingPaths.add(path);
  }

  if (options.verbose) {
    for (const field of [...followedByField.keys()].sort()) {
      const labels = [...(followedByField.get(field) ?? [])].sort();
      report.push(`  (${field}): changed because of ${labels.join(',')}`);
    }
  }

  if (options.checkPaths && interestingPaths.size > 0) {
    report.push(PATHS_HEADER);
    report.push(...reportOnPaths(interestingPaths));
  }

  if (report.length > 0) {
    report.unshift(changeHeader(label));
  }

  return { report, changed: [...changed.values()].sort(comparePairs) };
}

/**
 * Breadth-first comparison starting from `starting`. Every pair is added to
 * `seen` before it is queued, so each pair is compared at most once even when
 * the reference graph has cycles or shared sub-objects.
 */
export function diffFrom(
  starting: readonly LabeledPair[],
  leftIndex: StructureIndex,
  rightIndex: StructureIndex,
  seen: PairSet,
  options: DiffOptions = {},
): TraversalResult {
  const queue: LabeledPair[] = [];
  // Pairs queued by this run; anything else found in `seen` predates it
  const queued = new PairSet();
  let explainedEarlier = 0;
  const enqueue = (pair: LabeledPair) => {
    if (seen.has(pair.left, pair.right)) {
      if (!queued.has(pair.left, pair.right)) explainedEarlier++;
      return;
    }
    seen.add(pair.left, pair.right);
    queued.add(pair.left, pair.right);
    queue.push(pair);
  };

  for (const pair of starting) enqueue(pair);

  const report: string[] = [];
  const visited: TraversalResult['visited'] = [];

  for (let head = 0; head < queue.length; head++) {
    const pair = queue[head];
    visited.push({ left: pair.left, right: pair.right });

    const left = leftIndex.byIdentifier(pair.left);
    const right = rightIndex.byIdentifier(pair.right);
    if (!left || !right) {
      report.push(changeHeader(pair.label));
      if (!left) report.push(`  Left log has no structure for RuleKey ${pair.left}.`);
      if (!right) report.push(`  Right log has no structure for RuleKey ${pair.right}.`);
      continue;
    }

    const result = compareObjects(pair.label, left, leftIndex, right, rightIndex, options);
    if (result.report.length > 0 && pair.matchedBy === 'shape') {
      result.report.splice(1, 0, SHAPE_MATCH_NOTE);
    }
    report.push(...result.report);

    for (const next of result.changed) enqueue(next);
  }

  return { report, visited, explainedEarlier };
}

export function diffByName(
  name: string,
  leftIndex: StructureIndex,
  rightIndex: StructureIndex,
  options: DiffOptions = {},
): string[] {
  const left = leftIndex.identifierForName(name);
  if (left === undefined) throw new NotFoundError(name, 'left');
  const right = rightIndex.identifierForName(name);
  if (right === undefined) throw new NotFoundError(name, 'right');

  const { report } = diffFrom([{ label: name, left, right }], leftIndex, rightIndex, new PairSet(), options);
  if (report.length === 0 && left !== right) {
    report.push(unexplained(name));
  }
  return report;
}

/**
 * Explains every target present in both logs whose RuleKeys differ. Targets
 * reached while explaining an earlier one are not analysed again.
 */
export function diffAllNames(
  leftIndex: StructureIndex,
  rightIndex: StructureIndex,
  options: DiffOptions = {},
): string[] {
  const pending = new Set(leftIndex.allNames());
  const order = [...pending];
  const seen = new PairSet();
  const results: string[] = [];
  const logger = getLogger();

  for (let name = order.pop(); name !== undefined; name = order.pop()) {
    if (!pending.delete(name)) continue;

    const right = rightIndex.identifierForName(name);
    if (right === undefined) {
      results.push(`Skipping ${name} because it is missing from the right log.`);
      continue;
    }
    const left = leftIndex.identifierForName(name);
    if (left === undefined || left === right || seen.has(left, right)) continue;

    logger.info(`Analyzing ${name} for changes...`);
    const { report, visited, explainedEarlier } = diffFrom(
      [{ label: name, left, right }], leftIndex, rightIndex, seen, options,
    );
    // Silent when the difference comes from targets explained for an earlier name
    if (report.length === 0 && explainedEarlier === 0) {
      report.push(unexplained(name));
    }
    results.push(...report);

    for (const pair of visited) {
      const visitedName = leftIndex.nameFor(pair.left);
      if (visitedName !== undefined) pending.delete(visitedName);
    }
  }

  return results;
}
