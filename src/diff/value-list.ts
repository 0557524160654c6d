export const NO_CHANGES = 'No changes';
export const ORDER_AND_CASE_ONLY = 'Only order and letter casing (Upper Case vs lower case) of entries differs:';

export interface LineFormats {
  /** Template for a value only on the left; `%s` is replaced by the value. */
  left: string;
  right: string;
}

export const DEFAULT_FORMATS: LineFormats = { left: '-[%s]', right: '+[%s]' };

/** One side of an observation: the text to compare and the path it carries, if any. */
export interface DiffValue {
  text: string;
  path?: string;
}

const orderOnly = (left: string[], right: string[]) =>
  `Only order of entries differs: [${left.join(', ')}] vs [${right.join(', ')}].`;
const orderOnlyRemaining = (left: string[], right: string[]) =>
  `Only order of remaining entries differs: [${left.join(', ')}] vs [${right.join(', ')}].`;
const orderAndRepsRemaining = (left: string[], right: string[]) =>
  `Order and repetition count of remaining entries differs: [${left.join(', ')}] vs [${right.join(', ')}].`;

function applyFormat(format: string, value: string): string {
  return format.replace('%s', () => value);
}

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function sameSet<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  if (a.size !== b.size) return false;
  for (const v of a) if (!b.has(v)) return false;
  return true;
}

/**
 * Collects the left/right values of one field across two objects and
 * describes how the two sequences differ.
 */
export class ValueListDiff {
  private readonly left: string[] = [];
  private readonly right: string[] = [];
  private readonly pathByText = new Map<string, string>();
  private readonly paths = new Set<string>();

  constructor(private readonly formats: LineFormats = DEFAULT_FORMATS) {}

  append(left: DiffValue, right: DiffValue): void {
    this.left.push(left.text);
    this.right.push(right.text);
    if (left.path !== undefined) this.pathByText.set(left.text, left.path);
    if (right.path !== undefined) this.pathByText.set(right.text, right.path);
  }

  /** Paths seen in values present on only one side, after the last `diff()`. */
  interestingPaths(): ReadonlySet<string> {
    return this.paths;
  }

  diff(): string[] {
    const left = this.left;
    const right = this.right;

    if (sameSequence(left, right)) {
      return [NO_CHANGES];
    }

    if (sameSequence([...left].sort(), [...right].sort())) {
      return [orderOnly(left, right)];
    }

    const leftLower = new Map(left.map(v => [v.toLowerCase(), v]));
    const rightLower = new Map(right.map(v => [v.toLowerCase(), v]));
    if (sameSet(new Set(leftLower.keys()), new Set(rightLower.keys()))) {
      const lines = [ORDER_AND_CASE_ONLY];
      for (const key of [...leftLower.keys()].sort()) {
        const l = leftLower.get(key);
        const r = rightLower.get(key);
        if (l === undefined || r === undefined || l === r) continue;
        lines.push(applyFormat(this.formats.left, l), applyFormat(this.formats.right, r));
      }
      return lines;
    }

    const leftSet = new Set(left);
    const rightSet = new Set(right);
    const leftOnly = [...leftSet].filter(v => !rightSet.has(v)).sort();
    const rightOnly = [...rightSet].filter(v => !leftSet.has(v)).sort();

    for (const value of [...leftOnly, ...rightOnly]) {
      const path = this.pathByText.get(value);
      if (path !== undefined) this.paths.add(path);
    }

    const leftCommon = left.filter(v => rightSet.has(v));
    const rightCommon = right.filter(v => leftSet.has(v));
    const leftOutOfOrder: string[] = [];
    const rightOutOfOrder: string[] = [];
    for (let i = 0; i < Math.max(leftCommon.length, rightCommon.length); i++) {
      const l = leftCommon[i];
      const r = rightCommon[i];
      if (l === r) continue;
      if (l !== undefined) leftOutOfOrder.push(l);
      if (r !== undefined) rightOutOfOrder.push(r);
    }

    const lines = [
      ...leftOnly.map(v => applyFormat(this.formats.left, v)),
      ...rightOnly.map(v => applyFormat(this.formats.right, v)),
    ];
    if (leftOutOfOrder.length > 0) {
      lines.push(
        leftOutOfOrder.length === rightOutOfOrder.length
          ? orderOnlyRemaining(leftOutOfOrder, rightOutOfOrder)
          : orderAndRepsRemaining(leftOutOfOrder, rightOutOfOrder),
      );
    }
    return lines;
  }
}
