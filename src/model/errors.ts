export type ErrorCode = 'not-found' | 'consistency' | 'input';

export class RuleKeyDiffError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A requested build target name is absent from one or both logs. */
export class NotFoundError extends RuleKeyDiffError {
  constructor(
    readonly target: string,
    readonly side: 'left' | 'right',
  ) {
    super('not-found', `${side === 'left' ? 'Left' : 'Right'} log does not contain ${target}`);
  }
}

/** The same RuleKey was logged twice with different structures. */
export class ConsistencyError extends RuleKeyDiffError {
  constructor(readonly ruleKey: string) {
    super('consistency', `RuleKey ${ruleKey} was logged with two different structures`);
  }
}

export class InputError extends RuleKeyDiffError {
  constructor(readonly filePath: string) {
    super('input', `${filePath} does not exist`);
  }
}
