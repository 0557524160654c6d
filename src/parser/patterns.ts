/**
 * Line and value shapes recognised in a build log. Built once at load time;
 * none of these carry the `g` flag, so `exec` on them is stateless.
 */
export interface LogPatterns {
  readonly ruleKeyLine: RegExp;
  readonly invocationLine: RegExp;
  readonly invocationValue: RegExp;
  readonly pathValue: RegExp;
  readonly referencePrefix: string;
  readonly referenceSuffix: string;
  readonly keyMarkerPrefix: string;
  readonly entryDelimiter: string;
}

export const PATTERNS: LogPatterns = Object.freeze({
  ruleKeyLine: /^.*(\[[^\]+]\])*\s+RuleKey\s+(.*)$/,
  invocationLine: /^.*(\[[^\]+]\])*\s+InvocationInfo\s+(.*)$/,
  invocationValue: /(\w+)=\[([^\]]*)\]/,
  pathValue: /path\(([^:]+):\w+\)/,
  referencePrefix: 'ruleKey(sha1=',
  referenceSuffix: ')',
  keyMarkerPrefix: 'key(',
  // BuildTargets contain ':' so values are split on the closing paren instead
  entryDelimiter: '):',
});

/** Logger category that must be raised to FINER for RuleKey lines to appear. */
export const RULE_KEY_LOGGER = 'com.facebook.buck.rules.keys.RuleKeyBuilder';
