import { loadLogFile } from '../../parser/line-parser.js';
import { RULE_KEY_LOGGER } from '../../parser/patterns.js';
import { StructureIndex } from '../../model/structure-index.js';
import { NotFoundError, RuleKeyDiffError } from '../../model/errors.js';
import { diffAllNames, diffByName } from '../../diff/traversal.js';
import type { DiffOptions as TraversalOptions } from '../../diff/traversal.js';
import { DEFAULT_FORMATS } from '../../diff/value-list.js';
import { getLogger, setLogger, ConsoleLogger, QuietLogger } from '../../utils/logger.js';
import { formatTerminal } from '../formatters/terminal.js';
import type { DiffReport } from '../formatters/terminal.js';
import { formatJson } from '../formatters/json.js';
import { loadConfig } from '../config.js';
import type { OutputFormat } from '../config.js';

export interface DiffOptions {
  cwd?: string;
  target?: string;
  format?: OutputFormat;
  verbose?: boolean;
  checkPaths?: boolean;
}

function loadIndex(filePath: string): StructureIndex {
  const logger = getLogger();
  logger.info(`Loading ${filePath}`);
  const index = new StructureIndex(loadLogFile(filePath));
  logger.info(`Loaded ${index.size()} rules`);
  return index;
}

export function argsWarning(left: StructureIndex, right: StructureIndex): string | undefined {
  const leftArgs = left.invocationInfo('Args');
  const rightArgs = right.invocationInfo('Args');
  if (leftArgs === rightArgs) return undefined;
  return `Commands used to generate the logs are not identical: [${leftArgs}] vs [${rightArgs}]. ` +
    'This might cause spurious differences to be listed.';
}

/** Logs a user-facing failure; anything that is not one is rethrown. */
export function reportFailure(err: unknown): void {
  if (!(err instanceof RuleKeyDiffError)) throw err;
  const logger = getLogger();
  logger.error(err.message);
  if (err instanceof NotFoundError) {
    logger.info(`Did you forget to enable RuleKey logging for ${RULE_KEY_LOGGER}? (see --help)`);
  }
}

/** Loads both logs and builds the report without printing it. */
export function runDiff(leftLog: string, rightLog: string, opts: TraversalOptions & { target?: string } = {}): DiffReport {
  const left = loadIndex(leftLog);
  const right = loadIndex(rightLog);

  const warnings: string[] = [];
  const warning = argsWarning(left, right);
  if (warning) {
    warnings.push(warning);
    getLogger().warning(warning);
  }

  getLogger().info('Comparing rules...');
  const lines = opts.target
    ? diffByName(opts.target, left, right, opts)
    : diffAllNames(left, right, opts);

  return { left: leftLog, right: rightLog, target: opts.target, warnings, lines };
}

export async function diffCommand(leftLog: string, rightLog: string, opts: DiffOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const config = await loadConfig(cwd);

  const format = opts.format ?? config.format ?? 'terminal';
  const verbose = opts.verbose ?? config.verbose ?? false;
  setLogger(format === 'json' ? new QuietLogger() : new ConsoleLogger(verbose));

  let report: DiffReport;
  try {
    report = runDiff(leftLog, rightLog, {
      target: opts.target,
      verbose,
      checkPaths: opts.checkPaths ?? config.checkPaths ?? false,
      formats: {
        left: config.leftFormat ?? DEFAULT_FORMATS.left,
        right: config.rightFormat ?? DEFAULT_FORMATS.right,
      },
    });
  } catch (err) {
    reportFailure(err);
    process.exit(1);
  }

  console.log(format === 'json' ? formatJson(report) : formatTerminal(report));
}
