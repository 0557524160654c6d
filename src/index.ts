// Model types
export type { RuleKeyId, FieldName, FieldValue, ObjectStructure, ObjectRecord } from './model/structure.js';
export { classifyValue, humanNameOf, structuresEqual } from './model/structure.js';
export { StructureIndex, UNKNOWN_INVOCATION_VALUE } from './model/structure-index.js';
export type { ResolvedValue } from './model/structure-index.js';
export { RuleKeyDiffError, NotFoundError, ConsistencyError, InputError } from './model/errors.js';

// Parsing
export { parseLog, parseRuleKeyLine, loadLogFile } from './parser/line-parser.js';
export type { ParsedLog, InvocationInfo } from './parser/line-parser.js';

// Diffing
export { ValueListDiff, DEFAULT_FORMATS } from './diff/value-list.js';
export type { LineFormats, DiffValue } from './diff/value-list.js';
export { compareObjects, diffFrom, diffByName, diffAllNames, PairSet } from './diff/traversal.js';
export type { DiffOptions, LabeledPair, CompareResult, TraversalResult, MatchKind } from './diff/traversal.js';
export { reportOnPaths } from './report/paths.js';

// Utilities
export { fileSha1 } from './utils/hash.js';
export { setLogger, getLogger, ConsoleLogger, QuietLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
