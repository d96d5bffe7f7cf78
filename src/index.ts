export type {
  AnalysisResult,
  CheckConfig,
  Group,
  GroupConflict,
  GroupFileErrorKind,
  OutputFormat,
  Pair,
  PairConflict,
  Student,
} from './types/index.js';
export { GroupChecker, analyze } from './utils/conflicts.js';
export { buildPairSet, buildStudentSet, canonicalPair, findDuplicateMembers, pairKey } from './utils/pairs.js';
export { parseGroups } from './utils/groupsSchema.js';
export { decodeGroups, loadGroupsFromFile } from './utils/groupsFile.js';
export { formatJsonReport, formatTextReport } from './utils/formatters.js';
export { ConfigError, GroupFileError, InvalidInputFormatError, UsageError } from './utils/errorUtils.js';
export { loadConfig } from './lib/config.js';
export { run } from './cli.js';
