/*
 * group-check command line: loads two roster files, checks the proposal
 * against the history and maps the outcome to an exit code.
 */

import { parseArgs } from 'node:util';
import type { AnalysisResult, OutputFormat } from './types/index.js';
import { loadConfig } from './lib/config.js';
import { createLogger, stderrSink, type LogSink } from './lib/logger.js';
import { analyze } from './utils/conflicts.js';
import { findDuplicateMembers } from './utils/pairs.js';
import { UsageError, getErrorCode, getErrorMessage, isExpectedError } from './utils/errorUtils.js';
import { formatGroupLabel, formatJsonReport, formatTextReport } from './utils/formatters.js';
import { loadGroupsFromFile } from './utils/groupsFile.js';

export const VERSION = '1.0.0';

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_ERROR = 2;

export const USAGE = 'Usage: group-check [options] <previous_groups.json> <proposed_groups.json>';

export const HELP = `${USAGE}

Check if proposed student groups contain members who have previously worked together,
and list students from previous groups who are missing from the proposal.

Options:
  -v, --verbose   Print progress to stderr
      --json      Output results in JSON format
  -h, --help      Show this help
      --version   Show the version

Environment:
  GROUP_CHECK_FORMAT    text | json (default: text)
  GROUP_CHECK_VERBOSE   true | false (default: false)

Examples:
  group-check previous_groups.json proposed_groups.json
  group-check -v data/previous.json data/proposed.json
  group-check --json data/previous.json data/proposed.json

Input file format (JSON):
  [
    ["Alice", "Bob", "Charlie"],
    ["David", "Eve", "Frank"]
  ]

Exit codes:
  0  no conflicts and no missing students
  1  conflicts found or students missing
  2  invalid arguments, unreadable or malformed input`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: LogSink;
  color?: boolean;
}

export const processIO: CliIO = {
  stdout: text => {
    process.stdout.write(`${text}\n`);
  },
  stderr: stderrSink,
};

export interface CliArgs {
  help: boolean;
  version: boolean;
  verbose: boolean;
  json: boolean;
  previousPath: string;
  proposedPath: string;
}

const cliOptions = {
  verbose: { type: 'boolean', short: 'v', default: false },
  json: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', default: false },
} as const;

function readArgv(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, strict: true, options: cliOptions });
  } catch (e) {
    // node:util reports unknown or malformed options with ERR_PARSE_ARGS_* codes
    if (getErrorCode(e)?.startsWith('ERR_PARSE_ARGS')) throw new UsageError(getErrorMessage(e));
    throw e;
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const parsed = readArgv(argv);
  const { values, positionals } = parsed;
  const help = values.help ?? false;
  const version = values.version ?? false;
  if (!help && !version && positionals.length !== 2) {
    throw new UsageError(`expected 2 file arguments, got ${positionals.length}`);
  }

  return {
    help,
    version,
    verbose: values.verbose ?? false,
    json: values.json ?? false,
    previousPath: positionals[0] ?? '',
    proposedPath: positionals[1] ?? '',
  };
}

export const exitCodeFor = (result: AnalysisResult): number =>
  result.has_conflicts || result.has_missing ? EXIT_FINDINGS : EXIT_OK;

/**
 * Runs one check. Never throws: every failure is reported on `io.stderr`
 * and turned into exit code 2.
 */
export async function run(argv: string[], io: CliIO = processIO, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout(HELP);
      return EXIT_OK;
    }
    if (args.version) {
      io.stdout(VERSION);
      return EXIT_OK;
    }

    const config = loadConfig(env);
    const format: OutputFormat = args.json ? 'json' : config.format;
    const log = createLogger({ verbose: args.verbose || config.verbose, write: io.stderr });

    log.info(`Loading previous groups from: ${args.previousPath}`);
    const previous = await loadGroupsFromFile(args.previousPath);
    log.info(`Loading proposed groups from: ${args.proposedPath}`);
    const proposed = await loadGroupsFromFile(args.proposedPath);
    log.info(`Loaded ${previous.length} previous group(s)`);
    log.info(`Loaded ${proposed.length} proposed group(s)`);
    for (const [label, groups] of [['previous', previous], ['proposed', proposed]] as const) {
      for (const d of findDuplicateMembers(groups)) {
        log.warn(`${formatGroupLabel(d.groupIndex)} of the ${label} groups lists ${d.names.join(', ')} more than once`);
      }
    }

    const result = analyze(previous, proposed);
    io.stdout(format === 'json' ? formatJsonReport(result) : formatTextReport(result, { color: io.color }));
    return exitCodeFor(result);
  } catch (e) {
    const log = createLogger({ write: io.stderr });
    if (e instanceof UsageError) {
      log.error(`Error: ${e.message}`);
      log.error(USAGE);
    } else if (isExpectedError(e)) {
      log.error(`Error: ${e.message}`);
    } else {
      log.error(`Unexpected error: ${getErrorMessage(e)}`);
    }
    return EXIT_ERROR;
  }
}
