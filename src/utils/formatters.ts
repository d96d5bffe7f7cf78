import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type { AnalysisResult, GroupConflict } from '../types/index.js';

export interface TextReportOptions {
  color?: boolean;
}

const formatGroupMembers = (members: readonly string[]): string => members.join(', ');

export function formatGroupLabel(index: number): string {
  return `Group ${index + 1}`;
}

function formatConflictBlock(group: GroupConflict): string[] {
  const lines = [`${formatGroupLabel(group.group_index)}: ${formatGroupMembers(group.group_members)}`, '  Conflicts:'];
  for (const c of group.conflicts) {
    const [a, b] = c.students;
    lines.push(`    - ${a} and ${b} have previously been in a group together`);
  }
  return lines;
}

function conflictSection(result: AnalysisResult, c: ChalkInstance): string[] {
  if (!result.has_conflicts) {
    return [c.green('✓ No conflicts found! All proposed groups have novel member combinations.')];
  }
  const lines = [c.red(`✗ Found conflicts in ${result.conflicts.length} proposed group(s):`)];
  for (const group of result.conflicts) {
    lines.push('', ...formatConflictBlock(group));
  }
  return lines;
}

function missingSection(result: AnalysisResult, c: ChalkInstance): string[] {
  if (!result.has_missing) {
    return [c.green('✓ All students from previous groups are included in the proposed groups.')];
  }
  return [
    c.yellow(`⚠ ${result.num_missing} student(s) from previous groups missing from the proposed groups:`),
    ...result.missing_students.map(name => `  - ${name}`),
  ];
}

/**
 * Human-readable report: conflicts first, then missing students.
 * Color follows chalk's terminal detection unless `color` is given.
 */
export function formatTextReport(result: AnalysisResult, options: TextReportOptions = {}): string {
  const enabled = options.color ?? chalk.level > 0;
  const level: ColorSupportLevel = !enabled ? 0 : chalk.level === 0 ? 1 : chalk.level;
  const c = new Chalk({ level });
  return [...conflictSection(result, c), '', ...missingSection(result, c)].join('\n');
}

export function formatJsonReport(result: AnalysisResult): string {
  return JSON.stringify(result, null, 2);
}
