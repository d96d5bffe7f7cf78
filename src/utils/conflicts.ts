import type { AnalysisResult, Group, GroupConflict, PairConflict, Student } from '../types/index.js';
import { buildPairSet, buildStudentSet, canonicalPair, compareNames, forEachMemberPair, pairKey } from './pairs.js';
import { parseGroups } from './groupsSchema.js';

/**
 * Checks proposed groups against the pairs seen in previous groups.
 * The previous pair and student sets are built once and never mutated,
 * so one checker can serve any number of proposals.
 */
export class GroupChecker {
  private readonly previousPairs: ReadonlySet<string>;
  private readonly previousStudents: ReadonlySet<Student>;

  constructor(previousGroups: readonly Group[]) {
    const groups = parseGroups(previousGroups, 'previous groups');
    this.previousPairs = buildPairSet(groups);
    this.previousStudents = buildStudentSet(groups);
  }

  hasPaired(a: Student, b: Student): boolean {
    return a !== b && this.previousPairs.has(pairKey(a, b));
  }

  /**
   * Groups that repeat a previous pairing, in proposal order.
   * Conflict-free groups are left out. A pair repeated inside one group
   * (duplicate names) is reported once.
   */
  checkProposedGroups(proposedGroups: readonly Group[]): GroupConflict[] {
    return this.conflictsIn(parseGroups(proposedGroups, 'proposed groups'));
  }

  /** Previous students absent from every proposed group, sorted by code unit. */
  findMissingStudents(proposedGroups: readonly Group[]): Student[] {
    return this.missingFrom(parseGroups(proposedGroups, 'proposed groups'));
  }

  analyze(proposedGroups: readonly Group[]): AnalysisResult {
    const groups = parseGroups(proposedGroups, 'proposed groups');
    const conflicts = this.conflictsIn(groups);
    const missing = this.missingFrom(groups);
    const numConflicts = conflicts.reduce((sum, g) => sum + g.conflicts.length, 0);

    return {
      has_conflicts: conflicts.length > 0,
      num_conflicts: numConflicts,
      conflicts,
      missing_students: missing,
      num_missing: missing.length,
      has_missing: missing.length > 0,
    };
  }

  private conflictsIn(groups: readonly Group[]): GroupConflict[] {
    const out: GroupConflict[] = [];

    groups.forEach((group, groupIndex) => {
      const seen = new Set<string>();
      const conflicts: PairConflict[] = [];

      forEachMemberPair(group, (a, b) => {
        const key = pairKey(a, b);
        if (!this.hasPaired(a, b) || seen.has(key)) return;
        seen.add(key);
        const [first, second] = canonicalPair(a, b);
        conflicts.push({ students: [a, b], pair: [first, second] });
      });

      if (conflicts.length > 0) {
        out.push({ group_index: groupIndex, group_members: [...group], conflicts });
      }
    });

    return out;
  }

  private missingFrom(groups: readonly Group[]): Student[] {
    const proposed = buildStudentSet(groups);
    return [...this.previousStudents].filter(s => !proposed.has(s)).sort(compareNames);
  }
}

/**
 * Validates a proposed grouping against previous ones.
 * @returns Conflicting pairs per proposed group and the previous students left out.
 * @throws InvalidInputFormatError when either input is not a list of lists of strings.
 */
export function analyze(previousGroups: readonly Group[], proposedGroups: readonly Group[]): AnalysisResult {
  return new GroupChecker(previousGroups).analyze(proposedGroups);
}
