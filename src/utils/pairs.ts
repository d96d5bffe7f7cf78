/**
 * Pair and roster set utilities for group history checks
 */

import type { Group, Pair, Student } from '../types/index.js';

export const pairKey = (a: Student, b: Student): string =>
  a < b ? JSON.stringify([a, b]) : JSON.stringify([b, a]);

export const canonicalPair = (a: Student, b: Student): Pair => (a < b ? [a, b] : [b, a]);

/**
 * Visits every position pair (i < j) of a group in order, skipping
 * positions that hold the same name.
 */
export function forEachMemberPair(group: Group, visit: (a: Student, b: Student) => void): void {
  for (let i = 0; i < group.length; i++) {
    for (let j = i + 1; j < group.length; j++) {
      if (group[i] === group[j]) continue;
      visit(group[i], group[j]);
    }
  }
}

/**
 * Set of pair keys for every two students that shared a group.
 * Use pairKey() to probe it.
 */
export function buildPairSet(groups: readonly Group[]): Set<string> {
  const pairs = new Set<string>();
  for (const group of groups) {
    forEachMemberPair(group, (a, b) => {
      pairs.add(pairKey(a, b));
    });
  }
  return pairs;
}

export function buildStudentSet(groups: readonly Group[]): Set<Student> {
  const students = new Set<Student>();
  for (const group of groups) {
    for (const s of group) students.add(s);
  }
  return students;
}

export interface DuplicateMembers {
  groupIndex: number;
  names: Student[];
}

/** Names listed more than once inside the same group, per group. */
export function findDuplicateMembers(groups: readonly Group[]): DuplicateMembers[] {
  const out: DuplicateMembers[] = [];
  groups.forEach((group, groupIndex) => {
    const seen = new Set<Student>();
    const dupes = new Set<Student>();
    for (const s of group) {
      if (seen.has(s)) dupes.add(s);
      seen.add(s);
    }
    if (dupes.size > 0) out.push({ groupIndex, names: [...dupes] });
  });
  return out;
}

export const compareNames = (a: Student, b: Student): number => (a < b ? -1 : a > b ? 1 : 0);
