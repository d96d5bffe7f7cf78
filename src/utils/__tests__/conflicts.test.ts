import { describe, it, expect } from 'vitest';
import { GroupChecker, analyze } from '../conflicts.js';
import { InvalidInputFormatError } from '../errorUtils.js';

describe('analyze', () => {
  it('passes a proposal that repeats no pair', () => {
    const result = analyze([['Alice', 'Bob', 'Charlie']], [['Alice', 'Dave']]);
    expect(result.has_conflicts).toBe(false);
    expect(result.num_conflicts).toBe(0);
    expect(result.conflicts).toEqual([]);
    expect(result.missing_students).toEqual(['Bob', 'Charlie']);
    expect(result.num_missing).toBe(2);
    expect(result.has_missing).toBe(true);
  });

  it('flags a previous pair inside a larger group', () => {
    expect(analyze([['Alice', 'Bob']], [['Alice', 'Bob', 'Carol']])).toEqual({
      has_conflicts: true,
      num_conflicts: 1,
      conflicts: [
        {
          group_index: 0,
          group_members: ['Alice', 'Bob', 'Carol'],
          conflicts: [{ students: ['Alice', 'Bob'], pair: ['Alice', 'Bob'] }],
        },
      ],
      missing_students: [],
      num_missing: 0,
      has_missing: false,
    });
  });

  it('handles empty history', () => {
    const result = analyze([], [['X', 'Y']]);
    expect(result.has_conflicts).toBe(false);
    expect(result.missing_students).toEqual([]);
  });

  it('reports every previous student missing from an empty proposal', () => {
    const result = analyze([['A', 'B', 'C']], []);
    expect(result.has_conflicts).toBe(false);
    expect(result.missing_students).toEqual(['A', 'B', 'C']);
  });

  it('matches reversed pairs but keeps the written order in students', () => {
    const result = analyze([['Alice', 'Bob']], [['Bob', 'Alice']]);
    expect(result.conflicts[0].conflicts).toEqual([{ students: ['Bob', 'Alice'], pair: ['Alice', 'Bob'] }]);
  });

  it('does not match names that differ only by case', () => {
    const result = analyze([['Alice', 'Bob']], [['alice', 'bob']]);
    expect(result.has_conflicts).toBe(false);
    expect(result.missing_students).toEqual(['Alice', 'Bob']);
  });

  it('lists several conflicts in one group in position order', () => {
    const result = analyze(
      [['Alice', 'Bob', 'Charlie'], ['Alice', 'David', 'Eve']],
      [['Alice', 'Bob', 'David']],
    );
    expect(result.num_conflicts).toBe(2);
    expect(result.conflicts[0].conflicts.map(c => c.students)).toEqual([
      ['Alice', 'Bob'],
      ['Alice', 'David'],
    ]);
  });

  it('counts pairs, not groups, in num_conflicts', () => {
    const result = analyze(
      [['Alice', 'Bob'], ['Charlie', 'David'], ['Charlie', 'Frank']],
      [['Alice', 'Bob', 'Eve'], ['Charlie', 'David', 'Frank']],
    );
    expect(result.conflicts.map(g => g.group_index)).toEqual([0, 1]);
    expect(result.num_conflicts).toBe(3);
  });

  it('omits conflict-free groups but keeps original indexes', () => {
    const result = analyze(
      [['Alice', 'Bob', 'Charlie', 'David', 'Eve']],
      [['Alice', 'Frank', 'Grace'], ['Bob', 'Charlie', 'Henry']],
    );
    expect(result.conflicts).toHaveLength(1);
    expect(result.conflicts[0].group_index).toBe(1);
    expect(result.missing_students).toEqual(['David', 'Eve']);
  });

  it('does not self-conflict or double count on duplicate names', () => {
    const result = analyze([['A', 'B']], [['A', 'B', 'A'], ['C', 'C']]);
    expect(result.num_conflicts).toBe(1);
    expect(result.conflicts).toEqual([
      { group_index: 0, group_members: ['A', 'B', 'A'], conflicts: [{ students: ['A', 'B'], pair: ['A', 'B'] }] },
    ]);
  });

  it('sorts missing students', () => {
    expect(analyze([['Zoe', 'Alice', 'Mike']], [['David', 'Eve']]).missing_students).toEqual(['Alice', 'Mike', 'Zoe']);
  });

  it('returns equal results for repeated calls', () => {
    const prev = [['A', 'B', 'C'], ['D', 'E']];
    const next = [['A', 'B'], ['C', 'D']];
    expect(analyze(prev, next)).toEqual(analyze(prev, next));
  });

  it('covers every previous student as either proposed or missing', () => {
    const prev = [['A', 'B', 'C'], ['D', 'E', 'F']];
    const next = [['A', 'G'], ['D', 'H']];
    const { missing_students } = analyze(prev, next);
    const kept = ['A', 'B', 'C', 'D', 'E', 'F'].filter(s => next.some(g => g.includes(s)));
    expect([...missing_students, ...kept].sort()).toEqual(['A', 'B', 'C', 'D', 'E', 'F']);
  });

  it('rejects data that is not a list of lists of strings', () => {
    const bad = JSON.parse('[["A", "B"], [1, 2]]');
    expect(() => analyze([['A']], bad)).toThrow(InvalidInputFormatError);
    expect(() => analyze([['A']], bad)).toThrow('All group members in proposed groups must be strings');
    expect(() => analyze(JSON.parse('{"groups": []}'), [])).toThrow('Expected a list of groups in previous groups');
  });
});

describe('GroupChecker', () => {
  const checker = new GroupChecker([['Alice', 'Bob', 'Charlie'], ['David', 'Eve', 'Frank']]);

  it('combines conflicts and missing students in one analysis', () => {
    const proposed = [['Alice', 'Bob', 'Grace'], ['David', 'Henry']];
    const result = checker.analyze(proposed);
    expect(result.conflicts).toEqual(checker.checkProposedGroups(proposed));
    expect(result.missing_students).toEqual(checker.findMissingStudents(proposed));
    expect(result.num_conflicts).toBe(1);
    expect(result.missing_students).toEqual(['Charlie', 'Eve', 'Frank']);
  });

  it('rejects a malformed proposal before analysing it', () => {
    expect(() => checker.analyze(JSON.parse('[["Alice"], "Bob"]'))).toThrow(
      'Group 1 in proposed groups is not a list',
    );
  });

  it('answers pair lookups in either order', () => {
    expect(checker.hasPaired('Charlie', 'Alice')).toBe(true);
    expect(checker.hasPaired('Alice', 'David')).toBe(false);
    expect(checker.hasPaired('Alice', 'Alice')).toBe(false);
  });

  it('checks several proposals against the same history', () => {
    expect(checker.checkProposedGroups([['Alice', 'David', 'Grace'], ['Bob', 'Eve', 'Henry']])).toEqual([]);
    expect(checker.checkProposedGroups([['Eve', 'Frank']])).toHaveLength(1);
  });

  it('finds missing students', () => {
    expect(checker.findMissingStudents([['Alice', 'Grace'], ['David', 'Henry']])).toEqual([
      'Bob',
      'Charlie',
      'Eve',
      'Frank',
    ]);
    expect(checker.findMissingStudents([['Alice', 'David'], ['Bob', 'Eve'], ['Charlie', 'Frank']])).toEqual([]);
  });
});
