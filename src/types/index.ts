export type Student = string;   // exact text, case-sensitive, never trimmed

export type Group = readonly Student[];

export type Pair = readonly [Student, Student]; // canonical: sorted

export interface PairConflict {
  students: [Student, Student]; // order as written in the proposed group
  pair: [Student, Student];     // canonical sorted pair
}

export interface GroupConflict {
  group_index: number;          // 0-based position in the proposed list
  group_members: Student[];
  conflicts: PairConflict[];
}

export interface AnalysisResult {
  has_conflicts: boolean;
  num_conflicts: number;        // conflicting pairs across all flagged groups
  conflicts: GroupConflict[];
  missing_students: Student[];
  num_missing: number;
  has_missing: boolean;
}

export type OutputFormat = 'text' | 'json';

export interface CheckConfig {
  format: OutputFormat;
  verbose: boolean;
}

export type GroupFileErrorKind =
  | 'not_found'
  | 'read_failed'
  | 'empty'
  | 'invalid_json'
  | 'invalid_format';
