import type { GroupFileErrorKind } from '../types/index.js';

/**
 * Raised when group data is not a list of lists of strings.
 * `issues` holds one message per problem found, in input order.
 */
export class InvalidInputFormatError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues[0] ?? 'Invalid group data');
    this.name = 'InvalidInputFormatError';
    this.issues = issues;
  }
}

export class GroupFileError extends Error {
  readonly kind: GroupFileErrorKind;
  readonly path: string;

  constructor(kind: GroupFileErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GroupFileError';
    this.kind = kind;
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Errors the user can fix by changing arguments, files or environment.
 * Everything else is reported as unexpected.
 */
export function isExpectedError(error: unknown): error is InvalidInputFormatError | GroupFileError | ConfigError | UsageError {
  return (
    error instanceof InvalidInputFormatError ||
    error instanceof GroupFileError ||
    error instanceof ConfigError ||
    error instanceof UsageError
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/** Node fs errors carry a string `code` such as ENOENT. */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}
