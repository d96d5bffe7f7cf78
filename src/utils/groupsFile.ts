// src/utils/groupsFile.ts
// Reads a group roster file: a JSON array of arrays of student names.

import { readFile } from 'node:fs/promises';
import type { Group } from '../types/index.js';
import { GroupFileError, InvalidInputFormatError, getErrorCode, getErrorMessage } from './errorUtils.js';
import { parseGroups } from './groupsSchema.js';

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (e) {
    const code = getErrorCode(e);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new GroupFileError('not_found', path, `File not found: ${path}`, { cause: e });
    }
    throw new GroupFileError('read_failed', path, `Could not read ${path}: ${getErrorMessage(e)}`, { cause: e });
  }
}

export function decodeGroups(text: string, path: string): Group[] {
  if (!text.trim()) throw new GroupFileError('empty', path, `File is empty: ${path}`);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new GroupFileError('invalid_json', path, `Invalid JSON in file ${path}: ${getErrorMessage(e)}`, { cause: e });
  }

  try {
    return parseGroups(data, path);
  } catch (e) {
    if (e instanceof InvalidInputFormatError) {
      throw new GroupFileError('invalid_format', path, e.message, { cause: e });
    }
    throw e;
  }
}

/**
 * @throws GroupFileError with kind not_found, read_failed, empty, invalid_json or invalid_format
 */
export async function loadGroupsFromFile(path: string): Promise<Group[]> {
  const text = await readText(path);
  return decodeGroups(text, path);
}
