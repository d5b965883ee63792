import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import {
  describeError,
  PersistenceFailureReason,
  PersistenceResult,
  persistenceFailure,
} from '../core/errors';

export type LoadResult<T> =
  | { ok: true; path: string; data: T }
  | { ok: false; reason: PersistenceFailureReason; message: string };

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function writeJsonFile(filePath: string, data: unknown): PersistenceResult {
  const resolved = path.resolve(process.cwd(), filePath);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, JSON.stringify(data, null, 2), { encoding: 'utf-8' });
    return { ok: true, path: resolved };
  } catch (error) {
    return persistenceFailure('io', `Failed to write ${resolved}: ${describeError(error)}`);
  }
}

/**
 * Reads and validates a JSON document. A missing file, an unreadable file
 * and a file whose content does not match the schema are reported as
 * distinct reasons; nothing is thrown.
 */
export function readJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): LoadResult<T> {
  const resolved = path.resolve(process.cwd(), filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return { ok: false, reason: 'missing', message: `File not found: ${resolved}` };
    }
    return { ok: false, reason: 'io', message: `Failed to read ${resolved}: ${describeError(error)}` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { ok: false, reason: 'corrupt', message: `Invalid JSON in ${resolved}: ${describeError(error)}` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, reason: 'corrupt', message: `Unexpected content in ${resolved}: ${issues}` };
  }
  return { ok: true, path: resolved, data: result.data };
}
