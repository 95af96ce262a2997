/**
 * Input validation for names taken from request URLs.
 *
 * Runs before any path is built, so a rejected name never reaches the
 * file system.
 */

import { TypedError, unsafePathError } from '../domain/errors';

const MAX_SEGMENT_LENGTH = 255;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export type Validated<T> = { ok: true; value: T } | { ok: false; error: TypedError };

function segmentProblem(segment: string): string | null {
  if (segment.length === 0) return 'empty path segment';
  if (segment === '.' || segment === '..') return 'relative path segment';
  if (segment.startsWith('.')) return 'hidden path segment';
  if (segment.length > MAX_SEGMENT_LENGTH) return 'path segment too long';
  if (CONTROL_CHARS.test(segment)) return 'control character';
  if (segment.includes('\\')) return 'backslash';
  if (segment.includes(':')) return 'colon';
  return null;
}

/** Validate a project name: exactly one safe path segment. */
export function validateProjectName(name: string): Validated<string> {
  if (name.includes('/')) {
    return { ok: false, error: unsafePathError('projectName', name, 'path separator') };
  }
  const problem = segmentProblem(name);
  if (problem) {
    return { ok: false, error: unsafePathError('projectName', name, problem) };
  }
  return { ok: true, value: name };
}

/**
 * Validate a relative file path and split it into segments. Nested paths
 * (`sub/page.html`) are allowed; absolute paths and parent-directory
 * segments are not.
 */
export function validateRelativePath(filename: string): Validated<string[]> {
  if (filename.startsWith('/')) {
    return { ok: false, error: unsafePathError('filename', filename, 'absolute path') };
  }
  const segments = filename.split('/');
  for (const segment of segments) {
    const problem = segmentProblem(segment);
    if (problem) {
      return { ok: false, error: unsafePathError('filename', filename, problem) };
    }
  }
  return { ok: true, value: segments };
}
