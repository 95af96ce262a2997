/**
 * Path resolver.
 *
 * Turns (project name, artifact request) into an ordered list of candidate
 * file paths. resolveArtifact() is pure; locateArtifact() is the only step
 * that consults the file system, and only to walk the candidates in order.
 */

import fs from 'fs';
import path from 'path';
import {
  ARTIFACT_LOCATIONS,
  ArtifactKind,
  ArtifactRequest,
  LocationTier,
  logicalName,
} from '../domain/artifact';
import { TypedError, unsafePathError } from '../domain/errors';
import { Validated, validateProjectName, validateRelativePath } from './sanitize';

/** One place to look for an artifact. */
export interface ArtifactCandidate {
  /** Tier label, e.g. "primary" or "legacy". */
  tier: string;
  /** Absolute directory the file is served from. */
  directory: string;
  /** Path of the file relative to `directory`, `/`-separated. */
  relativePath: string;
  /** Absolute file path. */
  path: string;
}

export interface ResolvedArtifact {
  kind: ArtifactKind;
  projectName: string;
  logicalName: string;
  /** Candidates in priority order. */
  candidates: ArtifactCandidate[];
}

export type ResolveResult = { ok: true; artifact: ResolvedArtifact } | { ok: false; error: TypedError };

/** Predicate reporting whether a path names an existing regular file. */
export type FileCheck = (filePath: string) => Promise<boolean>;

function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/** Resolve the directory of a project, validating its name. */
export function resolveProjectDir(projectsRoot: string, projectName: string): Validated<string> {
  const validated = validateProjectName(projectName);
  if (!validated.ok) return validated;

  const root = path.resolve(projectsRoot);
  const projectDir = path.join(root, projectName);
  if (!isInside(root, projectDir)) {
    return { ok: false, error: unsafePathError('projectName', projectName, 'outside projects root') };
  }
  return { ok: true, value: projectDir };
}

function requestedSegments(request: ArtifactRequest): Validated<string[] | null> {
  if (request.kind === 'report-info') return { ok: true, value: null };
  return validateRelativePath(logicalName(request));
}

function buildCandidate(
  projectsRoot: string,
  projectDir: string,
  tier: LocationTier,
  segments: string[] | null,
  request: ArtifactRequest,
): Validated<ArtifactCandidate> {
  const directory = path.join(projectDir, ...tier.directory);
  const fileSegments = tier.fixedFile ? [tier.fixedFile] : segments ?? [];
  const filePath = path.join(directory, ...fileSegments);

  if (fileSegments.length === 0 || !isInside(path.resolve(projectsRoot), filePath)) {
    return { ok: false, error: unsafePathError('filename', logicalName(request), 'outside projects root') };
  }
  return {
    ok: true,
    value: {
      tier: tier.label,
      directory,
      relativePath: fileSegments.join('/'),
      path: filePath,
    },
  };
}

/**
 * Compute the candidate paths for an artifact. Never touches the file
 * system; unsafe names come back as a VALIDATION.UNSAFE_PATH error.
 */
export function resolveArtifact(projectsRoot: string, projectName: string, request: ArtifactRequest): ResolveResult {
  const projectDir = resolveProjectDir(projectsRoot, projectName);
  if (!projectDir.ok) return projectDir;

  const segments = requestedSegments(request);
  if (!segments.ok) return segments;

  const candidates: ArtifactCandidate[] = [];
  for (const tier of ARTIFACT_LOCATIONS[request.kind]) {
    const candidate = buildCandidate(projectsRoot, projectDir.value, tier, segments.value, request);
    if (!candidate.ok) return candidate;
    candidates.push(candidate.value);
  }

  return {
    ok: true,
    artifact: {
      kind: request.kind,
      projectName,
      logicalName: logicalName(request),
      candidates,
    },
  };
}

/** True for the errors that mean a path does not exist. */
export function isMissingFileError(err: unknown): boolean {
  // Checked by shape: fs errors may come from another realm (e.g. under a test VM).
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

/** Default file check: true for regular files, false when absent, throws on other I/O errors. */
export const isRegularFile: FileCheck = async (filePath) => {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile();
  } catch (err) {
    if (isMissingFileError(err)) return false;
    throw err;
  }
};

/** Walk the candidates in priority order and return the first existing file. */
export async function locateArtifact(
  artifact: ResolvedArtifact,
  isFile: FileCheck = isRegularFile,
): Promise<ArtifactCandidate | null> {
  for (const candidate of artifact.candidates) {
    if (await isFile(candidate.path)) return candidate;
  }
  return null;
}
