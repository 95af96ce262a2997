/**
 * Report artifact routes.
 *
 * GET /project/:name/report          — Main report page (overview_report.html)
 * GET /project/:name/report/*        — Any page under the report directory
 * GET /project/:name/paper/*         — Per-paper detail page
 * GET /project/:name/images/*        — Figure image
 * GET /project/:name/report-info     — Report metadata (primary, then legacy location)
 */

import { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { ArtifactRequest, isPendingWhenMissing } from '../domain/artifact';
import {
  artifactNotFoundError,
  artifactPendingError,
  internalError,
  TypedError,
  TypedErrorException,
} from '../domain/errors';
import { logger } from '../logger';
import {
  ArtifactCandidate,
  FileCheck,
  isRegularFile,
  locateArtifact,
  resolveArtifact,
} from '../resolver/path-resolver';
import { sendError } from './middleware';

const log = logger.child({ module: 'reports' });

/** Wildcard route segment, decoded by Express. */
function wildcard(req: Request): string {
  return req.params[0] ?? '';
}

/**
 * Stream a located file. `missing` answers when the file is gone by the
 * time it is opened; a client abort is not an error.
 */
function streamCandidate(
  candidate: ArtifactCandidate,
  missing: TypedError,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  res.sendFile(candidate.relativePath, { root: candidate.directory, dotfiles: 'deny' }, (err) => {
    if (!err) return;
    const code = 'code' in err ? err.code : undefined;
    if (code === 'ECONNABORTED') {
      log.debug('Artifact request aborted by client', { path: candidate.path });
      return;
    }
    if (res.headersSent) {
      log.warn('Artifact stream interrupted', { path: candidate.path, error: err.message });
      return;
    }
    if (('status' in err && err.status === 404) || code === 'ENOENT') {
      log.warn('Artifact vanished before streaming', { path: candidate.path, code: missing.code });
      sendError(req, res, missing);
      return;
    }
    log.error('Failed to send artifact', { path: candidate.path, error: err.message });
    next(new TypedErrorException(internalError('Failed to read artifact', { path: candidate.path })));
  });
}

/**
 * Resolve, locate and stream one artifact. Logs the logical name with the
 * candidate paths, then the physical path that was served.
 */
async function serveArtifact(
  projectsRoot: string,
  isFile: FileCheck,
  request: ArtifactRequest,
  req: Request,
  res: Response,
  next: NextFunction,
): Promise<void> {
  const projectName = req.params.name;
  const resolved = resolveArtifact(projectsRoot, projectName, request);
  if (!resolved.ok) {
    log.warn('Rejected artifact request', { project: projectName, kind: request.kind, reason: resolved.error.message });
    sendError(req, res, resolved.error);
    return;
  }

  const { artifact } = resolved;
  const candidatePaths = artifact.candidates.map((c) => c.path);
  log.info('Artifact requested', {
    project: projectName,
    kind: artifact.kind,
    artifact: artifact.logicalName,
    candidates: candidatePaths,
  });

  try {
    const found = await locateArtifact(artifact, isFile);
    const missing = isPendingWhenMissing(request)
      ? artifactPendingError(projectName, artifact.logicalName)
      : artifactNotFoundError(projectName, artifact.logicalName);
    if (!found) {
      log.warn('Artifact unavailable', {
        project: projectName,
        artifact: artifact.logicalName,
        code: missing.code,
        candidates: candidatePaths,
      });
      sendError(req, res, missing);
      return;
    }

    log.info('Artifact resolved', {
      project: projectName,
      artifact: artifact.logicalName,
      tier: found.tier,
      path: found.path,
    });
    streamCandidate(found, missing, req, res, next);
  } catch (err) {
    log.error('Artifact lookup failed', {
      project: projectName,
      artifact: artifact.logicalName,
      candidates: candidatePaths,
      error: err instanceof Error ? err.message : String(err),
    });
    next(new TypedErrorException(internalError('Failed to read artifact', { candidates: candidatePaths })));
  }
}

/**
 * Report artifact routes. `isFile` decides whether a candidate path is an
 * existing file; it defaults to a `stat` of the path.
 */
export function createReportRoutes(projectsRoot: string, isFile: FileCheck = isRegularFile): Router {
  const router = Router();

  const artifactHandler = (toRequest: (req: Request) => ArtifactRequest): RequestHandler => {
    return (req, res, next) => {
      serveArtifact(projectsRoot, isFile, toRequest(req), req, res, next).catch(next);
    };
  };

  router.get('/project/:name/report', artifactHandler(() => ({ kind: 'report-page' })));

  router.get(
    '/project/:name/report/*',
    artifactHandler((req) => ({ kind: 'report-page', filename: wildcard(req) })),
  );

  router.get(
    '/project/:name/paper/*',
    artifactHandler((req) => ({ kind: 'paper-page', filename: wildcard(req) })),
  );

  router.get(
    '/project/:name/images/*',
    artifactHandler((req) => ({ kind: 'image', filename: wildcard(req) })),
  );

  router.get('/project/:name/report-info', artifactHandler(() => ({ kind: 'report-info' })));

  return router;
}
