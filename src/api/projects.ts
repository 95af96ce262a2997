/**
 * Project API routes.
 *
 * GET /api/projects            — List projects, most recently modified first
 * GET /api/project/:name       — Aggregated project metadata
 * GET /project/:name/prompts   — Per-paper prompts and the overview prompt
 */

import { Request, Response, Router } from 'express';
import { projectNotFoundError } from '../domain/errors';
import { validateProjectName } from '../resolver/sanitize';
import { ProjectStore } from '../storage/store';
import { sendJsonError } from './middleware';

/** Project name from the route, or null after answering 400. */
function projectNameOrReject(req: Request, res: Response): string | null {
  const validated = validateProjectName(req.params.name);
  if (!validated.ok) {
    sendJsonError(res, validated.error);
    return null;
  }
  return validated.value;
}

export function createProjectRoutes(store: ProjectStore): Router {
  const router = Router();

  router.get('/api/projects', async (_req, res, next) => {
    try {
      const projects = await store.listProjects();
      res.json({ projects });
    } catch (err) {
      next(err);
    }
  });

  router.get('/api/project/:name', async (req: Request, res, next) => {
    try {
      const projectName = projectNameOrReject(req, res);
      if (projectName === null) return;

      const data = await store.loadProjectData(projectName);
      if (!data) {
        sendJsonError(res, projectNotFoundError(projectName));
        return;
      }
      res.json(data);
    } catch (err) {
      next(err);
    }
  });

  router.get('/project/:name/prompts', async (req: Request, res, next) => {
    try {
      const projectName = projectNameOrReject(req, res);
      if (projectName === null) return;

      const prompts = await store.loadPrompts(projectName);
      if (!prompts) {
        sendJsonError(res, projectNotFoundError(projectName));
        return;
      }
      res.json(prompts);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
