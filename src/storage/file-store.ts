/**
 * File-system storage implementation over the pipeline's project tree.
 */

import fs from 'fs';
import path from 'path';
import { internalError, TypedErrorException } from '../domain/errors';
import {
  OVERVIEW_PROMPT_FILE,
  PipelineDirectory,
  PROJECT_MARKERS,
  PROMPT_FILE_PREFIX,
  PROMPT_FILE_SUFFIX,
  STEP_METADATA_FILES,
  StepMetadataKey,
  PROJECT_SUMMARY_FILE,
} from '../domain/layout';
import { JsonObject, ProjectData, ProjectListing, ProjectPrompts, PromptEntry } from '../domain/project';
import { isMissingFileError, locateArtifact, resolveArtifact, resolveProjectDir } from '../resolver/path-resolver';
import { validateProjectName } from '../resolver/sanitize';
import { logger } from '../logger';
import { ProjectStore } from './store';

const log = logger.child({ module: 'file-store' });

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a file as UTF-8, or null when it does not exist. */
async function readTextIfPresent(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
}

/**
 * Read a JSON object file. Missing files read as null; a file that is not
 * valid JSON is an internal error carrying the path.
 */
export async function readJsonObject(filePath: string): Promise<JsonObject | null> {
  const text = await readTextIfPresent(filePath);
  if (text === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    log.error('Metadata file is not valid JSON', {
      path: filePath,
      error: err instanceof Error ? err.message : String(err),
    });
    throw new TypedErrorException(internalError('Metadata file is not valid JSON', { path: filePath }));
  }
  return isJsonObject(parsed) ? parsed : {};
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch (err) {
    if (isMissingFileError(err)) return false;
    throw err;
  }
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(dirPath)).isDirectory();
  } catch (err) {
    if (isMissingFileError(err)) return false;
    throw err;
  }
}

function projectDirOrThrow(projectsRoot: string, projectName: string): string {
  const resolved = resolveProjectDir(projectsRoot, projectName);
  if (!resolved.ok) throw new TypedErrorException(resolved.error);
  return resolved.value;
}

export class FileProjectStore implements ProjectStore {
  readonly projectsRoot: string;

  constructor(projectsRoot: string) {
    this.projectsRoot = path.resolve(projectsRoot);
  }

  async listProjects(): Promise<ProjectListing[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.projectsRoot, { withFileTypes: true });
    } catch (err) {
      if (isMissingFileError(err)) {
        log.warn('Projects root does not exist', { projectsRoot: this.projectsRoot });
        return [];
      }
      throw err;
    }

    const projects: ProjectListing[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || !validateProjectName(entry.name).ok) continue;

      const projectDir = path.join(this.projectsRoot, entry.name);
      const markers = await Promise.all(PROJECT_MARKERS.map((marker) => exists(path.join(projectDir, marker))));
      if (!markers.some(Boolean)) continue;

      const stats = await fs.promises.stat(projectDir);
      const summary = await readJsonObject(path.join(projectDir, PROJECT_SUMMARY_FILE));
      projects.push({
        name: entry.name,
        createdAt: stats.ctime.toISOString(),
        modifiedAt: stats.mtime.toISOString(),
        summary: summary ?? {},
      });
    }

    projects.sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt) || a.name.localeCompare(b.name));
    return projects;
  }

  async loadProjectData(projectName: string): Promise<ProjectData | null> {
    const projectDir = projectDirOrThrow(this.projectsRoot, projectName);
    if (!(await isDirectory(projectDir))) return null;

    const readStep = (key: StepMetadataKey) => readJsonObject(path.join(projectDir, ...STEP_METADATA_FILES[key]));

    const [summary, search, details, figures, promptsInfo, overviewInfo] = await Promise.all([
      readJsonObject(path.join(projectDir, PROJECT_SUMMARY_FILE)),
      readStep('search'),
      readStep('details'),
      readStep('figures'),
      readStep('promptsInfo'),
      readStep('overviewInfo'),
    ]);

    const reportInfo = await this.loadReportInfo(projectName);
    const papers = details?.papers;

    return {
      name: projectName,
      summary: summary ?? {},
      search: search ?? {},
      papers: Array.isArray(papers) ? papers : [],
      figures: figures ?? {},
      promptsInfo: promptsInfo ?? {},
      overviewInfo: overviewInfo ?? {},
      reportInfo: reportInfo.data,
      reportInfoTier: reportInfo.tier,
    };
  }

  async loadPrompts(projectName: string): Promise<ProjectPrompts | null> {
    const projectDir = projectDirOrThrow(this.projectsRoot, projectName);
    if (!(await isDirectory(projectDir))) return null;

    const promptsDir = path.join(projectDir, PipelineDirectory.Prompts);
    let names: string[] = [];
    try {
      names = await fs.promises.readdir(promptsDir);
    } catch (err) {
      if (!isMissingFileError(err)) throw err;
    }

    const prompts: PromptEntry[] = [];
    for (const filename of names.sort()) {
      if (!filename.startsWith(PROMPT_FILE_PREFIX) || !filename.endsWith(PROMPT_FILE_SUFFIX)) continue;
      const content = await readTextIfPresent(path.join(promptsDir, filename));
      if (content === null) continue;
      prompts.push({
        id: filename.slice(PROMPT_FILE_PREFIX.length, filename.length - PROMPT_FILE_SUFFIX.length),
        filename,
        content,
      });
    }

    const overviewPrompt = await readTextIfPresent(
      path.join(projectDir, PipelineDirectory.Overview, OVERVIEW_PROMPT_FILE),
    );

    return { projectName, prompts, overviewPrompt: overviewPrompt ?? '' };
  }

  /** Report metadata through the tiered lookup: primary location first, then legacy. */
  private async loadReportInfo(projectName: string): Promise<{ data: JsonObject; tier: string | null }> {
    const resolved = resolveArtifact(this.projectsRoot, projectName, { kind: 'report-info' });
    if (!resolved.ok) throw new TypedErrorException(resolved.error);

    const found = await locateArtifact(resolved.artifact);
    if (!found) return { data: {}, tier: null };

    log.debug('Report metadata located', { project: projectName, tier: found.tier, path: found.path });
    return { data: (await readJsonObject(found.path)) ?? {}, tier: found.tier };
  }
}

export function createFileProjectStore(projectsRoot: string): ProjectStore {
  return new FileProjectStore(projectsRoot);
}
