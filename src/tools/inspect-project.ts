/**
 * Project inspection for local debugging: which pipeline artifacts exist,
 * where the report metadata was found, and the URLs the report is served at.
 */

import fs from 'fs';
import path from 'path';
import { TypedErrorException } from '../domain/errors';
import {
  DEFAULT_REPORT_PAGE,
  LLM_RESPONSE_FILE,
  PipelineDirectory,
  STEP_METADATA_FILES,
} from '../domain/layout';
import { isMissingFileError, isRegularFile, locateArtifact, resolveArtifact, resolveProjectDir } from '../resolver/path-resolver';
import { validateProjectName } from '../resolver/sanitize';

export type CheckStatus = 'ok' | 'missing' | 'invalid';

export interface ArtifactCheck {
  label: string;
  path: string;
  status: CheckStatus;
  detail?: string;
}

export interface ProjectInspection {
  projectName: string;
  projectDir: string;
  exists: boolean;
  checks: ArtifactCheck[];
  /** Location tier the report metadata was read from, or null. */
  reportInfoTier: string | null;
  detailPageCount: number;
  urls: string[];
}

async function fileCheck(projectDir: string, segments: readonly string[]): Promise<ArtifactCheck> {
  const filePath = path.join(projectDir, ...segments);
  return {
    label: segments.join('/'),
    path: filePath,
    status: (await isRegularFile(filePath)) ? 'ok' : 'missing',
  };
}

/** The LLM response must carry both the overview and the per-paper entries. */
async function llmResponseCheck(projectDir: string): Promise<ArtifactCheck> {
  const check = await fileCheck(projectDir, [PipelineDirectory.Overview, LLM_RESPONSE_FILE]);
  if (check.status !== 'ok') return check;

  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(check.path, 'utf-8'));
  } catch (err) {
    return { ...check, status: 'invalid', detail: `not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ...check, status: 'invalid', detail: 'not a JSON object' };
  }

  const hasOverview = 'overview' in parsed;
  const papers = 'papers' in parsed ? parsed.papers : undefined;
  const paperCount = typeof papers === 'object' && papers !== null ? Object.keys(papers).length : 0;
  const missing = [hasOverview ? null : 'overview', papers === undefined ? 'papers' : null].filter(
    (name): name is string => name !== null,
  );
  if (missing.length > 0) {
    return { ...check, status: 'invalid', detail: `missing ${missing.join(', ')}` };
  }
  return { ...check, detail: `overview present, ${paperCount} papers` };
}

async function reportPageCheck(projectDir: string): Promise<ArtifactCheck> {
  const check = await fileCheck(projectDir, [PipelineDirectory.FinalOutput, DEFAULT_REPORT_PAGE]);
  if (check.status !== 'ok') return check;
  const { size } = await fs.promises.stat(check.path);
  return { ...check, detail: `${size} bytes` };
}

async function countDetailPages(projectDir: string): Promise<number> {
  try {
    const names = await fs.promises.readdir(path.join(projectDir, PipelineDirectory.FinalOutput));
    return names.filter((name) => name.endsWith('.html') && name !== DEFAULT_REPORT_PAGE).length;
  } catch (err) {
    if (isMissingFileError(err)) return 0;
    throw err;
  }
}

/** Inspect one project. An unsafe project name is rejected with a typed error. */
export async function inspectProject(
  projectsRoot: string,
  projectName: string,
  baseUrl = 'http://127.0.0.1:5001',
): Promise<ProjectInspection> {
  const projectDir = resolveProjectDir(projectsRoot, projectName);
  if (!projectDir.ok) throw new TypedErrorException(projectDir.error);

  const reportUrl = `${baseUrl}/project/${encodeURIComponent(projectName)}/report`;
  const inspection: ProjectInspection = {
    projectName,
    projectDir: projectDir.value,
    exists: false,
    checks: [],
    reportInfoTier: null,
    detailPageCount: 0,
    urls: [reportUrl, `${reportUrl}/${DEFAULT_REPORT_PAGE}`],
  };

  try {
    inspection.exists = (await fs.promises.stat(projectDir.value)).isDirectory();
  } catch (err) {
    if (!isMissingFileError(err)) throw err;
  }
  if (!inspection.exists) return inspection;

  for (const segments of Object.values(STEP_METADATA_FILES)) {
    inspection.checks.push(await fileCheck(projectDir.value, segments));
  }
  inspection.checks.push(await llmResponseCheck(projectDir.value));
  inspection.checks.push(await reportPageCheck(projectDir.value));

  const resolved = resolveArtifact(projectsRoot, projectName, { kind: 'report-info' });
  if (!resolved.ok) throw new TypedErrorException(resolved.error);
  const found = await locateArtifact(resolved.artifact);
  inspection.reportInfoTier = found ? found.tier : null;
  inspection.checks.push({
    label: 'report_info.json',
    path: found ? found.path : resolved.artifact.candidates[0].path,
    status: found ? 'ok' : 'missing',
    detail: found ? `${found.tier} location` : undefined,
  });

  inspection.detailPageCount = await countDetailPages(projectDir.value);
  return inspection;
}

/** Name of the lexicographically last project directory, or null when there is none. */
export async function latestProjectName(projectsRoot: string): Promise<string | null> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(projectsRoot, { withFileTypes: true });
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
  const names = entries
    .filter((entry) => entry.isDirectory() && validateProjectName(entry.name).ok)
    .map((entry) => entry.name)
    .sort();
  return names.length > 0 ? names[names.length - 1] : null;
}

const STATUS_TAGS: Record<CheckStatus, string> = {
  ok: '[OK]',
  missing: '[MISSING]',
  invalid: '[INVALID]',
};

/** Render an inspection as plain text lines. */
export function formatInspection(inspection: ProjectInspection): string {
  if (!inspection.exists) {
    return `[ERROR] Project directory not found: ${inspection.projectDir}\n`;
  }
  const lines = [`Project: ${inspection.projectName}`, `Directory: ${inspection.projectDir}`, ''];
  for (const check of inspection.checks) {
    const detail = check.detail ? ` (${check.detail})` : '';
    lines.push(`${STATUS_TAGS[check.status]} ${check.label}${detail}`);
  }
  lines.push(`Detail pages: ${inspection.detailPageCount}`, '', 'Report URLs:');
  for (const url of inspection.urls) lines.push(`  ${url}`);
  return lines.join('\n') + '\n';
}
