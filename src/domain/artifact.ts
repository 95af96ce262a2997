/**
 * Artifact model.
 *
 * An artifact is any file the pipeline produced that the server hands out.
 * Each kind maps to an ordered list of location tiers; lookups try the
 * tiers in order and stop at the first file that exists.
 */

import { DEFAULT_REPORT_PAGE, IMAGES_SUBDIRECTORY, PipelineDirectory, REPORT_INFO_FILE } from './layout';

export type ArtifactKind = 'report-page' | 'paper-page' | 'image' | 'report-info';

/** A request for one artifact of a project. */
export type ArtifactRequest =
  | { kind: 'report-page'; filename?: string }
  | { kind: 'paper-page'; filename: string }
  | { kind: 'image'; filename: string }
  | { kind: 'report-info' };

/**
 * One place an artifact may live, relative to the project directory.
 * `fixedFile` pins the file name for kinds that take no filename.
 */
export interface LocationTier {
  label: string;
  directory: readonly string[];
  fixedFile?: string;
}

/** Location tiers per artifact kind, highest priority first. */
export const ARTIFACT_LOCATIONS: Record<ArtifactKind, readonly LocationTier[]> = {
  'report-page': [{ label: 'primary', directory: [PipelineDirectory.FinalOutput] }],
  'paper-page': [{ label: 'primary', directory: [PipelineDirectory.FinalOutput] }],
  image: [{ label: 'primary', directory: [PipelineDirectory.Figures, IMAGES_SUBDIRECTORY] }],
  'report-info': [
    { label: 'primary', directory: [PipelineDirectory.FinalOutput], fixedFile: REPORT_INFO_FILE },
    { label: 'legacy', directory: [PipelineDirectory.LegacyReport], fixedFile: REPORT_INFO_FILE },
  ],
};

/**
 * The logical name of a request, as a user would recognize it. Report
 * pages fall back to the overview page when no filename is given.
 */
export function logicalName(request: ArtifactRequest): string {
  switch (request.kind) {
    case 'report-page':
      return request.filename ? request.filename : DEFAULT_REPORT_PAGE;
    case 'paper-page':
    case 'image':
      return request.filename;
    case 'report-info':
      return REPORT_INFO_FILE;
  }
}

/**
 * Whether a missing artifact means "not generated yet" rather than a
 * mistyped name: the main report page and the report metadata.
 */
export function isPendingWhenMissing(request: ArtifactRequest): boolean {
  if (request.kind === 'report-info') return true;
  return request.kind === 'report-page' && logicalName(request) === DEFAULT_REPORT_PAGE;
}
