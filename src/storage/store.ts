/**
 * Storage layer interface.
 *
 * The project tree is written by the external pipeline and is read-only
 * here. Methods take validated project names; an unsafe name is rejected
 * with a VALIDATION.UNSAFE_PATH error before any path is touched.
 */

import { ProjectData, ProjectListing, ProjectPrompts } from '../domain/project';

export interface ProjectStore {
  /** Absolute projects root this store reads from. */
  readonly projectsRoot: string;
  /** List project directories, most recently modified first. */
  listProjects(): Promise<ProjectListing[]>;
  /** Aggregate a project's metadata files, or null when the project does not exist. */
  loadProjectData(projectName: string): Promise<ProjectData | null>;
  /** Read a project's prompt files, or null when the project does not exist. */
  loadPrompts(projectName: string): Promise<ProjectPrompts | null>;
}
