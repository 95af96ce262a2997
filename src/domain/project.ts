/**
 * Project read models returned by the JSON API.
 */

/** JSON object as read from a metadata file. */
export type JsonObject = Record<string, unknown>;

/** A project directory found under the projects root. */
export interface ProjectListing {
  name: string;
  createdAt: string;
  modifiedAt: string;
  summary: JsonObject;
}

/** Aggregate of a project's metadata files. Absent files read as empty. */
export interface ProjectData {
  name: string;
  summary: JsonObject;
  search: JsonObject;
  papers: unknown[];
  figures: JsonObject;
  promptsInfo: JsonObject;
  overviewInfo: JsonObject;
  reportInfo: JsonObject;
  /** Which location the report metadata came from, or null when absent. */
  reportInfoTier: string | null;
}

export interface PromptEntry {
  id: string;
  filename: string;
  content: string;
}

export interface ProjectPrompts {
  projectName: string;
  prompts: PromptEntry[];
  overviewPrompt: string;
}
