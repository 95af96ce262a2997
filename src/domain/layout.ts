/**
 * Project directory layout.
 *
 * The report pipeline writes one directory per run under the projects
 * root. Every path the server reads is derived from the names below.
 *
 *   {projectsRoot}/{timestamp}_{slug}/
 *     project_summary.json
 *     step1_search/search_results.json
 *     step2_details/papers_details.json
 *     step3_figures/figures_info.json
 *     step3_figures/images/
 *     step4_prompts/prompt_{id}.txt
 *     step4_prompts/prompts_info.json
 *     step5_overview/overview_prompt.txt
 *     step5_overview/overview_info.json
 *     step5_overview/llm_response.json
 *     step6_report/report_info.json      (legacy)
 *     FinalOutput/overview_report.html
 *     FinalOutput/{id}_*.html
 *     FinalOutput/report_info.json
 */

export enum PipelineDirectory {
  Search = 'step1_search',
  Details = 'step2_details',
  Figures = 'step3_figures',
  Prompts = 'step4_prompts',
  Overview = 'step5_overview',
  LegacyReport = 'step6_report',
  FinalOutput = 'FinalOutput',
}

export const IMAGES_SUBDIRECTORY = 'images';

export const PROJECT_SUMMARY_FILE = 'project_summary.json';
export const DEFAULT_REPORT_PAGE = 'overview_report.html';
export const REPORT_INFO_FILE = 'report_info.json';
export const LLM_RESPONSE_FILE = 'llm_response.json';
export const OVERVIEW_PROMPT_FILE = 'overview_prompt.txt';

export const PROMPT_FILE_PREFIX = 'prompt_';
export const PROMPT_FILE_SUFFIX = '.txt';

/** Metadata files, one per pipeline step, read by the project aggregate. */
export const STEP_METADATA_FILES = {
  search: [PipelineDirectory.Search, 'search_results.json'],
  details: [PipelineDirectory.Details, 'papers_details.json'],
  figures: [PipelineDirectory.Figures, 'figures_info.json'],
  promptsInfo: [PipelineDirectory.Prompts, 'prompts_info.json'],
  overviewInfo: [PipelineDirectory.Overview, 'overview_info.json'],
} as const satisfies Record<string, readonly [PipelineDirectory, string]>;

export type StepMetadataKey = keyof typeof STEP_METADATA_FILES;

/** Entries whose presence marks a directory as a project. */
export const PROJECT_MARKERS: readonly string[] = [PROJECT_SUMMARY_FILE, PipelineDirectory.Search];
