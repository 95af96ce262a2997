/**
 * Error presentation layer for surfacing errors to people reading reports.
 *
 * Maps TypedError codes to user-facing presentations with severity levels,
 * messages and suggested actions. A pending report is presented as
 * information rather than as a failure.
 */

import { TypedError } from './errors';

/** Severity levels for error presentation. */
export type ErrorSeverity = 'info' | 'warning' | 'error';

/** User-facing error presentation. */
export interface ErrorPresentation {
  /** Visual severity: info (blue), warning (amber), error (red). */
  severity: ErrorSeverity;
  /** Short, user-friendly error title. */
  title: string;
  /** User-facing explanation of what went wrong. */
  userMessage: string;
  /** Code, message and details, shown collapsed. */
  technicalDetails?: string;
  /** Whether reloading later may succeed. */
  retryable: boolean;
  /** Suggested user actions (e.g., "Generate the report first"). */
  suggestedActions: string[];
  /** Original TypedError code for programmatic handling. */
  errorCode: string;
}

/**
 * Rule for mapping a TypedError code pattern to a presentation.
 *
 * Code patterns support prefix matching: 'ARTIFACT' matches
 * 'ARTIFACT.PENDING' and 'ARTIFACT.NOT_FOUND'.
 */
export interface ErrorPresentationRule {
  codePrefix: string;
  severity: ErrorSeverity;
  /** Template for the user-facing title. */
  titleTemplate: string;
  /** Template for the user-facing message. May use {message}, {artifact}, {project}. */
  messageTemplate: string;
  /** If undefined, inherits from TypedError.retryable. */
  retryable?: boolean;
  /** Leave technical details out, e.g. where they carry server paths. */
  hideTechnicalDetails?: boolean;
  suggestedActions: string[];
}

/** Built-in error presentation rules, ordered from most specific to least. */
export const DEFAULT_ERROR_PRESENTATION_RULES: ErrorPresentationRule[] = [
  {
    codePrefix: 'ARTIFACT.PENDING',
    severity: 'info',
    titleTemplate: 'Report Not Generated Yet',
    messageTemplate: '{message}',
    suggestedActions: [
      'Open the project page and start report generation',
      'Reload this page once generation has finished',
    ],
  },
  {
    codePrefix: 'ARTIFACT.NOT_FOUND',
    severity: 'warning',
    titleTemplate: 'File Not Found',
    messageTemplate: 'The file "{artifact}" does not exist in project "{project}".',
    retryable: false,
    suggestedActions: [
      'Check the file name in the address',
      'Return to the main report and follow a link from there',
    ],
  },
  {
    codePrefix: 'PROJECT.NOT_FOUND',
    severity: 'warning',
    titleTemplate: 'Project Not Found',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Pick a project from the project list'],
  },
  {
    codePrefix: 'VALIDATION',
    severity: 'error',
    titleTemplate: 'Invalid Request',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Use a project name and file name without path separators or parent-directory segments'],
  },
  {
    codePrefix: 'SYSTEM',
    severity: 'error',
    titleTemplate: 'Server Error',
    messageTemplate: 'Something went wrong while reading this artifact.',
    retryable: false,
    hideTechnicalDetails: true,
    suggestedActions: ['Check the server log for the resolved path'],
  },
];

/**
 * Present a TypedError as a user-facing ErrorPresentation.
 *
 * Matches the error code against the rules (most-specific first),
 * interpolates template variables, and returns a renderable presentation.
 */
export function presentError(
  error: TypedError,
  rules: ErrorPresentationRule[] = DEFAULT_ERROR_PRESENTATION_RULES,
): ErrorPresentation {
  const rule = rules.find((r) => error.code.startsWith(r.codePrefix));

  if (rule) {
    return {
      severity: rule.severity,
      title: interpolate(rule.titleTemplate, error),
      userMessage: interpolate(rule.messageTemplate, error),
      technicalDetails: rule.hideTechnicalDetails ? undefined : formatTechnicalDetails(error),
      retryable: rule.retryable ?? error.retryable,
      suggestedActions: [
        ...rule.suggestedActions,
        ...error.suggestedFixes.map((f) => f.description ?? `Apply fix: ${f.type}`),
      ],
      errorCode: error.code,
    };
  }

  // Fallback for unmatched error codes
  return {
    severity: 'error',
    title: 'Error',
    userMessage: error.message,
    technicalDetails: formatTechnicalDetails(error),
    retryable: error.retryable,
    suggestedActions: error.suggestedFixes.map(
      (f) => f.description ?? `Apply fix: ${f.type}`,
    ),
    errorCode: error.code,
  };
}

function detailString(error: TypedError, key: string): string {
  const value = error.details?.[key];
  return typeof value === 'string' ? value : 'unknown';
}

function interpolate(template: string, error: TypedError): string {
  // Replacer functions keep `$` sequences in file names literal.
  return template
    .replace(/\{message\}/g, () => error.message)
    .replace(/\{artifact\}/g, () => detailString(error, 'artifact'))
    .replace(/\{project\}/g, () => detailString(error, 'projectName'));
}

/** Format technical details from a TypedError for expandable display. */
function formatTechnicalDetails(error: TypedError): string {
  const parts: string[] = [
    `Code: ${error.code}`,
    `Message: ${error.message}`,
    `Retryable: ${error.retryable}`,
  ];
  if (error.details) {
    parts.push(`Details: ${JSON.stringify(error.details, null, 2)}`);
  }
  if (error.suggestedFixes.length > 0) {
    parts.push(`Fixes: ${error.suggestedFixes.map((f) => f.type).join(', ')}`);
  }
  return parts.join('\n');
}
