import { presentError, DEFAULT_ERROR_PRESENTATION_RULES } from '../../src/domain/error-presentation';
import {
  artifactNotFoundError,
  artifactPendingError,
  createTypedError,
  internalError,
  projectNotFoundError,
  unsafePathError,
} from '../../src/domain/errors';

describe('presentError', () => {
  it('presents a pending report as information, not failure', () => {
    const presentation = presentError(artifactPendingError('2026-01-01_foo', 'overview_report.html'));

    expect(presentation.severity).toBe('info');
    expect(presentation.title).toBe('Report Not Generated Yet');
    expect(presentation.userMessage).toBe(
      'The report has not been generated yet. Run the report generation steps for this project, then reload.',
    );
    expect(presentation.retryable).toBe(true);
    expect(presentation.suggestedActions).toEqual([
      'Open the project page and start report generation',
      'Reload this page once generation has finished',
      'Generate the report for this project (pipeline steps 4-6)',
    ]);
    expect(presentation.errorCode).toBe('ARTIFACT.PENDING');
  });

  it('interpolates the file and project into missing-file messages', () => {
    const presentation = presentError(artifactNotFoundError('2026-01-01_foo', 'papers/1_x.html'));

    expect(presentation.title).toBe('File Not Found');
    expect(presentation.userMessage).toBe('The file "papers/1_x.html" does not exist in project "2026-01-01_foo".');
    expect(presentation.retryable).toBe(false);
  });

  it('keeps dollar signs in file names literal', () => {
    const presentation = presentError(artifactNotFoundError('p', "a$&b$'.html"));
    expect(presentation.userMessage).toBe('The file "a$&b$\'.html" does not exist in project "p".');
  });

  it('hides internal messages behind a generic one', () => {
    const presentation = presentError(internalError('EACCES: permission denied, open /srv/x'));
    expect(presentation.title).toBe('Server Error');
    expect(presentation.userMessage).toBe('Something went wrong while reading this artifact.');
    expect(presentation.technicalDetails).toBeUndefined();
  });

  it('matches validation errors by prefix', () => {
    const presentation = presentError(unsafePathError('filename', '../x', 'relative path segment'));
    expect(presentation.title).toBe('Invalid Request');
    expect(presentation.userMessage).toBe('Invalid file name: relative path segment');
  });

  it('includes technical details', () => {
    const presentation = presentError(projectNotFoundError('p'));
    expect(presentation.technicalDetails).toBe(
      ['Code: PROJECT.NOT_FOUND', 'Message: Project not found: p', 'Retryable: false', 'Details: {\n  "projectName": "p"\n}'].join(
        '\n',
      ),
    );
  });

  it('falls back for unknown codes', () => {
    const presentation = presentError(createTypedError({ code: 'OTHER.THING', message: 'odd' }));
    expect(presentation.title).toBe('Error');
    expect(presentation.userMessage).toBe('odd');
    expect(presentation.severity).toBe('error');
  });

  it('uses custom rules when given', () => {
    const presentation = presentError(internalError('boom'), [
      {
        codePrefix: 'SYSTEM',
        severity: 'warning',
        titleTemplate: 'Oops',
        messageTemplate: 'Failed: {message}',
        suggestedActions: [],
      },
    ]);
    expect(presentation.title).toBe('Oops');
    expect(presentation.userMessage).toBe('Failed: boom');
    expect(presentation.severity).toBe('warning');
  });

  it('orders specific artifact rules before broader ones', () => {
    const prefixes = DEFAULT_ERROR_PRESENTATION_RULES.map((r) => r.codePrefix);
    expect(prefixes.indexOf('ARTIFACT.PENDING')).toBeLessThan(prefixes.indexOf('SYSTEM'));
  });
});
