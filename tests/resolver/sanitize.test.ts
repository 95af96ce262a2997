import { validateProjectName, validateRelativePath } from '../../src/resolver/sanitize';

describe('validateProjectName', () => {
  test('accepts timestamped project names', () => {
    expect(validateProjectName('20260101_120000_lung_cancer')).toEqual({
      ok: true,
      value: '20260101_120000_lung_cancer',
    });
  });

  test('accepts non-ASCII slugs', () => {
    expect(validateProjectName('2026-01-01_肺癌免疫治疗').ok).toBe(true);
  });

  test('rejects over-long names', () => {
    const result = validateProjectName('x'.repeat(256));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Invalid project name: path segment too long');
    }
  });

  test('reports the field and value in the error details', () => {
    const result = validateProjectName('..');
    if (result.ok) throw new Error('expected rejection');
    expect(result.error.details).toEqual({ field: 'projectName', value: '..', reason: 'relative path segment' });
  });
});

describe('validateRelativePath', () => {
  test('splits nested paths into segments', () => {
    expect(validateRelativePath('papers/12345_detail.html')).toEqual({
      ok: true,
      value: ['papers', '12345_detail.html'],
    });
  });

  test('rejects a trailing slash', () => {
    const result = validateRelativePath('papers/');
    if (result.ok) throw new Error('expected rejection');
    expect(result.error.message).toBe('Invalid file name: empty path segment');
  });
});
