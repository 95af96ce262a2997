import { escapeHtml, renderErrorPage } from '../../src/api/error-page';
import { presentError } from '../../src/domain/error-presentation';
import { artifactNotFoundError, artifactPendingError } from '../../src/domain/errors';

describe('renderErrorPage', () => {
  test('escapes user-controlled text', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });

  test('renders title, message, actions and code', () => {
    const html = renderErrorPage(presentError(artifactNotFoundError('p', '<b>.html')));
    const lines = html.split('\n');

    expect(lines).toContain('  <title>File Not Found</title>');
    expect(lines).toContain('<body class="severity-warning">');
    expect(lines).toContain(
      '  <p class="message">The file &quot;&lt;b&gt;.html&quot; does not exist in project &quot;p&quot;.</p>',
    );
    expect(lines).toContain('    <li>Check the file name in the address</li>');
    expect(lines).toContain('  <p class="code">ARTIFACT.NOT_FOUND</p>');
  });

  test('collapses technical details under a details element', () => {
    const html = renderErrorPage(presentError(artifactNotFoundError('p', '<b>.html')));

    expect(html).toContain(
      '  <details>\n    <summary>Technical details</summary>\n' +
        '    <pre>Code: ARTIFACT.NOT_FOUND\nMessage: File not found: &lt;b&gt;.html\nRetryable: false\n',
    );
    expect(html).not.toContain('class="retry"');
  });

  test('adds a reload hint for retryable errors', () => {
    const lines = renderErrorPage(presentError(artifactPendingError('p', 'overview_report.html'))).split('\n');

    expect(lines).toContain('<body class="severity-info">');
    expect(lines).toContain('  <p class="retry">This may change shortly. Reload the page later.</p>');
  });
});
