/**
 * Minimal HTML page for errors shown to people in a browser.
 */

import { ErrorPresentation } from '../domain/error-presentation';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderErrorPage(presentation: ErrorPresentation): string {
  const lines = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="utf-8">',
    `  <title>${escapeHtml(presentation.title)}</title>`,
    '</head>',
    `<body class="severity-${presentation.severity}">`,
    `  <h1>${escapeHtml(presentation.title)}</h1>`,
    `  <p class="message">${escapeHtml(presentation.userMessage)}</p>`,
  ];
  if (presentation.suggestedActions.length > 0) {
    lines.push('  <ul class="actions">');
    for (const action of presentation.suggestedActions) {
      lines.push(`    <li>${escapeHtml(action)}</li>`);
    }
    lines.push('  </ul>');
  }
  if (presentation.retryable) {
    lines.push('  <p class="retry">This may change shortly. Reload the page later.</p>');
  }
  if (presentation.technicalDetails) {
    lines.push(
      '  <details>',
      '    <summary>Technical details</summary>',
      `    <pre>${escapeHtml(presentation.technicalDetails)}</pre>`,
      '  </details>',
    );
  }
  lines.push(`  <p class="code">${escapeHtml(presentation.errorCode)}</p>`, '</body>', '</html>', '');
  return lines.join('\n');
}
