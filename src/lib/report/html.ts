import { NONE } from '@/lib/report/tables';

import type { ReportTable } from '@/lib/report/tables';
import type { HostTopology } from '@/lib/topology/reconcile';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

const STYLE = `
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 2rem; color: #0f172a; }
    h1 { font-size: 1.5rem; margin-bottom: 0.25rem; }
    h2 { font-size: 1.1rem; margin-top: 2rem; }
    .meta { color: #64748b; margin: 0; }
    table { border-collapse: collapse; width: 100%; font-size: 0.875rem; }
    th, td { border: 1px solid #cbd5e1; padding: 0.35rem 0.6rem; text-align: left; vertical-align: top; }
    th { background: #f1f5f9; }
    td.empty { color: #64748b; font-style: italic; }`;

function renderTable(table: ReportTable): string {
  const head = table.columns.map((column) => `<th>${escapeHtml(column)}</th>`).join('');
  const body =
    table.rows.length === 0
      ? `      <tr><td class="empty" colspan="${table.columns.length}">${NONE}</td></tr>`
      : table.rows
          .map((row) => `      <tr>${row.map((cell) => `<td>${escapeHtml(cell)}</td>`).join('')}</tr>`)
          .join('\n');

  return `  <section id="${escapeHtml(table.id)}">
    <h2>${escapeHtml(table.title)}</h2>
    <table>
      <thead><tr>${head}</tr></thead>
      <tbody>
${body}
      </tbody>
    </table>
  </section>`;
}

/** One self-contained document; `generatedAt` is the only time-dependent content. */
export function renderHostReport(input: { topology: HostTopology; tables: ReportTable[]; generatedAt: string }): string {
  const title = `Host network report: ${input.topology.host.name}`;
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(title)}</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <h1>${escapeHtml(title)}</h1>
  <p class="meta">Generated ${escapeHtml(input.generatedAt)}</p>
${input.tables.map(renderTable).join('\n')}
</body>
</html>
`;
}

/** `esxi-01.lab.local` -> `esxi-01.lab.local.html`; anything outside `[A-Za-z0-9._-]` becomes `_`. */
export function reportFileName(hostName: string): string {
  const safe = hostName
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._]+/, '');
  return `${safe || 'host'}.html`;
}
