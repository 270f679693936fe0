// HTML Report Renderer
// Summary header, severity/status filters and one row per result

import { BatchResult, ResultRecord, SEVERITIES } from '../../domain/types/types';
import { summarizeResults } from './summary';

export interface ReportOptions {
  title?: string;
  generatedAt?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

export function statusLabel(record: ResultRecord): 'Success' | 'Failed' {
  return record.succeeded ? 'Success' : 'Failed';
}

export function cssToken(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'unknown';
}

function renderRow(record: ResultRecord): string {
  const status = statusLabel(record);
  const classes = `result-row status-${cssToken(status)} severity-${cssToken(record.severity)}`;
  return [
    `<tr class="${classes}" data-status="${cssToken(status)}" data-severity="${cssToken(record.severity)}">`,
    `<td class="command"><code>${escapeHtml(record.command)}</code></td>`,
    `<td class="description">${escapeHtml(record.description)}</td>`,
    `<td class="severity">${escapeHtml(record.severity)}</td>`,
    `<td class="mitre">${escapeHtml(record.mitreTag)}</td>`,
    `<td class="status">${status}</td>`,
    `<td class="error"><pre>${escapeHtml(record.errorMessage)}</pre></td>`,
    `</tr>`,
  ].join('');
}

const STYLES = `
body { font-family: Segoe UI, Helvetica, Arial, sans-serif; margin: 2em; color: #222; }
h1 { margin-bottom: 0.2em; }
.meta { color: #666; margin-bottom: 1.5em; }
.summary { display: flex; gap: 1em; margin-bottom: 1.5em; }
.summary div { padding: 0.8em 1.2em; border-radius: 6px; background: #f2f2f2; }
.summary .value { font-size: 1.6em; font-weight: bold; display: block; }
.filters { margin-bottom: 1em; }
table { border-collapse: collapse; width: 100%; }
th, td { border: 1px solid #ddd; padding: 6px 8px; text-align: left; vertical-align: top; }
th { background: #333; color: #fff; }
pre { white-space: pre-wrap; margin: 0; }
tr.status-success td.status { color: #2e7d32; font-weight: bold; }
tr.status-failed td.status { color: #c62828; font-weight: bold; }
tr.severity-critical td.severity { background: #b71c1c; color: #fff; }
tr.severity-high td.severity { background: #ef6c00; color: #fff; }
tr.severity-medium td.severity { background: #f9a825; }
tr.severity-low td.severity { background: #9ccc65; }
tr.severity-informational td.severity { background: #90caf9; }
`;

const FILTER_SCRIPT = `
(function () {
  var severity = document.getElementById('severity-filter');
  var status = document.getElementById('status-filter');
  function apply() {
    var rows = document.querySelectorAll('tr.result-row');
    for (var i = 0; i < rows.length; i++) {
      var row = rows[i];
      var okSeverity = !severity.value || row.getAttribute('data-severity') === severity.value;
      var okStatus = !status.value || row.getAttribute('data-status') === status.value;
      row.style.display = okSeverity && okStatus ? '' : 'none';
    }
  }
  severity.addEventListener('change', apply);
  status.addEventListener('change', apply);
})();
`;

export function renderHtmlReport(batch: BatchResult, options: ReportOptions = {}): string {
  const title = options.title ?? 'Attack Simulation Report';
  const generatedAt = options.generatedAt ?? batch.finishedAt;
  const summary = summarizeResults(batch.results);

  const severityOptions = SEVERITIES.map(
    severity => `<option value="${cssToken(severity)}">${severity}</option>`
  ).join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>${STYLES}</style>
</head>
<body>
<h1>${escapeHtml(title)}</h1>
<p class="meta">Started ${escapeHtml(batch.startedAt)} &middot; Generated ${escapeHtml(generatedAt)}</p>
<section class="summary">
<div class="total"><span class="value">${summary.total}</span>Total</div>
<div class="succeeded"><span class="value">${summary.succeeded}</span>Succeeded</div>
<div class="failed"><span class="value">${summary.failed}</span>Failed</div>
<div class="success-rate"><span class="value">${summary.successRate.toFixed(2)}%</span>Success rate</div>
</section>
<section class="filters">
<label>Severity <select id="severity-filter"><option value="">All</option>${severityOptions}</select></label>
<label>Status <select id="status-filter"><option value="">All</option><option value="success">Success</option><option value="failed">Failed</option></select></label>
</section>
<table>
<thead><tr><th>Command</th><th>Description</th><th>Severity</th><th>MITRE ATT&amp;CK</th><th>Status</th><th>Error Message</th></tr></thead>
<tbody>
${batch.results.map(renderRow).join('\n')}
</tbody>
</table>
<script>${FILTER_SCRIPT}</script>
</body>
</html>
`;
}
