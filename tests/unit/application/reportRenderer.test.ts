import { escapeHtml, renderHtmlReport } from '@/application/services/reportRenderer';
import { BatchResult, ResultRecord } from '@/domain/types/types';
import { resultFor, SpecBuilder } from '../../helpers/spec-builders';

function batchOf(results: ResultRecord[]): BatchResult {
  return {
    startedAt: '2026-03-01T10:00:00.000Z',
    finishedAt: '2026-03-01T10:05:00.000Z',
    results,
  };
}

function unescapeHtml(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

function stripTags(value: string): string {
  return value.replace(/<[^>]*>/g, '');
}

// Visible cell text for each result row
function parseRows(html: string): string[][] {
  const rows = html.match(/<tr class="result-row[^"]*"[^>]*>.*?<\/tr>/g) ?? [];
  return rows.map(row =>
    Array.from(row.matchAll(/<td[^>]*>(.*?)<\/td>/g), match => unescapeHtml(stripTags(match[1])))
  );
}

describe('ReportRenderer', () => {
  describe('escapeHtml', () => {
    it('should escape markup characters', () => {
      expect(escapeHtml(`<script>alert("x" & 'y')</script>`)).toBe(
        '&lt;script&gt;alert(&quot;x&quot; &amp; &#39;y&#39;)&lt;/script&gt;'
      );
    });
  });

  describe('renderHtmlReport', () => {
    const injected = SpecBuilder.command('cmd /c echo <b>"pwned"</b> & whoami')
      .withDescription('Description with <img src=x onerror=alert(1)>')
      .withSeverity('Critical')
      .withMitreTag('T1059.003')
      .build();
    const plain = SpecBuilder.command('whoami').withSeverity('Low').withMitreTag('T1033').build();

    it('should render the summary for an empty batch', () => {
      const html = renderHtmlReport(batchOf([]));

      expect(html).toContain('<div class="total"><span class="value">0</span>Total</div>');
      expect(html).toContain('<div class="succeeded"><span class="value">0</span>Succeeded</div>');
      expect(html).toContain('<div class="failed"><span class="value">0</span>Failed</div>');
      expect(html).toContain('<div class="success-rate"><span class="value">0.00%</span>Success rate</div>');
      expect(parseRows(html)).toEqual([]);
    });

    it('should render the summary counts', () => {
      const html = renderHtmlReport(batchOf([resultFor(plain, true), resultFor(injected, false, 'boom')]));

      expect(html).toContain('<div class="total"><span class="value">2</span>Total</div>');
      expect(html).toContain('<div class="success-rate"><span class="value">50.00%</span>Success rate</div>');
    });

    it('should classify rows by status and severity', () => {
      const html = renderHtmlReport(batchOf([resultFor(plain, true), resultFor(injected, false, 'boom')]));

      expect(html).toContain(
        '<tr class="result-row status-success severity-low" data-status="success" data-severity="low">'
      );
      expect(html).toContain(
        '<tr class="result-row status-failed severity-critical" data-status="failed" data-severity="critical">'
      );
    });

    it('should escape every free-text field', () => {
      const html = renderHtmlReport(batchOf([resultFor(injected, false, '<error> & "details"')]));

      expect(html).toContain('<td class="command"><code>cmd /c echo &lt;b&gt;&quot;pwned&quot;&lt;/b&gt; &amp; whoami</code></td>');
      expect(html).toContain('<td class="description">Description with &lt;img src=x onerror=alert(1)&gt;</td>');
      expect(html).toContain('<td class="error"><pre>&lt;error&gt; &amp; &quot;details&quot;</pre></td>');
      expect(html).not.toContain('<img src=x');
    });

    it('should recover the original fields from the rendered rows', () => {
      const results = [resultFor(plain, true), resultFor(injected, false, 'ERROR MESSAGE: Blocked By EDR')];

      const rows = parseRows(renderHtmlReport(batchOf(results)));

      expect(rows).toEqual([
        ['whoami', 'Runs whoami', 'Low', 'T1033', 'Success', ''],
        [
          'cmd /c echo <b>"pwned"</b> & whoami',
          'Description with <img src=x onerror=alert(1)>',
          'Critical',
          'T1059.003',
          'Failed',
          'ERROR MESSAGE: Blocked By EDR',
        ],
      ]);
    });

    it('should escape the title', () => {
      const html = renderHtmlReport(batchOf([]), { title: 'Q1 <Red Team>' });
      expect(html).toContain('<title>Q1 &lt;Red Team&gt;</title>');
    });
  });
});
