import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import {
  exportHtml,
  fetchFindings,
  formatScanDate,
  formatSummary,
  normalizeSeverity,
  persist,
  summarize,
  toFinding,
  toReportDocument,
} from './report.js';
import type { Finding, Severity } from './types.js';
import { EngineClient } from '../engine/client.js';
import { ReportWriteError } from '../engine/errors.js';
import { FakeEngine } from '../testing/fake-engine.js';

const TARGET_URL = 'http://localhost:3000';

function finding(name: string, severity: Severity): Finding {
  return {
    name,
    description: `${name} description`,
    remediation: `${name} fix`,
    url: `${TARGET_URL}/${name}`,
    parameter: 'q',
    evidence: '<script>',
    severity,
  };
}

function alert(name: string, risk?: string): Record<string, string> {
  const base: Record<string, string> = {
    alert: name,
    desc: `${name} description`,
    solution: `${name} fix`,
    url: `${TARGET_URL}/${name}`,
    param: 'q',
    evidence: '<script>',
  };
  if (risk !== undefined) base.risk = risk;
  return base;
}

describe('normalizeSeverity', () => {
  it('should accept the four ZAP risk labels', () => {
    expect(normalizeSeverity('High')).toBe('High');
    expect(normalizeSeverity('Medium')).toBe('Medium');
    expect(normalizeSeverity('Low')).toBe('Low');
    expect(normalizeSeverity('Informational')).toBe('Informational');
  });

  it('should default missing or unknown severities to Informational', () => {
    expect(normalizeSeverity(undefined)).toBe('Informational');
    expect(normalizeSeverity('Critical')).toBe('Informational');
    expect(normalizeSeverity(3)).toBe('Informational');
  });
});

describe('toFinding', () => {
  it('should map ZAP alert fields', () => {
    expect(toFinding(alert('xss', 'High'))).toEqual(finding('xss', 'High'));
  });

  it('should fill defaults for a sparse alert', () => {
    expect(toFinding({})).toEqual({
      name: 'Unknown',
      description: '',
      remediation: '',
      url: '',
      parameter: '',
      evidence: '',
      severity: 'Informational',
    });
  });
});

describe('summarize', () => {
  it('should yield zero counts for no findings', () => {
    const report = summarize([], TARGET_URL);

    expect(report.severityCounts).toEqual({ High: 0, Medium: 0, Low: 0, Informational: 0 });
    expect(report.total).toBe(0);
    expect(toReportDocument(report).total_alerts).toBe(0);
  });

  it('should keep total equal to the sum of counts and the number of findings', () => {
    const findings = [
      finding('a', 'High'),
      finding('b', 'Low'),
      finding('c', 'High'),
      finding('d', 'Informational'),
      finding('e', 'Medium'),
    ];

    const report = summarize(findings, TARGET_URL);
    const sum = Object.values(report.severityCounts).reduce((acc, count) => acc + count, 0);

    expect(report.severityCounts).toEqual({ High: 2, Medium: 1, Low: 1, Informational: 1 });
    expect(sum).toBe(5);
    expect(report.total).toBe(5);
  });

  it('should keep retrieval order within a bucket', () => {
    const report = summarize([finding('z', 'Low'), finding('a', 'Low'), finding('m', 'Low')], TARGET_URL);

    expect(report.findingsBySeverity.Low.map(f => f.name)).toEqual(['z', 'a', 'm']);
  });

  it('should classify alerts without a recognised risk as Informational', () => {
    const report = summarize([toFinding(alert('no-risk')), toFinding(alert('odd', 'Severe'))], TARGET_URL);

    expect(report.severityCounts.Informational).toBe(2);
  });
});

describe('toReportDocument', () => {
  it('should produce the persisted report layout', () => {
    const scanDate = new Date(2024, 0, 5, 9, 3, 7);
    const report = summarize([finding('xss', 'High')], TARGET_URL, scanDate);

    expect(toReportDocument(report)).toEqual({
      scan_date: '2024-01-05 09:03:07',
      target_url: TARGET_URL,
      summary: { High: 1, Medium: 0, Low: 0, Informational: 0 },
      findings: {
        High: [
          {
            name: 'xss',
            description: 'xss description',
            solution: 'xss fix',
            url: `${TARGET_URL}/xss`,
            param: 'q',
            evidence: '<script>',
          },
        ],
        Medium: [],
        Low: [],
        Informational: [],
      },
      total_alerts: 1,
    });
  });
});

describe('formatScanDate', () => {
  it('should zero-pad every component', () => {
    expect(formatScanDate(new Date(2025, 10, 30, 23, 59, 1))).toBe('2025-11-30 23:59:01');
  });
});

describe('formatSummary', () => {
  it('should list only severities that have findings', () => {
    const report = summarize([finding('a', 'High'), finding('b', 'Low'), finding('c', 'Low')], TARGET_URL);

    expect(formatSummary(report)).toEqual([
      'Security scan completed. Found 3 total alerts:',
      '  High: 1',
      '  Low: 2',
    ]);
  });
});

describe('fetchFindings', () => {
  it('should page through all alerts in order', async () => {
    const alerts = [alert('a', 'High'), alert('b', 'Low'), alert('c', 'Medium'), alert('d', 'Low'), alert('e')];
    const engine = new FakeEngine({ alerts });
    const client = new EngineClient('http://localhost:8080', engine.fetch);

    const findings = await fetchFindings(client, TARGET_URL, 2);

    expect(findings.map(f => f.name)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(engine.calls.filter(call => call === '/JSON/core/view/alerts/')).toHaveLength(3);
  });

  it('should return an empty list when the engine has no alerts', async () => {
    const engine = new FakeEngine({ alerts: [] });
    const client = new EngineClient('http://localhost:8080', engine.fetch);

    await expect(fetchFindings(client, TARGET_URL)).resolves.toEqual([]);
  });
});

describe('report files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'zap-scan-report-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should persist JSON, creating parent directories', async () => {
    const reportPath = path.join(tempDir, 'security', 'results', 'zap-report.json');
    const report = summarize([finding('sqli', 'Medium')], TARGET_URL);

    await persist(report, reportPath);

    const written = JSON.parse(await fs.readFile(reportPath, 'utf-8'));
    expect(written).toEqual(toReportDocument(report));
  });

  it('should raise ReportWriteError when the path cannot be written', async () => {
    const blocker = path.join(tempDir, 'not-a-dir');
    await fs.writeFile(blocker, 'x');
    const reportPath = path.join(blocker, 'zap-report.json');

    const write = persist(summarize([], TARGET_URL), reportPath);

    await expect(write).rejects.toBeInstanceOf(ReportWriteError);
    await expect(write).rejects.toMatchObject({ path: reportPath });
  });

  it('should write the engine HTML report beside the JSON', async () => {
    const engine = new FakeEngine();
    const client = new EngineClient('http://localhost:8080', engine.fetch);
    const htmlPath = path.join(tempDir, 'zap-report.html');

    const outcome = await exportHtml(client, TARGET_URL, htmlPath);

    expect(outcome).toEqual({ ok: true, path: htmlPath });
    expect(await fs.readFile(htmlPath, 'utf-8')).toBe('<html><body>report</body></html>');
  });

  it('should return a failed outcome instead of throwing when export fails', async () => {
    const engine = new FakeEngine({ htmlStatus: 500 });
    const client = new EngineClient('http://localhost:8080', engine.fetch);

    const outcome = await exportHtml(client, TARGET_URL, path.join(tempDir, 'zap-report.html'));

    expect(outcome.ok).toBe(false);
  });
});
