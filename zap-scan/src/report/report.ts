import type { EngineClient, RequestOptions } from '../engine/client.js';
import { readArray } from '../engine/client.js';
import { ZAP_PATHS } from '../engine/types.js';
import { ReportWriteError } from '../engine/errors.js';
import type { ExportOutcome, Finding, Report, ReportDocument, ReportFinding, Severity } from './types.js';
import { SEVERITIES } from './types.js';
import { writeFileWithParents } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textField(source: Record<string, unknown>, key: string, fallback = ''): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Map a ZAP risk label onto one of the four buckets; anything else is Informational
 */
export function normalizeSeverity(risk: unknown): Severity {
  if (typeof risk !== 'string') return 'Informational';
  const wanted = risk.trim().toLowerCase();
  return SEVERITIES.find(severity => severity.toLowerCase() === wanted) ?? 'Informational';
}

/**
 * Convert one alert from the alerts endpoint into a Finding
 */
export function toFinding(alert: unknown): Finding {
  const source: Record<string, unknown> = isRecord(alert) ? alert : {};
  return {
    name: textField(source, 'alert', 'Unknown'),
    description: textField(source, 'desc'),
    remediation: textField(source, 'solution'),
    url: textField(source, 'url'),
    parameter: textField(source, 'param'),
    evidence: textField(source, 'evidence'),
    severity: normalizeSeverity(source.risk),
  };
}

/**
 * Retrieve every alert the engine holds for the target, a page at a time
 */
export async function fetchFindings(
  client: EngineClient,
  targetUrl: string,
  pageSize = 500,
  options: RequestOptions = {}
): Promise<Finding[]> {
  const findings: Finding[] = [];
  let start = 0;

  while (true) {
    const body = await client.request('GET', ZAP_PATHS.alerts, {
      baseurl: targetUrl,
      start,
      count: pageSize,
    }, options);
    const page = readArray(body, 'alerts', ZAP_PATHS.alerts);
    findings.push(...page.map(toFinding));
    logger.debug(`Fetched ${page.length} alerts (offset ${start})`);

    if (page.length < pageSize) break;
    start += page.length;
  }

  return findings;
}

/**
 * Group findings into the four severity buckets, keeping retrieval order
 */
export function summarize(findings: readonly Finding[], targetUrl: string, scanDate: Date = new Date()): Report {
  const findingsBySeverity: Record<Severity, Finding[]> = {
    High: [],
    Medium: [],
    Low: [],
    Informational: [],
  };

  for (const finding of findings) {
    findingsBySeverity[finding.severity].push(finding);
  }

  const severityCounts: Record<Severity, number> = {
    High: findingsBySeverity.High.length,
    Medium: findingsBySeverity.Medium.length,
    Low: findingsBySeverity.Low.length,
    Informational: findingsBySeverity.Informational.length,
  };

  return {
    scanDate,
    targetUrl,
    severityCounts,
    findingsBySeverity,
    total: findings.length,
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYY-MM-DD HH:MM:SS
 */
export function formatScanDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function toReportFinding(finding: Finding): ReportFinding {
  return {
    name: finding.name,
    description: finding.description,
    solution: finding.remediation,
    url: finding.url,
    param: finding.parameter,
    evidence: finding.evidence,
  };
}

export function toReportDocument(report: Report): ReportDocument {
  const groups = report.findingsBySeverity;
  return {
    scan_date: formatScanDate(report.scanDate),
    target_url: report.targetUrl,
    summary: { ...report.severityCounts },
    findings: {
      High: groups.High.map(toReportFinding),
      Medium: groups.Medium.map(toReportFinding),
      Low: groups.Low.map(toReportFinding),
      Informational: groups.Informational.map(toReportFinding),
    },
    total_alerts: report.total,
  };
}

/**
 * Write the report as pretty-printed JSON
 * @throws ReportWriteError when the file cannot be written
 */
export async function persist(report: Report, path: string): Promise<void> {
  try {
    await writeFileWithParents(path, `${JSON.stringify(toReportDocument(report), null, 2)}\n`);
  } catch (error) {
    throw new ReportWriteError(path, { cause: error });
  }
  logger.debug(`Report written: ${path}`);
}

/**
 * Save the engine's own HTML report. Best effort: failures are logged and
 * returned, never thrown.
 */
export async function exportHtml(
  client: EngineClient,
  targetUrl: string,
  path: string,
  options: RequestOptions = {}
): Promise<ExportOutcome> {
  try {
    const html = await client.requestText(ZAP_PATHS.htmlReport, { baseurl: targetUrl }, options);
    await writeFileWithParents(path, html);
    logger.debug(`HTML report written: ${path}`);
    return { ok: true, path };
  } catch (error) {
    const reason = error instanceof Error ? error : new Error(String(error));
    logger.warn(`HTML report export failed: ${reason.message}`);
    return { ok: false, error: reason };
  }
}

/**
 * Summary lines shown at the end of a run
 */
export function formatSummary(report: Report): string[] {
  const lines = [`Security scan completed. Found ${report.total} total alerts:`];
  for (const severity of SEVERITIES) {
    const count = report.severityCounts[severity];
    if (count > 0) {
      lines.push(`  ${severity}: ${count}`);
    }
  }
  return lines;
}

export function printSummary(report: Report): void {
  for (const line of formatSummary(report)) {
    logger.info(line);
  }
}
