export const SEVERITIES = ['High', 'Medium', 'Low', 'Informational'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface Finding {
  readonly name: string;
  readonly description: string;
  readonly remediation: string;
  readonly url: string;
  readonly parameter: string;
  readonly evidence: string;
  readonly severity: Severity;
}

export interface Report {
  readonly scanDate: Date;
  readonly targetUrl: string;
  readonly severityCounts: Readonly<Record<Severity, number>>;
  readonly findingsBySeverity: Readonly<Record<Severity, readonly Finding[]>>;
  readonly total: number;
}

/**
 * Finding as written to the JSON artifact
 */
export interface ReportFinding {
  name: string;
  description: string;
  solution: string;
  url: string;
  param: string;
  evidence: string;
}

/**
 * On-disk report layout
 */
export interface ReportDocument {
  scan_date: string;
  target_url: string;
  summary: Record<Severity, number>;
  findings: Record<Severity, ReportFinding[]>;
  total_alerts: number;
}

export type ExportOutcome =
  | { ok: true; path: string }
  | { ok: false; error: Error };
