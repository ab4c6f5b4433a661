/**
 * The application under test and the engine that scans it
 */
export interface ScanTarget {
  readonly targetUrl: string;
  readonly controlApiBase: string;
}

export type ScanKind = 'discovery' | 'probing';

export type ScanState = 'not-started' | 'running' | 'complete';

/**
 * One spider or active-scan job on the engine
 */
export interface ScanJob {
  id: string;
  kind: ScanKind;
  /** Completion percentage, 0-100 */
  status: number;
  state: ScanState;
}

/**
 * Progress callback invoked after each status poll
 */
export type ScanProgressCallback = (job: Readonly<ScanJob>) => void;
