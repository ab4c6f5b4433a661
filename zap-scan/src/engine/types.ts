/**
 * Types for the ZAP control API client
 */

export type HttpMethod = 'GET' | 'POST';

export type QueryParams = Record<string, string | number | boolean>;

/** Subset of the global fetch the client relies on; tests substitute their own */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/** Handle on a running engine process */
export interface EngineProcess {
  readonly pid: number | undefined;
  /** Terminate the process and wait for it to exit; safe to call more than once */
  stop(): Promise<void>;
}

export interface EngineLaunchOptions {
  command: string;
  extraArgs?: string[];
  stopGraceMs?: number;
}

/** Starts engine processes; the lifecycle manager depends on this rather than on spawn */
export interface EngineLauncher {
  start(port: number, options: EngineLaunchOptions): Promise<EngineProcess>;
}

/**
 * Control API paths used by the scan workflow
 */
export const ZAP_PATHS = {
  version: '/JSON/core/view/version/',
  newContext: '/JSON/context/action/newContext/',
  includeInContext: '/JSON/context/action/includeInContext/',
  spiderScan: '/JSON/spider/action/scan/',
  spiderStatus: '/JSON/spider/view/status/',
  activeScan: '/JSON/ascan/action/scan/',
  activeScanStatus: '/JSON/ascan/view/status/',
  alerts: '/JSON/core/view/alerts/',
  htmlReport: '/OTHER/core/other/htmlreport/',
} as const;
