/**
 * Configuration types for zap-scan
 */

export interface ScanConfig {
  /** Application under test */
  targetUrl: string;
  /** Base URL of the ZAP control API */
  controlApiBase: string;
  engine: EngineConfig;
  readiness: ReadinessConfig;
  discovery: DiscoveryConfig;
  probing: ProbingConfig;
  scope: ScopeConfig;
  auth: AuthProbeConfig;
  report: ReportConfig;
  debug: boolean;
}

export interface PollConfig {
  intervalMs: number;
  /** Omitted means wait until the engine reports completion */
  timeoutMs?: number;
}

/** Readiness always has a deadline: a daemon that never answers fails the run */
export interface ReadinessConfig {
  intervalMs: number;
  timeoutMs: number;
}

export interface EngineConfig {
  /** Executable that launches the ZAP daemon */
  command: string;
  port: number;
  /** Extra arguments appended after the daemon/port/api-key arguments */
  extraArgs: string[];
  /** How long to wait after SIGTERM before sending SIGKILL */
  stopGraceMs: number;
  /** Abort any single control-API call that takes longer than this */
  requestTimeoutMs: number;
}

export interface DiscoveryConfig extends PollConfig {
  maxChildren: number;
  recurse: boolean;
}

export interface ProbingConfig extends PollConfig {
  recurse: boolean;
  inScopeOnly: boolean;
}

export interface ScopeConfig {
  contextName: string;
}

export interface AuthProbeConfig {
  probePath: string;
  probeTimeoutMs: number;
}

export interface ReportConfig {
  resultsDir: string;
  jsonFileName: string;
  htmlFileName: string;
  alertPageSize: number;
}

/**
 * Shape accepted from JSON config files: every section optional and partial
 */
export interface ConfigFile {
  engine?: Partial<EngineConfig>;
  readiness?: Partial<ReadinessConfig>;
  discovery?: Partial<DiscoveryConfig>;
  probing?: Partial<ProbingConfig>;
  scope?: Partial<ScopeConfig>;
  auth?: Partial<AuthProbeConfig>;
  report?: Partial<ReportConfig>;
  debug?: boolean;
}

/**
 * Values taken from the command line; they override every config file
 */
export interface CliOverrides {
  targetUrl: string;
  controlApiBase?: string;
  configPath?: string;
  resultsDir?: string;
  port?: number;
  discoveryTimeoutMs?: number;
  probingTimeoutMs?: number;
  debug?: boolean;
}
