import type { ScanConfig } from './types.js';

/**
 * Default configuration, minus the run-specific target fields
 */
export const DEFAULT_CONFIG: Omit<ScanConfig, 'targetUrl' | 'controlApiBase'> = {
  engine: {
    command: 'zap.sh',
    port: 8080,
    extraArgs: [],
    stopGraceMs: 10000,
    requestTimeoutMs: 30000,
  },
  readiness: {
    intervalMs: 2000,
    timeoutMs: 60000,
  },
  discovery: {
    maxChildren: 100,
    recurse: true,
    intervalMs: 2000,
  },
  probing: {
    recurse: true,
    inScopeOnly: false,
    intervalMs: 5000,
  },
  scope: {
    contextName: 'Default Context',
  },
  auth: {
    probePath: '/api/health',
    probeTimeoutMs: 5000,
  },
  report: {
    resultsDir: 'security/results',
    jsonFileName: 'zap-report.json',
    htmlFileName: 'zap-report.html',
    alertPageSize: 500,
  },
  debug: false,
};
