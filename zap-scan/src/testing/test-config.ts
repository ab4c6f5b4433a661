import type { ScanConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

/**
 * Default configuration with millisecond poll intervals, for tests
 */
export function testConfig(resultsDir: string, overrides: Partial<ScanConfig> = {}): ScanConfig {
  return {
    ...DEFAULT_CONFIG,
    targetUrl: 'http://localhost:3000',
    controlApiBase: 'http://localhost:8080',
    readiness: { intervalMs: 1, timeoutMs: 50 },
    discovery: { ...DEFAULT_CONFIG.discovery, intervalMs: 1 },
    probing: { ...DEFAULT_CONFIG.probing, intervalMs: 1 },
    report: { ...DEFAULT_CONFIG.report, resultsDir },
    ...overrides,
  };
}
