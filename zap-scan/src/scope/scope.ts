import type { EngineClient, RequestOptions } from '../engine/client.js';
import { ZAP_PATHS } from '../engine/types.js';
import type { FetchFn } from '../engine/types.js';
import { EngineProtocolError } from '../engine/errors.js';
import type { ScanTarget } from '../scanner/types.js';
import { logger } from '../utils/logger.js';

/** ZAP's error code for a context or regex that is already registered */
const ALREADY_EXISTS = 'already_exists';

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex that places the target and everything beneath it in scope
 */
export function scopeRegex(targetUrl: string): string {
  return `${escapeRegex(targetUrl)}.*`;
}

/**
 * Run a control action, treating "already exists" as success
 */
async function idempotent(action: () => Promise<unknown>): Promise<boolean> {
  try {
    await action();
    return true;
  } catch (error) {
    if (error instanceof EngineProtocolError && error.code === ALREADY_EXISTS) {
      return false;
    }
    throw error;
  }
}

/**
 * Register the target under the named context. Calling it again for the
 * same target leaves the engine unchanged.
 */
export async function setScope(
  client: EngineClient,
  targetUrl: string,
  contextName: string,
  options: RequestOptions = {}
): Promise<void> {
  const created = await idempotent(() =>
    client.request('GET', ZAP_PATHS.newContext, { contextName }, options)
  );
  if (created) {
    logger.debug(`Created context: ${contextName}`);
  }

  const regex = scopeRegex(targetUrl);
  const included = await idempotent(() =>
    client.request('GET', ZAP_PATHS.includeInContext, { contextName, regex }, options)
  );
  logger.debug(included ? `Included in scope: ${regex}` : `Scope already includes: ${regex}`);
}

export type AuthProbeResult = 'required' | 'not-required' | 'unknown';

export interface AuthProbeOptions {
  probePath: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

/**
 * Probe the target's health endpoint. 401 means authentication is required;
 * a network failure means we could not tell.
 */
export async function probeAuth(targetUrl: string, options: AuthProbeOptions): Promise<AuthProbeResult> {
  const fetchFn = options.fetchFn ?? fetch;
  const url = `${targetUrl.replace(/\/+$/, '')}${options.probePath}`;

  try {
    const response = await fetchFn(url, { signal: AbortSignal.timeout(options.timeoutMs) });
    return response.status === 401 ? 'required' : 'not-required';
  } catch (error) {
    logger.debug(`Auth probe failed: ${error instanceof Error ? error.message : String(error)}`);
    return 'unknown';
  }
}

/**
 * True only when the health probe answers 401. Undetermined outcomes are
 * treated as "no auth" and logged, so a flaky target skips auth setup.
 */
export async function detectAuthRequirement(targetUrl: string, options: AuthProbeOptions): Promise<boolean> {
  const result = await probeAuth(targetUrl, options);
  if (result === 'unknown') {
    logger.warn(`Could not reach ${targetUrl}${options.probePath}; assuming no authentication is required`);
  }
  return result === 'required';
}

/**
 * Extension point for installing authentication into the engine before scanning
 *
 * Form-based or token-based setups implement this and are passed to runScan;
 * the sequencer does not change.
 */
export interface AuthConfigurator {
  readonly name: string;
  configure(client: EngineClient, target: ScanTarget): Promise<void>;
}

/**
 * Baseline configurator: leaves the engine unauthenticated
 */
export class NoopAuthConfigurator implements AuthConfigurator {
  readonly name = 'none';

  async configure(_client: EngineClient, target: ScanTarget): Promise<void> {
    logger.warn(`${target.targetUrl} requires authentication but no auth configurator is installed; scanning unauthenticated`);
  }
}
