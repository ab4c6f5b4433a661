import { readFile } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import type { CliOverrides, ConfigFile, ScanConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { logger } from '../utils/logger.js';
import { isAccessible } from '../utils/fs-utils.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumber(source: JsonObject, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function pickBoolean(source: JsonObject, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

function pickString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

function pickStringArray(source: JsonObject, key: string): string[] | undefined {
  const value = source[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Copy base, then apply every defined value from patch
 */
function overlay<T extends object>(base: T, patch: Partial<T> | undefined): T {
  const result = { ...base };
  if (!patch) return result;
  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function sectionOf(source: JsonObject, key: string): JsonObject {
  const value = source[key];
  return isObject(value) ? value : {};
}

/**
 * Read the known fields out of a parsed config file, ignoring anything else
 */
export function parseConfigFile(raw: unknown): ConfigFile {
  if (!isObject(raw)) {
    throw new Error('Configuration root must be a JSON object');
  }

  const engine = sectionOf(raw, 'engine');
  const readiness = sectionOf(raw, 'readiness');
  const discovery = sectionOf(raw, 'discovery');
  const probing = sectionOf(raw, 'probing');
  const scope = sectionOf(raw, 'scope');
  const auth = sectionOf(raw, 'auth');
  const report = sectionOf(raw, 'report');

  return {
    engine: {
      command: pickString(engine, 'command'),
      port: pickNumber(engine, 'port'),
      extraArgs: pickStringArray(engine, 'extraArgs'),
      stopGraceMs: pickNumber(engine, 'stopGraceMs'),
      requestTimeoutMs: pickNumber(engine, 'requestTimeoutMs'),
    },
    readiness: {
      intervalMs: pickNumber(readiness, 'intervalMs'),
      timeoutMs: pickNumber(readiness, 'timeoutMs'),
    },
    discovery: {
      intervalMs: pickNumber(discovery, 'intervalMs'),
      timeoutMs: pickNumber(discovery, 'timeoutMs'),
      maxChildren: pickNumber(discovery, 'maxChildren'),
      recurse: pickBoolean(discovery, 'recurse'),
    },
    probing: {
      intervalMs: pickNumber(probing, 'intervalMs'),
      timeoutMs: pickNumber(probing, 'timeoutMs'),
      recurse: pickBoolean(probing, 'recurse'),
      inScopeOnly: pickBoolean(probing, 'inScopeOnly'),
    },
    scope: {
      contextName: pickString(scope, 'contextName'),
    },
    auth: {
      probePath: pickString(auth, 'probePath'),
      probeTimeoutMs: pickNumber(auth, 'probeTimeoutMs'),
    },
    report: {
      resultsDir: pickString(report, 'resultsDir'),
      jsonFileName: pickString(report, 'jsonFileName'),
      htmlFileName: pickString(report, 'htmlFileName'),
      alertPageSize: pickNumber(report, 'alertPageSize'),
    },
    debug: pickBoolean(raw, 'debug'),
  };
}

/**
 * Load configuration from file
 */
async function loadConfigFile(path: string): Promise<ConfigFile | null> {
  if (!(await isAccessible(path))) {
    return null;
  }

  try {
    const content = await readFile(path, 'utf-8');
    const config = parseConfigFile(JSON.parse(content));
    logger.debug(`Loaded config from: ${path}`);
    return config;
  } catch (error) {
    logger.warn(`Failed to parse config file: ${path}`);
    logger.debug(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

type BaseConfig = Omit<ScanConfig, 'targetUrl' | 'controlApiBase'>;

/**
 * Merge configurations with precedence (later wins)
 */
function mergeConfigs(...configs: Array<ConfigFile | null>): BaseConfig {
  const merged: BaseConfig = {
    engine: { ...DEFAULT_CONFIG.engine },
    readiness: { ...DEFAULT_CONFIG.readiness },
    discovery: { ...DEFAULT_CONFIG.discovery },
    probing: { ...DEFAULT_CONFIG.probing },
    scope: { ...DEFAULT_CONFIG.scope },
    auth: { ...DEFAULT_CONFIG.auth },
    report: { ...DEFAULT_CONFIG.report },
    debug: DEFAULT_CONFIG.debug,
  };

  for (const config of configs) {
    if (!config) continue;

    merged.engine = overlay(merged.engine, config.engine);
    merged.readiness = overlay(merged.readiness, config.readiness);
    merged.discovery = overlay(merged.discovery, config.discovery);
    merged.probing = overlay(merged.probing, config.probing);
    merged.scope = overlay(merged.scope, config.scope);
    merged.auth = overlay(merged.auth, config.auth);
    merged.report = overlay(merged.report, config.report);
    if (config.debug !== undefined) merged.debug = config.debug;
  }

  return merged;
}

/**
 * Control API base used when none is given: the target's scheme and host
 * with the engine port, e.g. http://localhost:3000/app -> http://localhost:8080
 */
export function deriveControlApiBase(targetUrl: string, enginePort: number): string {
  const url = new URL(targetUrl);
  url.port = String(enginePort);
  return url.origin;
}

function assertHttpUrl(value: string, label: string): void {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Configuration error: ${label} is not a valid URL: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Configuration error: ${label} must use http or https: ${value}`);
  }
}

function assertPositive(value: number | undefined, label: string): void {
  if (value !== undefined && !(value > 0)) {
    throw new Error(`Configuration error: ${label} must be greater than 0`);
  }
}

/**
 * Validates the configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: ScanConfig): void {
  assertHttpUrl(config.targetUrl, 'target URL');
  assertHttpUrl(config.controlApiBase, 'control API URL');

  if (!Number.isInteger(config.engine.port) || config.engine.port < 1 || config.engine.port > 65535) {
    throw new Error('Configuration error: engine port must be an integer between 1 and 65535');
  }

  assertPositive(config.engine.requestTimeoutMs, 'engine request timeout');
  assertPositive(config.readiness.intervalMs, 'readiness interval');
  assertPositive(config.readiness.timeoutMs, 'readiness timeout');
  assertPositive(config.discovery.intervalMs, 'discovery interval');
  assertPositive(config.discovery.timeoutMs, 'discovery timeout');
  assertPositive(config.probing.intervalMs, 'probing interval');
  assertPositive(config.probing.timeoutMs, 'probing timeout');
  assertPositive(config.discovery.maxChildren, 'discovery maxChildren');

  if (!Number.isInteger(config.report.alertPageSize) || config.report.alertPageSize < 1) {
    throw new Error('Configuration error: alertPageSize must be at least 1');
  }
}

/**
 * Default config file locations, lowest priority first
 */
export function defaultSearchPaths(): string[] {
  return ['./zap-scan.json', join(homedir(), '.config', 'zap-scan', 'config.json')];
}

/**
 * Load configuration with hierarchy:
 * 1. Command-line values (highest priority)
 * 2. Explicit config file path
 * 3. ~/.config/zap-scan/config.json
 * 4. ./zap-scan.json
 * 5. Default config (lowest priority)
 */
export async function loadConfig(
  overrides: CliOverrides,
  searchPaths: string[] = defaultSearchPaths()
): Promise<ScanConfig> {
  const configs: Array<ConfigFile | null> = [];

  for (const path of searchPaths) {
    configs.push(await loadConfigFile(path));
  }

  if (overrides.configPath) {
    const explicitConfig = await loadConfigFile(overrides.configPath);
    if (!explicitConfig) {
      throw new Error(`Config file not found or invalid: ${overrides.configPath}`);
    }
    configs.push(explicitConfig);
  }

  const base = mergeConfigs(...configs);

  if (overrides.port !== undefined) base.engine.port = overrides.port;
  if (overrides.resultsDir) base.report.resultsDir = overrides.resultsDir;
  if (overrides.discoveryTimeoutMs !== undefined) base.discovery.timeoutMs = overrides.discoveryTimeoutMs;
  if (overrides.probingTimeoutMs !== undefined) base.probing.timeoutMs = overrides.probingTimeoutMs;
  if (overrides.debug) base.debug = true;

  assertHttpUrl(overrides.targetUrl, 'target URL');

  const config: ScanConfig = {
    ...base,
    targetUrl: overrides.targetUrl,
    controlApiBase: overrides.controlApiBase ?? deriveControlApiBase(overrides.targetUrl, base.engine.port),
  };

  validateConfig(config);
  return config;
}
