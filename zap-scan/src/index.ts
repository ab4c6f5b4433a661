#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { loadConfig } from './config/config.js';
import { runScan } from './zap-scan.js';
import { describeError } from './engine/errors.js';
import { logger } from './utils/logger.js';

interface ScanFlags {
  config?: string;
  'results-dir'?: string;
  port?: number;
  'discovery-timeout'?: number;
  'probing-timeout'?: number;
  debug: boolean;
}

function parsePositiveInt(input: string): number {
  const value = Number.parseInt(input, 10);
  if (!Number.isInteger(value) || value <= 0 || String(value) !== input.trim()) {
    throw new SyntaxError(`Expected a positive integer, got "${input}"`);
  }
  return value;
}

/**
 * Format duration in human-readable format
 */
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(2)}m`;
}

const scanCommand = buildCommand({
  docs: {
    brief: 'Spider and actively scan a web application with OWASP ZAP, then write a findings report',
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'URL of the application to scan (e.g., http://localhost:3000)',
          parse: String,
          placeholder: 'target-url',
        },
        {
          brief: 'ZAP control API base URL (default: target URL with the engine port)',
          parse: String,
          placeholder: 'api-url',
          optional: true,
        },
      ],
    },
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true,
      },
      'results-dir': {
        kind: 'parsed',
        brief: 'Directory for the JSON and HTML reports',
        parse: String,
        optional: true,
      },
      port: {
        kind: 'parsed',
        brief: 'Port the ZAP daemon listens on',
        parse: parsePositiveInt,
        optional: true,
      },
      'discovery-timeout': {
        kind: 'parsed',
        brief: 'Abort the spider after this many seconds',
        parse: parsePositiveInt,
        optional: true,
      },
      'probing-timeout': {
        kind: 'parsed',
        brief: 'Abort the active scan after this many seconds',
        parse: parsePositiveInt,
        optional: true,
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false,
      },
    },
    aliases: {
      c: 'config',
      o: 'results-dir',
      d: 'debug',
    },
  },
  async func(this: CommandContext, flags: ScanFlags, targetUrl: string, apiUrl?: string): Promise<void> {
    if (flags.debug) {
      logger.setDebug(true);
    }

    let config;
    try {
      config = await loadConfig({
        targetUrl,
        controlApiBase: apiUrl,
        configPath: flags.config,
        resultsDir: flags['results-dir'],
        port: flags.port,
        discoveryTimeoutMs: flags['discovery-timeout'] !== undefined ? flags['discovery-timeout'] * 1000 : undefined,
        probingTimeoutMs: flags['probing-timeout'] !== undefined ? flags['probing-timeout'] * 1000 : undefined,
        debug: flags.debug,
      });
    } catch (error) {
      logger.error(`Failed to load configuration: ${describeError(error)}`);
      process.exitCode = 1;
      return;
    }

    logger.setDebug(config.debug);
    logger.debug(`Config: ${JSON.stringify(config, null, 2)}`);

    const controller = new AbortController();
    const cancel = (signal: NodeJS.Signals): void => {
      logger.warn(`Received ${signal}, cancelling scan...`);
      controller.abort();
    };
    process.once('SIGINT', cancel);
    process.once('SIGTERM', cancel);

    const startedAt = Date.now();
    try {
      const result = await runScan(config, { signal: controller.signal });
      process.exitCode = result.exitCode;
    } catch (error) {
      logger.error(describeError(error));
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', cancel);
      process.off('SIGTERM', cancel);
      logger.debug(`Duration: ${formatDuration(Date.now() - startedAt)}`);
    }
  },
});

const app = buildApplication(scanCommand, {
  name: 'zap-scan',
  versionInfo: {
    currentVersion: '0.1.0',
  },
});

run(app, process.argv.slice(2), { process });
