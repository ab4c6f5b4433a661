import { join } from 'path';
import type { ScanConfig } from './config/types.js';
import { EngineClient, waitReady } from './engine/client.js';
import { processLauncher } from './engine/process.js';
import type { EngineLauncher, EngineProcess, FetchFn } from './engine/types.js';
import { EngineReadyTimeoutError, ScanCancelledError, describeError } from './engine/errors.js';
import type { AuthConfigurator } from './scope/scope.js';
import { NoopAuthConfigurator, detectAuthRequirement, setScope } from './scope/scope.js';
import { ScanSequencer } from './scanner/sequencer.js';
import type { ScanProgressCallback, ScanTarget } from './scanner/types.js';
import { exportHtml, fetchFindings, persist, printSummary, summarize } from './report/report.js';
import type { ExportOutcome, Report } from './report/types.js';
import { logger } from './utils/logger.js';

export interface ScanDependencies {
  launcher?: EngineLauncher;
  /** Used for both the control API and the auth probe */
  fetchFn?: FetchFn;
  authConfigurator?: AuthConfigurator;
  signal?: AbortSignal;
  onProgress?: ScanProgressCallback;
  /** Clock for the report timestamp */
  now?: () => Date;
}

/**
 * Run one phase of control calls, reporting an abort as cancellation of that phase
 */
async function cancellable<T>(phase: string, signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
  if (signal?.aborted) {
    throw new ScanCancelledError(phase);
  }
  try {
    return await work();
  } catch (error) {
    if (signal?.aborted) {
      throw new ScanCancelledError(phase);
    }
    throw error;
  }
}

export interface ScanRunResult {
  exitCode: number;
  report?: Report;
  reportPath?: string;
  html?: ExportOutcome;
}

/**
 * Run the full scan workflow: start the engine, scope, spider, active scan,
 * report, and stop the engine.
 *
 * Engine start or readiness failure returns exit code 1 before any scan step.
 * Any later failure propagates to the caller, after the engine has been stopped.
 * The engine is stopped exactly once on every path where it was started.
 */
export async function runScan(config: ScanConfig, deps: ScanDependencies = {}): Promise<ScanRunResult> {
  const launcher = deps.launcher ?? processLauncher;
  const fetchFn = deps.fetchFn ?? fetch;
  const target: ScanTarget = {
    targetUrl: config.targetUrl,
    controlApiBase: config.controlApiBase,
  };

  logger.info(`Starting security scan for ${target.targetUrl}`);

  let engine: EngineProcess;
  try {
    engine = await launcher.start(config.engine.port, {
      command: config.engine.command,
      extraArgs: config.engine.extraArgs,
      stopGraceMs: config.engine.stopGraceMs,
    });
  } catch (error) {
    logger.error(`Failed to start ZAP daemon: ${describeError(error)}`);
    return { exitCode: 1 };
  }

  const client = new EngineClient(target.controlApiBase, fetchFn, {
    requestTimeoutMs: config.engine.requestTimeoutMs,
  });
  const { signal } = deps;

  try {
    const ready = await waitReady(client, {
      intervalMs: config.readiness.intervalMs,
      timeoutMs: config.readiness.timeoutMs,
      signal,
    });
    if (!ready) {
      if (signal?.aborted) {
        throw new ScanCancelledError('engine startup');
      }
      logger.error(new EngineReadyTimeoutError(target.controlApiBase, config.readiness.timeoutMs).message);
      return { exitCode: 1 };
    }

    logger.info('Configuring ZAP...');
    await cancellable('scope setup', signal, () =>
      setScope(client, target.targetUrl, config.scope.contextName, { signal })
    );

    const authRequired = await detectAuthRequirement(target.targetUrl, {
      probePath: config.auth.probePath,
      timeoutMs: config.auth.probeTimeoutMs,
      fetchFn,
    });
    if (authRequired) {
      const configurator = deps.authConfigurator ?? new NoopAuthConfigurator();
      logger.debug(`Configuring authentication (${configurator.name})`);
      await configurator.configure(client, target);
    }

    const sequencer = new ScanSequencer(client, target, {
      discovery: config.discovery,
      probing: config.probing,
      contextName: config.scope.contextName,
      signal,
      onProgress: deps.onProgress,
    });

    logger.info('Running spider scan...');
    await sequencer.runDiscovery();

    logger.info('Running active security scan...');
    await sequencer.runProbing();

    logger.info('Generating report...');
    const findings = await cancellable('report generation', signal, () =>
      fetchFindings(client, target.targetUrl, config.report.alertPageSize, { signal })
    );
    const report = summarize(findings, target.targetUrl, deps.now ? deps.now() : new Date());

    const reportPath = join(config.report.resultsDir, config.report.jsonFileName);
    await persist(report, reportPath);

    const html = await exportHtml(
      client,
      target.targetUrl,
      join(config.report.resultsDir, config.report.htmlFileName),
      { signal }
    );

    printSummary(report);
    logger.success(`Report saved to ${reportPath}`);

    return { exitCode: 0, report, reportPath, html };
  } finally {
    logger.info('Stopping ZAP...');
    await engine.stop();
  }
}

export { loadConfig, deriveControlApiBase } from './config/config.js';
export type { ScanConfig } from './config/types.js';
export type { AuthConfigurator } from './scope/scope.js';
export type { Finding, Report, Severity } from './report/types.js';
