import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import type { EngineLauncher, EngineLaunchOptions, EngineProcess } from './types.js';
import { EngineStartError } from './errors.js';
import { logger } from '../utils/logger.js';

const DEFAULT_STOP_GRACE_MS = 10000;

/**
 * Arguments that start ZAP headless on the given port with the API key
 * check disabled (the control API is only reachable locally)
 */
export function buildDaemonArgs(port: number, extraArgs: string[] = []): string[] {
  return ['-daemon', '-port', String(port), '-config', 'api.disablekey=true', ...extraArgs];
}

function waitForExit(child: ChildProcess): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve();
  }
  return new Promise(resolve => child.once('exit', () => resolve()));
}

class SpawnedEngine implements EngineProcess {
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly child: ChildProcess,
    private readonly stopGraceMs: number
  ) {}

  get pid(): number | undefined {
    return this.child.pid;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.terminate();
    }
    return this.stopping;
  }

  private async terminate(): Promise<void> {
    const exited = waitForExit(this.child);
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      return;
    }

    logger.debug(`Sending SIGTERM to engine (pid ${this.child.pid ?? 'unknown'})`);
    this.child.kill('SIGTERM');

    const timer = setTimeout(() => {
      logger.warn(`Engine did not exit within ${this.stopGraceMs}ms, sending SIGKILL`);
      this.child.kill('SIGKILL');
    }, this.stopGraceMs);

    try {
      await exited;
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Start the engine as a background process.
 * Resolves once the OS has spawned it; readiness is checked separately.
 */
export function startEngine(port: number, options: EngineLaunchOptions): Promise<EngineProcess> {
  const args = buildDaemonArgs(port, options.extraArgs);
  logger.debug(`Executing: ${options.command} ${args.join(' ')}`);

  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(options.command, args, { stdio: 'ignore' });
    } catch (error) {
      reject(new EngineStartError(`Failed to start ${options.command}`, { cause: error }));
      return;
    }

    const onError = (error: Error): void => {
      reject(new EngineStartError(`Failed to start ${options.command}`, { cause: error }));
    };

    child.once('error', onError);
    child.once('spawn', () => {
      child.off('error', onError);
      child.on('error', error => logger.warn(`Engine process error: ${error.message}`));
      resolve(new SpawnedEngine(child, options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS));
    });
  });
}

/**
 * Launcher backed by a real child process
 */
export const processLauncher: EngineLauncher = {
  start: startEngine,
};
