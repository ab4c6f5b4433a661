import type { EngineClient } from '../engine/client.js';
import { readField, readPercent } from '../engine/client.js';
import { ZAP_PATHS } from '../engine/types.js';
import type { QueryParams } from '../engine/types.js';
import { ScanCancelledError, ScanSequenceError, ScanTimeoutError } from '../engine/errors.js';
import type { DiscoveryConfig, ProbingConfig } from '../config/types.js';
import type { ScanJob, ScanKind, ScanProgressCallback, ScanTarget } from './types.js';
import { pollUntil } from '../utils/poll.js';
import { logger } from '../utils/logger.js';

export interface SequencerOptions {
  discovery: DiscoveryConfig;
  probing: ProbingConfig;
  /** Context the spider is restricted to */
  contextName?: string;
  signal?: AbortSignal;
  onProgress?: ScanProgressCallback;
}

interface JobPaths {
  start: string;
  status: string;
}

const JOB_PATHS: Record<ScanKind, JobPaths> = {
  discovery: { start: ZAP_PATHS.spiderScan, status: ZAP_PATHS.spiderStatus },
  probing: { start: ZAP_PATHS.activeScan, status: ZAP_PATHS.activeScanStatus },
};

/**
 * Runs the spider, then the active scan, each to completion.
 *
 * Each job moves not-started -> running (on submission) -> complete (status 100).
 * Probing refuses to start until a discovery job has completed.
 */
export class ScanSequencer {
  private discoveryJob: ScanJob | null = null;

  constructor(
    private readonly client: EngineClient,
    private readonly target: ScanTarget,
    private readonly options: SequencerOptions
  ) {}

  get discoveryComplete(): boolean {
    return this.discoveryJob?.state === 'complete';
  }

  async runDiscovery(): Promise<ScanJob> {
    const { discovery, contextName } = this.options;
    const params: QueryParams = {
      url: this.target.targetUrl,
      maxChildren: discovery.maxChildren,
      recurse: discovery.recurse,
    };
    if (contextName) params.contextName = contextName;

    const job = await this.runJob('discovery', params, discovery.intervalMs, discovery.timeoutMs);
    this.discoveryJob = job;
    return job;
  }

  async runProbing(): Promise<ScanJob> {
    if (!this.discoveryComplete) {
      throw new ScanSequenceError('Active scan requested before discovery completed');
    }

    const { probing } = this.options;
    return this.runJob(
      'probing',
      {
        url: this.target.targetUrl,
        recurse: probing.recurse,
        inScopeOnly: probing.inScopeOnly,
      },
      probing.intervalMs,
      probing.timeoutMs
    );
  }

  private async runJob(
    kind: ScanKind,
    params: QueryParams,
    intervalMs: number,
    timeoutMs: number | undefined
  ): Promise<ScanJob> {
    const paths = JOB_PATHS[kind];
    const { signal, onProgress } = this.options;

    if (signal?.aborted) {
      throw new ScanCancelledError(kind);
    }

    let submitted: unknown;
    try {
      submitted = await this.client.request('GET', paths.start, params, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new ScanCancelledError(kind);
      }
      throw error;
    }
    const job: ScanJob = {
      id: readField(submitted, 'scan', paths.start),
      kind,
      status: 0,
      state: 'running',
    };
    logger.debug(`${kind} job ${job.id} submitted`);

    const outcome = await pollUntil(
      async (_attempt, attemptSignal) => {
        const body = await this.client.request('GET', paths.status, { scanId: job.id }, { signal: attemptSignal });
        job.status = readPercent(body, 'status', paths.status);

        if (kind === 'probing') {
          logger.info(`Active scan progress: ${job.status}%`);
        } else {
          logger.debug(`Spider progress: ${job.status}%`);
        }
        onProgress?.(job);

        return job.status >= 100 ? job.status : undefined;
      },
      { intervalMs, timeoutMs, signal }
    );

    switch (outcome.status) {
      case 'done':
        job.state = 'complete';
        return job;
      case 'timeout':
        throw new ScanTimeoutError(kind, timeoutMs ?? outcome.elapsedMs);
      case 'aborted':
        throw new ScanCancelledError(kind);
    }
  }
}
