import type { FetchFn, HttpMethod, QueryParams } from './types.js';
import { ZAP_PATHS } from './types.js';
import { EngineProtocolError, EngineRequestTimeoutError, EngineUnreachableError } from './errors.js';
import { combineSignals, pollUntil } from '../utils/poll.js';
import { logger } from '../utils/logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSearchParams(params: QueryParams): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  return search;
}

/**
 * Pull ZAP's `{ code, message }` error body apart, when the body has that shape
 */
function readEngineError(body: unknown): { code?: string; message?: string } {
  if (!isRecord(body)) return {};
  return {
    code: typeof body.code === 'string' ? body.code : undefined,
    message: typeof body.message === 'string' ? body.message : undefined,
  };
}

export interface EngineClientOptions {
  /** Abort any single control call that takes longer than this */
  requestTimeoutMs?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Thin client for the ZAP control API (JSON and OTHER endpoints)
 */
export class EngineClient {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs?: number;

  constructor(
    baseUrl: string,
    private readonly fetchFn: FetchFn = fetch,
    options: EngineClientOptions = {}
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs;
  }

  get controlApiBase(): string {
    return this.baseUrl;
  }

  /**
   * Issue one control call and return its parsed JSON body
   */
  async request(
    method: HttpMethod,
    path: string,
    params: QueryParams = {},
    options: RequestOptions = {}
  ): Promise<unknown> {
    const response = await this.send(method, path, params, options);
    const text = await response.text();

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new EngineProtocolError(
        `Non-JSON response from ${path} (HTTP ${response.status})`,
        path,
        response.status
      );
    }

    if (!response.ok) {
      const { code, message } = readEngineError(body);
      throw new EngineProtocolError(
        `Engine rejected ${path} (HTTP ${response.status})${message ? `: ${message}` : ''}`,
        path,
        response.status,
        code
      );
    }

    return body;
  }

  /**
   * Issue one GET against a non-JSON endpoint and return the raw body
   */
  async requestText(path: string, params: QueryParams = {}, options: RequestOptions = {}): Promise<string> {
    const response = await this.send('GET', path, params, options);
    const text = await response.text();
    if (!response.ok) {
      throw new EngineProtocolError(`Engine rejected ${path} (HTTP ${response.status})`, path, response.status);
    }
    return text;
  }

  private async send(
    method: HttpMethod,
    path: string,
    params: QueryParams,
    options: RequestOptions
  ): Promise<Response> {
    const search = toSearchParams(params);
    let url = `${this.baseUrl}${path}`;
    let init: RequestInit = { method };

    if (method === 'GET') {
      const query = search.toString();
      if (query) url += `?${query}`;
    } else {
      init = {
        method,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: search.toString(),
      };
    }

    logger.logCurl(method, url);

    const timeout = this.requestTimeoutMs === undefined ? undefined : AbortSignal.timeout(this.requestTimeoutMs);
    const signal = combineSignals(options.signal, timeout);

    try {
      return await this.fetchFn(url, signal ? { ...init, signal } : init);
    } catch (error) {
      if (this.requestTimeoutMs !== undefined && timeout?.aborted && !options.signal?.aborted) {
        throw new EngineRequestTimeoutError(url, this.requestTimeoutMs, { cause: error });
      }
      throw new EngineUnreachableError(url, { cause: error });
    }
  }
}

/**
 * Read a string field from a control-API response
 */
export function readField(body: unknown, key: string, path: string): string {
  if (isRecord(body)) {
    const value = body[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
  }
  throw new EngineProtocolError(`Response from ${path} is missing "${key}"`, path);
}

/**
 * Read a 0-100 progress percentage (ZAP reports it as a string)
 */
export function readPercent(body: unknown, key: string, path: string): number {
  const raw = readField(body, key, path);
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new EngineProtocolError(`Response from ${path} has invalid "${key}": ${raw}`, path);
  }
  return value;
}

/**
 * Read an array field from a control-API response
 */
export function readArray(body: unknown, key: string, path: string): unknown[] {
  if (isRecord(body)) {
    const value = body[key];
    if (Array.isArray(value)) return value;
  }
  throw new EngineProtocolError(`Response from ${path} is missing "${key}" list`, path);
}

export interface WaitReadyOptions {
  intervalMs?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Poll the version endpoint until the engine answers.
 * Returns false on timeout (or abort) instead of throwing.
 */
export async function waitReady(client: EngineClient, options: WaitReadyOptions = {}): Promise<boolean> {
  const outcome = await pollUntil(
    async (attempt, signal) => {
      try {
        const body = await client.request('GET', ZAP_PATHS.version, {}, { signal });
        return readField(body, 'version', ZAP_PATHS.version);
      } catch (error) {
        logger.debug(`Engine not ready (attempt ${attempt}): ${error instanceof Error ? error.message : String(error)}`);
        return undefined;
      }
    },
    {
      intervalMs: options.intervalMs ?? 2000,
      timeoutMs: options.timeoutMs ?? 60000,
      signal: options.signal,
    }
  );

  if (outcome.status === 'done') {
    logger.debug(`Engine ready (version ${outcome.value}) after ${outcome.attempts} attempt(s)`);
    return true;
  }
  return false;
}
