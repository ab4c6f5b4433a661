import type { ScanKind } from '../scanner/types.js';

/**
 * Base class for every failure the scan run can raise
 */
export class ScanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The engine process could not be spawned or exited during startup */
export class EngineStartError extends ScanError {}

/** A control request never reached the engine */
export class EngineUnreachableError extends ScanError {
  constructor(
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Scan engine unreachable at ${url}`, options);
  }
}

/** A control request got no answer within the per-request timeout */
export class EngineRequestTimeoutError extends ScanError {
  constructor(
    readonly url: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Scan engine did not answer ${url} within ${timeoutMs}ms`, options);
  }
}

/** The engine did not answer its version endpoint within the readiness window */
export class EngineReadyTimeoutError extends ScanError {
  constructor(
    readonly controlApiBase: string,
    readonly timeoutMs: number
  ) {
    super(`Scan engine at ${controlApiBase} was not ready after ${timeoutMs}ms`);
  }
}

/**
 * The engine answered, but with an error status, a body that is not JSON,
 * or JSON missing an expected field. `code` carries ZAP's error code when present.
 */
export class EngineProtocolError extends ScanError {
  constructor(
    message: string,
    readonly path: string,
    readonly status?: number,
    readonly code?: string
  ) {
    super(message);
  }
}

export class ScanTimeoutError extends ScanError {
  constructor(
    readonly kind: ScanKind,
    readonly timeoutMs: number
  ) {
    super(`${kind} scan did not complete within ${timeoutMs}ms`);
  }
}

export class ScanCancelledError extends ScanError {
  constructor(readonly phase: string) {
    super(`Scan cancelled during ${phase}`);
  }
}

/** Probing was requested before discovery reached completion */
export class ScanSequenceError extends ScanError {}

export class ReportWriteError extends ScanError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to write report to ${path}`, options);
  }
}

/**
 * Render an unknown thrown value as a log line
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}
