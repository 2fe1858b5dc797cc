/**
 * Custom error types for the application
 */
import type { AttemptRecord, FailureKind } from '../models/Classification';

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    // Only capture stack trace if Error.captureStackTrace is available (Node.js)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error related to configuration
 */
export class ConfigError extends AppError {
  public violations: string[];

  constructor(message: string, violations: string[] = []) {
    super(`Configuration Error: ${message}`);
    this.violations = violations;
  }
}

/**
 * Error related to API calls
 */
export class ApiError extends AppError {
  public service: string;
  public endpoint: string;

  constructor(message: string, service: string, endpoint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.service = service;
    this.endpoint = endpoint;
  }
}

/**
 * Terminal failure of one logical classification call, after retries
 */
export class RemoteClassificationError extends ApiError {
  public kind: FailureKind;
  public attempts: AttemptRecord[];

  constructor(kind: FailureKind, message: string, attempts: AttemptRecord[], options?: { cause?: unknown }) {
    super(message, 'remote-classifier', 'chat/completions', options);
    this.kind = kind;
    this.attempts = attempts;
  }
}

/**
 * Raised by the transport when the TCP connection is not established in time.
 * Travels as the `cause` of the transport library's own error.
 */
export class ConnectTimeoutError extends AppError {
  public readonly code = 'ECONNECT_TIMEOUT';
  public timeoutMs: number;
  public host: string;

  constructor(timeoutMs: number, host: string) {
    super(`connection to ${host} not established within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
    this.host = host;
  }
}

/**
 * The model replied, but its content is not usable JSON
 */
export class PayloadParseError extends AppError {
  public raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.raw = raw.slice(0, 300);
  }
}

/**
 * Resolves after the given number of milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
