/**
 * Maps transport failures onto FailureKind.
 *
 * Decisions come from structured fields on the error and on every error in
 * its `cause` chain (HTTP status, `code`, `syscall`, error class), so they do
 * not depend on how a transport library words its messages.
 */
import { isAxiosError } from 'axios';
import type { FailureKind } from '../models/Classification';
import { ConnectTimeoutError } from '../utils/errors';

const MAX_CAUSE_DEPTH = 8;

const AUTH_STATUSES = new Set([401, 403]);

const CONNECT_TIMEOUT_CODES = new Set(['ECONNECT_TIMEOUT', 'UND_ERR_CONNECT_TIMEOUT']);

const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ERR_NETWORK',
  'UND_ERR_SOCKET',
]);

const READ_TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

export const FAILURE_LABELS: Record<FailureKind, string> = {
  auth_error: 'authentication failed',
  connect_timeout: 'connect timeout',
  read_timeout: 'read timeout',
  timeout: 'timeout',
  connect_error: 'connection error',
  other_error: 'remote call failed',
};

function codeOf(node: Error): string | undefined {
  return 'code' in node && typeof node.code === 'string' ? node.code : undefined;
}

function syscallOf(node: Error): string | undefined {
  return 'syscall' in node && typeof node.syscall === 'string' ? node.syscall : undefined;
}

function statusOf(node: Error): number | undefined {
  if (isAxiosError(node)) {
    return node.response?.status;
  }
  return 'status' in node && typeof node.status === 'number' ? node.status : undefined;
}

/**
 * The error followed by its nested causes, outermost first. The members of
 * an AggregateError (several addresses tried for one host) are included.
 */
export function causeChain(error: unknown): Error[] {
  const chain: Error[] = [];
  const pending: unknown[] = [error];

  while (pending.length > 0 && chain.length < MAX_CAUSE_DEPTH) {
    const current = pending.shift();
    if (!(current instanceof Error) || chain.includes(current)) {
      continue;
    }
    chain.push(current);
    if (current instanceof AggregateError) {
      pending.push(...current.errors);
    }
    pending.push(current.cause);
  }

  return chain;
}

/**
 * Human-readable description of the innermost cause
 */
export function describeCause(error: unknown): string {
  const chain = causeChain(error);
  if (chain.length === 0) {
    return String(error);
  }
  return chain[chain.length - 1].message;
}

function isConnectTimeout(node: Error): boolean {
  const code = codeOf(node);
  if (node instanceof ConnectTimeoutError || (code !== undefined && CONNECT_TIMEOUT_CODES.has(code))) {
    return true;
  }
  return code === 'ETIMEDOUT' && syscallOf(node) === 'connect';
}

function hasCode(node: Error, codes: ReadonlySet<string>): boolean {
  const code = codeOf(node);
  return code !== undefined && codes.has(code);
}

export function classifyTransportFailure(error: unknown): FailureKind {
  const chain = causeChain(error);

  if (chain.some(node => {
    const status = statusOf(node);
    return status !== undefined && AUTH_STATUSES.has(status);
  })) {
    return 'auth_error';
  }
  if (chain.some(isConnectTimeout)) {
    return 'connect_timeout';
  }
  if (chain.some(node => hasCode(node, CONNECT_ERROR_CODES))) {
    return 'connect_error';
  }
  if (chain.some(node => hasCode(node, READ_TIMEOUT_CODES))) {
    return 'read_timeout';
  }
  if (chain.some(node => codeOf(node) === 'ECONNABORTED' || node.name === 'TimeoutError')) {
    return 'timeout';
  }
  return 'other_error';
}
