/**
 * Response timeout scaled to the number of paragraphs in a request
 */
import type { TimeoutSettings } from '../config';

/**
 * min(base + paragraphCount * perParagraph, max), in seconds.
 * Negative counts are treated as an empty request.
 */
export function computeDynamicTimeout(paragraphCount: number, timeouts: TimeoutSettings): number {
  const count = Math.max(0, paragraphCount);
  return Math.min(timeouts.baseTimeoutS + count * timeouts.perParagraphS, timeouts.maxTimeoutS);
}

export interface TransportTimeouts {
  connectTimeoutMs: number;
  responseTimeoutMs: number;
}

/**
 * Timeouts handed to the transport for one attempt. The connect timeout is
 * fixed; only the response timeout grows with the request size.
 */
export function timeoutsForRequest(paragraphCount: number, timeouts: TimeoutSettings): TransportTimeouts {
  return {
    connectTimeoutMs: Math.round(timeouts.connectTimeoutS * 1000),
    responseTimeoutMs: Math.round(computeDynamicTimeout(paragraphCount, timeouts) * 1000),
  };
}
