/**
 * Remote classification with dynamic timeouts and bounded retries.
 *
 * One logical call becomes up to `retry.maxAttempts` transport attempts.
 * Timeouts and connection failures are retried with exponential backoff;
 * authentication failures and unclassified errors end the call at once.
 * The only error `execute` rejects with is RemoteClassificationError.
 */
import type { LabelingConfig } from '../config';
import {
  AttemptRecord,
  ClassificationRequest,
  ClassificationResponse,
  FailureKind,
} from '../models/Classification';
import { buildReviewUserPrompt, reviewSystemPrompt } from '../prompts/reviewPrompt';
import { buildStructureUserPrompt, structureSystemPrompt } from '../prompts/structurePrompt';
import emojiLogger from '../utils/emojiLogger';
import { delay, RemoteClassificationError } from '../utils/errors';
import { AxiosTransport } from './AxiosTransport';
import type { ChatCompletionPayload, ChatCompletionResponse, ClassifierTransport, ChatMessage } from './ClassifierTransport';
import { classifyTransportFailure, describeCause, FAILURE_LABELS } from './failureClassifier';
import { parseClassificationContent } from './payloadParser';
import { getBackoffDelayS, shouldRetry } from './RetryPolicy';
import { computeDynamicTimeout, timeoutsForRequest } from './TimeoutPolicy';

export interface RemoteClientOptions {
  transport?: ClassifierTransport;
  sleep?: (ms: number) => Promise<void>;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  onAttempt?: (record: AttemptRecord) => void;
}

export function buildMessages(request: ClassificationRequest): ChatMessage[] {
  if (request.operation === 'review') {
    return [
      { role: 'system', content: reviewSystemPrompt },
      { role: 'user', content: buildReviewUserPrompt(request) },
    ];
  }
  return [
    { role: 'system', content: structureSystemPrompt },
    { role: 'user', content: buildStructureUserPrompt(request) },
  ];
}

function messageContent(response: ChatCompletionResponse): string {
  const content = response.choices?.[0]?.message?.content;
  return typeof content === 'string' ? content : '';
}

export class RemoteClassifierClient {
  private config: LabelingConfig;
  private transport: ClassifierTransport;
  private sleep: (ms: number) => Promise<void>;

  constructor(config: LabelingConfig, options: RemoteClientOptions = {}) {
    this.config = config;
    this.transport = options.transport || new AxiosTransport(config.remote);
    this.sleep = options.sleep || delay;
  }

  async execute(request: ClassificationRequest, options: ExecuteOptions = {}): Promise<ClassificationResponse> {
    const { maxAttempts, backoffBaseS } = this.config.retry;
    const paragraphCount = request.paragraphs.length;
    const attempts: AttemptRecord[] = [];

    const record = (entry: AttemptRecord) => {
      attempts.push(entry);
      options.onAttempt?.(entry);
    };
    const fail = (kind: FailureKind, message: string, cause?: unknown) =>
      new RemoteClassificationError(kind, message, attempts, { cause });

    if (!this.config.remote.apiKey) {
      throw fail('auth_error', `${FAILURE_LABELS.auth_error}: LLM_API_KEY is not configured`);
    }

    const payload: ChatCompletionPayload = {
      model: this.config.remote.model,
      temperature: 0,
      response_format: { type: 'json_object' },
      messages: buildMessages(request),
    };
    const timeoutS = computeDynamicTimeout(paragraphCount, this.config.timeouts);
    const timeouts = timeoutsForRequest(paragraphCount, this.config.timeouts);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (options.signal?.aborted) {
        throw fail('other_error', `cancelled before attempt ${attempt}/${maxAttempts}`, options.signal.reason);
      }

      emojiLogger.apiCall(
        `${request.operation} for ${paragraphCount} paragraphs (attempt ${attempt}/${maxAttempts}, timeout ${timeoutS}s)`
      );
      const startTime = Date.now();

      let response: ChatCompletionResponse;
      try {
        response = await this.transport.send(payload, timeouts);
      } catch (error) {
        const kind = classifyTransportFailure(error);
        const cause = describeCause(error);
        record({ attempt, maxAttempts, timeoutS, elapsedMs: Date.now() - startTime, outcome: kind, cause });

        if (!shouldRetry(kind, attempt, maxAttempts)) {
          emojiLogger.apiCallFailure('remote-classifier', this.config.remote.model, `${FAILURE_LABELS[kind]}: ${cause}`);
          throw fail(kind, `${FAILURE_LABELS[kind]} (attempt ${attempt}/${maxAttempts}): ${cause}`, error);
        }

        const backoffS = getBackoffDelayS(attempt + 1, backoffBaseS);
        emojiLogger.retrying(attempt + 1, maxAttempts, `${FAILURE_LABELS[kind]}: ${cause}; waiting ${backoffS}s`);
        if (options.signal?.aborted) {
          throw fail('other_error', `cancelled before attempt ${attempt + 1}/${maxAttempts}`, options.signal.reason);
        }
        await this.sleep(backoffS * 1000);
        continue;
      }

      const elapsedMs = Date.now() - startTime;
      try {
        const result = parseClassificationContent(messageContent(response), request.operation);
        record({ attempt, maxAttempts, timeoutS, elapsedMs, outcome: 'success' });
        emojiLogger.apiResponse(`${request.operation} returned ${result.paragraphs.length} labels`, elapsedMs);
        emojiLogger.jsonSummary(result, 'REMOTE RESULT');
        return { result, attempts };
      } catch (error) {
        // Malformed replies are not retried
        const cause = describeCause(error);
        record({ attempt, maxAttempts, timeoutS, elapsedMs, outcome: 'other_error', cause });
        throw fail('other_error', `${FAILURE_LABELS.other_error} (attempt ${attempt}/${maxAttempts}): ${cause}`, error);
      }
    }

    // maxAttempts is validated to be at least 1
    throw fail('other_error', `${FAILURE_LABELS.other_error}: no attempts were made`);
  }
}
