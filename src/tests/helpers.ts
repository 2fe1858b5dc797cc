/**
 * Shared fixtures for the test suites
 */
import { buildConfig, ConfigOverrides, LabelingConfig } from '../config';
import type { ChatCompletionPayload, ChatCompletionResponse, ClassifierTransport } from '../core/ClassifierTransport';
import type { TransportTimeouts } from '../core/TimeoutPolicy';
import type { Paragraph, ParagraphLabel } from '../models/Paragraph';

export function testConfig(overrides: ConfigOverrides = {}): LabelingConfig {
  return buildConfig({
    ...overrides,
    remote: {
      apiKey: 'test-secret',
      baseUrl: 'http://classifier.test/v1',
      ...overrides.remote,
    },
  });
}

export function paragraph(index: number, text: string, label: ParagraphLabel, confidence: number): Paragraph {
  return { index, text, label, confidence };
}

export function chatReply(body: unknown): ChatCompletionResponse {
  return { choices: [{ message: { content: typeof body === 'string' ? body : JSON.stringify(body) } }] };
}

export function errorWithCode(code: string, message: string = code, syscall?: string): Error {
  return Object.assign(new Error(message), { code, syscall });
}

export type TransportStep = ChatCompletionResponse | Error;

/**
 * Plays back scripted replies in order; the last step repeats
 */
export class ScriptedTransport implements ClassifierTransport {
  public calls: Array<{ payload: ChatCompletionPayload; timeouts: TransportTimeouts }> = [];
  private steps: TransportStep[];

  constructor(steps: TransportStep[]) {
    this.steps = [...steps];
  }

  async send(payload: ChatCompletionPayload, timeouts: TransportTimeouts): Promise<ChatCompletionResponse> {
    this.calls.push({ payload, timeouts });
    const step = this.steps.length > 1 ? this.steps.shift() : this.steps[0];
    if (step === undefined) {
      throw new Error('no scripted reply');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

/**
 * Sleep stand-in that resolves at once and records the requested delays
 */
export function recordingSleep(onSleep?: (ms: number) => void) {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
    onSleep?.(ms);
  };
  return { sleep, delays };
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

export function silenceLogs() {
  return {
    debug: jest.spyOn(console, 'debug').mockImplementation(() => undefined),
    info: jest.spyOn(console, 'info').mockImplementation(() => undefined),
    warn: jest.spyOn(console, 'warn').mockImplementation(() => undefined),
    error: jest.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}
