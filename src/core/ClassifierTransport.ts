/**
 * Wire types for an OpenAI-compatible chat completion endpoint, and the
 * transport capability the remote classifier client calls.
 */
import type { TransportTimeouts } from './TimeoutPolicy';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionPayload {
  model: string;
  temperature: number;
  response_format: { type: 'json_object' };
  messages: ChatMessage[];
}

// Only the fields we read; everything is optional because the body is not validated
export interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export interface ClassifierTransport {
  /**
   * Rejects with the transport's own error on any failure; the caller
   * classifies it.
   */
  send(payload: ChatCompletionPayload, timeouts: TransportTimeouts): Promise<ChatCompletionResponse>;
}
