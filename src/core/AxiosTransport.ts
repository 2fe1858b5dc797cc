/**
 * Transport for OpenAI-compatible chat completion endpoints
 */
import axios, { AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import type { Socket } from 'net';
import type { RemoteSettings } from '../config';
import { ConnectTimeoutError } from '../utils/errors';
import type {
  ChatCompletionPayload,
  ChatCompletionResponse,
  ClassifierTransport,
} from './ClassifierTransport';
import type { TransportTimeouts } from './TimeoutPolicy';

/**
 * Request function for axios' `transport` option. Destroys the request with
 * a ConnectTimeoutError when the socket has not connected in time; once
 * connected, axios' own `timeout` bounds the wait for the response.
 */
export function createConnectGuard(connectTimeoutMs: number) {
  const request = (
    options: https.RequestOptions,
    callback?: (res: http.IncomingMessage) => void
  ): http.ClientRequest => {
    const req = options.protocol === 'http:'
      ? http.request(options, callback)
      : https.request(options, callback);

    req.on('socket', (socket: Socket) => {
      // Reused keep-alive sockets are already connected
      if (!socket.connecting) {
        return;
      }
      const host = options.hostname ?? options.host ?? 'remote host';
      const timer = setTimeout(() => {
        req.destroy(new ConnectTimeoutError(connectTimeoutMs, host));
      }, connectTimeoutMs);
      const clear = () => clearTimeout(timer);
      socket.once('connect', clear);
      socket.once('close', clear);
    });

    return req;
  };

  return { request };
}

export class AxiosTransport implements ClassifierTransport {
  private settings: RemoteSettings;
  private client: AxiosInstance;

  constructor(settings: RemoteSettings, client?: AxiosInstance) {
    this.settings = settings;
    this.client = client || axios.create({
      // Response-phase timeouts surface as ETIMEDOUT instead of ECONNABORTED
      transitional: { clarifyTimeoutError: true },
    });
  }

  async send(payload: ChatCompletionPayload, timeouts: TransportTimeouts): Promise<ChatCompletionResponse> {
    const response = await this.client.post<ChatCompletionResponse>('/chat/completions', payload, {
      baseURL: this.settings.baseUrl,
      timeout: timeouts.responseTimeoutMs,
      transport: createConnectGuard(timeouts.connectTimeoutMs),
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.settings.apiKey}`,
      },
    });

    return response.data;
  }
}
