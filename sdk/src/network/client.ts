/**
 * JSON-RPC client for Aurora endpoints
 *
 * @packageDocumentation
 */

import {
  NetworkError,
  RpcError,
  type JsonRpcResponse,
  type RequestOptions,
  type RpcConfig,
} from './types.js';

const DEFAULT_TIMEOUT = 30000;

/**
 * Minimal JSON-RPC 2.0 client using native fetch
 *
 * @example
 * ```typescript
 * const client = new JsonRpcClient({ rpcUrl: 'https://mainnet.aurora.dev' });
 * const chainId = await client.request<string>('eth_chainId', []);
 * ```
 */
export class JsonRpcClient {
  private url: string;
  private defaultTimeout: number;
  private nextId = 1;

  /**
   * @throws Error if rpcUrl is not provided
   */
  constructor(config: RpcConfig) {
    if (!config.rpcUrl) {
      throw new Error('rpcUrl is required for JsonRpcClient');
    }
    this.url = config.rpcUrl;
    this.defaultTimeout = config.timeout ?? DEFAULT_TIMEOUT;
  }

  /**
   * Call a JSON-RPC method
   *
   * @throws RpcError if the endpoint answers with an error object
   * @throws NetworkError on transport failures and timeouts
   */
  async request<T>(method: string, params: unknown[], options: RequestOptions = {}): Promise<T> {
    const id = this.nextId++;
    const body = await this.post(JSON.stringify({ jsonrpc: '2.0', id, method, params }), options);

    let parsed: JsonRpcResponse<T>;
    try {
      parsed = JSON.parse(body) as JsonRpcResponse<T>;
    } catch {
      throw new NetworkError(`Invalid JSON-RPC response to ${method}`, undefined, body);
    }

    if (parsed.error) {
      throw new RpcError(parsed.error.code, parsed.error.message, parsed.error.data);
    }
    if (parsed.result === undefined) {
      throw new NetworkError(`JSON-RPC response to ${method} has no result`, undefined, body);
    }
    return parsed.result;
  }

  private async post(payload: string, options: RequestOptions): Promise<string> {
    const timeout = options.timeout ?? this.defaultTimeout;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...options.headers,
        },
        body: payload,
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        throw new NetworkError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          text
        );
      }

      return text;
    } catch (error) {
      if (error instanceof NetworkError) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new NetworkError(`Request timeout after ${timeout}ms`);
        }
        throw new NetworkError(error.message);
      }

      throw new NetworkError('Unknown network error');
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
