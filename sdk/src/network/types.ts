/**
 * Network types for JSON-RPC operations
 *
 * @packageDocumentation
 */

import type { Address, Hex } from 'viem';

/**
 * Connection settings for an Aurora JSON-RPC endpoint
 */
export interface RpcConfig {
  /** JSON-RPC endpoint URL (e.g., 'https://mainnet.aurora.dev') */
  rpcUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

/**
 * Addresses the simulated contract execution runs with
 */
export interface ContextAddresses {
  /** Contract the protocol runs as */
  self: Address;
  /** Account calling the contract */
  sender: Address;
}

/**
 * HTTP request options
 */
export interface RequestOptions {
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Additional headers */
  headers?: Record<string, string>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse<T> {
  jsonrpc: '2.0';
  id: number;
  result?: T;
  error?: JsonRpcErrorObject;
}

/**
 * Parameters of an `eth_call`
 */
export interface EthCallRequest {
  from: Address;
  to: Address;
  data: Hex;
}

/**
 * Network error with status code and response details
 */
export class NetworkError extends Error {
  /** HTTP status code if applicable */
  statusCode?: number;
  /** Raw response body */
  response?: string;

  constructor(message: string, statusCode?: number, response?: string) {
    super(message);
    this.name = 'NetworkError';
    this.statusCode = statusCode;
    this.response = response;
  }
}

/**
 * Error object returned by the JSON-RPC endpoint
 */
export class RpcError extends Error {
  /** JSON-RPC error code (3 for EVM reverts) */
  code: number;
  /** Attached error data, revert bytes for EVM reverts */
  data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'RpcError';
    this.code = code;
    this.data = data;
  }
}
