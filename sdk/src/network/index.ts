/**
 * Network operations for Aurora JSON-RPC endpoints
 *
 * @packageDocumentation
 */

export { JsonRpcClient } from './client.js';
export { RpcExecutionContext, createRpcExecutionContext } from './rpc-context.js';
export { NetworkError, RpcError } from './types.js';
export type {
  RpcConfig,
  ContextAddresses,
  RequestOptions,
  JsonRpcErrorObject,
  JsonRpcResponse,
  EthCallRequest,
} from './types.js';
