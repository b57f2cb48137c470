/**
 * Execution context over JSON-RPC
 *
 * @packageDocumentation
 */

import { createLogger, getConfig } from '@aurora-xcc/shared';
import { bytesToHex, getAddress, hexToBytes, isHex, type Address, type Hex } from 'viem';
import type { CallResult, ExecutionContext } from '../xcc/types.js';
import { JsonRpcClient } from './client.js';
import { RpcError, type ContextAddresses, type EthCallRequest, type RpcConfig } from './types.js';

const logger = createLogger('xcc:rpc');

/** JSON-RPC error code for EVM execution errors */
const EXECUTION_ERROR = 3;

/**
 * Simulates the contract's calls with `eth_call` against the latest block.
 *
 * Nothing is committed: use it to read engine identities, preview
 * payloads, or inspect results from outside a transaction.
 *
 * @example
 * ```typescript
 * const ctx = new RpcExecutionContext(
 *   { rpcUrl: 'https://mainnet.aurora.dev' },
 *   { self: contractAddress, sender: userAddress }
 * );
 * const engine = await currentIdentity(ctx); // 'aurora'
 * ```
 */
export class RpcExecutionContext implements ExecutionContext {
  readonly self: Address;
  readonly sender: Address;
  private client: JsonRpcClient;

  constructor(config: RpcConfig, addresses: ContextAddresses) {
    this.client = new JsonRpcClient(config);
    this.self = getAddress(addresses.self);
    this.sender = getAddress(addresses.sender);
  }

  async call(to: Address, input: Uint8Array): Promise<CallResult> {
    const request: EthCallRequest = { from: this.self, to, data: bytesToHex(input) };

    try {
      const output = await this.client.request<Hex>('eth_call', [request, 'latest']);
      return { success: true, returnData: hexToBytes(output) };
    } catch (error) {
      if (error instanceof RpcError && error.code === EXECUTION_ERROR) {
        logger.debug(`eth_call to ${to} reverted: ${error.message}`);
        const data = typeof error.data === 'string' && isHex(error.data) ? error.data : '0x';
        return { success: false, returnData: hexToBytes(data) };
      }
      throw error;
    }
  }
}

/**
 * Build an RPC execution context from environment configuration
 *
 * @throws Error if XCC_CONTRACT_ADDRESS or XCC_SENDER_ADDRESS is missing
 */
export function createRpcExecutionContext(): RpcExecutionContext {
  const config = getConfig();

  if (!config.XCC_CONTRACT_ADDRESS) {
    throw new Error('XCC_CONTRACT_ADDRESS is required for an RPC execution context');
  }
  if (!config.XCC_SENDER_ADDRESS) {
    throw new Error('XCC_SENDER_ADDRESS is required for an RPC execution context');
  }

  return new RpcExecutionContext(
    { rpcUrl: config.AURORA_RPC_URL, timeout: config.RPC_TIMEOUT },
    { self: getAddress(config.XCC_CONTRACT_ADDRESS), sender: getAddress(config.XCC_SENDER_ADDRESS) }
  );
}
