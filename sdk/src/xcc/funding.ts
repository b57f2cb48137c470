/**
 * Funding
 *
 * ERC-20 funding asset (wNEAR on Aurora) and bridge state setup.
 */

import {
  bytesToHex,
  decodeAbiParameters,
  encodeFunctionData,
  erc20Abi,
  hexToBytes,
  type Address,
} from 'viem';
import { createLogger } from '@aurora-xcc/shared';
import { CROSS_CONTRACT_CALL_ADDRESS, U256_MAX } from './constants.js';
import { FundingFailure } from './errors.js';
import type { BridgeState, ExecutionContext, FundingAsset } from './types.js';

const logger = createLogger('xcc');

/** Selector of `Error(string)` */
const ERROR_STRING_SELECTOR = '0x08c379a0';

/**
 * Funding asset backed by an ERC-20 contract reached through the
 * execution context
 *
 * @example
 * ```typescript
 * const wNear = new Erc20FundingAsset('0x4861825E75ab14553E5aF711EbbE6873d369d146');
 * const state = await initBridge(ctx, wNear);
 * ```
 */
export class Erc20FundingAsset implements FundingAsset {
  readonly address: Address;

  constructor(address: Address) {
    this.address = address;
  }

  async transferFrom(ctx: ExecutionContext, from: Address, to: Address, amount: bigint): Promise<void> {
    const data = encodeFunctionData({
      abi: erc20Abi,
      functionName: 'transferFrom',
      args: [from, to, amount],
    });
    await this.invoke(ctx, 'transferFrom', data, amount);
  }

  async approve(ctx: ExecutionContext, spender: Address, amount: bigint): Promise<void> {
    const data = encodeFunctionData({
      abi: erc20Abi,
      functionName: 'approve',
      args: [spender, amount],
    });
    await this.invoke(ctx, 'approve', data, amount);
  }

  private async invoke(
    ctx: ExecutionContext,
    functionName: 'transferFrom' | 'approve',
    data: `0x${string}`,
    amount: bigint
  ): Promise<void> {
    const { success, returnData } = await ctx.call(this.address, hexToBytes(data));

    if (!success) {
      throw this.failure(amount, revertReason(returnData));
    }

    // Tokens that return nothing are treated as succeeding
    if (returnData.length === 0) {
      return;
    }

    const [ok] = decodeAbiParameters([{ type: 'bool' }], bytesToHex(returnData));
    if (!ok) {
      throw this.failure(amount, `${functionName} returned false`);
    }
  }

  private failure(amount: bigint, reason: string): FundingFailure {
    logger.warn(`funding asset ${this.address} rejected ${amount}: ${reason}`);
    return new FundingFailure(this.address, amount, reason);
  }
}

/**
 * Human-readable reason from revert data: the `Error(string)` message
 * when present, otherwise the raw hex.
 */
function revertReason(returnData: Uint8Array): string {
  if (returnData.length === 0) {
    return 'execution reverted';
  }
  const hex = bytesToHex(returnData);
  if (hex.startsWith(ERROR_STRING_SELECTOR)) {
    try {
      const [message] = decodeAbiParameters([{ type: 'string' }], `0x${hex.slice(10)}`);
      return message;
    } catch {
      // selector matched but the payload is not a string
    }
  }
  return hex;
}

/**
 * Create the bridge state of a contract and let the cross-contract call
 * precompile spend the contract's funding balance.
 *
 * @param ctx - Execution context of the contract
 * @param fundingAsset - Token used to pay attached NEAR
 * @returns Uninitialized bridge state
 * @throws FundingFailure if the approval is rejected
 */
export async function initBridge(ctx: ExecutionContext, fundingAsset: FundingAsset): Promise<BridgeState> {
  await fundingAsset.approve(ctx, CROSS_CONTRACT_CALL_ADDRESS, U256_MAX);
  return { initialized: false, fundingAsset };
}
