/**
 * Promise Builder
 *
 * Funds and assembles deferred NEAR calls.
 */

import { createLogger } from '@aurora-xcc/shared';
import type { Address } from 'viem';
import { encodeEvmCallArgs } from './codec.js';
import { EVM_CALL_METHOD, INITIALIZATION_TOP_UP, U128_MAX, U64_MAX } from './constants.js';
import { AmountRangeError } from './errors.js';
import { PendingCall } from './pending-call.js';
import { currentIdentity } from './system.js';
import type { BasePromise, BridgeState, ExecutionContext } from './types.js';

const logger = createLogger('xcc');

/**
 * Create a deferred call to a NEAR contract.
 *
 * The first call built from a bridge state carries the one-time top-up.
 * Any attached value is pulled from `ctx.sender` into the contract
 * before the call is returned. Target and method are not validated;
 * a bad value only shows up when the host executes the call.
 *
 * @param ctx - Execution context of the contract
 * @param state - Bridge state of the contract, shared by all builds
 * @param targetIdentity - NEAR account id to call
 * @param method - Method name on the target
 * @param args - Method arguments, already serialized
 * @param value - Attached NEAR balance in yoctoNEAR
 * @param gas - Gas allowance
 * @returns Single-use pending call
 * @throws AmountRangeError if value or gas do not fit u128 / u64
 * @throws FundingFailure if the attached value cannot be collected
 *
 * @example
 * ```typescript
 * const call = await build(ctx, state, 'alice.near', 'ft_transfer', args, 0n, 30_000_000_000_000n);
 * await dispatch(ctx, call);
 * ```
 */
export async function build(
  ctx: ExecutionContext,
  state: BridgeState,
  targetIdentity: string,
  method: string,
  args: Uint8Array,
  value: bigint,
  gas: bigint
): Promise<PendingCall<BasePromise>> {
  if (gas < 0n || gas > U64_MAX) {
    throw new AmountRangeError('gas', gas, U64_MAX);
  }

  if (value < 0n) {
    throw new AmountRangeError('value', value, U128_MAX);
  }

  const toppingUp = !state.initialized;
  const attachedValue = toppingUp ? value + INITIALIZATION_TOP_UP : value;
  if (attachedValue > U128_MAX) {
    throw new AmountRangeError('value', attachedValue, U128_MAX);
  }

  // Flip before awaiting so later builds in this context see it
  if (toppingUp) {
    state.initialized = true;
  }

  if (attachedValue > 0n) {
    try {
      await state.fundingAsset.transferFrom(ctx, ctx.sender, ctx.self, attachedValue);
    } catch (error) {
      if (toppingUp) {
        state.initialized = false;
      }
      throw error;
    }
  }

  if (toppingUp) {
    logger.debug(`applied initialization top-up of ${INITIALIZATION_TOP_UP}`);
  }

  return PendingCall.of({ targetIdentity, method, args, attachedValue, gasAllowance: gas });
}

/**
 * Create a deferred call back into an EVM contract on the current engine.
 *
 * @param ctx - Execution context of the contract
 * @param state - Bridge state of the contract
 * @param target - EVM contract to call
 * @param args - EVM call input (selector and ABI-encoded arguments)
 * @param value - Attached NEAR balance in yoctoNEAR
 * @param gas - Gas allowance
 */
export async function buildForAuroraTarget(
  ctx: ExecutionContext,
  state: BridgeState,
  target: Address,
  args: Uint8Array,
  value: bigint,
  gas: bigint
): Promise<PendingCall<BasePromise>> {
  const engine = await currentIdentity(ctx);
  return build(ctx, state, engine, EVM_CALL_METHOD, encodeEvmCallArgs(target, args), value, gas);
}
