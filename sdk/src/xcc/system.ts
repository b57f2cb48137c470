/**
 * System Interface
 *
 * Calls into the engine's fixed precompiles.
 */

import { createLogger } from '@aurora-xcc/shared';
import type { Address } from 'viem';
import { CURRENT_ACCOUNT_ID_ADDRESS, PREDECESSOR_ACCOUNT_ID_ADDRESS } from './constants.js';
import { SystemInterfaceFailure } from './errors.js';
import type { ExecutionContext } from './types.js';

const logger = createLogger('xcc');

const EMPTY = new Uint8Array(0);

/**
 * Call a precompile and return its output
 *
 * @param ctx - Execution context of the calling contract
 * @param address - Precompile address
 * @param input - Call input, empty for queries
 * @returns Raw return data
 * @throws SystemInterfaceFailure carrying the returned bytes if the call fails
 */
export async function callSystem(
  ctx: ExecutionContext,
  address: Address,
  input: Uint8Array = EMPTY
): Promise<Uint8Array> {
  const { success, returnData } = await ctx.call(address, input);

  if (!success) {
    const failure = new SystemInterfaceFailure(address, returnData);
    logger.warn(`system call to ${address} failed: ${failure.message}`);
    throw failure;
  }

  return returnData;
}

/**
 * NEAR account id of the engine the contract runs in (e.g. `aurora`)
 */
export async function currentIdentity(ctx: ExecutionContext): Promise<string> {
  const raw = await callSystem(ctx, CURRENT_ACCOUNT_ID_ADDRESS);
  return new TextDecoder().decode(raw);
}

/**
 * NEAR account id that called into the engine for this execution.
 * Inside a callback this is the account that resolved the promise.
 */
export async function predecessorIdentity(ctx: ExecutionContext): Promise<string> {
  const raw = await callSystem(ctx, PREDECESSOR_ACCOUNT_ID_ADDRESS);
  return new TextDecoder().decode(raw);
}
