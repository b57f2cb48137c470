/**
 * Dispatcher
 *
 * Hands pending calls to the host scheduler.
 */

import { createLogger } from '@aurora-xcc/shared';
import { encodePromise } from './codec.js';
import { CROSS_CONTRACT_CALL_ADDRESS } from './constants.js';
import type { PendingCall } from './pending-call.js';
import { callSystem } from './system.js';
import { ExecutionMode, type ExecutionContext } from './types.js';

const logger = createLogger('xcc');

/**
 * Schedule a pending call (single or with callback) on the host.
 *
 * The handle is consumed before the precompile is called. Success only
 * means the call was scheduled; whether it runs successfully is seen
 * later through `readResult` in a callback.
 *
 * @param ctx - Execution context of the contract
 * @param call - Pending call to schedule
 * @param mode - Scheduling mode
 * @throws PromiseConsumedError if the handle was already used
 * @throws SystemInterfaceFailure with the precompile's output as message
 */
export async function dispatch(
  ctx: ExecutionContext,
  call: PendingCall,
  mode: ExecutionMode = ExecutionMode.Eager
): Promise<void> {
  const promise = call.take();
  const payload = encodePromise(promise, mode);

  if (promise.kind === 'base') {
    logger.debug(
      `dispatching ${promise.descriptor.targetIdentity}.${promise.descriptor.method} (${payload.length} bytes)`
    );
  } else {
    const { base, callback } = promise.chain;
    logger.debug(
      `dispatching ${base.targetIdentity}.${base.method} then ${callback.targetIdentity}.${callback.method} (${payload.length} bytes)`
    );
  }

  await callSystem(ctx, CROSS_CONTRACT_CALL_ADDRESS, payload);
}
