/**
 * Result Reader
 *
 * Reads the outcomes of the promises a callback was scheduled after.
 * Only meaningful inside a callback the host triggered; in the
 * scheduling transaction the buffer holds no results yet.
 */

import { createLogger } from '@aurora-xcc/shared';
import { BorshReader } from './borsh.js';
import { decodePromiseResult, readResultCount, skipPromiseResult } from './codec.js';
import { PROMISE_RESULT_ADDRESS } from './constants.js';
import { BoundsError } from './errors.js';
import { callSystem } from './system.js';
import type { ExecutionContext, PromiseResult } from './types.js';

const logger = createLogger('xcc');

async function openResults(ctx: ExecutionContext): Promise<{ reader: BorshReader; length: number }> {
  const buffer = await callSystem(ctx, PROMISE_RESULT_ADDRESS);
  const reader = new BorshReader(buffer);
  return { reader, length: readResultCount(reader) };
}

/**
 * Read the result at `index`
 *
 * @param ctx - Execution context of the callback
 * @param index - Position of the promise among the callback's dependencies
 * @returns NotReady, Successful with output, or Failed
 * @throws BoundsError if `index` is not below the number of results
 * @throws SystemInterfaceFailure if the result buffer cannot be read
 *
 * @example
 * ```typescript
 * const result = await readResult(ctx, 0);
 * if (result.status === 'Successful') {
 *   console.log(new TextDecoder().decode(result.output));
 * }
 * ```
 */
export async function readResult(ctx: ExecutionContext, index: number): Promise<PromiseResult> {
  const { reader, length } = await openResults(ctx);

  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new BoundsError(index, length);
  }

  for (let i = 0; i < index; i++) {
    skipPromiseResult(reader);
  }

  const result = decodePromiseResult(reader);
  logger.debug(`promise result ${index}/${length}: ${result.status}`);
  return result;
}

/**
 * Read every result in order
 */
export async function readAllResults(ctx: ExecutionContext): Promise<PromiseResult[]> {
  const { reader, length } = await openResults(ctx);
  const results: PromiseResult[] = [];
  for (let i = 0; i < length; i++) {
    results.push(decodePromiseResult(reader));
  }
  return results;
}
