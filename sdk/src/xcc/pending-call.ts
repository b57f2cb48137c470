/**
 * Pending Calls
 *
 * Single-use handles around promises. `andThen` and `dispatch` take the
 * promise out of their handles; a handle cannot be used twice.
 *
 * Nothing here is named `then`: a module or object exposing `then` is
 * treated as a thenable by `await` and dynamic `import()`.
 */

import { PromiseConsumedError } from './errors.js';
import type { BasePromise, CallDescriptor, ChainedPromise, XccPromise } from './types.js';

export class PendingCall<P extends XccPromise = XccPromise> {
  private promise: P | null;

  private constructor(promise: P) {
    this.promise = promise;
  }

  /**
   * Wrap a descriptor as a single deferred call
   *
   * The descriptor and its argument bytes are copied.
   */
  static of(descriptor: CallDescriptor): PendingCall<BasePromise> {
    const copy = Object.freeze({ ...descriptor, args: descriptor.args.slice() });
    return new PendingCall<BasePromise>({ kind: 'base', descriptor: copy });
  }

  /**
   * Wrap an already assembled promise
   */
  static from<P extends XccPromise>(promise: P): PendingCall<P> {
    return new PendingCall(promise);
  }

  get consumed(): boolean {
    return this.promise === null;
  }

  /**
   * Look at the promise without consuming it
   *
   * @throws PromiseConsumedError if the handle was consumed
   */
  peek(): P {
    if (this.promise === null) {
      throw new PromiseConsumedError();
    }
    return this.promise;
  }

  /**
   * Take the promise out, leaving the handle consumed
   *
   * @throws PromiseConsumedError if the handle was consumed
   */
  take(): P {
    const promise = this.peek();
    this.promise = null;
    return promise;
  }
}

/**
 * Run `callback` after `base` resolves.
 *
 * Both handles are consumed. Gas and value of the two calls are not
 * checked against each other; the host scheduler enforces them.
 *
 * @example
 * ```typescript
 * const transfer = await build(ctx, state, 'wrap.near', 'ft_transfer', args, 1n, 10_000_000_000_000n);
 * const report = await buildForAuroraTarget(ctx, state, self, onTransferred, 0n, 10_000_000_000_000n);
 * await dispatch(ctx, andThen(transfer, report));
 * ```
 */
export function andThen(
  base: PendingCall<BasePromise>,
  callback: PendingCall<BasePromise>
): PendingCall<ChainedPromise> {
  // Check both before consuming either
  if (base === callback) {
    throw new PromiseConsumedError();
  }
  const first = base.peek();
  const second = callback.peek();
  base.take();
  callback.take();

  return PendingCall.from<ChainedPromise>({
    kind: 'chained',
    chain: { base: first.descriptor, callback: second.descriptor },
  });
}
