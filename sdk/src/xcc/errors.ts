/**
 * Error types raised by the protocol
 *
 * Every error aborts the operation that raised it; nothing is retried.
 */

import type { Address } from 'viem';

/**
 * Base class of every protocol error
 */
export class XccError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'XccError';
  }
}

/**
 * A result index at or beyond the number of available results
 */
export class BoundsError extends XccError {
  index: number;
  length: number;

  constructor(index: number, length: number) {
    super(`Index out of bounds: ${index} (results available: ${length})`);
    this.name = 'BoundsError';
    this.index = index;
    this.length = length;
  }
}

/**
 * A precompile call that did not succeed.
 *
 * The message is the returned payload read as UTF-8, unchanged.
 */
export class SystemInterfaceFailure extends XccError {
  /** Precompile that was called */
  address: Address;
  /** Raw bytes the precompile returned */
  returnData: Uint8Array;

  constructor(address: Address, returnData: Uint8Array) {
    super(new TextDecoder().decode(returnData));
    this.name = 'SystemInterfaceFailure';
    this.address = address;
    this.returnData = returnData;
  }
}

/**
 * The funding token refused to move the attached value
 */
export class FundingFailure extends XccError {
  asset: Address;
  amount: bigint;
  reason: string;

  constructor(asset: Address, amount: bigint, reason: string) {
    super(`Funding transfer of ${amount} from ${asset} failed: ${reason}`);
    this.name = 'FundingFailure';
    this.asset = asset;
    this.amount = amount;
    this.reason = reason;
  }
}

/**
 * A pending call used after `then` or `dispatch` consumed it
 */
export class PromiseConsumedError extends XccError {
  constructor() {
    super('Pending call was already consumed');
    this.name = 'PromiseConsumedError';
  }
}

/**
 * Attached value or gas outside the range the host accepts
 */
export class AmountRangeError extends XccError {
  constructor(field: string, value: bigint, max: bigint) {
    super(`${field} out of range: ${value} (expected 0..${max})`);
    this.name = 'AmountRangeError';
  }
}

/**
 * Wire data that does not follow the host layout
 */
export class CodecError extends XccError {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}

/**
 * An account id that is not an address sub-account
 */
export class InvalidIdentityError extends XccError {
  identity: string;

  constructor(identity: string, reason: string) {
    super(`Invalid identity "${identity}": ${reason}`);
    this.name = 'InvalidIdentityError';
    this.identity = identity;
  }
}
