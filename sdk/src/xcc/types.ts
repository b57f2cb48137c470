/**
 * Core type definitions for the cross-contract call protocol
 */

import type { Address } from 'viem';

export type { Address };

/**
 * Result of a low-level call made by the contract
 */
export interface CallResult {
  /** Whether the callee returned normally */
  success: boolean;
  /** Raw return data, or the revert payload when `success` is false */
  returnData: Uint8Array;
}

/**
 * The contract execution the protocol runs inside.
 *
 * Precompiles and the funding token are both reached through `call`,
 * the same low-level call a contract would make.
 */
export interface ExecutionContext {
  /** EVM address of the contract running the protocol */
  readonly self: Address;
  /** EVM address that invoked the contract (`msg.sender`) */
  readonly sender: Address;
  /** Call `to` from `self` with raw input bytes */
  call(to: Address, input: Uint8Array): Promise<CallResult>;
}

/**
 * A fungible token that pays for the NEAR balance attached to deferred calls
 */
export interface FundingAsset {
  readonly address: Address;
  /** Pull `amount` from `from` into `to`; throws FundingFailure */
  transferFrom(ctx: ExecutionContext, from: Address, to: Address, amount: bigint): Promise<void>;
  /** Allow `spender` to move up to `amount` of the contract's balance */
  approve(ctx: ExecutionContext, spender: Address, amount: bigint): Promise<void>;
}

/**
 * Per-contract protocol state. Pass the same instance to every build.
 */
export interface BridgeState {
  /** Flips to true once the one-time top-up has been paid */
  initialized: boolean;
  readonly fundingAsset: FundingAsset;
}

/**
 * A deferred call into a NEAR contract
 */
export interface CallDescriptor {
  /** NEAR account id of the contract to call */
  readonly targetIdentity: string;
  readonly method: string;
  readonly args: Uint8Array;
  /** Attached NEAR balance in yoctoNEAR (u128) */
  readonly attachedValue: bigint;
  /** Gas allowance (u64) */
  readonly gasAllowance: bigint;
}

/**
 * Two deferred calls, the callback running after the base resolves
 */
export interface CallbackChain {
  readonly base: CallDescriptor;
  readonly callback: CallDescriptor;
}

export interface BasePromise {
  readonly kind: 'base';
  readonly descriptor: CallDescriptor;
}

export interface ChainedPromise {
  readonly kind: 'chained';
  readonly chain: CallbackChain;
}

/**
 * Anything the dispatcher can hand to the host scheduler
 */
export type XccPromise = BasePromise | ChainedPromise;

/**
 * How the host scheduler treats a dispatched promise
 */
export const ExecutionMode = {
  Eager: 0,
  Lazy: 1,
} as const;

export type ExecutionMode = (typeof ExecutionMode)[keyof typeof ExecutionMode];

/**
 * Wire tags of a promise result entry
 */
export const PromiseResultTag = {
  NotReady: 0,
  Successful: 1,
  Failed: 2,
} as const;

export type PromiseResult =
  | { readonly status: 'NotReady' }
  | { readonly status: 'Successful'; readonly output: Uint8Array }
  | { readonly status: 'Failed' };

export type PromiseResultStatus = PromiseResult['status'];
