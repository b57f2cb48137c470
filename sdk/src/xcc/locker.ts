/**
 * Locker Calls
 *
 * Helpers for NEAR contracts that call back into an EVM token locker
 * through the engine's `call` method.
 */

import { encodeFunctionData, hexToBytes, parseAbi, toFunctionSelector, type Address } from 'viem';
import { encodeEvmCallArgs } from './codec.js';
import { U128_MAX } from './constants.js';
import { AmountRangeError } from './errors.js';

export const lockerAbi = parseAbi(['function withdraw(address token, address receiver, uint256 amount)']);

/** Selector of `withdraw(address,address,uint256)` */
export const WITHDRAW_SELECTOR = toFunctionSelector('withdraw(address,address,uint256)');

/**
 * ABI-encode a locker `withdraw` call
 *
 * @param token - EVM address of the ERC-20 being released
 * @param receiver - EVM address receiving the tokens
 * @param amount - Amount, at most u128
 * @returns Selector followed by three 32-byte words
 */
export function encodeWithdrawCall(token: Address, receiver: Address, amount: bigint): Uint8Array {
  if (amount < 0n || amount > U128_MAX) {
    throw new AmountRangeError('amount', amount, U128_MAX);
  }
  return hexToBytes(
    encodeFunctionData({ abi: lockerAbi, functionName: 'withdraw', args: [token, receiver, amount] })
  );
}

/**
 * Arguments for the engine's `call` method that run `withdraw` on `locker`
 */
export function withdrawCallArgs(locker: Address, token: Address, receiver: Address, amount: bigint): Uint8Array {
  return encodeEvmCallArgs(locker, encodeWithdrawCall(token, receiver, amount));
}
