/**
 * Identity Resolution
 *
 * Maps EVM addresses to their NEAR representative accounts and NEAR
 * accounts to their implicit EVM addresses.
 */

import { getAddress, isHex, keccak256, stringToBytes, type Address } from 'viem';
import { MAX_SUB_ACCOUNT_LENGTH } from './constants.js';
import { InvalidIdentityError } from './errors.js';
import { currentIdentity } from './system.js';
import type { ExecutionContext } from './types.js';

const ADDRESS_HEX_LENGTH = 40;

/**
 * Sub-account of `parentIdentity` named after an EVM address
 *
 * @param address - EVM address
 * @param parentIdentity - NEAR account id
 * @returns `<40 lowercase hex chars>.<parentIdentity>`
 *
 * @example
 * ```typescript
 * addressSubAccount('0x000000000000000000000000000000000000dEaD', 'aurora');
 * // '000000000000000000000000000000000000dead.aurora'
 * ```
 */
export function addressSubAccount(address: Address, parentIdentity: string): string {
  return `${address.slice(2).toLowerCase()}.${parentIdentity}`;
}

/**
 * Recover the EVM address a sub-account was named after
 *
 * @param identity - Account id starting with 40 hex characters
 * @returns Checksummed address
 * @throws InvalidIdentityError if the prefix is not an address
 */
export function addressFromSubAccount(identity: string): Address {
  const prefix = `0x${identity.slice(0, ADDRESS_HEX_LENGTH)}`;
  if (identity.length < ADDRESS_HEX_LENGTH || !isHex(prefix)) {
    throw new InvalidIdentityError(identity, 'expected 40 hex characters');
  }
  return getAddress(prefix);
}

/**
 * Whether address sub-accounts of `parentIdentity` fit NEAR's account id limit
 */
export function canHostAddressSubAccounts(parentIdentity: string): boolean {
  return parentIdentity.length + 1 + ADDRESS_HEX_LENGTH <= MAX_SUB_ACCOUNT_LENGTH;
}

/**
 * NEAR account that represents `address` inside the current engine
 *
 * @param ctx - Execution context
 * @param address - EVM address
 * @returns Representative account id
 * @throws SystemInterfaceFailure if the engine identity cannot be read
 */
export async function representativeIdentity(ctx: ExecutionContext, address: Address): Promise<string> {
  return addressSubAccount(address, await currentIdentity(ctx));
}

/**
 * EVM address that acts for a NEAR account: the low 160 bits of
 * keccak256 over the account id. Not reversible.
 */
export function implicitAddress(identity: string): Address {
  const digest = keccak256(stringToBytes(identity));
  return getAddress(`0x${digest.slice(-ADDRESS_HEX_LENGTH)}`);
}

/**
 * Implicit EVM address of the representative account of `address`,
 * i.e. the address callbacks from NEAR arrive from.
 */
export async function representativeImplicitAddress(
  ctx: ExecutionContext,
  address: Address
): Promise<Address> {
  return implicitAddress(await representativeIdentity(ctx, address));
}
