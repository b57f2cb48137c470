/**
 * Protocol constants shared with the Aurora engine
 */

import type { Address } from 'viem';

/** Schedules deferred NEAR calls */
export const CROSS_CONTRACT_CALL_ADDRESS: Address = '0x516Cded1D16af10CAd47D6D49128E2eB7d27b372';

/** Returns the engine's own NEAR account id */
export const CURRENT_ACCOUNT_ID_ADDRESS: Address = '0xfeFAe79E4180Eb0284F261205E3F8CEA737afF56';

/** Returns the NEAR account id that called into the engine */
export const PREDECESSOR_ACCOUNT_ID_ADDRESS: Address = '0x723FfBAbA940e75E7BF5F6d61dCbf8d9a4De0fD7';

/** Returns the results of the promises the current callback depends on */
export const PROMISE_RESULT_ADDRESS: Address = '0x0A3540F79BE10EF14890e87c1A0040A68Cc6AF71';

/**
 * One-time top-up (2 NEAR) paid with the first call from a contract.
 * Covers creation and storage stake of the contract's NEAR sub-account.
 */
export const INITIALIZATION_TOP_UP = 2_000_000_000_000_000_000_000_000n;

/** Engine method that executes an EVM call */
export const EVM_CALL_METHOD = 'call';

/** NEAR account ids are capped at 64 characters; sub-accounts must also fit a separator */
export const MAX_SUB_ACCOUNT_LENGTH = 63;

export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;
export const U256_MAX = (1n << 256n) - 1n;
