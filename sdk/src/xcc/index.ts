/**
 * Cross-Contract Calls
 *
 * Schedule deferred NEAR calls from an Aurora contract, chain callbacks,
 * and read their results.
 *
 * @packageDocumentation
 */

// Core types
export type {
  Address,
  CallResult,
  ExecutionContext,
  FundingAsset,
  BridgeState,
  CallDescriptor,
  CallbackChain,
  BasePromise,
  ChainedPromise,
  XccPromise,
  PromiseResult,
  PromiseResultStatus,
} from './types.js';

export { ExecutionMode, PromiseResultTag } from './types.js';

// Protocol constants
export {
  CROSS_CONTRACT_CALL_ADDRESS,
  CURRENT_ACCOUNT_ID_ADDRESS,
  PREDECESSOR_ACCOUNT_ID_ADDRESS,
  PROMISE_RESULT_ADDRESS,
  INITIALIZATION_TOP_UP,
  EVM_CALL_METHOD,
  MAX_SUB_ACCOUNT_LENGTH,
  U64_MAX,
  U128_MAX,
  U256_MAX,
} from './constants.js';

// Errors
export {
  XccError,
  BoundsError,
  SystemInterfaceFailure,
  FundingFailure,
  PromiseConsumedError,
  AmountRangeError,
  CodecError,
  InvalidIdentityError,
} from './errors.js';

// Binary encoding
export { BorshWriter, BorshReader } from './borsh.js';
export {
  encodeCallDescriptor,
  encodePromise,
  decodePromise,
  encodeEvmCallArgs,
  readResultCount,
  skipPromiseResult,
  decodePromiseResult,
  encodePromiseResults,
} from './codec.js';

// System interface
export { callSystem, currentIdentity, predecessorIdentity } from './system.js';

// Identities
export {
  addressSubAccount,
  addressFromSubAccount,
  canHostAddressSubAccounts,
  representativeIdentity,
  implicitAddress,
  representativeImplicitAddress,
} from './identity.js';

// Funding
export { Erc20FundingAsset, initBridge } from './funding.js';

// Building, chaining and dispatching
export { PendingCall, andThen } from './pending-call.js';
export { build, buildForAuroraTarget } from './builder.js';
export { dispatch } from './dispatcher.js';

// Results
export { readResult, readAllResults } from './results.js';

// Locker helpers
export { lockerAbi, WITHDRAW_SELECTOR, encodeWithdrawCall, withdrawCallArgs } from './locker.js';
