/**
 * Aurora XCC SDK
 *
 * Lets contracts on the Aurora EVM schedule deferred calls into NEAR
 * contracts and read their results.
 *
 * - `xcc` — Identities, promise building and dispatch, result decoding
 * - `network` — JSON-RPC execution context for simulating contract calls
 *
 * @packageDocumentation
 */

export * from './xcc/index.js';
export * from './network/index.js';
