/**
 * Codec Utilities
 *
 * Host wire layouts for dispatch payloads, EVM call arguments and
 * promise result buffers.
 *
 * Dispatch payload:
 *   [u8 execution mode][u8 variant: 0 = single call, 1 = with callback][descriptor(s)]
 *
 * Descriptor:
 *   [string target][string method][bytes args][u128 attached value][u64 gas]
 *
 * Result buffer:
 *   [u32 count] then per entry [u8 status] and, when successful, [bytes output]
 */

import { hexToBytes, isAddress, type Address } from 'viem';
import { BorshReader, BorshWriter } from './borsh.js';
import { CodecError } from './errors.js';
import {
  ExecutionMode,
  PromiseResultTag,
  type CallDescriptor,
  type PromiseResult,
  type XccPromise,
} from './types.js';

const PROMISE_VARIANT = { base: 0, chained: 1 } as const;

/** `CallArgs::V2` tag of the engine's `call` method */
const EVM_CALL_ARGS_V2 = 0;

function writeDescriptor(writer: BorshWriter, descriptor: CallDescriptor): BorshWriter {
  return writer
    .string(descriptor.targetIdentity)
    .string(descriptor.method)
    .bytes(descriptor.args)
    .u128(descriptor.attachedValue)
    .u64(descriptor.gasAllowance);
}

function readDescriptor(reader: BorshReader): CallDescriptor {
  return Object.freeze({
    targetIdentity: reader.string(),
    method: reader.string(),
    args: reader.bytes(),
    attachedValue: reader.u128(),
    gasAllowance: reader.u64(),
  });
}

/**
 * Encode a single descriptor
 */
export function encodeCallDescriptor(descriptor: CallDescriptor): Uint8Array {
  return writeDescriptor(new BorshWriter(), descriptor).toBytes();
}

/**
 * Encode a promise as the cross-contract call precompile expects it
 *
 * @param promise - Single call or call with callback
 * @param mode - Scheduling mode, eager unless stated
 * @returns Dispatch payload
 */
export function encodePromise(promise: XccPromise, mode: ExecutionMode = ExecutionMode.Eager): Uint8Array {
  const writer = new BorshWriter().u8(mode).u8(PROMISE_VARIANT[promise.kind]);

  if (promise.kind === 'base') {
    writeDescriptor(writer, promise.descriptor);
  } else {
    writeDescriptor(writer, promise.chain.base);
    writeDescriptor(writer, promise.chain.callback);
  }

  return writer.toBytes();
}

/**
 * Decode a dispatch payload back into its mode and promise
 *
 * @throws CodecError if the payload is not a valid dispatch payload
 */
export function decodePromise(payload: Uint8Array): { mode: ExecutionMode; promise: XccPromise } {
  const reader = new BorshReader(payload);
  const mode = toExecutionMode(reader.u8());
  const variant = reader.u8();

  let promise: XccPromise;
  if (variant === PROMISE_VARIANT.base) {
    promise = { kind: 'base', descriptor: readDescriptor(reader) };
  } else if (variant === PROMISE_VARIANT.chained) {
    const base = readDescriptor(reader);
    const callback = readDescriptor(reader);
    promise = { kind: 'chained', chain: { base, callback } };
  } else {
    throw new CodecError(`Unknown promise variant: ${variant}`);
  }

  reader.finish();
  return { mode, promise };
}

function toExecutionMode(tag: number): ExecutionMode {
  switch (tag) {
    case ExecutionMode.Eager:
      return ExecutionMode.Eager;
    case ExecutionMode.Lazy:
      return ExecutionMode.Lazy;
    default:
      throw new CodecError(`Unknown execution mode: ${tag}`);
  }
}

/**
 * Pack the arguments of the engine's `call` method: run `input`
 * against the EVM contract at `target` with zero value.
 *
 * Layout: [u8 0][20-byte address][32-byte value, always zero][bytes input]
 */
export function encodeEvmCallArgs(target: Address, input: Uint8Array): Uint8Array {
  if (!isAddress(target, { strict: false })) {
    throw new CodecError(`Invalid EVM address: ${target}`);
  }
  return new BorshWriter()
    .u8(EVM_CALL_ARGS_V2)
    .fixed(hexToBytes(target))
    .fixed(new Uint8Array(32))
    .bytes(input)
    .toBytes();
}

/**
 * Read the entry count at the start of a result buffer
 */
export function readResultCount(reader: BorshReader): number {
  return reader.u32();
}

/**
 * Advance past one result entry without copying its output
 */
export function skipPromiseResult(reader: BorshReader): void {
  const tag = reader.u8();
  if (tag === PromiseResultTag.Successful) {
    reader.skipBytes();
  } else if (tag !== PromiseResultTag.NotReady && tag !== PromiseResultTag.Failed) {
    throw new CodecError(`Unknown promise result status: ${tag}`);
  }
}

/**
 * Fully decode one result entry
 */
export function decodePromiseResult(reader: BorshReader): PromiseResult {
  const tag = reader.u8();
  switch (tag) {
    case PromiseResultTag.NotReady:
      return { status: 'NotReady' };
    case PromiseResultTag.Successful:
      return { status: 'Successful', output: reader.bytes() };
    case PromiseResultTag.Failed:
      return { status: 'Failed' };
    default:
      throw new CodecError(`Unknown promise result status: ${tag}`);
  }
}

/**
 * Build a result buffer in the layout the host produces
 */
export function encodePromiseResults(results: readonly PromiseResult[]): Uint8Array {
  const writer = new BorshWriter().u32(results.length);
  for (const result of results) {
    writer.u8(PromiseResultTag[result.status]);
    if (result.status === 'Successful') {
      writer.bytes(result.output);
    }
  }
  return writer.toBytes();
}
