import { build, buildForAuroraTarget } from '../src/xcc/builder';
import { encodeEvmCallArgs } from '../src/xcc/codec';
import { INITIALIZATION_TOP_UP, U128_MAX, U64_MAX } from '../src/xcc/constants';
import { AmountRangeError, FundingFailure } from '../src/xcc/errors';
import { Erc20FundingAsset } from '../src/xcc/funding';
import type { BridgeState } from '../src/xcc/types';
import { CONTRACT, InMemoryErc20, InMemoryHost, TOKEN, USER } from './helpers/in-memory-host';

const TEN_NEAR = 10_000_000_000_000_000_000_000_000n;
const GAS = 30_000_000_000_000n;
const ARGS = new TextEncoder().encode('{"receiver_id":"bob.near","amount":"1"}');

function setup(options: { allowance?: bigint; balance?: bigint } = {}) {
  const host = new InMemoryHost();
  const token: InMemoryErc20 = host.addToken(TOKEN);
  token.mint(USER, options.balance ?? TEN_NEAR);
  token.setAllowance(USER, CONTRACT, options.allowance ?? TEN_NEAR);
  const state: BridgeState = { initialized: false, fundingAsset: new Erc20FundingAsset(TOKEN) };
  return { host, token, state };
}

describe('build()', () => {
  it('should attach the top-up to the first call and mark the state initialized', async () => {
    const { host, token, state } = setup();

    const call = await build(host, state, 'alice.near', 'ft_transfer', ARGS, 0n, GAS);
    const { descriptor } = call.peek();

    expect(descriptor.attachedValue).toBe(2_000_000_000_000_000_000_000_000n);
    expect(descriptor.targetIdentity).toBe('alice.near');
    expect(descriptor.method).toBe('ft_transfer');
    expect(descriptor.args).toEqual(ARGS);
    expect(descriptor.gasAllowance).toBe(GAS);
    expect(state.initialized).toBe(true);

    expect(token.balanceOf(CONTRACT)).toBe(INITIALIZATION_TOP_UP);
    expect(token.balanceOf(USER)).toBe(TEN_NEAR - INITIALIZATION_TOP_UP);
  });

  it('should not add the top-up twice', async () => {
    const { host, token, state } = setup();

    await build(host, state, 'alice.near', 'ft_transfer', ARGS, 0n, GAS);
    const second = await build(host, state, 'alice.near', 'ft_transfer', ARGS, 5n, GAS);

    expect(second.peek().descriptor.attachedValue).toBe(5n);
    expect(token.balanceOf(CONTRACT)).toBe(INITIALIZATION_TOP_UP + 5n);
  });

  it('should add the top-up on top of the requested value', async () => {
    const { host, state } = setup();
    const call = await build(host, state, 'alice.near', 'ft_transfer', ARGS, 7n, GAS);
    expect(call.peek().descriptor.attachedValue).toBe(INITIALIZATION_TOP_UP + 7n);
  });

  it('should skip funding when nothing is attached', async () => {
    const { host, state } = setup();
    state.initialized = true;

    const call = await build(host, state, 'alice.near', 'ft_transfer', ARGS, 0n, GAS);

    expect(call.peek().descriptor.attachedValue).toBe(0n);
    expect(host.calls).toHaveLength(0);
  });

  it('should apply the top-up once across concurrent builds', async () => {
    const { host, state } = setup();

    const [first, second] = await Promise.all([
      build(host, state, 'alice.near', 'ft_transfer', ARGS, 1n, GAS),
      build(host, state, 'bob.near', 'ft_transfer', ARGS, 1n, GAS),
    ]);

    expect(first.peek().descriptor.attachedValue).toBe(INITIALIZATION_TOP_UP + 1n);
    expect(second.peek().descriptor.attachedValue).toBe(1n);
  });

  it('should return a frozen descriptor', async () => {
    const { host, state } = setup();
    const call = await build(host, state, 'alice.near', 'ft_transfer', ARGS, 0n, GAS);
    expect(Object.isFrozen(call.peek().descriptor)).toBe(true);
  });

  it('should keep its own copy of the argument bytes', async () => {
    const { host, state } = setup();
    const args = Uint8Array.of(1, 2, 3);

    const call = await build(host, state, 'alice.near', 'ft_transfer', args, 0n, GAS);
    args[0] = 99;

    expect(call.peek().descriptor.args).toEqual(Uint8Array.of(1, 2, 3));
  });

  it('should accept any target and method', async () => {
    const { host, state } = setup();
    state.initialized = true;
    const call = await build(host, state, '', 'not a method!', new Uint8Array(0), 0n, 0n);
    expect(call.peek().descriptor.targetIdentity).toBe('');
  });

  describe('funding failures', () => {
    it('should fail and roll back initialization without allowance', async () => {
      const { host, state, token } = setup({ allowance: 0n });

      const attempt = build(host, state, 'alice.near', 'ft_transfer', ARGS, 0n, GAS);
      await expect(attempt).rejects.toThrow(FundingFailure);
      await expect(attempt).rejects.toThrow('ERC20: insufficient allowance');

      expect(state.initialized).toBe(false);
      expect(token.balanceOf(CONTRACT)).toBe(0n);
    });

    it('should fail on insufficient balance', async () => {
      const { host, state } = setup({ balance: 1n });
      await expect(build(host, state, 'alice.near', 'ft_transfer', ARGS, 0n, GAS)).rejects.toThrow(
        'ERC20: transfer amount exceeds balance'
      );
    });

    it('should keep an initialized state initialized', async () => {
      const { host, state } = setup({ allowance: 0n });
      state.initialized = true;
      await expect(build(host, state, 'alice.near', 'ft_transfer', ARGS, 3n, GAS)).rejects.toThrow(FundingFailure);
      expect(state.initialized).toBe(true);
    });
  });

  describe('range checks', () => {
    it('should reject gas beyond u64', async () => {
      const { host, state } = setup();
      await expect(build(host, state, 'a.near', 'm', ARGS, 0n, U64_MAX + 1n)).rejects.toThrow(AmountRangeError);
      expect(state.initialized).toBe(false);
      expect(host.calls).toHaveLength(0);
    });

    it('should reject negative values', async () => {
      const { host, state } = setup();
      await expect(build(host, state, 'a.near', 'm', ARGS, -1n, GAS)).rejects.toThrow('value out of range');
    });

    it('should reject a top-up that overflows u128', async () => {
      const { host, state } = setup();
      await expect(build(host, state, 'a.near', 'm', ARGS, U128_MAX, GAS)).rejects.toThrow(AmountRangeError);
      expect(state.initialized).toBe(false);
    });
  });
});

describe('buildForAuroraTarget()', () => {
  it('should call the engine with packed EVM call arguments', async () => {
    const { host, state } = setup();
    state.initialized = true;
    const target = '0x4444444444444444444444444444444444444444';
    const input = Uint8Array.of(0xa9, 0x05, 0x9c, 0xbb);

    const call = await buildForAuroraTarget(host, state, target, input, 0n, 10_000_000_000_000n);
    const { descriptor } = call.peek();

    expect(descriptor.targetIdentity).toBe('aurora');
    expect(descriptor.method).toBe('call');
    expect(descriptor.args).toEqual(encodeEvmCallArgs(target, input));
    expect(descriptor.gasAllowance).toBe(10_000_000_000_000n);
  });

  it('should fund through build', async () => {
    const { host, state } = setup();
    const call = await buildForAuroraTarget(
      host,
      state,
      '0x4444444444444444444444444444444444444444',
      new Uint8Array(0),
      0n,
      1n
    );
    expect(call.peek().descriptor.attachedValue).toBe(INITIALIZATION_TOP_UP);
    expect(state.initialized).toBe(true);
  });
});
