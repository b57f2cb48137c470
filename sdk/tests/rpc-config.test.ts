import { createRpcExecutionContext } from '../src/network/rpc-context';

describe('createRpcExecutionContext()', () => {
  const saved = { ...process.env };

  afterAll(() => {
    process.env = saved;
  });

  it('should take addresses from the environment', () => {
    process.env.AURORA_RPC_URL = 'http://localhost:9545';
    process.env.XCC_CONTRACT_ADDRESS = '0x5b38da6a701c568545dcfcb03fcb875f56beddc4';
    process.env.XCC_SENDER_ADDRESS = '0x000000000000000000000000000000000000dead';

    const ctx = createRpcExecutionContext();

    expect(ctx.self).toBe('0x5B38Da6a701c568545dCfcB03FcB875f56beddC4');
    expect(ctx.sender).toBe('0x000000000000000000000000000000000000dEaD');
  });
});
