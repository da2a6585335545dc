import { describe, expect, it } from 'vitest';

import { EngineError } from '../src/errors';
import { ADMIN, BUYER, LP_PROVIDER, OTHER, SELLER, TOKEN, setupToken } from './helpers';

describe('TransferInterceptor', () => {
  it('takes royalty and liquidity fees on a sell and settles the rest', async () => {
    const { token, pair } = await setupToken();

    const receipt = await token.transfer(SELLER, pair, 1_000n);

    expect(receipt).toEqual({
      side: 'sell',
      taxed: true,
      royaltyFee: 50n,
      liquidityFee: 30n,
      totalFee: 80n,
      netAmount: 920n,
      conversion: null,
    });
    expect(await token.balanceOf(SELLER)).toBe(9_000n);
    expect(await token.balanceOf(TOKEN)).toBe(80n);
    expect(await token.balanceOf(pair)).toBe(100_920n);
    expect(token.pools()).toEqual({ royaltyPool: 50n, liquidityPool: 30n });
  });

  it('charges only the liquidity fee on a buy', async () => {
    const { token, pair } = await setupToken();
    // Tokens sitting in the pair stand in for the output of a buy.
    await token.transfer(pair, BUYER, 1_000n);

    expect(await token.balanceOf(BUYER)).toBe(980n);
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 20n });
  });

  it('leaves wallet-to-wallet transfers untaxed', async () => {
    const { token, events } = await setupToken();

    const receipt = await token.transfer(SELLER, OTHER, 1_000n);

    expect(receipt.side).toBe('transfer');
    expect(receipt.totalFee).toBe(0n);
    expect(await token.balanceOf(OTHER)).toBe(1_000n);
    expect(events).toEqual([{ type: 'Transfer', from: SELLER, to: OTHER, amount: 1_000n }]);
  });

  it('skips fees when either side is exempt', async () => {
    const { token, pair } = await setupToken();
    await token.admin.setFeeExempt(ADMIN, SELLER, true);

    const receipt = await token.transfer(SELLER, pair, 1_000n);

    expect(receipt.taxed).toBe(false);
    expect(receipt.netAmount).toBe(1_000n);
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 0n });
  });

  it('emits fee custody, accrual and settlement events in order', async () => {
    const { token, pair, events } = await setupToken();

    await token.transfer(SELLER, pair, 1_000n);

    expect(events).toEqual([
      { type: 'Transfer', from: SELLER, to: TOKEN, amount: 80n },
      { type: 'FeesAccrued', from: SELLER, to: pair, side: 'sell', royaltyFee: 50n, liquidityFee: 30n },
      { type: 'Transfer', from: SELLER, to: pair, amount: 920n },
    ]);
  });

  it('rejects transfers from or to a denied account before touching balances', async () => {
    const { token, pair } = await setupToken();
    await token.admin.setDenied(ADMIN, SELLER, true);

    await expect(token.transfer(SELLER, pair, 1_000n)).rejects.toMatchObject({ code: 'DENIED' });
    await expect(token.transfer(LP_PROVIDER, SELLER, 1n)).rejects.toMatchObject({ code: 'DENIED' });
    expect(await token.balanceOf(SELLER)).toBe(10_000n);
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 0n });
  });

  it('validates addresses and amounts', async () => {
    const { token, pair } = await setupToken();

    await expect(token.transfer('0x0000000000000000000000000000000000000000', pair, 1n)).rejects.toMatchObject({
      code: 'ZERO_ADDRESS',
    });
    await expect(token.transfer(SELLER, 'not-an-address', 1n)).rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
    await expect(token.transfer(SELLER, pair, 0n)).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
  });

  it('rejects a transfer above the sender balance', async () => {
    const { token, pair } = await setupToken();

    const error = await token.transfer(SELLER, pair, 10_001n).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(EngineError);
    expect(error).toMatchObject({ code: 'INSUFFICIENT_BALANCE', kind: 'precondition' });
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 0n });
  });

  it('will not send accrued fees out of the engine', async () => {
    const { token, pair, events } = await setupToken();
    await token.transfer(SELLER, pair, 1_000n);
    events.length = 0;

    await expect(token.transfer(TOKEN, OTHER, 80n)).rejects.toMatchObject({
      code: 'CUSTODY_SHORTFALL',
      kind: 'invariant',
      message: 'sending 80 would leave 0 against pools of 80',
    });
    await expect(token.transfer(TOKEN, OTHER, 1n)).rejects.toMatchObject({ code: 'CUSTODY_SHORTFALL' });

    expect(await token.balanceOf(TOKEN)).toBe(80n);
    expect(await token.balanceOf(OTHER)).toBe(0n);
    expect(token.pools()).toEqual({ royaltyPool: 50n, liquidityPool: 30n });
    expect(events).toEqual([]);
  });

  it('lets the engine send what it holds above its pools', async () => {
    const { token, pair } = await setupToken();
    await token.transfer(SELLER, pair, 1_000n);
    // The engine is exempt, so this lands untaxed as surplus.
    await token.transfer(SELLER, TOKEN, 100n);

    const receipt = await token.transfer(TOKEN, OTHER, 100n);

    expect(receipt).toMatchObject({ side: 'transfer', taxed: false, netAmount: 100n });
    expect(await token.balanceOf(TOKEN)).toBe(80n);
    expect(await token.balanceOf(OTHER)).toBe(100n);
    await expect(token.transfer(TOKEN, OTHER, 1n)).rejects.toMatchObject({ code: 'CUSTODY_SHORTFALL' });
  });

  it('charges nothing on dust too small for the rate', async () => {
    const { token, pair } = await setupToken();

    const receipt = await token.transfer(SELLER, pair, 19n);

    expect(receipt.taxed).toBe(true);
    expect(receipt.totalFee).toBe(0n);
    expect(receipt.netAmount).toBe(19n);
  });
});
