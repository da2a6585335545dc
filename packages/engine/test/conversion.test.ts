import { describe, expect, it } from 'vitest';

import { ADMIN, FEE_RECIPIENT, LP_PROVIDER, NEVER, SELLER, TOKEN, setupToken } from './helpers';

describe('royalty conversion', () => {
  it('swaps the royalty pool and forwards the proceeds once the threshold is met', async () => {
    const { token, pair, exchange, referenceAsset, events } = await setupToken({
      thresholds: { minRoyaltyToSwap: 50n, minLiquidityToSwap: NEVER },
    });

    const receipt = await token.transfer(SELLER, pair, 1_000n);

    expect(receipt.conversion).toEqual({
      pool: 'royalty',
      trigger: 'auto',
      tokensSwapped: 50n,
      referenceReceived: 49n,
      tokensDeposited: 0n,
      referenceDeposited: 0n,
      beneficiary: FEE_RECIPIENT,
    });
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 30n });
    expect(await token.balanceOf(TOKEN)).toBe(30n);
    expect(await referenceAsset.balanceOf(FEE_RECIPIENT)).toBe(49n);
    expect(await referenceAsset.balanceOf(TOKEN)).toBe(0n);
    expect(await exchange.getReserves(pair, TOKEN)).toEqual({ reserveToken: 100_050n, reserveReference: 99_951n });
    expect(token.conversionState()).toBe('idle');
    expect(events.map((event) => event.type)).toEqual([
      'Transfer',
      'FeesAccrued',
      'ConversionStarted',
      'Transfer',
      'ConversionFinished',
      'Transfer',
    ]);
  });

  it('does not convert below the threshold', async () => {
    const { token, pair } = await setupToken({ thresholds: { minRoyaltyToSwap: 51n, minLiquidityToSwap: NEVER } });

    const receipt = await token.transfer(SELLER, pair, 1_000n);

    expect(receipt.conversion).toBeNull();
    expect(token.pools()).toEqual({ royaltyPool: 50n, liquidityPool: 30n });
  });

  it('does not convert on buys or plain transfers', async () => {
    const { token, pair } = await setupToken({ thresholds: { minRoyaltyToSwap: 1n, minLiquidityToSwap: 2n } });
    await token.transfer(SELLER, pair, 1_000n);
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 30n });

    const receipt = await token.transfer(pair, SELLER, 1_000n);

    expect(receipt.side).toBe('buy');
    expect(receipt.conversion).toBeNull();
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 50n });
  });

  it('does not convert while swapping is disabled', async () => {
    const { token, pair } = await setupToken({
      thresholds: { minRoyaltyToSwap: 1n, minLiquidityToSwap: NEVER },
      conversion: { swapEnabled: false },
    });

    const receipt = await token.transfer(SELLER, pair, 1_000n);

    expect(receipt.conversion).toBeNull();
    expect(token.pools().royaltyPool).toBe(50n);
  });
});

describe('liquidity conversion', () => {
  async function withLiquidityPool() {
    const env = await setupToken({ rates: { sellRoyaltyBp: 0, sellLiquidityBp: 100, buyLiquidityBp: 0 } });
    await env.sell(SELLER, 10_000n);
    return env;
  }

  it('accrues through a sell on the exchange', async () => {
    const { token, pair, exchange, referenceAsset } = await withLiquidityPool();

    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 1_000n });
    expect(await referenceAsset.balanceOf(SELLER)).toBe(8_234n);
    expect(await exchange.getReserves(pair, TOKEN)).toEqual({ reserveToken: 109_000n, reserveReference: 91_766n });
  });

  it('swaps half the pool and deposits the rest with the proceeds', async () => {
    const { token, pair, exchange, referenceAsset } = await withLiquidityPool();
    await token.admin.setSwapThresholds(ADMIN, { minLiquidityToSwap: 500n });

    const receipt = await token.transfer(LP_PROVIDER, pair, 1n);

    expect(receipt.conversion).toEqual({
      pool: 'liquidity',
      trigger: 'auto',
      tokensSwapped: 500n,
      referenceReceived: 417n,
      tokensDeposited: 500n,
      referenceDeposited: 417n,
      beneficiary: TOKEN,
    });
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 0n });
    expect(await token.balanceOf(TOKEN)).toBe(0n);
    expect(await referenceAsset.balanceOf(TOKEN)).toBe(0n);
    expect(exchange.sharesOf(pair, TOKEN)).toBe(456n);
    expect(await exchange.getReserves(pair, TOKEN)).toEqual({ reserveToken: 110_000n, reserveReference: 91_766n });
  });

  it('credits the shares to the configured liquidity receiver', async () => {
    const { token, pair, exchange } = await withLiquidityPool();
    await token.admin.setLiquidityReceiver(ADMIN, FEE_RECIPIENT);
    await token.admin.setSwapThresholds(ADMIN, { minLiquidityToSwap: 500n });

    await token.transfer(LP_PROVIDER, pair, 1n);

    expect(exchange.sharesOf(pair, FEE_RECIPIENT)).toBe(456n);
    expect(exchange.sharesOf(pair, TOKEN)).toBe(0n);
  });

  it('needs at least two tokens in the pool', async () => {
    const { token, pair } = await setupToken({
      rates: { sellRoyaltyBp: 0, sellLiquidityBp: 100, buyLiquidityBp: 0 },
      thresholds: { minRoyaltyToSwap: 0n, minLiquidityToSwap: 0n },
    });

    const receipt = await token.transfer(SELLER, pair, 10n);

    expect(receipt.liquidityFee).toBe(1n);
    expect(receipt.conversion).toBeNull();
    expect(token.pools().liquidityPool).toBe(1n);
  });

  it('gives royalty priority when both pools are ready', async () => {
    const { token, pair } = await setupToken({ thresholds: { minRoyaltyToSwap: 50n, minLiquidityToSwap: 30n } });

    const receipt = await token.transfer(SELLER, pair, 1_000n);

    expect(receipt.conversion?.pool).toBe('royalty');
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 30n });
  });
});

describe('conversion failures', () => {
  it('aborts with NO_LIQUIDITY and reverts the whole transfer on an empty pair', async () => {
    const { token, pair, events } = await setupToken({
      seedPair: false,
      thresholds: { minRoyaltyToSwap: 1n, minLiquidityToSwap: NEVER },
    });

    await expect(token.transfer(SELLER, pair, 1_000n)).rejects.toMatchObject({ code: 'NO_LIQUIDITY', kind: 'external' });

    expect(await token.balanceOf(SELLER)).toBe(10_000n);
    expect(await token.balanceOf(TOKEN)).toBe(0n);
    expect(token.pools()).toEqual({ royaltyPool: 0n, liquidityPool: 0n });
    expect(token.conversionState()).toBe('idle');
    expect(events).toEqual([]);
  });

  it('refuses to convert when custody does not cover the pools', async () => {
    const { token, pair, ledger } = await setupToken();
    await token.transfer(SELLER, pair, 1_000n);
    // Balance removed behind the engine's back.
    await ledger.burn(TOKEN, 1n);

    await expect(token.admin.manualConvertRoyalty(ADMIN)).rejects.toMatchObject({ code: 'CUSTODY_SHORTFALL' });
    expect(token.pools()).toEqual({ royaltyPool: 50n, liquidityPool: 30n });
  });
});
