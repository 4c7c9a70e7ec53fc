import { concat, size, toHex, zeroAddress, type Address } from 'viem';
import { describe, expect, it } from 'vitest';

import {
  createMultiTokenPeriodArgs,
  createMultiTokenPeriodTerms,
  createNativeTokenPeriodTransferTerms,
  createNativeTokenStreamingTerms,
  createTokenPeriodTransferTerms,
  createTokenStreamingTerms,
  createTokenTransferAmountTerms,
  decodeMultiTokenPeriodTerms,
  decodeNativeTokenPeriodTransferTerms,
  decodeNativeTokenStreamingTerms,
  decodeTokenPeriodTransferTerms,
  decodeTokenStreamingTerms,
  decodeTokenTransferAmountTerms,
  isNativeTokenConfig,
} from '../../src';

const tokenAddress: Address = '0x2222222222222222222222222222222222222222';

const period = { periodAmount: 100n, periodDuration: 86400n, startDate: 1000n };

describe('period transfer terms', () => {
  it('encodes three words', () => {
    const terms = createNativeTokenPeriodTransferTerms(period);

    expect(terms).to.equal(
      concat([
        toHex(100n, { size: 32 }),
        toHex(86400n, { size: 32 }),
        toHex(1000n, { size: 32 }),
      ]),
    );
    expect(decodeNativeTokenPeriodTransferTerms(terms)).to.deep.equal(period);
  });

  it('prefixes token terms with the token', () => {
    const terms = createTokenPeriodTransferTerms({ ...period, tokenAddress });

    expect(size(terms)).to.equal(116);
    expect(decodeTokenPeriodTransferTerms(terms)).to.deep.equal({
      ...period,
      tokenAddress,
    });
  });

  it('rejects a zero duration', () => {
    expect(() =>
      createNativeTokenPeriodTransferTerms({ ...period, periodDuration: 0n }),
    ).to.throw('Invalid periodDuration: must be a positive number');
  });

  it('rejects signed terms with a zero duration', () => {
    const terms = concat([
      toHex(100n, { size: 32 }),
      toHex(0n, { size: 32 }),
      toHex(1000n, { size: 32 }),
    ]);

    expect(() => decodeNativeTokenPeriodTransferTerms(terms)).to.throw(
      'NativeTokenPeriodTransferEnforcer:invalid-zero-period-duration',
    );
  });

  it('rejects signed terms with a zero amount or start date', () => {
    const zeroAmount = concat([
      tokenAddress,
      toHex(0n, { size: 32 }),
      toHex(86400n, { size: 32 }),
      toHex(1000n, { size: 32 }),
    ]);
    const zeroStart = concat([
      tokenAddress,
      toHex(100n, { size: 32 }),
      toHex(86400n, { size: 32 }),
      toHex(0n, { size: 32 }),
    ]);

    expect(() => decodeTokenPeriodTransferTerms(zeroAmount)).to.throw(
      'TokenPeriodTransferEnforcer:invalid-zero-period-amount',
    );
    expect(() => decodeTokenPeriodTransferTerms(zeroStart)).to.throw(
      'TokenPeriodTransferEnforcer:invalid-zero-start-date',
    );
  });

  it('rejects native terms of the token width', () => {
    const terms = createTokenPeriodTransferTerms({ ...period, tokenAddress });

    expect(() => decodeNativeTokenPeriodTransferTerms(terms)).to.throw(
      'NativeTokenPeriodTransferEnforcer:invalid-terms-length',
    );
  });
});

describe('multi token period terms', () => {
  const tokenConfigs = [
    { ...period, tokenAddress: zeroAddress },
    { ...period, periodAmount: 5n, tokenAddress },
  ];

  it('concatenates one configuration per token', () => {
    const terms = createMultiTokenPeriodTerms({ tokenConfigs });

    expect(size(terms)).to.equal(232);
    expect(decodeMultiTokenPeriodTerms(terms)).to.deep.equal({ tokenConfigs });
  });

  it('rejects a partial configuration', () => {
    const terms = createMultiTokenPeriodTerms({ tokenConfigs });

    expect(() => decodeMultiTokenPeriodTerms(concat([terms, '0x00']))).to.throw(
      'MultiTokenPeriodEnforcer:invalid-terms-length',
    );
  });

  it('rejects a configuration with a zero duration', () => {
    const terms = concat([
      createMultiTokenPeriodTerms({ tokenConfigs }),
      tokenAddress,
      toHex(5n, { size: 32 }),
      toHex(0n, { size: 32 }),
      toHex(1000n, { size: 32 }),
    ]);

    expect(() => decodeMultiTokenPeriodTerms(terms)).to.throw(
      'MultiTokenPeriodEnforcer:invalid-zero-period-duration',
    );
  });

  it('selects a configuration through a 32 byte index', () => {
    expect(createMultiTokenPeriodArgs(1)).to.equal(toHex(1n, { size: 32 }));
  });

  it('recognises the native token configuration', () => {
    const [native, token] = tokenConfigs;

    expect(native && isNativeTokenConfig(native)).to.equal(true);
    expect(token && isNativeTokenConfig(token)).to.equal(false);
  });
});

describe('streaming terms', () => {
  const stream = {
    initialAmount: 10n,
    maxAmount: 100n,
    amountPerSecond: 1n,
    startTime: 1000n,
  };

  it('round trips', () => {
    const terms = createNativeTokenStreamingTerms(stream);

    expect(size(terms)).to.equal(128);
    expect(decodeNativeTokenStreamingTerms(terms)).to.deep.equal(stream);
  });

  it('round trips with a token', () => {
    const terms = createTokenStreamingTerms({ ...stream, tokenAddress });

    expect(size(terms)).to.equal(148);
    expect(decodeTokenStreamingTerms(terms)).to.deep.equal({
      ...stream,
      tokenAddress,
    });
  });

  it('rejects a maximum below the initial amount', () => {
    expect(() =>
      createNativeTokenStreamingTerms({ ...stream, maxAmount: 5n }),
    ).to.throw('Invalid maxAmount: must be greater than initialAmount');
  });
});

describe('token transfer amount terms', () => {
  it('round trips', () => {
    const terms = createTokenTransferAmountTerms({ tokenAddress, maxAmount: 7n });

    expect(terms).to.equal(concat([tokenAddress, toHex(7n, { size: 32 })]));
    expect(decodeTokenTransferAmountTerms(terms)).to.deep.equal({
      tokenAddress,
      maxAmount: 7n,
    });
  });
});
