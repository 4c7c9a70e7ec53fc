import { toHex } from 'viem';
import { describe, expect, it } from 'vitest';

import {
  createIdTerms,
  createLimitedCallsTerms,
  createNativeTokenTransferAmountTerms,
  createNonceTerms,
  createValueLteTerms,
  decodeIdTerms,
  decodeLimitedCallsTerms,
  decodeNativeTokenTransferAmountTerms,
  decodeNonceTerms,
  decodeValueLteTerms,
} from '../../src';

describe('single word terms', () => {
  it('encodes the value as a 32 byte word', () => {
    expect(createValueLteTerms({ maxValue: 10n })).to.equal(
      toHex(10n, { size: 32 }),
    );
    expect(createIdTerms({ id: 42n })).to.equal(toHex(42n, { size: 32 }));
  });

  it('decodes the word', () => {
    expect(decodeValueLteTerms(toHex(10n, { size: 32 }))).to.deep.equal({
      maxValue: 10n,
    });
    expect(decodeLimitedCallsTerms(createLimitedCallsTerms({ limit: 3n }))).to.deep.equal({
      limit: 3n,
    });
    expect(decodeIdTerms(createIdTerms({ id: 0n }))).to.deep.equal({ id: 0n });
    expect(decodeNonceTerms(createNonceTerms({ nonce: 9n }))).to.deep.equal({
      nonce: 9n,
    });
    expect(
      decodeNativeTokenTransferAmountTerms(
        createNativeTokenTransferAmountTerms({ maxAmount: 1000n }),
      ),
    ).to.deep.equal({ maxAmount: 1000n });
  });

  it('rejects terms one byte short or one byte long', () => {
    expect(() => decodeValueLteTerms(toHex(1n, { size: 31 }))).to.throw(
      'ValueLteEnforcer:invalid-terms-length',
    );
    expect(() => decodeValueLteTerms(toHex(1n, { size: 33 }))).to.throw(
      'ValueLteEnforcer:invalid-terms-length',
    );
  });

  it('rejects odd-length hex', () => {
    expect(() => decodeNonceTerms('0x123')).to.throw(
      'NonceEnforcer:invalid-terms-length',
    );
  });

  it('reports the enforcer it decodes for', () => {
    expect(() =>
      decodeLimitedCallsTerms('0x00', {
        enforcerName: 'RedeemerLimitedCallsEnforcer',
      }),
    ).to.throw('RedeemerLimitedCallsEnforcer:invalid-terms-length');
  });

  it('validates values when encoding', () => {
    expect(() => createValueLteTerms({ maxValue: -1n })).to.throw(
      'Invalid maxValue: must be zero or positive',
    );
    expect(() => createLimitedCallsTerms({ limit: 0n })).to.throw(
      'Invalid limit: must be a positive number',
    );
  });
});
