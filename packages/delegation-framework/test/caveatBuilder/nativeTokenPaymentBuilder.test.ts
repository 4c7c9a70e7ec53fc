import {
  ROOT_AUTHORITY,
  decodeDelegations,
  type Delegation,
} from '@caveatkit/delegation-core';
import { concat, pad, toHex } from 'viem';
import { expect, describe, it } from 'vitest';

import { nativeTokenPaymentBuilder } from '../../src/caveatBuilder/nativeTokenPaymentBuilder';
import { getContractAddress } from '../../src/environment';
import { createTestFramework } from '../utils';

describe('nativeTokenPaymentBuilder()', () => {
  const { environment } = createTestFramework();
  const recipient = getContractAddress('account:carol');

  it('should leave the args empty for the redeemer to fill in', () => {
    expect(
      nativeTokenPaymentBuilder(environment, { recipient, amount: 5n }),
    ).to.deep.equal({
      enforcer: getContractAddress('NativeTokenPaymentEnforcer'),
      terms: concat([recipient, pad(toHex(5n), { size: 32 })]),
      args: '0x',
    });
  });

  it('should encode allowance delegations as args', () => {
    const allowance: Delegation = {
      delegate: getContractAddress('NativeTokenPaymentEnforcer'),
      delegator: getContractAddress('account:bob'),
      authority: ROOT_AUTHORITY,
      caveats: [],
      salt: 0n,
      signature: '0x1234',
    };

    const caveat = nativeTokenPaymentBuilder(environment, {
      recipient,
      amount: 5n,
      allowanceDelegations: [allowance],
    });

    expect(decodeDelegations(caveat.args)).to.deep.equal([allowance]);
  });

  it('should fail with a zero amount', () => {
    expect(() =>
      nativeTokenPaymentBuilder(environment, { recipient, amount: 0n }),
    ).to.throw('Invalid amount: must be a positive number');
  });
});
