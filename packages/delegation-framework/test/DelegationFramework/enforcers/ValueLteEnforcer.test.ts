import { createValueLteTerms, encodeSingleExecution } from '@caveatkit/delegation-core';
import { describe, expect, it } from 'vitest';

import { getContractAddress } from '../../../src/environment';
import { createHookParams, createTestFramework } from '../../utils';

describe('ValueLteEnforcer', () => {
  const { ValueLteEnforcer: enforcer } = createTestFramework().enforcers;
  const terms = createValueLteTerms({ maxValue: 10n });
  const withValue = (value: bigint) =>
    createHookParams({
      terms,
      executionCallData: encodeSingleExecution({
        target: getContractAddress('target'),
        value,
        callData: '0x',
      }),
    });

  it('should allow a value up to the maximum', () => {
    expect(() => enforcer.beforeHook(withValue(10n))).to.not.throw();
  });

  it('should reject a value above the maximum', () => {
    expect(() => enforcer.beforeHook(withValue(11n))).to.throw(
      'ValueLteEnforcer:value-too-high',
    );
  });

  it('should decode its terms', () => {
    expect(enforcer.getTermsInfo(terms)).to.deep.equal({ maxValue: 10n });
  });
});
