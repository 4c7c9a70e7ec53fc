import {
  createAllowedCalldataTerms,
  encodeSingleExecution,
} from '@caveatkit/delegation-core';
import { encodeFunctionData, pad, toHex } from 'viem';
import { describe, expect, it } from 'vitest';

import { getContractAddress } from '../../../src/environment';
import { counterAbi, createHookParams, createTestFramework } from '../../utils';

describe('AllowedCalldataEnforcer', () => {
  const { AllowedCalldataEnforcer: enforcer } = createTestFramework().enforcers;
  const executionCallData = encodeSingleExecution({
    target: getContractAddress('counter'),
    value: 0n,
    callData: encodeFunctionData({ abi: counterAbi, functionName: 'setCount', args: [5n] }),
  });

  it('should allow calldata holding the value at the index', () => {
    const terms = createAllowedCalldataTerms({
      startIndex: 4n,
      value: pad(toHex(5n), { size: 32 }),
    });

    expect(() =>
      enforcer.beforeHook(createHookParams({ terms, executionCallData })),
    ).to.not.throw();
  });

  it('should reject a different value', () => {
    const terms = createAllowedCalldataTerms({
      startIndex: 4n,
      value: pad(toHex(6n), { size: 32 }),
    });

    expect(() => enforcer.beforeHook(createHookParams({ terms, executionCallData }))).to.throw(
      'AllowedCalldataEnforcer:invalid-calldata',
    );
  });

  it('should reject calldata too short for the range', () => {
    const terms = createAllowedCalldataTerms({
      startIndex: 10n,
      value: pad(toHex(5n), { size: 32 }),
    });

    expect(() => enforcer.beforeHook(createHookParams({ terms, executionCallData }))).to.throw(
      'AllowedCalldataEnforcer:invalid-calldata-length',
    );
  });

  it('should decode its terms', () => {
    expect(
      enforcer.getTermsInfo(createAllowedCalldataTerms({ startIndex: 1n, value: '0xabcd' })),
    ).to.deep.equal({ startIndex: 1n, value: '0xabcd' });
  });
});
