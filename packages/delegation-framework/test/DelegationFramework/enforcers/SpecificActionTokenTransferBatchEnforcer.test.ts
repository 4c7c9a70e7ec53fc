import {
  ExecutionMode,
  createSpecificActionTokenTransferBatchTerms,
  encodeBatchExecution,
  type ExecutionStruct,
} from '@caveatkit/delegation-core';
import { encodeFunctionData, erc20Abi, keccak256, toHex } from 'viem';
import { beforeEach, describe, expect, it } from 'vitest';

import type { SpecificActionTokenTransferBatchEnforcer } from '../../../src/DelegationFramework/enforcers';
import { getContractAddress } from '../../../src/environment';
import { counterAbi, createHookParams, createTestFramework } from '../../utils';

describe('SpecificActionTokenTransferBatchEnforcer', () => {
  const manager = getContractAddress('DelegationManager');
  const delegationHash = keccak256(toHex('delegation'));
  const counter = getContractAddress('counter');
  const token = getContractAddress('token');
  const carol = getContractAddress('account:carol');

  const action: ExecutionStruct = {
    target: counter,
    value: 0n,
    callData: encodeFunctionData({ abi: counterAbi, functionName: 'setCount', args: [1n] }),
  };
  const transfer = (amount: bigint): ExecutionStruct => ({
    target: token,
    value: 0n,
    callData: encodeFunctionData({ abi: erc20Abi, functionName: 'transfer', args: [carol, amount] }),
  });
  const terms = createSpecificActionTokenTransferBatchTerms({
    tokenAddress: token,
    recipient: carol,
    amount: 10n,
    target: counter,
    callData: action.callData,
  });
  const batch = (executions: ExecutionStruct[]) =>
    createHookParams({
      terms,
      mode: ExecutionMode.BatchDefault,
      executionCallData: encodeBatchExecution(executions),
    });

  let enforcer: SpecificActionTokenTransferBatchEnforcer;

  beforeEach(() => {
    enforcer = createTestFramework().enforcers.SpecificActionTokenTransferBatchEnforcer;
  });

  it('should allow the action and transfer once', () => {
    enforcer.beforeHook(batch([action, transfer(10n)]));

    expect(enforcer.usedDelegations(manager, delegationHash)).to.equal(true);
    expect(() => enforcer.beforeHook(batch([action, transfer(10n)]))).to.throw(
      'SpecificActionTokenTransferBatchEnforcer:delegation-already-used',
    );
  });

  it('should require a batch of two', () => {
    expect(() => enforcer.beforeHook(batch([action]))).to.throw(
      'SpecificActionTokenTransferBatchEnforcer:invalid-batch-size',
    );
  });

  it('should reject a different first call', () => {
    expect(() =>
      enforcer.beforeHook(batch([{ ...action, value: 1n }, transfer(10n)])),
    ).to.throw('SpecificActionTokenTransferBatchEnforcer:invalid-first-transaction');
  });

  it('should reject a transfer of another amount', () => {
    expect(() => enforcer.beforeHook(batch([action, transfer(11n)]))).to.throw(
      'SpecificActionTokenTransferBatchEnforcer:invalid-second-transaction',
    );
    expect(enforcer.usedDelegations(manager, delegationHash)).to.equal(false);
  });

  it('should reject single call types', () => {
    expect(() => enforcer.beforeHook(createHookParams({ terms }))).to.throw(
      'CaveatEnforcer:invalid-call-type',
    );
  });

  it('should decode its terms', () => {
    expect(enforcer.getTermsInfo(terms)).to.deep.equal({
      tokenAddress: token,
      recipient: carol,
      amount: 10n,
      target: counter,
      callData: action.callData,
    });
  });
});
