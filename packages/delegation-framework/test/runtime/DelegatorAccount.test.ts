import {
  ExecutionMode,
  NATIVE_TOKEN_ADDRESS,
  ROOT_AUTHORITY,
  createExecution,
  encodeBatchExecution,
  encodeSingleExecution,
  hashDelegation,
  type Delegation,
} from '@caveatkit/delegation-core';
import { encodeFunctionData, pad } from 'viem';
import { expect, describe, it, beforeEach } from 'vitest';

import { getContractAddress } from '../../src/environment';
import type { DelegatorAccount } from '../../src/runtime/DelegatorAccount';
import { AccountSignatureVerifier } from '../../src/runtime/SignatureVerifier';
import {
  counterAbi,
  createAccount,
  createTestFramework,
  createTestSigner,
  deployCounter,
  type CounterContract,
  type TestFramework,
} from '../utils';

describe('createTestSigner()', () => {
  it('should verify its own signatures only', () => {
    const signer = createTestSigner('test-secret');
    const other = createTestSigner('other-secret');
    const hash = hashDelegation({
      delegate: getContractAddress('account:bob'),
      delegator: getContractAddress('account:alice'),
      authority: ROOT_AUTHORITY,
      caveats: [],
      salt: 0n,
      signature: '0x',
    });

    expect(signer.verify(hash, signer.sign(hash))).to.equal(true);
    expect(signer.verify(hash, other.sign(hash))).to.equal(false);
  });
});

describe('DelegatorAccount', () => {
  let framework: TestFramework;
  let alice: DelegatorAccount;
  let counter: CounterContract;

  const setCount = (count: bigint) =>
    createExecution({
      target: counter.address,
      callData: encodeFunctionData({ abi: counterAbi, functionName: 'setCount', args: [count] }),
    });

  const fail = () =>
    createExecution({
      target: counter.address,
      callData: encodeFunctionData({ abi: counterAbi, functionName: 'fail' }),
    });

  beforeEach(() => {
    framework = createTestFramework();
    alice = createAccount(framework, 'alice');
    counter = deployCounter(framework.runtime);
  });

  describe('signDelegation()', () => {
    it('should sign the delegation hash', () => {
      const delegation: Delegation = {
        delegate: getContractAddress('account:bob'),
        delegator: alice.address,
        authority: ROOT_AUTHORITY,
        caveats: [],
        salt: 1n,
        signature: '0x',
      };

      const signature = alice.signDelegation(delegation);

      expect(alice.isValidSignature(hashDelegation(delegation), signature)).to.equal(true);
      expect(
        alice.isValidSignature(hashDelegation({ ...delegation, salt: 2n }), signature),
      ).to.equal(false);
    });
  });

  describe('executeFromExecutor()', () => {
    it('should only accept the delegation manager', () => {
      expect(() =>
        alice.executeFromExecutor(
          getContractAddress('account:mallory'),
          ExecutionMode.SingleDefault,
          encodeSingleExecution(setCount(1n)),
        ),
      ).to.throw('DelegatorAccount:NotDelegationManager');
    });

    it('should execute for the delegation manager', () => {
      alice.executeFromExecutor(
        framework.environment.DelegationManager,
        ExecutionMode.SingleDefault,
        encodeSingleExecution(setCount(5n)),
      );

      expect(counter.count).to.equal(5n);
    });
  });

  describe('execute()', () => {
    it('should run a batch in order', () => {
      alice.execute(
        ExecutionMode.BatchDefault,
        encodeBatchExecution([setCount(1n), setCount(2n)]),
      );

      expect(counter.count).to.equal(2n);
    });

    it('should send native value from the account', () => {
      const bob = getContractAddress('account:bob');
      framework.runtime.ledger.mint(NATIVE_TOKEN_ADDRESS, alice.address, 10n);

      alice.execute(
        ExecutionMode.SingleDefault,
        encodeSingleExecution(createExecution({ target: bob, value: 7n })),
      );

      expect(framework.runtime.ledger.balanceOf(NATIVE_TOKEN_ADDRESS, alice.address)).to.equal(
        3n,
      );
      expect(framework.runtime.ledger.balanceOf(NATIVE_TOKEN_ADDRESS, bob)).to.equal(7n);
    });

    it('should propagate failures in default mode', () => {
      expect(() =>
        alice.execute(ExecutionMode.BatchDefault, encodeBatchExecution([setCount(1n), fail()])),
      ).to.throw('Counter:failed');
    });

    it('should skip failed executions in try mode', () => {
      const results = alice.execute(
        ExecutionMode.BatchTry,
        encodeBatchExecution([setCount(1n), fail(), setCount(3n)]),
      );

      expect(results).to.deep.equal(['0x', '0x', '0x']);
      expect(counter.count).to.equal(3n);
    });

    it('should undo a failed try execution', () => {
      framework.runtime.ledger.mint(NATIVE_TOKEN_ADDRESS, alice.address, 10n);

      alice.execute(
        ExecutionMode.SingleTry,
        encodeSingleExecution({ ...fail(), value: 4n }),
      );

      expect(framework.runtime.ledger.balanceOf(NATIVE_TOKEN_ADDRESS, alice.address)).to.equal(
        10n,
      );
    });

    it('should refuse unsupported call types', () => {
      expect(() =>
        alice.execute(pad('0xff', { size: 32, dir: 'right' }), encodeSingleExecution(setCount(1n))),
      ).to.throw('DelegatorAccount:UnsupportedCallType');
    });

    it('should refuse unsupported exec types', () => {
      expect(() =>
        alice.execute(pad('0x0002', { size: 32, dir: 'right' }), encodeSingleExecution(setCount(1n))),
      ).to.throw('DelegatorAccount:UnsupportedExecType');
    });
  });

  describe('call()', () => {
    it('should accept plain transfers only', () => {
      expect(
        alice.call({ from: counter.address, to: alice.address, value: 0n, data: '0x' }),
      ).to.equal('0x');
      expect(() =>
        alice.call({ from: counter.address, to: alice.address, value: 0n, data: '0x1234' }),
      ).to.throw('DelegatorAccount:UnsupportedFunction');
    });
  });
});

describe('AccountSignatureVerifier', () => {
  it('should ask the principal account to validate the signature', () => {
    const framework = createTestFramework();
    const alice = createAccount(framework, 'alice');
    const verifier = new AccountSignatureVerifier(framework.runtime);
    const hash = pad('0x01', { size: 32 });

    expect(verifier.verify(alice.address, hash, createTestSigner('test-secret-alice').sign(hash))).to.equal(
      true,
    );
    expect(verifier.verify(alice.address, hash, '0x')).to.equal(false);
  });

  it('should reject principals without an account', () => {
    const framework = createTestFramework();
    const verifier = new AccountSignatureVerifier(framework.runtime);
    const hash = pad('0x01', { size: 32 });

    expect(
      verifier.verify(getContractAddress('account:nobody'), hash, createTestSigner('x').sign(hash)),
    ).to.equal(false);
    expect(verifier.verify(framework.environment.DelegationManager, hash, '0x')).to.equal(false);
  });
});
