import { beforeEach, describe, expect, test } from 'vitest';
import {
  ExecutionMode,
  NATIVE_TOKEN_ADDRESS,
  encodeDelegations,
  encodeSingleExecution,
  type Delegation,
} from '@caveatkit/delegation-core';
import {
  createDelegation,
  createOpenDelegation,
  delegationManagerAbi,
  type DelegatorAccount,
} from '@caveatkit/delegation-framework';
import { encodeFunctionData } from 'viem';

import {
  createScenario,
  deployCounter,
  incrementCall,
  redeem,
  setCountCall,
  signAs,
  type CounterContract,
  type Scenario,
} from './utils/helpers';

let scenario: Scenario;
let alice: DelegatorAccount;
let bob: DelegatorAccount;
let carol: DelegatorAccount;
let aliceCounter: CounterContract;

beforeEach(() => {
  scenario = createScenario();
  alice = scenario.createSmartAccount();
  bob = scenario.createSmartAccount();
  carol = scenario.createSmartAccount();
  aliceCounter = deployCounter(scenario, alice.address);
});

const counterDelegation = (): Delegation =>
  signAs(
    alice,
    createDelegation({
      environment: scenario.environment,
      from: alice.address,
      to: bob.address,
      caveats: [
        { type: 'allowedTargets', config: { targets: [aliceCounter.address] } },
      ],
    }),
  );

describe('root delegation', () => {
  test('maincase: Bob redeems a delegation to set the counter of Alice', () => {
    redeem(scenario, bob.address, [
      { delegations: [counterDelegation()], executions: [setCountCall(aliceCounter, 7n)] },
    ]);

    expect(aliceCounter.count).toBe(7n);
  });

  test('Bob cannot change the counter of Alice without a delegation', () => {
    expect(() =>
      redeem(scenario, bob.address, [
        { delegations: [], executions: [setCountCall(aliceCounter, 7n)] },
      ]),
    ).toThrow('Counter:not-owner');
  });

  test('Carol cannot redeem a delegation made to Bob', () => {
    expect(() =>
      redeem(scenario, carol.address, [
        { delegations: [counterDelegation()], executions: [incrementCall(aliceCounter)] },
      ]),
    ).toThrow('DelegationManager:InvalidDelegate');
  });

  test('a delegation signed by someone other than the delegator is rejected', () => {
    const unsigned = createDelegation({
      environment: scenario.environment,
      from: alice.address,
      to: bob.address,
      caveats: [
        { type: 'allowedTargets', config: { targets: [aliceCounter.address] } },
      ],
    });

    expect(() =>
      redeem(scenario, bob.address, [
        {
          delegations: [signAs(bob, unsigned)],
          executions: [incrementCall(aliceCounter)],
        },
      ]),
    ).toThrow('DelegationManager:InvalidSignature');
    expect(aliceCounter.count).toBe(0n);
  });

  test('a caveat rejects executions outside the delegated scope', () => {
    const bobCounter = deployCounter(scenario, bob.address);

    expect(() =>
      redeem(scenario, bob.address, [
        { delegations: [counterDelegation()], executions: [incrementCall(bobCounter)] },
      ]),
    ).toThrow('AllowedTargetsEnforcer:target-address-not-allowed');
  });

  test('Bob redeems a batch of executions', () => {
    const delegation = signAs(
      alice,
      createDelegation({
        environment: scenario.environment,
        from: alice.address,
        to: bob.address,
        caveats: [{ type: 'limitedCalls', config: { limit: 1n } }],
      }),
    );

    redeem(scenario, bob.address, [
      {
        delegations: [delegation],
        executions: [
          setCountCall(aliceCounter, 10n),
          incrementCall(aliceCounter),
          incrementCall(aliceCounter),
        ],
      },
    ]);

    expect(aliceCounter.count).toBe(12n);
  });

  test('Bob moves native value held by Alice', () => {
    const { ledger } = scenario.runtime;
    ledger.mint(NATIVE_TOKEN_ADDRESS, alice.address, 100n);
    const delegation = signAs(
      alice,
      createDelegation({
        environment: scenario.environment,
        from: alice.address,
        to: bob.address,
        caveats: [{ type: 'nativeTokenTransferAmount', config: { maxAmount: 30n } }],
      }),
    );

    redeem(scenario, bob.address, [
      {
        delegations: [delegation],
        executions: [{ target: carol.address, value: 25n, callData: '0x' }],
      },
    ]);

    expect(ledger.balanceOf(NATIVE_TOKEN_ADDRESS, alice.address)).toBe(75n);
    expect(ledger.balanceOf(NATIVE_TOKEN_ADDRESS, carol.address)).toBe(25n);
    expect(() =>
      redeem(scenario, bob.address, [
        {
          delegations: [delegation],
          executions: [{ target: carol.address, value: 6n, callData: '0x' }],
        },
      ]),
    ).toThrow('NativeTokenTransferAmountEnforcer:allowance-exceeded');
  });
});

describe('delegation chain', () => {
  test('maincase: Carol redeems a delegation Bob redelegated to her', () => {
    const root = counterDelegation();
    const leaf = signAs(
      bob,
      createDelegation({
        environment: scenario.environment,
        from: bob.address,
        to: carol.address,
        parentDelegation: root,
        caveats: [{ type: 'limitedCalls', config: { limit: 1n } }],
      }),
    );

    redeem(scenario, carol.address, [
      { delegations: [leaf, root], executions: [setCountCall(aliceCounter, 3n)] },
    ]);

    expect(aliceCounter.count).toBe(3n);
    expect(() =>
      redeem(scenario, carol.address, [
        { delegations: [leaf, root], executions: [setCountCall(aliceCounter, 4n)] },
      ]),
    ).toThrow('LimitedCallsEnforcer:limit-exceeded');
    expect(aliceCounter.count).toBe(3n);
  });

  test('a redelegation can narrow but not widen the authority', () => {
    const root = counterDelegation();
    const leaf = signAs(
      bob,
      createDelegation({
        environment: scenario.environment,
        from: bob.address,
        to: carol.address,
        parentDelegation: root,
        caveats: [
          { type: 'allowedMethods', config: { selectors: ['increment()'] } },
        ],
      }),
    );
    const bobCounter = deployCounter(scenario, bob.address);

    redeem(scenario, carol.address, [
      { delegations: [leaf, root], executions: [incrementCall(aliceCounter)] },
    ]);

    expect(aliceCounter.count).toBe(1n);
    expect(() =>
      redeem(scenario, carol.address, [
        { delegations: [leaf, root], executions: [setCountCall(aliceCounter, 9n)] },
      ]),
    ).toThrow('AllowedMethodsEnforcer:method-not-allowed');
    expect(() =>
      redeem(scenario, carol.address, [
        { delegations: [leaf, root], executions: [incrementCall(bobCounter)] },
      ]),
    ).toThrow('AllowedTargetsEnforcer:target-address-not-allowed');
  });

  test('a chain with a missing link is rejected', () => {
    const root = counterDelegation();
    const leaf = signAs(
      bob,
      createDelegation({
        environment: scenario.environment,
        from: bob.address,
        to: carol.address,
        parentDelegation: root,
        caveats: [{ type: 'limitedCalls', config: { limit: 1n } }],
      }),
    );

    expect(() =>
      redeem(scenario, carol.address, [
        { delegations: [leaf], executions: [incrementCall(aliceCounter)] },
      ]),
    ).toThrow('DelegationManager:InvalidAuthority');
  });
});

describe('open delegation', () => {
  test('anyone can redeem an open delegation', () => {
    const delegation = signAs(
      alice,
      createOpenDelegation({
        environment: scenario.environment,
        from: alice.address,
        caveats: [
          { type: 'allowedTargets', config: { targets: [aliceCounter.address] } },
        ],
      }),
    );

    redeem(scenario, carol.address, [
      { delegations: [delegation], executions: [incrementCall(aliceCounter)] },
    ]);
    redeem(scenario, bob.address, [
      { delegations: [delegation], executions: [incrementCall(aliceCounter)] },
    ]);

    expect(aliceCounter.count).toBe(2n);
  });
});

describe('redeemDelegations call', () => {
  test('Bob redeems by calling the delegation manager with encoded arguments', () => {
    scenario.runtime.call({
      from: bob.address,
      to: scenario.environment.DelegationManager,
      value: 0n,
      data: encodeFunctionData({
        abi: delegationManagerAbi,
        functionName: 'redeemDelegations',
        args: [
          [encodeDelegations([counterDelegation()])],
          [ExecutionMode.SingleDefault],
          [encodeSingleExecution(setCountCall(aliceCounter, 5n))],
        ],
      }),
    });

    expect(aliceCounter.count).toBe(5n);
  });
});
