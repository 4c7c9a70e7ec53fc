import { beforeEach, describe, expect, test } from 'vitest';
import { BalanceChangeType, type Delegation } from '@caveatkit/delegation-core';
import {
  createDelegation,
  type DelegatorAccount,
  type TokenContract,
} from '@caveatkit/delegation-framework';

import {
  createScenario,
  redeem,
  signAs,
  transferCall,
  type Redemption,
  type Scenario,
} from '../utils/helpers';

let scenario: Scenario;
let alice: DelegatorAccount;
let bob: DelegatorAccount;
let tokenA: TokenContract;
let tokenB: TokenContract;

beforeEach(() => {
  scenario = createScenario();
  alice = scenario.createSmartAccount();
  bob = scenario.createSmartAccount();
  tokenA = scenario.deployToken('TKA');
  tokenB = scenario.deployToken('TKB');
  tokenA.mint(alice.address, 100n);
  tokenB.mint(bob.address, 10n);
});

/**
 * Alice lets Bob take TKA as long as her TKB balance changes as stated.
 */
const swapDelegation = (
  balance: bigint,
  { changeType = BalanceChangeType.Increase, salt = 0n } = {},
): Delegation =>
  signAs(
    alice,
    createDelegation({
      environment: scenario.environment,
      from: alice.address,
      to: bob.address,
      salt,
      caveats: [
        {
          type: 'tokenTotalBalanceChange',
          config: {
            changeType,
            tokenAddress: tokenB.address,
            recipient: alice.address,
            balance,
          },
        },
      ],
    }),
  );

const takeTokenA = (delegation: Delegation, amount: bigint): Redemption => ({
  delegations: [delegation],
  executions: [transferCall(tokenA, bob.address, amount)],
});

const payTokenB = (amount: bigint): Redemption => ({
  delegations: [],
  executions: [transferCall(tokenB, alice.address, amount)],
});

describe('one delegation', () => {
  test('maincase: Bob takes TKA and pays Alice the TKB she requires', () => {
    redeem(scenario, bob.address, [takeTokenA(swapDelegation(2n), 5n), payTokenB(2n)]);

    expect(tokenA.balanceOf(bob.address)).toBe(5n);
    expect(tokenB.balanceOf(alice.address)).toBe(2n);
  });

  test('Bob pays 1 TKB where 2 are required', () => {
    expect(() =>
      redeem(scenario, bob.address, [takeTokenA(swapDelegation(2n), 5n), payTokenB(1n)]),
    ).toThrow('TokenTotalBalanceChangeEnforcer:insufficient-balance-increase');

    expect(tokenA.balanceOf(alice.address)).toBe(100n);
    expect(tokenB.balanceOf(bob.address)).toBe(10n);
  });

  test('the balance is checked after every execution of the redemption', () => {
    expect(() =>
      redeem(scenario, bob.address, [payTokenB(2n), takeTokenA(swapDelegation(2n), 5n)]),
    ).not.toThrow();
    expect(tokenB.balanceOf(alice.address)).toBe(2n);
  });
});

describe('batched delegations', () => {
  test('two delegations requiring 1 TKB each are satisfied by 2 TKB', () => {
    redeem(scenario, bob.address, [
      takeTokenA(swapDelegation(1n), 5n),
      takeTokenA(swapDelegation(1n, { salt: 1n }), 5n),
      payTokenB(2n),
    ]);

    expect(tokenA.balanceOf(bob.address)).toBe(10n);
    expect(tokenB.balanceOf(alice.address)).toBe(2n);
  });

  test('two delegations requiring 1 TKB each are not satisfied by 1 TKB', () => {
    expect(() =>
      redeem(scenario, bob.address, [
        takeTokenA(swapDelegation(1n), 5n),
        takeTokenA(swapDelegation(1n, { salt: 1n }), 5n),
        payTokenB(1n),
      ]),
    ).toThrow('TokenTotalBalanceChangeEnforcer:insufficient-balance-increase');
    expect(tokenA.balanceOf(bob.address)).toBe(0n);
  });

  test('the same delegation redeemed twice counts twice', () => {
    const delegation = swapDelegation(1n);

    expect(() =>
      redeem(scenario, bob.address, [
        takeTokenA(delegation, 5n),
        takeTokenA(delegation, 5n),
        payTokenB(1n),
      ]),
    ).toThrow('TokenTotalBalanceChangeEnforcer:insufficient-balance-increase');
  });

  // Siblings are checked in aggregate: which execution paid is never attributed.
  test('one payment covers every sibling delegation', () => {
    redeem(scenario, bob.address, [
      takeTokenA(swapDelegation(2n), 5n),
      takeTokenA(swapDelegation(2n, { salt: 1n }), 5n),
      takeTokenA(swapDelegation(2n, { salt: 2n }), 5n),
      payTokenB(6n),
    ]);

    expect(tokenA.balanceOf(bob.address)).toBe(15n);
    expect(tokenB.balanceOf(alice.address)).toBe(6n);
  });

  test('an allowed decrease offsets a required increase on the same recipient', () => {
    redeem(scenario, bob.address, [
      takeTokenA(swapDelegation(3n), 5n),
      takeTokenA(swapDelegation(3n, { changeType: BalanceChangeType.Decrease, salt: 1n }), 5n),
    ]);

    expect(tokenA.balanceOf(bob.address)).toBe(10n);
    expect(tokenB.balanceOf(alice.address)).toBe(0n);
  });

  test('the tracker is cleared once the redemption is validated', () => {
    redeem(scenario, bob.address, [takeTokenA(swapDelegation(2n), 5n), payTokenB(2n)]);

    expect(
      scenario.enforcers.TokenTotalBalanceChangeEnforcer.balanceTracker(
        scenario.environment.DelegationManager,
        {
          changeType: BalanceChangeType.Increase,
          tokenAddress: tokenB.address,
          recipient: alice.address,
          balance: 2n,
        },
      ),
    ).toBeUndefined();
  });
});
