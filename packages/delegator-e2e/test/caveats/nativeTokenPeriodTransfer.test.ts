import { beforeEach, expect, test } from 'vitest';
import { NATIVE_TOKEN_ADDRESS, type Delegation } from '@caveatkit/delegation-core';
import {
  caveatEnforcerActions,
  createDelegation,
  type DelegatorAccount,
} from '@caveatkit/delegation-framework';

import { createScenario, redeem, signAs, type Scenario } from '../utils/helpers';

let scenario: Scenario;
let alice: DelegatorAccount;
let bob: DelegatorAccount;
let carol: DelegatorAccount;
let delegation: Delegation;

// 10 per 100 seconds, from the scenario's starting timestamp
const periodAmount = 10n;
const periodDuration = 100n;
const startDate = 1_000n;

beforeEach(() => {
  scenario = createScenario({ timestamp: startDate });
  alice = scenario.createSmartAccount();
  bob = scenario.createSmartAccount();
  carol = scenario.createSmartAccount();
  scenario.runtime.ledger.mint(NATIVE_TOKEN_ADDRESS, alice.address, 1_000n);

  delegation = signAs(
    alice,
    createDelegation({
      environment: scenario.environment,
      from: alice.address,
      to: bob.address,
      caveats: [
        {
          type: 'nativeTokenPeriodTransfer',
          config: { periodAmount, periodDuration, startDate },
        },
      ],
    }),
  );
});

const claim = (amount: bigint) =>
  redeem(scenario, bob.address, [
    {
      delegations: [delegation],
      executions: [{ target: carol.address, value: amount, callData: '0x' }],
    },
  ]);

const carolBalance = () =>
  scenario.runtime.ledger.balanceOf(NATIVE_TOKEN_ADDRESS, carol.address);

test('maincase: Bob claims the full period amount once per period', () => {
  claim(periodAmount);
  expect(carolBalance()).toBe(10n);

  expect(() => claim(1n)).toThrow(
    'NativeTokenPeriodTransferEnforcer:transfer-amount-exceeded',
  );

  scenario.clock.advance(periodDuration);
  claim(periodAmount);

  expect(carolBalance()).toBe(20n);
  expect(
    scenario.runtime.ledger.balanceOf(NATIVE_TOKEN_ADDRESS, alice.address),
  ).toBe(980n);
});

test('Bob claims the period amount in parts', () => {
  claim(4n);
  scenario.clock.advance(periodDuration - 1n);
  claim(6n);

  expect(carolBalance()).toBe(10n);
  expect(
    caveatEnforcerActions(scenario).getNativeTokenPeriodTransferEnforcerAvailableAmount({
      delegation,
    }),
  ).toEqual({ availableAmount: 0n, isNewPeriod: false, currentPeriod: 1n });
});

test('an unused allowance does not carry into the next period', () => {
  claim(2n);
  scenario.clock.advance(periodDuration);

  expect(() => claim(periodAmount + 1n)).toThrow(
    'NativeTokenPeriodTransferEnforcer:transfer-amount-exceeded',
  );
  expect(carolBalance()).toBe(2n);
});

test('Bob cannot claim before the start date', () => {
  scenario.clock.setTimestamp(startDate - 1n);

  expect(() => claim(1n)).toThrow(
    'NativeTokenPeriodTransferEnforcer:transfer-not-started',
  );
  expect(carolBalance()).toBe(0n);
});
