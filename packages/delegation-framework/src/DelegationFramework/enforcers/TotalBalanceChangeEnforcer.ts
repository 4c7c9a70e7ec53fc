import {
  BalanceChangeType,
  checkedAdd,
  checkedSub,
  type Address,
  type NativeBalanceChangeTerms,
} from '@caveatkit/delegation-core';

import type { StateKeyPart, StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

export type BalanceTracker = {
  balanceBefore: bigint;
  expectedIncrease: bigint;
  expectedDecrease: bigint;
  validationRemaining: bigint;
};

/**
 * Aggregating balance change check. Every caveat tracking the same recipient
 * and asset within one redemption shares a tracker: the balance is
 * snapshotted on first use, each `beforeAllHook` adds its expected change and
 * each `afterAllHook` counts down. Only the last `afterAllHook` compares the
 * balance against the net expected change and clears the tracker.
 *
 * Caveats sharing a tracker are validated in aggregate, not per delegation:
 * which execution moved the balance is not checked, and increase and decrease
 * expectations on the same recipient net out. Callers that need a
 * per-delegation guarantee use the single-use balance change enforcers.
 */
export abstract class TotalBalanceChangeEnforcer<
  TTerms extends NativeBalanceChangeTerms,
> extends CaveatEnforcer<TTerms> {
  readonly #trackers: StateStore<BalanceTracker>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#trackers = this.createStore(`${new.target.name}.balanceTracker`);
  }

  protected abstract assetOf(terms: TTerms): Address;

  protected abstract trackerKey(caller: Address, terms: TTerms): StateKeyPart[];

  balanceTracker(delegationManager: Address, terms: TTerms): BalanceTracker | undefined {
    return this.#trackers.get(this.trackerKey(delegationManager, terms));
  }

  override beforeAllHook({ caller, terms, mode, delegationHash }: HookParams): void {
    this.onlyDefaultExecutionMode(mode);

    const decoded = this.getTermsInfo(terms);
    if (decoded.balance === 0n) {
      throw this.violation('zero-expected-change-amount', 'ZeroExpectedChange');
    }

    const key = this.trackerKey(caller, decoded);
    const existing = this.#trackers.get(key);
    const tracker: BalanceTracker = existing ?? {
      balanceBefore: this.runtime.ledger.balanceOf(
        this.assetOf(decoded),
        decoded.recipient,
      ),
      expectedIncrease: 0n,
      expectedDecrease: 0n,
      validationRemaining: 0n,
    };

    if (!existing) {
      this.logger.debug(
        {
          event: 'TrackedBalance',
          sender: caller,
          recipient: decoded.recipient,
          token: this.assetOf(decoded),
          balance: tracker.balanceBefore,
        },
        'balance tracked',
      );
    }

    const isDecrease = decoded.changeType === BalanceChangeType.Decrease;
    this.#trackers.set(key, {
      balanceBefore: tracker.balanceBefore,
      expectedIncrease: isDecrease
        ? tracker.expectedIncrease
        : checkedAdd(tracker.expectedIncrease, decoded.balance),
      expectedDecrease: isDecrease
        ? checkedAdd(tracker.expectedDecrease, decoded.balance)
        : tracker.expectedDecrease,
      validationRemaining: tracker.validationRemaining + 1n,
    });

    this.logger.debug(
      {
        event: 'UpdatedExpectedBalance',
        sender: caller,
        recipient: decoded.recipient,
        delegationHash,
        enforceDecrease: isDecrease,
        expected: decoded.balance,
      },
      'expected balance change updated',
    );
  }

  override afterAllHook({ caller, terms }: HookParams): void {
    const decoded = this.getTermsInfo(terms);
    const key = this.trackerKey(caller, decoded);
    const tracker = this.#trackers.get(key);
    if (!tracker) {
      return;
    }

    const validationRemaining = tracker.validationRemaining - 1n;
    if (validationRemaining > 0n) {
      this.#trackers.set(key, { ...tracker, validationRemaining });
      return;
    }

    const balanceAfter = this.runtime.ledger.balanceOf(
      this.assetOf(decoded),
      decoded.recipient,
    );

    if (tracker.expectedIncrease >= tracker.expectedDecrease) {
      const expected = tracker.expectedIncrease - tracker.expectedDecrease;
      if (balanceAfter < checkedAdd(tracker.balanceBefore, expected)) {
        throw this.violation('insufficient-balance-increase', 'InsufficientBalanceChange');
      }
    } else {
      const expected = tracker.expectedDecrease - tracker.expectedIncrease;
      if (balanceAfter < checkedSub(tracker.balanceBefore, expected)) {
        throw this.violation('exceeded-balance-decrease', 'ExcessiveBalanceDecrease');
      }
    }

    this.#trackers.delete(key);
    this.logger.debug(
      {
        event: 'ValidatedBalance',
        sender: caller,
        recipient: decoded.recipient,
        token: this.assetOf(decoded),
        expectedIncrease: tracker.expectedIncrease,
        expectedDecrease: tracker.expectedDecrease,
      },
      'balance change validated',
    );
  }
}
