import {
  BalanceChangeType,
  EnforcerLockedError,
  checkedAdd,
  checkedSub,
  type Address,
  type Hex,
  type NativeBalanceChangeTerms,
} from '@caveatkit/delegation-core';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

/**
 * Single-use balance change check: the recipient's balance is cached in
 * `beforeHook` and compared in `afterHook`. The (caller, delegation) key stays
 * locked in between, so the same delegation cannot be used again until the
 * first use has been validated.
 */
export abstract class BalanceChangeEnforcer<
  TTerms extends NativeBalanceChangeTerms,
> extends CaveatEnforcer<TTerms> {
  readonly #locks: StateStore<true>;

  readonly #balanceCache: StateStore<bigint>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#locks = this.createStore(`${new.target.name}.isLocked`);
    this.#balanceCache = this.createStore(`${new.target.name}.balanceCache`);
  }

  /**
   * The asset whose balance the terms track.
   */
  protected abstract assetOf(terms: TTerms): Address;

  isLocked(delegationManager: Address, delegationHash: Hex): boolean {
    return this.#locks.has([delegationManager, delegationHash]);
  }

  override beforeHook({ caller, terms, delegationHash }: HookParams): void {
    const decoded = this.getTermsInfo(terms);
    if (decoded.balance === 0n) {
      throw this.violation('zero-expected-change-amount', 'ZeroExpectedChange');
    }

    const key = [caller, delegationHash];
    if (this.#locks.has(key)) {
      throw new EnforcerLockedError(this.name);
    }

    this.#locks.set(key, true);
    this.#balanceCache.set(
      key,
      this.runtime.ledger.balanceOf(this.assetOf(decoded), decoded.recipient),
    );
  }

  override afterHook({ caller, terms, delegationHash }: HookParams): void {
    const decoded = this.getTermsInfo(terms);
    const key = [caller, delegationHash];

    const balanceBefore = this.#balanceCache.get(key) ?? 0n;
    this.#locks.delete(key);
    this.#balanceCache.delete(key);

    const balanceAfter = this.runtime.ledger.balanceOf(
      this.assetOf(decoded),
      decoded.recipient,
    );

    if (decoded.changeType === BalanceChangeType.Increase) {
      if (balanceAfter < checkedAdd(balanceBefore, decoded.balance)) {
        throw this.violation('insufficient-balance-increase', 'InsufficientBalanceChange');
      }
      return;
    }

    if (balanceAfter < checkedSub(balanceBefore, decoded.balance)) {
      throw this.violation('exceeded-balance-decrease', 'ExcessiveBalanceDecrease');
    }
  }
}
