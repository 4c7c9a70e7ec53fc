import {
  ExecutionError,
  checkedAdd,
  type Address,
} from '@caveatkit/delegation-core';

import type { StateJournal, StateStore } from './StateJournal';

/**
 * Balances the enforcers observe and executions move.
 */
export type Ledger = {
  balanceOf(asset: Address, account: Address): bigint;
  transfer(asset: Address, from: Address, to: Address, amount: bigint): void;
};

export class InMemoryLedger implements Ledger {
  readonly #balances: StateStore<bigint>;

  constructor(journal: StateJournal) {
    this.#balances = journal.createStore('InMemoryLedger.balances');
  }

  balanceOf(asset: Address, account: Address): bigint {
    return this.#balances.get([asset, account]) ?? 0n;
  }

  transfer(asset: Address, from: Address, to: Address, amount: bigint): void {
    const fromBalance = this.balanceOf(asset, from);
    if (fromBalance < amount) {
      throw new ExecutionError('InMemoryLedger', 'InsufficientBalance', {
        details: `${from} holds ${fromBalance} of ${asset}, needs ${amount}`,
      });
    }

    this.#balances.set([asset, from], fromBalance - amount);
    this.#balances.set(
      [asset, to],
      checkedAdd(this.balanceOf(asset, to), amount),
    );
  }

  mint(asset: Address, to: Address, amount: bigint): void {
    this.#balances.set(
      [asset, to],
      checkedAdd(this.balanceOf(asset, to), amount),
    );
  }
}
