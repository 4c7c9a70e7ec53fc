import {
  checkedAdd,
  checkedMul,
  type Address,
  type Hex,
  type NativeTokenStreamingTerms,
} from '@caveatkit/delegation-core';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment } from './CaveatEnforcer';

export type StreamingResult = {
  availableAmount: bigint;
};

/**
 * Shared accounting of the linear streaming enforcers: `initialAmount` unlocks
 * at `startTime`, then `amountPerSecond` more each second, up to `maxAmount`.
 */
export abstract class StreamingEnforcer<
  TTerms extends NativeTokenStreamingTerms,
> extends CaveatEnforcer<TTerms> {
  readonly #spent: StateStore<bigint>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#spent = this.createStore(`${new.target.name}.spent`);
  }

  spent(delegationManager: Address, delegationHash: Hex): bigint {
    return this.#spent.get([delegationManager, delegationHash]) ?? 0n;
  }

  /**
   * The amount a delegation can still transfer right now.
   *
   * @param params - The lookup.
   * @param params.delegationHash - The hash of the delegation.
   * @param params.delegationManager - The manager the delegation is redeemed through.
   * @param params.terms - The terms of the streaming caveat.
   * @returns The available amount.
   */
  getAvailableAmount({
    delegationHash,
    delegationManager,
    terms,
  }: {
    delegationHash: Hex;
    delegationManager: Address;
    terms: Hex;
  }): StreamingResult {
    return {
      availableAmount: this.#availableAmount(
        this.getTermsInfo(terms),
        this.spent(delegationManager, delegationHash),
      ),
    };
  }

  protected consumeAllowance(
    caller: Address,
    delegationHash: Hex,
    stream: TTerms,
    amount: bigint,
  ): void {
    const spent = this.spent(caller, delegationHash);
    if (amount > this.#availableAmount(stream, spent)) {
      throw this.violation('allowance-exceeded', 'AllowanceExceeded');
    }

    const newSpent = checkedAdd(spent, amount);
    this.#spent.set([caller, delegationHash], newSpent);
    this.logger.debug(
      {
        event: 'IncreasedSpentMap',
        sender: caller,
        delegationHash,
        initialAmount: stream.initialAmount,
        maxAmount: stream.maxAmount,
        amountPerSecond: stream.amountPerSecond,
        startTime: stream.startTime,
        spent: newSpent,
        lastUpdateTimestamp: this.runtime.clock.getTimestamp(),
      },
      'stream allowance spent',
    );
  }

  #availableAmount(stream: TTerms, spent: bigint): bigint {
    const now = this.runtime.clock.getTimestamp();
    if (now < stream.startTime) {
      return 0n;
    }

    const streamed = checkedAdd(
      stream.initialAmount,
      checkedMul(stream.amountPerSecond, now - stream.startTime),
    );
    const unlocked = streamed > stream.maxAmount ? stream.maxAmount : streamed;

    return spent >= unlocked ? 0n : unlocked - spent;
  }
}
