import {
  checkedAdd,
  type Address,
  type Hex,
  type NativeTokenPeriodTransferTerms,
} from '@caveatkit/delegation-core';

import type { StateKeyPart, StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment } from './CaveatEnforcer';

export type PeriodTransferResult = {
  availableAmount: bigint;
  isNewPeriod: boolean;
  /**
   * One-based index of the period `now` falls in; zero before the start date.
   */
  currentPeriod: bigint;
};

type PeriodState = {
  lastTransferPeriod: bigint;
  transferredInCurrentPeriod: bigint;
};

/**
 * Shared accounting of the periodic allowance enforcers: up to `periodAmount`
 * may be transferred in each period of `periodDuration` seconds starting at
 * `startDate`. Unused allowance does not carry over.
 */
export abstract class PeriodTransferEnforcer<TTerms> extends CaveatEnforcer<TTerms> {
  readonly #periods: StateStore<PeriodState>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#periods = this.createStore(`${new.target.name}.periodicAllowances`);
  }

  protected availableInPeriod(
    key: readonly StateKeyPart[],
    period: NativeTokenPeriodTransferTerms,
  ): PeriodTransferResult {
    const now = this.runtime.clock.getTimestamp();
    if (now < period.startDate) {
      return { availableAmount: 0n, isNewPeriod: false, currentPeriod: 0n };
    }

    const state = this.#periods.get(key);
    const currentPeriod = (now - period.startDate) / period.periodDuration + 1n;
    const isNewPeriod = state?.lastTransferPeriod !== currentPeriod;
    const transferred =
      state && !isNewPeriod ? state.transferredInCurrentPeriod : 0n;

    return {
      availableAmount:
        period.periodAmount > transferred ? period.periodAmount - transferred : 0n,
      isNewPeriod,
      currentPeriod,
    };
  }

  /**
   * Spends `amount` of the current period's allowance.
   *
   * @param params - The transfer being authorized.
   * @param params.key - The state key, scoped by caller and delegation hash.
   * @param params.period - The period configuration.
   * @param params.amount - The amount being transferred.
   * @param params.token - The token, for logging.
   * @param params.caller - The identity invoking the hook, for logging.
   * @param params.redeemer - The redeemer, for logging.
   * @param params.delegationHash - The delegation hash, for logging.
   */
  protected consumeInPeriod({
    key,
    period,
    amount,
    token,
    caller,
    redeemer,
    delegationHash,
  }: {
    key: readonly StateKeyPart[];
    period: NativeTokenPeriodTransferTerms;
    amount: bigint;
    token: Address;
    caller: Address;
    redeemer: Address;
    delegationHash: Hex;
  }): void {
    const now = this.runtime.clock.getTimestamp();
    if (now < period.startDate) {
      throw this.violation('transfer-not-started', 'ClaimNotStarted');
    }

    const { availableAmount, isNewPeriod, currentPeriod } =
      this.availableInPeriod(key, period);
    if (amount > availableAmount) {
      throw this.violation('transfer-amount-exceeded', 'ClaimAmountExceeded');
    }

    const transferredInCurrentPeriod = checkedAdd(
      isNewPeriod ? 0n : (this.#periods.get(key)?.transferredInCurrentPeriod ?? 0n),
      amount,
    );
    this.#periods.set(key, {
      lastTransferPeriod: currentPeriod,
      transferredInCurrentPeriod,
    });

    this.logger.debug(
      {
        event: 'TransferredInPeriod',
        sender: caller,
        redeemer,
        delegationHash,
        token,
        periodAmount: period.periodAmount,
        periodDuration: period.periodDuration,
        startDate: period.startDate,
        transferredInCurrentPeriod,
        transferTimestamp: now,
      },
      'transferred in period',
    );
  }
}
