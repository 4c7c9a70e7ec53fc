import {
  decodeLimitedCallsTerms,
  type Address,
  type Hex,
  type LimitedCallsTerms,
} from '@caveatkit/delegation-core';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

/**
 * Caps the number of times a delegation can be redeemed.
 */
export class LimitedCallsEnforcer extends CaveatEnforcer<LimitedCallsTerms> {
  readonly name = 'LimitedCallsEnforcer';

  readonly #callCounts: StateStore<bigint>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#callCounts = this.createStore('LimitedCallsEnforcer.callCounts');
  }

  /**
   * The number of successful redemptions of a delegation through a manager.
   *
   * @param delegationManager - The manager the delegation was redeemed through.
   * @param delegationHash - The hash of the delegation.
   * @returns The call count.
   */
  callCounts(delegationManager: Address, delegationHash: Hex): bigint {
    return this.#callCounts.get([delegationManager, delegationHash]) ?? 0n;
  }

  override beforeHook({ caller, terms, delegationHash }: HookParams): void {
    const { limit } = this.getTermsInfo(terms);
    const count = this.callCounts(caller, delegationHash) + 1n;
    if (count > limit) {
      throw this.violation('limit-exceeded', 'LimitExceeded');
    }

    this.#callCounts.set([caller, delegationHash], count);
    this.logger.debug(
      { event: 'IncreasedCount', sender: caller, delegationHash, limit, callCount: count },
      'call count increased',
    );
  }

  getTermsInfo(terms: Hex): LimitedCallsTerms {
    return decodeLimitedCallsTerms(terms, { enforcerName: this.name });
  }
}
