import {
  decodeLimitedCallsTerms,
  type Address,
  type Hex,
  type LimitedCallsTerms,
} from '@caveatkit/delegation-core';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

/**
 * Caps the number of redemptions of a delegation per redeemer, for open
 * delegations that many redeemers may use.
 */
export class RedeemerLimitedCallsEnforcer extends CaveatEnforcer<LimitedCallsTerms> {
  readonly name = 'RedeemerLimitedCallsEnforcer';

  readonly #callCounts: StateStore<bigint>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#callCounts = this.createStore('RedeemerLimitedCallsEnforcer.callCounts');
  }

  callCounts(
    delegationManager: Address,
    delegationHash: Hex,
    redeemer: Address,
  ): bigint {
    return this.#callCounts.get([delegationManager, delegationHash, redeemer]) ?? 0n;
  }

  override beforeHook({ caller, terms, delegationHash, redeemer }: HookParams): void {
    const { limit } = this.getTermsInfo(terms);
    const count = this.callCounts(caller, delegationHash, redeemer) + 1n;
    if (count > limit) {
      throw this.violation('limit-exceeded', 'LimitExceeded');
    }

    this.#callCounts.set([caller, delegationHash, redeemer], count);
    this.logger.debug(
      {
        event: 'IncreasedCount',
        sender: caller,
        delegationHash,
        redeemer,
        limit,
        callCount: count,
      },
      'redeemer call count increased',
    );
  }

  getTermsInfo(terms: Hex): LimitedCallsTerms {
    return decodeLimitedCallsTerms(terms, { enforcerName: this.name });
  }
}
