import {
  decodeIdTerms,
  type Address,
  type Hex,
  type IdTerms,
} from '@caveatkit/delegation-core';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

/**
 * Makes a set of delegations sharing an id mutually exclusive: once one of
 * them is redeemed the id is spent for that delegator.
 */
export class IdEnforcer extends CaveatEnforcer<IdTerms> {
  readonly name = 'IdEnforcer';

  readonly #usedIds: StateStore<true>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#usedIds = this.createStore('IdEnforcer.usedIds');
  }

  getIsUsed(delegationManager: Address, delegator: Address, id: bigint): boolean {
    return this.#usedIds.has([delegationManager, delegator, id]);
  }

  override beforeHook({ caller, terms, delegator, redeemer }: HookParams): void {
    const { id } = this.getTermsInfo(terms);
    if (this.getIsUsed(caller, delegator, id)) {
      throw this.violation('id-already-used', 'IdAlreadyUsed');
    }

    this.#usedIds.set([caller, delegator, id], true);
    this.logger.debug(
      { event: 'UsedId', sender: caller, delegator, redeemer, id },
      'id used',
    );
  }

  getTermsInfo(terms: Hex): IdTerms {
    return decodeIdTerms(terms, { enforcerName: this.name });
  }
}
