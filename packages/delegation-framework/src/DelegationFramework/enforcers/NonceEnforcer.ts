import {
  decodeNonceTerms,
  type Address,
  type Hex,
  type NonceTerms,
} from '@caveatkit/delegation-core';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

/**
 * Lets a delegator revoke every outstanding delegation carrying its current
 * nonce at once by incrementing the nonce.
 */
export class NonceEnforcer extends CaveatEnforcer<NonceTerms> {
  readonly name = 'NonceEnforcer';

  readonly #nonces: StateStore<bigint>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#nonces = this.createStore('NonceEnforcer.currentNonce');
  }

  currentNonce(delegationManager: Address, delegator: Address): bigint {
    return this.#nonces.get([delegationManager, delegator]) ?? 0n;
  }

  /**
   * Invalidates every delegation of `delegator` that uses the current nonce.
   *
   * @param delegator - The delegator whose nonce moves.
   * @param delegationManager - The manager the nonce is scoped to.
   */
  incrementNonce(delegator: Address, delegationManager: Address): void {
    const oldNonce = this.currentNonce(delegationManager, delegator);
    const newNonce = oldNonce + 1n;
    this.#nonces.set([delegationManager, delegator], newNonce);
    this.logger.debug(
      { event: 'UsedNonce', delegationManager, delegator, oldNonce, newNonce },
      'nonce incremented',
    );
  }

  override beforeHook({ caller, terms, delegator }: HookParams): void {
    const { nonce } = this.getTermsInfo(terms);
    if (nonce !== this.currentNonce(caller, delegator)) {
      throw this.violation('invalid-nonce', 'InvalidNonce');
    }
  }

  getTermsInfo(terms: Hex): NonceTerms {
    return decodeNonceTerms(terms, { enforcerName: this.name });
  }
}
