import {
  checkedAdd,
  decodeSingleExecution,
  decodeTokenTransferAmountTerms,
  type Address,
  type Hex,
  type TokenTransferAmountTerms,
} from '@caveatkit/delegation-core';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

/**
 * Caps the total amount of a token a delegation can transfer across all
 * redemptions. The execution must be a `transfer` on that token.
 */
export class TokenTransferAmountEnforcer extends CaveatEnforcer<TokenTransferAmountTerms> {
  readonly name = 'TokenTransferAmountEnforcer';

  readonly #spent: StateStore<bigint>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#spent = this.createStore('TokenTransferAmountEnforcer.spentMap');
  }

  spentMap(delegationManager: Address, delegationHash: Hex): bigint {
    return this.#spent.get([delegationManager, delegationHash]) ?? 0n;
  }

  override beforeHook({ caller, terms, mode, executionCallData, delegationHash }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { tokenAddress, maxAmount } = this.getTermsInfo(terms);
    const { amount } = this.decodeTokenTransfer(
      decodeSingleExecution(executionCallData),
      tokenAddress,
    );

    const spent = checkedAdd(this.spentMap(caller, delegationHash), amount);
    if (spent > maxAmount) {
      throw this.violation('allowance-exceeded', 'AllowanceExceeded');
    }

    this.#spent.set([caller, delegationHash], spent);
    this.logger.debug(
      {
        event: 'IncreasedSpentMap',
        sender: caller,
        delegationHash,
        token: tokenAddress,
        limit: maxAmount,
        spent,
      },
      'token allowance spent',
    );
  }

  getTermsInfo(terms: Hex): TokenTransferAmountTerms {
    return decodeTokenTransferAmountTerms(terms, { enforcerName: this.name });
  }
}
