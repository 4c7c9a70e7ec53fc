import {
  checkedAdd,
  decodeNativeTokenTransferAmountTerms,
  decodeSingleExecution,
  type Address,
  type Hex,
  type NativeTokenTransferAmountTerms,
} from '@caveatkit/delegation-core';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

/**
 * Caps the total native value a delegation can send across all redemptions.
 */
export class NativeTokenTransferAmountEnforcer extends CaveatEnforcer<NativeTokenTransferAmountTerms> {
  readonly name = 'NativeTokenTransferAmountEnforcer';

  readonly #spent: StateStore<bigint>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#spent = this.createStore('NativeTokenTransferAmountEnforcer.spentMap');
  }

  spentMap(delegationManager: Address, delegationHash: Hex): bigint {
    return this.#spent.get([delegationManager, delegationHash]) ?? 0n;
  }

  override beforeHook({ caller, terms, mode, executionCallData, delegationHash }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { maxAmount } = this.getTermsInfo(terms);
    const { value } = decodeSingleExecution(executionCallData);

    const spent = checkedAdd(this.spentMap(caller, delegationHash), value);
    if (spent > maxAmount) {
      throw this.violation('allowance-exceeded', 'AllowanceExceeded');
    }

    this.#spent.set([caller, delegationHash], spent);
    this.logger.debug(
      { event: 'IncreasedSpentMap', sender: caller, delegationHash, limit: maxAmount, spent },
      'native allowance spent',
    );
  }

  getTermsInfo(terms: Hex): NativeTokenTransferAmountTerms {
    return decodeNativeTokenTransferAmountTerms(terms, { enforcerName: this.name });
  }
}
