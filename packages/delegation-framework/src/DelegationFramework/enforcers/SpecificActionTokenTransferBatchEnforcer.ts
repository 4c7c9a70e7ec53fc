import {
  TRANSFER_SELECTOR,
  decodeBatchExecution,
  decodeSpecificActionTokenTransferBatchTerms,
  type Address,
  type ExecutionStruct,
  type Hex,
  type SpecificActionTokenTransferBatchTerms,
} from '@caveatkit/delegation-core';
import { getAddress, hexToBigInt, isAddressEqual, size, slice } from 'viem';

import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type EnforcerDeployment, type HookParams } from './CaveatEnforcer';

/**
 * Authorizes one batch, once: an exact call followed by a token transfer of a
 * fixed amount to a fixed recipient.
 */
export class SpecificActionTokenTransferBatchEnforcer extends CaveatEnforcer<SpecificActionTokenTransferBatchTerms> {
  readonly name = 'SpecificActionTokenTransferBatchEnforcer';

  readonly #usedDelegations: StateStore<true>;

  constructor(deployment: EnforcerDeployment) {
    super(deployment);
    this.#usedDelegations = this.createStore(
      'SpecificActionTokenTransferBatchEnforcer.usedDelegations',
    );
  }

  usedDelegations(delegationManager: Address, delegationHash: Hex): boolean {
    return this.#usedDelegations.has([delegationManager, delegationHash]);
  }

  override beforeHook({
    caller,
    terms,
    mode,
    executionCallData,
    delegationHash,
    delegator,
    redeemer,
  }: HookParams): void {
    this.onlyBatchCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    if (this.usedDelegations(caller, delegationHash)) {
      throw this.violation('delegation-already-used', 'DelegationAlreadyUsed');
    }

    const executions = decodeBatchExecution(executionCallData);
    const [first, second] = executions;
    if (executions.length !== 2 || !first || !second) {
      throw this.violation('invalid-batch-size', 'InvalidBatchSize');
    }

    const action = this.getTermsInfo(terms);

    if (
      !isAddressEqual(first.target, action.target) ||
      first.value !== 0n ||
      first.callData.toLowerCase() !== action.callData.toLowerCase()
    ) {
      throw this.violation('invalid-first-transaction', 'InvalidExecution');
    }

    if (!isExpectedTransfer(second, action)) {
      throw this.violation('invalid-second-transaction', 'InvalidExecution');
    }

    this.#usedDelegations.set([caller, delegationHash], true);
    this.logger.debug(
      { event: 'DelegationUsed', sender: caller, delegator, redeemer, delegationHash },
      'delegation used',
    );
  }

  getTermsInfo(terms: Hex): SpecificActionTokenTransferBatchTerms {
    return decodeSpecificActionTokenTransferBatchTerms(terms, {
      enforcerName: this.name,
    });
  }
}

const isExpectedTransfer = (
  { target, value, callData }: ExecutionStruct,
  { tokenAddress, recipient, amount }: SpecificActionTokenTransferBatchTerms,
): boolean =>
  isAddressEqual(target, tokenAddress) &&
  value === 0n &&
  size(callData) === 68 &&
  slice(callData, 0, 4).toLowerCase() === TRANSFER_SELECTOR &&
  isAddressEqual(getAddress(slice(callData, 16, 36)), recipient) &&
  hexToBigInt(slice(callData, 36, 68)) === amount;
