import {
  decodeSingleExecution,
  decodeTokenPeriodTransferTerms,
  type Address,
  type Hex,
  type TokenPeriodTransferTerms,
} from '@caveatkit/delegation-core';

import type { HookParams } from './CaveatEnforcer';
import {
  PeriodTransferEnforcer,
  type PeriodTransferResult,
} from './PeriodTransferEnforcer';

export class TokenPeriodTransferEnforcer extends PeriodTransferEnforcer<TokenPeriodTransferTerms> {
  readonly name = 'TokenPeriodTransferEnforcer';

  getAvailableAmount({
    delegationHash,
    delegationManager,
    terms,
  }: {
    delegationHash: Hex;
    delegationManager: Address;
    terms: Hex;
  }): PeriodTransferResult {
    return this.availableInPeriod(
      [delegationManager, delegationHash],
      this.getTermsInfo(terms),
    );
  }

  override beforeHook({
    caller,
    terms,
    mode,
    executionCallData,
    delegationHash,
    redeemer,
  }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const period = this.getTermsInfo(terms);
    const { amount } = this.decodeTokenTransfer(
      decodeSingleExecution(executionCallData),
      period.tokenAddress,
    );

    this.consumeInPeriod({
      key: [caller, delegationHash],
      period,
      amount,
      token: period.tokenAddress,
      caller,
      redeemer,
      delegationHash,
    });
  }

  getTermsInfo(terms: Hex): TokenPeriodTransferTerms {
    return decodeTokenPeriodTransferTerms(terms, { enforcerName: this.name });
  }
}
