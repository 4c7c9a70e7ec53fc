import {
  NATIVE_TOKEN_ADDRESS,
  decodeNativeTokenPeriodTransferTerms,
  decodeSingleExecution,
  type Address,
  type Hex,
  type NativeTokenPeriodTransferTerms,
} from '@caveatkit/delegation-core';

import type { HookParams } from './CaveatEnforcer';
import {
  PeriodTransferEnforcer,
  type PeriodTransferResult,
} from './PeriodTransferEnforcer';

export class NativeTokenPeriodTransferEnforcer extends PeriodTransferEnforcer<NativeTokenPeriodTransferTerms> {
  readonly name = 'NativeTokenPeriodTransferEnforcer';

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

    const { value } = decodeSingleExecution(executionCallData);
    this.consumeInPeriod({
      key: [caller, delegationHash],
      period: this.getTermsInfo(terms),
      amount: value,
      token: NATIVE_TOKEN_ADDRESS,
      caller,
      redeemer,
      delegationHash,
    });
  }

  getTermsInfo(terms: Hex): NativeTokenPeriodTransferTerms {
    return decodeNativeTokenPeriodTransferTerms(terms, { enforcerName: this.name });
  }
}
