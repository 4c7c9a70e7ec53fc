import {
  decodeAllowedTargetsTerms,
  decodeSingleExecution,
  type AllowedTargetsTerms,
  type Hex,
} from '@caveatkit/delegation-core';
import { isAddressEqual } from 'viem';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

export class AllowedTargetsEnforcer extends CaveatEnforcer<AllowedTargetsTerms> {
  readonly name = 'AllowedTargetsEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { target } = decodeSingleExecution(executionCallData);
    const { targets } = this.getTermsInfo(terms);
    if (!targets.some((allowed) => isAddressEqual(allowed, target))) {
      throw this.violation('target-address-not-allowed', 'UnauthorizedTarget');
    }
  }

  getTermsInfo(terms: Hex): AllowedTargetsTerms {
    return decodeAllowedTargetsTerms(terms, { enforcerName: this.name });
  }
}
