import {
  decodeAllowedMethodsTerms,
  decodeSingleExecution,
  type AllowedMethodsTerms,
  type Hex,
} from '@caveatkit/delegation-core';
import { size, slice } from 'viem';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

/**
 * Restricts the function selector the execution may call.
 */
export class AllowedMethodsEnforcer extends CaveatEnforcer<AllowedMethodsTerms> {
  readonly name = 'AllowedMethodsEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { callData } = decodeSingleExecution(executionCallData);
    if (size(callData) < 4) {
      throw this.violation('invalid-execution-data-length', 'InvalidCalldata');
    }

    const selector = slice(callData, 0, 4).toLowerCase();
    const { selectors } = this.getTermsInfo(terms);
    if (!selectors.some((allowed) => allowed.toLowerCase() === selector)) {
      throw this.violation('method-not-allowed', 'UnauthorizedMethod');
    }
  }

  getTermsInfo(terms: Hex): AllowedMethodsTerms {
    return decodeAllowedMethodsTerms(terms, { enforcerName: this.name });
  }
}
