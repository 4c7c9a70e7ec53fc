import {
  decodeExactExecutionTerms,
  decodeSingleExecution,
  type ExactExecutionTerms,
  type ExecutionStruct,
  type Hex,
} from '@caveatkit/delegation-core';
import { isAddressEqual } from 'viem';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

export const isSameExecution = (
  actual: ExecutionStruct,
  expected: ExecutionStruct,
): boolean =>
  isAddressEqual(actual.target, expected.target) &&
  actual.value === expected.value &&
  actual.callData.toLowerCase() === expected.callData.toLowerCase();

/**
 * Authorizes exactly one call: same target, same value, same calldata.
 */
export class ExactExecutionEnforcer extends CaveatEnforcer<ExactExecutionTerms> {
  readonly name = 'ExactExecutionEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { execution } = this.getTermsInfo(terms);
    if (!isSameExecution(decodeSingleExecution(executionCallData), execution)) {
      throw this.violation('invalid-execution', 'InvalidExecution');
    }
  }

  getTermsInfo(terms: Hex): ExactExecutionTerms {
    return decodeExactExecutionTerms(terms, { enforcerName: this.name });
  }
}
