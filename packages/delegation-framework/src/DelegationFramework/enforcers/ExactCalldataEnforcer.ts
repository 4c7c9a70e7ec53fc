import {
  decodeExactCalldataTerms,
  decodeSingleExecution,
  type ExactCalldataTerms,
  type Hex,
} from '@caveatkit/delegation-core';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

export class ExactCalldataEnforcer extends CaveatEnforcer<ExactCalldataTerms> {
  readonly name = 'ExactCalldataEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { callData } = decodeSingleExecution(executionCallData);
    if (callData.toLowerCase() !== this.getTermsInfo(terms).callData.toLowerCase()) {
      throw this.violation('invalid-calldata', 'InvalidCalldata');
    }
  }

  getTermsInfo(terms: Hex): ExactCalldataTerms {
    return decodeExactCalldataTerms(terms, { enforcerName: this.name });
  }
}
