import {
  decodeAllowedCalldataTerms,
  decodeSingleExecution,
  type AllowedCalldataTerms,
  type Hex,
} from '@caveatkit/delegation-core';
import { size, slice } from 'viem';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

/**
 * Requires a fixed byte range of the execution's calldata to equal the value
 * in the terms.
 */
export class AllowedCalldataEnforcer extends CaveatEnforcer<AllowedCalldataTerms> {
  readonly name = 'AllowedCalldataEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { startIndex, value } = this.getTermsInfo(terms);
    const { callData } = decodeSingleExecution(executionCallData);

    const end = startIndex + BigInt(size(value));
    if (BigInt(size(callData)) < end) {
      throw this.violation('invalid-calldata-length', 'InvalidCalldata');
    }

    const actual = slice(callData, Number(startIndex), Number(end));
    if (actual.toLowerCase() !== value.toLowerCase()) {
      throw this.violation('invalid-calldata', 'InvalidCalldata');
    }
  }

  getTermsInfo(terms: Hex): AllowedCalldataTerms {
    return decodeAllowedCalldataTerms(terms, { enforcerName: this.name });
  }
}
