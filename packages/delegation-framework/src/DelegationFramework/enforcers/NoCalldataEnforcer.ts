import { decodeNoCalldataTerms, type Hex } from '@caveatkit/delegation-core';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

/**
 * Allows plain value transfers only: every execution must have empty calldata.
 */
export class NoCalldataEnforcer extends CaveatEnforcer<Record<string, never>> {
  readonly name = 'NoCalldataEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.getTermsInfo(terms);
    this.onlyDefaultExecutionMode(mode);

    const executions = this.decodeExecutions(mode, executionCallData);
    if (executions.some(({ callData }) => callData !== '0x')) {
      throw this.violation('calldata-not-allowed', 'InvalidCalldata');
    }
  }

  getTermsInfo(terms: Hex): Record<string, never> {
    return decodeNoCalldataTerms(terms, { enforcerName: this.name });
  }
}
