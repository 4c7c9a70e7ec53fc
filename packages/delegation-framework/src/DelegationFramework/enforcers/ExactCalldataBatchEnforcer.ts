import {
  decodeBatchExecution,
  decodeExecutionBatchTerms,
  type ExecutionBatchTerms,
  type Hex,
} from '@caveatkit/delegation-core';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

/**
 * Requires each call of a batch to carry exactly the calldata at the same
 * index in the terms. Targets and values are not checked.
 */
export class ExactCalldataBatchEnforcer extends CaveatEnforcer<ExecutionBatchTerms> {
  readonly name = 'ExactCalldataBatchEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.onlyBatchCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const executions = decodeBatchExecution(executionCallData);
    const expected = this.getTermsInfo(terms).executions;

    if (executions.length !== expected.length) {
      throw this.violation('invalid-batch-size', 'InvalidBatchSize');
    }

    executions.forEach((execution, index) => {
      if (
        execution.callData.toLowerCase() !==
        expected[index]?.callData.toLowerCase()
      ) {
        throw this.violation('invalid-calldata', 'InvalidCalldata');
      }
    });
  }

  getTermsInfo(terms: Hex): ExecutionBatchTerms {
    return decodeExecutionBatchTerms(terms, { enforcerName: this.name });
  }
}
