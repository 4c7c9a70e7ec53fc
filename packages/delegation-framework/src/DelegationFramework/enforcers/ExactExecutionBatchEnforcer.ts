import {
  decodeBatchExecution,
  decodeExecutionBatchTerms,
  type ExecutionBatchTerms,
  type Hex,
} from '@caveatkit/delegation-core';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';
import { isSameExecution } from './ExactExecutionEnforcer';

export class ExactExecutionBatchEnforcer extends CaveatEnforcer<ExecutionBatchTerms> {
  readonly name = 'ExactExecutionBatchEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.onlyBatchCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const executions = decodeBatchExecution(executionCallData);
    const expected = this.getTermsInfo(terms).executions;

    if (executions.length !== expected.length) {
      throw this.violation('invalid-batch-size', 'InvalidBatchSize');
    }

    executions.forEach((execution, index) => {
      const expectedExecution = expected[index];
      if (!expectedExecution || !isSameExecution(execution, expectedExecution)) {
        throw this.violation('invalid-execution', 'InvalidExecution');
      }
    });
  }

  getTermsInfo(terms: Hex): ExecutionBatchTerms {
    return decodeExecutionBatchTerms(terms, { enforcerName: this.name });
  }
}
