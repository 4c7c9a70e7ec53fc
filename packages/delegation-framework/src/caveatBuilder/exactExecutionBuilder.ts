import {
  createExactExecutionTerms,
  createExecutionBatchTerms,
  type Caveat,
  type ExecutionStruct,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const exactExecution = 'exactExecution';
export const exactExecutionBatch = 'exactExecutionBatch';

export type ExactExecutionBuilderConfig = {
  execution: ExecutionStruct;
};

export type ExactExecutionBatchBuilderConfig = {
  executions: ExecutionStruct[];
};

/**
 * Builds a caveat for the ExactExecutionEnforcer. Target, value and calldata
 * of the redeemed execution must all match.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The expected execution.
 * @returns The Caveat.
 */
export const exactExecutionBuilder = (
  environment: DelegationEnvironment,
  config: ExactExecutionBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'ExactExecutionEnforcer'),
  terms: createExactExecutionTerms({ execution: config.execution }),
  args: '0x00',
});

/**
 * Builds a caveat for the ExactExecutionBatchEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The expected batch, in order.
 * @returns The Caveat.
 */
export const exactExecutionBatchBuilder = (
  environment: DelegationEnvironment,
  config: ExactExecutionBatchBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'ExactExecutionBatchEnforcer'),
  terms: createExecutionBatchTerms({ executions: config.executions }),
  args: '0x00',
});
