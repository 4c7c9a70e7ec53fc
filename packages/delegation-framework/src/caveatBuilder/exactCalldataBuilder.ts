import {
  createExactCalldataTerms,
  createExecutionBatchTerms,
  type Caveat,
  type ExecutionStruct,
  type Hex,
} from '@caveatkit/delegation-core';

import type { DelegationEnvironment } from '../environment';
import { getEnforcerAddress } from './utils';

export const exactCalldata = 'exactCalldata';
export const exactCalldataBatch = 'exactCalldataBatch';

export type ExactCalldataBuilderConfig = {
  /**
   * The calldata the execution must carry, byte for byte.
   */
  callData: Hex;
};

export type ExactCalldataBatchBuilderConfig = {
  /**
   * One entry per execution in the batch. Only `callData` is enforced.
   */
  executions: ExecutionStruct[];
};

/**
 * Builds a caveat for the ExactCalldataEnforcer.
 *
 * @param environment - The DelegationEnvironment.
 * @param config - The expected calldata.
 * @returns The Caveat.
 */
export const exactCalldataBuilder = (
  environment: DelegationEnvironment,
  config: ExactCalldataBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'ExactCalldataEnforcer'),
  terms: createExactCalldataTerms({ callData: config.callData }),
  args: '0x00',
});

export const exactCalldataBatchBuilder = (
  environment: DelegationEnvironment,
  config: ExactCalldataBatchBuilderConfig,
): Caveat => ({
  enforcer: getEnforcerAddress(environment, 'ExactCalldataBatchEnforcer'),
  terms: createExecutionBatchTerms({ executions: config.executions }),
  args: '0x00',
});
