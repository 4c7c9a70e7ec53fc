import {
  decodeAbiParameters,
  encodeAbiParameters,
  getAddress,
} from 'viem';

import { InvalidTermsLengthError } from '../errors';
import { encodeSingleExecution } from '../executions';
import type { ExecutionStruct, Hex } from '../types';
import {
  readAddress,
  readBytes,
  readUint,
  termsSize,
  type DecodeTermsOptions,
} from './utils';

export type ExactExecutionTerms = {
  execution: ExecutionStruct;
};

export type ExecutionBatchTerms = {
  executions: ExecutionStruct[];
};

const EXECUTION_ARRAY_ABI_PARAMETER = {
  type: 'tuple[]',
  components: [
    { type: 'address', name: 'target' },
    { type: 'uint256', name: 'value' },
    { type: 'bytes', name: 'callData' },
  ],
} as const;

/**
 * Creates terms for the ExactExecutionEnforcer: the packed execution.
 *
 * @param terms - The terms.
 * @param terms.execution - The only execution the delegation authorizes.
 * @returns The encoded terms.
 */
export function createExactExecutionTerms({ execution }: ExactExecutionTerms): Hex {
  return encodeSingleExecution(execution);
}

export function decodeExactExecutionTerms(
  terms: Hex,
  { enforcerName = 'ExactExecutionEnforcer' }: DecodeTermsOptions = {},
): ExactExecutionTerms {
  const length = termsSize(terms, enforcerName);
  if (length < 52) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: `Expected at least 52 bytes, received ${length}`,
    });
  }

  return {
    execution: {
      target: readAddress(terms, 0),
      value: readUint(terms, 20),
      callData: readBytes(terms, 52),
    },
  };
}

/**
 * Creates terms for the ExactExecutionBatchEnforcer and
 * ExactCalldataBatchEnforcer: the ABI encoded execution batch.
 *
 * @param terms - The terms.
 * @param terms.executions - The executions of the batch, in order.
 * @returns The encoded terms.
 */
export function createExecutionBatchTerms({ executions }: ExecutionBatchTerms): Hex {
  if (executions.length === 0) {
    throw new Error('Invalid executions: must provide at least one execution');
  }
  return encodeAbiParameters([EXECUTION_ARRAY_ABI_PARAMETER], [executions]);
}

/**
 * Decodes an execution batch. The terms must be the canonical encoding of the
 * decoded batch, so trailing or missing bytes fail.
 *
 * @param terms - The encoded batch.
 * @param options - Decoder options.
 * @returns The executions.
 */
export function decodeExecutionBatchTerms(
  terms: Hex,
  { enforcerName = 'ExactExecutionBatchEnforcer' }: DecodeTermsOptions = {},
): ExecutionBatchTerms {
  termsSize(terms, enforcerName);

  let executions: ExecutionStruct[];
  try {
    const [decoded] = decodeAbiParameters(
      [EXECUTION_ARRAY_ABI_PARAMETER],
      terms,
    );
    executions = decoded.map(({ target, value, callData }) => ({
      target: getAddress(target),
      value,
      callData,
    }));
  } catch (error) {
    throw new InvalidTermsLengthError(enforcerName, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const canonical = encodeAbiParameters(
    [EXECUTION_ARRAY_ABI_PARAMETER],
    [executions],
  );
  if (canonical !== terms.toLowerCase()) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: 'Terms are not a canonical execution batch encoding',
    });
  }

  return { executions };
}
