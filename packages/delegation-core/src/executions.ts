import {
  decodeAbiParameters,
  encodeAbiParameters,
  encodePacked,
  getAddress,
  hexToBigInt,
  hexToNumber,
  size,
  slice,
} from 'viem';

import { ExecutionError } from './errors';
import type { Address, ExecutionStruct, Hex } from './types';

/**
 * The execution modes an account accepts: call type in the first byte,
 * exec type in the second.
 */
export enum ExecutionMode {
  SingleDefault = '0x0000000000000000000000000000000000000000000000000000000000000000',
  SingleTry = '0x0001000000000000000000000000000000000000000000000000000000000000',
  BatchDefault = '0x0100000000000000000000000000000000000000000000000000000000000000',
  BatchTry = '0x0101000000000000000000000000000000000000000000000000000000000000',
}

export enum CallType {
  Single = 0x00,
  Batch = 0x01,
  DelegateCall = 0xff,
}

export enum ExecType {
  Default = 0x00,
  Try = 0x01,
}

export type DecodedExecutionMode = {
  callType: number;
  execType: number;
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
 * Splits an execution mode into its call type and exec type.
 *
 * @param mode - The 32 byte execution mode.
 * @returns The decoded mode.
 */
export const decodeExecutionMode = (mode: Hex): DecodedExecutionMode => {
  if (size(mode) !== 32) {
    throw new ExecutionError('ExecutionMode', 'MalformedCalldata', {
      details: `Expected 32 bytes, received ${size(mode)}`,
    });
  }

  return {
    callType: hexToNumber(slice(mode, 0, 1)),
    execType: hexToNumber(slice(mode, 1, 2)),
  };
};

/**
 * Creates an execution.
 *
 * @param execution - The execution to create.
 * @param execution.target - The address being called.
 * @param execution.value - The native value sent with the call.
 * @param execution.callData - The payload of the call.
 * @returns The execution.
 */
export const createExecution = ({
  target,
  value = 0n,
  callData = '0x',
}: {
  target: Address;
  value?: bigint;
  callData?: Hex;
}): ExecutionStruct => ({
  target,
  value,
  callData,
});

/**
 * Packs a single execution as `target ‖ value ‖ callData`.
 *
 * @param execution - The execution to encode.
 * @returns The execution calldata.
 */
export const encodeSingleExecution = (execution: ExecutionStruct): Hex =>
  encodePacked(
    ['address', 'uint256', 'bytes'],
    [execution.target, execution.value, execution.callData],
  );

export const decodeSingleExecution = (executionCallData: Hex): ExecutionStruct => {
  if (size(executionCallData) < 52) {
    throw new ExecutionError('SingleExecution', 'MalformedCalldata', {
      details: `Expected at least 52 bytes, received ${size(executionCallData)}`,
    });
  }

  return {
    target: getAddress(slice(executionCallData, 0, 20)),
    value: hexToBigInt(slice(executionCallData, 20, 52)),
    callData:
      size(executionCallData) === 52 ? '0x' : slice(executionCallData, 52),
  };
};

/**
 * ABI encodes a batch of executions.
 *
 * @param executions - The executions to encode.
 * @returns The execution calldata.
 */
export const encodeBatchExecution = (executions: ExecutionStruct[]): Hex =>
  encodeAbiParameters([EXECUTION_ARRAY_ABI_PARAMETER], [executions]);

export const decodeBatchExecution = (
  executionCallData: Hex,
): ExecutionStruct[] => {
  try {
    const [executions] = decodeAbiParameters(
      [EXECUTION_ARRAY_ABI_PARAMETER],
      executionCallData,
    );

    return executions.map(({ target, value, callData }) => ({
      target: getAddress(target),
      value,
      callData,
    }));
  } catch (error) {
    throw new ExecutionError('BatchExecution', 'MalformedCalldata', {
      cause: error instanceof Error ? error : undefined,
    });
  }
};

/**
 * Encodes executions the way an account expects them: packed when there is
 * exactly one, ABI encoded as a batch otherwise.
 *
 * @param executions - The executions to encode.
 * @returns The execution calldata.
 */
export const encodeExecutionCalldata = (executions: ExecutionStruct[]): Hex => {
  const [first, ...rest] = executions;
  if (first && rest.length === 0) {
    return encodeSingleExecution(first);
  }
  return encodeBatchExecution(executions);
};

export const encodeExecutionCalldatas = (
  executionsBatch: ExecutionStruct[][],
): Hex[] => executionsBatch.map(encodeExecutionCalldata);
