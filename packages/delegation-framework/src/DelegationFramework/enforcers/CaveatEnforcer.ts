import {
  CallType,
  ExecType,
  PolicyViolationError,
  TRANSFER_SELECTOR,
  decodeBatchExecution,
  decodeExecutionMode,
  decodeSingleExecution,
  type Address,
  type ExecutionStruct,
  type Hex,
  type PolicyViolationCode,
} from '@caveatkit/delegation-core';
import { getAddress, hexToBigInt, isAddressEqual, size, slice } from 'viem';

import { getLogger, type Logger } from '../../logger';
import type { Contract, ExecutionRuntime } from '../../runtime/ExecutionRuntime';
import type { StateStore } from '../../runtime/StateJournal';

/**
 * What every hook is told about the redemption it is guarding.
 */
export type HookParams = {
  /**
   * The identity invoking the hook: the delegation manager, or a wrapper
   * enforcer. Enforcer state is scoped by it.
   */
  caller: Address;
  terms: Hex;
  args: Hex;
  mode: Hex;
  executionCallData: Hex;
  delegationHash: Hex;
  delegator: Address;
  redeemer: Address;
};

/**
 * The recipient and amount of a token `transfer(address,uint256)` call.
 */
export type TokenTransfer = {
  recipient: Address;
  amount: bigint;
};

export type EnforcerDeployment = {
  runtime: ExecutionRuntime;
  address: Address;
};

/**
 * Base class of every caveat enforcer. Hooks default to doing nothing, so an
 * enforcer only overrides the ones it needs.
 */
export abstract class CaveatEnforcer<TTerms = unknown> implements Contract {
  abstract readonly name: string;

  readonly address: Address;

  protected readonly runtime: ExecutionRuntime;

  constructor({ runtime, address }: EnforcerDeployment) {
    this.runtime = runtime;
    this.address = address;
  }

  /**
   * Runs once per caveat before any execution of the redemption.
   */
  beforeAllHook(_params: HookParams): void {}

  /**
   * Runs right before the execution the caveat guards.
   */
  beforeHook(_params: HookParams): void {}

  /**
   * Runs right after the execution the caveat guards.
   */
  afterHook(_params: HookParams): void {}

  /**
   * Runs once per caveat after every execution of the redemption.
   */
  afterAllHook(_params: HookParams): void {}

  /**
   * Decodes and validates the enforcer's terms.
   *
   * @param terms - The encoded terms.
   * @returns The decoded terms.
   * @throws InvalidTermsLengthError if the terms do not have the expected layout.
   */
  abstract getTermsInfo(terms: Hex): TTerms;

  protected get logger(): Logger {
    return getLogger(this.name);
  }

  protected createStore<TValue>(name: string): StateStore<TValue> {
    return this.runtime.journal.createStore(name);
  }

  protected violation(
    reason: string,
    code: PolicyViolationCode,
  ): PolicyViolationError {
    this.logger.debug({ reason, code }, 'caveat rejected execution');
    return new PolicyViolationError({ enforcer: this.name, reason, code });
  }

  protected onlySingleCallTypeMode(mode: Hex): void {
    if (decodeExecutionMode(mode).callType !== CallType.Single) {
      throw new PolicyViolationError({
        enforcer: 'CaveatEnforcer',
        reason: 'invalid-call-type',
        code: 'InvalidCallType',
      });
    }
  }

  protected onlyBatchCallTypeMode(mode: Hex): void {
    if (decodeExecutionMode(mode).callType !== CallType.Batch) {
      throw new PolicyViolationError({
        enforcer: 'CaveatEnforcer',
        reason: 'invalid-call-type',
        code: 'InvalidCallType',
      });
    }
  }

  protected onlyDefaultExecutionMode(mode: Hex): void {
    if (decodeExecutionMode(mode).execType !== ExecType.Default) {
      throw new PolicyViolationError({
        enforcer: 'CaveatEnforcer',
        reason: 'invalid-execution-type',
        code: 'InvalidExecutionType',
      });
    }
  }

  /**
   * Decodes the executions a hook is guarding, whatever the call type.
   *
   * @param mode - The execution mode.
   * @param executionCallData - The encoded execution or batch.
   * @returns The executions.
   */
  protected decodeExecutions(mode: Hex, executionCallData: Hex): ExecutionStruct[] {
    const { callType } = decodeExecutionMode(mode);
    if (callType === CallType.Single) {
      return [decodeSingleExecution(executionCallData)];
    }
    if (callType === CallType.Batch) {
      return decodeBatchExecution(executionCallData);
    }
    throw new PolicyViolationError({
      enforcer: 'CaveatEnforcer',
      reason: 'invalid-call-type',
      code: 'InvalidCallType',
    });
  }

  /**
   * Reads a token transfer from an execution, rejecting calls to any other
   * contract or function.
   *
   * @param execution - The execution to read.
   * @param tokenAddress - The token the execution must call.
   * @returns The transfer.
   */
  protected decodeTokenTransfer(
    execution: ExecutionStruct,
    tokenAddress: Address,
  ): TokenTransfer {
    const { target, callData } = execution;

    if (size(callData) !== 68) {
      throw this.violation('invalid-execution-length', 'InvalidCalldata');
    }

    if (!isAddressEqual(target, tokenAddress)) {
      throw this.violation('invalid-contract', 'InvalidToken');
    }

    if (slice(callData, 0, 4).toLowerCase() !== TRANSFER_SELECTOR) {
      throw this.violation('invalid-method', 'InvalidMethod');
    }

    return {
      recipient: getAddress(slice(callData, 16, 36)),
      amount: hexToBigInt(slice(callData, 36, 68)),
    };
  }
}
