import {
  CallType,
  ExecType,
  ExecutionError,
  decodeBatchExecution,
  decodeExecutionMode,
  decodeSingleExecution,
  hashDelegation,
  type Address,
  type Delegation,
  type ExecutionStruct,
  type Hex,
} from '@caveatkit/delegation-core';
import { isAddressEqual } from 'viem';

import { getLogger } from '../logger';
import type { CallContext, Contract, ExecutionRuntime } from './ExecutionRuntime';

/**
 * Produces and checks signatures over 32 byte hashes for one principal.
 */
export type DelegationSigner = {
  sign(hash: Hex): Hex;
  verify(hash: Hex, signature: Hex): boolean;
};

/**
 * An account that grants delegations and executes on behalf of its delegates
 * when the delegation manager tells it to.
 */
export class DelegatorAccount implements Contract {
  readonly address: Address;

  readonly delegationManager: Address;

  readonly #runtime: ExecutionRuntime;

  readonly #signer: DelegationSigner;

  readonly #logger = getLogger('DelegatorAccount');

  constructor({
    runtime,
    address,
    signer,
    delegationManager,
  }: {
    runtime: ExecutionRuntime;
    address: Address;
    signer: DelegationSigner;
    delegationManager: Address;
  }) {
    this.#runtime = runtime;
    this.address = address;
    this.#signer = signer;
    this.delegationManager = delegationManager;
  }

  /**
   * Signs a delegation granted by this account.
   *
   * @param delegation - The delegation to sign.
   * @returns The signature.
   */
  signDelegation(delegation: Omit<Delegation, 'signature'>): Hex {
    return this.#signer.sign(hashDelegation({ ...delegation, signature: '0x' }));
  }

  isValidSignature(hash: Hex, signature: Hex): boolean {
    return this.#signer.verify(hash, signature);
  }

  /**
   * Executes on behalf of a delegate. Only the delegation manager may call this.
   *
   * @param caller - The identity calling the account.
   * @param mode - The execution mode.
   * @param executionCallData - The encoded execution or batch.
   * @returns The data returned by each execution, `0x` for failed try calls.
   */
  executeFromExecutor(caller: Address, mode: Hex, executionCallData: Hex): Hex[] {
    if (!isAddressEqual(caller, this.delegationManager)) {
      throw new ExecutionError('DelegatorAccount', 'NotDelegationManager');
    }

    return this.execute(mode, executionCallData);
  }

  /**
   * Executes as this account.
   *
   * @param mode - The execution mode.
   * @param executionCallData - The encoded execution or batch.
   * @returns The data returned by each execution, `0x` for failed try calls.
   */
  execute(mode: Hex, executionCallData: Hex): Hex[] {
    const { callType, execType } = decodeExecutionMode(mode);

    let executions: ExecutionStruct[];
    if (callType === CallType.Single) {
      executions = [decodeSingleExecution(executionCallData)];
    } else if (callType === CallType.Batch) {
      executions = decodeBatchExecution(executionCallData);
    } else {
      throw new ExecutionError('DelegatorAccount', 'UnsupportedCallType', {
        details: `Call type ${callType}`,
      });
    }

    if (execType !== ExecType.Default && execType !== ExecType.Try) {
      throw new ExecutionError('DelegatorAccount', 'UnsupportedExecType', {
        details: `Exec type ${execType}`,
      });
    }

    return executions.map((execution, index) => {
      const context = {
        from: this.address,
        to: execution.target,
        value: execution.value,
        data: execution.callData,
      };

      if (execType === ExecType.Default) {
        return this.#runtime.call(context);
      }

      const result = this.#runtime.tryCall(context);
      if (result.success) {
        return result.returnData;
      }
      this.#logger.debug(
        {
          event: 'TryExecuteUnsuccessful',
          account: this.address,
          batchExecutionIndex: index,
          reason: result.error.message,
        },
        'execution failed in try mode',
      );
      return '0x';
    });
  }

  call(context: CallContext): Hex {
    // plain transfers only; the value was already credited by the runtime
    if (context.data !== '0x') {
      throw new ExecutionError('DelegatorAccount', 'UnsupportedFunction');
    }
    return '0x';
  }
}
