import {
  ExecutionError,
  NATIVE_TOKEN_ADDRESS,
  type Address,
  type Hex,
} from '@caveatkit/delegation-core';

import { getLogger } from '../logger';
import { ManualClock, type Clock } from './clock';
import { InMemoryLedger } from './InMemoryLedger';
import { StateJournal } from './StateJournal';

export type CallContext = {
  /**
   * The identity making the call.
   */
  from: Address;
  to: Address;
  value: bigint;
  data: Hex;
};

/**
 * Anything with an address in the runtime. Contracts that accept calls
 * implement `call`; the rest are reached through direct references.
 */
export type Contract = {
  readonly address: Address;
  call?(context: CallContext): Hex;
};

export type TryCallResult =
  | { success: true; returnData: Hex }
  | { success: false; error: Error };

/**
 * The in-process execution environment: a contract registry, a ledger and a
 * clock, with every mutable value journaled so a transaction can be undone.
 */
export class ExecutionRuntime {
  readonly journal: StateJournal;

  readonly ledger: InMemoryLedger;

  readonly clock: Clock;

  readonly #contracts = new Map<string, Contract>();

  readonly #logger = getLogger('ExecutionRuntime');

  constructor({ clock = new ManualClock() }: { clock?: Clock } = {}) {
    this.journal = new StateJournal();
    this.ledger = new InMemoryLedger(this.journal);
    this.clock = clock;
  }

  deploy<TContract extends Contract>(contract: TContract): TContract {
    const key = contract.address.toLowerCase();
    if (this.#contracts.has(key)) {
      throw new Error(`Contract already deployed at ${contract.address}`);
    }
    this.#contracts.set(key, contract);
    return contract;
  }

  getContract(address: Address): Contract | undefined {
    return this.#contracts.get(address.toLowerCase());
  }

  /**
   * Moves the call's native value to the target, then runs the target's code.
   * Addresses without code accept any call.
   *
   * @param context - The call to make.
   * @returns The data returned by the target.
   */
  call(context: CallContext): Hex {
    if (context.value > 0n) {
      this.ledger.transfer(
        NATIVE_TOKEN_ADDRESS,
        context.from,
        context.to,
        context.value,
      );
    }

    const contract = this.getContract(context.to);
    if (!contract) {
      return '0x';
    }

    if (!contract.call) {
      if (context.data === '0x') {
        return '0x';
      }
      throw new ExecutionError('ExecutionRuntime', 'UnsupportedFunction', {
        details: `${context.to} does not accept calls`,
      });
    }

    return contract.call(context);
  }

  /**
   * Runs a call, undoing its effects and capturing the error if it fails.
   *
   * @param context - The call to make.
   * @returns The outcome of the call.
   */
  tryCall(context: CallContext): TryCallResult {
    const checkpoint = this.journal.checkpoint();
    try {
      return { success: true, returnData: this.call(context) };
    } catch (error) {
      this.journal.revert(checkpoint);
      const failure = error instanceof Error ? error : new Error(String(error));
      this.#logger.debug(
        { event: 'TryExecuteUnsuccessful', to: context.to, reason: failure.message },
        'call failed in try mode',
      );
      return { success: false, error: failure };
    }
  }

  /**
   * Runs `fn` atomically: if it throws, every journaled change made while it
   * ran is reverted before the error propagates.
   *
   * @param fn - The work to run.
   * @returns The value returned by `fn`.
   */
  transact<TResult>(fn: () => TResult): TResult {
    const checkpoint = this.journal.checkpoint();
    try {
      return fn();
    } catch (error) {
      this.journal.revert(checkpoint);
      throw error;
    }
  }
}
