import {
  decodeLogicalOrWrapperArgs,
  decodeLogicalOrWrapperTerms,
  ExecutionError,
  type Address,
  type Hex,
  type LogicalOrWrapperTerms,
} from '@caveatkit/delegation-core';
import { isAddressEqual } from 'viem';

import type { ExecutionRuntime } from '../../runtime/ExecutionRuntime';
import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

type Hook = 'beforeAllHook' | 'beforeHook' | 'afterHook' | 'afterAllHook';

/**
 * Disjunction over groups of caveats. The terms hold the groups; the redeemer
 * picks one through the args and supplies the args of each of its caveats.
 * Only the picked group is enforced, with this wrapper as the caller so its
 * state never collides with caveats the manager calls directly.
 */
export class LogicalOrWrapperEnforcer extends CaveatEnforcer<LogicalOrWrapperTerms> {
  readonly name = 'LogicalOrWrapperEnforcer';

  readonly delegationManager: Address;

  constructor({
    runtime,
    address,
    delegationManager,
  }: {
    runtime: ExecutionRuntime;
    address: Address;
    delegationManager: Address;
  }) {
    super({ runtime, address });
    this.delegationManager = delegationManager;
  }

  override beforeAllHook(params: HookParams): void {
    this.#forward('beforeAllHook', params);
  }

  override beforeHook(params: HookParams): void {
    this.#forward('beforeHook', params);
  }

  override afterHook(params: HookParams): void {
    this.#forward('afterHook', params);
  }

  override afterAllHook(params: HookParams): void {
    this.#forward('afterAllHook', params);
  }

  getTermsInfo(terms: Hex): LogicalOrWrapperTerms {
    return decodeLogicalOrWrapperTerms(terms, { enforcerName: this.name });
  }

  #forward(hook: Hook, params: HookParams): void {
    if (!isAddressEqual(params.caller, this.delegationManager)) {
      throw this.violation('only-delegation-manager', 'UnauthorizedCaller');
    }

    const { groups } = this.getTermsInfo(params.terms);
    const { groupIndex, caveatArgs } = decodeLogicalOrWrapperArgs(params.args);

    const group =
      groupIndex < BigInt(groups.length) ? groups[Number(groupIndex)] : undefined;
    if (!group) {
      throw this.violation('invalid-group-index', 'InvalidGroupIndex');
    }

    if (group.caveats.length !== caveatArgs.length) {
      throw this.violation('invalid-caveat-args-length', 'InvalidCaveatArgsLength');
    }

    group.caveats.forEach((caveat, index) => {
      this.#enforcer(caveat.enforcer)[hook]({
        ...params,
        caller: this.address,
        terms: caveat.terms,
        args: caveatArgs[index] ?? '0x',
      });
    });
  }

  #enforcer(address: Address): CaveatEnforcer {
    const contract = this.runtime.getContract(address);
    if (!(contract instanceof CaveatEnforcer)) {
      throw new ExecutionError(this.name, 'UnknownEnforcer', {
        details: `No caveat enforcer deployed at ${address}`,
      });
    }
    return contract;
  }
}
