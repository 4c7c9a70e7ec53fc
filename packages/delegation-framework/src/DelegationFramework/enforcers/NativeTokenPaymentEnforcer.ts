import {
  ExecutionMode,
  checkedAdd,
  createExecution,
  createPaymentArgsEqualityTerms,
  decodeDelegations,
  decodeNativeTokenPaymentTerms,
  encodeSingleExecution,
  NATIVE_TOKEN_ADDRESS,
  type Address,
  type Delegation,
  type Hex,
  type NativeTokenPaymentTerms,
} from '@caveatkit/delegation-core';
import { isAddressEqual } from 'viem';

import type { ExecutionRuntime } from '../../runtime/ExecutionRuntime';
import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';
import { getDelegationManager } from './DelegationManagerClient';

/**
 * Requires the redeemer to pay for a delegation. The caveat args carry an
 * allowance delegation chain whose leaf is delegated to this enforcer; after
 * every execution has run, the enforcer redeems it to send `amount` of native
 * token to `recipient` and checks that it arrived.
 *
 * ArgsEqualityCheckEnforcer caveats on the allowance's leaf receive
 * `delegationHash ‖ redeemer` as args, so an allowance can be bound to the
 * one delegation and redeemer it pays for.
 */
export class NativeTokenPaymentEnforcer extends CaveatEnforcer<NativeTokenPaymentTerms> {
  readonly name = 'NativeTokenPaymentEnforcer';

  readonly delegationManager: Address;

  readonly argsEqualityCheckEnforcer: Address;

  constructor({
    runtime,
    address,
    delegationManager,
    argsEqualityCheckEnforcer,
  }: {
    runtime: ExecutionRuntime;
    address: Address;
    delegationManager: Address;
    argsEqualityCheckEnforcer: Address;
  }) {
    super({ runtime, address });
    this.delegationManager = delegationManager;
    this.argsEqualityCheckEnforcer = argsEqualityCheckEnforcer;
  }

  override afterAllHook({
    caller,
    terms,
    args,
    mode,
    delegationHash,
    delegator,
    redeemer,
  }: HookParams): void {
    this.onlyDefaultExecutionMode(mode);

    if (!isAddressEqual(caller, this.delegationManager)) {
      throw this.violation('only-delegation-manager', 'UnauthorizedCaller');
    }

    const { recipient, amount } = this.getTermsInfo(terms);
    const allowance = this.#bindAllowance(
      decodeDelegations(args),
      createPaymentArgsEqualityTerms(delegationHash, redeemer),
    );

    const balanceBefore = this.runtime.ledger.balanceOf(NATIVE_TOKEN_ADDRESS, recipient);

    getDelegationManager(this.runtime, this.delegationManager, this.name).redeemDelegations({
      caller: this.address,
      permissionContexts: [allowance],
      modes: [ExecutionMode.SingleDefault],
      executionCallDatas: [
        encodeSingleExecution(createExecution({ target: recipient, value: amount })),
      ],
    });

    const balanceAfter = this.runtime.ledger.balanceOf(NATIVE_TOKEN_ADDRESS, recipient);
    if (balanceAfter < checkedAdd(balanceBefore, amount)) {
      throw this.violation('payment-not-received', 'PaymentNotReceived');
    }

    this.logger.debug(
      {
        event: 'ValidatedPayment',
        sender: caller,
        delegationHash,
        recipient,
        delegator,
        redeemer,
        amount,
      },
      'payment validated',
    );
  }

  getTermsInfo(terms: Hex): NativeTokenPaymentTerms {
    return decodeNativeTokenPaymentTerms(terms, { enforcerName: this.name });
  }

  #bindAllowance(allowance: Delegation[], argsEqualityArgs: Hex): Delegation[] {
    const [leaf, ...rest] = allowance;
    if (!leaf) {
      throw this.violation('invalid-allowance-delegations', 'InvalidArgs');
    }

    return [
      {
        ...leaf,
        caveats: leaf.caveats.map((caveat) =>
          isAddressEqual(caveat.enforcer, this.argsEqualityCheckEnforcer)
            ? { ...caveat, args: argsEqualityArgs }
            : caveat,
        ),
      },
      ...rest,
    ];
  }
}
