import {
  ExecutionMode,
  NATIVE_TOKEN_ADDRESS,
  TRANSFER_SELECTOR,
  checkedAdd,
  checkedMul,
  createExecution,
  decodeSingleExecution,
  decodeSwapOfferTerms,
  encodeSingleExecution,
  type Address,
  type ExecutionStruct,
  type Hex,
  type SwapOfferTerms,
} from '@caveatkit/delegation-core';
import {
  encodeFunctionData,
  erc20Abi,
  hexToBigInt,
  isAddressEqual,
  size,
  slice,
} from 'viem';

import type { ExecutionRuntime } from '../../runtime/ExecutionRuntime';
import type { StateStore } from '../../runtime/StateJournal';
import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';
import { getDelegationManager } from './DelegationManagerClient';

export type SwapOfferFill = {
  amountInFilled: bigint;
  amountOutFilled: bigint;
};

/**
 * An offer to give up to `amountOut` of `tokenOut` in exchange for `tokenIn`
 * at a fixed rate. Each fill is paid before it executes: the caveat args
 * carry a payment delegation chain delegated to this enforcer, which it
 * redeems to send the owed `tokenIn` to `recipient`.
 */
export class SwapOfferEnforcer extends CaveatEnforcer<SwapOfferTerms> {
  readonly name = 'SwapOfferEnforcer';

  readonly delegationManager: Address;

  readonly #fills: StateStore<SwapOfferFill>;

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
    this.#fills = this.createStore('SwapOfferEnforcer.swapOffers');
  }

  swapOffers(delegationManager: Address, delegationHash: Hex): SwapOfferFill {
    return (
      this.#fills.get([delegationManager, delegationHash]) ?? {
        amountInFilled: 0n,
        amountOutFilled: 0n,
      }
    );
  }

  override beforeHook({
    caller,
    terms,
    args,
    mode,
    executionCallData,
    delegationHash,
    redeemer,
  }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const offer = this.getTermsInfo(terms);
    const { target, callData } = decodeSingleExecution(executionCallData);

    if (!isAddressEqual(target, offer.tokenOut)) {
      throw this.violation('invalid-token', 'InvalidToken');
    }

    if (size(callData) !== 68 || slice(callData, 0, 4).toLowerCase() !== TRANSFER_SELECTOR) {
      throw this.violation('invalid-method', 'InvalidMethod');
    }

    // The taken tokenOut must reach the redeemer paying tokenIn.
    if (!isAddressEqual(slice(callData, 16, 36), redeemer)) {
      throw this.violation('invalid-recipient', 'InvalidRecipient');
    }

    const amountOut = hexToBigInt(slice(callData, 36, 68));
    const filled = this.swapOffers(caller, delegationHash);
    const amountOutFilled = checkedAdd(filled.amountOutFilled, amountOut);
    if (amountOutFilled > offer.amountOut) {
      throw this.violation('exceeds-output-amount', 'ExceedsOutputAmount');
    }

    // the offer maker is never short-changed by rounding
    const amountIn =
      (checkedMul(amountOut, offer.amountIn) + offer.amountOut - 1n) / offer.amountOut;

    this.#fills.set([caller, delegationHash], {
      amountInFilled: checkedAdd(filled.amountInFilled, amountIn),
      amountOutFilled,
    });

    this.#collectPayment(offer, amountIn, args);

    this.logger.debug(
      {
        event: 'SwapOfferUpdated',
        sender: caller,
        delegationHash,
        redeemer,
        amountIn,
        amountOut,
      },
      'swap offer filled',
    );
  }

  getTermsInfo(terms: Hex): SwapOfferTerms {
    return decodeSwapOfferTerms(terms, { enforcerName: this.name });
  }

  #collectPayment(offer: SwapOfferTerms, amountIn: bigint, paymentContext: Hex): void {
    const { tokenIn, recipient } = offer;
    const balanceBefore = this.runtime.ledger.balanceOf(tokenIn, recipient);

    getDelegationManager(this.runtime, this.delegationManager, this.name).redeemDelegations({
      caller: this.address,
      permissionContexts: [paymentContext],
      modes: [ExecutionMode.SingleDefault],
      executionCallDatas: [encodeSingleExecution(paymentExecution(tokenIn, recipient, amountIn))],
    });

    const balanceAfter = this.runtime.ledger.balanceOf(tokenIn, recipient);
    if (balanceAfter < checkedAdd(balanceBefore, amountIn)) {
      throw this.violation('payment-not-received', 'PaymentNotReceived');
    }
  }
}

const paymentExecution = (
  token: Address,
  recipient: Address,
  amount: bigint,
): ExecutionStruct =>
  isAddressEqual(token, NATIVE_TOKEN_ADDRESS)
    ? createExecution({ target: recipient, value: amount })
    : createExecution({
        target: token,
        callData: encodeFunctionData({
          abi: erc20Abi,
          functionName: 'transfer',
          args: [recipient, amount],
        }),
      });
