import { concat } from 'viem';

import type { Address, Hex } from '../types';
import {
  assertAddress,
  assertPositive,
  assertTermsLength,
  encodeUint,
  readAddress,
  readUint,
  requireNonZeroTerm,
  type DecodeTermsOptions,
} from './utils';

export type SwapOfferTerms = {
  /**
   * The token the offer maker wants to receive.
   */
  tokenIn: Address;
  /**
   * The token the offer maker gives out.
   */
  tokenOut: Address;
  /**
   * The amount of tokenIn owed for the whole of amountOut.
   */
  amountIn: bigint;
  amountOut: bigint;
  /**
   * The account receiving the tokenIn payment.
   */
  recipient: Address;
};

export const SWAP_OFFER_TERMS_LENGTH = 124;

export function createSwapOfferTerms(terms: SwapOfferTerms): Hex {
  assertPositive(terms.amountIn, 'amountIn');
  assertPositive(terms.amountOut, 'amountOut');

  return concat([
    assertAddress(terms.tokenIn, 'tokenIn'),
    assertAddress(terms.tokenOut, 'tokenOut'),
    encodeUint(terms.amountIn, 'amountIn'),
    encodeUint(terms.amountOut, 'amountOut'),
    assertAddress(terms.recipient, 'recipient'),
  ]);
}

export function decodeSwapOfferTerms(
  terms: Hex,
  { enforcerName = 'SwapOfferEnforcer' }: DecodeTermsOptions = {},
): SwapOfferTerms {
  assertTermsLength(terms, SWAP_OFFER_TERMS_LENGTH, enforcerName);

  return {
    tokenIn: readAddress(terms, 0),
    tokenOut: readAddress(terms, 20),
    amountIn: requireNonZeroTerm(readUint(terms, 40), 'invalid-zero-amount-in', enforcerName),
    amountOut: requireNonZeroTerm(readUint(terms, 72), 'invalid-zero-amount-out', enforcerName),
    recipient: readAddress(terms, 104),
  };
}
