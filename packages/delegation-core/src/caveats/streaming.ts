import { concat } from 'viem';

import type { Address, Hex } from '../types';
import {
  assertAddress,
  assertPositive,
  assertTermsLength,
  encodeUint,
  readAddress,
  readUint,
  type DecodeTermsOptions,
} from './utils';

export type NativeTokenStreamingTerms = {
  /**
   * The amount available as soon as the stream starts.
   */
  initialAmount: bigint;
  /**
   * The ceiling on the total amount the stream ever unlocks.
   */
  maxAmount: bigint;
  amountPerSecond: bigint;
  startTime: bigint;
};

export type TokenStreamingTerms = NativeTokenStreamingTerms & {
  tokenAddress: Address;
};

export const NATIVE_TOKEN_STREAMING_TERMS_LENGTH = 128;

export const TOKEN_STREAMING_TERMS_LENGTH = 148;

const encodeStream = (terms: NativeTokenStreamingTerms): Hex => {
  const { initialAmount, maxAmount, amountPerSecond, startTime } = terms;

  assertPositive(maxAmount, 'maxAmount');
  assertPositive(amountPerSecond, 'amountPerSecond');
  assertPositive(startTime, 'startTime');

  if (maxAmount < initialAmount) {
    throw new Error('Invalid maxAmount: must be greater than initialAmount');
  }

  return concat([
    encodeUint(initialAmount, 'initialAmount'),
    encodeUint(maxAmount, 'maxAmount'),
    encodeUint(amountPerSecond, 'amountPerSecond'),
    encodeUint(startTime, 'startTime'),
  ]);
};

const decodeStream = (terms: Hex, offset: number): NativeTokenStreamingTerms => ({
  initialAmount: readUint(terms, offset),
  maxAmount: readUint(terms, offset + 32),
  amountPerSecond: readUint(terms, offset + 64),
  startTime: readUint(terms, offset + 96),
});

/**
 * Creates terms for the NativeTokenStreamingEnforcer.
 *
 * @param terms - The stream configuration.
 * @returns The encoded terms.
 * @throws Error if the stream never unlocks anything or maxAmount is below initialAmount.
 */
export function createNativeTokenStreamingTerms(
  terms: NativeTokenStreamingTerms,
): Hex {
  return encodeStream(terms);
}

export function decodeNativeTokenStreamingTerms(
  terms: Hex,
  { enforcerName = 'NativeTokenStreamingEnforcer' }: DecodeTermsOptions = {},
): NativeTokenStreamingTerms {
  assertTermsLength(terms, NATIVE_TOKEN_STREAMING_TERMS_LENGTH, enforcerName);
  return decodeStream(terms, 0);
}

export function createTokenStreamingTerms(terms: TokenStreamingTerms): Hex {
  return concat([
    assertAddress(terms.tokenAddress, 'tokenAddress'),
    encodeStream(terms),
  ]);
}

export function decodeTokenStreamingTerms(
  terms: Hex,
  { enforcerName = 'TokenStreamingEnforcer' }: DecodeTermsOptions = {},
): TokenStreamingTerms {
  assertTermsLength(terms, TOKEN_STREAMING_TERMS_LENGTH, enforcerName);
  return {
    tokenAddress: readAddress(terms, 0),
    ...decodeStream(terms, 20),
  };
}
