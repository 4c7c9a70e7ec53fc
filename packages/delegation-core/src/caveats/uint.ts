import type { Hex } from '../types';
import {
  assertPositive,
  assertTermsLength,
  encodeUint,
  readUint,
  type DecodeTermsOptions,
} from './utils';

// Enforcers whose terms are a single uint256 word.

export type ValueLteTerms = {
  maxValue: bigint;
};

export type LimitedCallsTerms = {
  limit: bigint;
};

export type IdTerms = {
  id: bigint;
};

export type NonceTerms = {
  nonce: bigint;
};

export type NativeTokenTransferAmountTerms = {
  maxAmount: bigint;
};

export const UINT_TERMS_LENGTH = 32;

export function createValueLteTerms({ maxValue }: ValueLteTerms): Hex {
  return encodeUint(maxValue, 'maxValue');
}

export function decodeValueLteTerms(
  terms: Hex,
  { enforcerName = 'ValueLteEnforcer' }: DecodeTermsOptions = {},
): ValueLteTerms {
  assertTermsLength(terms, UINT_TERMS_LENGTH, enforcerName);
  return { maxValue: readUint(terms, 0) };
}

/**
 * Creates terms for the LimitedCallsEnforcer and RedeemerLimitedCallsEnforcer.
 *
 * @param terms - The terms.
 * @param terms.limit - The number of redemptions allowed.
 * @returns The encoded terms.
 */
export function createLimitedCallsTerms({ limit }: LimitedCallsTerms): Hex {
  assertPositive(limit, 'limit');
  return encodeUint(limit, 'limit');
}

export function decodeLimitedCallsTerms(
  terms: Hex,
  { enforcerName = 'LimitedCallsEnforcer' }: DecodeTermsOptions = {},
): LimitedCallsTerms {
  assertTermsLength(terms, UINT_TERMS_LENGTH, enforcerName);
  return { limit: readUint(terms, 0) };
}

export function createIdTerms({ id }: IdTerms): Hex {
  return encodeUint(id, 'id');
}

export function decodeIdTerms(
  terms: Hex,
  { enforcerName = 'IdEnforcer' }: DecodeTermsOptions = {},
): IdTerms {
  assertTermsLength(terms, UINT_TERMS_LENGTH, enforcerName);
  return { id: readUint(terms, 0) };
}

export function createNonceTerms({ nonce }: NonceTerms): Hex {
  return encodeUint(nonce, 'nonce');
}

export function decodeNonceTerms(
  terms: Hex,
  { enforcerName = 'NonceEnforcer' }: DecodeTermsOptions = {},
): NonceTerms {
  assertTermsLength(terms, UINT_TERMS_LENGTH, enforcerName);
  return { nonce: readUint(terms, 0) };
}

export function createNativeTokenTransferAmountTerms({
  maxAmount,
}: NativeTokenTransferAmountTerms): Hex {
  return encodeUint(maxAmount, 'maxAmount');
}

export function decodeNativeTokenTransferAmountTerms(
  terms: Hex,
  { enforcerName = 'NativeTokenTransferAmountEnforcer' }: DecodeTermsOptions = {},
): NativeTokenTransferAmountTerms {
  assertTermsLength(terms, UINT_TERMS_LENGTH, enforcerName);
  return { maxAmount: readUint(terms, 0) };
}
