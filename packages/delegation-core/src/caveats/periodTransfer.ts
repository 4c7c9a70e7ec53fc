import { concat } from 'viem';

import { NATIVE_TOKEN_ADDRESS } from '../constants';
import { InvalidTermsLengthError } from '../errors';
import type { Address, Hex } from '../types';
import {
  assertAddress,
  assertPositive,
  assertTermsLength,
  encodeUint,
  readAddress,
  readUint,
  requireNonZeroTerm,
  termsSize,
  type DecodeTermsOptions,
} from './utils';

export type NativeTokenPeriodTransferTerms = {
  /**
   * The maximum amount that can be transferred in each period.
   */
  periodAmount: bigint;
  /**
   * The length of a period in seconds.
   */
  periodDuration: bigint;
  /**
   * The timestamp at which the first period begins.
   */
  startDate: bigint;
};

export type TokenPeriodTransferTerms = NativeTokenPeriodTransferTerms & {
  tokenAddress: Address;
};

export type MultiTokenPeriodTerms = {
  /**
   * One period configuration per token. NATIVE_TOKEN_ADDRESS configures the
   * native token.
   */
  tokenConfigs: TokenPeriodTransferTerms[];
};

export const NATIVE_TOKEN_PERIOD_TRANSFER_TERMS_LENGTH = 96;

export const TOKEN_PERIOD_TRANSFER_TERMS_LENGTH = 116;

const encodePeriod = (terms: NativeTokenPeriodTransferTerms): Hex => {
  const { periodAmount, periodDuration, startDate } = terms;

  assertPositive(periodAmount, 'periodAmount');
  assertPositive(periodDuration, 'periodDuration');
  assertPositive(startDate, 'startDate');

  return concat([
    encodeUint(periodAmount, 'periodAmount'),
    encodeUint(periodDuration, 'periodDuration'),
    encodeUint(startDate, 'startDate'),
  ]);
};

const decodePeriod = (
  terms: Hex,
  offset: number,
  enforcerName: string,
): NativeTokenPeriodTransferTerms => ({
  periodAmount: requireNonZeroTerm(
    readUint(terms, offset),
    'invalid-zero-period-amount',
    enforcerName,
  ),
  periodDuration: requireNonZeroTerm(
    readUint(terms, offset + 32),
    'invalid-zero-period-duration',
    enforcerName,
  ),
  startDate: requireNonZeroTerm(
    readUint(terms, offset + 64),
    'invalid-zero-start-date',
    enforcerName,
  ),
});

export function createNativeTokenPeriodTransferTerms(
  terms: NativeTokenPeriodTransferTerms,
): Hex {
  return encodePeriod(terms);
}

export function decodeNativeTokenPeriodTransferTerms(
  terms: Hex,
  { enforcerName = 'NativeTokenPeriodTransferEnforcer' }: DecodeTermsOptions = {},
): NativeTokenPeriodTransferTerms {
  assertTermsLength(
    terms,
    NATIVE_TOKEN_PERIOD_TRANSFER_TERMS_LENGTH,
    enforcerName,
  );
  return decodePeriod(terms, 0, enforcerName);
}

export function createTokenPeriodTransferTerms(
  terms: TokenPeriodTransferTerms,
): Hex {
  return concat([
    assertAddress(terms.tokenAddress, 'tokenAddress'),
    encodePeriod(terms),
  ]);
}

export function decodeTokenPeriodTransferTerms(
  terms: Hex,
  { enforcerName = 'TokenPeriodTransferEnforcer' }: DecodeTermsOptions = {},
): TokenPeriodTransferTerms {
  assertTermsLength(terms, TOKEN_PERIOD_TRANSFER_TERMS_LENGTH, enforcerName);
  return {
    tokenAddress: readAddress(terms, 0),
    ...decodePeriod(terms, 20, enforcerName),
  };
}

/**
 * Creates terms for the MultiTokenPeriodEnforcer: one 116 byte token period
 * configuration after another.
 *
 * @param terms - The terms.
 * @param terms.tokenConfigs - The per-token period configurations.
 * @returns The encoded terms.
 */
export function createMultiTokenPeriodTerms({
  tokenConfigs,
}: MultiTokenPeriodTerms): Hex {
  if (tokenConfigs.length === 0) {
    throw new Error('Invalid tokenConfigs: must provide at least one token');
  }
  return concat(tokenConfigs.map(createTokenPeriodTransferTerms));
}

export function decodeMultiTokenPeriodTerms(
  terms: Hex,
  { enforcerName = 'MultiTokenPeriodEnforcer' }: DecodeTermsOptions = {},
): MultiTokenPeriodTerms {
  const length = termsSize(terms, enforcerName);
  if (length === 0 || length % TOKEN_PERIOD_TRANSFER_TERMS_LENGTH !== 0) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: `Expected a non-zero multiple of ${TOKEN_PERIOD_TRANSFER_TERMS_LENGTH} bytes, received ${length}`,
    });
  }

  const tokenConfigs: TokenPeriodTransferTerms[] = [];
  for (
    let offset = 0;
    offset < length;
    offset += TOKEN_PERIOD_TRANSFER_TERMS_LENGTH
  ) {
    tokenConfigs.push({
      tokenAddress: readAddress(terms, offset),
      ...decodePeriod(terms, offset + 20, enforcerName),
    });
  }
  return { tokenConfigs };
}

/**
 * Creates args for the MultiTokenPeriodEnforcer selecting a token configuration.
 *
 * @param index - The index of the configuration in the terms.
 * @returns The encoded args.
 */
export function createMultiTokenPeriodArgs(index: number): Hex {
  return encodeUint(BigInt(index), 'index');
}

export const isNativeTokenConfig = ({ tokenAddress }: TokenPeriodTransferTerms) =>
  tokenAddress === NATIVE_TOKEN_ADDRESS;
