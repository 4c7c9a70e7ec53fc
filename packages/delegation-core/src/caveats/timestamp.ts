import { concat } from 'viem';

import { MAX_UINT128 } from '../constants';
import type { Hex } from '../types';
import {
  assertTermsLength,
  encodeUint,
  readUint,
  type DecodeTermsOptions,
} from './utils';

export type TimestampTerms = {
  /**
   * The first second at which the delegation may be redeemed. Zero disables the bound.
   */
  timestampAfterThreshold: bigint;
  /**
   * The last second at which the delegation may be redeemed. Zero disables the bound.
   */
  timestampBeforeThreshold: bigint;
};

export const TIMESTAMP_TERMS_LENGTH = 32;

/**
 * Creates terms for the TimestampEnforcer: two packed uint128 thresholds.
 *
 * @param terms - The thresholds.
 * @returns The encoded terms.
 * @throws Error if a threshold is out of range or the window is empty.
 */
export function createTimestampTerms(terms: TimestampTerms): Hex {
  const { timestampAfterThreshold, timestampBeforeThreshold } = terms;

  if (timestampAfterThreshold < 0n || timestampAfterThreshold > MAX_UINT128) {
    throw new Error(
      'Invalid timestampAfterThreshold: must be zero or a positive uint128',
    );
  }

  if (timestampBeforeThreshold < 0n || timestampBeforeThreshold > MAX_UINT128) {
    throw new Error(
      'Invalid timestampBeforeThreshold: must be zero or a positive uint128',
    );
  }

  if (
    timestampAfterThreshold !== 0n &&
    timestampBeforeThreshold !== 0n &&
    timestampAfterThreshold > timestampBeforeThreshold
  ) {
    throw new Error(
      'Invalid thresholds: timestampBeforeThreshold must not be less than timestampAfterThreshold when both are specified',
    );
  }

  return concat([
    encodeUint(timestampAfterThreshold, 'timestampAfterThreshold', 16),
    encodeUint(timestampBeforeThreshold, 'timestampBeforeThreshold', 16),
  ]);
}

export function decodeTimestampTerms(
  terms: Hex,
  { enforcerName = 'TimestampEnforcer' }: DecodeTermsOptions = {},
): TimestampTerms {
  assertTermsLength(terms, TIMESTAMP_TERMS_LENGTH, enforcerName);

  return {
    timestampAfterThreshold: readUint(terms, 0, 16),
    timestampBeforeThreshold: readUint(terms, 16, 16),
  };
}
