import { concat } from 'viem';

import type { Hex } from '../types';
import {
  assertTermsLength,
  encodeUint,
  readUint,
  type DecodeTermsOptions,
} from './utils';

export type BlockNumberTerms = {
  afterThreshold: bigint;
  beforeThreshold: bigint;
};

export const BLOCK_NUMBER_TERMS_LENGTH = 32;

/**
 * Creates terms for the BlockNumberEnforcer. Either threshold may be zero to
 * leave that side of the window open.
 *
 * @param terms - The block thresholds.
 * @returns The encoded terms.
 */
export function createBlockNumberTerms(terms: BlockNumberTerms): Hex {
  const { afterThreshold, beforeThreshold } = terms;

  if (afterThreshold === 0n && beforeThreshold === 0n) {
    throw new Error(
      'Invalid thresholds: At least one of afterThreshold or beforeThreshold must be specified',
    );
  }

  if (
    afterThreshold !== 0n &&
    beforeThreshold !== 0n &&
    afterThreshold > beforeThreshold
  ) {
    throw new Error(
      'Invalid thresholds: beforeThreshold must not be less than afterThreshold when both are specified',
    );
  }

  return concat([
    encodeUint(afterThreshold, 'afterThreshold', 16),
    encodeUint(beforeThreshold, 'beforeThreshold', 16),
  ]);
}

export function decodeBlockNumberTerms(
  terms: Hex,
  { enforcerName = 'BlockNumberEnforcer' }: DecodeTermsOptions = {},
): BlockNumberTerms {
  assertTermsLength(terms, BLOCK_NUMBER_TERMS_LENGTH, enforcerName);

  return {
    afterThreshold: readUint(terms, 0, 16),
    beforeThreshold: readUint(terms, 16, 16),
  };
}
