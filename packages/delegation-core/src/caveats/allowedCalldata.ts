import { concat, isHex, size } from 'viem';

import { InvalidTermsLengthError } from '../errors';
import type { Hex } from '../types';
import {
  encodeUint,
  readBytes,
  readUint,
  termsSize,
  type DecodeTermsOptions,
} from './utils';

export type AllowedCalldataTerms = {
  /**
   * The byte offset in the calldata at which `value` must appear.
   */
  startIndex: bigint;
  value: Hex;
};

export function createAllowedCalldataTerms({
  startIndex,
  value,
}: AllowedCalldataTerms): Hex {
  if (!isHex(value, { strict: true }) || size(value) === 0) {
    throw new Error('Invalid value: must be a non-empty hex string');
  }

  return concat([encodeUint(startIndex, 'startIndex'), value]);
}

export function decodeAllowedCalldataTerms(
  terms: Hex,
  { enforcerName = 'AllowedCalldataEnforcer' }: DecodeTermsOptions = {},
): AllowedCalldataTerms {
  const length = termsSize(terms, enforcerName);
  if (length < 33) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: `Expected at least 33 bytes, received ${length}`,
    });
  }

  return {
    startIndex: readUint(terms, 0),
    value: readBytes(terms, 32),
  };
}
