import { isHex } from 'viem';

import { InvalidTermsLengthError } from '../errors';
import type { Hex } from '../types';
import { termsSize, type DecodeTermsOptions } from './utils';

export type ArgsEqualityCheckTerms = {
  args: Hex;
};

export function createArgsEqualityCheckTerms({ args }: ArgsEqualityCheckTerms): Hex {
  if (!isHex(args, { strict: true })) {
    throw new Error('Invalid args: must be a valid hex string');
  }
  return args;
}

export function decodeArgsEqualityCheckTerms(
  terms: Hex,
  { enforcerName = 'ArgsEqualityCheckEnforcer' }: DecodeTermsOptions = {},
): ArgsEqualityCheckTerms {
  termsSize(terms, enforcerName);
  return { args: terms };
}

/**
 * The NoCalldataEnforcer takes no configuration.
 *
 * @returns Empty terms.
 */
export function createNoCalldataTerms(): Hex {
  return '0x';
}

export function decodeNoCalldataTerms(
  terms: Hex,
  { enforcerName = 'NoCalldataEnforcer' }: DecodeTermsOptions = {},
): Record<string, never> {
  const length = termsSize(terms, enforcerName);
  if (length !== 0) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: `Expected empty terms, received ${length} bytes`,
    });
  }
  return {};
}
