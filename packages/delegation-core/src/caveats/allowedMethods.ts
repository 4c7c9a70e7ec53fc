import { concat, isHex, size, slice } from 'viem';

import { InvalidTermsLengthError } from '../errors';
import type { Hex } from '../types';
import { termsSize, type DecodeTermsOptions } from './utils';

export type AllowedMethodsTerms = {
  selectors: Hex[];
};

/**
 * Creates terms for the AllowedMethodsEnforcer from 4 byte function selectors.
 *
 * @param terms - The terms.
 * @param terms.selectors - The selectors a redeemer may call.
 * @returns The encoded terms.
 */
export function createAllowedMethodsTerms({ selectors }: AllowedMethodsTerms): Hex {
  if (selectors.length === 0) {
    throw new Error('Invalid selectors: must provide at least one selector');
  }

  for (const selector of selectors) {
    if (!isHex(selector, { strict: true }) || size(selector) !== 4) {
      throw new Error(`Invalid selector: ${selector} must be a 4 byte hex string`);
    }
  }

  return concat(selectors);
}

export function decodeAllowedMethodsTerms(
  terms: Hex,
  { enforcerName = 'AllowedMethodsEnforcer' }: DecodeTermsOptions = {},
): AllowedMethodsTerms {
  const length = termsSize(terms, enforcerName);
  if (length === 0 || length % 4 !== 0) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: `Expected a non-zero multiple of 4 bytes, received ${length}`,
    });
  }

  const selectors: Hex[] = [];
  for (let offset = 0; offset < length; offset += 4) {
    selectors.push(slice(terms, offset, offset + 4));
  }
  return { selectors };
}
