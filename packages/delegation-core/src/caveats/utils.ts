import { isStrictHexString } from '@metamask/utils';
import { getAddress, hexToBigInt, isAddress, pad, size, slice, toHex } from 'viem';

import { MAX_UINT256 } from '../constants';
import { InvalidTermsLengthError, PolicyViolationError } from '../errors';
import type { Address, Hex } from '../types';

/**
 * Options accepted by every terms decoder.
 */
export type DecodeTermsOptions = {
  /**
   * The enforcer name reported when the terms are malformed.
   */
  enforcerName?: string;
};

/**
 * Returns the byte length of well formed terms, failing on anything that is
 * not an even-length hex string.
 *
 * @param terms - The terms to measure.
 * @param enforcerName - The enforcer reported on failure.
 * @returns The byte length.
 */
export function termsSize(terms: Hex, enforcerName: string): number {
  if (terms === '0x') {
    return 0;
  }
  if (!isStrictHexString(terms) || terms.length % 2 !== 0) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: 'Terms must be an even-length hex string',
    });
  }
  return size(terms);
}

export function assertTermsLength(
  terms: Hex,
  expected: number,
  enforcerName: string,
): void {
  const actual = termsSize(terms, enforcerName);
  if (actual !== expected) {
    throw new InvalidTermsLengthError(enforcerName, {
      details: `Expected ${expected} bytes, received ${actual}`,
    });
  }
}

export function readAddress(terms: Hex, offset: number): Address {
  return getAddress(slice(terms, offset, offset + 20, { strict: true }));
}

export function readUint(terms: Hex, offset: number, length = 32): bigint {
  return hexToBigInt(slice(terms, offset, offset + length, { strict: true }));
}

export function readBytes(terms: Hex, offset: number, length?: number): Hex {
  if (length === undefined) {
    return offset >= size(terms) ? '0x' : slice(terms, offset);
  }
  return length === 0
    ? '0x'
    : slice(terms, offset, offset + length, { strict: true });
}

/**
 * Encodes an unsigned integer as a fixed width word.
 *
 * @param value - The value to encode.
 * @param name - The name of the value, used in error messages.
 * @param byteSize - The width of the word.
 * @returns The padded hex value.
 */
export function encodeUint(
  value: bigint,
  name: string,
  byteSize = 32,
): Hex {
  const max = byteSize === 32 ? MAX_UINT256 : (1n << BigInt(byteSize * 8)) - 1n;
  if (value < 0n) {
    throw new Error(`Invalid ${name}: must be zero or positive`);
  }
  if (value > max) {
    throw new Error(`Invalid ${name}: must fit in ${byteSize} bytes`);
  }
  return pad(toHex(value), { size: byteSize });
}

export function assertAddress(value: string, name: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new Error(`Invalid ${name}: must be a valid address`);
  }
  return getAddress(value);
}

/**
 * Rejects a zero value decoded from signed terms.
 *
 * @param value - The decoded value.
 * @param reason - The violation reason, such as `invalid-zero-period-duration`.
 * @param enforcerName - The enforcer reported on failure.
 * @returns The value.
 */
export function requireNonZeroTerm(
  value: bigint,
  reason: string,
  enforcerName: string,
): bigint {
  if (value === 0n) {
    throw new PolicyViolationError({
      enforcer: enforcerName,
      reason,
      code: 'InvalidTerms',
    });
  }
  return value;
}

export function assertPositive(value: bigint, name: string): void {
  if (value <= 0n) {
    throw new Error(`Invalid ${name}: must be a positive number`);
  }
}
