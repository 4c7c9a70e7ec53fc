import { ArithmeticOverflowError } from './errors';
import { MAX_UINT256 } from './constants';

/**
 * Adds two uint256 values, throwing on overflow.
 *
 * @param a - The first operand.
 * @param b - The second operand.
 * @returns The sum.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const result = a + b;
  if (result > MAX_UINT256) {
    throw new ArithmeticOverflowError('addition');
  }
  return result;
}

/**
 * Subtracts two uint256 values, throwing on underflow.
 *
 * @param a - The minuend.
 * @param b - The subtrahend.
 * @returns The difference.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  const result = a - b;
  if (result < 0n) {
    throw new ArithmeticOverflowError('subtraction');
  }
  return result;
}

export function checkedMul(a: bigint, b: bigint): bigint {
  const result = a * b;
  if (result > MAX_UINT256) {
    throw new ArithmeticOverflowError('multiplication');
  }
  return result;
}
