import { ExecutionError, type Address, type Hex } from '@caveatkit/delegation-core';
import {
  decodeFunctionData,
  encodeFunctionResult,
  erc20Abi,
  type DecodeFunctionDataReturnType,
} from 'viem';

import type { CallContext, Contract, ExecutionRuntime } from './ExecutionRuntime';

/**
 * A fungible token whose balances live in the runtime ledger under the
 * token's own address.
 */
export class TokenContract implements Contract {
  readonly address: Address;

  readonly symbol: string;

  readonly #runtime: ExecutionRuntime;

  constructor({
    runtime,
    address,
    symbol,
  }: {
    runtime: ExecutionRuntime;
    address: Address;
    symbol: string;
  }) {
    this.#runtime = runtime;
    this.address = address;
    this.symbol = symbol;
  }

  balanceOf(account: Address): bigint {
    return this.#runtime.ledger.balanceOf(this.address, account);
  }

  mint(to: Address, amount: bigint): void {
    this.#runtime.ledger.mint(this.address, to, amount);
  }

  call(context: CallContext): Hex {
    if (context.value > 0n) {
      throw new ExecutionError('TokenContract', 'UnsupportedFunction', {
        details: 'Token calls do not accept native value',
      });
    }

    const decoded = decodeTokenCall(context.data);
    switch (decoded.functionName) {
      case 'transfer': {
        const [to, amount] = decoded.args;
        this.#runtime.ledger.transfer(this.address, context.from, to, amount);
        return encodeFunctionResult({
          abi: erc20Abi,
          functionName: 'transfer',
          result: true,
        });
      }
      case 'balanceOf': {
        const [account] = decoded.args;
        return encodeFunctionResult({
          abi: erc20Abi,
          functionName: 'balanceOf',
          result: this.balanceOf(account),
        });
      }
      default:
        throw new ExecutionError('TokenContract', 'UnsupportedFunction', {
          details: decoded.functionName,
        });
    }
  }
}

const decodeTokenCall = (
  data: Hex,
): DecodeFunctionDataReturnType<typeof erc20Abi> => {
  try {
    return decodeFunctionData({ abi: erc20Abi, data });
  } catch (error) {
    throw new ExecutionError('TokenContract', 'MalformedCalldata', {
      cause: error instanceof Error ? error : undefined,
    });
  }
};
