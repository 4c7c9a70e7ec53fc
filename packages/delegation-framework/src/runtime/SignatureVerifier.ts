import type { Address, Hex } from '@caveatkit/delegation-core';

import type { Contract, ExecutionRuntime } from './ExecutionRuntime';

/**
 * Decides whether a principal signed a delegation hash.
 */
export type SignatureVerifier = {
  verify(principal: Address, hash: Hex, signature: Hex): boolean;
};

type SignatureValidator = Contract & {
  isValidSignature(hash: Hex, signature: Hex): boolean;
};

const isSignatureValidator = (
  contract: Contract | undefined,
): contract is SignatureValidator =>
  contract !== undefined &&
  'isValidSignature' in contract &&
  typeof contract.isValidSignature === 'function';

/**
 * Asks the principal's account whether the signature is valid. Principals
 * without an account in the runtime never validate.
 */
export class AccountSignatureVerifier implements SignatureVerifier {
  readonly #runtime: ExecutionRuntime;

  constructor(runtime: ExecutionRuntime) {
    this.#runtime = runtime;
  }

  verify(principal: Address, hash: Hex, signature: Hex): boolean {
    const account = this.#runtime.getContract(principal);
    if (!isSignatureValidator(account)) {
      return false;
    }
    return account.isValidSignature(hash, signature);
  }
}
