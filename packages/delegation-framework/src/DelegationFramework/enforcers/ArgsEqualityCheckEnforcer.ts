import {
  decodeArgsEqualityCheckTerms,
  type ArgsEqualityCheckTerms,
  type Hex,
} from '@caveatkit/delegation-core';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

/**
 * Passes only when the redeemer's args are byte-equal to the terms. Used to
 * bind an allowance delegation to the payment it funds.
 */
export class ArgsEqualityCheckEnforcer extends CaveatEnforcer<ArgsEqualityCheckTerms> {
  readonly name = 'ArgsEqualityCheckEnforcer';

  override beforeHook({ terms, args, redeemer }: HookParams): void {
    const expected = this.getTermsInfo(terms).args;
    if (expected.toLowerCase() !== args.toLowerCase()) {
      this.logger.debug(
        { event: 'DifferentArgsAndTerms', redeemer, terms, args },
        'args do not match terms',
      );
      throw this.violation('different-args-and-terms', 'InvalidArgs');
    }
  }

  getTermsInfo(terms: Hex): ArgsEqualityCheckTerms {
    return decodeArgsEqualityCheckTerms(terms, { enforcerName: this.name });
  }
}
