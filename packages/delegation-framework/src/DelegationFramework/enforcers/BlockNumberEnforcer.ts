import {
  decodeBlockNumberTerms,
  type BlockNumberTerms,
  type Hex,
} from '@caveatkit/delegation-core';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

/**
 * Restricts redemption to an inclusive block window. A zero threshold leaves
 * that side open.
 */
export class BlockNumberEnforcer extends CaveatEnforcer<BlockNumberTerms> {
  readonly name = 'BlockNumberEnforcer';

  override beforeHook({ terms }: HookParams): void {
    const { afterThreshold, beforeThreshold } = this.getTermsInfo(terms);
    const blockNumber = this.runtime.clock.getBlockNumber();

    if (afterThreshold > 0n && blockNumber < afterThreshold) {
      throw this.violation('early-delegation', 'EarlyDelegation');
    }

    if (beforeThreshold > 0n && blockNumber > beforeThreshold) {
      throw this.violation('expired-delegation', 'ExpiredDelegation');
    }
  }

  getTermsInfo(terms: Hex): BlockNumberTerms {
    return decodeBlockNumberTerms(terms, { enforcerName: this.name });
  }
}
