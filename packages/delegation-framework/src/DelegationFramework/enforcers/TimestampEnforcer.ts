import {
  decodeTimestampTerms,
  type Hex,
  type TimestampTerms,
} from '@caveatkit/delegation-core';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

/**
 * Restricts redemption to an inclusive time window. A zero threshold leaves
 * that side open.
 */
export class TimestampEnforcer extends CaveatEnforcer<TimestampTerms> {
  readonly name = 'TimestampEnforcer';

  override beforeHook({ terms }: HookParams): void {
    const { timestampAfterThreshold, timestampBeforeThreshold } =
      this.getTermsInfo(terms);
    const now = this.runtime.clock.getTimestamp();

    if (timestampAfterThreshold > 0n && now < timestampAfterThreshold) {
      throw this.violation('early-delegation', 'EarlyDelegation');
    }

    if (timestampBeforeThreshold > 0n && now > timestampBeforeThreshold) {
      throw this.violation('expired-delegation', 'ExpiredDelegation');
    }
  }

  getTermsInfo(terms: Hex): TimestampTerms {
    return decodeTimestampTerms(terms, { enforcerName: this.name });
  }
}
