import {
  decodeRedeemerTerms,
  type Hex,
  type RedeemerTerms,
} from '@caveatkit/delegation-core';
import { isAddressEqual } from 'viem';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

export class RedeemerEnforcer extends CaveatEnforcer<RedeemerTerms> {
  readonly name = 'RedeemerEnforcer';

  override beforeHook({ terms, redeemer }: HookParams): void {
    const { redeemers } = this.getTermsInfo(terms);
    if (!redeemers.some((allowed) => isAddressEqual(allowed, redeemer))) {
      throw this.violation('unauthorized-redeemer', 'UnauthorizedRedeemer');
    }
  }

  getTermsInfo(terms: Hex): RedeemerTerms {
    return decodeRedeemerTerms(terms, { enforcerName: this.name });
  }
}
