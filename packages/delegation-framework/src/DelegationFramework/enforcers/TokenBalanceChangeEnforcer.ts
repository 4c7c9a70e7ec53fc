import {
  decodeTokenBalanceChangeTerms,
  type Address,
  type Hex,
  type TokenBalanceChangeTerms,
} from '@caveatkit/delegation-core';

import { BalanceChangeEnforcer } from './BalanceChangeEnforcer';

export class TokenBalanceChangeEnforcer extends BalanceChangeEnforcer<TokenBalanceChangeTerms> {
  readonly name = 'TokenBalanceChangeEnforcer';

  protected assetOf({ tokenAddress }: TokenBalanceChangeTerms): Address {
    return tokenAddress;
  }

  getTermsInfo(terms: Hex): TokenBalanceChangeTerms {
    return decodeTokenBalanceChangeTerms(terms, { enforcerName: this.name });
  }
}
