import {
  decodeTokenBalanceChangeTerms,
  type Address,
  type Hex,
  type TokenBalanceChangeTerms,
} from '@caveatkit/delegation-core';

import type { StateKeyPart } from '../../runtime/StateJournal';
import { TotalBalanceChangeEnforcer } from './TotalBalanceChangeEnforcer';

export class TokenTotalBalanceChangeEnforcer extends TotalBalanceChangeEnforcer<TokenBalanceChangeTerms> {
  readonly name = 'TokenTotalBalanceChangeEnforcer';

  protected assetOf({ tokenAddress }: TokenBalanceChangeTerms): Address {
    return tokenAddress;
  }

  protected trackerKey(
    caller: Address,
    { tokenAddress, recipient }: TokenBalanceChangeTerms,
  ): StateKeyPart[] {
    return [caller, tokenAddress, recipient];
  }

  getTermsInfo(terms: Hex): TokenBalanceChangeTerms {
    return decodeTokenBalanceChangeTerms(terms, { enforcerName: this.name });
  }
}
