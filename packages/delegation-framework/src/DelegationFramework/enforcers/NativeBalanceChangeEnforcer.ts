import {
  NATIVE_TOKEN_ADDRESS,
  decodeNativeBalanceChangeTerms,
  type Address,
  type Hex,
  type NativeBalanceChangeTerms,
} from '@caveatkit/delegation-core';

import { BalanceChangeEnforcer } from './BalanceChangeEnforcer';

export class NativeBalanceChangeEnforcer extends BalanceChangeEnforcer<NativeBalanceChangeTerms> {
  readonly name = 'NativeBalanceChangeEnforcer';

  protected assetOf(): Address {
    return NATIVE_TOKEN_ADDRESS;
  }

  getTermsInfo(terms: Hex): NativeBalanceChangeTerms {
    return decodeNativeBalanceChangeTerms(terms, { enforcerName: this.name });
  }
}
