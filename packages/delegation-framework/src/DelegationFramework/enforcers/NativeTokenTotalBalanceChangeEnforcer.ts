import {
  NATIVE_TOKEN_ADDRESS,
  decodeNativeBalanceChangeTerms,
  type Address,
  type Hex,
  type NativeBalanceChangeTerms,
} from '@caveatkit/delegation-core';

import type { StateKeyPart } from '../../runtime/StateJournal';
import { TotalBalanceChangeEnforcer } from './TotalBalanceChangeEnforcer';

export class NativeTokenTotalBalanceChangeEnforcer extends TotalBalanceChangeEnforcer<NativeBalanceChangeTerms> {
  readonly name = 'NativeTokenTotalBalanceChangeEnforcer';

  protected assetOf(): Address {
    return NATIVE_TOKEN_ADDRESS;
  }

  protected trackerKey(caller: Address, { recipient }: NativeBalanceChangeTerms): StateKeyPart[] {
    return [caller, recipient];
  }

  getTermsInfo(terms: Hex): NativeBalanceChangeTerms {
    return decodeNativeBalanceChangeTerms(terms, { enforcerName: this.name });
  }
}
