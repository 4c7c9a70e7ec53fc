import {
  decodeNativeTokenStreamingTerms,
  decodeSingleExecution,
  type Hex,
  type NativeTokenStreamingTerms,
} from '@caveatkit/delegation-core';

import type { HookParams } from './CaveatEnforcer';
import { StreamingEnforcer } from './StreamingEnforcer';

export class NativeTokenStreamingEnforcer extends StreamingEnforcer<NativeTokenStreamingTerms> {
  readonly name = 'NativeTokenStreamingEnforcer';

  override beforeHook({ caller, terms, mode, executionCallData, delegationHash }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { value } = decodeSingleExecution(executionCallData);
    this.consumeAllowance(caller, delegationHash, this.getTermsInfo(terms), value);
  }

  getTermsInfo(terms: Hex): NativeTokenStreamingTerms {
    return decodeNativeTokenStreamingTerms(terms, { enforcerName: this.name });
  }
}
