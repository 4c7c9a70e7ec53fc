import {
  decodeSingleExecution,
  decodeTokenStreamingTerms,
  type Hex,
  type TokenStreamingTerms,
} from '@caveatkit/delegation-core';

import type { HookParams } from './CaveatEnforcer';
import { StreamingEnforcer } from './StreamingEnforcer';

export class TokenStreamingEnforcer extends StreamingEnforcer<TokenStreamingTerms> {
  readonly name = 'TokenStreamingEnforcer';

  override beforeHook({ caller, terms, mode, executionCallData, delegationHash }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const stream = this.getTermsInfo(terms);
    const { amount } = this.decodeTokenTransfer(
      decodeSingleExecution(executionCallData),
      stream.tokenAddress,
    );
    this.consumeAllowance(caller, delegationHash, stream, amount);
  }

  getTermsInfo(terms: Hex): TokenStreamingTerms {
    return decodeTokenStreamingTerms(terms, { enforcerName: this.name });
  }
}
