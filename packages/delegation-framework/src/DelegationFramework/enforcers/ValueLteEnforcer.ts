import {
  decodeSingleExecution,
  decodeValueLteTerms,
  type Hex,
  type ValueLteTerms,
} from '@caveatkit/delegation-core';

import { CaveatEnforcer, type HookParams } from './CaveatEnforcer';

export class ValueLteEnforcer extends CaveatEnforcer<ValueLteTerms> {
  readonly name = 'ValueLteEnforcer';

  override beforeHook({ terms, mode, executionCallData }: HookParams): void {
    this.onlySingleCallTypeMode(mode);
    this.onlyDefaultExecutionMode(mode);

    const { maxValue } = this.getTermsInfo(terms);
    const { value } = decodeSingleExecution(executionCallData);
    if (value > maxValue) {
      throw this.violation('value-too-high', 'AllowanceExceeded');
    }
  }

  getTermsInfo(terms: Hex): ValueLteTerms {
    return decodeValueLteTerms(terms, { enforcerName: this.name });
  }
}
