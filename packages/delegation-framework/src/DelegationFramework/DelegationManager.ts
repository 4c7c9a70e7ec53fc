import {
  ANY_BENEFICIARY,
  AuthorityError,
  ExecutionError,
  ROOT_AUTHORITY,
  hashDelegation,
  toDelegationChain,
  type Address,
  type Caveat,
  type Delegation,
  type Hex,
  type PermissionContext,
} from '@caveatkit/delegation-core';
import {
  decodeFunctionData,
  isAddressEqual,
  parseAbi,
  type DecodeFunctionDataReturnType,
} from 'viem';

import { getLogger } from '../logger';
import type { CallContext, Contract, ExecutionRuntime } from '../runtime/ExecutionRuntime';
import {
  AccountSignatureVerifier,
  type SignatureVerifier,
} from '../runtime/SignatureVerifier';
import type { StateStore } from '../runtime/StateJournal';
import { CaveatEnforcer, type HookParams } from './enforcers/CaveatEnforcer';

export const delegationManagerAbi = parseAbi([
  'struct Caveat { address enforcer; bytes terms; bytes args; }',
  'struct Delegation { address delegate; address delegator; bytes32 authority; Caveat[] caveats; uint256 salt; bytes signature; }',
  'function redeemDelegations(bytes[] permissionContexts, bytes32[] modes, bytes[] executionCallDatas)',
  'function disableDelegation(Delegation delegation)',
  'function enableDelegation(Delegation delegation)',
]);

export type RedeemDelegationsParams = {
  /**
   * The identity redeeming the delegations.
   */
  caller: Address;
  permissionContexts: PermissionContext[];
  modes: Hex[];
  executionCallDatas: Hex[];
};

type Executor = Contract & {
  executeFromExecutor(caller: Address, mode: Hex, executionCallData: Hex): Hex[];
};

type ResolvedCaveat = {
  caveat: Caveat;
  enforcer: CaveatEnforcer;
};

type ResolvedDelegation = {
  delegation: Delegation;
  hash: Hex;
  caveats: ResolvedCaveat[];
};

type Redemption = {
  /**
   * Leaf first; empty for a self-execution.
   */
  delegations: ResolvedDelegation[];
  mode: Hex;
  executionCallData: Hex;
};

type HookName = 'beforeAllHook' | 'beforeHook' | 'afterHook' | 'afterAllHook';

const isExecutor = (contract: Contract | undefined): contract is Executor =>
  contract !== undefined &&
  'executeFromExecutor' in contract &&
  typeof contract.executeFromExecutor === 'function';

/**
 * Validates delegation chains and runs the executions they authorize,
 * calling every caveat's hooks around them.
 */
export class DelegationManager implements Contract {
  readonly name = 'DelegationManager';

  readonly address: Address;

  readonly #runtime: ExecutionRuntime;

  readonly #signatureVerifier: SignatureVerifier;

  readonly #disabledDelegations: StateStore<true>;

  readonly #logger = getLogger('DelegationManager');

  constructor({
    runtime,
    address,
    signatureVerifier = new AccountSignatureVerifier(runtime),
  }: {
    runtime: ExecutionRuntime;
    address: Address;
    signatureVerifier?: SignatureVerifier;
  }) {
    this.#runtime = runtime;
    this.address = address;
    this.#signatureVerifier = signatureVerifier;
    this.#disabledDelegations = runtime.journal.createStore(
      'DelegationManager.disabledDelegations',
    );
  }

  getDelegationHash(delegation: Delegation): Hex {
    return hashDelegation(delegation);
  }

  disabledDelegations(delegationHash: Hex): boolean {
    return this.#disabledDelegations.has([delegationHash]);
  }

  /**
   * Disables a delegation so that it, and every delegation derived from it,
   * can no longer be redeemed.
   *
   * @param caller - The identity disabling the delegation; must be its delegator.
   * @param delegation - The delegation to disable.
   */
  disableDelegation(caller: Address, delegation: Delegation): void {
    if (!isAddressEqual(delegation.delegator, caller)) {
      throw new AuthorityError('InvalidDelegator');
    }

    const delegationHash = hashDelegation(delegation);
    if (this.disabledDelegations(delegationHash)) {
      throw new AuthorityError('AlreadyDisabled');
    }

    this.#disabledDelegations.set([delegationHash], true);
    this.#logger.info(
      { event: 'DisabledDelegation', delegationHash, delegator: caller },
      'delegation disabled',
    );
  }

  enableDelegation(caller: Address, delegation: Delegation): void {
    if (!isAddressEqual(delegation.delegator, caller)) {
      throw new AuthorityError('InvalidDelegator');
    }

    const delegationHash = hashDelegation(delegation);
    if (!this.disabledDelegations(delegationHash)) {
      throw new AuthorityError('AlreadyEnabled');
    }

    this.#disabledDelegations.delete([delegationHash]);
    this.#logger.info(
      { event: 'EnabledDelegation', delegationHash, delegator: caller },
      'delegation enabled',
    );
  }

  /**
   * Redeems delegation chains. Each permission context is paired with the
   * execution mode and execution calldata at the same index. The call is
   * atomic: if anything fails, every state change made during it is undone.
   *
   * @param params - The redemption parameters.
   */
  redeemDelegations(params: RedeemDelegationsParams): void {
    try {
      this.#runtime.transact(() => this.#redeemDelegations(params));
    } catch (error) {
      this.#logger.warn(
        {
          redeemer: params.caller,
          reason: error instanceof Error ? error.message : String(error),
        },
        'redemption failed',
      );
      throw error;
    }
  }

  call(context: CallContext): Hex {
    if (context.value > 0n) {
      throw new ExecutionError('DelegationManager', 'UnsupportedFunction', {
        details: 'The delegation manager does not accept native value',
      });
    }

    const decoded = decodeManagerCall(context.data);
    switch (decoded.functionName) {
      case 'redeemDelegations': {
        const [permissionContexts, modes, executionCallDatas] = decoded.args;
        this.redeemDelegations({
          caller: context.from,
          permissionContexts: [...permissionContexts],
          modes: [...modes],
          executionCallDatas: [...executionCallDatas],
        });
        return '0x';
      }
      case 'disableDelegation': {
        const [delegation] = decoded.args;
        this.#runtime.transact(() =>
          this.disableDelegation(context.from, toDelegation(delegation)),
        );
        return '0x';
      }
      case 'enableDelegation': {
        const [delegation] = decoded.args;
        this.#runtime.transact(() =>
          this.enableDelegation(context.from, toDelegation(delegation)),
        );
        return '0x';
      }
      default: {
        const exhaustivenessCheck: never = decoded;
        throw new ExecutionError('DelegationManager', 'UnsupportedFunction', {
          details: String(exhaustivenessCheck),
        });
      }
    }
  }

  #redeemDelegations({
    caller,
    permissionContexts,
    modes,
    executionCallDatas,
  }: RedeemDelegationsParams): void {
    if (
      modes.length !== permissionContexts.length ||
      executionCallDatas.length !== permissionContexts.length
    ) {
      throw new AuthorityError('BatchDataLengthMismatch');
    }

    const redemptions = permissionContexts.map((context, index) => {
      const mode = modes[index];
      const executionCallData = executionCallDatas[index];
      if (mode === undefined || executionCallData === undefined) {
        throw new AuthorityError('BatchDataLengthMismatch');
      }
      return {
        delegations: this.#validateChain(caller, toDelegationChain(context)),
        mode,
        executionCallData,
      };
    });

    this.#logger.debug(
      { redeemer: caller, contexts: redemptions.length },
      'redeeming delegations',
    );

    for (const redemption of redemptions) {
      this.#runHooks('beforeAllHook', caller, redemption, 'rootToLeaf');
    }

    for (const redemption of redemptions) {
      const [leaf] = redemption.delegations;
      const root = redemption.delegations.at(-1);

      if (!leaf || !root) {
        // self-execution: no delegation checks
        this.#executor(caller).executeFromExecutor(
          this.address,
          redemption.mode,
          redemption.executionCallData,
        );
        continue;
      }

      this.#runHooks('beforeHook', caller, redemption, 'rootToLeaf');

      this.#executor(root.delegation.delegator).executeFromExecutor(
        this.address,
        redemption.mode,
        redemption.executionCallData,
      );

      this.#runHooks('afterHook', caller, redemption, 'leafToRoot');
    }

    for (const redemption of redemptions) {
      this.#runHooks('afterAllHook', caller, redemption, 'leafToRoot');
    }

    for (const redemption of redemptions) {
      const root = redemption.delegations.at(-1);
      for (const { delegation, hash } of redemption.delegations) {
        this.#logger.debug(
          {
            event: 'RedeemedDelegation',
            rootDelegator: root?.delegation.delegator,
            redeemer: caller,
            delegationHash: hash,
            delegator: delegation.delegator,
          },
          'delegation redeemed',
        );
      }
    }
  }

  /**
   * Checks that a chain is signed, enabled and correctly linked, and resolves
   * its enforcers.
   *
   * @param redeemer - The identity redeeming the chain.
   * @param delegations - The chain, leaf first.
   * @returns The resolved chain.
   */
  #validateChain(redeemer: Address, delegations: Delegation[]): ResolvedDelegation[] {
    const [leaf] = delegations;
    if (!leaf) {
      return [];
    }

    if (
      !isAddressEqual(leaf.delegate, redeemer) &&
      !isAddressEqual(leaf.delegate, ANY_BENEFICIARY)
    ) {
      throw new AuthorityError(
        'InvalidDelegate',
        `${redeemer} is not the delegate of the leaf delegation`,
      );
    }

    const hashes = delegations.map(hashDelegation);

    delegations.forEach((delegation, index) => {
      const delegationHash = hashes[index] ?? hashDelegation(delegation);

      if (this.disabledDelegations(delegationHash)) {
        throw new AuthorityError('CannotUseADisabledDelegation', delegationHash);
      }

      if (
        !this.#signatureVerifier.verify(
          delegation.delegator,
          delegationHash,
          delegation.signature,
        )
      ) {
        throw new AuthorityError('InvalidSignature', delegationHash);
      }

      const parent = delegations[index + 1];
      if (!parent) {
        if (delegation.authority.toLowerCase() !== ROOT_AUTHORITY) {
          throw new AuthorityError('InvalidAuthority', delegationHash);
        }
        return;
      }

      if (delegation.authority.toLowerCase() !== hashes[index + 1]) {
        throw new AuthorityError('InvalidAuthority', delegationHash);
      }

      if (
        !isAddressEqual(parent.delegate, ANY_BENEFICIARY) &&
        !isAddressEqual(parent.delegate, delegation.delegator)
      ) {
        throw new AuthorityError(
          'InvalidDelegate',
          `${delegation.delegator} is not the delegate of its parent delegation`,
        );
      }
    });

    return delegations.map((delegation, index) => ({
      delegation,
      hash: hashes[index] ?? hashDelegation(delegation),
      caveats: delegation.caveats.map((caveat) => ({
        caveat,
        enforcer: this.#enforcer(caveat.enforcer),
      })),
    }));
  }

  #runHooks(
    hook: HookName,
    redeemer: Address,
    { delegations, mode, executionCallData }: Redemption,
    order: 'rootToLeaf' | 'leafToRoot',
  ): void {
    const hops = order === 'rootToLeaf' ? [...delegations].reverse() : delegations;

    for (const { delegation, hash, caveats } of hops) {
      for (const { caveat, enforcer } of caveats) {
        const params: HookParams = {
          caller: this.address,
          terms: caveat.terms,
          args: caveat.args,
          mode,
          executionCallData,
          delegationHash: hash,
          delegator: delegation.delegator,
          redeemer,
        };
        enforcer[hook](params);
      }
    }
  }

  #enforcer(address: Address): CaveatEnforcer {
    const contract = this.#runtime.getContract(address);
    if (!(contract instanceof CaveatEnforcer)) {
      throw new ExecutionError('DelegationManager', 'UnknownEnforcer', {
        details: `No caveat enforcer deployed at ${address}`,
      });
    }
    return contract;
  }

  #executor(address: Address): Executor {
    const contract = this.#runtime.getContract(address);
    if (!isExecutor(contract)) {
      throw new ExecutionError('DelegationManager', 'UnknownContract', {
        details: `${address} is not an account that can execute`,
      });
    }
    return contract;
  }
}

type ManagerCall = DecodeFunctionDataReturnType<typeof delegationManagerAbi>;

const decodeManagerCall = (data: Hex): ManagerCall => {
  try {
    return decodeFunctionData({ abi: delegationManagerAbi, data });
  } catch (error) {
    throw new ExecutionError('DelegationManager', 'MalformedCalldata', {
      cause: error instanceof Error ? error : undefined,
    });
  }
};

type AbiDelegation = Extract<
  ManagerCall,
  { functionName: 'disableDelegation' }
>['args'][0];

const toDelegation = (delegation: AbiDelegation): Delegation => ({
  delegate: delegation.delegate,
  delegator: delegation.delegator,
  authority: delegation.authority,
  caveats: delegation.caveats.map((caveat) => ({
    enforcer: caveat.enforcer,
    terms: caveat.terms,
    args: caveat.args,
  })),
  salt: delegation.salt,
  signature: delegation.signature,
});
