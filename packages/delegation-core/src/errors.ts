import { BaseError } from 'viem';

export type PolicyViolationCode =
  | 'AllowanceExceeded'
  | 'LimitExceeded'
  | 'InsufficientBalanceChange'
  | 'ExcessiveBalanceDecrease'
  | 'ZeroExpectedChange'
  | 'EarlyDelegation'
  | 'ExpiredDelegation'
  | 'UnauthorizedTarget'
  | 'UnauthorizedMethod'
  | 'UnauthorizedRedeemer'
  | 'UnauthorizedCaller'
  | 'InvalidExecution'
  | 'InvalidCalldata'
  | 'InvalidBatchSize'
  | 'InvalidCallType'
  | 'InvalidExecutionType'
  | 'InvalidTerms'
  | 'InvalidArgs'
  | 'InvalidNonce'
  | 'IdAlreadyUsed'
  | 'DelegationAlreadyUsed'
  | 'ClaimNotStarted'
  | 'ClaimAmountExceeded'
  | 'InvalidGroupIndex'
  | 'InvalidCaveatArgsLength'
  | 'InvalidToken'
  | 'InvalidMethod'
  | 'InvalidRecipient'
  | 'ExceedsOutputAmount'
  | 'PaymentNotReceived';

export type AuthorityErrorCode =
  | 'BatchDataLengthMismatch'
  | 'InvalidDelegate'
  | 'InvalidDelegator'
  | 'InvalidAuthority'
  | 'InvalidSignature'
  | 'CannotUseADisabledDelegation'
  | 'AlreadyDisabled'
  | 'AlreadyEnabled';

export type ExecutionErrorCode =
  | 'NotDelegationManager'
  | 'UnsupportedCallType'
  | 'UnsupportedExecType'
  | 'UnknownEnforcer'
  | 'UnknownContract'
  | 'UnsupportedFunction'
  | 'InsufficientBalance'
  | 'MalformedCalldata';

/**
 * Base class of every error raised by the delegation framework. `reason` is
 * the `<Component>:<reason>` string callers match on.
 */
export class DelegationError extends BaseError {
  override name = 'DelegationError';

  readonly reason: string;

  constructor(
    reason: string,
    options: { cause?: Error | undefined; details?: string | undefined } = {},
  ) {
    super(reason, options);
    this.reason = reason;
  }
}

/**
 * Terms do not match the byte layout the enforcer expects.
 */
export class InvalidTermsLengthError extends DelegationError {
  override name = 'InvalidTermsLengthError';

  readonly enforcer: string;

  constructor(
    enforcer: string,
    options: { cause?: Error | undefined; details?: string | undefined } = {},
  ) {
    super(`${enforcer}:invalid-terms-length`, options);
    this.enforcer = enforcer;
  }
}

/**
 * A caveat rejected the proposed execution.
 */
export class PolicyViolationError extends DelegationError {
  override name = 'PolicyViolationError';

  readonly code: PolicyViolationCode;

  readonly enforcer: string;

  constructor({
    enforcer,
    reason,
    code,
    cause,
  }: {
    enforcer: string;
    reason: string;
    code: PolicyViolationCode;
    cause?: Error | undefined;
  }) {
    super(`${enforcer}:${reason}`, { cause, details: code });
    this.code = code;
    this.enforcer = enforcer;
  }
}

/**
 * A single-use tracker was entered again before its after hook ran.
 */
export class EnforcerLockedError extends DelegationError {
  override name = 'EnforcerLockedError';

  readonly enforcer: string;

  constructor(enforcer: string) {
    super(`${enforcer}:enforcer-is-locked`, { details: 'EnforcerLocked' });
    this.enforcer = enforcer;
  }
}

/**
 * A uint256 computation overflowed or underflowed.
 */
export class ArithmeticOverflowError extends DelegationError {
  override name = 'ArithmeticOverflowError';

  constructor(operation: 'addition' | 'subtraction' | 'multiplication') {
    super(`Arithmetic:${operation}-out-of-bounds`);
  }
}

/**
 * A delegation chain is broken, unsigned or disabled.
 */
export class AuthorityError extends DelegationError {
  override name = 'AuthorityError';

  readonly code: AuthorityErrorCode;

  constructor(code: AuthorityErrorCode, details?: string) {
    super(`DelegationManager:${code}`, { details });
    this.code = code;
  }
}

/**
 * The runtime or an account could not perform a call.
 */
export class ExecutionError extends DelegationError {
  override name = 'ExecutionError';

  readonly code: ExecutionErrorCode;

  constructor(
    component: string,
    code: ExecutionErrorCode,
    options: { cause?: Error | undefined; details?: string | undefined } = {},
  ) {
    super(`${component}:${code}`, options);
    this.code = code;
  }
}
