/**
 * Ledger errors
 *
 * Validation failures are values (see `Verdict`); these classes cover the
 * node-level failures that abort an operation. Routes map every
 * `LedgerError` to a 400 response.
 */

export type ValidationErrorKind =
  | 'EmptyInputs'
  | 'EmptyOutputs'
  | 'DuplicateInput'
  | 'DuplicateOutput'
  | 'InvalidSignature'
  | 'InputOverflow'
  | 'ZeroValueOutput'
  // output indexes are array positions, so this is never produced
  | 'IndexOverflow'
  | 'OutputCollision'
  | 'OutputOverflow'
  | 'InsufficientInputValue'
  | 'RewardUnderflow';

export class LedgerError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
  }
}

export class RewardOverflowError extends LedgerError {
  constructor() {
    super('RewardOverflow', 'Reward pool would overflow');
    this.name = 'RewardOverflowError';
  }
}

export class BlockRejectedError extends LedgerError {
  readonly index: number;
  readonly reason: ValidationErrorKind | 'MissingDependency';
  readonly requires: string[];

  constructor(index: number, reason: ValidationErrorKind | 'MissingDependency', requires: string[] = []) {
    super('BlockRejected', `Transaction ${index} rejected: ${reason}`);
    this.name = 'BlockRejectedError';
    this.index = index;
    this.reason = reason;
    this.requires = requires;
  }
}

export class InvalidBlockHeightError extends LedgerError {
  constructor(expected: number, received: number) {
    super('InvalidBlockHeight', `Invalid block height: expected ${expected}, got ${received}`);
    this.name = 'InvalidBlockHeightError';
  }
}

export class InvalidBlockIdError extends LedgerError {
  readonly expected: string;

  constructor(expected: string, received: string) {
    super('InvalidBlockId', `Invalid block id: ${received}`);
    this.name = 'InvalidBlockIdError';
    this.expected = expected;
  }
}

export class RollbackHeightError extends LedgerError {
  constructor(message: string) {
    super('InvalidRollbackHeight', message);
    this.name = 'RollbackHeightError';
  }
}

export class ConfigError extends LedgerError {
  constructor(message: string) {
    super('InvalidConfig', message);
    this.name = 'ConfigError';
  }
}
