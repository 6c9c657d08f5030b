export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// --- Round lifecycle preconditions ---
export class NoOpenRound extends DomainError {}
export class RoundNotEnded extends DomainError {}
export class DrawAlreadyInProgress extends DomainError {}
export class BatchNotComplete extends DomainError {}
export class RandomnessNotReady extends DomainError {}
export class RandomnessAlreadyRequested extends DomainError {}
export class NoActiveBatch extends DomainError {}
export class InvalidStateTransition extends DomainError {}
export class OperationBlocked extends DomainError {}

// --- Randomness ---
export class NotAvailable extends DomainError {}
export class AlreadyConsumed extends DomainError {}
export class UnknownEntropyRequest extends DomainError {}
export class SeedChainExhausted extends DomainError {}

// --- Configuration ---
export class InvalidStrategyConfig extends DomainError {}
export class InvalidBatchLimit extends DomainError {}

// --- Balances and bonus weight ---
export class InvalidAmount extends DomainError {}
export class DepositBelowMinimum extends DomainError {}
export class InsufficientBalance extends DomainError {}
export class InvalidBonusWeight extends DomainError {}
