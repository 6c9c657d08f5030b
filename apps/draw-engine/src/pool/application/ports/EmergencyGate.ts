import { OperationBlocked } from '@shared/kernel/DomainError';

export type OperationKind =
  | 'DEPOSIT'
  | 'WITHDRAW'
  | 'FUND_PRIZE'
  | 'START_DRAW'
  | 'REQUEST_RANDOMNESS'
  | 'PROCESS_BATCH'
  | 'COMPLETE_DRAW'
  | 'START_NEXT_ROUND'
  | 'MANAGE_BONUS';

export type GateMode = 'NORMAL' | 'EMERGENCY' | 'PAUSED';

export interface EmergencyGate {
  isAllowed(operation: OperationKind): boolean;
}

/** Operator side of the gate. */
export interface EmergencySwitch extends EmergencyGate {
  readonly mode: GateMode;
  readonly reason: string | null;
  setMode(mode: GateMode, reason: string): void;
}

export function assertAllowed(gate: EmergencyGate, operation: OperationKind): void {
  if (!gate.isAllowed(operation)) {
    throw new OperationBlocked(`${operation} is blocked by the emergency gate`);
  }
}
