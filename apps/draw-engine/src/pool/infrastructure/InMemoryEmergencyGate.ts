import {
  EmergencySwitch,
  GateMode,
  OperationKind,
} from '@pool/application/ports/EmergencyGate';
import { Logger } from '@shared/ports/Logger';

/**
 * NORMAL allows everything, EMERGENCY only lets participants withdraw,
 * PAUSED blocks every state-changing operation.
 */
export class InMemoryEmergencyGate implements EmergencySwitch {
  private _mode: GateMode = 'NORMAL';
  private _reason: string | null = null;

  constructor(private readonly logger: Logger) {}

  get mode(): GateMode {
    return this._mode;
  }

  get reason(): string | null {
    return this._reason;
  }

  isAllowed(operation: OperationKind): boolean {
    switch (this._mode) {
      case 'NORMAL':
        return true;
      case 'EMERGENCY':
        return operation === 'WITHDRAW';
      case 'PAUSED':
        return false;
    }
  }

  setMode(mode: GateMode, reason: string): void {
    const previous = this._mode;
    this._mode = mode;
    this._reason = mode === 'NORMAL' ? null : reason;
    this.logger.warn('Emergency gate mode changed', { from: previous, to: mode, reason });
  }
}
