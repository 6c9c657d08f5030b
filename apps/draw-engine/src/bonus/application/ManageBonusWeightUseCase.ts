import { BonusWeight, BonusWeightRegistry } from '@bonus/domain/BonusWeightRegistry';
import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import {
  AddBonusWeightCommand,
  RemoveBonusWeightCommand,
  SetBonusWeightCommand,
} from '@bonus/application/commands/BonusWeightCommands';

export class ManageBonusWeightUseCase {
  constructor(
    private readonly bonuses: BonusWeightRegistry,
    private readonly participants: ParticipantRegistry,
    private readonly gate: EmergencyGate,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  setBonusWeight(command: SetBonusWeightCommand): BonusWeight {
    assertAllowed(this.gate, 'MANAGE_BONUS');
    const entry = this.bonuses.set(
      command.account,
      command.weight,
      command.reason,
      this.clock.now(),
    );
    this.enroll(command.account, entry);
    this.logger.info('Bonus weight set', {
      account: command.account,
      weight: entry.weight.toString(),
      reason: entry.reason,
    });
    return entry;
  }

  addBonusWeight(command: AddBonusWeightCommand): BonusWeight {
    assertAllowed(this.gate, 'MANAGE_BONUS');
    const entry = this.bonuses.add(
      command.account,
      command.delta,
      command.reason,
      this.clock.now(),
    );
    this.enroll(command.account, entry);
    this.logger.info('Bonus weight adjusted', {
      account: command.account,
      delta: command.delta,
      weight: entry.weight.toString(),
      reason: entry.reason,
    });
    return entry;
  }

  removeBonusWeight(command: RemoveBonusWeightCommand): boolean {
    assertAllowed(this.gate, 'MANAGE_BONUS');
    const removed = this.bonuses.remove(command.account);
    if (removed) {
      this.logger.info('Bonus weight removed', { account: command.account });
    }
    return removed;
  }

  // Bonus holders must be visible to the batch pass even without a deposit.
  private enroll(account: string, entry: BonusWeight): void {
    if (entry.weight.gt(0)) {
      this.participants.register(account);
    }
  }
}
