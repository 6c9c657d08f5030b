import { parseAmount } from '@shared/kernel/Amount';
import { Logger } from '@shared/ports/Logger';
import { PrizeTreasury } from '@pool/application/ports/PrizeTreasury';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';
import { FundPrizeCommand } from '@pool/application/commands/FundPrizeCommand';

/** Adds yield or sponsor funds to the prize of the next completed draw. */
export class FundPrizeUseCase {
  constructor(
    private readonly treasury: PrizeTreasury,
    private readonly gate: EmergencyGate,
    private readonly logger: Logger,
  ) {}

  execute(command: FundPrizeCommand): { available: string } {
    assertAllowed(this.gate, 'FUND_PRIZE');
    const value = parseAmount(command.amount, 'Prize funding');
    this.treasury.fund(value);
    const available = this.treasury.availablePrize();
    this.logger.info('Prize pool funded', {
      amount: value.toString(),
      available: available.toString(),
    });
    return { available: available.toString() };
  }
}
