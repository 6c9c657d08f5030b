import { PoolConfig } from '@shared/kernel/PoolConfig';
import { parseAmount } from '@shared/kernel/Amount';
import { DepositBelowMinimum, NoOpenRound } from '@shared/kernel/DomainError';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { TwabAccumulator } from '@twab/domain/TwabAccumulator';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { BalanceLedger } from '@pool/application/ports/BalanceLedger';
import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';
import { BalanceChangeResult, DepositCommand } from '@pool/application/commands/BalanceCommands';

export class DepositUseCase {
  constructor(
    private readonly config: PoolConfig,
    private readonly rounds: CurrentRoundStore,
    private readonly ledger: BalanceLedger,
    private readonly participants: ParticipantRegistry,
    private readonly accumulator: TwabAccumulator,
    private readonly gate: EmergencyGate,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  execute(command: DepositCommand): BalanceChangeResult {
    assertAllowed(this.gate, 'DEPOSIT');
    const amount = parseAmount(command.amount, 'Deposit amount');
    if (amount.lt(this.config.minimumDeposit)) {
      throw new DepositBelowMinimum(
        `Deposit of ${amount.toString()} is below the minimum of ${this.config.minimumDeposit.toString()}`,
      );
    }
    const round = this.rounds.get();
    if (!round) throw new NoOpenRound('Deposits open with the first round');

    const previous = this.ledger.balanceOf(command.account);
    const balance = previous.add(amount);

    // TWAB first: a lazily created checkpoint must see the pre-deposit balance.
    this.accumulator.recordBalanceChange(command.account, balance, this.clock.now());
    this.ledger.credit(command.account, amount);
    this.participants.register(command.account);

    this.logger.info('Deposit recorded', {
      account: command.account,
      roundId: round.id,
      amount: amount.toString(),
      balance: balance.toString(),
    });

    return {
      account: command.account,
      roundId: round.id,
      previousBalance: previous.toString(),
      balance: balance.toString(),
    };
  }
}
