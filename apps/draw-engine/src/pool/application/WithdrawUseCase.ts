import { parseAmount } from '@shared/kernel/Amount';
import { InsufficientBalance, NoOpenRound } from '@shared/kernel/DomainError';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { TwabAccumulator } from '@twab/domain/TwabAccumulator';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { BalanceLedger } from '@pool/application/ports/BalanceLedger';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';
import { BalanceChangeResult, WithdrawCommand } from '@pool/application/commands/BalanceCommands';

/**
 * Withdrawing to zero keeps the account registered: weight already
 * accrued this round stays in its history and in any snapshot.
 */
export class WithdrawUseCase {
  constructor(
    private readonly rounds: CurrentRoundStore,
    private readonly ledger: BalanceLedger,
    private readonly accumulator: TwabAccumulator,
    private readonly gate: EmergencyGate,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  execute(command: WithdrawCommand): BalanceChangeResult {
    assertAllowed(this.gate, 'WITHDRAW');
    const amount = parseAmount(command.amount, 'Withdrawal amount');
    const round = this.rounds.get();
    if (!round) throw new NoOpenRound('Withdrawals open with the first round');

    const previous = this.ledger.balanceOf(command.account);
    if (amount.gt(previous)) {
      throw new InsufficientBalance(
        `Cannot withdraw ${amount.toString()} from ${command.account}: balance is ${previous.toString()}`,
      );
    }
    const balance = previous.sub(amount);

    this.accumulator.recordBalanceChange(command.account, balance, this.clock.now());
    this.ledger.debit(command.account, amount);

    this.logger.info('Withdrawal recorded', {
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
