export interface DepositCommand {
  account: string;
  amount: string;
}

export interface WithdrawCommand {
  account: string;
  amount: string;
}

export interface BalanceChangeResult {
  account: string;
  roundId: number;
  previousBalance: string;
  balance: string;
}
