export interface FundPrizeCommand {
  amount: string;
}
