export interface SetBonusWeightCommand {
  account: string;
  weight: string;
  reason: string;
}

export interface AddBonusWeightCommand {
  account: string;
  delta: string;
  reason: string;
}

export interface RemoveBonusWeightCommand {
  account: string;
}
