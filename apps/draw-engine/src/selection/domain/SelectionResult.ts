import { Decimal } from 'decimal.js';

export interface Award {
  readonly account: string;
  readonly amount: Decimal;
  readonly tier: string;
}

export type SelectionIssue =
  | {
      readonly kind: 'INSUFFICIENT_PARTICIPANTS';
      readonly tier: string;
      readonly required: number;
      readonly selected: number;
    }
  | {
      readonly kind: 'INSUFFICIENT_PRIZE_POOL';
      readonly tier: string;
      readonly required: Decimal;
      readonly available: Decimal;
    };

export type NoWinnerReason = 'ZERO_TOTAL_WEIGHT' | 'NO_PRIZE' | 'INSUFFICIENT_PRIZE_POOL';

/**
 * Outcome of one draw. A "no winner" result is an ordinary value: the
 * whole prize is reported as carry-over.
 */
export type SelectionResult =
  | {
      readonly awarded: true;
      readonly awards: readonly Award[];
      readonly carryOver: Decimal;
      readonly issues: readonly SelectionIssue[];
    }
  | {
      readonly awarded: false;
      readonly reason: NoWinnerReason;
      readonly carryOver: Decimal;
      readonly issues: readonly SelectionIssue[];
    };

export function noWinner(
  reason: NoWinnerReason,
  prizeAmount: Decimal,
  issues: readonly SelectionIssue[] = [],
): SelectionResult {
  return { awarded: false, reason, carryOver: prizeAmount, issues };
}

export function describeIssue(issue: SelectionIssue): Record<string, string | number> {
  switch (issue.kind) {
    case 'INSUFFICIENT_PARTICIPANTS':
      return {
        kind: issue.kind,
        tier: issue.tier,
        required: issue.required,
        selected: issue.selected,
      };
    case 'INSUFFICIENT_PRIZE_POOL':
      return {
        kind: issue.kind,
        tier: issue.tier,
        required: issue.required.toString(),
        available: issue.available.toString(),
      };
  }
}
