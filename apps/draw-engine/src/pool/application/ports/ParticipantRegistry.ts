/**
 * Append-ordered set of accounts eligible for the weighted draw. The order
 * is stable between calls; the batch cursor indexes into it.
 */
export interface ParticipantRegistry {
  register(account: string): void;
  isRegistered(account: string): boolean;
  orderedMembers(): readonly string[];
}
