import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';

export class InMemoryParticipantRegistry implements ParticipantRegistry {
  private readonly members: string[] = [];
  private readonly index = new Set<string>();

  register(account: string): void {
    if (this.index.has(account)) return;
    this.index.add(account);
    this.members.push(account);
  }

  isRegistered(account: string): boolean {
    return this.index.has(account);
  }

  orderedMembers(): readonly string[] {
    return this.members;
  }
}
