import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { PromiseTracker } from '@engine/application/PromiseTracker';

/**
 * Publishes lifecycle events without blocking the synchronous use cases.
 * State changes never wait on, or roll back for, a failed publication.
 */
export class RoundEvents {
  constructor(
    readonly publisher: EventPublisher,
    private readonly tracker: PromiseTracker,
  ) {}

  emit(label: string, publish: (publisher: EventPublisher) => Promise<void>): void {
    this.tracker.track(publish(this.publisher), label);
  }

  get pending(): number {
    return this.tracker.size;
  }

  drain(): Promise<void> {
    return this.tracker.drain();
  }
}
