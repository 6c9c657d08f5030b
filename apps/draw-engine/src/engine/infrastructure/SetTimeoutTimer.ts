import { Timer } from '@engine/application/ports/Timer';

/** Single-slot timer: scheduling replaces whatever was pending. */
export class SetTimeoutTimer implements Timer {
  private handle: ReturnType<typeof setTimeout> | null = null;

  schedule(callback: () => void, delayMs: number): void {
    this.clear();
    this.handle = setTimeout(() => {
      this.handle = null;
      callback();
    }, delayMs);
  }

  clear(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }
}
