export interface Timer {
  schedule(callback: () => void, delayMs: number): void;
  clear(): void;
}
