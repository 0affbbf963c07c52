import { Clock, systemClock } from '../lib/clock';

// repository -> last accepted provision time (ms). Process local, not durable.
export interface CooldownLedger {
  lastAccepted(key: number): number | undefined;
  record(key: number, at: number): void;
  size(): number;
}

export class InMemoryCooldownLedger implements CooldownLedger {
  private readonly entries = new Map<number, number>();

  constructor(
    private readonly horizonMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  // Opportunistic pruning: every access drops entries older than the horizon
  private prune(): void {
    const now = this.clock.now();
    for (const [key, at] of this.entries) {
      if (now - at >= this.horizonMs) {
        this.entries.delete(key);
      }
    }
  }

  lastAccepted(key: number): number | undefined {
    this.prune();
    return this.entries.get(key);
  }

  record(key: number, at: number): void {
    this.prune();
    this.entries.set(key, at);
  }

  size(): number {
    this.prune();
    return this.entries.size;
  }
}
