export interface RateLimits {
  maxMessagesPerHour: number;
  maxMessagesPerBuyerPerHour: number;
  /** Minimum gap between two sends, applied globally and per buyer. */
  minDelaySeconds: number;
}

export type RateDecision =
  | { allowed: true }
  | { allowed: false; reason: RateLimitReason; retryAt: Date };

export type RateLimitReason = "hourlyLimit" | "buyerHourlyLimit" | "minDelay" | "buyerMinDelay";

const WINDOW_MS = 60 * 60 * 1000;

/**
 * Rolling one-hour send counter. `check` is side-effect free; a send only
 * counts once `record` is called for it.
 */
export class RateLimiter {
  private global: number[] = [];
  private perBuyer: Map<string, number[]> = new Map();

  constructor(private readonly limits: RateLimits) {}

  check(buyerId: string, now: Date): RateDecision {
    const at = now.getTime();
    const global = this.prune(this.global, at);
    const buyer = this.prune(this.perBuyer.get(buyerId) ?? [], at);
    const gapMs = this.limits.minDelaySeconds * 1000;

    if (global.length >= this.limits.maxMessagesPerHour) {
      return { allowed: false, reason: "hourlyLimit", retryAt: new Date(global[0] + WINDOW_MS) };
    }
    if (buyer.length >= this.limits.maxMessagesPerBuyerPerHour) {
      return { allowed: false, reason: "buyerHourlyLimit", retryAt: new Date(buyer[0] + WINDOW_MS) };
    }

    const lastGlobal = global[global.length - 1];
    if (lastGlobal !== undefined && at - lastGlobal < gapMs) {
      return { allowed: false, reason: "minDelay", retryAt: new Date(lastGlobal + gapMs) };
    }
    const lastBuyer = buyer[buyer.length - 1];
    if (lastBuyer !== undefined && at - lastBuyer < gapMs) {
      return { allowed: false, reason: "buyerMinDelay", retryAt: new Date(lastBuyer + gapMs) };
    }

    return { allowed: true };
  }

  record(buyerId: string, now: Date): void {
    const at = now.getTime();
    this.global = this.prune(this.global, at);
    this.global.push(at);

    const buyer = this.prune(this.perBuyer.get(buyerId) ?? [], at);
    buyer.push(at);
    this.perBuyer.set(buyerId, buyer);
    this.evictIdle(at);
  }

  /** Buyers with at least one send inside the rolling window. */
  get trackedBuyers(): number {
    return this.perBuyer.size;
  }

  sentInLastHour(now: Date, buyerId?: string): number {
    const source = buyerId === undefined ? this.global : this.perBuyer.get(buyerId) ?? [];
    return this.prune(source, now.getTime()).length;
  }

  private evictIdle(at: number): void {
    for (const [buyerId, timestamps] of this.perBuyer) {
      const last = timestamps[timestamps.length - 1];
      if (last === undefined || at - last >= WINDOW_MS) this.perBuyer.delete(buyerId);
    }
  }

  private prune(timestamps: number[], at: number): number[] {
    return timestamps.filter((t) => at - t < WINDOW_MS);
  }
}
