import { v4 as uuidv4 } from "uuid";
import { AuditActor } from "../../domain/entities/AuditEntry";
import { componentLogger } from "../../infrastructure/logging/logger";
import { IClock, systemClock } from "../contracts/IClock";
import { IDeliveryChannel } from "../contracts/IDeliveryChannel";
import { AuditTrail } from "./AuditTrail";
import { RateLimiter, RateLimitReason } from "./RateLimiter";

export interface DispatchRequest {
  buyerId: string;
  text: string;
  actor: AuditActor;
  actionId?: string;
}

export interface DeferredMessage extends DispatchRequest {
  id: string;
  reason: RateLimitReason;
  retryAt: Date;
  attempts: number;
}

export type DispatchResult =
  | { status: "sent"; delaySeconds: number }
  | { status: "deferred"; deferredId: string; retryAt: Date; reason: RateLimitReason }
  | { status: "failed"; error: string };

export interface DelayWindow {
  minDelaySeconds: number;
  maxDelaySeconds: number;
}

const log = componentLogger("OutboundDispatcher");

/**
 * Hands authorized replies to the delivery channel. Sends that would break
 * the rate limits are parked with a retry time instead of being dropped.
 */
export class OutboundDispatcher {
  private deferred: DeferredMessage[] = [];

  constructor(
    private readonly limiter: RateLimiter,
    private readonly channel: IDeliveryChannel,
    private readonly audit: AuditTrail,
    private readonly delays: DelayWindow,
    private readonly clock: IClock = systemClock,
    private readonly random: () => number = Math.random
  ) {}

  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    const now = this.clock.now();
    const decision = this.limiter.check(request.buyerId, now);

    if (!decision.allowed) {
      const item: DeferredMessage = {
        ...request,
        id: uuidv4(),
        reason: decision.reason,
        retryAt: decision.retryAt,
        attempts: 0
      };
      this.deferred.push(item);
      await this.audit.record({
        action: "message_deferred",
        buyerId: request.buyerId,
        actor: request.actor,
        outcome: "deferred",
        details: { deferredId: item.id, reason: item.reason, retryAt: item.retryAt.toISOString(), actionId: request.actionId }
      });
      log.info({ buyerId: request.buyerId, reason: item.reason, retryAt: item.retryAt }, "Send deferred by rate limit");
      return { status: "deferred", deferredId: item.id, retryAt: item.retryAt, reason: item.reason };
    }

    return this.send(request, now);
  }

  /** Re-attempts every parked send whose retry time has come, oldest first. */
  async retryDeferred(now: Date = this.clock.now()): Promise<DispatchResult[]> {
    const due = this.deferred.filter((d) => d.retryAt.getTime() <= now.getTime());
    const results: DispatchResult[] = [];

    for (const item of due) {
      const decision = this.limiter.check(item.buyerId, now);
      if (!decision.allowed) {
        item.retryAt = decision.retryAt;
        item.reason = decision.reason;
        item.attempts += 1;
        results.push({ status: "deferred", deferredId: item.id, retryAt: item.retryAt, reason: item.reason });
        continue;
      }
      this.deferred = this.deferred.filter((d) => d.id !== item.id);
      results.push(await this.send(item, now));
    }

    return results;
  }

  pendingDeferred(): DeferredMessage[] {
    return this.deferred.map((d) => ({ ...d }));
  }

  /** Human-like pause in [minDelaySeconds, maxDelaySeconds]. */
  nextDelaySeconds(): number {
    const { minDelaySeconds, maxDelaySeconds } = this.delays;
    return Math.round(minDelaySeconds + this.random() * (maxDelaySeconds - minDelaySeconds));
  }

  private async send(request: DispatchRequest, now: Date): Promise<DispatchResult> {
    const delaySeconds = this.nextDelaySeconds();
    // Counted at hand-off so concurrent dispatches see each other.
    this.limiter.record(request.buyerId, now);

    let result: DispatchResult;
    try {
      const delivery = await this.channel.deliver({
        buyerId: request.buyerId,
        text: request.text,
        delaySeconds,
        actionId: request.actionId
      });
      result = delivery.ok ? { status: "sent", delaySeconds } : { status: "failed", error: delivery.error };
    } catch (error) {
      result = { status: "failed", error: error instanceof Error ? error.message : String(error) };
    }

    if (result.status === "sent") {
      await this.audit.record({
        action: "message_sent",
        buyerId: request.buyerId,
        actor: request.actor,
        outcome: "sent",
        details: { delaySeconds, actionId: request.actionId }
      });
    } else if (result.status === "failed") {
      log.error({ buyerId: request.buyerId, error: result.error }, "Delivery failed");
      await this.audit.record({
        action: "delivery_failed",
        buyerId: request.buyerId,
        actor: request.actor,
        outcome: "failed",
        details: { error: result.error, actionId: request.actionId }
      });
    }
    return result;
  }
}
