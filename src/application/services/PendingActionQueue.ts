import { v4 as uuidv4 } from "uuid";
import { DecisionWaitAbortedError, PendingActionClosedError, PendingActionNotFoundError } from "../../domain/errors";
import {
  ActionType,
  ApprovalOutcome,
  PendingAction,
  PendingActionPayload
} from "../../domain/entities/PendingAction";
import { componentLogger } from "../../infrastructure/logging/logger";
import { IClock, systemClock } from "../contracts/IClock";
import { AuditTrail } from "./AuditTrail";

export type TerminalOutcome = Exclude<ApprovalOutcome, "pending">;

export interface NewPendingAction {
  type: ActionType;
  buyerId: string;
  payload: PendingActionPayload;
}

export interface PendingActionFilter {
  outcome?: ApprovalOutcome;
  buyerId?: string;
}

export interface WaitOptions {
  signal?: AbortSignal;
}

interface Waiter {
  resolve: (outcome: TerminalOutcome) => void;
  timer: NodeJS.Timeout | undefined;
  detach: () => void;
}

const HOUR_MS = 60 * 60 * 1000;
/** Largest delay setTimeout accepts; longer ones fire after 1 ms. */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;
const log = componentLogger("PendingActionQueue");

/**
 * Actions waiting on a human. Every pending → terminal transition goes
 * through `close`, a synchronous check-and-set, so an approval racing an
 * expiry can only ever have one winner.
 */
export class PendingActionQueue {
  /** Pending only; an action leaves this map the moment it closes. */
  private actions: Map<string, PendingAction> = new Map();
  /** Most recently closed actions, oldest evicted first. */
  private closed: Map<string, PendingAction> = new Map();
  private waiters: Map<string, Set<Waiter>> = new Map();

  constructor(
    private readonly audit: AuditTrail,
    private readonly ttlHours: number,
    private readonly clock: IClock = systemClock,
    private readonly historyLimit: number = 1000
  ) {}

  /** Creates a pending action, superseding any still-pending one for the same buyer and type. */
  async create(input: NewPendingAction): Promise<PendingAction> {
    const now = this.clock.now();
    const previous = this.findPending(input.buyerId, input.type);

    if (previous && this.close(previous, "rejected", "system", now)) {
      await this.audit.record({
        action: "action_superseded",
        buyerId: previous.buyerId,
        outcome: "rejected",
        details: { actionId: previous.id, type: previous.type, reason: "superseded" }
      });
    }

    const action: PendingAction = {
      id: uuidv4(),
      type: input.type,
      buyerId: input.buyerId,
      payload: input.payload,
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.ttlHours * HOUR_MS),
      outcome: "pending"
    };
    this.actions.set(action.id, action);
    return action;
  }

  get(id: string): PendingAction | undefined {
    return this.actions.get(id) ?? this.closed.get(id);
  }

  require(id: string): PendingAction {
    const action = this.get(id);
    if (!action) throw new PendingActionNotFoundError(id);
    return action;
  }

  list(filter: PendingActionFilter = {}): PendingAction[] {
    return [...this.actions.values(), ...this.closed.values()]
      .filter((a) => (filter.outcome ? a.outcome === filter.outcome : true))
      .filter((a) => (filter.buyerId ? a.buyerId === filter.buyerId : true))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  active(): PendingAction[] {
    return this.list({ outcome: "pending" });
  }

  /**
   * Human decision on a pending action. Throws when the action is unknown or
   * has already been decided, expired or superseded.
   */
  decide(id: string, outcome: "approved" | "rejected", reviewer: string): PendingAction {
    const action = this.require(id);
    const now = this.clock.now();

    if (action.outcome === "pending" && action.expiresAt.getTime() <= now.getTime()) {
      this.expire(action, now);
    }
    if (!this.close(action, outcome, reviewer, now)) {
      throw new PendingActionClosedError(id, action.outcome);
    }
    return action;
  }

  /** Fails every overdue action closed. Nothing is ever sent for an expired action. */
  sweepExpired(now: Date = this.clock.now()): PendingAction[] {
    const expired: PendingAction[] = [];
    for (const action of this.actions.values()) {
      if (action.expiresAt.getTime() <= now.getTime() && this.expire(action, now)) {
        expired.push(action);
      }
    }
    return expired;
  }

  /**
   * Resolves with the final outcome. The action's own expiry is the deadline;
   * aborting the signal only stops this wait and leaves the action pending.
   */
  waitForDecision(id: string, options: WaitOptions = {}): Promise<TerminalOutcome> {
    const action = this.require(id);
    if (action.outcome !== "pending") {
      return Promise.resolve(action.outcome);
    }

    return new Promise<TerminalOutcome>((resolve, reject) => {
      const { signal } = options;
      if (signal?.aborted) {
        reject(new DecisionWaitAbortedError(id));
        return;
      }

      const waiter: Waiter = {
        resolve,
        timer: undefined,
        detach: () => signal?.removeEventListener("abort", onAbort)
      };

      // Long review windows are waited out in chunks the timer can hold.
      const arm = (remainingMs: number) => {
        const chunk = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
        waiter.timer = setTimeout(() => {
          if (remainingMs > chunk) {
            arm(remainingMs - chunk);
            return;
          }
          // The deadline decides even when the clock has not caught up yet.
          this.expire(action, action.expiresAt);
        }, chunk);
        waiter.timer.unref();
      };
      arm(Math.max(0, action.expiresAt.getTime() - this.clock.now().getTime()));

      const onAbort = () => {
        clearTimeout(waiter.timer);
        this.waiters.get(id)?.delete(waiter);
        reject(new DecisionWaitAbortedError(id));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const set = this.waiters.get(id) ?? new Set<Waiter>();
      set.add(waiter);
      this.waiters.set(id, set);
    });
  }

  private findPending(buyerId: string, type: ActionType): PendingAction | undefined {
    for (const action of this.actions.values()) {
      if (action.buyerId === buyerId && action.type === type) {
        return action;
      }
    }
    return undefined;
  }

  private expire(action: PendingAction, now: Date): boolean {
    if (!this.close(action, "expired", "system", now)) return false;

    log.info({ actionId: action.id, buyerId: action.buyerId }, "Pending action expired without a decision");
    this.audit
      .record({
        action: "action_expired",
        buyerId: action.buyerId,
        outcome: "expired",
        details: { actionId: action.id, type: action.type, expiresAt: action.expiresAt.toISOString() }
      })
      .catch((error: unknown) => log.error({ err: error, actionId: action.id }, "Failed to audit expiry"));
    return true;
  }

  private close(action: PendingAction, outcome: TerminalOutcome, by: string, now: Date): boolean {
    if (action.outcome !== "pending") return false;

    action.outcome = outcome;
    action.resolvedAt = now;
    action.resolvedBy = by;
    this.actions.delete(action.id);
    this.closed.set(action.id, action);
    for (const oldest of this.closed.keys()) {
      if (this.closed.size <= this.historyLimit) break;
      this.closed.delete(oldest);
    }

    const waiters = this.waiters.get(action.id);
    this.waiters.delete(action.id);
    for (const waiter of waiters ?? []) {
      clearTimeout(waiter.timer);
      waiter.detach();
      waiter.resolve(outcome);
    }
    return true;
  }
}
