import { v4 as uuidv4 } from "uuid";
import { AuditActor, AuditEntry, AuditOutcome } from "../../domain/entities/AuditEntry";
import { componentLogger } from "../../infrastructure/logging/logger";
import { AuditQuery, IAuditRepository } from "../contracts/IAuditRepository";
import { IClock, systemClock } from "../contracts/IClock";

export type AuditAction =
  | "message_analyzed"
  | "action_pending"
  | "action_approved"
  | "action_rejected"
  | "action_expired"
  | "action_superseded"
  | "send_authorized"
  | "no_response"
  | "message_sent"
  | "message_deferred"
  | "delivery_failed"
  | "notification_failed"
  | "conversation_abandoned"
  | "recovery_drafted"
  | "fraud_score_reset";

export interface AuditRecord {
  action: AuditAction;
  buyerId: string;
  actor?: AuditActor;
  outcome: AuditOutcome;
  details?: Record<string, unknown>;
}

const log = componentLogger("AuditTrail");

/**
 * Stamps and appends audit entries. A failing sink is logged and does not
 * interrupt the decision that produced the entry.
 */
export class AuditTrail {
  constructor(
    private readonly repository: IAuditRepository,
    private readonly compliance: boolean,
    private readonly clock: IClock = systemClock
  ) {}

  async record(record: AuditRecord): Promise<AuditEntry> {
    const entry: AuditEntry = {
      id: uuidv4(),
      timestamp: this.clock.now(),
      action: record.action,
      buyerId: record.buyerId,
      actor: record.actor ?? "automated",
      outcome: record.outcome,
      compliance: this.compliance,
      details: record.details ?? {}
    };

    try {
      await this.repository.append(entry);
    } catch (error) {
      log.error({ err: error, action: entry.action, buyerId: entry.buyerId }, "Failed to append audit entry");
    }
    return entry;
  }

  list(query?: AuditQuery): Promise<AuditEntry[]> {
    return this.repository.list(query);
  }
}
