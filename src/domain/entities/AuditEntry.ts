export type AuditActor = "automated" | "human";

export type AuditOutcome =
  | "pending"
  | "approved"
  | "rejected"
  | "expired"
  | "authorized"
  | "sent"
  | "deferred"
  | "failed"
  | "skipped"
  | "recorded";

export interface AuditEntry {
  id: string;
  timestamp: Date;
  action: string;
  buyerId: string;
  actor: AuditActor;
  outcome: AuditOutcome;
  /** True when the decision was taken under a regime that requires human confirmation. */
  compliance: boolean;
  details: Record<string, unknown>;
}
