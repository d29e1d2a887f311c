import { AuditEntry } from "../../domain/entities/AuditEntry";

export interface AuditQuery {
  buyerId?: string;
  action?: string;
  limit?: number;
}

/** Append-only: entries are never updated or removed once written. */
export interface IAuditRepository {
  append(entry: AuditEntry): Promise<void>;
  list(query?: AuditQuery): Promise<AuditEntry[]>;
}
