import { AuditQuery, IAuditRepository } from "../../application/contracts/IAuditRepository";
import { AuditEntry } from "../../domain/entities/AuditEntry";

export class InMemoryAuditRepository implements IAuditRepository {
  private entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  async list(query: AuditQuery = {}): Promise<AuditEntry[]> {
    const matching = this.entries.filter(
      (e) => (!query.buyerId || e.buyerId === query.buyerId) && (!query.action || e.action === query.action)
    );
    return query.limit ? matching.slice(-query.limit) : [...matching];
  }
}
