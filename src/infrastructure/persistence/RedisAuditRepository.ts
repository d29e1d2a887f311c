import Redis from "ioredis";
import { AuditQuery, IAuditRepository } from "../../application/contracts/IAuditRepository";
import { AuditEntry } from "../../domain/entities/AuditEntry";
import { auditEntrySchema } from "../../domain/schemas";
import { redisKeys } from "./redisClient";

/** Audit log as a Redis list; RPUSH only, entries are never rewritten. */
export class RedisAuditRepository implements IAuditRepository {
  constructor(private redis: Redis) {}

  async append(entry: AuditEntry): Promise<void> {
    await this.redis.rpush(redisKeys.audit, JSON.stringify(entry));
  }

  async list(query: AuditQuery = {}): Promise<AuditEntry[]> {
    const raws = await this.redis.lrange(redisKeys.audit, 0, -1);
    const matching = raws
      .map((raw) => auditEntrySchema.parse(JSON.parse(raw)))
      .filter((e) => (!query.buyerId || e.buyerId === query.buyerId) && (!query.action || e.action === query.action));
    return query.limit ? matching.slice(-query.limit) : matching;
  }
}
