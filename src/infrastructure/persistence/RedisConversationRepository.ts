import Redis from "ioredis";
import { IConversationRepository } from "../../application/contracts/IConversationRepository";
import { Conversation } from "../../domain/entities/Conversation";
import { conversationSchema } from "../../domain/schemas";
import { redisKeys } from "./redisClient";

export class RedisConversationRepository implements IConversationRepository {
  constructor(private redis: Redis) {}

  async findOrCreate(buyerId: string, init: { productId?: string; now: Date }): Promise<Conversation> {
    const existing = await this.findByBuyerId(buyerId);
    if (existing) return existing;

    const created: Conversation = {
      id: buyerId,
      buyerId,
      productId: init.productId,
      state: "Initial",
      messageCount: 0,
      fraudScore: 0,
      requiresAttention: false,
      lastActivityAt: init.now,
      createdAt: init.now,
      updatedAt: init.now
    };
    // NX keeps a concurrent creator from overwriting a conversation that already has messages.
    const stored = await this.redis.set(redisKeys.conversation(buyerId), JSON.stringify(created), "NX");
    if (stored !== "OK") {
      const raced = await this.findByBuyerId(buyerId);
      if (raced) return raced;
    }
    await this.redis.sadd(redisKeys.conversationIndex, buyerId);
    return created;
  }

  async update(buyerId: string, data: Partial<Conversation>): Promise<Conversation> {
    const existing = await this.findByBuyerId(buyerId);
    if (!existing) throw new Error(`Conversation not found: ${buyerId}`);

    const updated: Conversation = { ...existing, ...data, id: existing.id, buyerId: existing.buyerId };
    await this.redis.set(redisKeys.conversation(buyerId), JSON.stringify(updated));
    return updated;
  }

  async findByBuyerId(buyerId: string): Promise<Conversation | null> {
    const raw = await this.redis.get(redisKeys.conversation(buyerId));
    return raw ? conversationSchema.parse(JSON.parse(raw)) : null;
  }

  async findAll(): Promise<Conversation[]> {
    const buyerIds = await this.redis.smembers(redisKeys.conversationIndex);
    if (buyerIds.length === 0) return [];

    const raws = await this.redis.mget(buyerIds.map((id) => redisKeys.conversation(id)));
    return raws.flatMap((raw) => (raw ? [conversationSchema.parse(JSON.parse(raw))] : []));
  }
}
