import { IConversationRepository } from "../../application/contracts/IConversationRepository";
import { Conversation } from "../../domain/entities/Conversation";

export class InMemoryConversationRepository implements IConversationRepository {
  private conversations: Map<string, Conversation> = new Map();

  async findOrCreate(buyerId: string, init: { productId?: string; now: Date }): Promise<Conversation> {
    const existing = this.conversations.get(buyerId);
    if (existing) return { ...existing };

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
    this.conversations.set(buyerId, created);
    return { ...created };
  }

  async update(buyerId: string, data: Partial<Conversation>): Promise<Conversation> {
    const existing = this.conversations.get(buyerId);
    if (!existing) throw new Error(`Conversation not found: ${buyerId}`);

    const updated: Conversation = { ...existing, ...data, id: existing.id, buyerId: existing.buyerId };
    this.conversations.set(buyerId, updated);
    return { ...updated };
  }

  async findByBuyerId(buyerId: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(buyerId);
    return conversation ? { ...conversation } : null;
  }

  async findAll(): Promise<Conversation[]> {
    return Array.from(this.conversations.values(), (c) => ({ ...c }));
  }
}
