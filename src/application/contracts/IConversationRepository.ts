import { Conversation } from "../../domain/entities/Conversation";

export interface IConversationRepository {
  findOrCreate(buyerId: string, init: { productId?: string; now: Date }): Promise<Conversation>;
  update(buyerId: string, data: Partial<Omit<Conversation, "id" | "buyerId" | "createdAt">>): Promise<Conversation>;
  findByBuyerId(buyerId: string): Promise<Conversation | null>;
  findAll(): Promise<Conversation[]>;
}
