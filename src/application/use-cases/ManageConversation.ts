import { ConversationSummary } from "../../domain/entities/Conversation";
import { ConversationNotFoundError } from "../../domain/errors";
import { IClock, systemClock } from "../contracts/IClock";
import { IConversationRepository } from "../contracts/IConversationRepository";
import { AuditTrail } from "../services/AuditTrail";
import { ConversationLanes } from "../services/ConversationLanes";

export class ManageConversation {
  constructor(
    private conversationRepo: IConversationRepository,
    private audit: AuditTrail,
    private lanes: ConversationLanes,
    private clock: IClock = systemClock
  ) {}

  async summary(buyerId: string): Promise<ConversationSummary> {
    const conversation = await this.conversationRepo.findByBuyerId(buyerId);
    if (!conversation) return { exists: false };

    return {
      exists: true,
      state: conversation.state,
      messageCount: conversation.messageCount,
      requiresAttention: conversation.requiresAttention,
      fraudScore: conversation.fraudScore,
      lastActivityAt: conversation.lastActivityAt.toISOString()
    };
  }

  /**
   * The only way the accumulated fraud score ever goes down. Queued behind any
   * analysis in flight for the buyer so its write-back cannot undo the reset.
   */
  resetFraudScore(buyerId: string, reviewer: string): Promise<ConversationSummary> {
    return this.lanes.run(buyerId, () => this.reset(buyerId, reviewer));
  }

  private async reset(buyerId: string, reviewer: string): Promise<ConversationSummary> {
    const conversation = await this.conversationRepo.findByBuyerId(buyerId);
    if (!conversation) throw new ConversationNotFoundError(buyerId);

    await this.conversationRepo.update(buyerId, { fraudScore: 0, updatedAt: this.clock.now() });
    await this.audit.record({
      action: "fraud_score_reset",
      buyerId,
      actor: "human",
      outcome: "recorded",
      details: { reviewer, previousScore: conversation.fraudScore }
    });
    return this.summary(buyerId);
  }
}
