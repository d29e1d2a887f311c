import { BuyerProfile } from "../../domain/entities/BuyerProfile";
import { ConversationStateName } from "../../domain/entities/Conversation";
import { Intent, RiskTier } from "../../domain/entities/Intent";
import { ProductInfo } from "../../domain/entities/ProductInfo";
import { ContentSignals } from "../../domain/services/ContentSignalDetector";
import { ResponseSelection, ResponseSelector } from "../../domain/services/ResponseSelector";
import { componentLogger } from "../../infrastructure/logging/logger";
import { withTimeout } from "../../infrastructure/utils/timeout";
import { ILLMProvider } from "../contracts/ILLMProvider";

export interface GenerateResponseInput {
  message: string;
  intent: Intent;
  state: ConversationStateName;
  riskTier: RiskTier;
  content: ContentSignals;
  product: ProductInfo;
  buyer: BuyerProfile;
}

const log = componentLogger("GenerateResponse");

/**
 * Picks the candidate reply. Templates win; the language model is only asked
 * when no template covers the intent, and never for risky messages.
 */
export class GenerateResponse {
  constructor(
    private selector: ResponseSelector,
    private llmProvider?: ILLMProvider,
    private draftTimeoutMs: number = 8000
  ) {}

  async execute(input: GenerateResponseInput): Promise<ResponseSelection> {
    const draft = this.needsDraft(input) ? await this.draft(input) : null;

    return this.selector.select({
      state: input.state,
      intent: input.intent,
      riskTier: input.riskTier,
      product: input.product,
      buyer: input.buyer,
      content: input.content,
      draft
    });
  }

  private needsDraft(input: GenerateResponseInput): boolean {
    if (!this.llmProvider) return false;
    if (input.riskTier === "high" || input.intent === "Fraud") return false;
    return !this.selector.hasTemplate(input.intent, input.state, input.product);
  }

  private async draft(input: GenerateResponseInput): Promise<string | null> {
    if (!this.llmProvider) return null;
    try {
      const reply = await withTimeout(
        this.llmProvider.draftReply({
          message: input.message,
          intent: input.intent,
          state: input.state,
          product: input.product,
          buyerName: input.buyer.username
        }),
        this.draftTimeoutMs,
        "llm-draft",
        { provider: this.llmProvider.name, buyerId: input.buyer.id }
      );
      log.debug({ provider: this.llmProvider.name, tokensUsed: reply.tokensUsed }, "Draft received");
      return reply.text;
    } catch (error) {
      log.warn({ err: error, provider: this.llmProvider.name }, "Draft unavailable, falling back to no response");
      return null;
    }
  }
}
