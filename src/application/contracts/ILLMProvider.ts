import { ConversationStateName } from "../../domain/entities/Conversation";
import { Intent } from "../../domain/entities/Intent";
import { ProductInfo } from "../../domain/entities/ProductInfo";

export interface DraftRequest {
  message: string;
  intent: Intent;
  state: ConversationStateName;
  product: ProductInfo;
  buyerName?: string;
}

export interface DraftReply {
  text: string;
  tokensUsed: number;
}

export interface ILLMProvider {
  readonly name: string;
  draftReply(input: DraftRequest): Promise<DraftReply>;
}
