import { Intent } from "./Intent";

export const CONVERSATION_STATES = [
  "Initial",
  "Negotiating",
  "Coordinating",
  "Committed",
  "Abandoned",
  "Recovered"
] as const;

export type ConversationStateName = (typeof CONVERSATION_STATES)[number];

export type RecoveryStage = "24h" | "48h";

export interface Conversation {
  id: string;
  buyerId: string;
  productId?: string;
  state: ConversationStateName;
  messageCount: number;
  /** Highest fraud-risk score seen in this conversation. Only lowered by an explicit reset. */
  fraudScore: number;
  lastIntent?: Intent;
  requiresAttention: boolean;
  /** Last recovery follow-up drafted since the buyer went quiet. */
  recoveryStage?: RecoveryStage;
  lastActivityAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface ConversationSummary {
  exists: boolean;
  state?: ConversationStateName;
  messageCount?: number;
  requiresAttention?: boolean;
  fraudScore?: number;
  lastActivityAt?: string;
}
