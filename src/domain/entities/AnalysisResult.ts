import { ConversationStateName } from "./Conversation";
import { Intent, PriorityTier, RiskTier } from "./Intent";

export interface AnalysisResult {
  intent: Intent;
  priorityTier: PriorityTier;
  fraudRisk: number;
  riskTier: RiskTier;
  state: ConversationStateName;
  requiresHuman: boolean;
  messageCount: number;
  signals: string[];
}
