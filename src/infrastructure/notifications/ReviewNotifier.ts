import fetch from "node-fetch";
import { INotificationChannel } from "../../application/contracts/INotificationChannel";
import { PendingAction } from "../../domain/entities/PendingAction";
import { componentLogger } from "../logging/logger";

const log = componentLogger("ReviewNotifier");

function reviewSummary(action: PendingAction) {
  const { analysis } = action.payload;
  return {
    event: "human_decision_required",
    actionId: action.id,
    type: action.type,
    buyerId: action.buyerId,
    intent: analysis.intent,
    riskTier: analysis.riskTier,
    fraudRisk: analysis.fraudRisk,
    message: action.payload.originalMessage,
    candidateResponse: action.payload.candidateResponse,
    expiresAt: action.expiresAt.toISOString()
  };
}

/** Chat-style webhook (Slack, Discord, Teams relay) for the human reviewer. */
export class WebhookReviewNotifier implements INotificationChannel {
  constructor(private webhookUrl: string) {}

  async humanDecisionRequired(action: PendingAction): Promise<void> {
    const response = await fetch(this.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(reviewSummary(action))
    });

    if (!response.ok) {
      throw new Error(`Review webhook responded ${response.status} ${response.statusText}`);
    }
  }
}

export class LogReviewNotifier implements INotificationChannel {
  async humanDecisionRequired(action: PendingAction): Promise<void> {
    log.warn(reviewSummary(action), "Human decision required");
  }
}
