import { AnalysisResult } from "../../domain/entities/AnalysisResult";
import { Intent, RiskTier } from "../../domain/entities/Intent";
import { ActionType, PendingAction } from "../../domain/entities/PendingAction";
import { RegimeConfig } from "../../domain/policy/RegimePolicy";
import { componentLogger } from "../../infrastructure/logging/logger";
import { INotificationChannel } from "../contracts/INotificationChannel";
import { AuditTrail } from "./AuditTrail";
import { DispatchResult, OutboundDispatcher } from "./OutboundDispatcher";
import { PendingActionQueue, TerminalOutcome, WaitOptions } from "./PendingActionQueue";

export interface GateInput {
  buyerId: string;
  message: string;
  analysis: AnalysisResult;
  candidate: string | null;
  type?: ActionType;
}

export type GateDecision =
  | { kind: "pending"; action: PendingAction }
  | { kind: "dispatched"; dispatch: DispatchResult }
  | { kind: "none" };

export interface ReviewResult {
  action: PendingAction;
  dispatch?: DispatchResult;
}

const log = componentLogger("ActionGate");

/** One rule for both regimes: the policy decides, not the regime name. */
export function requiresHuman(policy: RegimeConfig, riskTier: RiskTier, intent: Intent): boolean {
  return policy.requireHumanConfirmation || riskTier === "high" || intent === "Fraud";
}

export class ActionGate {
  constructor(
    private readonly policy: RegimeConfig,
    private readonly queue: PendingActionQueue,
    private readonly dispatcher: OutboundDispatcher,
    private readonly audit: AuditTrail,
    private readonly notifier?: INotificationChannel
  ) {}

  async decide(input: GateInput): Promise<GateDecision> {
    const { analysis } = input;

    if (analysis.requiresHuman) {
      const action = await this.queue.create({
        type: input.type ?? "send-message",
        buyerId: input.buyerId,
        payload: {
          originalMessage: input.message,
          analysis,
          candidateResponse: input.candidate
        }
      });
      await this.notify(action);
      await this.audit.record({
        action: "action_pending",
        buyerId: input.buyerId,
        outcome: "pending",
        details: {
          actionId: action.id,
          type: action.type,
          intent: analysis.intent,
          riskTier: analysis.riskTier,
          fraudRisk: analysis.fraudRisk,
          expiresAt: action.expiresAt.toISOString()
        }
      });
      return { kind: "pending", action };
    }

    if (input.candidate === null) {
      await this.audit.record({
        action: "no_response",
        buyerId: input.buyerId,
        outcome: "skipped",
        details: { intent: analysis.intent, state: analysis.state }
      });
      return { kind: "none" };
    }

    await this.audit.record({
      action: "send_authorized",
      buyerId: input.buyerId,
      outcome: "authorized",
      details: { intent: analysis.intent, riskTier: analysis.riskTier }
    });
    const dispatch = await this.dispatcher.dispatch({
      buyerId: input.buyerId,
      text: input.candidate,
      actor: "automated"
    });
    return { kind: "dispatched", dispatch };
  }

  /**
   * Sends the reviewer's text, or the stored candidate when none is given.
   * An approval with nothing to send still closes the action.
   */
  async approve(actionId: string, reviewer: string, overrideText?: string): Promise<ReviewResult> {
    const action = this.queue.decide(actionId, "approved", reviewer);
    const text = overrideText?.trim() || action.payload.candidateResponse;

    await this.audit.record({
      action: "action_approved",
      buyerId: action.buyerId,
      actor: "human",
      outcome: "approved",
      details: { actionId, reviewer, overridden: Boolean(overrideText?.trim()), willSend: text !== null }
    });

    if (text === null) {
      return { action };
    }

    const dispatch = await this.dispatcher.dispatch({
      buyerId: action.buyerId,
      text: this.withDisclosure(text),
      actor: "human",
      actionId
    });
    return { action, dispatch };
  }

  async reject(actionId: string, reviewer: string, reason?: string): Promise<ReviewResult> {
    const action = this.queue.decide(actionId, "rejected", reviewer);
    await this.audit.record({
      action: "action_rejected",
      buyerId: action.buyerId,
      actor: "human",
      outcome: "rejected",
      details: { actionId, reviewer, reason }
    });
    return { action };
  }

  waitForDecision(actionId: string, options?: WaitOptions): Promise<TerminalOutcome> {
    return this.queue.waitForDecision(actionId, options);
  }

  sweepExpired(now?: Date): PendingAction[] {
    return this.queue.sweepExpired(now);
  }

  private withDisclosure(text: string): string {
    const disclosure = this.policy.disclosure.trim();
    return this.policy.requireHumanConfirmation && disclosure ? `${disclosure}\n\n${text}` : text;
  }

  private async notify(action: PendingAction): Promise<void> {
    if (!this.notifier) return;
    try {
      await this.notifier.humanDecisionRequired(action);
    } catch (error) {
      log.error({ err: error, actionId: action.id }, "Review notification failed");
      await this.audit.record({
        action: "notification_failed",
        buyerId: action.buyerId,
        outcome: "failed",
        details: { actionId: action.id, error: error instanceof Error ? error.message : String(error) }
      });
    }
  }
}
