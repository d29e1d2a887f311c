import { AnalysisResult } from "../../domain/entities/AnalysisResult";
import { Conversation, RecoveryStage } from "../../domain/entities/Conversation";
import { RegimeConfig } from "../../domain/policy/RegimePolicy";
import { ConversationStateMachine } from "../../domain/services/ConversationStateMachine";
import { ResponseSelector } from "../../domain/services/ResponseSelector";
import { RiskScorer } from "../../domain/services/RiskScorer";
import { componentLogger } from "../../infrastructure/logging/logger";
import { IBuyerRepository } from "../contracts/IBuyerRepository";
import { IClock, systemClock } from "../contracts/IClock";
import { IConversationRepository } from "../contracts/IConversationRepository";
import { IProductRepository } from "../contracts/IProductRepository";
import { ActionGate, GateDecision } from "../services/ActionGate";
import { AuditTrail } from "../services/AuditTrail";
import { ConversationLanes } from "../services/ConversationLanes";

/** Conversations this long are past the point where a follow-up helps. */
export const RECOVERY_MAX_MESSAGES = 10;

const HOUR_MS = 60 * 60 * 1000;
const log = componentLogger("SweepInactiveConversations");

export interface RecoveryAttempt {
  buyerId: string;
  stage: RecoveryStage;
  decision: GateDecision["kind"];
}

export interface SweepResult {
  abandoned: string[];
  recoveries: RecoveryAttempt[];
}

export class SweepInactiveConversations {
  constructor(
    private policy: RegimeConfig,
    private conversationRepo: IConversationRepository,
    private buyerRepo: IBuyerRepository,
    private productRepo: IProductRepository,
    private stateMachine: ConversationStateMachine,
    private selector: ResponseSelector,
    private riskScorer: RiskScorer,
    private gate: ActionGate,
    private audit: AuditTrail,
    private lanes: ConversationLanes,
    private clock: IClock = systemClock
  ) {}

  async execute(now: Date = this.clock.now()): Promise<SweepResult> {
    const result: SweepResult = { abandoned: [], recoveries: [] };
    const conversations = await this.conversationRepo.findAll();

    for (const { buyerId } of conversations) {
      // Inside the lane the conversation is re-read: a message may have arrived since findAll.
      await this.lanes.run(buyerId, () => this.sweepOne(buyerId, now, result));
    }

    if (result.abandoned.length > 0 || result.recoveries.length > 0) {
      log.info(
        { abandoned: result.abandoned.length, recoveries: result.recoveries.length },
        "Inactivity sweep finished"
      );
    }
    return result;
  }

  private async sweepOne(buyerId: string, now: Date, result: SweepResult): Promise<void> {
    const conversation = await this.conversationRepo.findByBuyerId(buyerId);
    if (!conversation) return;

    const hoursInactive = (now.getTime() - conversation.lastActivityAt.getTime()) / HOUR_MS;
    let current = conversation;

    if (current.state !== "Abandoned" && hoursInactive >= this.policy.inactivityTimeoutHours) {
      current = await this.conversationRepo.update(buyerId, {
        state: this.stateMachine.abandon(),
        requiresAttention: false,
        updatedAt: now
      });
      result.abandoned.push(buyerId);
      await this.audit.record({
        action: "conversation_abandoned",
        buyerId,
        outcome: "recorded",
        details: { previousState: conversation.state, hoursInactive: Math.floor(hoursInactive) }
      });
    }

    if (current.state === "Abandoned") {
      const attempt = await this.recover(current, hoursInactive, now);
      if (attempt) result.recoveries.push(attempt);
    }
  }

  private async recover(conversation: Conversation, hoursInactive: number, now: Date): Promise<RecoveryAttempt | null> {
    if (conversation.messageCount >= RECOVERY_MAX_MESSAGES || !conversation.productId) return null;

    const stage = recoveryStageFor(hoursInactive);
    if (!stage || !isLaterStage(stage, conversation.recoveryStage)) return null;

    const [buyer, product] = await Promise.all([
      this.buyerRepo.findById(conversation.buyerId),
      this.productRepo.findById(conversation.productId)
    ]);
    if (!buyer || !product) {
      log.warn({ buyerId: conversation.buyerId }, "Skipping recovery, buyer or product snapshot missing");
      return null;
    }

    const text = this.selector.recovery(hoursInactive, product, buyer);
    if (!text) return null;

    await this.conversationRepo.update(conversation.buyerId, { recoveryStage: stage, updatedAt: now });
    await this.audit.record({
      action: "recovery_drafted",
      buyerId: conversation.buyerId,
      outcome: "recorded",
      details: { stage, hoursInactive: Math.floor(hoursInactive) }
    });

    const riskTier = this.riskScorer.tierFor(conversation.fraudScore);
    const analysis: AnalysisResult = {
      intent: "Unknown",
      priorityTier: "low",
      fraudRisk: conversation.fraudScore,
      riskTier,
      state: conversation.state,
      requiresHuman: this.policy.requireHumanConfirmation || riskTier === "high",
      messageCount: conversation.messageCount,
      signals: []
    };
    const decision = await this.gate.decide({
      buyerId: conversation.buyerId,
      message: "",
      analysis,
      candidate: text
    });

    return { buyerId: conversation.buyerId, stage, decision: decision.kind };
  }
}

function recoveryStageFor(hoursInactive: number): RecoveryStage | null {
  if (hoursInactive >= 48) return "48h";
  if (hoursInactive >= 24) return "24h";
  return null;
}

function isLaterStage(next: RecoveryStage, previous: RecoveryStage | undefined): boolean {
  if (!previous) return true;
  return previous === "24h" && next === "48h";
}
