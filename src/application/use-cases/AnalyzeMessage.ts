import { AnalysisResult } from "../../domain/entities/AnalysisResult";
import { BuyerProfile } from "../../domain/entities/BuyerProfile";
import { Conversation } from "../../domain/entities/Conversation";
import { ProductInfo } from "../../domain/entities/ProductInfo";
import { RegimeConfig } from "../../domain/policy/RegimePolicy";
import { ConversationStateMachine } from "../../domain/services/ConversationStateMachine";
import { IntentClassifier } from "../../domain/services/IntentClassifier";
import { PriorityRanker } from "../../domain/services/PriorityRanker";
import { ResponseSource } from "../../domain/services/ResponseSelector";
import { RiskScorer } from "../../domain/services/RiskScorer";
import { componentLogger } from "../../infrastructure/logging/logger";
import { IBuyerRepository } from "../contracts/IBuyerRepository";
import { IClock, systemClock } from "../contracts/IClock";
import { IConversationRepository } from "../contracts/IConversationRepository";
import { IProductRepository } from "../contracts/IProductRepository";
import { ActionGate, GateDecision, requiresHuman } from "../services/ActionGate";
import { AuditTrail } from "../services/AuditTrail";
import { ConversationLanes } from "../services/ConversationLanes";
import { GenerateResponse } from "./GenerateResponse";

export interface AnalyzeMessageInput {
  buyer: BuyerProfile;
  product: ProductInfo;
  message: string;
}

export interface AnalyzeMessageOutput {
  analysis: AnalysisResult;
  response: string | null;
  responseSource: ResponseSource;
  decision: GateDecision;
  /** False when any conversation write failed; the analysis itself is still valid. */
  persisted: boolean;
}

export interface AnalyzeMessageDeps {
  policy: RegimeConfig;
  conversationRepo: IConversationRepository;
  buyerRepo: IBuyerRepository;
  productRepo: IProductRepository;
  classifier: IntentClassifier;
  riskScorer: RiskScorer;
  priorityRanker: PriorityRanker;
  stateMachine: ConversationStateMachine;
  generateResponse: GenerateResponse;
  gate: ActionGate;
  audit: AuditTrail;
  lanes: ConversationLanes;
  clock?: IClock;
}

const log = componentLogger("AnalyzeMessage");

export class AnalyzeMessage {
  private clock: IClock;

  constructor(private deps: AnalyzeMessageDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  execute(input: AnalyzeMessageInput): Promise<AnalyzeMessageOutput> {
    return this.deps.lanes.run(input.buyer.id, () => this.analyze(input));
  }

  private async analyze(input: AnalyzeMessageInput): Promise<AnalyzeMessageOutput> {
    const { buyer, product, message } = input;
    const { classifier, riskScorer, priorityRanker, stateMachine, policy } = this.deps;
    const now = this.clock.now();
    let persisted = true;

    const snapshotsSaved = await this.bestEffort("save-snapshots", buyer.id, async () => {
      await this.deps.buyerRepo.save(buyer);
      await this.deps.productRepo.save(product);
      return true;
    });
    if (!snapshotsSaved) persisted = false;

    const loaded = await this.bestEffort("load-conversation", buyer.id, () =>
      this.deps.conversationRepo.findOrCreate(buyer.id, { productId: product.id, now })
    );
    if (!loaded) persisted = false;
    const conversation = loaded ?? freshConversation(buyer.id, product.id, now);

    const intent = classifier.classify(message);
    const risk = riskScorer.assess(message, buyer, intent);
    const priorityTier = priorityRanker.rank(intent, buyer, message);
    const state = stateMachine.next(conversation.state, intent);
    const needsHuman = requiresHuman(policy, risk.tier, intent);

    const analysis: AnalysisResult = {
      intent,
      priorityTier,
      fraudRisk: risk.score,
      riskTier: risk.tier,
      state,
      requiresHuman: needsHuman,
      messageCount: conversation.messageCount + 1,
      signals: risk.signals.map((s) => s.name)
    };

    if (state !== conversation.state) {
      log.info({ buyerId: buyer.id, from: conversation.state, to: state, intent }, "Conversation state changed");
    }

    const updated = await this.bestEffort("update-conversation", buyer.id, () =>
      this.deps.conversationRepo.update(buyer.id, {
        productId: product.id,
        state,
        messageCount: analysis.messageCount,
        fraudScore: Math.max(conversation.fraudScore, risk.score),
        lastIntent: intent,
        requiresAttention: stateMachine.requiresAttention(state) || needsHuman,
        recoveryStage: undefined,
        lastActivityAt: now,
        updatedAt: now
      })
    );
    if (!updated) persisted = false;

    await this.deps.audit.record({
      action: "message_analyzed",
      buyerId: buyer.id,
      outcome: "recorded",
      details: {
        intent,
        priorityTier,
        fraudRisk: risk.score,
        riskTier: risk.tier,
        state,
        signals: analysis.signals,
        phrases: risk.content.phrases
      }
    });

    const selection = await this.deps.generateResponse.execute({
      message,
      intent,
      state,
      riskTier: risk.tier,
      content: risk.content,
      product,
      buyer
    });

    const decision = await this.deps.gate.decide({
      buyerId: buyer.id,
      message,
      analysis,
      candidate: selection.text
    });

    return {
      analysis,
      response: selection.text,
      responseSource: selection.source,
      decision,
      persisted
    };
  }

  private async bestEffort<T>(operation: string, buyerId: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      log.error({ err: error, operation, buyerId }, "Persistence failed, continuing with in-memory state");
      return null;
    }
  }
}

function freshConversation(buyerId: string, productId: string, now: Date): Conversation {
  return {
    id: buyerId,
    buyerId,
    productId,
    state: "Initial",
    messageCount: 0,
    fraudScore: 0,
    requiresAttention: false,
    lastActivityAt: now,
    createdAt: now,
    updatedAt: now
  };
}
