import { IAuditRepository } from "./application/contracts/IAuditRepository";
import { IBuyerRepository } from "./application/contracts/IBuyerRepository";
import { IClock, systemClock } from "./application/contracts/IClock";
import { IConversationRepository } from "./application/contracts/IConversationRepository";
import { IDeliveryChannel } from "./application/contracts/IDeliveryChannel";
import { ILLMProvider } from "./application/contracts/ILLMProvider";
import { INotificationChannel } from "./application/contracts/INotificationChannel";
import { IProductRepository } from "./application/contracts/IProductRepository";
import { ActionGate } from "./application/services/ActionGate";
import { AuditTrail } from "./application/services/AuditTrail";
import { ConversationLanes } from "./application/services/ConversationLanes";
import { OutboundDispatcher } from "./application/services/OutboundDispatcher";
import { PendingActionQueue } from "./application/services/PendingActionQueue";
import { RateLimiter } from "./application/services/RateLimiter";
import { AnalyzeMessage } from "./application/use-cases/AnalyzeMessage";
import { GenerateResponse } from "./application/use-cases/GenerateResponse";
import { ManageConversation } from "./application/use-cases/ManageConversation";
import { SweepInactiveConversations } from "./application/use-cases/SweepInactiveConversations";
import { isComplianceRegime, RegimeConfig, riskOptionsFor } from "./domain/policy/RegimePolicy";
import { ContentSignalDetector } from "./domain/services/ContentSignalDetector";
import { ConversationStateMachine } from "./domain/services/ConversationStateMachine";
import { IntentClassifier } from "./domain/services/IntentClassifier";
import { PriorityRanker } from "./domain/services/PriorityRanker";
import { ResponseSelector } from "./domain/services/ResponseSelector";
import { RiskScorer } from "./domain/services/RiskScorer";
import { DryRunDeliveryChannel } from "./infrastructure/delivery/WebhookDeliveryChannel";
import { InMemoryAuditRepository } from "./infrastructure/persistence/InMemoryAuditRepository";
import { InMemoryConversationRepository } from "./infrastructure/persistence/InMemoryConversationRepository";
import { InMemoryBuyerRepository, InMemoryProductRepository } from "./infrastructure/persistence/InMemorySnapshotRepository";

export interface EngineOptions {
  policy: RegimeConfig;
  conversationRepo?: IConversationRepository;
  auditRepo?: IAuditRepository;
  buyerRepo?: IBuyerRepository;
  productRepo?: IProductRepository;
  delivery?: IDeliveryChannel;
  notifier?: INotificationChannel;
  llmProvider?: ILLMProvider;
  llmDraftTimeoutMs?: number;
  platformName?: string;
  clock?: IClock;
  random?: () => number;
}

export interface Engine {
  policy: RegimeConfig;
  analyzeMessage: AnalyzeMessage;
  sweepInactive: SweepInactiveConversations;
  conversations: ManageConversation;
  gate: ActionGate;
  queue: PendingActionQueue;
  dispatcher: OutboundDispatcher;
  audit: AuditTrail;
}

/** Wires one engine instance; every piece of mutable state is owned here, nothing is global. */
export function createEngine(options: EngineOptions): Engine {
  const { policy } = options;
  const clock = options.clock ?? systemClock;
  const random = options.random ?? Math.random;

  const conversationRepo = options.conversationRepo ?? new InMemoryConversationRepository();
  const buyerRepo = options.buyerRepo ?? new InMemoryBuyerRepository();
  const productRepo = options.productRepo ?? new InMemoryProductRepository();
  const audit = new AuditTrail(options.auditRepo ?? new InMemoryAuditRepository(), isComplianceRegime(policy), clock);

  const detector = new ContentSignalDetector({ allowedLinkHosts: policy.allowedLinkHosts });
  const riskScorer = new RiskScorer(riskOptionsFor(policy), detector);
  const stateMachine = new ConversationStateMachine();
  const selector = new ResponseSelector({ platformName: options.platformName, random, detector });

  const queue = new PendingActionQueue(audit, policy.pendingActionTtlHours, clock);
  const limiter = new RateLimiter({
    maxMessagesPerHour: policy.maxMessagesPerHour,
    maxMessagesPerBuyerPerHour: policy.maxMessagesPerBuyerPerHour,
    minDelaySeconds: policy.minDelaySeconds
  });
  const dispatcher = new OutboundDispatcher(
    limiter,
    options.delivery ?? new DryRunDeliveryChannel(),
    audit,
    { minDelaySeconds: policy.minDelaySeconds, maxDelaySeconds: policy.maxDelaySeconds },
    clock,
    random
  );
  const gate = new ActionGate(policy, queue, dispatcher, audit, options.notifier);
  const lanes = new ConversationLanes(policy.maxConcurrentAnalyses);

  const analyzeMessage = new AnalyzeMessage({
    policy,
    conversationRepo,
    buyerRepo,
    productRepo,
    classifier: new IntentClassifier(detector),
    riskScorer,
    priorityRanker: new PriorityRanker(),
    stateMachine,
    generateResponse: new GenerateResponse(selector, options.llmProvider, options.llmDraftTimeoutMs),
    gate,
    audit,
    lanes,
    clock
  });

  const sweepInactive = new SweepInactiveConversations(
    policy,
    conversationRepo,
    buyerRepo,
    productRepo,
    stateMachine,
    selector,
    riskScorer,
    gate,
    audit,
    lanes,
    clock
  );

  return {
    policy,
    analyzeMessage,
    sweepInactive,
    conversations: new ManageConversation(conversationRepo, audit, lanes, clock),
    gate,
    queue,
    dispatcher,
    audit
  };
}
