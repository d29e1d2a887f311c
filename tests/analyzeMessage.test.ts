import { IConversationRepository } from "../src/application/contracts/IConversationRepository";
import { Conversation } from "../src/domain/entities/Conversation";
import { RegimeConfig } from "../src/domain/policy/RegimePolicy";
import { createEngine } from "../src/container";
import { InMemoryConversationRepository } from "../src/infrastructure/persistence/InMemoryConversationRepository";
import {
  autonomousPolicy,
  establishedBuyer,
  FakeClock,
  newBuyer,
  product,
  RecordingDelivery,
  supervisedPolicy
} from "./helpers/fixtures";

class UnavailableConversationRepository implements IConversationRepository {
  async findOrCreate(): Promise<Conversation> {
    throw new Error("store offline");
  }

  async update(): Promise<Conversation> {
    throw new Error("store offline");
  }

  async findByBuyerId(): Promise<Conversation | null> {
    throw new Error("store offline");
  }

  async findAll(): Promise<Conversation[]> {
    throw new Error("store offline");
  }
}

class SlowConversationRepository extends InMemoryConversationRepository {
  async findOrCreate(buyerId: string, init: { productId?: string; now: Date }): Promise<Conversation> {
    await new Promise((resolve) => setTimeout(resolve, 10));
    return super.findOrCreate(buyerId, init);
  }
}

function setup(policy: RegimeConfig = autonomousPolicy(), conversationRepo?: IConversationRepository) {
  const clock = new FakeClock();
  const delivery = new RecordingDelivery();
  const engine = createEngine({ policy, clock, delivery, conversationRepo, random: () => 0 });
  return { engine, clock, delivery };
}

describe("AnalyzeMessage", () => {
  it("should answer a trusted buyer's greeting straight away", async () => {
    const { engine, delivery } = setup();

    const result = await engine.analyzeMessage.execute({
      buyer: establishedBuyer(),
      product: product(),
      message: "Hola! Está disponible?"
    });

    expect(result.analysis).toEqual({
      intent: "Greeting",
      priorityTier: "medium",
      fraudRisk: 0,
      riskTier: "low",
      state: "Initial",
      requiresHuman: false,
      messageCount: 1,
      signals: []
    });
    expect(result.response).toBe("¡Hola! Sí, el iPhone 12 sigue disponible. ¿Te interesa?");
    expect(result.responseSource).toBe("template");
    expect(result.decision).toEqual({ kind: "dispatched", dispatch: { status: "sent", delaySeconds: 30 } });
    expect(result.persisted).toBe(true);
    expect(delivery.delivered).toEqual([
      { buyerId: "buyer-established", text: "¡Hola! Sí, el iPhone 12 sigue disponible. ¿Te interesa?", delaySeconds: 30 }
    ]);
    expect((await engine.audit.list()).map((e) => e.action)).toEqual([
      "message_analyzed",
      "send_authorized",
      "message_sent"
    ]);
  });

  it("should hold a fraud attempt until a human approves the safe reply", async () => {
    const { engine, delivery } = setup();

    const result = await engine.analyzeMessage.execute({
      buyer: newBuyer(),
      product: product(),
      message: "Dame tu whatsapp, te pago por western union"
    });

    expect(result.analysis).toMatchObject({ intent: "Fraud", fraudRisk: 100, riskTier: "high", requiresHuman: true });
    expect(result.responseSource).toBe("safety");
    expect(result.decision.kind).toBe("pending");
    expect(delivery.delivered).toEqual([]);

    if (result.decision.kind !== "pending") return;
    expect(result.decision.action.payload.candidateResponse).toBe(
      "Prefiero que sigamos hablando por el chat de Wallapop, es más seguro para los dos."
    );

    await engine.gate.approve(result.decision.action.id, "reviewer-1");

    expect(delivery.delivered.map((m) => m.text)).toEqual([
      "Prefiero que sigamos hablando por el chat de Wallapop, es más seguro para los dos."
    ]);
    expect(delivery.delivered[0].actionId).toBe(result.decision.action.id);
  });

  it("should route every reply through a reviewer in the supervised regime", async () => {
    const { engine, delivery } = setup(supervisedPolicy());

    const result = await engine.analyzeMessage.execute({
      buyer: establishedBuyer(),
      product: product(),
      message: "Hola! Está disponible?"
    });

    expect(result.analysis.requiresHuman).toBe(true);
    expect(result.decision.kind).toBe("pending");
    expect(delivery.delivered).toEqual([]);
    expect((await engine.audit.list())[0].compliance).toBe(true);
  });

  it("should give the same analysis for the same message", async () => {
    const { engine } = setup();
    const input = { buyer: establishedBuyer(), product: product(), message: "¿Cuánto cuesta?" };

    const first = await engine.analyzeMessage.execute(input);
    const second = await engine.analyzeMessage.execute(input);

    expect({ ...second.analysis, messageCount: 1 }).toEqual(first.analysis);
    expect(second.analysis.messageCount).toBe(2);
    expect(second.response).toBe(first.response);
  });

  it("should count messages in arrival order for concurrent calls from one buyer", async () => {
    const { engine } = setup();
    const input = { buyer: establishedBuyer(), product: product(), message: "¿Cuánto cuesta?" };

    const results = await Promise.all([engine.analyzeMessage.execute(input), engine.analyzeMessage.execute(input)]);

    expect(results.map((r) => r.analysis.messageCount)).toEqual([1, 2]);
  });

  it("should commit the conversation and flag it on a purchase decision", async () => {
    const { engine } = setup();

    const result = await engine.analyzeMessage.execute({
      buyer: establishedBuyer(),
      product: product(),
      message: "Lo quiero, te pago 200€"
    });

    expect(result.analysis.intent).toBe("DirectPurchase");
    expect(result.analysis.state).toBe("Committed");
    expect(await engine.conversations.summary("buyer-established")).toMatchObject({
      exists: true,
      state: "Committed",
      requiresAttention: true
    });
  });

  it("should keep the highest fraud score until a reviewer resets it", async () => {
    const { engine } = setup();
    const buyer = establishedBuyer();

    const risky = await engine.analyzeMessage.execute({ buyer, product: product(), message: "Dame tu whatsapp" });
    expect(risky.analysis.fraudRisk).toBe(60);

    const calm = await engine.analyzeMessage.execute({ buyer, product: product(), message: "Hola! Está disponible?" });
    expect(calm.analysis.fraudRisk).toBe(0);
    expect(await engine.conversations.summary(buyer.id)).toMatchObject({ fraudScore: 60 });

    const reset = await engine.conversations.resetFraudScore(buyer.id, "reviewer-1");
    expect(reset).toMatchObject({ fraudScore: 0 });
    expect((await engine.audit.list({ action: "fraud_score_reset" }))[0]).toMatchObject({
      actor: "human",
      details: { reviewer: "reviewer-1", previousScore: 60 }
    });
  });

  it("should still analyze and answer when the conversation store is down", async () => {
    const { engine, delivery } = setup(autonomousPolicy(), new UnavailableConversationRepository());

    const result = await engine.analyzeMessage.execute({
      buyer: establishedBuyer(),
      product: product(),
      message: "Hola! Está disponible?"
    });

    expect(result.persisted).toBe(false);
    expect(result.analysis).toMatchObject({ intent: "Greeting", state: "Initial", messageCount: 1 });
    expect(delivery.delivered).toHaveLength(1);
  });

  it("should apply a fraud reset after the analysis already in flight", async () => {
    const { engine } = setup(autonomousPolicy(), new SlowConversationRepository());
    const buyer = establishedBuyer();
    await engine.analyzeMessage.execute({ buyer, product: product(), message: "Dame tu whatsapp" });

    const analysis = engine.analyzeMessage.execute({ buyer, product: product(), message: "¿Cuánto cuesta?" });
    const reset = engine.conversations.resetFraudScore(buyer.id, "reviewer-1");
    await Promise.all([analysis, reset]);

    expect(await engine.conversations.summary(buyer.id)).toMatchObject({ fraudScore: 0, messageCount: 2 });
  });
});
