import { createEngine } from "../src/container";
import { InMemoryConversationRepository } from "../src/infrastructure/persistence/InMemoryConversationRepository";
import {
  InMemoryBuyerRepository,
  InMemoryProductRepository
} from "../src/infrastructure/persistence/InMemorySnapshotRepository";
import { RECOVERY_MAX_MESSAGES } from "../src/application/use-cases/SweepInactiveConversations";
import { DeliveryResult, OutboundMessage } from "../src/application/contracts/IDeliveryChannel";
import { autonomousPolicy, establishedBuyer, FakeClock, HOUR_MS, product, RecordingDelivery, T0 } from "./helpers/fixtures";

/** Runs `onDeliver` once, after the next delivery, while the sender is still waiting on it. */
class HookedDelivery extends RecordingDelivery {
  onDeliver: (() => Promise<unknown>) | null = null;

  async deliver(message: OutboundMessage): Promise<DeliveryResult> {
    const result = await super.deliver(message);
    const hook = this.onDeliver;
    this.onDeliver = null;
    if (hook) await hook();
    return result;
  }
}

function setup() {
  const clock = new FakeClock();
  const delivery = new RecordingDelivery();
  const conversationRepo = new InMemoryConversationRepository();
  const buyerRepo = new InMemoryBuyerRepository();
  const productRepo = new InMemoryProductRepository();
  const engine = createEngine({
    policy: autonomousPolicy(),
    clock,
    delivery,
    conversationRepo,
    buyerRepo,
    productRepo,
    random: () => 0
  });
  return { engine, clock, delivery, conversationRepo, buyerRepo, productRepo };
}

const at = (hours: number) => new Date(T0.getTime() + hours * HOUR_MS);

describe("SweepInactiveConversations", () => {
  it("should leave recently active conversations alone", async () => {
    const { engine, clock } = setup();
    await engine.analyzeMessage.execute({ buyer: establishedBuyer(), product: product(), message: "Hola! Está disponible?" });

    clock.advance(23 * HOUR_MS);
    expect(await engine.sweepInactive.execute()).toEqual({ abandoned: [], recoveries: [] });
  });

  it("should abandon a silent conversation and follow up once per stage", async () => {
    const { engine, clock, delivery } = setup();
    await engine.analyzeMessage.execute({ buyer: establishedBuyer(), product: product(), message: "Hola! Está disponible?" });

    clock.advance(25 * HOUR_MS);
    expect(await engine.sweepInactive.execute()).toEqual({
      abandoned: ["buyer-established"],
      recoveries: [{ buyerId: "buyer-established", stage: "24h", decision: "dispatched" }]
    });
    expect(delivery.delivered[1].text).toBe("¡Hola! ¿Sigues interesado en el iPhone 12? Aún está disponible.");

    clock.advance(HOUR_MS);
    expect(await engine.sweepInactive.execute()).toEqual({ abandoned: [], recoveries: [] });

    clock.advance(23 * HOUR_MS);
    expect(await engine.sweepInactive.execute()).toEqual({
      abandoned: [],
      recoveries: [{ buyerId: "buyer-established", stage: "48h", decision: "dispatched" }]
    });
    expect(delivery.delivered[2].text).toBe(
      "¡Hola! El iPhone 12 sigue disponible, si te interesa puedo dejártelo en 285€."
    );
    clock.advance(23 * HOUR_MS);
    expect(await engine.sweepInactive.execute()).toEqual({ abandoned: [], recoveries: [] });
    expect(delivery.delivered).toHaveLength(3);
  });

  it("should not chase long conversations", async () => {
    const { engine, conversationRepo, buyerRepo, productRepo, delivery } = setup();
    await buyerRepo.save(establishedBuyer());
    await productRepo.save(product());
    await conversationRepo.findOrCreate("buyer-established", { productId: "product-1", now: T0 });
    await conversationRepo.update("buyer-established", { messageCount: RECOVERY_MAX_MESSAGES });

    expect(await engine.sweepInactive.execute(at(25))).toEqual({ abandoned: ["buyer-established"], recoveries: [] });
    expect(delivery.delivered).toEqual([]);
  });

  it("should skip the follow-up when the product snapshot is missing", async () => {
    const { engine, conversationRepo, buyerRepo } = setup();
    await buyerRepo.save(establishedBuyer());
    await conversationRepo.findOrCreate("buyer-established", { productId: "product-gone", now: T0 });

    expect(await engine.sweepInactive.execute(at(25))).toEqual({ abandoned: ["buyer-established"], recoveries: [] });
  });

  it("should recover the conversation when the buyer writes again", async () => {
    const { engine, clock } = setup();
    const buyer = establishedBuyer();
    await engine.analyzeMessage.execute({ buyer, product: product(), message: "Hola! Está disponible?" });
    clock.advance(25 * HOUR_MS);
    await engine.sweepInactive.execute();

    clock.advance(HOUR_MS);
    const result = await engine.analyzeMessage.execute({ buyer, product: product(), message: "¿Cuánto cuesta?" });

    expect(result.analysis.state).toBe("Recovered");
    expect(result.response).toBe("Lo mínimo que puedo dejarlo es 285€.");
    expect(await engine.conversations.summary(buyer.id)).toMatchObject({ state: "Recovered", messageCount: 2 });
  });

  it("should not abandon a buyer who writes while the sweep is running", async () => {
    const clock = new FakeClock();
    const delivery = new HookedDelivery();
    const engine = createEngine({ policy: autonomousPolicy(), clock, delivery, random: () => 0 });
    const quiet = establishedBuyer();
    const returning = establishedBuyer({ id: "buyer-returning" });
    await engine.analyzeMessage.execute({ buyer: quiet, product: product(), message: "Hola! Está disponible?" });
    await engine.analyzeMessage.execute({ buyer: returning, product: product(), message: "Hola! Está disponible?" });

    clock.advance(25 * HOUR_MS);
    delivery.onDeliver = () =>
      engine.analyzeMessage.execute({ buyer: returning, product: product(), message: "Lo quiero, te pago 200€" });
    const result = await engine.sweepInactive.execute();

    expect(result).toEqual({
      abandoned: ["buyer-established"],
      recoveries: [{ buyerId: "buyer-established", stage: "24h", decision: "dispatched" }]
    });
    expect(await engine.conversations.summary("buyer-returning")).toMatchObject({
      state: "Committed",
      messageCount: 2
    });
  });
});
