import { ContentSignalDetector } from "../src/domain/services/ContentSignalDetector";
import { INTENT_PRIORITY, IntentClassifier } from "../src/domain/services/IntentClassifier";
import { normalizeText } from "../src/domain/services/textMatching";

describe("IntentClassifier", () => {
  const classifier = new IntentClassifier();

  it("should evaluate intents in a fixed, fraud-first order", () => {
    expect(INTENT_PRIORITY).toEqual([
      "Fraud",
      "DirectPurchase",
      "Negotiation",
      "Price",
      "Location",
      "Payment",
      "Shipping",
      "ProductCondition",
      "Greeting",
      "Availability",
      "Information"
    ]);
    expect(classifier.rules.map((r) => r.intent)).toEqual(INTENT_PRIORITY);
  });

  it.each([
    ["Hola! Está disponible?", "Greeting"],
    ["Dame tu whatsapp, te pago por western union", "Fraud"],
    ["Lo quiero, te pago 200€", "DirectPurchase"],
    ["¿Me haces descuento? Te doy 150€", "Negotiation"],
    ["¿Cuánto cuesta?", "Price"],
    ["¿Dónde lo puedo recoger?", "Location"],
    ["¿Aceptas bizum?", "Payment"],
    ["¿Haces envíos a Madrid?", "Shipping"],
    ["¿Funciona bien?", "ProductCondition"],
    ["¿Sigue disponible?", "Availability"],
    ["¿Tienes más fotos?", "Information"],
    ["asdfgh", "Unknown"]
  ])("classifies %j as %s", (message, intent) => {
    expect(classifier.classify(message)).toBe(intent);
  });

  it("should return Unknown for empty or whitespace-only input", () => {
    expect(classifier.classify("")).toBe("Unknown");
    expect(classifier.classify("   \n\t ")).toBe("Unknown");
  });

  it("should not let a greeting mask a fraud attempt", () => {
    expect(classifier.classify("Hola! mándame tu email y lo hablamos")).toBe("Fraud");
  });

  it("should match phrases on word boundaries only", () => {
    // "hi" inside "chisme" is not a greeting
    expect(classifier.classify("chisme")).toBe("Unknown");
  });
});

describe("ContentSignalDetector", () => {
  const detector = new ContentSignalDetector();

  it("should normalize case, accents and whitespace", () => {
    expect(normalizeText("  Está   DISPONIBLE ")).toBe("esta disponible");
  });

  it("should flag external contact and off-platform payment phrases", () => {
    const result = detector.detect("Dame tu whatsapp, te pago por western union");
    expect(result.signals).toEqual(["externalContact", "offPlatformPayment"]);
    expect(result.groups).toEqual(["externalContact", "paymentRail"]);
    expect(result.phrases).toEqual(["whatsapp", "western union"]);
  });

  it("should flag phone numbers as external contact", () => {
    expect(detector.detect("mi número es 612345678").signals).toEqual(["externalContact"]);
  });

  it("should flag shortened links", () => {
    const result = detector.detect("Paga aquí https://bit.ly/abc123");
    expect(result.signals).toEqual(["suspiciousLink"]);
    expect(result.links).toEqual(["https://bit.ly/abc123"]);
  });

  it("should accept links to allowed platform hosts", () => {
    expect(detector.detect("Mira https://es.wallapop.com/item/123").signals).toEqual([]);
  });

  it("should honour a custom allow-list", () => {
    const custom = new ContentSignalDetector({ allowedLinkHosts: ["example.org"] });
    expect(custom.detect("https://shop.example.org/p/1").signals).toEqual([]);
    expect(custom.detect("https://es.wallapop.com/item/123").signals).toEqual(["suspiciousLink"]);
  });

  it("should treat urgency alone as a non-fraud signal", () => {
    const result = detector.detect("Lo necesito urgente");
    expect(result.signals).toEqual(["urgency"]);
    expect(detector.hasFraudSignal(result)).toBe(false);
  });
});
