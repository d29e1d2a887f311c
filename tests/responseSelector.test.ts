import { ContentSignalDetector } from "../src/domain/services/ContentSignalDetector";
import { discountedPrice, formatAmount, ResponseSelector, SelectionInput } from "../src/domain/services/ResponseSelector";
import { establishedBuyer, product } from "./helpers/fixtures";

describe("ResponseSelector", () => {
  const detector = new ContentSignalDetector();
  const selector = new ResponseSelector({ random: () => 0, detector });

  function input(overrides: Partial<SelectionInput> & { message?: string } = {}): SelectionInput {
    const { message = "", ...rest } = overrides;
    return {
      state: "Initial",
      intent: "Greeting",
      riskTier: "low",
      product: product(),
      buyer: establishedBuyer(),
      content: detector.detect(message),
      ...rest
    };
  }

  it("should confirm availability when greeted", () => {
    expect(selector.select(input())).toEqual({
      text: "¡Hola! Sí, el iPhone 12 sigue disponible. ¿Te interesa?",
      source: "template"
    });
  });

  it("should address the buyer by name when known", () => {
    const result = selector.select(input({ buyer: establishedBuyer({ username: "Ana" }) }));
    expect(result.text).toBe("¡Hola Ana! Sí, el iPhone 12 sigue disponible. ¿Te interesa?");
  });

  it("should fall back to the wildcard state bucket", () => {
    expect(selector.select(input({ intent: "Price" })).text).toBe("El precio es 300€.");
  });

  it("should offer the discounted price while negotiating and after recovery", () => {
    expect(selector.select(input({ intent: "Price", state: "Negotiating" })).text).toBe(
      "Lo mínimo que puedo dejarlo es 285€."
    );
    expect(selector.select(input({ intent: "Price", state: "Recovered" })).text).toBe(
      "Lo mínimo que puedo dejarlo es 285€."
    );
  });

  it("should pick the variant from the random source", () => {
    const last = new ResponseSelector({ random: () => 0.99, detector });
    expect(last.select(input({ intent: "Price" })).text).toBe("Está en 300€, el precio es el del anuncio.");
  });

  it("should answer shipping questions according to the product", () => {
    expect(selector.select(input({ intent: "Shipping" })).text).toBe(
      "Sí, hago envíos a través de Wallapop. El envío corre de tu cuenta."
    );
    expect(selector.select(input({ intent: "Shipping", product: product({ shipping: false }) })).text).toBe(
      "Lo siento, solo entrego en mano por la zona de Madrid Centro."
    );
  });

  it("should use the configured platform name", () => {
    const custom = new ResponseSelector({ random: () => 0, detector, platformName: "Vinted" });
    expect(custom.select(input({ intent: "Payment" })).text).toBe(
      "Acepto el pago a través de Vinted o en efectivo en mano."
    );
  });

  describe("safety family", () => {
    it("should answer external contact requests", () => {
      const result = selector.select(input({ intent: "Fraud", riskTier: "high", message: "Dame tu whatsapp" }));
      expect(result).toEqual({
        text: "Prefiero que sigamos hablando por el chat de Wallapop, es más seguro para los dos.",
        source: "safety"
      });
    });

    it("should answer requests for card or identity data", () => {
      const result = selector.select(input({ intent: "Fraud", riskTier: "medium", message: "necesito verificar tu tarjeta" }));
      expect(result.text).toBe(
        "No comparto datos personales ni de tarjetas. Podemos hacerlo todo con el pago seguro de Wallapop."
      );
    });

    it("should answer advance-payment scripts", () => {
      const result = selector.select(
        input({ intent: "Fraud", riskTier: "high", message: "te pago por adelantado y lo recoge mi transportista" })
      );
      expect(result.text).toBe(
        "El pago se hace a través de Wallapop o en mano en la entrega, no acepto pagos por adelantado ni transportistas externos."
      );
    });

    it("should answer suspicious links", () => {
      const result = selector.select(input({ intent: "Fraud", riskTier: "high", message: "paga aquí https://bit.ly/abc123" }));
      expect(result.text).toBe("No abro enlaces externos. Si quieres comprarlo, usa el botón de compra de Wallapop.");
    });

    it("should override a normal bucket when the tier is high", () => {
      const result = selector.select(input({ intent: "Price", riskTier: "high" }));
      expect(result).toEqual({
        text: "Lo siento, así no me parece seguro. Si te interesa, cerramos la compra por Wallapop.",
        source: "safety"
      });
    });
  });

  describe("no template", () => {
    it("should return an explicit null when nothing applies", () => {
      expect(selector.select(input({ intent: "Information" }))).toEqual({ text: null, source: "none" });
      expect(selector.select(input({ intent: "Unknown" }))).toEqual({ text: null, source: "none" });
    });

    it("should use a clean language-model draft", () => {
      expect(selector.select(input({ intent: "Information", draft: "  Mide 15 cm de alto. " }))).toEqual({
        text: "Mide 15 cm de alto.",
        source: "llm"
      });
    });

    it("should discard a draft that itself looks like fraud", () => {
      expect(selector.select(input({ intent: "Information", draft: "Escríbeme por whatsapp" }))).toEqual({
        text: null,
        source: "none"
      });
    });

    it("should report which intents have templates", () => {
      expect(selector.hasTemplate("Greeting", "Initial", product())).toBe(true);
      expect(selector.hasTemplate("Information", "Initial", product())).toBe(false);
    });
  });

  describe("recovery", () => {
    it("should follow up after a day and offer a discount after two", () => {
      expect(selector.recovery(10, product(), establishedBuyer())).toBeNull();
      expect(selector.recovery(30, product(), establishedBuyer())).toBe(
        "¡Hola! ¿Sigues interesado en el iPhone 12? Aún está disponible."
      );
      expect(selector.recovery(50, product(), establishedBuyer())).toBe(
        "¡Hola! El iPhone 12 sigue disponible, si te interesa puedo dejártelo en 285€."
      );
    });
  });

  it("should never discount below the floor price", () => {
    expect(discountedPrice(product({ price: 100, floorPrice: 99 }))).toBe(99);
    expect(discountedPrice(product({ price: 300, floorPrice: 250 }))).toBe(285);
  });

  it("should format amounts without trailing decimals for whole numbers", () => {
    expect(formatAmount(285)).toBe("285");
    expect(formatAmount(12.5)).toBe("12.50");
  });
});
