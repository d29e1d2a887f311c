import { z } from "zod";
import intentLexicon from "../lexicon/intents.json";
import { Intent } from "../entities/Intent";
import { ContentSignalDetector } from "./ContentSignalDetector";
import { normalizeText, PhraseMatcher } from "./textMatching";

type LexicalIntent = Exclude<Intent, "Fraud" | "Unknown">;

/**
 * Evaluation order. The first rule that matches wins, so fraud phrasing is
 * never masked by an innocuous "hola" in the same message.
 */
export const INTENT_PRIORITY: readonly Exclude<Intent, "Unknown">[] = [
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
];

const phrases = z.array(z.string().min(1)).min(1);

const lexiconSchema = z.object({
  DirectPurchase: phrases,
  Negotiation: phrases,
  Price: phrases,
  Location: phrases,
  Payment: phrases,
  Shipping: phrases,
  ProductCondition: phrases,
  Greeting: phrases,
  Availability: phrases,
  Information: phrases
}) satisfies z.ZodType<Record<LexicalIntent, string[]>>;

export interface IntentRule {
  intent: Exclude<Intent, "Unknown">;
  matches(normalized: string, raw: string): boolean;
}

export class IntentClassifier {
  readonly rules: readonly IntentRule[];

  constructor(private readonly detector: ContentSignalDetector = new ContentSignalDetector()) {
    const lexicon = lexiconSchema.parse(intentLexicon);

    this.rules = INTENT_PRIORITY.map((intent): IntentRule => {
      if (intent === "Fraud") {
        return {
          intent,
          matches: (_normalized, raw) => this.detector.hasFraudSignal(this.detector.detect(raw))
        };
      }
      const matcher = new PhraseMatcher(lexicon[intent]);
      return { intent, matches: (normalized) => matcher.matches(normalized) };
    });
  }

  classify(message: string): Intent {
    const normalized = normalizeText(message);
    if (normalized.length === 0) return "Unknown";

    const rule = this.rules.find((r) => r.matches(normalized, message));
    return rule ? rule.intent : "Unknown";
  }
}
