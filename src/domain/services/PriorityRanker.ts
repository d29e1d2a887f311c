import { BuyerProfile } from "../entities/BuyerProfile";
import { Intent, PriorityTier } from "../entities/Intent";
import { normalizeText, PhraseMatcher } from "./textMatching";

const IMMEDIATE = new PhraseMatcher(["ahora", "ya", "hoy", "now", "today"]);
const URGENT = new PhraseMatcher(["urgente", "urgent"]);
const LOWBALL = new PhraseMatcher(["10€", "20€", "mitad", "half price"]);

/** Rating above which an "urgent" buyer is trusted enough to jump the queue. */
const URGENT_TRUSTED_RATING = 10;

/**
 * Orders buyers for the seller's attention: ready-to-buy first, throwaway
 * accounts and fraud attempts last.
 */
export class PriorityRanker {
  rank(intent: Intent, buyer: BuyerProfile, message: string): PriorityTier {
    const text = normalizeText(message);

    if (intent === "Fraud") return "low";

    if (intent === "DirectPurchase") return "high";
    if (intent === "Payment" && IMMEDIATE.matches(text)) return "high";
    if (URGENT.matches(text) && buyer.rating > URGENT_TRUSTED_RATING) return "high";

    if (buyer.rating === 0 && buyer.purchaseCount === 0) return "low";
    if (intent === "Negotiation" && LOWBALL.matches(text)) return "low";

    return "medium";
  }
}
