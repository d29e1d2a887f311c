import { ConversationStateName } from "../entities/Conversation";
import { Intent } from "../entities/Intent";

export interface TransitionRule {
  from: readonly ConversationStateName[];
  /** `"any"` matches every intent. */
  on: readonly Intent[] | "any";
  to: ConversationStateName;
}

/** States from which a buyer can still move towards a purchase. */
export const OPEN_STATES: readonly ConversationStateName[] = ["Initial", "Negotiating", "Recovered"];

/**
 * Checked top to bottom; the first matching rule decides the next state.
 * Anything not listed keeps the current state, which is also how Fraud is
 * handled: risk is tracked by the scorer, not by the lifecycle.
 */
export const TRANSITIONS: readonly TransitionRule[] = [
  { from: ["Abandoned"], on: "any", to: "Recovered" },
  { from: OPEN_STATES, on: ["DirectPurchase"], to: "Committed" },
  { from: OPEN_STATES, on: ["Negotiation"], to: "Negotiating" },
  { from: ["Committed"], on: ["Location"], to: "Coordinating" }
];

export class ConversationStateMachine {
  constructor(private readonly rules: readonly TransitionRule[] = TRANSITIONS) {}

  next(current: ConversationStateName, intent: Intent): ConversationStateName {
    const rule = this.rules.find(
      (r) => r.from.includes(current) && (r.on === "any" || r.on.includes(intent))
    );
    return rule ? rule.to : current;
  }

  /** Applied by the inactivity sweep, never by an inbound message. */
  abandon(): ConversationStateName {
    return "Abandoned";
  }

  requiresAttention(state: ConversationStateName): boolean {
    return state === "Committed" || state === "Coordinating";
  }
}
