export const INTENTS = [
  "Greeting",
  "Availability",
  "ProductCondition",
  "Price",
  "Negotiation",
  "Shipping",
  "Payment",
  "Location",
  "DirectPurchase",
  "Information",
  "Fraud",
  "Unknown"
] as const;

export type Intent = (typeof INTENTS)[number];

export type PriorityTier = "high" | "medium" | "low";

export type RiskTier = "high" | "medium" | "low";
