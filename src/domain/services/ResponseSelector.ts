import { z } from "zod";
import responseTemplates from "../templates/responses.json";
import { BuyerProfile } from "../entities/BuyerProfile";
import { ConversationStateName } from "../entities/Conversation";
import { Intent, RiskTier } from "../entities/Intent";
import { ProductInfo } from "../entities/ProductInfo";
import { ContentSignalDetector, ContentSignals } from "./ContentSignalDetector";

const variants = z.array(z.string().min(1)).min(1);

const templateSchema = z.object({
  buckets: z.record(z.string(), z.record(z.string(), variants)),
  safety: z.object({
    externalContact: variants,
    personalData: variants,
    advancePayment: variants,
    links: variants,
    generic: variants
  }),
  recovery: z.object({
    "24h": variants,
    "48h": variants
  })
});

export type TemplateCatalog = z.infer<typeof templateSchema>;
type SafetyFamily = keyof TemplateCatalog["safety"];

export const DEFAULT_TEMPLATES: TemplateCatalog = templateSchema.parse(responseTemplates);

export type ResponseSource = "template" | "safety" | "llm" | "none";

export interface ResponseSelection {
  /** `null` means "send nothing"; callers must not substitute a default reply. */
  text: string | null;
  source: ResponseSource;
}

export interface SelectionInput {
  state: ConversationStateName;
  intent: Intent;
  riskTier: RiskTier;
  product: ProductInfo;
  buyer: BuyerProfile;
  content: ContentSignals;
  /** Candidate text from a language model, used only where no template exists. */
  draft?: string | null;
}

export interface ResponseSelectorOptions {
  templates?: TemplateCatalog;
  platformName?: string;
  random?: () => number;
  detector?: ContentSignalDetector;
}

const WILDCARD = "*";

export class ResponseSelector {
  private readonly templates: TemplateCatalog;
  private readonly platformName: string;
  private readonly random: () => number;
  private readonly detector: ContentSignalDetector;

  constructor(options: ResponseSelectorOptions = {}) {
    this.templates = options.templates ?? DEFAULT_TEMPLATES;
    this.platformName = options.platformName ?? "Wallapop";
    this.random = options.random ?? Math.random;
    this.detector = options.detector ?? new ContentSignalDetector();
  }

  select(input: SelectionInput): ResponseSelection {
    if (input.riskTier === "high" || input.intent === "Fraud") {
      const family = this.safetyFamily(input.content);
      return { text: this.render(this.pick(this.templates.safety[family]), input.product, input.buyer), source: "safety" };
    }

    const bucket = this.bucketFor(input);
    if (bucket) {
      return { text: this.render(this.pick(bucket), input.product, input.buyer), source: "template" };
    }

    const draft = input.draft?.trim();
    if (draft && !this.detector.hasFraudSignal(this.detector.detect(draft))) {
      return { text: draft, source: "llm" };
    }

    return { text: null, source: "none" };
  }

  /** Follow-up for a conversation that went quiet, picked by how long it has been silent. */
  recovery(hoursInactive: number, product: ProductInfo, buyer: BuyerProfile): string | null {
    if (hoursInactive < 24) return null;
    const family = hoursInactive < 48 ? this.templates.recovery["24h"] : this.templates.recovery["48h"];
    return this.render(this.pick(family), product, buyer);
  }

  hasTemplate(intent: Intent, state: ConversationStateName, product: ProductInfo): boolean {
    return this.lookup(this.bucketIntent(intent, product), state) !== undefined;
  }

  private bucketFor(input: SelectionInput): string[] | undefined {
    return this.lookup(this.bucketIntent(input.intent, input.product), input.state);
  }

  private bucketIntent(intent: Intent, product: ProductInfo): string {
    return intent === "Shipping" && !product.shipping ? "ShippingUnavailable" : intent;
  }

  private lookup(intentKey: string, state: ConversationStateName): string[] | undefined {
    const byState = this.templates.buckets[intentKey];
    if (!byState) return undefined;
    // Recovered conversations reuse the negotiation wording.
    const stateKey = state === "Recovered" ? "Negotiating" : state;
    return byState[stateKey] ?? byState[WILDCARD];
  }

  private safetyFamily(content: ContentSignals): SafetyFamily {
    if (content.groups.includes("externalContact")) return "externalContact";
    if (content.groups.includes("paymentCredentials")) return "personalData";
    if (content.groups.includes("advancePayment") || content.groups.includes("paymentRail")) return "advancePayment";
    if (content.signals.includes("suspiciousLink")) return "links";
    return "generic";
  }

  private pick(options: string[]): string {
    const index = Math.min(options.length - 1, Math.floor(this.random() * options.length));
    return options[index];
  }

  private render(template: string, product: ProductInfo, buyer: BuyerProfile): string {
    const replacements: Record<string, string> = {
      "{title}": product.title,
      "{price}": formatAmount(product.price),
      "{floorPrice}": formatAmount(product.floorPrice),
      "{discountedPrice}": formatAmount(discountedPrice(product)),
      "{zone}": product.zone,
      "{condition}": product.condition,
      "{category}": product.category,
      "{platform}": this.platformName
    };

    let text = template.replace(/ ?\{username\}/g, buyer.username ? ` ${buyer.username}` : "");
    for (const [key, value] of Object.entries(replacements)) {
      text = text.split(key).join(value);
    }
    return text;
  }
}

export function discountedPrice(product: ProductInfo): number {
  return Math.max(product.floorPrice, Math.floor(product.price * 0.95));
}

export function formatAmount(amount: number): string {
  return Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
}
