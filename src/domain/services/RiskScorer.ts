import { BuyerProfile } from "../entities/BuyerProfile";
import { Intent, RiskTier } from "../entities/Intent";
import { ContentSignalDetector, ContentSignals } from "./ContentSignalDetector";

export type ProfileSignalName =
  | "newAccount"
  | "unverified"
  | "noPhoto"
  | "longDistance"
  | "lowReputation";

export type RiskSignalName = ProfileSignalName | ContentSignals["signals"][number] | "fraudIntent";

export interface RiskSignal {
  name: RiskSignalName;
  kind: "profile" | "content";
  points: number;
}

export interface RiskThresholds {
  medium: number;
  high: number;
}

export interface RiskScorerOptions {
  longDistanceKm: number;
  lowReputationRating: number;
  /** Buyers at or above all three marks contribute no profile points. */
  established: { rating: number; purchaseCount: number };
  thresholds: RiskThresholds;
}

export interface RiskAssessment {
  score: number;
  tier: RiskTier;
  signals: RiskSignal[];
  content: ContentSignals;
}

export const MAX_RISK_SCORE = 100;

export const DEFAULT_RISK_OPTIONS: RiskScorerOptions = {
  longDistanceKm: 500,
  lowReputationRating: 5,
  established: { rating: 20, purchaseCount: 5 },
  thresholds: { medium: 30, high: 70 }
};

export class RiskScorer {
  private weights: Record<RiskSignalName, number> = {
    newAccount: 20,
    unverified: 15,
    noPhoto: 10,
    longDistance: 15,
    lowReputation: 10,
    externalContact: 40,
    offPlatformPayment: 40,
    suspiciousLink: 40,
    urgency: 15,
    fraudIntent: 20
  };

  constructor(
    private readonly options: RiskScorerOptions = DEFAULT_RISK_OPTIONS,
    private readonly detector: ContentSignalDetector = new ContentSignalDetector()
  ) {}

  assess(message: string, buyer: BuyerProfile, intent: Intent): RiskAssessment {
    const content = this.detector.detect(message);
    const signals = [
      ...this.profileSignals(buyer).map((name): RiskSignal => ({ name, kind: "profile", points: this.weights[name] })),
      ...this.contentSignals(content, intent).map((name): RiskSignal => ({ name, kind: "content", points: this.weights[name] }))
    ];

    // Additive and capped so every point in the score traces back to one named signal.
    const score = Math.min(
      MAX_RISK_SCORE,
      signals.reduce((acc, s) => acc + s.points, 0)
    );

    return { score, tier: this.tierFor(score), signals, content };
  }

  tierFor(score: number): RiskTier {
    if (score >= this.options.thresholds.high) return "high";
    if (score >= this.options.thresholds.medium) return "medium";
    return "low";
  }

  isEstablished(buyer: BuyerProfile): boolean {
    const { established } = this.options;
    return buyer.verified && buyer.rating >= established.rating && buyer.purchaseCount >= established.purchaseCount;
  }

  private profileSignals(buyer: BuyerProfile): ProfileSignalName[] {
    if (this.isEstablished(buyer)) return [];

    const fired: ProfileSignalName[] = [];
    if (buyer.rating <= 0 || buyer.purchaseCount <= 0) fired.push("newAccount");
    if (!buyer.verified) fired.push("unverified");
    if (!buyer.hasPhoto) fired.push("noPhoto");
    if (buyer.distanceKm > this.options.longDistanceKm) fired.push("longDistance");
    if (buyer.rating > 0 && buyer.rating < this.options.lowReputationRating) fired.push("lowReputation");
    return fired;
  }

  private contentSignals(content: ContentSignals, intent: Intent): RiskSignalName[] {
    const fired: RiskSignalName[] = [...content.signals];
    if (intent === "Fraud") fired.push("fraudIntent");
    return fired;
  }
}
