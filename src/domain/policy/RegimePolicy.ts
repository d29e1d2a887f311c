import { z } from "zod";
import { RegimeConfigError } from "../errors";
import { DEFAULT_RISK_OPTIONS, RiskScorerOptions } from "../services/RiskScorer";

export const REGIMES = ["autonomous", "supervised"] as const;
export type Regime = (typeof REGIMES)[number];

/** Hard ceiling for the supervised regime's outbound volume. */
export const SUPERVISED_MAX_MESSAGES_PER_HOUR = 5;

export const regimeConfigSchema = z
  .object({
    regime: z.enum(REGIMES),
    maxMessagesPerHour: z.number().int().positive(),
    maxMessagesPerBuyerPerHour: z.number().int().positive(),
    minDelaySeconds: z.number().nonnegative(),
    maxDelaySeconds: z.number().nonnegative(),
    requireHumanConfirmation: z.boolean(),
    riskThresholds: z.object({
      medium: z.number().int().min(0).max(100),
      high: z.number().int().min(0).max(100)
    }),
    pendingActionTtlHours: z.number().positive(),
    inactivityTimeoutHours: z.number().positive(),
    longDistanceKm: z.number().positive(),
    disclosure: z.string(),
    maxConcurrentAnalyses: z.number().int().positive(),
    allowedLinkHosts: z.array(z.string().min(1)).min(1)
  })
  .superRefine((cfg, ctx) => {
    const issue = (path: string, message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });

    if (cfg.regime === "supervised" && !cfg.requireHumanConfirmation) {
      issue("requireHumanConfirmation", "supervised regime must require human confirmation");
    }
    if (cfg.regime === "autonomous" && cfg.requireHumanConfirmation) {
      issue("requireHumanConfirmation", "autonomous regime cannot require human confirmation for every send");
    }
    if (cfg.regime === "supervised" && cfg.maxMessagesPerHour > SUPERVISED_MAX_MESSAGES_PER_HOUR) {
      issue("maxMessagesPerHour", `supervised regime allows at most ${SUPERVISED_MAX_MESSAGES_PER_HOUR} messages per hour`);
    }
    if (cfg.regime === "supervised" && cfg.disclosure.trim().length === 0) {
      issue("disclosure", "supervised regime requires an automation disclosure");
    }
    if (cfg.riskThresholds.medium >= cfg.riskThresholds.high) {
      issue("riskThresholds", "medium threshold must be below high threshold");
    }
    if (cfg.minDelaySeconds > cfg.maxDelaySeconds) {
      issue("minDelaySeconds", "minDelaySeconds cannot exceed maxDelaySeconds");
    }
  });

export type RegimeConfig = z.infer<typeof regimeConfigSchema>;

export function parseRegimeConfig(raw: unknown): RegimeConfig {
  const result = regimeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new RegimeConfigError(
      result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }
  return result.data;
}

export function riskOptionsFor(config: RegimeConfig): RiskScorerOptions {
  return {
    ...DEFAULT_RISK_OPTIONS,
    longDistanceKm: config.longDistanceKm,
    thresholds: { ...config.riskThresholds }
  };
}

/** Messages sent under a regime that confirms every send are flagged in the audit trail. */
export function isComplianceRegime(config: RegimeConfig): boolean {
  return config.requireHumanConfirmation;
}
