import dotenv from "dotenv";

dotenv.config();

function intFrom(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export const env = {
  PORT: parseInt(process.env.PORT || "3000", 10),
  NODE_ENV: process.env.NODE_ENV || "production",
  LOG_LEVEL: process.env.LOG_LEVEL || "info",
  API_KEY: process.env.API_KEY || "",
  REGIME: process.env.REGIME || "autonomous",
  REDIS_URL: process.env.REDIS_URL || "",
  DELIVERY_WEBHOOK_URL: process.env.DELIVERY_WEBHOOK_URL || "",
  REVIEW_WEBHOOK_URL: process.env.REVIEW_WEBHOOK_URL || "",
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || "",
  CLAUDE_API_KEY: process.env.CLAUDE_API_KEY || "",
  GEMINI_API_KEY: process.env.GEMINI_API_KEY || "",
  LLM_DRAFT_TIMEOUT_MS: parseInt(process.env.LLM_DRAFT_TIMEOUT_MS || "8000", 10),
  PLATFORM_NAME: process.env.PLATFORM_NAME || "Wallapop",
  MAINTENANCE_INTERVAL_MS: parseInt(process.env.MAINTENANCE_INTERVAL_MS || "60000", 10),
  MAX_MESSAGES_PER_HOUR: intFrom(process.env.MAX_MESSAGES_PER_HOUR),
  MIN_DELAY_SECONDS: intFrom(process.env.MIN_DELAY_SECONDS),
  PENDING_ACTION_TTL_HOURS: intFrom(process.env.PENDING_ACTION_TTL_HOURS)
};

/** Names of the variables the service can run without, but should not. */
export function validateEnv(): string[] {
  const missing: string[] = [];
  if (!env.API_KEY) missing.push("API_KEY");
  if (!env.OPENAI_API_KEY && !env.CLAUDE_API_KEY && !env.GEMINI_API_KEY) {
    missing.push("OPENAI_API_KEY | CLAUDE_API_KEY | GEMINI_API_KEY");
  }
  return missing;
}
