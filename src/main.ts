import { env, validateEnv } from "./config/env";
import { RegimeManager } from "./config/RegimeManager";
import { createEngine, EngineOptions } from "./container";
import { buildServer } from "./http/server";
import { ILLMProvider } from "./application/contracts/ILLMProvider";
import { logger } from "./infrastructure/logging/logger";

// Infrastructure
import { DryRunDeliveryChannel, WebhookDeliveryChannel } from "./infrastructure/delivery/WebhookDeliveryChannel";
import { LogReviewNotifier, WebhookReviewNotifier } from "./infrastructure/notifications/ReviewNotifier";
import { ClaudeAdapter } from "./infrastructure/llm/ClaudeAdapter";
import { GeminiAdapter } from "./infrastructure/llm/GeminiAdapter";
import { LLMRouter } from "./infrastructure/llm/LLMRouter";
import { OpenAIAdapter } from "./infrastructure/llm/OpenAIAdapter";
import { createRedis } from "./infrastructure/persistence/redisClient";
import { RedisAuditRepository } from "./infrastructure/persistence/RedisAuditRepository";
import { RedisConversationRepository } from "./infrastructure/persistence/RedisConversationRepository";
import { RedisBuyerRepository, RedisProductRepository } from "./infrastructure/persistence/RedisSnapshotRepository";
import { MaintenanceScheduler } from "./infrastructure/scheduling/MaintenanceScheduler";

function buildLLMRouter(): ILLMProvider | undefined {
  // Priority: Claude -> OpenAI -> Gemini, whichever keys are configured.
  const providers: ILLMProvider[] = [];
  if (env.CLAUDE_API_KEY) providers.push(new ClaudeAdapter(env.CLAUDE_API_KEY));
  if (env.OPENAI_API_KEY) providers.push(new OpenAIAdapter(env.OPENAI_API_KEY));
  if (env.GEMINI_API_KEY) providers.push(new GeminiAdapter(env.GEMINI_API_KEY));
  return providers.length > 0 ? new LLMRouter(providers) : undefined;
}

async function bootstrap() {
  try {
    const missing = validateEnv();
    if (missing.length > 0) {
      logger.warn({ missing }, "Missing environment variables");
    }

    const policy = new RegimeManager().resolve(env.REGIME, {
      maxMessagesPerHour: env.MAX_MESSAGES_PER_HOUR,
      minDelaySeconds: env.MIN_DELAY_SECONDS,
      pendingActionTtlHours: env.PENDING_ACTION_TTL_HOURS
    });

    const options: EngineOptions = {
      policy,
      delivery: env.DELIVERY_WEBHOOK_URL ? new WebhookDeliveryChannel(env.DELIVERY_WEBHOOK_URL) : new DryRunDeliveryChannel(),
      notifier: env.REVIEW_WEBHOOK_URL ? new WebhookReviewNotifier(env.REVIEW_WEBHOOK_URL) : new LogReviewNotifier(),
      llmProvider: buildLLMRouter(),
      llmDraftTimeoutMs: env.LLM_DRAFT_TIMEOUT_MS,
      platformName: env.PLATFORM_NAME
    };

    const redis = createRedis(env.REDIS_URL);
    if (redis) {
      options.conversationRepo = new RedisConversationRepository(redis);
      options.auditRepo = new RedisAuditRepository(redis);
      options.buyerRepo = new RedisBuyerRepository(redis);
      options.productRepo = new RedisProductRepository(redis);
    }

    const engine = createEngine(options);

    const scheduler = new MaintenanceScheduler(
      [
        { name: "expire-pending-actions", run: async () => engine.gate.sweepExpired() },
        { name: "retry-deferred-messages", run: () => engine.dispatcher.retryDeferred() },
        { name: "sweep-inactive-conversations", run: () => engine.sweepInactive.execute() }
      ],
      env.MAINTENANCE_INTERVAL_MS
    );

    const app = await buildServer(engine, { apiKey: env.API_KEY });
    app.addHook("onClose", async () => {
      scheduler.stop();
      if (redis) await redis.quit();
    });

    await app.listen({ port: env.PORT, host: "0.0.0.0" });
    scheduler.start();
    logger.info({ port: env.PORT, regime: policy.regime }, "Marketplace responder running");

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err }, "Shutdown failed");
            process.exit(1);
          }
        );
      });
    }
  } catch (err) {
    logger.fatal({ err }, "Startup failed");
    process.exit(1);
  }
}

void bootstrap();
