import Fastify, { FastifyError } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { z, ZodError } from "zod";
import { Engine } from "../container";
import { GateDecision } from "../application/services/ActionGate";
import { PendingAction } from "../domain/entities/PendingAction";
import {
  ConversationNotFoundError,
  PendingActionClosedError,
  PendingActionNotFoundError,
  RegimeConfigError
} from "../domain/errors";
import { buyerProfileSchema, productInfoSchema } from "../domain/schemas";
import { logger } from "../infrastructure/logging/logger";
import { apiKeyAuth } from "../middleware/apiKeyAuth";

export interface ServerOptions {
  apiKey: string;
  /** Requests per minute per client. */
  requestsPerMinute?: number;
}

const messageBody = z.object({
  buyer: buyerProfileSchema,
  product: productInfoSchema,
  message: z.string().max(4000)
});

const idParams = z.object({ id: z.string().min(1) });
const buyerParams = z.object({ buyerId: z.string().min(1) });
const approveBody = z.object({ reviewer: z.string().min(1), text: z.string().min(1).optional() });
const rejectBody = z.object({ reviewer: z.string().min(1), reason: z.string().optional() });
const resetBody = z.object({ reviewer: z.string().min(1) });

const pendingQuery = z.object({
  outcome: z.enum(["pending", "approved", "rejected", "expired"]).default("pending"),
  buyerId: z.string().optional()
});

const auditQuery = z.object({
  buyerId: z.string().optional(),
  action: z.string().optional(),
  limit: z.coerce.number().int().positive().max(1000).default(100)
});

function describeDecision(decision: GateDecision) {
  switch (decision.kind) {
    case "pending":
      return { kind: decision.kind, actionId: decision.action.id, expiresAt: decision.action.expiresAt.toISOString() };
    case "dispatched":
      return { kind: decision.kind, dispatch: decision.dispatch };
    case "none":
      return { kind: decision.kind };
  }
}

function describeAction(action: PendingAction) {
  return {
    id: action.id,
    type: action.type,
    buyerId: action.buyerId,
    outcome: action.outcome,
    createdAt: action.createdAt.toISOString(),
    expiresAt: action.expiresAt.toISOString(),
    resolvedAt: action.resolvedAt?.toISOString(),
    resolvedBy: action.resolvedBy,
    payload: action.payload
  };
}

function statusFor(error: Error): number {
  if (error instanceof ZodError || error instanceof RegimeConfigError) return 400;
  if (error instanceof PendingActionNotFoundError || error instanceof ConversationNotFoundError) return 404;
  if (error instanceof PendingActionClosedError) return 409;
  return 500;
}

export async function buildServer(engine: Engine, options: ServerOptions) {
  const app = Fastify({ logger });

  await app.register(cors);
  await app.register(rateLimit, {
    max: options.requestsPerMinute ?? 100,
    timeWindow: "1 minute"
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const status = statusFor(error);
    if (status !== 500) {
      const details = error instanceof ZodError ? error.issues : undefined;
      return reply.status(status).send({ error: error.name, message: error.message, details });
    }
    if (error.statusCode && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }
    request.log.error({ err: error }, "Unhandled request error");
    return reply.status(500).send({ error: "Internal Server Error" });
  });

  app.get("/health", async () => ({
    status: "ok",
    regime: engine.policy.regime,
    pendingActions: engine.queue.active().length,
    deferredMessages: engine.dispatcher.pendingDeferred().length
  }));

  await app.register(async (secured) => {
    secured.addHook("preHandler", apiKeyAuth(options.apiKey));

    secured.post("/messages", async (request) => {
      const body = messageBody.parse(request.body);
      const result = await engine.analyzeMessage.execute(body);
      return {
        analysis: result.analysis,
        response: result.response,
        responseSource: result.responseSource,
        decision: describeDecision(result.decision),
        persisted: result.persisted
      };
    });

    secured.get("/conversations/:buyerId", async (request) => {
      const { buyerId } = buyerParams.parse(request.params);
      return engine.conversations.summary(buyerId);
    });

    secured.post("/conversations/:buyerId/reset-fraud", async (request) => {
      const { buyerId } = buyerParams.parse(request.params);
      const { reviewer } = resetBody.parse(request.body);
      return engine.conversations.resetFraudScore(buyerId, reviewer);
    });

    secured.get("/pending-actions", async (request) => {
      const filter = pendingQuery.parse(request.query);
      return { actions: engine.queue.list(filter).map(describeAction) };
    });

    secured.post("/pending-actions/:id/approve", async (request) => {
      const { id } = idParams.parse(request.params);
      const { reviewer, text } = approveBody.parse(request.body);
      const result = await engine.gate.approve(id, reviewer, text);
      return { action: describeAction(result.action), dispatch: result.dispatch ?? null };
    });

    secured.post("/pending-actions/:id/reject", async (request) => {
      const { id } = idParams.parse(request.params);
      const { reviewer, reason } = rejectBody.parse(request.body);
      const result = await engine.gate.reject(id, reviewer, reason);
      return { action: describeAction(result.action) };
    });

    secured.get("/audit", async (request) => {
      const query = auditQuery.parse(request.query);
      return { entries: await engine.audit.list(query) };
    });
  });

  return app;
}
