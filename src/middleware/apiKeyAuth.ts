import { timingSafeEqual } from "crypto";
import { FastifyReply, FastifyRequest } from "fastify";

function sameKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** preHandler hook rejecting requests without the configured `x-api-key` header. */
export function apiKeyAuth(apiKey: string) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const providedKey = request.headers["x-api-key"];

    if (!apiKey || typeof providedKey !== "string" || !sameKey(providedKey, apiKey)) {
      return reply.status(401).send({ error: "Unauthorized" });
    }
  };
}
