import { z } from "zod";
import { AuditEntry } from "./entities/AuditEntry";
import { BuyerProfile } from "./entities/BuyerProfile";
import { Conversation, CONVERSATION_STATES } from "./entities/Conversation";
import { INTENTS } from "./entities/Intent";
import { ProductInfo } from "./entities/ProductInfo";

export const buyerProfileSchema: z.ZodType<BuyerProfile, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  username: z.string().min(1).optional(),
  rating: z.number().min(0),
  purchaseCount: z.number().int().min(0),
  distanceKm: z.number().min(0),
  lastActivity: z.coerce.date(),
  verified: z.boolean(),
  hasPhoto: z.boolean()
});

export const productInfoSchema: z.ZodType<ProductInfo, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  price: z.number().positive(),
  floorPrice: z.number().positive(),
  description: z.string(),
  condition: z.string(),
  category: z.string(),
  shipping: z.boolean(),
  zone: z.string()
}).refine((p) => p.floorPrice <= p.price, { message: "floorPrice cannot exceed price", path: ["floorPrice"] });

export const conversationSchema: z.ZodType<Conversation, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  buyerId: z.string(),
  productId: z.string().optional(),
  state: z.enum(CONVERSATION_STATES),
  messageCount: z.number().int().min(0),
  fraudScore: z.number().min(0).max(100),
  lastIntent: z.enum(INTENTS).optional(),
  requiresAttention: z.boolean(),
  recoveryStage: z.enum(["24h", "48h"]).optional(),
  lastActivityAt: z.coerce.date(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date()
});

export const auditEntrySchema: z.ZodType<AuditEntry, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  action: z.string(),
  buyerId: z.string(),
  actor: z.enum(["automated", "human"]),
  outcome: z.enum([
    "pending",
    "approved",
    "rejected",
    "expired",
    "authorized",
    "sent",
    "deferred",
    "failed",
    "skipped",
    "recorded"
  ]),
  compliance: z.boolean(),
  details: z.record(z.unknown())
});
