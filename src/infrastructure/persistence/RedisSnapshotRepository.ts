import Redis from "ioredis";
import { z } from "zod";
import { IBuyerRepository } from "../../application/contracts/IBuyerRepository";
import { IProductRepository } from "../../application/contracts/IProductRepository";
import { BuyerProfile } from "../../domain/entities/BuyerProfile";
import { ProductInfo } from "../../domain/entities/ProductInfo";
import { buyerProfileSchema, productInfoSchema } from "../../domain/schemas";
import { redisKeys } from "./redisClient";

class RedisSnapshotRepository<T extends { id: string }> {
  constructor(
    private redis: Redis,
    private keyFor: (id: string) => string,
    private schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  async findById(id: string): Promise<T | null> {
    const raw = await this.redis.get(this.keyFor(id));
    return raw ? this.schema.parse(JSON.parse(raw)) : null;
  }

  async save(item: T): Promise<void> {
    await this.redis.set(this.keyFor(item.id), JSON.stringify(item));
  }
}

export class RedisBuyerRepository extends RedisSnapshotRepository<BuyerProfile> implements IBuyerRepository {
  constructor(redis: Redis) {
    super(redis, redisKeys.buyer, buyerProfileSchema);
  }
}

export class RedisProductRepository extends RedisSnapshotRepository<ProductInfo> implements IProductRepository {
  constructor(redis: Redis) {
    super(redis, redisKeys.product, productInfoSchema);
  }
}
