import { IBuyerRepository } from "../../application/contracts/IBuyerRepository";
import { IProductRepository } from "../../application/contracts/IProductRepository";
import { BuyerProfile } from "../../domain/entities/BuyerProfile";
import { ProductInfo } from "../../domain/entities/ProductInfo";

/** Keeps the latest snapshot per id, as handed over by the scraper. */
class InMemorySnapshotRepository<T extends { id: string }> {
  private items: Map<string, T> = new Map();

  async findById(id: string): Promise<T | null> {
    return this.items.get(id) ?? null;
  }

  async save(item: T): Promise<void> {
    this.items.set(item.id, item);
  }
}

export class InMemoryBuyerRepository extends InMemorySnapshotRepository<BuyerProfile> implements IBuyerRepository {}

export class InMemoryProductRepository extends InMemorySnapshotRepository<ProductInfo> implements IProductRepository {}
