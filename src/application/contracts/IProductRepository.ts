import { ProductInfo } from "../../domain/entities/ProductInfo";

export interface IProductRepository {
  findById(id: string): Promise<ProductInfo | null>;
  save(product: ProductInfo): Promise<void>;
}
