import { BuyerProfile } from "../../domain/entities/BuyerProfile";

export interface IBuyerRepository {
  findById(id: string): Promise<BuyerProfile | null>;
  save(profile: BuyerProfile): Promise<void>;
}
