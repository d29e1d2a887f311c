export interface BuyerProfile {
  id: string;
  username?: string;
  /** Number of reviews the buyer has received on the marketplace. */
  rating: number;
  purchaseCount: number;
  distanceKm: number;
  lastActivity: Date;
  verified: boolean;
  hasPhoto: boolean;
}
