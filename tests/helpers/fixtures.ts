import { IClock } from "../../src/application/contracts/IClock";
import { DeliveryResult, IDeliveryChannel, OutboundMessage } from "../../src/application/contracts/IDeliveryChannel";
import { INotificationChannel } from "../../src/application/contracts/INotificationChannel";
import { BuyerProfile } from "../../src/domain/entities/BuyerProfile";
import { PendingAction } from "../../src/domain/entities/PendingAction";
import { ProductInfo } from "../../src/domain/entities/ProductInfo";
import { parseRegimeConfig, RegimeConfig } from "../../src/domain/policy/RegimePolicy";
import autonomous from "../../src/config/regimes/autonomous.json";
import supervised from "../../src/config/regimes/supervised.json";

export const T0 = new Date("2024-05-01T10:00:00.000Z");
export const HOUR_MS = 60 * 60 * 1000;

export class FakeClock implements IClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class RecordingDelivery implements IDeliveryChannel {
  readonly delivered: OutboundMessage[] = [];
  failWith: string | null = null;

  async deliver(message: OutboundMessage): Promise<DeliveryResult> {
    if (this.failWith) return { ok: false, error: this.failWith };
    this.delivered.push(message);
    return { ok: true };
  }
}

export class RecordingNotifier implements INotificationChannel {
  readonly notified: PendingAction[] = [];
  fail = false;

  async humanDecisionRequired(action: PendingAction): Promise<void> {
    if (this.fail) throw new Error("webhook down");
    this.notified.push(action);
  }
}

export function autonomousPolicy(overrides: Partial<RegimeConfig> = {}): RegimeConfig {
  return parseRegimeConfig({ ...autonomous, ...overrides });
}

export function supervisedPolicy(overrides: Partial<RegimeConfig> = {}): RegimeConfig {
  return parseRegimeConfig({ ...supervised, ...overrides });
}

export function establishedBuyer(overrides: Partial<BuyerProfile> = {}): BuyerProfile {
  return {
    id: "buyer-established",
    rating: 25,
    purchaseCount: 10,
    distanceKm: 5.2,
    lastActivity: T0,
    verified: true,
    hasPhoto: true,
    ...overrides
  };
}

export function newBuyer(overrides: Partial<BuyerProfile> = {}): BuyerProfile {
  return {
    id: "buyer-new",
    rating: 0,
    purchaseCount: 0,
    distanceKm: 1200,
    lastActivity: T0,
    verified: false,
    hasPhoto: false,
    ...overrides
  };
}

export function product(overrides: Partial<ProductInfo> = {}): ProductInfo {
  return {
    id: "product-1",
    title: "iPhone 12",
    price: 300,
    floorPrice: 250,
    description: "128GB, batería al 89%",
    condition: "como nuevo",
    category: "Móviles",
    shipping: true,
    zone: "Madrid Centro",
    ...overrides
  };
}

export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
