export interface OutboundMessage {
  buyerId: string;
  text: string;
  /** Seconds the sender should wait before typing the message out. */
  delaySeconds: number;
  actionId?: string;
}

export type DeliveryResult = { ok: true } | { ok: false; error: string };

export interface IDeliveryChannel {
  deliver(message: OutboundMessage): Promise<DeliveryResult>;
}
