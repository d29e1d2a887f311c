import fetch from "node-fetch";
import { DeliveryResult, IDeliveryChannel, OutboundMessage } from "../../application/contracts/IDeliveryChannel";
import { componentLogger } from "../logging/logger";

const log = componentLogger("WebhookDeliveryChannel");

/**
 * Posts approved replies to the browser-automation worker, which types them
 * into the marketplace chat after `delaySeconds`.
 */
export class WebhookDeliveryChannel implements IDeliveryChannel {
  private webhookUrl: string;

  constructor(webhookUrl: string) {
    this.webhookUrl = webhookUrl.replace(/\/$/, "");
  }

  async deliver(message: OutboundMessage): Promise<DeliveryResult> {
    const response = await fetch(`${this.webhookUrl}/messages`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(message)
    });

    if (!response.ok) {
      return { ok: false, error: `Delivery worker responded ${response.status} ${response.statusText}` };
    }
    log.debug({ buyerId: message.buyerId, delaySeconds: message.delaySeconds }, "Message handed to delivery worker");
    return { ok: true };
  }
}

/** Used when no delivery worker is configured: every send is logged instead. */
export class DryRunDeliveryChannel implements IDeliveryChannel {
  async deliver(message: OutboundMessage): Promise<DeliveryResult> {
    log.info({ buyerId: message.buyerId, delaySeconds: message.delaySeconds, text: message.text }, "Dry-run delivery");
    return { ok: true };
  }
}
