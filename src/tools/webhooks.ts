import { WebhookIngestor } from '../webhooks/ingestor.js';
import type { WebhookResult } from '../types/index.js';
import type { ReceiveWebhookInput, SetWebhookSecretInput } from './types.js';

export class WebhookTools {
  constructor(private ingestor: WebhookIngestor) {}

  async receiveWebhook(params: ReceiveWebhookInput): Promise<WebhookResult> {
    return this.ingestor.process(params.signature, params.payload);
  }

  async setWebhookSecret(params: SetWebhookSecretInput): Promise<{ configured: boolean }> {
    this.ingestor.setSecret(params.secret);
    return { configured: this.ingestor.hasSecret() };
  }
}
