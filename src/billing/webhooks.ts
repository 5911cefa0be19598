/**
 * Payment Webhook Processing
 *
 * Verified payment events become ledger credits, at most once per event id.
 * Replays return the stored result of the first successful processing.
 * Malformed credit events are rejected and NOT recorded as processed, so a
 * corrected redelivery can still succeed.
 *
 * Every delivery attempt is logged to webhook_events regardless of outcome.
 */

import { randomUUID } from 'node:crypto';
import { asc, eq, sql } from 'drizzle-orm';
import { Hono } from 'hono';
import type { DB } from '../db';
import { webhookEvents, type WebhookEventRow } from '../db/schema';
import type { IdempotencyStore } from '../db/idempotency';
import { MalformedWebhookEventError, UnknownWebhookProviderError, describeError } from '../errors';
import type { AppEnv } from '../types';
import type { CreditLedger } from './ledger';
import type { PaymentGateway } from './payments';
import { webhookResultSchema, type PaymentEvent, type WebhookOutcome, type WebhookResult } from './types';

type DeliveryOutcome = WebhookEventRow['outcome'];

// =============================================================================
// PROCESSOR
// =============================================================================

export class WebhookProcessor {
  constructor(
    private readonly db: DB,
    private readonly idempotency: IdempotencyStore,
    private readonly ledger: CreditLedger,
  ) {}

  async handleEvent(provider: string, event: PaymentEvent): Promise<WebhookOutcome> {
    let outcome: WebhookOutcome;
    try {
      const { result, replayed } = await this.idempotency.run(
        `webhook:${provider}`,
        event.eventId,
        { type: event.type },
        webhookResultSchema,
        () => this.process(event),
      );
      outcome = { result, replayed };
    } catch (error) {
      this.recordDelivery(provider, event, 'failed', describeError(error));
      console.error(`[WEBHOOK] ${provider} ${event.type} ${event.eventId} failed: ${describeError(error)}`);
      throw error;
    }

    const delivery: DeliveryOutcome = outcome.replayed
      ? 'replayed'
      : outcome.result.action === 'ignored'
        ? 'ignored'
        : 'processed';
    this.recordDelivery(provider, event, delivery, null);

    if (outcome.replayed) {
      console.log(`[WEBHOOK] ${provider} ${event.eventId} already processed, returning prior result`);
    }
    return outcome;
  }

  /**
   * Delivery log for one event id, oldest first.
   */
  deliveries(eventId: string): WebhookEventRow[] {
    return this.db
      .select()
      .from(webhookEvents)
      .where(eq(webhookEvents.eventId, eventId))
      .orderBy(asc(webhookEvents.receivedAt), sql`rowid`)
      .all();
  }

  private async process(event: PaymentEvent): Promise<WebhookResult> {
    if (!event.grantsCredits) {
      console.log(`[WEBHOOK] Unhandled event type: ${event.type}`);
      return {
        event_id: event.eventId,
        action: 'ignored',
        user_id: null,
        credits: 0,
        transaction_id: null,
        balance_after: null,
      };
    }

    const { userId, creditAmount } = event;
    if (!userId || !creditAmount) {
      const missing: string[] = [];
      if (!userId) missing.push('user_id');
      if (!creditAmount) missing.push('credit_amount');
      throw new MalformedWebhookEventError(event.eventId, missing);
    }

    const { transaction } = await this.ledger.credit(userId, creditAmount, event.eventId, {
      type: 'purchase',
      description: `Payment ${event.type}`,
    });
    console.log(`[WEBHOOK] ${event.type}: credited ${creditAmount} to ${userId}`);

    return {
      event_id: event.eventId,
      action: 'credited',
      user_id: userId,
      credits: creditAmount,
      transaction_id: transaction.transactionId,
      balance_after: transaction.balanceAfter,
    };
  }

  private recordDelivery(
    provider: string,
    event: PaymentEvent,
    outcome: DeliveryOutcome,
    error: string | null,
  ): void {
    this.db
      .insert(webhookEvents)
      .values({
        id: randomUUID(),
        eventId: event.eventId,
        provider,
        type: event.type,
        outcome,
        error,
        receivedAt: new Date().toISOString(),
      })
      .run();
  }
}

// =============================================================================
// ROUTES
// =============================================================================

/**
 * POST /webhooks/:provider
 *
 * The gateway verifies the signature over the raw body before the processor
 * sees anything; verification failures surface as 400.
 */
export function createWebhookRoutes(processor: WebhookProcessor, gateways: PaymentGateway[]) {
  const byProvider = new Map(gateways.map((gateway) => [gateway.provider, gateway]));
  const routes = new Hono<AppEnv>();

  routes.post('/:provider', async (c) => {
    const provider = c.req.param('provider');
    const gateway = byProvider.get(provider);
    if (!gateway) {
      throw new UnknownWebhookProviderError(provider);
    }

    const rawBody = await c.req.text();
    const event = gateway.verify(rawBody, (name) => c.req.header(name));
    const { result, replayed } = await processor.handleEvent(provider, event);

    return c.json({ received: true, replayed, ...result }, 200);
  });

  return routes;
}
