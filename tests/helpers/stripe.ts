/**
 * Stripe Test Helpers
 *
 * Builds Stripe webhook events and signs them with the same scheme
 * stripe.webhooks.constructEvent verifies.
 */

import Stripe from 'stripe';
import { createEventId } from './test-data';
import type { TestContext } from './test-app';

export const TEST_WEBHOOK_SECRET = 'whsec_test';

const stripe = new Stripe('sk_test_stripe');

export interface StripeEventPayload {
  id: string;
  object: 'event';
  type: string;
  api_version: string;
  created: number;
  livemode: boolean;
  pending_webhooks: number;
  request: { id: string | null; idempotency_key: string | null };
  data: { object: Record<string, unknown> };
}

export interface SignedWebhook {
  event: StripeEventPayload;
  payload: string;
  signature: string;
}

// =============================================================================
// EVENT FACTORIES
// =============================================================================

export function createStripeEvent(
  type: string,
  object: Record<string, unknown>,
  id: string = createEventId(),
): StripeEventPayload {
  return {
    id,
    object: 'event',
    type,
    api_version: '2024-06-20',
    created: Math.floor(Date.now() / 1000),
    livemode: false,
    pending_webhooks: 1,
    request: { id: null, idempotency_key: null },
    data: { object },
  };
}

export function checkoutCompletedEvent(
  metadata: Record<string, string>,
  id?: string,
): StripeEventPayload {
  return createStripeEvent(
    'checkout.session.completed',
    {
      id: 'cs_test_session',
      object: 'checkout.session',
      mode: 'payment',
      payment_status: 'paid',
      metadata,
    },
    id,
  );
}

export function paymentIntentSucceededEvent(
  metadata: Record<string, string>,
  id?: string,
): StripeEventPayload {
  return createStripeEvent(
    'payment_intent.succeeded',
    {
      id: 'pi_test_intent',
      object: 'payment_intent',
      amount: 500,
      currency: 'usd',
      status: 'succeeded',
      metadata,
    },
    id,
  );
}

// =============================================================================
// SIGNING
// =============================================================================

export function signWebhook(event: StripeEventPayload, secret: string = TEST_WEBHOOK_SECRET): SignedWebhook {
  const payload = JSON.stringify(event);
  const signature = stripe.webhooks.generateTestHeaderString({ payload, secret });
  return { event, payload, signature };
}

export async function postWebhook(
  ctx: TestContext,
  webhook: SignedWebhook,
  provider = 'stripe',
): Promise<Response> {
  return ctx.app.request(`/webhooks/${provider}`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'stripe-signature': webhook.signature,
    },
    body: webhook.payload,
  });
}
