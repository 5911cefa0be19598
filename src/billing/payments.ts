/**
 * Payment Gateways
 *
 * A gateway verifies a provider's signed webhook delivery and turns it into a
 * provider-neutral PaymentEvent. Stripe is the only gateway today; it also
 * creates Checkout sessions for credit packs.
 */

import Stripe from 'stripe';
import { ValidationError, WebhookSignatureError } from '../errors';
import type { CreditPack, PaymentEvent } from './types';

/** Set on payment intents created by our Checkout sessions; the session event credits those */
const CHECKOUT_ORIGIN = 'checkout';

export interface PaymentGateway {
  readonly provider: string;
  /**
   * Verify the signature over the raw body. Throws WebhookSignatureError.
   */
  verify(rawBody: string, header: (name: string) => string | undefined): PaymentEvent;
}

export interface CheckoutSession {
  sessionId: string;
  url: string | null;
}

export interface StripeGatewayOptions {
  webhookSecret: string;
  publicAppUrl: string;
}

export class StripeGateway implements PaymentGateway {
  readonly provider = 'stripe';

  constructor(
    private readonly stripe: Stripe,
    private readonly options: StripeGatewayOptions,
  ) {}

  verify(rawBody: string, header: (name: string) => string | undefined): PaymentEvent {
    const signature = header('stripe-signature');
    if (!signature) {
      throw new WebhookSignatureError('Missing stripe-signature header');
    }

    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(rawBody, signature, this.options.webhookSecret);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      console.error(`[WEBHOOK] Stripe signature verification failed: ${message}`);
      throw new WebhookSignatureError('Webhook signature verification failed');
    }

    return normalizeStripeEvent(event);
  }

  /**
   * Checkout session for a credit pack. The session metadata is what the
   * webhook later reads to credit the account.
   */
  async createCheckout(userId: string, pack: CreditPack): Promise<CheckoutSession> {
    if (userId.length === 0) throw new ValidationError('user id is required for checkout');

    const session = await this.stripe.checkout.sessions.create({
      mode: 'payment',
      client_reference_id: userId,
      line_items: [
        {
          quantity: 1,
          price_data: {
            currency: pack.currency,
            unit_amount: pack.price_cents,
            product_data: { name: pack.name },
          },
        },
      ],
      metadata: {
        user_id: userId,
        credits: String(pack.credits),
        pack_id: pack.id,
      },
      payment_intent_data: {
        metadata: { origin: CHECKOUT_ORIGIN, pack_id: pack.id },
      },
      success_url: `${this.options.publicAppUrl}/billing/success?session_id={CHECKOUT_SESSION_ID}`,
      cancel_url: `${this.options.publicAppUrl}/billing/cancel`,
    });

    console.log(`[BILLING] Checkout session ${session.id} for ${userId} (${pack.id})`);
    return { sessionId: session.id, url: session.url };
  }
}

// =============================================================================
// NORMALIZATION
// =============================================================================

/**
 * Only checkout.session.completed and payment_intent.succeeded carry a credit
 * purchase; every other type is passed on as non-crediting.
 */
export function normalizeStripeEvent(event: Stripe.Event): PaymentEvent {
  switch (event.type) {
    case 'checkout.session.completed':
      return fromMetadata(event.id, event.type, event.data.object.metadata);
    case 'payment_intent.succeeded': {
      const metadata = event.data.object.metadata;
      if (metadata.origin === CHECKOUT_ORIGIN) {
        return { eventId: event.id, type: event.type, grantsCredits: false };
      }
      return fromMetadata(event.id, event.type, metadata);
    }
    default:
      return { eventId: event.id, type: event.type, grantsCredits: false };
  }
}

function fromMetadata(eventId: string, type: string, metadata: Stripe.Metadata | null): PaymentEvent {
  return {
    eventId,
    type,
    grantsCredits: true,
    userId: nonEmpty(metadata?.user_id),
    creditAmount: parseCredits(metadata?.credits),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function parseCredits(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value.trim())) return undefined;
  const credits = Number.parseInt(value.trim(), 10);
  return Number.isSafeInteger(credits) && credits > 0 ? credits : undefined;
}
