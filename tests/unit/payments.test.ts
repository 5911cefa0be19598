/**
 * Unit Tests: Stripe Gateway
 *
 * Signature verification, event normalization and Checkout sessions.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StripeGateway } from '../../src/billing/payments';
import { WebhookSignatureError } from '../../src/errors';
import type { CreditPack } from '../../src/billing/types';
import { capturedRequests } from '../mocks/handlers';
import { createStripeClient } from '../helpers/test-app';
import {
  TEST_WEBHOOK_SECRET,
  checkoutCompletedEvent,
  createStripeEvent,
  paymentIntentSucceededEvent,
  signWebhook,
  type SignedWebhook,
} from '../helpers/stripe';

const gateway = new StripeGateway(createStripeClient(), {
  webhookSecret: TEST_WEBHOOK_SECRET,
  publicAppUrl: 'http://localhost:3000',
});

function verify(webhook: SignedWebhook) {
  return gateway.verify(webhook.payload, (name) => (name === 'stripe-signature' ? webhook.signature : undefined));
}

describe('StripeGateway', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('verify', () => {
    it('turns a completed checkout into a credit grant', () => {
      const event = checkoutCompletedEvent({ user_id: 'user_1', credits: '500', pack_id: 'pack_500' }, 'evt_1');

      expect(verify(signWebhook(event))).toEqual({
        eventId: 'evt_1',
        type: 'checkout.session.completed',
        grantsCredits: true,
        userId: 'user_1',
        creditAmount: 500,
      });
    });

    it('leaves out metadata that is missing or not a positive integer', () => {
      const event = checkoutCompletedEvent({ user_id: '  ', credits: '12.5' }, 'evt_2');

      expect(verify(signWebhook(event))).toEqual({
        eventId: 'evt_2',
        type: 'checkout.session.completed',
        grantsCredits: true,
        userId: undefined,
        creditAmount: undefined,
      });
    });

    it('leaves out credit amounts beyond the safe integer range', () => {
      const event = checkoutCompletedEvent({ user_id: 'user_1', credits: '9007199254740993' }, 'evt_big');

      expect(verify(signWebhook(event))).toMatchObject({ userId: 'user_1', creditAmount: undefined });
    });

    it('credits direct payment intents', () => {
      const event = paymentIntentSucceededEvent({ user_id: 'user_1', credits: '100' }, 'evt_3');
      expect(verify(signWebhook(event))).toMatchObject({ grantsCredits: true, userId: 'user_1', creditAmount: 100 });
    });

    it('ignores payment intents created by our Checkout sessions', () => {
      const event = paymentIntentSucceededEvent({ origin: 'checkout', pack_id: 'pack_100' }, 'evt_4');
      expect(verify(signWebhook(event))).toEqual({
        eventId: 'evt_4',
        type: 'payment_intent.succeeded',
        grantsCredits: false,
      });
    });

    it('ignores event types that carry no purchase', () => {
      const event = createStripeEvent('customer.created', { id: 'cus_1', object: 'customer' }, 'evt_5');
      expect(verify(signWebhook(event))).toEqual({ eventId: 'evt_5', type: 'customer.created', grantsCredits: false });
    });

    it('rejects a signature made with another secret', () => {
      const webhook = signWebhook(checkoutCompletedEvent({ user_id: 'u', credits: '1' }), 'whsec_other');
      expect(() => verify(webhook)).toThrow(WebhookSignatureError);
    });

    it('rejects a tampered payload', () => {
      const webhook = signWebhook(checkoutCompletedEvent({ user_id: 'u', credits: '1' }));
      expect(() => verify({ ...webhook, payload: webhook.payload.replace('"1"', '"1000"') })).toThrow(
        'Webhook signature verification failed',
      );
    });

    it('rejects a missing signature header', () => {
      const webhook = signWebhook(checkoutCompletedEvent({ user_id: 'u', credits: '1' }));
      expect(() => gateway.verify(webhook.payload, () => undefined)).toThrow('Missing stripe-signature header');
    });
  });

  describe('createCheckout', () => {
    const pack: CreditPack = {
      id: 'pack_500',
      name: '500 credits',
      credits: 500,
      price_cents: 2000,
      currency: 'usd',
    };

    it('creates a payment session carrying the credit metadata', async () => {
      const session = await gateway.createCheckout('user_1', pack);

      expect(session).toEqual({
        sessionId: 'cs_test_session',
        url: 'https://checkout.stripe.com/c/pay/cs_test_session',
      });

      const form = new URLSearchParams(await capturedRequests.stripe[0].text());
      expect(form.get('mode')).toBe('payment');
      expect(form.get('client_reference_id')).toBe('user_1');
      expect(form.get('metadata[user_id]')).toBe('user_1');
      expect(form.get('metadata[credits]')).toBe('500');
      expect(form.get('metadata[pack_id]')).toBe('pack_500');
      expect(form.get('payment_intent_data[metadata][origin]')).toBe('checkout');
      expect(form.get('line_items[0][price_data][unit_amount]')).toBe('2000');
      expect(form.get('success_url')).toBe(
        'http://localhost:3000/billing/success?session_id={CHECKOUT_SESSION_ID}',
      );
    });
  });
});
