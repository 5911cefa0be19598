#!/usr/bin/env npx tsx

/**
 * Stripe Product & Price Setup Script
 *
 * Creates one product with a one-time price per credit pack in
 * config/billing.json. Checkout sessions use inline price data, so this is
 * only needed for dashboards and reporting. Safe to re-run: packs that
 * already have a product (matched on metadata.pack_id) are skipped.
 *
 * Usage:
 *   STRIPE_SECRET_KEY=sk_test_xxx npx tsx scripts/stripe-setup.ts
 */

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import Stripe from 'stripe';
import { billingCatalogSchema, type CreditPack } from '../src/billing/types';

const BILLING_FILE = fileURLToPath(new URL('../config/billing.json', import.meta.url));

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
  const secretKey = process.env.STRIPE_SECRET_KEY;
  if (!secretKey) {
    console.error('❌ STRIPE_SECRET_KEY environment variable is required');
    console.log('\nUsage:');
    console.log('  STRIPE_SECRET_KEY=sk_test_xxx npx tsx scripts/stripe-setup.ts');
    process.exit(1);
  }

  const isTestMode = secretKey.startsWith('sk_test_');
  console.log(`\n🔑 Using ${isTestMode ? 'TEST' : 'LIVE'} mode\n`);
  if (!isTestMode) {
    console.log('⚠️  WARNING: You are using a LIVE key!');
    console.log('   This will create real products in your Stripe account.\n');
  }

  const catalog = billingCatalogSchema.parse(JSON.parse(readFileSync(BILLING_FILE, 'utf8')));
  const stripe = new Stripe(secretKey);
  const existing = await existingPackIds(stripe);

  for (const pack of catalog.credit_packs) {
    if (existing.has(pack.id)) {
      console.log(`   • ${pack.id}: already exists, skipping`);
      continue;
    }
    const { product, price } = await createPack(stripe, pack);
    console.log(`   ✓ ${pack.id}: product ${product.id}, price ${price.id}`);
  }

  const publicUrl = process.env.PUBLIC_APP_URL ?? 'http://localhost:3000';
  console.log('\n' + '='.repeat(60));
  console.log('✅ Setup complete!\n');
  console.log('📌 Next steps:');
  console.log('   1. Set up a webhook endpoint in the Stripe Dashboard');
  console.log(`   2. Point it to: ${publicUrl}/webhooks/stripe`);
  console.log('   3. Subscribe to these events:');
  console.log('      - checkout.session.completed');
  console.log('      - payment_intent.succeeded');
  console.log('   4. Save the webhook signing secret to your .env:\n');
  console.log('      STRIPE_WEBHOOK_SECRET=whsec_xxx');
  console.log('');
}

// =============================================================================
// API FUNCTIONS
// =============================================================================

async function existingPackIds(stripe: Stripe): Promise<Set<string>> {
  const ids = new Set<string>();
  for await (const product of stripe.products.list({ active: true, limit: 100 })) {
    const packId = product.metadata.pack_id;
    if (packId) ids.add(packId);
  }
  return ids;
}

async function createPack(stripe: Stripe, pack: CreditPack): Promise<{ product: Stripe.Product; price: Stripe.Price }> {
  const product = await stripe.products.create({
    name: pack.name,
    description: `${pack.credits} prompt credits`,
    metadata: {
      pack_id: pack.id,
      credits: String(pack.credits),
    },
  });

  const price = await stripe.prices.create({
    product: product.id,
    currency: pack.currency,
    unit_amount: pack.price_cents,
    metadata: {
      pack_id: pack.id,
      credits: String(pack.credits),
    },
  });

  return { product, price };
}

// =============================================================================
// RUN
// =============================================================================

main().catch((error: unknown) => {
  console.error('❌ Setup failed:', error);
  process.exit(1);
});
