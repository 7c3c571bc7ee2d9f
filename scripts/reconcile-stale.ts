/**
 * One reconciliation sweep over orders stuck in awaiting_payment, for use
 * from an external scheduler. Pass an order id to force a check of that order.
 */

import dotenv from 'dotenv';
import { pino } from 'pino';
import { loadConfig } from '../src/config/env.js';
import { initDatabase, closeDatabase } from '../src/storage/db.js';
import { createStripe, StripeClient } from '../src/integrations/stripe/client.js';
import { SqliteCatalogStore } from '../src/store/sqlite-catalog-store.js';
import { OrderService } from '../src/services/orderService.js';
import { KeyedMutex } from '../src/utils/keyedMutex.js';

dotenv.config();

async function reconcileStale(): Promise<void> {
  const config = loadConfig();
  const log = pino();

  initDatabase(config.databasePath);

  const orderService = new OrderService({
    catalog: new SqliteCatalogStore(),
    gateway: new StripeClient(createStripe({ secretKey: config.stripe.secretKey, timeoutMs: config.stripe.timeoutMs }), {
      successUrl: config.stripe.successUrl,
      cancelUrl: config.stripe.cancelUrl,
    }),
    cartLocks: new KeyedMutex(),
    log,
    config: config.orders,
  });

  try {
    const orderId = process.argv[2];
    const results = orderId
      ? [await orderService.reconcileStale(orderId, { force: true })]
      : await orderService.reconcileStaleOrders();

    for (const result of results) {
      console.log(`${result.orderId}: ${result.action}${result.orderStatus ? ` (${result.orderStatus})` : ''}`);
    }
    console.log(`✅ Checked ${results.length} order(s)`);
  } finally {
    closeDatabase();
  }
}

reconcileStale().catch((error: unknown) => {
  console.error('❌ Reconciliation failed:', error);
  process.exit(1);
});
