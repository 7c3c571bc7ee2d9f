import dotenv from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { initDatabase, closeDatabase } from './storage/db.js';
import { createStripe, StripeClient } from './integrations/stripe/client.js';
import { SendGridClient } from './integrations/sendgrid/client.js';
import { JobWorker } from './services/jobWorker.js';
import { ReconcileScheduler } from './services/reconcileScheduler.js';
import { createNotificationHandlers } from './services/notifications.js';

dotenv.config();

const config = loadConfig();

initDatabase(config.databasePath);

const stripe = createStripe({ secretKey: config.stripe.secretKey, timeoutMs: config.stripe.timeoutMs });
const gateway = new StripeClient(stripe, {
  successUrl: config.stripe.successUrl,
  cancelUrl: config.stripe.cancelUrl,
});

const fastify = await buildApp({ config, gateway, stripe });

if (!config.authJwtSecret) {
  fastify.log.warn('AUTH_JWT_SECRET is not set, every authenticated request will be rejected');
}
if (!config.stripe.webhookSecret) {
  fastify.log.warn('STRIPE_WEBHOOK_SECRET is not set, payment webhooks will be rejected');
}

const mailer = new SendGridClient(
  {
    apiKey: config.email.sendgridApiKey,
    fromEmail: config.email.fromEmail,
    enabled: config.email.enabled,
  },
  fastify.log
);

const jobWorker = new JobWorker(
  createNotificationHandlers({
    mailer,
    templates: config.email.templates,
    adminEmail: config.email.adminEmail,
    log: fastify.log,
  }),
  config.jobs,
  fastify.log
);

const reconcileScheduler = new ReconcileScheduler(fastify.orderService, config.orders.reconcileCron, fastify.log);

const gracefulShutdown = async (signal: string) => {
  fastify.log.info(`Received ${signal}, closing server...`);

  jobWorker.stop();
  reconcileScheduler.stop();

  try {
    await fastify.close();
    closeDatabase();
    fastify.log.info('Server closed successfully');
    process.exit(0);
  } catch (error) {
    fastify.log.error({ err: error }, 'Error during shutdown');
    closeDatabase();
    process.exit(1);
  }
};

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

try {
  await fastify.listen({ host: config.host, port: config.port });
  jobWorker.start();
  reconcileScheduler.start();
} catch (error) {
  fastify.log.error({ err: error }, 'Failed to start server');
  process.exit(1);
}
