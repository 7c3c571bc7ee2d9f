import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import { ZodError } from 'zod';
import type Stripe from 'stripe';
import { registerRoutes } from './routes/index.js';
import type { AppConfig } from './config/env.js';
import { AppError, ForbiddenError } from './errors.js';
import type { CatalogStore } from './store/catalog-store.js';
import { SqliteCatalogStore } from './store/sqlite-catalog-store.js';
import type { PaymentGateway } from './integrations/payment-gateway.js';
import { createStripe } from './integrations/stripe/client.js';
import { CartService } from './services/cartService.js';
import { OrderService } from './services/orderService.js';
import { KeyedMutex } from './utils/keyedMutex.js';

declare module 'fastify' {
  interface FastifyInstance {
    catalog: CatalogStore;
    cartService: CartService;
    orderService: OrderService;
    stripe: Stripe;
    authJwtSecret: string;
    authCookieName: string;
    stripeWebhookSecret: string;
    stripeWebhookToleranceSeconds: number;
  }
}

export interface BuildAppOptions {
  config: AppConfig;
  gateway: PaymentGateway;
  /** SDK instance used to verify webhooks; built from the config when omitted. */
  stripe?: Stripe;
  catalog?: CatalogStore;
  logger?: boolean;
  now?: () => Date;
}

/**
 * Builds the Fastify instance with services and routes. The database must
 * already be initialised.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({
    logger: options.logger ?? true,
    trustProxy: true,
  });

  const catalog = options.catalog ?? new SqliteCatalogStore();
  const cartLocks = new KeyedMutex();

  fastify.decorate('catalog', catalog);
  fastify.decorate('cartService', new CartService(catalog, cartLocks, fastify.log, config.currency));
  fastify.decorate(
    'orderService',
    new OrderService({
      catalog,
      gateway: options.gateway,
      cartLocks,
      log: fastify.log,
      config: config.orders,
      now: options.now,
    })
  );
  fastify.decorate(
    'stripe',
    options.stripe ?? createStripe({ secretKey: config.stripe.secretKey, timeoutMs: config.stripe.timeoutMs })
  );
  fastify.decorate('authJwtSecret', config.authJwtSecret);
  fastify.decorate('authCookieName', config.authCookieName);
  fastify.decorate('stripeWebhookSecret', config.stripe.webhookSecret);
  fastify.decorate('stripeWebhookToleranceSeconds', config.stripe.webhookToleranceSeconds);

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      } else {
        request.log.warn({ code: error.code, statusCode: error.statusCode }, error.message);
      }
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        ...(error.details !== undefined ? { details: error.details } : {}),
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: error.errors,
      });
    }

    if (error.validation) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: error.validation,
      });
    }

    const statusCode = error.statusCode || 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    return reply.status(statusCode).send({
      error: statusCode >= 500 ? 'Internal Server Error' : error.message,
      statusCode,
    });
  });

  await fastify.register(cookie);

  await fastify.register(cors, {
    origin: (origin, callback) => {
      // Server-to-server calls (payment webhooks, health checks) carry no Origin
      if (!origin || config.allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new ForbiddenError('Origin not allowed by CORS'), false);
      }
    },
    credentials: true,
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  await registerRoutes(fastify);

  return fastify;
}
