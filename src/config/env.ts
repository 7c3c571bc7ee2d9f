export interface AppConfig {
  host: string;
  port: number;
  databasePath: string;
  allowedOrigins: string[];
  authJwtSecret: string;
  authCookieName: string;
  stripe: {
    secretKey: string;
    webhookSecret: string;
    webhookToleranceSeconds: number;
    successUrl: string;
    cancelUrl: string;
    timeoutMs: number;
  };
  currency: string;
  orders: {
    maxPaymentAttempts: number;
    stalePaymentTimeoutMs: number;
    reconcileBackoffMs: number;
    reconcileMaxBackoffMs: number;
    reconcileCron: string;
  };
  jobs: {
    cronExpression: string;
    maxAttempts: number;
    backoffMs: number;
  };
  email: {
    enabled: boolean;
    sendgridApiKey: string;
    fromEmail: string;
    adminEmail: string;
    templates: {
      orderPaid: string;
      orderCancelled: string;
      orderRefunded: string;
      paymentAnomaly: string;
    };
  };
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    host: env.HOST || '127.0.0.1',
    port: intFromEnv(env.PORT, 3001),
    databasePath: env.DATABASE_PATH || './data/db.sqlite',
    // Only these origins may call the API from a browser
    allowedOrigins: env.ALLOWED_ORIGINS
      ? env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
      : ['http://localhost:5173'],
    authJwtSecret: env.AUTH_JWT_SECRET || '',
    authCookieName: env.AUTH_COOKIE_NAME || 'cinema_session',
    stripe: {
      secretKey: env.STRIPE_SECRET_KEY || '',
      webhookSecret: env.STRIPE_WEBHOOK_SECRET || '',
      webhookToleranceSeconds: intFromEnv(env.STRIPE_WEBHOOK_TOLERANCE_SECONDS, 300),
      successUrl: env.PAYMENT_SUCCESS_URL || 'http://localhost:5173/payment/success',
      cancelUrl: env.PAYMENT_CANCEL_URL || 'http://localhost:5173/payment/cancel',
      timeoutMs: intFromEnv(env.PAYMENT_GATEWAY_TIMEOUT_MS, 10000),
    },
    currency: (env.PAYMENT_CURRENCY || 'usd').toLowerCase(),
    orders: {
      maxPaymentAttempts: intFromEnv(env.MAX_PAYMENT_ATTEMPTS, 5),
      stalePaymentTimeoutMs: intFromEnv(env.STALE_PAYMENT_TIMEOUT_MS, 15 * 60 * 1000),
      reconcileBackoffMs: intFromEnv(env.RECONCILE_BACKOFF_MS, 60 * 1000),
      reconcileMaxBackoffMs: intFromEnv(env.RECONCILE_MAX_BACKOFF_MS, 60 * 60 * 1000),
      reconcileCron: env.RECONCILE_CRON || '*/5 * * * *',
    },
    jobs: {
      cronExpression: env.JOBS_CRON || '* * * * *',
      maxAttempts: intFromEnv(env.JOB_MAX_ATTEMPTS, 3),
      backoffMs: intFromEnv(env.JOB_BACKOFF_MS, 5000),
    },
    email: {
      enabled: env.EMAIL_ENABLED === 'true',
      sendgridApiKey: env.SENDGRID_API_KEY || '',
      fromEmail: env.SENDGRID_FROM_EMAIL || 'no-reply@example.com',
      adminEmail: env.ADMIN_EMAIL || '',
      templates: {
        orderPaid: env.SENDGRID_PAYMENT_TEMPLATE_ID || '',
        orderCancelled: env.SENDGRID_CANCELLED_TEMPLATE_ID || '',
        orderRefunded: env.SENDGRID_REFUND_TEMPLATE_ID || '',
        paymentAnomaly: env.SENDGRID_ANOMALY_TEMPLATE_ID || '',
      },
    },
  };
}
