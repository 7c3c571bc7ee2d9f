import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { Mailer } from '../integrations/sendgrid/client.js';
import { JOB_TYPES, type JobType } from '../types/jobs.js';
import type { JobHandler } from './jobWorker.js';

const orderNotificationSchema = z.object({
  orderId: z.string(),
  userId: z.string(),
  email: z.string().nullable(),
  totalAmount: z.number().int(),
  currency: z.string(),
  titles: z.array(z.string()),
});

const paymentAnomalySchema = z.object({
  orderId: z.string(),
  attemptId: z.string(),
  gatewayReference: z.string().nullable(),
  reason: z.string(),
});

export interface NotificationTemplates {
  orderPaid: string;
  orderCancelled: string;
  orderRefunded: string;
  paymentAnomaly: string;
}

export interface NotificationDeps {
  mailer: Mailer;
  templates: NotificationTemplates;
  adminEmail: string;
  log: FastifyBaseLogger;
}

/** 999 and 'usd' -> '9.99 USD' */
export function formatAmount(amount: number, currency: string): string {
  return `${(amount / 100).toFixed(2)} ${currency.toUpperCase()}`;
}

export function createNotificationHandlers(deps: NotificationDeps): Record<JobType, JobHandler> {
  const { mailer, templates, adminEmail, log } = deps;

  const orderMail = (templateId: string): JobHandler => async (raw, job) => {
    const payload = orderNotificationSchema.parse(raw);
    if (!payload.email) {
      log.warn({ orderId: payload.orderId, jobType: job.job_type }, '[mail] Order has no e-mail address, skipping');
      return;
    }

    await mailer.sendTemplate({
      to: payload.email,
      templateId,
      data: {
        orderId: payload.orderId,
        total: formatAmount(payload.totalAmount, payload.currency),
        titles: payload.titles,
      },
    });
  };

  return {
    [JOB_TYPES.orderPaid]: orderMail(templates.orderPaid),
    [JOB_TYPES.orderCancelled]: orderMail(templates.orderCancelled),
    [JOB_TYPES.orderRefunded]: orderMail(templates.orderRefunded),
    [JOB_TYPES.paymentAnomaly]: async (raw) => {
      const payload = paymentAnomalySchema.parse(raw);
      if (!adminEmail) {
        log.warn({ orderId: payload.orderId }, '[mail] ADMIN_EMAIL is not set, anomaly report not sent');
        return;
      }

      await mailer.sendTemplate({
        to: adminEmail,
        templateId: templates.paymentAnomaly,
        data: payload,
      });
    },
  };
}
