import cron from 'node-cron';
import type { FastifyBaseLogger } from 'fastify';
import type { OrderService } from './orderService.js';

/**
 * Periodically looks at orders stuck in awaiting_payment.
 */
export class ReconcileScheduler {
  private task: ReturnType<typeof cron.schedule> | null = null;
  private isProcessing = false;

  constructor(
    private orderService: OrderService,
    private cronExpression: string,
    private log: FastifyBaseLogger
  ) {}

  start(): void {
    if (this.task) {
      return;
    }

    this.task = cron.schedule(this.cronExpression, async () => {
      if (this.isProcessing) {
        this.log.info('[reconcile] Previous sweep still running, skipping');
        return;
      }

      this.isProcessing = true;
      try {
        await this.orderService.reconcileStaleOrders();
      } catch (error) {
        this.log.error({ err: error }, '[reconcile] Sweep failed');
      } finally {
        this.isProcessing = false;
      }
    });

    this.log.info({ cron: this.cronExpression }, '[reconcile] Reconciliation scheduler started');
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.log.info('[reconcile] Reconciliation scheduler stopped');
    }
  }
}
