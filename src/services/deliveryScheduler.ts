import { NotificationConfig } from '../config/notifications';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { DeliveryOrchestrator } from './deliveryOrchestrator';

type JobName = 'deliveryQueue' | 'retryQueue' | 'statusCheck';

/** Periodic sweeps; a job that is still running skips its next tick. */
export class DeliveryScheduler {
  private orchestrator: DeliveryOrchestrator;
  private intervals: NotificationConfig['scheduler'];
  private timers: NodeJS.Timeout[] = [];
  private running = new Set<JobName>();
  private logger = logger.child({ service: 'DeliveryScheduler' });

  constructor(orchestrator: DeliveryOrchestrator, intervals: NotificationConfig['scheduler']) {
    this.orchestrator = orchestrator;
    this.intervals = intervals;
  }

  start(): void {
    if (this.timers.length > 0) {
      return;
    }

    this.schedule('deliveryQueue', this.intervals.deliveryIntervalMs, () => this.orchestrator.processDeliveryQueue());
    this.schedule('retryQueue', this.intervals.retryIntervalMs, () => this.orchestrator.processRetryQueue());
    this.schedule('statusCheck', this.intervals.statusIntervalMs, () => this.orchestrator.checkDeliveryStatuses());

    this.logger.info('Delivery scheduler started', { ...this.intervals });
  }

  stop(): void {
    this.timers.forEach((timer) => clearInterval(timer));
    this.timers = [];
    this.logger.info('Delivery scheduler stopped');
  }

  isRunning(job: JobName): boolean {
    return this.running.has(job);
  }

  async runJob(job: JobName, task: () => Promise<unknown>): Promise<void> {
    if (this.running.has(job)) {
      this.logger.debug('Skipping overlapping run', { job });
      return;
    }

    this.running.add(job);
    try {
      await task();
    } catch (error) {
      this.logger.error('Scheduled job failed', { job, error: errorMessage(error) });
    } finally {
      this.running.delete(job);
    }
  }

  private schedule(job: JobName, intervalMs: number, task: () => Promise<unknown>): void {
    const timer = setInterval(() => {
      void this.runJob(job, task);
    }, intervalMs);
    this.timers.push(timer);
  }
}
