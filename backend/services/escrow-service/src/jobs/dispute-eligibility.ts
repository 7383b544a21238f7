/**
 * Dispute Eligibility Job
 *
 * Reports delivered orders whose seller grace window has elapsed, which makes
 * them candidates for a seller-side dispute. The sweep is read-only: it
 * changes no state and only surfaces what it finds.
 */

import { errorMessage } from '../errors';
import type { DeliveredOrder, OrderRepository } from '../models/order.model';
import { logger } from '../utils/logger';

const log = logger.child({ component: 'DisputeEligibilityJob' });

export interface DisputeEligibilityOptions {
  orders: OrderRepository;
  graceSeconds: number;
  batchSize: number;
  now?: () => Date;
}

export interface EligibilityResult {
  eligible: DeliveredOrder[];
  count: number;
  cutoff: Date;
  duration: number;
}

export class DisputeEligibilityScanner {
  private readonly orders: OrderRepository;
  private readonly graceSeconds: number;
  private readonly batchSize: number;
  private readonly now: () => Date;

  constructor(options: DisputeEligibilityOptions) {
    this.orders = options.orders;
    this.graceSeconds = options.graceSeconds;
    this.batchSize = options.batchSize;
    this.now = options.now ?? (() => new Date());
  }

  async scan(): Promise<EligibilityResult> {
    const startTime = Date.now();
    const cutoff = new Date(this.now().getTime() - this.graceSeconds * 1000);

    const eligible = await this.orders.findDeliveredBefore(cutoff, this.batchSize);
    const duration = Date.now() - startTime;

    if (eligible.length > 0) {
      log.info('Orders eligible for seller dispute', {
        count: eligible.length,
        cutoff: cutoff.toISOString(),
        orders: eligible.map((order) => ({ orderId: order.id, listingId: order.blockchainListingId })),
      });
    } else {
      log.debug('No orders past the dispute grace window', { cutoff: cutoff.toISOString(), duration });
    }

    return { eligible, count: eligible.length, cutoff, duration };
  }
}

/**
 * Job runner class for scheduling
 */
export class DisputeEligibilityJobRunner {
  private intervalId: NodeJS.Timeout | null = null;
  private isRunning = false;
  private lastResult: EligibilityResult | null = null;

  constructor(
    private readonly scanner: DisputeEligibilityScanner,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.intervalId) {
      log.warn('Dispute eligibility job already running');
      return;
    }

    log.info('Starting dispute eligibility job scheduler', { intervalMs: this.intervalMs });

    void this.runJob();
    this.intervalId = setInterval(() => {
      void this.runJob();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      log.info('Dispute eligibility job scheduler stopped');
    }
  }

  get running(): boolean {
    return this.intervalId !== null;
  }

  get latest(): EligibilityResult | null {
    return this.lastResult;
  }

  /**
   * One sweep, skipped while the previous one is still in flight.
   */
  async runJob(): Promise<EligibilityResult | null> {
    if (this.isRunning) {
      log.debug('Skipping job run - previous run still in progress');
      return null;
    }

    this.isRunning = true;
    try {
      this.lastResult = await this.scanner.scan();
      return this.lastResult;
    } catch (error) {
      log.error('Dispute eligibility scan failed', { error: errorMessage(error) });
      return null;
    } finally {
      this.isRunning = false;
    }
  }
}
