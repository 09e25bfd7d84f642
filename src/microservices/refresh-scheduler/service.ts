import { logger } from '../../logger.js';
import { config } from '../../config.js';
import { describeError, isMailboxError } from '../../errors.js';
import { resolveMailboxSettings } from '../../connectors/imap/imapConnector.js';
import type { MailboxTransport } from '../../connectors/types.js';
import { ServiceRefreshService } from '../../pipeline/refreshServices.js';
import type { AppDb } from '../../storage/db.js';

export interface SchedulerOptions {
  intervalSec: number;
  scanLimit: number;
}

export type CycleOutcome = 'ok' | 'problem' | 'skipped';

export class RefreshScheduler {
  private isRunning = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly db: AppDb,
    private readonly transport: MailboxTransport,
    private readonly options: SchedulerOptions,
  ) {}

  stop(): void {
    this.isRunning = false;
    this.wake?.();
  }

  async runForever(): Promise<void> {
    this.isRunning = true;
    logger.info({ options: this.options }, 'Refresh scheduler started');

    while (this.isRunning) {
      const cycleStart = Date.now();

      try {
        await this.runCycle();
      } catch (error) {
        logger.error({ err: error }, 'Refresh cycle failed');
      }

      const elapsed = Date.now() - cycleStart;
      const delay = Math.max(0, this.options.intervalSec * 1000 - elapsed);
      if (delay > 0 && this.isRunning) {
        await this.pause(delay);
      }
    }

    logger.info('Refresh scheduler stopped');
  }

  private async pause(ms: number): Promise<void> {
    await new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
    this.wake = null;
  }

  /**
   * One refresh of every configured service. Mailbox failures are recorded
   * as a connection problem and the previous results stay in place.
   */
  async runCycle(): Promise<CycleOutcome> {
    const services = this.db.listServices();
    if (!services.length) {
      logger.info('No services configured; skipping refresh');
      return 'skipped';
    }

    const settings = resolveMailboxSettings(this.db.getMailbox());
    const refresher = new ServiceRefreshService(this.transport, { scanLimit: this.options.scanLimit });

    try {
      const results = await refresher.refresh(settings, services);
      this.db.replaceRefreshSnapshot(new Date().toISOString(), results);
      logger.info({ services: services.length }, 'Refresh cycle completed');
      return 'ok';
    } catch (error) {
      if (!isMailboxError(error)) {
        throw error;
      }
      this.db.markConnectionProblem(error.kind, describeError(error), new Date().toISOString());
      logger.warn({ kind: error.kind, err: describeError(error) }, 'Mailbox unavailable; keeping previous results');
      return 'problem';
    }
  }
}

export function defaultSchedulerOptions(): SchedulerOptions {
  return {
    intervalSec: config.refreshIntervalSec,
    scanLimit: config.refreshScanLimit,
  };
}
