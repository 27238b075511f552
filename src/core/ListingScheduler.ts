import { CycleResult, ListingDiffEngine } from './ListingDiffEngine';
import { StructuredLogger, logger as rootLogger } from './StructuredLogger';
import { toError } from './errors';

/**
 * Déclenchement périodique des cycles. Le chevauchement est géré par le
 * guard du moteur : un tick pendant un cycle lent est coalescé.
 */
export class ListingScheduler {
  private timer: NodeJS.Timeout | null = null;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly engine: ListingDiffEngine,
    private readonly intervalMs: number,
    logger: StructuredLogger = rootLogger
  ) {
    this.logger = logger.child('scheduler');
  }

  start(): void {
    if (this.timer) {
      this.logger.warn('⚠️ Scheduler already running');
      return;
    }

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);

    this.logger.info(`🔄 Polling every ${this.intervalMs / 1000}s`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('🛑 Scheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  async runNow(): Promise<CycleResult> {
    return this.engine.checkAll();
  }

  private async tick(): Promise<void> {
    try {
      await this.engine.checkAll();
    } catch (error) {
      this.logger.error('❌ Scheduled cycle failed', toError(error));
    }
  }
}
