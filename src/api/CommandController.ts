import { ListingDiffEngine, CycleResult } from '../core/ListingDiffEngine';
import { HistoryService } from '../core/HistoryViews';

export interface CommandLimits {
  historyLimit: number;
  summaryPerSource: number;
}

export interface HealthStatus {
  status: 'ok';
  store: string;
  cycleInFlight: boolean;
  lastCycle: Pick<CycleResult, 'status' | 'durationMs' | 'error'> & { newPairs: number } | null;
  uptimeSec: number;
}

/**
 * Commandes texte du bot : /history, /check, /forcecheck
 */
export class CommandController {
  private readonly startedAt = Date.now();

  constructor(
    private readonly engine: ListingDiffEngine,
    private readonly history: HistoryService,
    private readonly storeDescription: string,
    private readonly limits: CommandLimits = { historyLimit: 50, summaryPerSource: 10 }
  ) {}

  async historyCommand(): Promise<string> {
    return this.history.history(this.limits.historyLimit);
  }

  async checkCommand(): Promise<string> {
    return this.history.summary(this.limits.summaryPerSource, { excludeBaseline: true });
  }

  async forceCheckCommand(): Promise<string> {
    const result = await this.engine.checkAll();
    if (result.status === 'failed') {
      return `❌ Check failed: ${result.error ?? 'unknown error'}`;
    }
    return `✅ Check completed (${result.newPairs.length} new)`;
  }

  health(): HealthStatus {
    const last = this.engine.getLastResult();
    return {
      status: 'ok',
      store: this.storeDescription,
      cycleInFlight: this.engine.isRunning(),
      lastCycle: last
        ? { status: last.status, durationMs: last.durationMs, error: last.error, newPairs: last.newPairs.length }
        : null,
      uptimeSec: Math.floor((Date.now() - this.startedAt) / 1000)
    };
  }
}
