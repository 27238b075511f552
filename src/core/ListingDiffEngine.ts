import { SnapshotProvider } from '../exchanges/ExchangeManager';
import { SourceId } from '../exchanges/types';
import { Observation, PairKey, pairKey } from '../store/RecordBackend';
import { RecordStore } from '../store/RecordStore';
import { Notifier } from '../notify/Notifier';
import { normalizeSymbol } from './SymbolNormalizer';
import { CycleGuard } from './CycleGuard';
import { StructuredLogger, logger as rootLogger } from './StructuredLogger';
import { toError } from './errors';

export interface CycleResult {
  status: 'completed' | 'failed';
  newPairs: Observation[];
  lines: string[];
  durationMs: number;
  error?: string;
}

export function formatListingLine(source: SourceId, symbol: string): string {
  return `[${source}] new listing: ${normalizeSymbol(symbol)}`;
}

/**
 * Cycle de détection : snapshot → diff contre les paires connues → ajout
 * immédiat de chaque nouvelle paire → un seul message pour le cycle.
 */
export class ListingDiffEngine {
  private readonly guard = new CycleGuard<CycleResult>();
  private readonly logger: StructuredLogger;
  private lastResult: CycleResult | null = null;

  constructor(
    private readonly exchanges: SnapshotProvider,
    private readonly store: RecordStore,
    private readonly notifier: Notifier,
    logger: StructuredLogger = rootLogger
  ) {
    this.logger = logger.child('diff');
  }

  /**
   * Déclenché par le timer ou à la demande ; un appel pendant un cycle
   * en cours reçoit le résultat de ce cycle.
   */
  async checkAll(): Promise<CycleResult> {
    return this.guard.run(() => this.runCycle());
  }

  isRunning(): boolean {
    return this.guard.isActive();
  }

  getLastResult(): CycleResult | null {
    return this.lastResult;
  }

  getGuardCounters(): { runs: number; coalesced: number } {
    return this.guard.getCounters();
  }

  private async runCycle(): Promise<CycleResult> {
    const startedAt = Date.now();
    const snapshot = await this.exchanges.fetchSnapshot();

    let known: Set<PairKey>;
    try {
      known = await this.store.knownPairs();
    } catch (error) {
      const err = toError(error);
      this.logger.error('❌ Cannot load known pairs, cycle aborted', err);
      return this.finish({ status: 'failed', newPairs: [], lines: [], durationMs: Date.now() - startedAt, error: err.message });
    }

    const newPairs: Observation[] = [];
    const lines: string[] = [];

    // Ordre d'insertion des adapters, puis ordre naturel de chaque ensemble
    for (const [source, symbols] of snapshot) {
      for (const symbol of symbols) {
        const key = pairKey(source, symbol);
        if (known.has(key)) continue;
        known.add(key);

        try {
          const { observation, created } = await this.store.append(source, symbol);
          if (!created) continue;
          newPairs.push(observation);
          lines.push(formatListingLine(source, symbol));
          this.logger.info(`🟢 New ${source} listing: ${symbol}`, { source });
        } catch (error) {
          // Observation perdue pour ce cycle, pas de ligne émise
          this.logger.error(`❌ Cannot record ${source}:${symbol}`, toError(error), { source });
        }
      }
    }

    if (lines.length > 0) {
      try {
        await this.notifier.notify(lines.join('\n'));
      } catch (error) {
        this.logger.error('❌ Notifier rejected, observations kept', toError(error));
      }
    }

    const durationMs = Date.now() - startedAt;
    this.logger.debug(`Cycle done: ${newPairs.length} new pair(s) in ${durationMs}ms`);
    return this.finish({ status: 'completed', newPairs, lines, durationMs });
  }

  private finish(result: CycleResult): CycleResult {
    this.lastResult = result;
    return result;
  }
}
