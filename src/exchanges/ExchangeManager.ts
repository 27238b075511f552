import { BinanceAdapter } from './BinanceAdapter';
import { BybitAdapter } from './BybitAdapter';
import { OkxAdapter } from './OkxAdapter';
import { UpbitAdapter } from './UpbitAdapter';
import { Snapshot, SourceAdapter, SourceId } from './types';
import { JsonHttpClient } from '../lib/httpClient';
import { StructuredLogger, logger as rootLogger } from '../core/StructuredLogger';
import { toError } from '../core/errors';

export interface SnapshotProvider {
  fetchSnapshot(): Promise<Snapshot>;
}

export class ExchangeManager implements SnapshotProvider {
  private readonly adapters: SourceAdapter[];
  private readonly logger: StructuredLogger;

  constructor(adapters: SourceAdapter[], logger: StructuredLogger = rootLogger) {
    const seen = new Set<SourceId>();
    for (const adapter of adapters) {
      if (seen.has(adapter.source)) {
        throw new Error(`Duplicate adapter for source ${adapter.source}`);
      }
      seen.add(adapter.source);
    }

    this.adapters = adapters;
    this.logger = logger.child('exchanges');
  }

  /**
   * Les quatre exchanges surveillés, dans l'ordre Binance, Bybit, OKX, Upbit
   */
  static createDefault(http: JsonHttpClient, timeoutMs?: number, logger: StructuredLogger = rootLogger): ExchangeManager {
    return new ExchangeManager([
      new BinanceAdapter(http, timeoutMs, logger),
      new BybitAdapter(http, timeoutMs, logger),
      new OkxAdapter(http, timeoutMs, logger),
      new UpbitAdapter(http, timeoutMs, logger)
    ], logger);
  }

  /**
   * Interroge tous les exchanges en parallèle. Un adapter en échec (même s'il
   * rejette malgré son contrat) donne un ensemble vide pour sa source.
   */
  async fetchSnapshot(): Promise<Snapshot> {
    const results = await Promise.allSettled(this.adapters.map(adapter => adapter.fetch()));

    const snapshot: Snapshot = new Map();
    results.forEach((result, index) => {
      const adapter = this.adapters[index];
      if (!adapter) return;

      if (result.status === 'fulfilled') {
        snapshot.set(adapter.source, result.value);
      } else {
        this.logger.error(`❌ ${adapter.source} adapter rejected`, toError(result.reason), { source: adapter.source });
        snapshot.set(adapter.source, new Set());
      }
    });

    return snapshot;
  }
}
