import { SnapshotProvider } from '../exchanges/ExchangeManager';
import { Snapshot, SourceId } from '../exchanges/types';
import { RecordStore } from '../store/RecordStore';
import { StructuredLogger, logger as rootLogger } from './StructuredLogger';
import { BaselineError, toError } from './errors';

export interface BaselineResult {
  status: 'existing' | 'seeded';
  records: number;
}

export interface BaselineOptions {
  /** Nombre de snapshots tentés avant d'abandonner le démarrage */
  attempts: number;
  retryDelayMs: number;
  sleep: (ms: number) => Promise<void>;
}

function emptySources(snapshot: Snapshot): SourceId[] {
  const empty: SourceId[] = [];
  for (const [source, symbols] of snapshot) {
    if (symbols.size === 0) empty.push(source);
  }
  return empty;
}

/**
 * Baseline au démarrage (BOOT ONLY).
 *
 * - journal absent : un snapshot complet est écrit tel quel, sans notification ;
 * - journal présent et lisible : rien à faire ;
 * - journal présent mais illisible ou corrompu : BaselineError, le
 *   processus ne démarre pas plutôt que de re-notifier tout le marché.
 *
 * Une source vide (fetch en échec) bloque le seed : le snapshot est retenté,
 * puis BaselineError si elle reste vide.
 */
export class BaselineManager {
  private readonly logger: StructuredLogger;
  private readonly options: BaselineOptions;
  private result: BaselineResult | null = null;

  constructor(
    private readonly exchanges: SnapshotProvider,
    private readonly store: RecordStore,
    logger: StructuredLogger = rootLogger,
    options: Partial<BaselineOptions> = {}
  ) {
    this.logger = logger.child('baseline');
    this.options = {
      attempts: 3,
      retryDelayMs: 5000,
      sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
      ...options
    };
  }

  async initialize(): Promise<BaselineResult> {
    if (this.result) return this.result;

    let exists: boolean;
    try {
      exists = await this.store.exists();
    } catch (error) {
      throw new BaselineError(`Cannot check record store ${this.store.description}`, { cause: error });
    }

    if (exists) {
      try {
        const records = await this.store.load();
        this.logger.info(`📁 Existing record log found (${records.length} records), baseline skipped`);
        this.result = { status: 'existing', records: records.length };
        return this.result;
      } catch (error) {
        this.logger.fatal('❌ Record log exists but cannot be read', toError(error));
        throw new BaselineError(`Record log ${this.store.description} is unreadable`, { cause: error });
      }
    }

    this.logger.info('🔍 No record log yet, seeding baseline from current listings...');
    const snapshot = await this.fetchCompleteSnapshot();

    let records: number;
    try {
      records = await this.store.seed(snapshot);
    } catch (error) {
      throw new BaselineError(`Cannot write baseline to ${this.store.description}`, { cause: error });
    }

    this.logger.info(`✅ Baseline recorded: ${records} pairs`);
    this.result = { status: 'seeded', records };
    return this.result;
  }

  getResult(): BaselineResult | null {
    return this.result;
  }

  private async fetchCompleteSnapshot(): Promise<Snapshot> {
    const { attempts, retryDelayMs, sleep } = this.options;
    let missing: SourceId[] = [];

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const snapshot = await this.exchanges.fetchSnapshot();
      missing = emptySources(snapshot);
      if (missing.length === 0) return snapshot;

      this.logger.warn(`⚠️ Baseline attempt ${attempt}/${attempts}: no listings from ${missing.join(', ')}`);
      if (attempt < attempts) {
        this.logger.info(`⏳ Retrying baseline in ${retryDelayMs}ms...`);
        await sleep(retryDelayMs);
      }
    }

    throw new BaselineError(`Baseline refused: no listings from ${missing.join(', ')} after ${attempts} attempts`);
  }
}
