import { Observation, PairKey, RecordBackend, pairKey } from './RecordBackend';
import { Snapshot, SourceId } from '../exchanges/types';
import { Clock, ZonedClock } from '../core/Timing';
import { StructuredLogger, logger as rootLogger } from '../core/StructuredLogger';

export interface AppendResult {
  observation: Observation;
  created: boolean;
}

/**
 * Journal append-only des observations (source, symbole brut, horodatage).
 * Au plus une observation par paire ; l'ensemble des paires ne décroît jamais.
 */
export class RecordStore {
  private readonly logger: StructuredLogger;

  constructor(
    private readonly backend: RecordBackend,
    private readonly clock: Clock = new ZonedClock(),
    logger: StructuredLogger = rootLogger
  ) {
    this.logger = logger.child('store');
  }

  get description(): string {
    return this.backend.description;
  }

  async exists(): Promise<boolean> {
    return this.backend.exists();
  }

  async load(): Promise<Observation[]> {
    return this.backend.read();
  }

  async knownPairs(): Promise<Set<PairKey>> {
    const records = await this.load();
    return new Set(records.map(record => pairKey(record.source, record.symbol)));
  }

  /**
   * Cycle complet load-modify-save d'une observation horodatée maintenant.
   * Une paire déjà présente n'est pas ré-ajoutée : l'observation existante
   * est rendue avec created=false.
   */
  async append(source: SourceId, symbol: string): Promise<AppendResult> {
    const records = await this.load();
    const existing = records.find(record => record.source === source && record.symbol === symbol);
    if (existing) {
      this.logger.debug(`Pair already recorded: ${source}:${symbol}`);
      return { observation: existing, created: false };
    }

    const observation: Observation = { source, symbol, timestamp: this.clock.timestamp() };
    await this.backend.write([...records, observation]);
    return { observation, created: true };
  }

  /**
   * Écriture initiale de la baseline : toutes les paires avec un horodatage commun
   */
  async seed(snapshot: Snapshot): Promise<number> {
    const timestamp = this.clock.timestamp();
    const records: Observation[] = [];
    const seen = new Set<PairKey>();

    for (const [source, symbols] of snapshot) {
      for (const symbol of symbols) {
        const key = pairKey(source, symbol);
        if (seen.has(key)) continue;
        seen.add(key);
        records.push({ source, symbol, timestamp });
      }
    }

    await this.backend.write(records);
    return records.length;
  }
}
