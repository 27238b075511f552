import { SourceId, isSourceId } from '../exchanges/types';
import { CorruptRecordsError } from '../core/errors';
import { isRecord } from '../utils/responseShape';

/**
 * Observation persistée : le symbole est stocké brut, jamais normalisé
 */
export interface Observation {
  source: SourceId;
  symbol: string;
  timestamp: string;
}

export type PairKey = `${SourceId}:${string}`;

export function pairKey(source: SourceId, symbol: string): PairKey {
  return `${source}:${symbol}`;
}

/**
 * Stockage injecté du journal : mémoire (tests) ou fichier JSON (production)
 */
export interface RecordBackend {
  readonly description: string;
  /** false tant que le bootstrap n'a jamais écrit */
  exists(): Promise<boolean>;
  /** Lève RecordStoreError (absent ou illisible) ou CorruptRecordsError (contenu invalide) */
  read(): Promise<Observation[]>;
  /** Réécrit la collection complète */
  write(records: Observation[]): Promise<void>;
}

/**
 * Valide une collection relue depuis le stockage
 */
export function parseRecords(raw: unknown, origin: string): Observation[] {
  if (!Array.isArray(raw)) {
    throw new CorruptRecordsError(`${origin}: expected an array of records`);
  }

  return raw.map((item, index) => {
    if (!isRecord(item)) {
      throw new CorruptRecordsError(`${origin}: record #${index} is not an object`);
    }
    const { source, symbol, timestamp } = item;
    if (!isSourceId(source)) {
      throw new CorruptRecordsError(`${origin}: record #${index} has unknown source ${JSON.stringify(source)}`);
    }
    if (typeof symbol !== 'string' || symbol === '') {
      throw new CorruptRecordsError(`${origin}: record #${index} has no symbol`);
    }
    if (typeof timestamp !== 'string') {
      throw new CorruptRecordsError(`${origin}: record #${index} has no timestamp`);
    }
    return { source, symbol, timestamp };
  });
}
