import { SOURCE_IDS, SourceId } from '../exchanges/types';
import { Observation } from '../store/RecordBackend';
import { RecordStore } from '../store/RecordStore';
import { normalizeSymbol } from './SymbolNormalizer';
import { toMonthDay } from './Timing';
import { StructuredLogger, logger as rootLogger } from './StructuredLogger';
import { toError } from './errors';

export const NO_RECORDS_PLACEHOLDER = '📭 No records yet';
export const NO_LISTINGS_PLACEHOLDER = '📭 No new listings';

export interface SummaryOptions {
  /** Exclut le lot de bootstrap (horodatage du premier enregistrement) */
  excludeBaseline?: boolean;
}

/**
 * Les n dernières observations ajoutées, la plus récente en tête
 */
export function recentLog(records: readonly Observation[], n: number): string {
  if (n <= 0 || records.length === 0) return NO_RECORDS_PLACEHOLDER;

  return records
    .slice(-n)
    .reverse()
    .map(record => `${record.timestamp} - ${record.source}: ${record.symbol}`)
    .join('\n');
}

/**
 * Tri décroissant par horodatage ; à égalité, le dernier ajouté d'abord
 */
function newestFirst(records: readonly Observation[]): Observation[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => {
      if (a.record.timestamp !== b.record.timestamp) {
        return a.record.timestamp < b.record.timestamp ? 1 : -1;
      }
      return b.index - a.index;
    })
    .map(entry => entry.record);
}

export function recentBySource(
  records: readonly Observation[],
  nPerSource: number,
  options: SummaryOptions = {}
): string {
  let candidates = records;
  if (options.excludeBaseline && records.length > 0) {
    const baselineTimestamp = records[0]?.timestamp;
    candidates = records.filter(record => record.timestamp !== baselineTimestamp);
  }

  const grouped = new Map<SourceId, Observation[]>();
  for (const record of newestFirst(candidates)) {
    const group = grouped.get(record.source) ?? [];
    group.push(record);
    grouped.set(record.source, group);
  }

  const output: string[] = [];
  for (const source of SOURCE_IDS) {
    const recent = (grouped.get(source) ?? []).slice(0, Math.max(0, nPerSource));
    if (recent.length === 0) continue;

    output.push(`📊 [${source}] latest listings:`);
    for (const record of recent) {
      output.push(`- ${toMonthDay(record.timestamp)} - ${normalizeSymbol(record.symbol)}`);
    }
    output.push('');
  }

  return output.length > 0 ? output.join('\n') : NO_LISTINGS_PLACEHOLDER;
}

/**
 * Vues en lecture seule sur le journal ; un échec de lecture donne le placeholder
 */
export class HistoryService {
  private readonly logger: StructuredLogger;

  constructor(private readonly store: RecordStore, logger: StructuredLogger = rootLogger) {
    this.logger = logger.child('history');
  }

  async loadRecords(): Promise<Observation[]> {
    return this.store.load();
  }

  async history(n: number): Promise<string> {
    try {
      return recentLog(await this.store.load(), n);
    } catch (error) {
      this.logger.error('❌ History read failed', toError(error));
      return NO_RECORDS_PLACEHOLDER;
    }
  }

  async summary(nPerSource: number, options: SummaryOptions = {}): Promise<string> {
    try {
      return recentBySource(await this.store.load(), nPerSource, options);
    } catch (error) {
      this.logger.error('❌ Summary read failed', toError(error));
      return NO_LISTINGS_PLACEHOLDER;
    }
  }
}
