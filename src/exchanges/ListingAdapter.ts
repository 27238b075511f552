import { JsonHttpClient } from '../lib/httpClient';
import { StructuredLogger, logger as rootLogger } from '../core/StructuredLogger';
import { toError } from '../core/errors';
import { SourceAdapter, SourceId } from './types';

/**
 * Base commune des adapters : un GET, un filtre, jamais d'exception
 */
export abstract class ListingAdapter implements SourceAdapter {
  abstract readonly source: SourceId;
  abstract readonly url: string;

  protected readonly logger: StructuredLogger;

  constructor(
    protected readonly http: JsonHttpClient,
    protected readonly timeoutMs?: number,
    logger: StructuredLogger = rootLogger
  ) {
    this.logger = logger.child('exchanges');
  }

  /**
   * Extrait les symboles bruts pertinents du corps JSON.
   * Lève MalformedResponseError si les champs attendus manquent.
   */
  protected abstract extractSymbols(body: unknown): string[];

  async fetch(): Promise<Set<string>> {
    try {
      const response = await this.http.getJSON(this.url, this.timeoutMs);
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }

      const symbols = new Set(this.extractSymbols(response.data));
      this.logger.debug(`🧪 ${this.source}: ${symbols.size} symbols`, { source: this.source });
      return symbols;
    } catch (error) {
      this.logger.warn(`❌ ${this.source} fetch failed: ${toError(error).message}`, {
        source: this.source,
        url: this.url
      });
      return new Set();
    }
  }
}
