// Erreurs typées du moteur de détection

export class ListingWatchError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ListingWatchError';
    this.code = code;
  }
}

/**
 * Réponse d'exchange dont la forme ne correspond pas au schéma attendu
 */
export class MalformedResponseError extends ListingWatchError {
  constructor(source: string, detail: string) {
    super('MALFORMED_RESPONSE', `${source}: ${detail}`);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Stockage illisible ou impossible à écrire
 */
export class RecordStoreError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RECORD_STORE', message, options);
    this.name = 'RecordStoreError';
  }
}

/**
 * Contenu persisté présent mais corrompu
 */
export class CorruptRecordsError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CORRUPT_RECORDS', message, options);
    this.name = 'CorruptRecordsError';
  }
}

export class BaselineError extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('BASELINE', message, options);
    this.name = 'BaselineError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
