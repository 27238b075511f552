// Exchanges surveillés, dans l'ordre d'itération des cycles
export const SOURCE_IDS = ['Binance', 'Bybit', 'OKX', 'Upbit'] as const;

export type SourceId = typeof SOURCE_IDS[number];

/** Symboles bruts actuellement listés, par source, pour un cycle */
export type Snapshot = Map<SourceId, Set<string>>;

export interface SourceAdapter {
  readonly source: SourceId;
  /** Ne rejette jamais : un échec donne un ensemble vide */
  fetch(): Promise<Set<string>>;
}

export function isSourceId(value: unknown): value is SourceId {
  return typeof value === 'string' && (SOURCE_IDS as readonly string[]).includes(value);
}
