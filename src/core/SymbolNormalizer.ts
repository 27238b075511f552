/**
 * Normalisation des symboles bruts d'exchange en symbole d'affichage
 *
 * Les règles sont évaluées dans l'ordre de la table. Un préfixe trouvé
 * court-circuite les suffixes ; parmi les suffixes seul le premier qui
 * correspond est retiré, d'où les plus spécifiques en tête.
 *
 * Une seule règle par symbole : la fonction n'est pas idempotente sur les
 * symboles qui cumulent préfixe et suffixe (KRW-BTCUSDT → BTCUSDT → BTC).
 * Aucune source surveillée ne produit ce format.
 */

export interface StripRule {
  kind: 'prefix' | 'suffix';
  token: string;
}

export const NORMALIZATION_RULES: readonly StripRule[] = [
  { kind: 'prefix', token: 'KRW-' },       // Upbit: KRW-BTC
  { kind: 'suffix', token: '-USDT-SWAP' }, // OKX brut: BTC-USDT-SWAP
  { kind: 'suffix', token: '-USDT' },      // OKX: BTC-USDT
  { kind: 'suffix', token: '-SWAP' },
  { kind: 'suffix', token: 'USDT' },       // Binance / Bybit: BTCUSDT
];

function applyRule(raw: string, rule: StripRule): string | null {
  // Ne jamais réduire un identifiant à une chaîne vide (ex: "USDT")
  if (raw.length <= rule.token.length) return null;

  if (rule.kind === 'prefix') {
    return raw.startsWith(rule.token) ? raw.slice(rule.token.length) : null;
  }
  return raw.endsWith(rule.token) ? raw.slice(0, -rule.token.length) : null;
}

export function normalizeSymbol(raw: string, rules: readonly StripRule[] = NORMALIZATION_RULES): string {
  const prefixes = rules.filter(rule => rule.kind === 'prefix');
  for (const rule of prefixes) {
    const stripped = applyRule(raw, rule);
    if (stripped !== null) return stripped;
  }

  const suffixes = rules.filter(rule => rule.kind === 'suffix');
  for (const rule of suffixes) {
    const stripped = applyRule(raw, rule);
    if (stripped !== null) return stripped;
  }

  return raw;
}
