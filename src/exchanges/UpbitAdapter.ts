import { ListingAdapter } from './ListingAdapter';
import { SourceId } from './types';
import { requireArray, requireRecord, requireString } from '../utils/responseShape';

export const UPBIT_MARKETS_URL = 'https://api.upbit.com/v1/market/all';

/**
 * Upbit spot : marchés KRW uniquement (KRW-BTC, KRW-ETH...)
 */
export class UpbitAdapter extends ListingAdapter {
  readonly source: SourceId = 'Upbit';
  readonly url = UPBIT_MARKETS_URL;

  protected extractSymbols(body: unknown): string[] {
    const markets = requireArray(this.source, body, 'body');

    return markets
      .map((item, index) => requireString(
        this.source,
        requireRecord(this.source, item, `[${index}]`).market,
        `[${index}].market`
      ))
      .filter(market => market.startsWith('KRW-'));
  }
}
