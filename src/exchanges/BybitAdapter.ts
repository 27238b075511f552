import { ListingAdapter } from './ListingAdapter';
import { SourceId } from './types';
import { MalformedResponseError } from '../core/errors';
import { requireArray, requireRecord, requireString } from '../utils/responseShape';

export const BYBIT_INSTRUMENTS_URL = 'https://api.bybit.com/v5/market/instruments-info?category=linear';

/**
 * Bybit v5, catégorie linear : symboles terminés par USDT
 */
export class BybitAdapter extends ListingAdapter {
  readonly source: SourceId = 'Bybit';
  readonly url = BYBIT_INSTRUMENTS_URL;

  protected extractSymbols(body: unknown): string[] {
    const response = requireRecord(this.source, body, 'body');
    if (response.retCode !== 0) {
      throw new MalformedResponseError(this.source, `retCode=${String(response.retCode)} ${String(response.retMsg ?? '')}`.trim());
    }

    const result = requireRecord(this.source, response.result, 'result');
    const list = requireArray(this.source, result.list, 'result.list');

    return list
      .map((item, index) => requireString(
        this.source,
        requireRecord(this.source, item, `result.list[${index}]`).symbol,
        `result.list[${index}].symbol`
      ))
      .filter(symbol => symbol.endsWith('USDT'));
  }
}
