import { ListingAdapter } from './ListingAdapter';
import { SourceId } from './types';
import { requireArray, requireRecord, requireString } from '../utils/responseShape';

export const BINANCE_EXCHANGE_INFO_URL = 'https://fapi.binance.com/fapi/v1/exchangeInfo';

/**
 * Binance USDⓈ-M futures : contrats perpétuels cotés en USDT
 */
export class BinanceAdapter extends ListingAdapter {
  readonly source: SourceId = 'Binance';
  readonly url = BINANCE_EXCHANGE_INFO_URL;

  protected extractSymbols(body: unknown): string[] {
    const info = requireRecord(this.source, body, 'body');
    const symbols = requireArray(this.source, info.symbols, 'symbols');

    const result: string[] = [];
    symbols.forEach((item, index) => {
      const entry = requireRecord(this.source, item, `symbols[${index}]`);
      if (entry.contractType === 'PERPETUAL' && entry.quoteAsset === 'USDT') {
        result.push(requireString(this.source, entry.symbol, `symbols[${index}].symbol`));
      }
    });
    return result;
  }
}
