import { ListingAdapter } from './ListingAdapter';
import { SourceId } from './types';
import { requireArray, requireRecord, requireString } from '../utils/responseShape';

export const OKX_INSTRUMENTS_URL = 'https://www.okx.com/api/v5/public/instruments?instType=SWAP';

/**
 * OKX swaps réglés en USDT. Le suffixe -SWAP est retiré de l'instId
 * (BTC-USDT-SWAP → BTC-USDT) pour garder l'identité déjà persistée.
 */
export class OkxAdapter extends ListingAdapter {
  readonly source: SourceId = 'OKX';
  readonly url = OKX_INSTRUMENTS_URL;

  protected extractSymbols(body: unknown): string[] {
    const response = requireRecord(this.source, body, 'body');
    const data = requireArray(this.source, response.data, 'data');

    const result: string[] = [];
    data.forEach((item, index) => {
      const instrument = requireRecord(this.source, item, `data[${index}]`);
      if (instrument.settleCcy !== 'USDT') return;

      const instId = requireString(this.source, instrument.instId, `data[${index}].instId`);
      result.push(instId.endsWith('-SWAP') ? instId.slice(0, -'-SWAP'.length) : instId);
    });

    this.logger.debug(`🧪 OKX: ${data.length} raw, ${result.length} USDT swaps, ${data.length - result.length} excluded`, {
      source: this.source
    });
    return result;
  }
}
