import { ListingDiffEngine, formatListingLine } from '../../core/ListingDiffEngine';
import { BaselineManager } from '../../core/BaselineManager';
import { RecordStore } from '../../store/RecordStore';
import { MemoryRecordBackend } from '../../store/MemoryRecordBackend';
import { FixedClock } from '../../core/Timing';
import { Snapshot } from '../../exchanges/types';
import { SnapshotProvider } from '../../exchanges/ExchangeManager';
import { PairKey } from '../../store/RecordBackend';
import { RecordingNotifier, ScriptedSnapshotProvider, buildSnapshot } from '../helpers/fakes';

describe('ListingDiffEngine', () => {
  let backend: MemoryRecordBackend;
  let store: RecordStore;
  let notifier: RecordingNotifier;

  beforeEach(() => {
    backend = new MemoryRecordBackend();
    store = new RecordStore(backend, new FixedClock('2025-03-14 09:30:00', 60));
    notifier = new RecordingNotifier();
  });

  describe('formatListingLine', () => {
    it('should render the normalized display symbol', () => {
      expect(formatListingLine('Upbit', 'KRW-ARB')).toBe('[Upbit] new listing: ARB');
      expect(formatListingLine('OKX', 'PEPE-USDT')).toBe('[OKX] new listing: PEPE');
    });
  });

  describe('bootstrap then cycles', () => {
    it('should notify a new pair exactly once', async () => {
      const exchanges = new ScriptedSnapshotProvider([
        { Binance: ['BTCUSDT'] },
        { Binance: ['BTCUSDT', 'ETHUSDT'] },
        { Binance: ['BTCUSDT', 'ETHUSDT'] }
      ]);
      const baseline = new BaselineManager(exchanges, store);
      const engine = new ListingDiffEngine(exchanges, store, notifier);

      const seeded = await baseline.initialize();
      expect(seeded).toEqual({ status: 'seeded', records: 1 });
      expect(notifier.messages).toEqual([]);
      expect(backend.snapshot()).toEqual([
        { source: 'Binance', symbol: 'BTCUSDT', timestamp: '2025-03-14 09:30:00' }
      ]);

      const second = await engine.checkAll();
      expect(second.status).toBe('completed');
      expect(second.lines).toEqual(['[Binance] new listing: ETH']);
      expect(notifier.messages).toEqual(['[Binance] new listing: ETH']);
      expect(backend.snapshot()).toHaveLength(2);

      const third = await engine.checkAll();
      expect(third.newPairs).toEqual([]);
      expect(notifier.messages).toHaveLength(1);
      expect(backend.snapshot()).toHaveLength(2);
    });

    it('should keep a silent baseline however many symbols are listed', async () => {
      const listing = Array.from({ length: 300 }, (_, i) => `T${i}USDT`);
      const exchanges = new ScriptedSnapshotProvider([{ Binance: listing, Upbit: ['KRW-BTC'] }]);

      const result = await new BaselineManager(exchanges, store).initialize();

      expect(result.records).toBe(301);
      expect(notifier.messages).toEqual([]);
    });
  });

  describe('cycle output', () => {
    it('should batch all new pairs of a cycle into one message, in source then set order', async () => {
      await store.seed(buildSnapshot({ Binance: ['BTCUSDT'], Upbit: ['KRW-BTC'] }));
      const exchanges = new ScriptedSnapshotProvider([{
        Binance: ['BTCUSDT', 'WIFUSDT'],
        OKX: ['WIF-USDT'],
        Upbit: ['KRW-BTC', 'KRW-WIF', 'KRW-ARB']
      }]);

      const result = await new ListingDiffEngine(exchanges, store, notifier).checkAll();

      expect(result.lines).toEqual([
        '[Binance] new listing: WIF',
        '[OKX] new listing: WIF',
        '[Upbit] new listing: WIF',
        '[Upbit] new listing: ARB'
      ]);
      expect(notifier.messages).toEqual([result.lines.join('\n')]);
      expect(result.newPairs.map(pair => `${pair.source}:${pair.symbol}`)).toEqual([
        'Binance:WIFUSDT', 'OKX:WIF-USDT', 'Upbit:KRW-WIF', 'Upbit:KRW-ARB'
      ]);
    });

    it('should send nothing when nothing is new', async () => {
      await store.seed(buildSnapshot({ Bybit: ['BTCUSDT'] }));
      const exchanges = new ScriptedSnapshotProvider([{ Bybit: ['BTCUSDT'] }]);

      const result = await new ListingDiffEngine(exchanges, store, notifier).checkAll();

      expect(result).toMatchObject({ status: 'completed', newPairs: [], lines: [] });
      expect(notifier.messages).toEqual([]);
    });

    it('should store raw symbols, not display symbols', async () => {
      await store.seed(new Map());
      const exchanges = new ScriptedSnapshotProvider([{ Upbit: ['KRW-SUI'] }]);

      await new ListingDiffEngine(exchanges, store, notifier).checkAll();

      expect(backend.snapshot().map(record => record.symbol)).toEqual(['KRW-SUI']);
    });
  });

  describe('partial failures', () => {
    it('should still record other sources when one source returns nothing', async () => {
      await store.seed(buildSnapshot({ Binance: ['BTCUSDT'], Bybit: ['BTCUSDT'] }));
      const exchanges = new ScriptedSnapshotProvider([{
        Binance: ['BTCUSDT', 'ENAUSDT'],
        Bybit: [],
        Upbit: ['KRW-ENA']
      }]);

      const result = await new ListingDiffEngine(exchanges, store, notifier).checkAll();

      expect(result.lines).toEqual(['[Binance] new listing: ENA', '[Upbit] new listing: ENA']);
      expect(await store.knownPairs()).toEqual(new Set([
        'Binance:BTCUSDT', 'Bybit:BTCUSDT', 'Binance:ENAUSDT', 'Upbit:KRW-ENA'
      ]));
    });

    it('should keep appended observations when notification fails', async () => {
      await store.seed(new Map());
      notifier.failing = true;
      const exchanges = new ScriptedSnapshotProvider([{ OKX: ['TON-USDT'] }]);
      const engine = new ListingDiffEngine(exchanges, store, notifier);

      const first = await engine.checkAll();
      expect(first.status).toBe('completed');
      expect(backend.snapshot().map(record => record.symbol)).toEqual(['TON-USDT']);

      notifier.failing = false;
      const second = await engine.checkAll();
      expect(second.lines).toEqual([]);
      expect(notifier.messages).toEqual([]);
    });

    it('should skip the line of an observation that could not be written', async () => {
      await store.seed(new Map());
      backend.failNextWrites(1);
      const exchanges = new ScriptedSnapshotProvider([{ Binance: ['AUSDT', 'BUSDT'] }]);

      const result = await new ListingDiffEngine(exchanges, store, notifier).checkAll();

      expect(result.lines).toEqual(['[Binance] new listing: B']);
      expect(backend.snapshot().map(record => record.symbol)).toEqual(['BUSDT']);
    });

    it('should abort the cycle instead of re-announcing everything when the log has disappeared', async () => {
      const exchanges = new ScriptedSnapshotProvider([{ Binance: ['BTCUSDT', 'ETHUSDT'], Upbit: ['KRW-BTC'] }]);
      await new BaselineManager(exchanges, store).initialize();
      backend.remove();

      const result = await new ListingDiffEngine(exchanges, store, notifier).checkAll();

      expect(result).toMatchObject({ status: 'failed', newPairs: [], lines: [], error: 'memory backend: no record log' });
      expect(notifier.messages).toEqual([]);
    });

    it('should not announce a pair the store already held when appending', async () => {
      class StaleViewStore extends RecordStore {
        async knownPairs(): Promise<Set<PairKey>> {
          return new Set();
        }
      }
      const staleStore = new StaleViewStore(backend, new FixedClock('2025-03-14 09:30:00', 60));
      await staleStore.seed(buildSnapshot({ Bybit: ['BTCUSDT'] }));
      const exchanges = new ScriptedSnapshotProvider([{ Bybit: ['BTCUSDT', 'SOLUSDT'] }]);

      const result = await new ListingDiffEngine(exchanges, staleStore, notifier).checkAll();

      expect(result.lines).toEqual(['[Bybit] new listing: SOL']);
      expect(result.newPairs.map(pair => pair.symbol)).toEqual(['SOLUSDT']);
      expect(notifier.messages).toEqual(['[Bybit] new listing: SOL']);
    });

    it('should abort the cycle without notifying when known pairs cannot be read', async () => {
      await store.seed(new Map());
      backend.setReadFailure(true);
      const exchanges = new ScriptedSnapshotProvider([{ Binance: ['XUSDT'] }]);
      const engine = new ListingDiffEngine(exchanges, store, notifier);

      const result = await engine.checkAll();

      expect(result.status).toBe('failed');
      expect(result.error).toBe('memory backend: read failure');
      expect(notifier.messages).toEqual([]);
      expect(engine.getLastResult()).toBe(result);
    });
  });

  describe('monotonicity', () => {
    it('should never shrink the known pairs across cycles', async () => {
      await store.seed(buildSnapshot({ Binance: ['AUSDT', 'BUSDT'] }));
      const exchanges = new ScriptedSnapshotProvider([
        { Binance: ['AUSDT', 'CUSDT'] },
        { Binance: [] },
        { Binance: ['DUSDT'] }
      ]);
      const engine = new ListingDiffEngine(exchanges, store, notifier);

      let previous = await store.knownPairs();
      for (let cycle = 0; cycle < 3; cycle++) {
        await engine.checkAll();
        const current = await store.knownPairs();
        for (const key of previous) {
          expect(current.has(key)).toBe(true);
        }
        previous = current;
      }

      expect(previous.size).toBe(4);
      expect(notifier.messages).toEqual(['[Binance] new listing: C', '[Binance] new listing: D']);
    });
  });

  describe('serialization', () => {
    class GatedProvider implements SnapshotProvider {
      calls = 0;
      private release: (() => void) | null = null;

      async fetchSnapshot(): Promise<Snapshot> {
        this.calls++;
        await new Promise<void>(resolve => {
          this.release = resolve;
        });
        return buildSnapshot({ Bybit: ['NEWUSDT'] });
      }

      open(): void {
        this.release?.();
      }
    }

    it('should coalesce a manual trigger onto the running cycle', async () => {
      await store.seed(new Map());
      const exchanges = new GatedProvider();
      const engine = new ListingDiffEngine(exchanges, store, notifier);

      const scheduled = engine.checkAll();
      const manual = engine.checkAll();
      expect(engine.isRunning()).toBe(true);

      // Laisser fetchSnapshot démarrer avant de le débloquer
      await new Promise(resolve => setImmediate(resolve));
      expect(exchanges.calls).toBe(1);
      exchanges.open();

      const [a, b] = await Promise.all([scheduled, manual]);

      expect(a).toBe(b);
      expect(exchanges.calls).toBe(1);
      expect(notifier.messages).toEqual(['[Bybit] new listing: NEW']);
      expect(backend.snapshot()).toHaveLength(1);
      expect(engine.getGuardCounters()).toEqual({ runs: 1, coalesced: 1 });
      expect(engine.isRunning()).toBe(false);
    });
  });
});
