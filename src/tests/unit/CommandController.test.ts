import { CommandController } from '../../api/CommandController';
import { ListingDiffEngine } from '../../core/ListingDiffEngine';
import { HistoryService, NO_LISTINGS_PLACEHOLDER, NO_RECORDS_PLACEHOLDER } from '../../core/HistoryViews';
import { RecordStore } from '../../store/RecordStore';
import { MemoryRecordBackend } from '../../store/MemoryRecordBackend';
import { FixedClock } from '../../core/Timing';
import { RecordingNotifier, ScriptedSnapshotProvider } from '../helpers/fakes';

describe('CommandController', () => {
  const baseline = [
    { source: 'Binance' as const, symbol: 'BTCUSDT', timestamp: '2025-03-14 09:30:00' },
    { source: 'Upbit' as const, symbol: 'KRW-BTC', timestamp: '2025-03-14 09:30:00' }
  ];

  let backend: MemoryRecordBackend;
  let exchanges: ScriptedSnapshotProvider;
  let controller: CommandController;

  beforeEach(() => {
    backend = new MemoryRecordBackend(baseline);
    const store = new RecordStore(backend, new FixedClock('2025-03-15 10:00:00', 60));
    exchanges = new ScriptedSnapshotProvider([
      { Binance: ['BTCUSDT', 'ETHUSDT'], Upbit: ['KRW-BTC', 'KRW-ARB'] }
    ]);
    const engine = new ListingDiffEngine(exchanges, store, new RecordingNotifier());
    controller = new CommandController(engine, new HistoryService(store), store.description, {
      historyLimit: 3,
      summaryPerSource: 5
    });
  });

  it('should hide the baseline from /check until something new shows up', async () => {
    expect(await controller.checkCommand()).toBe(NO_LISTINGS_PLACEHOLDER);
  });

  it('should report a forced cycle and list what it found', async () => {
    expect(await controller.forceCheckCommand()).toBe('✅ Check completed (2 new)');

    expect(await controller.checkCommand()).toBe([
      '📊 [Binance] latest listings:',
      '- 03-15 - ETH',
      '',
      '📊 [Upbit] latest listings:',
      '- 03-15 - ARB',
      ''
    ].join('\n'));

    expect(await controller.historyCommand()).toBe([
      '2025-03-15 10:01:00 - Upbit: KRW-ARB',
      '2025-03-15 10:00:00 - Binance: ETHUSDT',
      '2025-03-14 09:30:00 - Upbit: KRW-BTC'
    ].join('\n'));
  });

  it('should report a failed cycle', async () => {
    backend.setReadFailure(true);

    expect(await controller.forceCheckCommand()).toBe('❌ Check failed: memory backend: read failure');
    expect(await controller.historyCommand()).toBe(NO_RECORDS_PLACEHOLDER);
  });

  it('should expose health with the last cycle', async () => {
    expect(controller.health()).toMatchObject({
      status: 'ok',
      store: 'memory',
      cycleInFlight: false,
      lastCycle: null
    });

    await controller.forceCheckCommand();

    expect(controller.health().lastCycle).toMatchObject({ status: 'completed', newPairs: 2 });
  });
});
