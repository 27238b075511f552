import { Observation, RecordBackend } from './RecordBackend';
import { RecordStoreError } from '../core/errors';

/**
 * Stockage en mémoire pour les tests, avec injection de pannes
 */
export class MemoryRecordBackend implements RecordBackend {
  readonly description = 'memory';

  private records: Observation[] | null;
  private failReads = false;
  private failWrites = 0;

  writeCount = 0;

  constructor(initial?: Observation[]) {
    this.records = initial ? initial.map(record => ({ ...record })) : null;
  }

  async exists(): Promise<boolean> {
    return this.records !== null;
  }

  async read(): Promise<Observation[]> {
    if (this.failReads) {
      throw new RecordStoreError('memory backend: read failure');
    }
    if (this.records === null) {
      throw new RecordStoreError('memory backend: no record log');
    }
    return this.records.map(record => ({ ...record }));
  }

  async write(records: Observation[]): Promise<void> {
    if (this.failWrites > 0) {
      this.failWrites--;
      throw new RecordStoreError('memory backend: write failure');
    }
    this.writeCount++;
    this.records = records.map(record => ({ ...record }));
  }

  setReadFailure(enabled: boolean): void {
    this.failReads = enabled;
  }

  /** Les `count` prochaines écritures échouent */
  failNextWrites(count: number = 1): void {
    this.failWrites = count;
  }

  /** Simule la disparition du journal */
  remove(): void {
    this.records = null;
  }

  snapshot(): Observation[] {
    return (this.records ?? []).map(record => ({ ...record }));
  }
}
