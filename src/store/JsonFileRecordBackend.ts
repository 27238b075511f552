import * as fs from 'fs';
import * as path from 'path';
import { Observation, RecordBackend, parseRecords } from './RecordBackend';
import { Clock, ZonedClock } from '../core/Timing';
import { CorruptRecordsError, RecordStoreError } from '../core/errors';
import { StructuredLogger, logger as rootLogger } from '../core/StructuredLogger';

export interface JsonFileBackendOptions {
  /** Copie complète quotidienne records-YYYY-MM-DD.json à côté du fichier */
  backupEnabled?: boolean;
  clock?: Clock;
  logger?: StructuredLogger;
}

// Les erreurs fs ne passent pas toujours instanceof Error (realm différent sous Jest)
function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

/**
 * Journal persisté dans un fichier JSON réécrit à chaque ajout.
 * Écriture dans un fichier temporaire puis rename : un crash laisse
 * l'ancienne version intacte.
 */
export class JsonFileRecordBackend implements RecordBackend {
  readonly description: string;

  private readonly backupEnabled: boolean;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;
  private lastBackupDay: string | null = null;

  constructor(private readonly filePath: string, options: JsonFileBackendOptions = {}) {
    this.description = `json:${filePath}`;
    this.backupEnabled = options.backupEnabled ?? false;
    this.clock = options.clock ?? new ZonedClock();
    this.logger = (options.logger ?? rootLogger).child('store');
  }

  async exists(): Promise<boolean> {
    try {
      await fs.promises.access(this.filePath, fs.constants.F_OK);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return false;
      throw new RecordStoreError(`Cannot stat ${this.filePath}`, { cause: error });
    }
  }

  async read(): Promise<Observation[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      // Absent après le bootstrap : jamais lu comme "aucune paire connue"
      if (errorCode(error) === 'ENOENT') {
        throw new RecordStoreError(`Record log ${this.filePath} is missing`, { cause: error });
      }
      throw new RecordStoreError(`Cannot read ${this.filePath}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new CorruptRecordsError(`${this.filePath} is not valid JSON`, { cause: error });
    }

    return parseRecords(raw, this.filePath);
  }

  async write(records: Observation[]): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, JSON.stringify(records, null, 2), 'utf-8');
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      throw new RecordStoreError(`Cannot write ${this.filePath}`, { cause: error });
    }

    if (this.backupEnabled) {
      await this.backupIfDue();
    }
  }

  /**
   * Chemin de la sauvegarde du jour : data/records.json → data/records-2025-03-14.json
   */
  backupPath(day: string): string {
    const ext = path.extname(this.filePath);
    const base = path.basename(this.filePath, ext);
    return path.join(path.dirname(this.filePath), `${base}-${day}${ext || '.json'}`);
  }

  private async backupIfDue(): Promise<void> {
    const day = this.clock.day();
    if (this.lastBackupDay === day) return;

    const target = this.backupPath(day);
    try {
      await fs.promises.copyFile(this.filePath, target, fs.constants.COPYFILE_EXCL);
      this.logger.info(`💾 Daily backup written: ${target}`);
    } catch (error) {
      // Sauvegarde déjà faite aujourd'hui (redémarrage) : rien à faire
      if (errorCode(error) !== 'EEXIST') {
        this.logger.warn(`⚠️ Daily backup failed: ${target}`, { error: String(error) });
        return;
      }
    }
    this.lastBackupDay = day;
  }
}
