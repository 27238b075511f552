import { DateTime } from 'luxon';

// Format des horodatages persistés (heure locale, précision seconde)
export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export const DEFAULT_ZONE = 'Asia/Taipei';

export interface Clock {
  /** Horodatage courant au format TIMESTAMP_FORMAT */
  timestamp(): string;
  /** Jour local courant (yyyy-MM-dd), utilisé pour la sauvegarde quotidienne */
  day(): string;
}

export class ZonedClock implements Clock {
  constructor(
    private readonly zone: string = DEFAULT_ZONE,
    private readonly now: () => Date = () => new Date()
  ) {}

  timestamp(): string {
    return DateTime.fromJSDate(this.now(), { zone: this.zone }).toFormat(TIMESTAMP_FORMAT);
  }

  day(): string {
    return DateTime.fromJSDate(this.now(), { zone: this.zone }).toFormat('yyyy-MM-dd');
  }
}

/**
 * Horloge figée pour les tests ; chaque appel à advance() avance d'un pas
 */
export class FixedClock implements Clock {
  private current: DateTime;

  constructor(start: string, private readonly stepSeconds: number = 0) {
    const parsed = DateTime.fromFormat(start, TIMESTAMP_FORMAT, { zone: 'UTC' });
    if (!parsed.isValid) {
      throw new Error(`Invalid timestamp: ${start}`);
    }
    this.current = parsed;
  }

  timestamp(): string {
    const value = this.current.toFormat(TIMESTAMP_FORMAT);
    this.current = this.current.plus({ seconds: this.stepSeconds });
    return value;
  }

  day(): string {
    return this.current.toFormat('yyyy-MM-dd');
  }

  set(value: string): void {
    const parsed = DateTime.fromFormat(value, TIMESTAMP_FORMAT, { zone: 'UTC' });
    if (!parsed.isValid) {
      throw new Error(`Invalid timestamp: ${value}`);
    }
    this.current = parsed;
  }
}

/**
 * "2025-03-14 09:30:00" → "03-14" ; valeur illisible rendue telle quelle
 */
export function toMonthDay(timestamp: string): string {
  const parsed = DateTime.fromFormat(timestamp, TIMESTAMP_FORMAT);
  return parsed.isValid ? parsed.toFormat('MM-dd') : timestamp;
}
