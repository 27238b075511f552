import { HttpClientResponse, JsonHttpClient } from '../../lib/httpClient';
import { SnapshotProvider } from '../../exchanges/ExchangeManager';
import { Snapshot, SourceId, isSourceId } from '../../exchanges/types';
import { Notifier } from '../../notify/Notifier';
import { LogLevel, StructuredLogger } from '../../core/StructuredLogger';

type Route = { status: number; data: unknown } | Error;

/**
 * Client HTTP en mémoire : une réponse (ou une erreur) par URL
 */
export class FakeHttpClient implements JsonHttpClient {
  readonly requests: Array<{ method: 'GET' | 'POST'; url: string; body?: unknown; timeoutMs?: number }> = [];
  private readonly routes = new Map<string, Route>();

  respond(url: string, data: unknown, status: number = 200): this {
    this.routes.set(url, { status, data });
    return this;
  }

  fail(url: string, error: Error = new Error('socket hang up')): this {
    this.routes.set(url, error);
    return this;
  }

  async getJSON(url: string, timeoutMs?: number): Promise<HttpClientResponse> {
    this.requests.push({ method: 'GET', url, timeoutMs });
    return this.resolve(url);
  }

  async postJSON(url: string, body: unknown, timeoutMs?: number): Promise<HttpClientResponse> {
    this.requests.push({ method: 'POST', url, body, timeoutMs });
    return this.resolve(url);
  }

  private resolve(url: string): HttpClientResponse {
    const route = this.routes.get(url);
    if (!route) {
      throw new Error(`No route for ${url}`);
    }
    if (route instanceof Error) {
      throw route;
    }
    return { status: route.status, data: route.data, ok: route.status >= 200 && route.status < 300 };
  }
}

export class RecordingNotifier implements Notifier {
  readonly messages: string[] = [];
  failing = false;

  async notify(text: string): Promise<void> {
    if (this.failing) {
      throw new Error('destination unreachable');
    }
    this.messages.push(text);
  }
}

/**
 * Snapshots scriptés : chaque appel consomme le suivant, le dernier est répété
 */
export class ScriptedSnapshotProvider implements SnapshotProvider {
  calls = 0;

  constructor(private readonly snapshots: Array<Partial<Record<SourceId, string[]>>>) {}

  async fetchSnapshot(): Promise<Snapshot> {
    const index = Math.min(this.calls, this.snapshots.length - 1);
    this.calls++;
    return buildSnapshot(this.snapshots[index] ?? {});
  }
}

export function buildSnapshot(listing: Partial<Record<SourceId, string[]>>): Snapshot {
  const snapshot: Snapshot = new Map();
  for (const [source, symbols] of Object.entries(listing)) {
    if (isSourceId(source)) {
      snapshot.set(source, new Set(symbols));
    }
  }
  return snapshot;
}

/**
 * Logger qui garde les lignes en mémoire
 */
export function createCapturingLogger(): { logger: StructuredLogger; lines: Array<{ level: LogLevel; line: string }> } {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const logger = new StructuredLogger(LogLevel.DEBUG, {}, (level, line) => {
    lines.push({ level, line });
  });
  return { logger, lines };
}
