import type { LoadIncidentsResult } from '@/types/incidents';

import { loadIncidentTable } from './incidentLoader';
import { logger } from './logger';

export type IncidentTableLoader = (source: string) => Promise<LoadIncidentsResult>;

type CacheEntry = {
  source: string;
  result: Promise<LoadIncidentsResult>;
};

/**
 * Holds the derived table for one source identity. Requesting another source
 * replaces the entry; failed loads are dropped so the next request refetches.
 */
export class IncidentTableCache {
  private entry: CacheEntry | null = null;

  constructor(private readonly loader: IncidentTableLoader = (source) => loadIncidentTable(source)) {}

  get(source: string): Promise<LoadIncidentsResult> {
    const key = source.trim();
    if (this.entry && this.entry.source === key) {
      return this.entry.result;
    }
    if (this.entry) {
      logger.info('cache', 'Incident source changed, discarding cached table', {
        previous: this.entry.source,
        next: key,
      });
    }

    const entry: CacheEntry = { source: key, result: this.loader(key) };
    this.entry = entry;
    void entry.result.then(
      (result) => {
        if (!result.ok && this.entry === entry) this.entry = null;
      },
      (error: unknown) => {
        if (this.entry === entry) this.entry = null;
        logger.error('cache', 'Incident loader rejected', {
          source: key,
          error: error instanceof Error ? error.message : String(error),
        });
      },
    );
    return entry.result;
  }

  currentSource(): string | null {
    return this.entry?.source ?? null;
  }

  invalidate(): void {
    if (this.entry) {
      logger.info('cache', 'Incident table cache invalidated', { source: this.entry.source });
    }
    this.entry = null;
  }
}

export const incidentTableCache = new IncidentTableCache();
