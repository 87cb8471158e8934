import { createReadStream } from 'node:fs';
import path from 'node:path';
import { Readable } from 'node:stream';

import Papa from 'papaparse';

import type { DataUnavailable, IncidentRecord, LoadIncidentsResult } from '@/types/incidents';

import { getDashboardConfig } from './config';
import { repairStrayQuotes, StrayQuoteRepairer } from './csvQuotes';
import { deriveIncidentFeatures, parseIncidentDate } from './features';
import { logger } from './logger';

export const REQUIRED_COLUMNS = [
  'Date',
  'Primary Type',
  'District',
  'Community Area',
  'Latitude',
  'Longitude',
  'Arrest',
] as const;

const MAX_PARSE_WARNINGS = 20;

type RawRow = Record<string, string | undefined>;

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type LoadIncidentsOptions = {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  cwd?: string;
};

type SourceOutcome =
  | { ok: true; chunks: AsyncIterable<string> }
  | { ok: false; cause: string; retryable: boolean };

export type ParseOutcome =
  | { ok: true; columns: string[]; records: IncidentRecord[]; parseWarnings: string[] }
  | { ok: false; cause: string };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isUrlSource(source: string): boolean {
  return /^https?:\/\//i.test(source.trim());
}

function asCell(value: string | undefined): string | null {
  const trimmed = (value ?? '').trim();
  return trimmed ? trimmed : null;
}

function asCoordinate(value: string | undefined): number | null {
  const text = asCell(value);
  if (text === null) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseArrestFlag(value: string | undefined): boolean | null {
  const text = (value ?? '').trim().toLowerCase();
  if (['true', 't', 'yes', 'y', '1'].includes(text)) return true;
  if (['false', 'f', 'no', 'n', '0'].includes(text)) return false;
  return null;
}

function toIncidentRecord(row: RawRow): IncidentRecord {
  return {
    date: parseIncidentDate(row['Date']),
    primaryType: asCell(row['Primary Type']),
    district: asCell(row['District']),
    communityArea: asCell(row['Community Area']),
    latitude: asCoordinate(row['Latitude']),
    longitude: asCoordinate(row['Longitude']),
    arrest: parseArrestFlag(row['Arrest']),
  };
}

type ParseWarning = { row: number | null; message: string };

function formatWarnings(warnings: ParseWarning[]): string[] {
  const ordered = [...warnings].sort((a, b) => (a.row ?? Number.MAX_SAFE_INTEGER) - (b.row ?? Number.MAX_SAFE_INTEGER));
  const lines = ordered
    .slice(0, MAX_PARSE_WARNINGS)
    .map((warning) => (warning.row === null ? warning.message : `Row ${warning.row}: ${warning.message}`));
  if (ordered.length > MAX_PARSE_WARNINGS) {
    lines.push(`${ordered.length - MAX_PARSE_WARNINGS} more malformed rows`);
  }
  return lines;
}

/**
 * Streams CSV text through papaparse. A quoted field with trailing text is
 * repaired and kept with a warning; rows with the wrong field count are kept
 * with a warning; only an unterminated quote fails the parse.
 */
export function parseIncidentCsv(input: string | AsyncIterable<string>): Promise<ParseOutcome> {
  const repairer = new StrayQuoteRepairer();
  const records: IncidentRecord[] = [];
  const warnings: ParseWarning[] = [];
  let columns: string[] = [];
  let unterminated: string | null = null;

  return new Promise<ParseOutcome>((resolve) => {
    Papa.parse<RawRow>(Readable.from(repairStrayQuotes(input, repairer)), {
      header: true,
      delimiter: ',',
      skipEmptyLines: true,
      dynamicTyping: false,
      transformHeader: (header) => header.trim(),
      chunk: (results) => {
        if (results.meta.fields && results.meta.fields.length > 0) columns = results.meta.fields;
        for (const error of results.errors) {
          if (error.code === 'MissingQuotes') {
            if (unterminated === null) unterminated = error.message;
          } else if (error.type === 'FieldMismatch') {
            warnings.push({ row: typeof error.row === 'number' ? error.row + 1 : null, message: error.message });
          } else {
            warnings.push({ row: null, message: error.message });
          }
        }
        for (const row of results.data) records.push(toIncidentRecord(row));
      },
      complete: () => {
        if (unterminated !== null) {
          resolve({ ok: false, cause: `Malformed CSV: ${unterminated}` });
          return;
        }
        const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
        if (missing.length > 0) {
          resolve({ ok: false, cause: `Missing required columns: ${missing.join(', ')}` });
          return;
        }
        for (const row of repairer.repairedRecords) {
          warnings.push({ row, message: 'Trailing quote on quoted field is malformed' });
        }
        resolve({ ok: true, columns, records, parseWarnings: formatWarnings(warnings) });
      },
      error: (error) => resolve({ ok: false, cause: error.message }),
    });
  });
}

async function* readResponseBody(
  response: Response,
  signal: AbortSignal,
  timeoutMs: number,
  release: () => void,
): AsyncGenerator<string> {
  const reader = response.body?.getReader();
  const decoder = new TextDecoder();
  const onAbort = () => {
    reader?.cancel().catch((error: unknown) => {
      logger.debug('incidents', 'Cancelling the response body failed', {
        cause: error instanceof Error ? error.message : String(error),
      });
    });
  };
  signal.addEventListener('abort', onAbort, { once: true });
  try {
    if (signal.aborted) throw new Error(`Fetch timed out after ${timeoutMs}ms`);
    if (reader) {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        const text = decoder.decode(value, { stream: true });
        if (text) yield text;
      }
    }
    if (signal.aborted) throw new Error(`Fetch timed out after ${timeoutMs}ms`);
    const tail = decoder.decode();
    if (tail) yield tail;
  } catch (error) {
    if (signal.aborted) throw new Error(`Fetch timed out after ${timeoutMs}ms`);
    throw error;
  } finally {
    signal.removeEventListener('abort', onAbort);
    release();
  }
}

async function fetchOnce(url: string, fetchImpl: FetchLike, timeoutMs: number): Promise<SourceOutcome> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  let streaming = false;
  try {
    const response = await fetchImpl(url, { signal: controller.signal });
    if (!response.ok) {
      return {
        ok: false,
        cause: `HTTP ${response.status} while fetching incident data`,
        retryable: response.status >= 500 || response.status === 429,
      };
    }
    streaming = true;
    return {
      ok: true,
      chunks: readResponseBody(response, controller.signal, timeoutMs, () => clearTimeout(timeout)),
    };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return { ok: false, cause: `Fetch timed out after ${timeoutMs}ms`, retryable: true };
    }
    const message = error instanceof Error ? error.message : 'Unknown fetch error';
    return { ok: false, cause: message, retryable: true };
  } finally {
    // The body reader clears the timer once it has been drained.
    if (!streaming) clearTimeout(timeout);
  }
}

async function readUrl(
  url: string,
  fetchImpl: FetchLike,
  timeoutMs: number,
  retries: number,
  retryDelayMs: number,
  sleep: (ms: number) => Promise<void>,
): Promise<SourceOutcome> {
  let attempt = 0;
  for (;;) {
    const outcome = await fetchOnce(url, fetchImpl, timeoutMs);
    if (outcome.ok || !outcome.retryable || attempt >= retries) return outcome;
    const delay = retryDelayMs * 2 ** attempt;
    attempt += 1;
    logger.warn('incidents', `Fetch failed, retrying (${attempt}/${retries})`, { cause: outcome.cause, delayMs: delay });
    await sleep(delay);
  }
}

async function* readFileChunks(filePath: string): AsyncGenerator<string> {
  for await (const chunk of createReadStream(filePath, { encoding: 'utf8' })) {
    yield typeof chunk === 'string' ? chunk : String(chunk);
  }
}

function openFile(filePath: string, cwd: string): SourceOutcome {
  return { ok: true, chunks: readFileChunks(path.resolve(cwd, filePath)) };
}

function unavailable(source: string, cause: string): { ok: false; error: DataUnavailable } {
  logger.error('incidents', 'Incident data unavailable', { source, cause });
  return { ok: false, error: { kind: 'data_unavailable', source, cause } };
}

export async function loadIncidentTable(
  source: string,
  options: LoadIncidentsOptions = {},
): Promise<LoadIncidentsResult> {
  const cfg = getDashboardConfig();
  const trimmed = source.trim();
  if (!trimmed) return unavailable(source, 'No incident data source configured');

  logger.info('incidents', 'Loading incident data', { source: trimmed });

  const read = isUrlSource(trimmed)
    ? await readUrl(
        trimmed,
        options.fetchImpl ?? fetch,
        options.timeoutMs ?? cfg.fetchTimeoutMs,
        options.retries ?? cfg.fetchRetries,
        options.retryDelayMs ?? cfg.fetchRetryDelayMs,
        options.sleep ?? defaultSleep,
      )
    : openFile(trimmed, options.cwd ?? process.cwd());
  if (!read.ok) return unavailable(trimmed, read.cause);

  const parsed = await parseIncidentCsv(read.chunks);
  if (!parsed.ok) return unavailable(trimmed, parsed.cause);

  const rows = deriveIncidentFeatures(parsed.records);
  logger.info('incidents', 'Incident data loaded', {
    source: trimmed,
    rows: rows.length,
    warnings: parsed.parseWarnings.length,
  });

  return {
    ok: true,
    table: Object.freeze({
      source: trimmed,
      loadedAt: new Date().toISOString(),
      columns: parsed.columns,
      rows,
      parseWarnings: parsed.parseWarnings,
    }),
  };
}
