import type { YearRange } from '@/types/incidents';

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type DashboardConfig = {
  source: string;
  fetchTimeoutMs: number;
  fetchRetries: number;
  fetchRetryDelayMs: number;
  geoSampleMax: number;
  topDistricts: number;
  topTypes: number;
  defaultMinYear: number;
  defaultMaxYear: number;
  logLevel: LogLevelSetting;
};

const DEFAULT_SOURCE = 'data/incidents.sample.csv';

let dashboardConfigCache: DashboardConfig | null = null;

export function parseInteger(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw == null || !raw.trim()) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, Math.min(max, parsed));
}

function parseLogLevel(raw: string | undefined): LogLevelSetting {
  const normalized = (raw ?? '').trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return normalized;
    default:
      return 'info';
  }
}

function readConfigUncached(): DashboardConfig {
  const defaultMinYear = parseInteger(process.env.DASHBOARD_MIN_YEAR, 2015, 1900, 2100);
  const defaultMaxYear = parseInteger(process.env.DASHBOARD_MAX_YEAR, 2025, 1900, 2100);
  return {
    source: (process.env.INCIDENTS_SOURCE ?? DEFAULT_SOURCE).trim() || DEFAULT_SOURCE,
    fetchTimeoutMs: parseInteger(process.env.INCIDENTS_FETCH_TIMEOUT_MS, 30000, 1000, 600000),
    fetchRetries: parseInteger(process.env.INCIDENTS_FETCH_RETRIES, 0, 0, 5),
    fetchRetryDelayMs: parseInteger(process.env.INCIDENTS_FETCH_RETRY_DELAY_MS, 500, 0, 60000),
    geoSampleMax: parseInteger(process.env.INCIDENTS_GEO_SAMPLE_MAX, 20000, 1, 50000),
    topDistricts: parseInteger(process.env.INCIDENTS_TOP_DISTRICTS, 15, 1, 100),
    topTypes: parseInteger(process.env.INCIDENTS_TOP_TYPES, 10, 1, 50),
    // An inverted pair from the environment is swapped.
    defaultMinYear: Math.min(defaultMinYear, defaultMaxYear),
    defaultMaxYear: Math.max(defaultMinYear, defaultMaxYear),
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
}

export function invalidateDashboardConfigCache(): void {
  dashboardConfigCache = null;
}

export function getDashboardConfig(): DashboardConfig {
  if (!dashboardConfigCache) {
    dashboardConfigCache = readConfigUncached();
  }
  return dashboardConfigCache;
}

export function getDefaultYearRange(): YearRange {
  const cfg = getDashboardConfig();
  return { minYear: cfg.defaultMinYear, maxYear: cfg.defaultMaxYear };
}
