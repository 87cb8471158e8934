export const TIME_PERIODS = ['Early Morning', 'Morning', 'Afternoon', 'Night'] as const;

export type TimePeriod = (typeof TIME_PERIODS)[number];

export interface IncidentTimestamp {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface IncidentRecord {
  date: IncidentTimestamp | null;
  primaryType: string | null;
  district: string | null;
  communityArea: string | null;
  latitude: number | null;
  longitude: number | null;
  arrest: boolean | null;
}

export interface DerivedIncident extends IncidentRecord {
  year: number | null;
  month: number | null;
  hour: number | null;
  timePeriod: TimePeriod | null;
}

export interface IncidentTable {
  source: string;
  loadedAt: string;
  columns: string[];
  rows: readonly DerivedIncident[];
  parseWarnings: string[];
}

export type DataUnavailable = {
  kind: 'data_unavailable';
  source: string;
  cause: string;
};

export type LoadIncidentsResult = { ok: true; table: IncidentTable } | { ok: false; error: DataUnavailable };

export interface YearRange {
  minYear: number;
  maxYear: number;
}

export interface YearCount {
  year: number;
  count: number;
}

export interface DistrictCount {
  district: string;
  count: number;
}

export interface GeoPoint {
  latitude: number;
  longitude: number;
  primaryType: string | null;
  year: number | null;
  timePeriod: TimePeriod | null;
}

export type ArrestRateByPeriod = Partial<Record<TimePeriod, number>>;

export interface LabeledMatrix<T> {
  rowLabels: string[];
  columnLabels: string[];
  values: T[][];
}

export type CorrelationMatrix = LabeledMatrix<number | null>;

export interface DatasetSummary {
  source: string;
  loadedAt: string;
  totalRows: number;
  unknownDateRows: number;
  minYear: number | null;
  maxYear: number | null;
  parseWarnings: string[];
}
