import type { DerivedIncident, IncidentRecord, IncidentTimestamp, TimePeriod } from '@/types/incidents';

const ISO_PATTERN =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/i;
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*(AM|PM))?)?$/i;

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function toInt(raw: string | undefined, fallback = 0): number {
  return raw === undefined ? fallback : Number.parseInt(raw, 10);
}

function buildTimestamp(parts: IncidentTimestamp): IncidentTimestamp | null {
  const { year, month, day, hour, minute, second } = parts;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) return null;
  return parts;
}

/**
 * Parses the incident timestamp as wall-clock parts. Offsets are accepted but
 * not applied, so the hour is the one written in the source.
 */
export function parseIncidentDate(raw: string | null | undefined): IncidentTimestamp | null {
  const text = (raw ?? '').trim();
  if (!text) return null;

  const iso = ISO_PATTERN.exec(text);
  if (iso) {
    return buildTimestamp({
      year: toInt(iso[1]),
      month: toInt(iso[2]),
      day: toInt(iso[3]),
      hour: toInt(iso[4]),
      minute: toInt(iso[5]),
      second: toInt(iso[6]),
    });
  }

  const us = US_PATTERN.exec(text);
  if (us) {
    let hour = toInt(us[4]);
    const meridiem = us[7]?.toUpperCase();
    if (meridiem) {
      if (hour < 1 || hour > 12) return null;
      if (meridiem === 'AM' && hour === 12) hour = 0;
      if (meridiem === 'PM' && hour !== 12) hour += 12;
    }
    return buildTimestamp({
      year: toInt(us[3]),
      month: toInt(us[1]),
      day: toInt(us[2]),
      hour,
      minute: toInt(us[5]),
      second: toInt(us[6]),
    });
  }

  return null;
}

export function timePeriodForHour(hour: number | null): TimePeriod | null {
  if (hour === null || !Number.isInteger(hour)) return null;
  if (hour < 0) return null;
  if (hour < 6) return 'Early Morning';
  if (hour < 12) return 'Morning';
  if (hour < 18) return 'Afternoon';
  if (hour < 24) return 'Night';
  return null;
}

export function deriveIncident(record: IncidentRecord): DerivedIncident {
  const year = record.date?.year ?? null;
  const month = record.date?.month ?? null;
  const hour = record.date?.hour ?? null;
  return Object.freeze({
    ...record,
    date: record.date ? Object.freeze({ ...record.date }) : null,
    year,
    month,
    hour,
    timePeriod: timePeriodForHour(hour),
  });
}

export function deriveIncidentFeatures(records: readonly IncidentRecord[]): readonly DerivedIncident[] {
  return Object.freeze(records.map(deriveIncident));
}
