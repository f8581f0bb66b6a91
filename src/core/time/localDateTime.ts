import { ValidationError } from "../errors";

/**
 * Naive local wall-clock timestamp, normalized to `YYYY-MM-DDTHH:mm:ss`.
 *
 * No timezone is attached: values are compared directly against the host's local clock.
 * Normalized values sort lexicographically in chronological order, which is what the
 * store relies on for `nextRunAt <= before` queries.
 */
export type LocalDateTime = string;

type LocalDateTimeFields = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

const LOCAL_DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?$/;
const ZONE_SUFFIX_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

const formatFields = (f: LocalDateTimeFields): LocalDateTime =>
  `${pad(f.year, 4)}-${pad(f.month)}-${pad(f.day)}T${pad(f.hour)}:${pad(f.minute)}:${pad(f.second)}`;

// UTC getters are used purely as a calendar calculator; no zone conversion happens.
const toEpochFields = (f: LocalDateTimeFields): number =>
  Date.UTC(f.year, f.month - 1, f.day, f.hour, f.minute, f.second);

const fromEpochFields = (epochMs: number): LocalDateTimeFields => {
  const d = new Date(epochMs);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds()
  };
};

const parseFields = (value: string, field: string): LocalDateTimeFields => {
  const trimmed = value.trim();
  if (ZONE_SUFFIX_PATTERN.test(trimmed)) {
    throw new ValidationError(`${field} must be a naive local timestamp without timezone. Received: ${value}`, {
      field
    });
  }

  const match = LOCAL_DATE_TIME_PATTERN.exec(trimmed);
  if (!match) {
    throw new ValidationError(`${field} must look like YYYY-MM-DDTHH:mm[:ss]. Received: ${value}`, { field });
  }

  const fields: LocalDateTimeFields = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: match[6] != null ? Number(match[6]) : 0
  };

  // Reject calendar overflow such as 2025-02-30 instead of rolling it over.
  const roundTrip = fromEpochFields(toEpochFields(fields));
  if (formatFields(roundTrip) !== formatFields(fields)) {
    throw new ValidationError(`${field} is not a valid calendar date/time. Received: ${value}`, { field });
  }

  return fields;
};

export const parseLocalDateTime = (value: string, field = "timestamp"): LocalDateTime =>
  formatFields(parseFields(value, field));

const NORMALIZED_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

/** True for values already in normalized form. */
export const isLocalDateTime = (value: unknown): value is LocalDateTime =>
  typeof value === "string" && NORMALIZED_PATTERN.test(value);

/** Formats the host's local wall-clock fields of `date`. */
export const toLocalDateTime = (date: Date): LocalDateTime =>
  formatFields({
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds()
  });

export const addMilliseconds = (value: LocalDateTime, ms: number): LocalDateTime =>
  formatFields(fromEpochFields(toEpochFields(parseFields(value, "timestamp")) + ms));

/** `a - b` in milliseconds. */
export const diffMilliseconds = (a: LocalDateTime, b: LocalDateTime): number =>
  toEpochFields(parseFields(a, "timestamp")) - toEpochFields(parseFields(b, "timestamp"));

export const compareLocalDateTime = (a: LocalDateTime, b: LocalDateTime): number =>
  a < b ? -1 : a > b ? 1 : 0;
