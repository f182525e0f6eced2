import { TagEncodingError } from "../../errors";

export interface Timestamp {
  year: number;
  month?: number;
  day?: number;
  hour?: number;
  minute?: number;
  second?: number;
}

const TIMESTAMP_PATTERN = /^(\d{4})(?:-(\d{2})(?:-(\d{2})(?:T(\d{2})(?::(\d{2})(?::(\d{2}))?)?)?)?)?$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function part(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Parses an ID3v2.4 style timestamp (`yyyy`, `yyyy-MM`, `yyyy-MM-dd`, `yyyy-MM-ddTHH`,
 * `yyyy-MM-ddTHH:mm`, `yyyy-MM-ddTHH:mm:ss`). Spotify release dates use the first three forms.
 */
export function parseTimestamp(input: string): Timestamp {
  const match = TIMESTAMP_PATTERN.exec(input.trim());
  if (!match) throw new TagEncodingError(`Invalid timestamp: '${input}'`);

  const timestamp: Timestamp = {
    year: Number(match[1]),
    month: part(match[2]),
    day: part(match[3]),
    hour: part(match[4]),
    minute: part(match[5]),
    second: part(match[6]),
  };

  const { year, month, day, hour, minute, second } = timestamp;
  if (
    (month !== undefined && (month < 1 || month > 12)) ||
    (month !== undefined && day !== undefined && (day < 1 || day > daysInMonth(year, month))) ||
    (hour !== undefined && hour > 23) ||
    (minute !== undefined && minute > 59) ||
    (second !== undefined && second > 59)
  ) {
    throw new TagEncodingError(`Timestamp out of range: '${input}'`);
  }

  return timestamp;
}

const pad = (value: number, length: number = 2) => value.toString().padStart(length, "0");

export function formatTimestamp(timestamp: Timestamp): string {
  let result = pad(timestamp.year, 4);
  if (timestamp.month === undefined) return result;
  result += `-${pad(timestamp.month)}`;
  if (timestamp.day === undefined) return result;
  result += `-${pad(timestamp.day)}`;
  if (timestamp.hour === undefined) return result;
  result += `T${pad(timestamp.hour)}`;
  if (timestamp.minute === undefined) return result;
  result += `:${pad(timestamp.minute)}`;
  if (timestamp.second === undefined) return result;
  return `${result}:${pad(timestamp.second)}`;
}
