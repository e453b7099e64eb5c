import type { HighlightBatch, HighlightPayload, HighlightRecord, TimestampZone, TransformOptions } from '../types.js';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render seconds since the epoch as ISO-8601 with millisecond precision.
 *
 * 'local' renders wall-clock time in the system timezone with an explicit
 * offset (`2023-11-14T22:13:20.500+01:00`); 'utc' renders `toISOString()`.
 * Both denote the same instant.
 */
export function toIsoTimestamp(seconds: number, zone: TimestampZone = 'local'): string {
  const date = new Date(Math.round(seconds * 1000));
  if (zone === 'utc') {
    return date.toISOString();
  }

  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? '+' : '-';
  const abs = Math.abs(offset);

  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    + `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    + `.${pad(date.getMilliseconds(), 3)}`
    + `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Map a highlight to its Readwise payload item.
 *
 * Optional fields absent from the record are omitted from the payload
 * entirely, never sent as null or "".
 */
export function transformHighlight(record: HighlightRecord, options: TransformOptions = {}): HighlightPayload {
  return {
    text: record.text,
    ...(record.url ? { source_url: record.url } : {}),
    ...(record.title ? { title: record.title } : {}),
    ...(record.author ? { author: record.author } : {}),
    highlighted_at: toIsoTimestamp(record.committedAt, options.timeZone),
    ...(record.note ? { note: record.note } : {}),
  };
}

/** Wrap records in the request body, preserving their order */
export function buildBatch(records: readonly HighlightRecord[], options: TransformOptions = {}): HighlightBatch {
  return { highlights: records.map(r => transformHighlight(r, options)) };
}
