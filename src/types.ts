/** A highlight row from the GoodLinks database, joined with its link */
export interface HighlightRecord {
  id: string;
  documentId: string;
  text: string;
  note?: string;
  /** Seconds since the epoch (fractional). Assigned once, never mutated. */
  committedAt: number;
  color?: string;
  url?: string;
  title?: string;
  author?: string;
}

/** One item of the Readwise `highlights` array */
export interface HighlightPayload {
  text: string;
  source_url?: string;
  title?: string;
  author?: string;
  highlighted_at: string;
  note?: string;
}

/** Request body for POST /api/v2/highlights/ */
export interface HighlightBatch {
  highlights: HighlightPayload[];
}

/** Commit time of the newest synced highlight; undefined requests full history */
export type Watermark = number | undefined;

export type TimestampZone = 'local' | 'utc';

export interface TransformOptions {
  /** Zone used to render `highlighted_at` (default: 'local') */
  timeZone?: TimestampZone;
}
