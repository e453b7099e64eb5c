import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { Database } from 'sql.js';
import { z } from 'zod';
import type { HighlightRecord, Watermark } from '../types.js';
import { SourceUnavailableError } from '../errors.js';
import { loadSqlJs } from './sqlite.js';

export interface ChangeReader {
  /**
   * Highlights committed strictly after `watermark` (all when undefined),
   * ascending by commit time, so the last element carries the maximum.
   */
  fetchSince(watermark: Watermark): Promise<HighlightRecord[]>;
}

/** Where GoodLinks keeps its database on macOS */
export const DEFAULT_DATABASE_PATH = join(
  homedir(),
  'Library',
  'Group Containers',
  'group.com.ngocluu.goodlinks',
  'Data',
  'data.sqlite',
);

const SELECT_HIGHLIGHTS = `
  SELECT h.id, h.linkId, h.content, h.note, h.time, h.color, l.url, l.title, l.author
  FROM highlight h
  JOIN link l ON h.linkId = l.id`;

const ORDER = 'ORDER BY h.time ASC, h.id ASC';

const identifier = z.union([z.string(), z.number()]).transform(String);

/** NULL and "" both mean absent */
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(v => (v === null || v === undefined || v === '' ? undefined : String(v)));

const highlightRowSchema = z.object({
  id: identifier,
  linkId: identifier,
  content: z.string(),
  note: optionalText,
  time: z.number().finite(),
  color: optionalText,
  url: optionalText,
  title: optionalText,
  author: optionalText,
});

type HighlightRow = z.infer<typeof highlightRowSchema>;

function toRecord(row: HighlightRow): HighlightRecord {
  return {
    id: row.id,
    documentId: row.linkId,
    text: row.content,
    committedAt: row.time,
    ...(row.note !== undefined ? { note: row.note } : {}),
    ...(row.color !== undefined ? { color: row.color } : {}),
    ...(row.url !== undefined ? { url: row.url } : {}),
    ...(row.title !== undefined ? { title: row.title } : {}),
    ...(row.author !== undefined ? { author: row.author } : {}),
  };
}

/**
 * Reads highlights from the GoodLinks SQLite database.
 *
 * The file is read once and queried from an in-memory copy, so the live
 * database is never written. Any failure, including a row that does not
 * match the expected columns, aborts the whole read.
 */
export class GoodLinksChangeReader implements ChangeReader {
  private databasePath: string;

  constructor(databasePath: string = DEFAULT_DATABASE_PATH) {
    this.databasePath = databasePath;
  }

  async fetchSince(watermark: Watermark): Promise<HighlightRecord[]> {
    let data: Buffer;
    try {
      data = await readFile(this.databasePath);
    } catch (err) {
      throw new SourceUnavailableError(`Cannot open GoodLinks database at ${this.databasePath}`, { cause: err });
    }

    let db: Database | undefined;
    try {
      const SQL = await loadSqlJs();
      db = new SQL.Database(data);

      const rows: unknown[] = [];
      const stmt = watermark === undefined
        ? db.prepare(`${SELECT_HIGHLIGHTS} ${ORDER}`)
        : db.prepare(`${SELECT_HIGHLIGHTS} WHERE h.time > ? ${ORDER}`, [watermark]);
      try {
        while (stmt.step()) rows.push(stmt.getAsObject());
      } finally {
        stmt.free();
      }

      return rows.map((raw, index) => {
        const parsed = highlightRowSchema.safeParse(raw);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const field = issue?.path.join('.') || 'row';
          throw new SourceUnavailableError(`Unexpected highlight row at position ${index}: ${field} ${issue?.message ?? 'is invalid'}`);
        }
        return toRecord(parsed.data);
      });
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err;
      throw new SourceUnavailableError('Failed to query highlights', { cause: err });
    } finally {
      db?.close();
    }
  }
}
