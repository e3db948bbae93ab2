import * as fs from 'fs';
import * as path from 'path';
import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { z } from 'zod';
import type { SetRecord } from '../types';
import { normalizeSetRecord } from '../utils/normalizer';

const TABLE = 'sets';
const SEARCH_LIMIT = 25;
const MEMORY = ':memory:';

// Shape of one `sets` row as SQLite returns it.
const rowSchema = z.object({
  set_id: z.string(),
  name: z.string(),
  theme: z.string(),
  piece_count: z.number(),
  price: z.number().nullable(),
  release_year: z.number().nullable(),
  description: z.string().nullable(),
});

export type SqlValue = string | number | null;

let sqlJs: Promise<SqlJsStatic> | null = null;

// The WASM build is compiled once per process and shared by every store.
function getSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) sqlJs = initSqlJs();
  return sqlJs;
}

function toRecord(raw: unknown): SetRecord {
  const row = rowSchema.parse(raw);
  return normalizeSetRecord({
    setId: row.set_id,
    name: row.name,
    theme: row.theme,
    pieceCount: row.piece_count,
    price: row.price ?? undefined,
    releaseYear: row.release_year ?? undefined,
    description: row.description ?? undefined,
  });
}

function toParams(record: SetRecord): SqlValue[] {
  return [
    record.setId,
    record.name,
    record.theme,
    record.pieceCount,
    record.price ?? null,
    record.releaseYear ?? null,
    record.description ?? null,
  ];
}

/** Escape LIKE wildcards so user text matches literally (ESCAPE '\'). */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/**
 * Structured store for set records, backed by SQLite (sql.js).
 *
 * The database lives in memory; a file-backed store loads the file on open
 * and writes it back after every upsert. Every row read back goes through
 * normalizeSetRecord(), so a corrupted row surfaces as a ZodError instead
 * of entering the ranking pipeline.
 */
export class CatalogStore {
  private constructor(
    private readonly db: Database,
    private readonly filename: string,
  ) {
    this.db.run(`
      CREATE TABLE IF NOT EXISTS ${TABLE} (
        set_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        theme TEXT NOT NULL,
        piece_count INTEGER NOT NULL,
        price REAL,
        release_year INTEGER,
        description TEXT
      )
    `);
  }

  /** `filename` may be ":memory:". Parent directories are created on demand. */
  static async open(filename: string): Promise<CatalogStore> {
    const SQL = await getSqlJs();
    if (filename === MEMORY) return new CatalogStore(new SQL.Database(), filename);

    fs.mkdirSync(path.dirname(filename), { recursive: true });
    const data = fs.existsSync(filename) ? fs.readFileSync(filename) : undefined;
    return new CatalogStore(new SQL.Database(data), filename);
  }

  upsert(record: SetRecord): void {
    this.upsertMany([record]);
  }

  /** Insert or replace all records in one transaction. */
  upsertMany(records: readonly SetRecord[]): void {
    const insert = this.db.prepare(`
      INSERT OR REPLACE INTO ${TABLE} (set_id, name, theme, piece_count, price, release_year, description)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.db.run('BEGIN');
    try {
      for (const record of records) insert.run(toParams(record));
      this.db.run('COMMIT');
    } catch (err) {
      this.db.run('ROLLBACK');
      throw err;
    } finally {
      insert.free();
    }
    this.persist();
  }

  findById(setId: string): SetRecord | undefined {
    return this.select('WHERE set_id = ?', [setId])[0];
  }

  /**
   * Run a filtered query: `where` is an SQL boolean expression over the
   * table's columns, `params` its positional bindings.
   *
   *   store.query('theme = ? AND release_year < ?', ['Star Wars', 2000])
   */
  query(where: string, params: readonly SqlValue[] = []): SetRecord[] {
    return this.select(`WHERE ${where}`, params);
  }

  /**
   * Text search over one candidate query: exact set number or set number
   * variant ("75192" → "75192-1"), or a case-insensitive substring of
   * name, theme or description.
   */
  searchByText(text: string): SetRecord[] {
    const term = text.trim();
    if (!term) return [];
    const like = `%${escapeLike(term)}%`;
    return this.select(
      `WHERE set_id = ? OR set_id LIKE ? ESCAPE '\\' OR name LIKE ? ESCAPE '\\'
         OR theme LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\'
       ORDER BY rowid LIMIT ${SEARCH_LIMIT}`,
      [term, `${escapeLike(term)}-%`, like, like, like],
    );
  }

  private select(clause: string, params: readonly SqlValue[]): SetRecord[] {
    return this.rows(`SELECT * FROM ${TABLE} ${clause}`, params).map(toRecord);
  }

  private rows(sql: string, params: readonly SqlValue[]): unknown[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind([...params]);
      const rows: unknown[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  count(): number {
    const [row] = this.rows(`SELECT COUNT(*) AS n FROM ${TABLE}`, []);
    return z.object({ n: z.number() }).parse(row).n;
  }

  close(): void {
    this.db.close();
  }

  private persist(): void {
    if (this.filename === MEMORY) return;
    fs.writeFileSync(this.filename, this.db.export());
  }
}
