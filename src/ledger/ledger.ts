import type Database from 'better-sqlite3';
import type { RunMode } from '../shared/config.js';
import { openDb } from '../db/db.js';
import { ensureSchema } from '../db/schema.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { nowISO } from '../shared/utils.js';
import { ledgerDomain, stripWww } from '../discovery/normalize.js';

export type UrlStatus = 'discovered' | 'imported' | 'imported_via_fallback' | 'queued' | 'failed';

export const DONE_STATUSES: readonly UrlStatus[] = ['imported', 'imported_via_fallback'];

/**
 * Row shape of the urls table.
 */
export interface UrlRecord {
  url: string;
  domain: string;
  source_key: string | null;
  discovered_at: string;
  imported_at: string | null;
  status: UrlStatus;
  last_error: string | null;
  destination_id: string | null;
  content_hash: string | null;
  needs_reimport: number;
}

/**
 * Row shape of the runs table.
 */
export interface RunRecord {
  id: number;
  mode: RunMode;
  started_at: string;
  completed_at: string | null;
  discovered_count: number;
  imported_count: number;
  failed_count: number;
  skipped_count: number;
  error_message: string | null;
}

export interface RunCounts {
  discovered: number;
  imported: number;
  failed: number;
  skipped: number;
}

export interface ImportDetails {
  destinationId?: string | null;
  contentHash?: string | null;
  error?: string | null;
}

export interface LedgerStats {
  totalUrls: number;
  totalImported: number;
  totalFailed: number;
  totalQueued: number;
  byDomain: Array<{ domain: string; count: number }>;
  lastRun: RunRecord | null;
}

const DONE_SQL = `status IN ('imported', 'imported_via_fallback')`;

function likeSubstring(value: string): string {
  return `%${value.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

/**
 * Durable per-URL import state. Owns its connection; every public method is a
 * single short transaction.
 */
export class StateLedger {
  constructor(private readonly db: Database.Database) {}

  static open(dbPath: string): StateLedger {
    const db = openDb(dbPath);
    ensureSchema(db);
    return new StateLedger(db);
  }

  close(): void {
    this.db.close();
  }

  private tx<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  isImported(url: string): boolean {
    const row = this.db
      .prepare(`SELECT 1 FROM urls WHERE url = ? AND ${DONE_SQL} AND needs_reimport = 0`)
      .get(url);
    return row !== undefined;
  }

  isSeen(url: string): boolean {
    return this.db.prepare('SELECT 1 FROM urls WHERE url = ?').get(url) !== undefined;
  }

  getRecord(url: string): UrlRecord | undefined {
    return this.db.prepare('SELECT * FROM urls WHERE url = ?').get(url) as UrlRecord | undefined;
  }

  /**
   * Insert a `discovered` row unless the URL is already known.
   */
  markDiscovered(url: string, sourceKey: string): boolean {
    return this.tx(() => {
      const result = this.db
        .prepare(
          `INSERT OR IGNORE INTO urls (url, domain, source_key, discovered_at, status)
           VALUES (?, ?, ?, ?, 'discovered')`,
        )
        .run(url, ledgerDomain(url), sourceKey, nowISO());
      return result.changes > 0;
    });
  }

  /**
   * Upsert the outcome of an import attempt. Known destination ids and content
   * hashes are never replaced by null, and any write clears the reimport flag.
   */
  recordImport(url: string, sourceKey: string, status: UrlStatus, details: ImportDetails = {}): void {
    const now = nowISO();
    const importedAt = DONE_STATUSES.includes(status) ? now : null;

    this.tx(() => {
      this.db
        .prepare(
          `INSERT INTO urls
             (url, domain, source_key, discovered_at, imported_at, status,
              destination_id, content_hash, last_error, needs_reimport)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 0)
           ON CONFLICT(url) DO UPDATE SET
             imported_at = COALESCE(excluded.imported_at, imported_at),
             status = excluded.status,
             destination_id = COALESCE(excluded.destination_id, destination_id),
             content_hash = COALESCE(excluded.content_hash, content_hash),
             last_error = excluded.last_error,
             needs_reimport = 0`,
        )
        .run(
          url,
          ledgerDomain(url),
          sourceKey,
          now,
          importedAt,
          status,
          details.destinationId ?? null,
          details.contentHash ?? null,
          details.error ?? null,
        );
    });
  }

  /**
   * Flag every record whose domain contains `domain` for another import,
   * keeping its history.
   */
  markDomainForReimport(domain: string): number {
    const pattern = likeSubstring(this.domainArgument(domain));
    return this.tx(
      () =>
        this.db
          .prepare(`UPDATE urls SET needs_reimport = 1 WHERE domain LIKE ? ESCAPE '\\'`)
          .run(pattern).changes,
    );
  }

  /**
   * Delete every record whose domain contains `domain`.
   */
  resetDomain(domain: string): number {
    const pattern = likeSubstring(this.domainArgument(domain));
    const count = this.tx(
      () => this.db.prepare(`DELETE FROM urls WHERE domain LIKE ? ESCAPE '\\'`).run(pattern).changes,
    );
    logger.info({ domain, count }, 'Domain history reset');
    return count;
  }

  private domainArgument(domain: string): string {
    const normalized = stripWww(domain);
    if (!normalized) {
      throw new DbError('A domain is required for this operation');
    }
    return normalized;
  }

  startRun(mode: RunMode): number {
    return this.tx(() => {
      const result = this.db
        .prepare('INSERT INTO runs (mode, started_at) VALUES (?, ?)')
        .run(mode, nowISO());
      return Number(result.lastInsertRowid);
    });
  }

  completeRun(runId: number, counts: RunCounts, error: string | null = null): void {
    const changes = this.tx(
      () =>
        this.db
          .prepare(
            `UPDATE runs
             SET completed_at = ?, discovered_count = ?, imported_count = ?,
                 failed_count = ?, skipped_count = ?, error_message = ?
             WHERE id = ?`,
          )
          .run(nowISO(), counts.discovered, counts.imported, counts.failed, counts.skipped, error, runId)
          .changes,
    );
    if (changes === 0) {
      throw new DbError(`Run not found: ${runId}`, { runId });
    }
  }

  getRun(runId: number): RunRecord | undefined {
    return this.db.prepare('SELECT * FROM runs WHERE id = ?').get(runId) as RunRecord | undefined;
  }

  listRuns(limit = 10): RunRecord[] {
    return this.db
      .prepare('SELECT * FROM runs ORDER BY id DESC LIMIT ?')
      .all(limit) as RunRecord[];
  }

  getStats(): LedgerStats {
    const count = (where: string): number =>
      (this.db.prepare(`SELECT COUNT(*) AS count FROM urls ${where}`).get() as { count: number }).count;

    return {
      totalUrls: count(''),
      totalImported: count(`WHERE ${DONE_SQL}`),
      totalFailed: count(`WHERE status = 'failed'`),
      totalQueued: count(`WHERE status = 'queued'`),
      byDomain: this.db
        .prepare(
          `SELECT domain, COUNT(*) AS count FROM urls
           WHERE ${DONE_SQL}
           GROUP BY domain ORDER BY count DESC, domain ASC LIMIT 20`,
        )
        .all() as Array<{ domain: string; count: number }>,
      lastRun: this.listRuns(1)[0] ?? null,
    };
  }

  getRecentFailures(limit = 20): UrlRecord[] {
    return this.db
      .prepare(`SELECT * FROM urls WHERE status = 'failed' ORDER BY discovered_at DESC, url ASC LIMIT ?`)
      .all(limit) as UrlRecord[];
  }

  getQueuedUrls(): string[] {
    const rows = this.db
      .prepare(`SELECT url FROM urls WHERE status = 'queued' ORDER BY url`)
      .all() as Array<{ url: string }>;
    return rows.map((r) => r.url);
  }
}
