import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

const SCHEMA_FILE = /^(\d+)_[\w-]+\.sql$/;

interface SchemaStep {
  version: number;
  file: string;
}

function schemaDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/**
 * Schema steps shipped with the package, ordered by the number that prefixes
 * each file name.
 */
export function listSchemaSteps(dir = schemaDir()): SchemaStep[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Schema directory not found: ${dir}`);
  }
  const steps: SchemaStep[] = [];
  for (const file of fs.readdirSync(dir)) {
    const match = SCHEMA_FILE.exec(file);
    if (match) steps.push({ version: Number(match[1]), file });
  }
  return steps.sort((a, b) => a.version - b.version);
}

/**
 * Bring the ledger schema up to date. The applied version lives in SQLite's
 * `user_version`, so a ledger file carries no bookkeeping table. All pending
 * steps commit together or not at all.
 */
export function ensureSchema(
  db: Database.Database,
  dir = schemaDir(),
): { from: number; to: number } {
  const steps = listSchemaSteps(dir);
  const latest = steps.length > 0 ? steps[steps.length - 1].version : 0;
  const current = Number(db.pragma('user_version', { simple: true }));

  if (current > latest) {
    throw new DbError(
      `Ledger schema version ${current} is newer than this release supports (${latest})`,
      { current, latest },
    );
  }

  const pending = steps.filter((s) => s.version > current);
  if (pending.length === 0) return { from: current, to: current };

  const upgrade = db.transaction(() => {
    for (const step of pending) {
      db.exec(fs.readFileSync(path.join(dir, step.file), 'utf-8'));
    }
    db.pragma(`user_version = ${latest}`);
  });

  try {
    upgrade();
  } catch (err) {
    throw new DbError(`Ledger schema upgrade to version ${latest} failed`, {
      from: current,
      cause: errorMessage(err),
    });
  }

  logger.debug({ from: current, to: latest }, 'Ledger schema upgraded');
  return { from: current, to: latest };
}
