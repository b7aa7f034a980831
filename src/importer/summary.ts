import fs from 'node:fs';
import path from 'node:path';
import type { RunResult } from './orchestrator.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

export interface RunLogEntry {
  timestamp: string;
  run_id: number;
  mode: string;
  duration_seconds: number;
  discovered: number;
  filtered: number;
  skipped: number;
  imported: number;
  failed: number;
  queued: number;
  error: string | null;
}

export function toRunLogEntry(result: RunResult, at: Date = new Date()): RunLogEntry {
  return {
    timestamp: at.toISOString(),
    run_id: result.runId,
    mode: result.mode,
    duration_seconds: Math.round(result.durationSeconds * 10) / 10,
    ...result.stats,
    error: result.error,
  };
}

export function formatSummary(result: RunResult): string[] {
  const { stats } = result;
  const lines = [
    `Import ${result.success ? 'complete' : 'finished with problems'} (run #${result.runId}, ${result.mode})`,
    `  Duration:                   ${result.durationSeconds.toFixed(1)}s`,
    `  Discovered:                 ${stats.discovered}`,
    `  Filtered out:               ${stats.filtered}`,
    `  Skipped (already imported): ${stats.skipped}`,
    `  Imported:                   ${stats.imported}`,
    `  Failed:                     ${stats.failed}`,
    `  Queued:                     ${stats.queued}`,
  ];
  if (result.cancelled) lines.push('  Stopped early on request');
  if (result.error) lines.push(`  Error: ${result.error}`);
  return lines;
}

/**
 * Append one JSON line per run. A log that cannot be written is reported but
 * never fails the run.
 */
export function appendRunLog(logPath: string, result: RunResult, at?: Date): void {
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.appendFileSync(logPath, `${JSON.stringify(toRunLogEntry(result, at))}\n`, 'utf-8');
  } catch (err) {
    logger.warn({ path: logPath, error: errorMessage(err) }, 'Could not write run log');
  }
}
