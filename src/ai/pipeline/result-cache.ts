/**
 * Result Cache
 *
 * Best-effort, append-only storage of each step's output, keyed by (runId, stepId).
 * Entries are written once and never overwritten. Nothing here is read back by the
 * orchestrator; the cache exists for inspection and debugging.
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { slugify, truncatedSlug } from '../../utils/slug';
import { PIPELINE_CONFIG } from './config';
import { JsonValueSchema } from './json';
import { deepFreeze } from './run-state';
import { CacheWriteError, systemClock, toError, type Clock, type JsonValue } from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Persisted document of one cache entry. Field names are stable.
 */
export const CacheEntryDocumentSchema = z.object({
  runId: z.string().min(1),
  stepId: z.string().min(1),
  topic: z.string(),
  /** 1-based write order within the run */
  sequence: z.number().int().positive(),
  /** ISO-8601 */
  writtenAt: z.string(),
  payload: JsonValueSchema,
});

export type CacheEntryDocument = z.infer<typeof CacheEntryDocumentSchema>;

/**
 * A persisted snapshot of one step's output for one run.
 */
export interface CacheEntry extends CacheEntryDocument {
  /** Where the entry lives (file path), or null for in-memory entries */
  readonly location: string | null;
}

/**
 * Identity of the run an entry belongs to.
 */
export interface CacheRunKey {
  readonly runId: string;
  readonly topic: string;
}

export interface ResultCache {
  /**
   * Writes a new immutable entry. Never throws: failures (including a second write for
   * the same runId and stepId) are logged and reported as `undefined`.
   */
  put(run: CacheRunKey, stepId: string, payload: JsonValue): Promise<CacheEntry | undefined>;
  /**
   * All entries of a run, in write order.
   */
  list(runId: string): Promise<CacheEntry[]>;
  /**
   * Called once the run is finalized. Drops the per-run bookkeeping; entries stay readable.
   */
  endRun(runId: string): void;
}

/** Steps written so far in one open run. */
interface RunWrites {
  readonly stepIds: Set<string>;
  count: number;
}

// ============================================================================
// Shared Write Path
// ============================================================================

/**
 * Enforces the (runId, stepId) uniqueness and write ordering for every backend.
 * Subclasses only decide where an entry goes.
 */
abstract class BaseResultCache implements ResultCache {
  // Only runs still in progress; endRun removes them
  private readonly openRuns = new Map<string, RunWrites>();
  protected readonly log: Logger;

  constructor(
    protected readonly clock: Clock,
    logPrefix: string
  ) {
    this.log = createPrefixedLogger(logPrefix);
  }

  async put(run: CacheRunKey, stepId: string, payload: JsonValue): Promise<CacheEntry | undefined> {
    let writes = this.openRuns.get(run.runId);
    if (!writes) {
      writes = { stepIds: new Set(), count: 0 };
      this.openRuns.set(run.runId, writes);
    }
    if (writes.stepIds.has(stepId)) {
      this.report(
        new CacheWriteError(run.runId, stepId, `Entry for step "${stepId}" already exists in run ${run.runId}`)
      );
      return undefined;
    }
    // Reserved before the first await so a concurrent duplicate is rejected too
    writes.stepIds.add(stepId);
    const sequence = ++writes.count;

    const document: CacheEntryDocument = {
      runId: run.runId,
      stepId,
      topic: run.topic,
      sequence,
      writtenAt: new Date(this.clock.now()).toISOString(),
      payload: structuredClone(payload),
    };

    try {
      const entry = await this.persist(document);
      this.log.debug(`Cached ${stepId} for run ${run.runId}${entry.location ? ` at ${entry.location}` : ''}`);
      return deepFreeze(entry);
    } catch (error) {
      const cause = toError(error);
      this.report(new CacheWriteError(run.runId, stepId, `Failed to cache step "${stepId}": ${cause.message}`, cause));
      return undefined;
    }
  }

  endRun(runId: string): void {
    this.openRuns.delete(runId);
  }

  /**
   * Number of runs whose duplicate guard is still held.
   */
  get openRunCount(): number {
    return this.openRuns.size;
  }

  abstract list(runId: string): Promise<CacheEntry[]>;

  protected abstract persist(document: CacheEntryDocument): Promise<CacheEntry>;

  private report(error: CacheWriteError): void {
    this.log.warn(`${error.name} [${error.code}]: ${error.message}`);
  }
}

function byWriteOrder(a: CacheEntry, b: CacheEntry): number {
  return a.sequence - b.sequence || a.writtenAt.localeCompare(b.writtenAt);
}

// ============================================================================
// In-Memory Backend
// ============================================================================

/**
 * Keeps entries in process memory. Used by tests and dry runs.
 */
export class InMemoryResultCache extends BaseResultCache {
  private readonly entries: CacheEntry[] = [];

  constructor(clock: Clock = systemClock) {
    super(clock, '[ResultCache:memory]');
  }

  async list(runId: string): Promise<CacheEntry[]> {
    return this.entries.filter((entry) => entry.runId === runId).sort(byWriteOrder);
  }

  /**
   * Total number of entries across all runs.
   */
  get size(): number {
    return this.entries.length;
  }

  protected async persist(document: CacheEntryDocument): Promise<CacheEntry> {
    const entry: CacheEntry = { ...document, location: null };
    this.entries.push(entry);
    return entry;
  }
}

// ============================================================================
// File Backend
// ============================================================================

/**
 * Formats an epoch timestamp as `YYYYMMDD_HHMMSS_mmm` (UTC).
 *
 * @example
 * formatFileTimestamp(Date.UTC(2025, 0, 31, 9, 5, 7, 42)) // → "20250131_090507_042"
 */
export function formatFileTimestamp(epochMs: number): string {
  const date = new Date(epochMs);
  const pad = (value: number, width = 2): string => String(value).padStart(width, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}_` +
    `${pad(date.getUTCMilliseconds(), 3)}`
  );
}

/**
 * Builds the file name of a cache entry:
 * `<topic-slug>_<step-id>_<YYYYMMDD_HHMMSS_mmm>_<run-id fragment>.json`.
 *
 * @example
 * buildCacheFileName({ runId: '3f2a9c1e-...', topic: 'Sourdough Baking' }, 'draft-writer', epochMs)
 * // → "sourdough-baking_draft-writer_20250131_090507_042_3f2a9c1e.json"
 */
export function buildCacheFileName(run: CacheRunKey, stepId: string, epochMs: number): string {
  const topicSlug = truncatedSlug(run.topic, PIPELINE_CONFIG.TOPIC_SLUG_MAX_LENGTH, 'topic');
  const stepSlug = slugify(stepId) || 'step';
  const runFragment = run.runId.replace(/[^a-zA-Z0-9]/g, '').slice(0, PIPELINE_CONFIG.RUN_ID_FRAGMENT_LENGTH) || 'run';
  return `${topicSlug}_${stepSlug}_${formatFileTimestamp(epochMs)}_${runFragment}.json`;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === code;
}

/**
 * Writes each entry as its own JSON document in `directory`.
 * Files are created exclusively (`wx`), so an existing file is never overwritten.
 *
 * @example
 * const cache = new FileResultCache(getPipelineSettings().cacheDir);
 */
export class FileResultCache extends BaseResultCache {
  constructor(
    readonly directory: string,
    clock: Clock = systemClock
  ) {
    super(clock, '[ResultCache:file]');
  }

  async list(runId: string): Promise<CacheEntry[]> {
    let fileNames: string[];
    try {
      fileNames = await readdir(this.directory);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return [];
      throw error;
    }

    const entries: CacheEntry[] = [];
    for (const fileName of fileNames.filter((name) => name.endsWith('.json'))) {
      const location = path.join(this.directory, fileName);
      const document = await this.readDocument(location);
      if (document?.runId === runId) {
        entries.push({ ...document, location });
      }
    }
    return entries.sort(byWriteOrder);
  }

  protected async persist(document: CacheEntryDocument): Promise<CacheEntry> {
    await mkdir(this.directory, { recursive: true });
    const fileName = buildCacheFileName(document, document.stepId, Date.parse(document.writtenAt));
    const location = path.join(this.directory, fileName);
    await writeFile(location, `${JSON.stringify(document, null, 2)}\n`, { encoding: 'utf8', flag: 'wx' });
    return { ...document, location };
  }

  private async readDocument(location: string): Promise<CacheEntryDocument | undefined> {
    try {
      const parsed: unknown = JSON.parse(await readFile(location, 'utf8'));
      const result = CacheEntryDocumentSchema.safeParse(parsed);
      if (!result.success) {
        this.log.debug(`Ignoring ${location}: not a cache entry`);
        return undefined;
      }
      return result.data;
    } catch (error) {
      this.log.debug(`Ignoring ${location}: ${toError(error).message}`);
      return undefined;
    }
  }
}
