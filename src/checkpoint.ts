import { mkdirSync, readdirSync, statSync, unlinkSync } from 'node:fs';
import path from 'node:path';

import { LowSync } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import { z } from 'zod';

import { errorMessage } from './errors';
import type { Logger } from './logger';

const CompletedEntrySchema = z.object({
  url: z.string(),
  locations_found: z.number().int().min(0),
  completed_at: z.string(),
});

const FailedEntrySchema = z.object({
  url: z.string(),
  error: z.string(),
  attempted_at: z.string(),
});

export const CheckpointSchema = z.object({
  session_id: z.string().min(1),
  started: z.string(),
  completed: z.array(CompletedEntrySchema),
  failed: z.array(FailedEntrySchema),
  pending: z.array(z.string()),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;
export type CompletedEntry = z.infer<typeof CompletedEntrySchema>;
export type FailedEntry = z.infer<typeof FailedEntrySchema>;

export type CheckpointStats = {
  sessionId: string;
  started: string;
  total: number;
  completed: number;
  failed: number;
  pending: number;
  /** Share of URLs that reached a terminal state, 0–100. */
  progress: number;
  /** Completed over completed + failed, 0–100. */
  successRate: number;
};

const FILE_PATTERN = /^session_(.+)\.json$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local-time `YYYYMMDD_HHMMSS`. */
export function timestampSessionId(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export type CheckpointOptions = {
  dir: string;
  logger: Logger;
  sessionId?: string;
  now?: () => Date;
};

/**
 * Per-URL progress for one run. Every mutation is persisted synchronously
 * before it returns, and a URL is only ever in one of the three lists.
 */
export class CheckpointManager {
  private db: LowSync<Checkpoint>;
  private readonly dir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: CheckpointOptions) {
    this.dir = opts.dir;
    this.logger = opts.logger;
    this.now = opts.now ?? (() => new Date());
    mkdirSync(this.dir, { recursive: true });

    const startedAt = this.now();
    const sessionId = opts.sessionId ?? timestampSessionId(startedAt);
    this.db = this.open(sessionId, {
      session_id: sessionId,
      started: startedAt.toISOString(),
      completed: [],
      failed: [],
      pending: [],
    });
  }

  get sessionId(): string {
    return this.db.data.session_id;
  }

  get filePath(): string {
    return this.fileFor(this.sessionId);
  }

  get data(): Readonly<Checkpoint> {
    return this.db.data;
  }

  addPending(urls: string[]): void {
    const { data } = this.db;
    for (const url of urls) {
      if (this.stateOf(url) === null) data.pending.push(url);
    }
    this.save();
  }

  markCompleted(url: string, locationsFound = 1): void {
    if (!this.leavePending(url, 'completed')) return;
    this.db.data.completed.push({
      url,
      locations_found: locationsFound,
      completed_at: this.now().toISOString(),
    });
    this.save();
  }

  markFailed(url: string, error: string): void {
    if (!this.leavePending(url, 'failed')) return;
    this.db.data.failed.push({ url, error, attempted_at: this.now().toISOString() });
    this.save();
  }

  pendingUrls(): string[] {
    return [...this.db.data.pending];
  }

  completedUrls(): string[] {
    return this.db.data.completed.map((e) => e.url);
  }

  failedUrls(): string[] {
    return this.db.data.failed.map((e) => e.url);
  }

  stateOf(url: string): 'pending' | 'completed' | 'failed' | null {
    const { data } = this.db;
    if (data.pending.includes(url)) return 'pending';
    if (data.completed.some((e) => e.url === url)) return 'completed';
    if (data.failed.some((e) => e.url === url)) return 'failed';
    return null;
  }

  stats(): CheckpointStats {
    const { data } = this.db;
    const completed = data.completed.length;
    const failed = data.failed.length;
    const pending = data.pending.length;
    const total = completed + failed + pending;
    return {
      sessionId: data.session_id,
      started: data.started,
      total,
      completed,
      failed,
      pending,
      progress: total ? ((completed + failed) / total) * 100 : 0,
      successRate: (completed / Math.max(1, completed + failed)) * 100,
    };
  }

  logSummary(logger: Logger = this.logger): void {
    const s = this.stats();
    logger.section('Checkpoint Summary');
    logger.info(`  Session ID: ${s.sessionId}`);
    logger.info(`  Started: ${s.started}`);
    logger.info(`  Total URLs: ${s.total}`);
    logger.info(`  Completed: ${s.completed}`);
    logger.info(`  Failed: ${s.failed}`);
    logger.info(`  Pending: ${s.pending}`);
    logger.info(`  Progress: ${s.progress.toFixed(1)}%`);
    logger.info(`  Success Rate: ${s.successRate.toFixed(1)}%`);
  }

  /** Session ids in the checkpoint dir, newest file first. */
  listSessions(): string[] {
    return this.sessionFiles().map((f) => f.sessionId);
  }

  findLatestSession(): string | null {
    return this.listSessions()[0] ?? null;
  }

  /** Replaces the in-memory state with a stored session. False when missing or invalid. */
  load(sessionId: string): boolean {
    const file = this.fileFor(sessionId);
    let raw: unknown;
    try {
      raw = new JSONFileSync<unknown>(file).read();
    } catch (err) {
      this.logger.warn(`Skipping unreadable checkpoint ${file}: ${errorMessage(err)}`);
      return false;
    }
    if (raw === null) {
      this.logger.warn(`Checkpoint file not found: ${file}`);
      return false;
    }

    const parsed = CheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Skipping invalid checkpoint ${file}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
      return false;
    }

    this.db = this.open(sessionId, parsed.data);
    const s = this.stats();
    this.logger.info(
      `Loaded checkpoint ${sessionId}: ${s.completed} completed, ${s.failed} failed, ${s.pending} pending`
    );
    return true;
  }

  /** Loads the newest session that validates. */
  resumeLatest(): boolean {
    for (const { sessionId } of this.sessionFiles()) {
      if (this.load(sessionId)) return true;
    }
    this.logger.info('No checkpoint to resume from');
    return false;
  }

  cleanupOldCheckpoints(keep: number): string[] {
    const removed: string[] = [];
    for (const { file } of this.sessionFiles().slice(Math.max(0, keep))) {
      try {
        unlinkSync(file);
        removed.push(file);
        this.logger.debug(`Deleted old checkpoint: ${file}`);
      } catch (err) {
        this.logger.warn(`Could not delete checkpoint ${file}: ${errorMessage(err)}`);
      }
    }
    return removed;
  }

  private leavePending(url: string, target: 'completed' | 'failed'): boolean {
    const state = this.stateOf(url);
    if (state === 'completed' || state === 'failed') {
      this.logger.warn(`Ignoring ${target} mark for ${url}: already ${state}`);
      return false;
    }
    const { data } = this.db;
    data.pending = data.pending.filter((u) => u !== url);
    return true;
  }

  private save(): void {
    this.db.write();
    this.logger.debug(`Checkpoint saved: ${this.filePath}`);
  }

  private open(sessionId: string, data: Checkpoint): LowSync<Checkpoint> {
    return new LowSync<Checkpoint>(new JSONFileSync<Checkpoint>(this.fileFor(sessionId)), data);
  }

  private fileFor(sessionId: string): string {
    return path.join(this.dir, `session_${sessionId}.json`);
  }

  private sessionFiles(): Array<{ sessionId: string; file: string; mtimeMs: number }> {
    return readdirSync(this.dir)
      .flatMap((name) => {
        const match = FILE_PATTERN.exec(name);
        if (!match) return [];
        const file = path.join(this.dir, name);
        return [{ sessionId: match[1], file, mtimeMs: statSync(file).mtimeMs }];
      })
      .sort((a, b) => b.mtimeMs - a.mtimeMs);
  }
}
