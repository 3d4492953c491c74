// Sandbay Run Store - Recent runs in memory, persisted as append-only JSONL

import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { RUN_STORE_MAX_RUNS, RUN_STORE_PATH } from '../config/default-config.js';
import { describeError } from '../core/errors.js';
import type { Feedback, RunRecord } from '../core/types.js';

const PROMPT_PREVIEW_CHARS = 100;

const runRecordSchema = z.object({
  id: z.string().min(1),
  prompt: z.string(),
  model: z.string().nullable().default(null),
  status: z.enum(['running', 'completed', 'error']),
  startedAt: z.string(),
  costUsd: z.number().nullable().default(null),
  numTurns: z.number().int().nullable().default(null),
  durationSecs: z.number().nullable().default(null),
  error: z.string().nullable().default(null),
  filesCount: z.number().int().default(0),
  feedback: z.enum(['positive', 'negative']).nullable().default(null),
  feedbackUser: z.string().nullable().default(null),
});

/** Fields a later line may overwrite when the same run appears again. */
const MUTABLE_FIELDS = [
  'status',
  'costUsd',
  'numTurns',
  'durationSecs',
  'error',
  'model',
  'feedback',
  'feedbackUser',
] as const;

export interface CompleteRunInput {
  costUsd?: number | null;
  numTurns?: number | null;
  durationSecs?: number | null;
  model?: string | null;
}

export class RunStore {
  private readonly path: string;
  private readonly maxRuns: number;
  private runs: RunRecord[] = [];
  private index = new Map<string, RunRecord>();

  constructor(path: string = RUN_STORE_PATH, maxRuns: number = RUN_STORE_MAX_RUNS) {
    this.path = path;
    this.maxRuns = maxRuns;
    this.loadFromFile();
  }

  get size(): number {
    return this.runs.length;
  }

  /** Registered in memory only; persisted once it completes or fails. */
  create(id: string, prompt: string, model: string | null, filesCount = 0): RunRecord {
    const run: RunRecord = {
      id,
      prompt: prompt.slice(0, PROMPT_PREVIEW_CHARS),
      model,
      status: 'running',
      startedAt: new Date().toISOString(),
      costUsd: null,
      numTurns: null,
      durationSecs: null,
      error: null,
      filesCount,
      feedback: null,
      feedbackUser: null,
    };
    this.push(run);
    return run;
  }

  complete(id: string, input: CompleteRunInput = {}): void {
    const run = this.lookup(id, 'complete');
    if (!run) return;
    run.status = 'completed';
    run.costUsd = input.costUsd ?? null;
    run.numTurns = input.numTurns ?? null;
    run.durationSecs = input.durationSecs ?? null;
    if (input.model) run.model = input.model;
    this.appendToFile(run);
  }

  fail(id: string, error: string, durationSecs: number | null = null): void {
    const run = this.lookup(id, 'fail');
    if (!run) return;
    run.status = 'error';
    run.error = error;
    run.durationSecs = durationSecs;
    this.appendToFile(run);
  }

  setFeedback(id: string, feedback: Feedback, user: string): void {
    const run = this.lookup(id, 'setFeedback');
    if (!run) return;
    run.feedback = feedback;
    run.feedbackUser = user;
    this.appendToFile(run);
  }

  get(id: string): RunRecord | undefined {
    const run = this.index.get(id);
    return run ? { ...run } : undefined;
  }

  /** Newest first. */
  list(limit = 50): RunRecord[] {
    return this.runs
      .slice()
      .reverse()
      .slice(0, Math.max(0, limit))
      .map((run) => ({ ...run }));
  }

  private lookup(id: string, operation: string): RunRecord | undefined {
    const run = this.index.get(id);
    if (!run) {
      console.warn(`[RunStore] ${operation}: unknown run id=${id}`);
    }
    return run;
  }

  private push(run: RunRecord): void {
    if (this.index.has(run.id)) {
      this.runs = this.runs.filter((existing) => existing.id !== run.id);
    }
    this.runs.push(run);
    this.index.set(run.id, run);
    while (this.runs.length > this.maxRuns) {
      const evicted = this.runs.shift();
      if (evicted) this.index.delete(evicted.id);
    }
  }

  private appendToFile(run: RunRecord): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      appendFileSync(this.path, JSON.stringify(run) + '\n', 'utf-8');
    } catch (err) {
      console.warn(`[RunStore] Failed to write ${this.path}: ${describeError(err)}`);
    }
  }

  private loadFromFile(): void {
    if (!existsSync(this.path)) return;

    let content: string;
    try {
      content = readFileSync(this.path, 'utf-8');
    } catch (err) {
      console.warn(`[RunStore] Failed to read ${this.path}: ${describeError(err)}`);
      return;
    }

    for (const line of content.split('\n')) {
      if (!line.trim()) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        console.warn(`[RunStore] Skipping malformed line in ${this.path}`);
        continue;
      }
      const parsed = runRecordSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn(`[RunStore] Skipping malformed line in ${this.path}`);
        continue;
      }

      const run: RunRecord = parsed.data;
      const existing = this.index.get(run.id);
      if (existing) {
        mergeLatest(existing, run);
      } else {
        this.push(run);
      }
    }
  }
}

function mergeLatest(target: RunRecord, latest: RunRecord): void {
  for (const field of MUTABLE_FIELDS) {
    assignIfSet(target, latest, field);
  }
}

function assignIfSet<K extends (typeof MUTABLE_FIELDS)[number]>(target: RunRecord, source: RunRecord, key: K): void {
  const value = source[key];
  if (value !== null) target[key] = value;
}
