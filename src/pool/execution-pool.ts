// Sandbay Execution Pool - Per-conversation sandbox reuse with serialized access

import { MAX_POOL_ENTRIES } from '../config/default-config.js';
import { describeError } from '../core/errors.js';
import { ResidentFiles } from '../sandbox/resident-files.js';
import { Mutex } from './mutex.js';

interface PoolEntry {
  sandboxId: string | null;
  mutex: Mutex;
  resident: ResidentFiles;
}

/** What one attempt gets from the pool. Pass it straight into `AgentRunner.run`. */
export interface PoolLease {
  /** Reuse target, or null to create a fresh sandbox. */
  sandboxId: string | null;
  keepAlive: true;
  resident: ResidentFiles;
  onSandboxReady: (sandboxId: string) => void;
}

/** An attempt counts as failed when it reports an error or throws. */
export interface AttemptOutcome {
  error?: string | null;
}

export type PoolAttempt<T extends AttemptOutcome> = (lease: PoolLease) => Promise<T>;

/** `channel:thread` key scoping reuse to one conversation. */
export function conversationKey(channel: string, threadTs: string): string {
  return `${channel}:${threadTs}`;
}

/**
 * Conversation key -> live sandbox id. Executions for one key run strictly one
 * at a time; different keys run concurrently. Evicted entries are forgotten,
 * never destroyed: their sandboxes expire on their own timeout.
 */
export class ExecutionPool {
  private entries = new Map<string, PoolEntry>();

  constructor(readonly maxEntries: number = MAX_POOL_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  sandboxId(key: string): string | null {
    return this.entries.get(key)?.sandboxId ?? null;
  }

  /**
   * Run `attempt` under the key's mutex: reuse the stored sandbox if any, and
   * on failure forget it and run once more against a fresh one.
   */
  async execute<T extends AttemptOutcome>(key: string, attempt: PoolAttempt<T>): Promise<T> {
    const entry = this.touch(key);
    const release = await entry.mutex.acquire();
    try {
      // Read only after acquiring: the previous holder may have just set it.
      const existing = entry.sandboxId;
      if (existing) {
        console.info(`[Pool] Reusing sandbox ${existing} for ${key}`);
        const reused = await this.tryReuse(entry, existing, attempt);
        if (reused) return reused;

        console.warn(`[Pool] Sandbox ${existing} failed for ${key}, creating new`);
        entry.sandboxId = null;
        entry.resident = new ResidentFiles();
      }

      const resident = new ResidentFiles();
      entry.resident = resident;
      return await attempt({
        sandboxId: null,
        keepAlive: true,
        resident,
        onSandboxReady: (sandboxId) => {
          entry.sandboxId = sandboxId;
        },
      });
    } finally {
      release();
      this.evict();
    }
  }

  private async tryReuse<T extends AttemptOutcome>(
    entry: PoolEntry,
    sandboxId: string,
    attempt: PoolAttempt<T>,
  ): Promise<T | null> {
    try {
      const outcome = await attempt({
        sandboxId,
        keepAlive: true,
        resident: entry.resident,
        onSandboxReady: () => {},
      });
      return outcome.error ? null : outcome;
    } catch (err) {
      console.warn(`[Pool] Reuse of sandbox ${sandboxId} threw: ${describeError(err)}`);
      return null;
    }
  }

  /** Get or create, marking the entry most recently used. */
  private touch(key: string): PoolEntry {
    const entry = this.entries.get(key) ?? {
      sandboxId: null,
      mutex: new Mutex(),
      resident: new ResidentFiles(),
    };
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  /** Drop least recently used idle entries until within bounds. Busy entries are skipped. */
  private evict(): void {
    if (this.entries.size <= this.maxEntries) return;
    for (const [key, entry] of this.entries) {
      if (this.entries.size <= this.maxEntries) break;
      if (!entry.mutex.isIdle) continue;
      this.entries.delete(key);
      if (entry.sandboxId) {
        console.debug(`[Pool] Evicted sandbox ${entry.sandboxId} (${key}), left to expire`);
      }
    }
  }
}
