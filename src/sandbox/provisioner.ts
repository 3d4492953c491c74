// Sandbay Sandbox Provisioner - Create/reconnect, batched uploads and guaranteed teardown

import { posix } from 'node:path';
import { ProvisioningError, TemplateNotFoundError, UploadError, describeError } from '../core/errors.js';
import type { FileData, FileEntry, SkillSet } from '../core/types.js';
import type { SandboxHandle, SandboxProvider } from './provider.js';
import type { ResidentFiles } from './resident-files.js';
import { DEFAULT_SANDBOX_CONFIG, sdkInstallCommand, type SandboxConfig } from './sandbox-config.js';
import type { CommandTask } from './stream-bridge.js';

export interface CreateOptions {
  apiKey?: string;
  /** Seconds. */
  timeoutSecs: number;
  envs: Record<string, string>;
  /** Correlation id tagged onto the sandbox metadata. */
  requestId: string;
}

export interface ReconnectOptions {
  apiKey?: string;
  timeoutSecs: number;
  requestId: string;
}

export interface UploadOptions {
  requestId: string;
  /** Skip entries already present with identical content. */
  resident?: ResidentFiles;
}

export interface CleanupOptions {
  keepAlive?: boolean;
  requestId: string;
}

/** Single-quote for a POSIX shell when the value needs it. */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./@%+=:,-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Deepest parent directories of the given paths, sorted, without the ones
 * `mkdir -p` would create anyway and without any listed in `existing`.
 */
export function parentDirectories(paths: string[], existing: string[] = []): string[] {
  const skip = new Set(existing);
  const dirs = new Set<string>();
  for (const path of paths) {
    const dir = posix.dirname(path);
    if (dir !== '.' && dir !== '/' && !skip.has(dir)) dirs.add(dir);
  }
  const sorted = [...dirs].sort();
  return sorted.filter((dir) => !sorted.some((other) => other !== dir && other.startsWith(`${dir}/`)));
}

export class SandboxProvisioner {
  constructor(
    private readonly provider: SandboxProvider,
    private readonly config: SandboxConfig = DEFAULT_SANDBOX_CONFIG,
  ) {}

  get sandboxConfig(): SandboxConfig {
    return this.config;
  }

  /**
   * Create from the primary template; on "template not found" fall back once
   * to the generic template and install the agent SDK into it.
   */
  async create(options: CreateOptions): Promise<SandboxHandle> {
    const base = {
      apiKey: options.apiKey,
      timeoutMs: options.timeoutSecs * 1000,
      envs: options.envs,
      metadata: { request_id: options.requestId },
    };

    try {
      const handle = await this.provider.create({ ...base, template: this.config.template });
      console.info(`[${options.requestId}] Sandbox ${handle.sandboxId} created from template ${this.config.template}`);
      return handle;
    } catch (err) {
      if (!(err instanceof TemplateNotFoundError)) {
        throw new ProvisioningError(`Failed to create sandbox: ${describeError(err)}`, { cause: err });
      }
      console.warn(
        `[${options.requestId}] Template "${this.config.template}" not found, falling back to "${this.config.fallbackTemplate}"`
      );
    }

    let handle: SandboxHandle;
    try {
      handle = await this.provider.create({ ...base, template: this.config.fallbackTemplate });
    } catch (err) {
      throw new ProvisioningError(`Failed to create sandbox from fallback template: ${describeError(err)}`, {
        cause: err,
      });
    }

    console.info(`[${options.requestId}] Installing agent SDK ${this.config.sdkVersion} in sandbox ${handle.sandboxId}`);
    try {
      await handle.run(sdkInstallCommand(this.config), { timeoutMs: this.config.sdkInstallTimeout * 1000 });
    } catch (err) {
      await this.destroyQuietly(handle, options.requestId);
      throw new ProvisioningError(`Failed to install agent SDK: ${describeError(err)}`, { cause: err });
    }
    return handle;
  }

  /** Bind to a live sandbox; its lifetime is reset to `timeoutSecs`, not extended. */
  async reconnect(sandboxId: string, options: ReconnectOptions): Promise<SandboxHandle> {
    try {
      const handle = await this.provider.connect(sandboxId, {
        apiKey: options.apiKey,
        timeoutMs: options.timeoutSecs * 1000,
      });
      console.info(`[${options.requestId}] Reconnected to sandbox ${sandboxId}`);
      return handle;
    } catch (err) {
      throw new ProvisioningError(`Failed to reconnect to sandbox ${sandboxId}: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  /** `files` keys are relative to the sandbox working directory. Returns the absolute paths written. */
  async uploadFiles(handle: SandboxHandle, files: Record<string, FileData>, options: UploadOptions): Promise<string[]> {
    const entries = Object.entries(files).map(([relPath, data]) => ({
      path: posix.join(this.config.workdir, relPath),
      data,
    }));
    return this.writeBatch(handle, entries, options);
  }

  /** Each skill lands in `<workdir>/.claude/skills/<name>/`. */
  async uploadSkills(handle: SandboxHandle, skills: SkillSet, options: UploadOptions): Promise<string[]> {
    const root = posix.join(this.config.workdir, '.claude', 'skills');
    const entries: FileEntry[] = [];
    for (const [name, files] of Object.entries(skills)) {
      for (const [relPath, data] of Object.entries(files)) {
        entries.push({ path: posix.join(root, name, relPath), data });
      }
    }
    return this.writeBatch(handle, entries, options);
  }

  /** One `mkdir -p` for every missing parent, then one write call. */
  async writeBatch(handle: SandboxHandle, entries: FileEntry[], options: UploadOptions): Promise<string[]> {
    const pending = options.resident ? options.resident.pending(entries) : entries;
    if (pending.length === 0) return [];

    const paths = pending.map((entry) => entry.path);
    const dirs = parentDirectories(paths, [this.config.workdir]);
    if (dirs.length > 0) {
      await this.makeDirectories(handle, dirs, paths, options.requestId);
    }

    try {
      await handle.writeFiles(pending);
    } catch (err) {
      console.error(`[${options.requestId}] Upload failed for ${paths.join(', ')}`);
      throw new UploadError(paths, { cause: err });
    }

    options.resident?.commit(pending);
    console.info(`[${options.requestId}] Uploaded ${pending.length} file(s)`);
    return paths;
  }

  /** A failure is reported against `paths`, the files the directories were made for. */
  async makeDirectories(handle: SandboxHandle, dirs: string[], paths: string[], requestId: string): Promise<void> {
    if (dirs.length === 0) return;
    try {
      await handle.run(`mkdir -p ${dirs.map(shellQuote).join(' ')}`, {
        timeoutMs: this.config.setupTimeout * 1000,
      });
    } catch (err) {
      console.error(`[${requestId}] Failed to create directories ${dirs.join(', ')}`);
      throw new UploadError(paths, { cause: err });
    }
  }

  /**
   * Reconcile the background task, then destroy the sandbox unless it is kept
   * for reuse. Never throws.
   */
  async cleanup(handle: SandboxHandle, task: CommandTask | null, options: CleanupOptions): Promise<void> {
    if (task) {
      if (!task.done) {
        console.info(`[${options.requestId}] Cancelling agent command`);
        task.cancel();
      }
      const outcome = await task.outcome;
      if (outcome.status === 'failed') {
        console.warn(`[${options.requestId}] Agent command failed (suppressed): ${describeError(outcome.error)}`);
      }
    }

    if (options.keepAlive) {
      console.info(`[${options.requestId}] Keeping sandbox ${handle.sandboxId} alive for reuse`);
      return;
    }
    await this.destroyQuietly(handle, options.requestId);
  }

  private async destroyQuietly(handle: SandboxHandle, requestId: string): Promise<void> {
    try {
      await handle.destroy();
      console.info(`[${requestId}] Sandbox ${handle.sandboxId} destroyed`);
    } catch (err) {
      console.warn(`[${requestId}] Failed to destroy sandbox ${handle.sandboxId}: ${describeError(err)}`);
    }
  }
}
