// Sandbay E2B Provider - SandboxProvider backed by E2B microVM sandboxes

import { CommandExitError, NotFoundError, Sandbox, SandboxError } from 'e2b';
import { ExecutionError, TemplateNotFoundError, describeError } from '../core/errors.js';
import type { FileEntry } from '../core/types.js';
import type {
  ConnectSandboxOptions,
  CreateSandboxOptions,
  RunCommandOptions,
  SandboxHandle,
  SandboxProvider,
} from './provider.js';

/**
 * Sandbox creation reports a missing template as a plain SandboxError whose
 * message carries the HTTP status; other paths raise NotFoundError.
 */
export function isTemplateNotFound(err: unknown): boolean {
  if (err instanceof NotFoundError) return true;
  return err instanceof SandboxError && /^404\b/.test(err.message);
}

class E2BSandboxHandle implements SandboxHandle {
  constructor(private readonly sandbox: Sandbox) {}

  get sandboxId(): string {
    return this.sandbox.sandboxId;
  }

  async run(command: string, options: RunCommandOptions): Promise<void> {
    options.signal?.throwIfAborted();

    const handle = await this.sandbox.commands.run(command, {
      background: true,
      timeoutMs: options.timeoutMs,
      onStdout: options.onStdout,
      onStderr: options.onStderr,
    });

    const onAbort = () => {
      handle.kill().catch((err: unknown) => {
        console.warn(`[E2B] Failed to kill command in sandbox ${this.sandboxId}: ${describeError(err)}`);
      });
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) onAbort();

    try {
      await handle.wait();
      options.signal?.throwIfAborted();
    } catch (err) {
      if (options.signal?.aborted) {
        throw options.signal.reason;
      }
      if (err instanceof CommandExitError) {
        throw new ExecutionError(`Command exited with code ${err.exitCode}`, err.exitCode, { cause: err });
      }
      throw err;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  async writeFiles(entries: FileEntry[]): Promise<void> {
    await this.sandbox.files.write(entries.map((entry) => ({ path: entry.path, data: entry.data })));
  }

  async destroy(): Promise<void> {
    await this.sandbox.kill();
  }
}

export class E2BSandboxProvider implements SandboxProvider {
  async create(options: CreateSandboxOptions): Promise<SandboxHandle> {
    try {
      const sandbox = await Sandbox.create(options.template, {
        apiKey: options.apiKey,
        timeoutMs: options.timeoutMs,
        envs: options.envs,
        metadata: options.metadata,
      });
      return new E2BSandboxHandle(sandbox);
    } catch (err) {
      if (isTemplateNotFound(err)) {
        throw new TemplateNotFoundError(options.template, { cause: err });
      }
      throw err;
    }
  }

  async connect(sandboxId: string, options: ConnectSandboxOptions): Promise<SandboxHandle> {
    const sandbox = await Sandbox.connect(sandboxId, { apiKey: options.apiKey });
    await sandbox.setTimeout(options.timeoutMs);
    return new E2BSandboxHandle(sandbox);
  }
}
