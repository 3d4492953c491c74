// In-process stand-in for the remote sandbox service

import { TemplateNotFoundError } from '../../src/core/errors.js';
import type { FileEntry } from '../../src/core/types.js';
import type {
  ConnectSandboxOptions,
  CreateSandboxOptions,
  RunCommandOptions,
  SandboxHandle,
  SandboxProvider,
} from '../../src/sandbox/provider.js';

export type RunnerBehavior = (options: RunCommandOptions, handle: FakeSandboxHandle) => Promise<void>;

export function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/** Emits `lines` on stdout, then exits 0. */
export function emitLines(lines: string[]): RunnerBehavior {
  return async (options) => {
    for (const line of lines) options.onStdout?.(line);
  };
}

/** Emits `lines`, then keeps running until cancelled. */
export function emitThenHang(lines: string[]): RunnerBehavior {
  return async (options) => {
    for (const line of lines) options.onStdout?.(line);
    await waitForAbort(options.signal);
  };
}

export function resultLine(extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ type: 'result', subtype: 'success', num_turns: 1, total_cost_usd: 0.01, ...extra });
}

export function assistantLine(text: string): string {
  return JSON.stringify({ type: 'assistant', message: { content: [{ type: 'text', text }] } });
}

export class FakeSandboxHandle implements SandboxHandle {
  readonly commands: string[] = [];
  readonly writes: FileEntry[][] = [];
  destroyCount = 0;
  abortCount = 0;
  writeError: Error | null = null;
  destroyError: Error | null = null;
  commandError: ((command: string) => Error | null) | null = null;

  constructor(
    readonly sandboxId: string,
    public runner: RunnerBehavior,
  ) {}

  get runnerRuns(): number {
    return this.commands.filter((command) => command.includes('runner.mjs')).length;
  }

  /** Latest content written to `path`, bytes decoded as UTF-8. */
  writtenFile(path: string): string | undefined {
    for (let i = this.writes.length - 1; i >= 0; i--) {
      const entry = this.writes[i].find((file) => file.path === path);
      if (entry) return typeof entry.data === 'string' ? entry.data : Buffer.from(entry.data).toString('utf-8');
    }
    return undefined;
  }

  async run(command: string, options: RunCommandOptions): Promise<void> {
    this.commands.push(command);
    options.signal?.addEventListener('abort', () => this.abortCount++, { once: true });

    const failure = this.commandError?.(command) ?? null;
    if (failure) throw failure;

    if (command.startsWith('node ') && command.includes('runner.mjs')) {
      await this.runner(options, this);
    }
  }

  async writeFiles(entries: FileEntry[]): Promise<void> {
    if (this.writeError) throw this.writeError;
    this.writes.push(entries.map((entry) => ({ ...entry })));
  }

  async destroy(): Promise<void> {
    this.destroyCount++;
    if (this.destroyError) throw this.destroyError;
  }
}

export class FakeSandboxProvider implements SandboxProvider {
  readonly creates: CreateSandboxOptions[] = [];
  readonly connects: Array<{ sandboxId: string; options: ConnectSandboxOptions }> = [];
  readonly handles = new Map<string, FakeSandboxHandle>();
  readonly missingTemplates = new Set<string>();
  createError: Error | null = null;
  connectError: Error | null = null;
  /** Applied to every handle this provider creates. */
  configure: ((handle: FakeSandboxHandle) => void) | null = null;
  private counter = 0;

  constructor(public runner: RunnerBehavior = emitLines([resultLine()])) {}

  async create(options: CreateSandboxOptions): Promise<SandboxHandle> {
    this.creates.push(options);
    if (this.missingTemplates.has(options.template)) {
      throw new TemplateNotFoundError(options.template);
    }
    if (this.createError) throw this.createError;

    this.counter++;
    const handle = new FakeSandboxHandle(`sbx-${this.counter}`, this.runner);
    this.configure?.(handle);
    this.handles.set(handle.sandboxId, handle);
    return handle;
  }

  async connect(sandboxId: string, options: ConnectSandboxOptions): Promise<SandboxHandle> {
    this.connects.push({ sandboxId, options });
    if (this.connectError) throw this.connectError;
    const handle = this.handles.get(sandboxId);
    if (!handle) throw new Error(`sandbox ${sandboxId} not found`);
    return handle;
  }

  handle(sandboxId: string): FakeSandboxHandle {
    const handle = this.handles.get(sandboxId);
    if (!handle) throw new Error(`no fake sandbox ${sandboxId}`);
    return handle;
  }
}
