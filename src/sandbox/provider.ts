// Sandbay Sandbox Provider - Port implemented by remote sandbox adapters

import type { FileEntry } from '../core/types.js';

export interface CreateSandboxOptions {
  template: string;
  apiKey?: string;
  timeoutMs: number;
  envs: Record<string, string>;
  /** Correlates lifecycle events (logs, traces, webhooks) with the request. */
  metadata: Record<string, string>;
}

export interface ConnectSandboxOptions {
  apiKey?: string;
  /** Replaces, not extends, the remaining lifetime. */
  timeoutMs: number;
}

export interface RunCommandOptions {
  timeoutMs: number;
  onStdout?: (data: string) => void;
  onStderr?: (data: string) => void;
  /** Aborting kills the remote command; `run` then rejects. */
  signal?: AbortSignal;
}

/** A live remote environment. Owned by whichever caller currently holds it. */
export interface SandboxHandle {
  readonly sandboxId: string;
  /** Resolves when the command exits with 0, rejects otherwise. */
  run(command: string, options: RunCommandOptions): Promise<void>;
  /** All-or-nothing per call. */
  writeFiles(entries: FileEntry[]): Promise<void>;
  destroy(): Promise<void>;
}

export interface SandboxProvider {
  /** Rejects with TemplateNotFoundError when the template does not exist. */
  create(options: CreateSandboxOptions): Promise<SandboxHandle>;
  connect(sandboxId: string, options: ConnectSandboxOptions): Promise<SandboxHandle>;
}
