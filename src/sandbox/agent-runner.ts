// Sandbay Agent Runner - Resolve, provision, upload, run and stream one execution

import { readFileSync } from 'node:fs';
import { posix } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { loadBaseConfig, loadSkillsDir } from '../config/config-loader.js';
import { resolveExecution, toAgentConfig } from '../config/config-resolver.js';
import {
  GCP_CREDENTIALS_SANDBOX_PATH,
  buildSandboxEnv,
  readGcpCredentials,
  resolveCredentials,
} from '../config/sandbox-env.js';
import type { BaseConfig, ExecutionRequest, FileData, FileEntry, SkillSet } from '../core/types.js';
import type { SandboxHandle } from './provider.js';
import type { SandboxProvisioner } from './provisioner.js';
import type { ResidentFiles } from './resident-files.js';
import { runnerCommand } from './sandbox-config.js';
import { StreamBridge, type CommandTask } from './stream-bridge.js';

const RUNNER_SCRIPT_URL = new URL('../../runner/runner.mjs', import.meta.url);

let cachedRunnerScript: string | null = null;

export function loadRunnerScript(): string {
  cachedRunnerScript ??= readFileSync(RUNNER_SCRIPT_URL, 'utf-8');
  return cachedRunnerScript;
}

export interface AgentRunnerOptions {
  /** Host directory holding sandbay.json and relative skills_dir / credential paths. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  loadConfig?: (cwd: string) => BaseConfig | null;
  loadSkills?: (skillsDir: string, cwd: string) => SkillSet;
  runnerScript?: string;
}

export interface RunOptions {
  requestId?: string;
  /** Leave the sandbox running after the execution (pooling). */
  keepAlive?: boolean;
  /** Reconnect to this sandbox instead of creating one. */
  sandboxId?: string | null;
  /** Called with the id of a newly created sandbox, before anything is uploaded. */
  onSandboxReady?: (sandboxId: string) => void;
  resident?: ResidentFiles;
  /** Raw bytes uploaded next to `request.files`, keyed the same way. */
  binaryFiles?: Record<string, ArrayBuffer>;
  signal?: AbortSignal;
}

export function newRequestId(): string {
  return uuidv4().slice(0, 8);
}

export class AgentRunner {
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly loadConfig: (cwd: string) => BaseConfig | null;
  private readonly loadSkills: (skillsDir: string, cwd: string) => SkillSet;
  private readonly runnerScript?: string;

  constructor(
    private readonly provisioner: SandboxProvisioner,
    options: AgentRunnerOptions = {},
  ) {
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
    this.loadConfig = options.loadConfig ?? ((cwd) => loadBaseConfig(cwd));
    this.loadSkills = options.loadSkills ?? loadSkillsDir;
    this.runnerScript = options.runnerScript;
  }

  /**
   * Lazily yields raw JSON lines from the agent. Configuration and credential
   * errors are thrown before any sandbox is provisioned. Stopping iteration
   * early cancels the remote command and (unless `keepAlive`) destroys the sandbox.
   */
  async *run(request: ExecutionRequest, options: RunOptions = {}): AsyncGenerator<string, void, undefined> {
    const requestId = options.requestId ?? newRequestId();
    const config = this.provisioner.sandboxConfig;

    const base = this.loadConfig(this.cwd) ?? {};
    const diskSkills = base.skillsDir ? this.loadSkills(base.skillsDir, this.cwd) : {};
    const { spec, skills } = resolveExecution(request, base, diskSkills, config.workdir);

    const credentials = resolveCredentials(request, this.env);
    const envs = buildSandboxEnv(credentials, this.env);
    const gcpCredentials = readGcpCredentials(this.env, this.cwd);
    if (gcpCredentials) {
      envs.GOOGLE_APPLICATION_CREDENTIALS = GCP_CREDENTIALS_SANDBOX_PATH;
    }

    let handle: SandboxHandle;
    if (options.sandboxId) {
      handle = await this.provisioner.reconnect(options.sandboxId, {
        apiKey: credentials.e2bApiKey,
        timeoutSecs: request.timeout,
        requestId,
      });
    } else {
      handle = await this.provisioner.create({
        apiKey: credentials.e2bApiKey,
        timeoutSecs: request.timeout,
        envs,
        requestId,
      });
    }

    let task: CommandTask | null = null;
    try {
      if (!options.sandboxId) {
        options.onSandboxReady?.(handle.sandboxId);
      }

      const upload = { requestId, resident: options.resident };
      if (Object.keys(skills).length > 0) {
        await this.provisioner.uploadSkills(handle, skills, upload);
      }
      const files: Record<string, FileData> = { ...request.files, ...options.binaryFiles };
      if (Object.keys(files).length > 0) {
        await this.provisioner.uploadFiles(handle, files, upload);
      }

      const settings: Record<string, unknown> = { permissions: { allow: [], deny: [] } };
      if (!spec.hasSkills) {
        settings.env = { CLAUDE_CODE_DISABLE_EXPERIMENTAL_BETAS: '1' };
      }

      const infrastructure: FileEntry[] = [
        { path: posix.join(config.workdir, '.claude', 'settings.json'), data: JSON.stringify(settings, null, 2) },
        { path: posix.join(config.runnerDir, 'runner.mjs'), data: this.runnerScript ?? loadRunnerScript() },
        { path: posix.join(config.runnerDir, 'agent_config.json'), data: JSON.stringify(toAgentConfig(spec)) },
      ];
      if (gcpCredentials) {
        console.info(`[${requestId}] Uploading GCP credentials to sandbox`);
        infrastructure.push({ path: GCP_CREDENTIALS_SANDBOX_PATH, data: gcpCredentials });
      }
      await this.provisioner.writeBatch(handle, infrastructure, upload);

      console.info(
        `[${requestId}] Starting agent (model=${spec.model ?? 'default'}, max_turns=${spec.maxTurns ?? 'default'})`
      );
      const bridge = new StreamBridge({ capacity: config.queueCapacity, requestId });
      task = bridge.start(handle, runnerCommand(config), config.runnerTimeout * 1000);

      yield* bridge.lines(options.signal);
    } finally {
      await this.provisioner.cleanup(handle, task, { keepAlive: options.keepAlive, requestId });
    }
  }
}
