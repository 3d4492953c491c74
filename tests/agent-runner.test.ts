import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, UploadError } from '../src/core/errors.js';
import type { BaseConfig, ExecutionRequest, SkillSet } from '../src/core/types.js';
import { AgentRunner, loadRunnerScript, type RunOptions } from '../src/sandbox/agent-runner.js';
import { SandboxProvisioner } from '../src/sandbox/provisioner.js';
import { ResidentFiles } from '../src/sandbox/resident-files.js';
import { DEFAULT_SANDBOX_CONFIG, type SandboxConfig } from '../src/sandbox/sandbox-config.js';
import {
  FakeSandboxProvider,
  assistantLine,
  emitLines,
  emitThenHang,
  resultLine,
} from './helpers/fake-sandbox.js';

const config: SandboxConfig = { ...DEFAULT_SANDBOX_CONFIG, template: 'sandbay-agent' };
const ENV = { ANTHROPIC_API_KEY: 'test-secret', E2B_API_KEY: 'test-e2b' };

const SETTINGS_PATH = '/home/user/.claude/settings.json';
const RUNNER_PATH = '/opt/agent-runner/runner.mjs';
const AGENT_CONFIG_PATH = '/opt/agent-runner/agent_config.json';

let tempDir: string;
let provider: FakeSandboxProvider;

function makeRunner(
  options: { base?: BaseConfig; skills?: SkillSet; env?: NodeJS.ProcessEnv } = {},
): AgentRunner {
  return new AgentRunner(new SandboxProvisioner(provider, config), {
    cwd: tempDir,
    env: options.env ?? ENV,
    loadConfig: () => options.base ?? null,
    loadSkills: () => options.skills ?? {},
    runnerScript: '// runner',
  });
}

function bytes(text: string): ArrayBuffer {
  const buffer = new ArrayBuffer(text.length);
  new Uint8Array(buffer).set(Array.from(text, (char) => char.charCodeAt(0)));
  return buffer;
}

function request(overrides: Partial<ExecutionRequest> = {}): ExecutionRequest {
  return { prompt: 'hello', timeout: 300, ...overrides };
}

async function collect(runner: AgentRunner, req: ExecutionRequest, options: RunOptions = {}): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of runner.run(req, { requestId: 'req-1', ...options })) lines.push(line);
  return lines;
}

function parseJson(data: string | undefined): unknown {
  return data === undefined ? undefined : JSON.parse(data);
}

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  tempDir = mkdtempSync(join(tmpdir(), 'sandbay-runner-test-'));
  provider = new FakeSandboxProvider(emitLines([assistantLine('hi'), resultLine()]));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('loadRunnerScript', () => {
  it('reads the in-sandbox runner shipped with the package', () => {
    const script = loadRunnerScript();
    expect(script).toContain("from '@anthropic-ai/claude-agent-sdk'");
    expect(script).toContain('agent_config.json');
  });
});

describe('AgentRunner.run', () => {
  it('provisions, configures, streams and destroys', async () => {
    const lines = await collect(makeRunner(), request());

    expect(lines).toEqual([assistantLine('hi'), resultLine()]);
    expect(provider.creates).toHaveLength(1);
    expect(provider.creates[0].envs).toEqual({ ANTHROPIC_API_KEY: 'test-secret' });
    expect(provider.creates[0].metadata).toEqual({ request_id: 'req-1' });

    const handle = provider.handle('sbx-1');
    expect(handle.commands).toEqual([
      'mkdir -p /home/user/.claude /opt/agent-runner',
      'node /opt/agent-runner/runner.mjs',
    ]);
    expect(handle.writes).toHaveLength(1);
    expect(handle.writes[0].map((entry) => entry.path)).toEqual([SETTINGS_PATH, RUNNER_PATH, AGENT_CONFIG_PATH]);
    expect(handle.writtenFile(RUNNER_PATH)).toBe('// runner');
    expect(parseJson(handle.writtenFile(SETTINGS_PATH))).toEqual({
      permissions: { allow: [], deny: [] },
      env: { CLAUDE_CODE_DISABLE_EXPERIMENTAL_BETAS: '1' },
    });
    expect(parseJson(handle.writtenFile(AGENT_CONFIG_PATH))).toEqual({
      prompt: 'hello',
      cwd: '/home/user',
      model: null,
      max_turns: null,
      system_prompt: null,
      output_format: null,
      agents: null,
      mcp_servers: null,
      has_skills: false,
      allowed_tools: null,
    });
    expect(handle.destroyCount).toBe(1);
  });

  it('rejects invalid names before provisioning anything', async () => {
    const attempt = collect(makeRunner(), request({ extraSkills: { 'bad name': 'x' } }));
    await expect(attempt).rejects.toBeInstanceOf(ConfigValidationError);
    expect(provider.creates).toHaveLength(0);
  });

  it('rejects missing credentials before provisioning anything', async () => {
    const attempt = collect(makeRunner({ env: {} }), request());
    await expect(attempt).rejects.toThrow('anthropicApiKey is required');
    expect(provider.creates).toHaveLength(0);
  });

  it('cancels the command and destroys once when the consumer stops early', async () => {
    const produced = Array.from({ length: 100 }, (_, i) => JSON.stringify({ type: 'user', n: i }));
    provider.runner = emitThenHang(produced);

    const received: string[] = [];
    for await (const line of makeRunner().run(request(), { requestId: 'req-1' })) {
      received.push(line);
      if (received.length === 2) break;
    }

    const handle = provider.handle('sbx-1');
    expect(received).toEqual(produced.slice(0, 2));
    expect(handle.abortCount).toBe(1);
    expect(handle.destroyCount).toBe(1);
  });

  it('stops on consumer cancellation through the signal', async () => {
    provider.runner = emitThenHang([assistantLine('partial')]);
    const controller = new AbortController();

    const received: string[] = [];
    const attempt = (async () => {
      for await (const line of makeRunner().run(request(), { requestId: 'req-1', signal: controller.signal })) {
        received.push(line);
        controller.abort();
      }
    })();

    await expect(attempt).rejects.toMatchObject({ name: 'AbortError' });
    expect(received).toEqual([assistantLine('partial')]);
    expect(provider.handle('sbx-1').destroyCount).toBe(1);
  });

  it('streams the runner error line and finishes cleanly when the runner exits non-zero', async () => {
    provider.runner = async (options) => {
      options.onStdout?.('{"type":"error","error":"SDK crashed"}\n');
      throw new Error('exit code 1');
    };

    const lines = await collect(makeRunner(), request());

    expect(lines).toEqual(['{"type":"error","error":"SDK crashed"}']);
    expect(provider.handle('sbx-1').destroyCount).toBe(1);
  });

  it('uploads skills, then files, then infrastructure', async () => {
    const runner = makeRunner({
      base: { skillsDir: 'skills', allowedTools: ['Read'] },
      skills: { alpha: { 'SKILL.md': '# Alpha' } },
    });

    await collect(runner, request({ files: { 'data.csv': '1,2' } }));

    const handle = provider.handle('sbx-1');
    expect(handle.writes.map((batch) => batch.map((entry) => entry.path))).toEqual([
      ['/home/user/.claude/skills/alpha/SKILL.md'],
      ['/home/user/data.csv'],
      [SETTINGS_PATH, RUNNER_PATH, AGENT_CONFIG_PATH],
    ]);
    expect(parseJson(handle.writtenFile(SETTINGS_PATH))).toEqual({ permissions: { allow: [], deny: [] } });
    expect(parseJson(handle.writtenFile(AGENT_CONFIG_PATH))).toMatchObject({
      has_skills: true,
      allowed_tools: ['Read', 'Skill'],
    });
  });

  it('destroys the sandbox and surfaces the error when an upload fails', async () => {
    provider.configure = (handle) => {
      handle.writeError = new Error('disk full');
    };

    const attempt = collect(makeRunner(), request({ files: { 'data.csv': '1,2' } }));
    await expect(attempt).rejects.toBeInstanceOf(UploadError);
    expect(provider.handle('sbx-1').destroyCount).toBe(1);
  });

  it('uploads GCP credentials when Vertex AI is enabled', async () => {
    writeFileSync(join(tempDir, 'sa.json'), '{"type":"service_account"}');
    const env = {
      E2B_API_KEY: 'test-e2b',
      CLAUDE_CODE_USE_VERTEX: '1',
      GOOGLE_APPLICATION_CREDENTIALS: 'sa.json',
    };

    await collect(makeRunner({ env }), request());

    const gcpPath = '/home/user/.config/gcloud/service_account.json';
    expect(provider.creates[0].envs).toEqual({
      CLAUDE_CODE_USE_VERTEX: '1',
      GOOGLE_APPLICATION_CREDENTIALS: gcpPath,
    });
    const handle = provider.handle('sbx-1');
    expect(handle.commands[0]).toBe('mkdir -p /home/user/.claude /home/user/.config/gcloud /opt/agent-runner');
    expect(handle.writtenFile(gcpPath)).toBe('{"type":"service_account"}');
  });

  it('keeps a pooled sandbox alive and reports its id', async () => {
    const onSandboxReady = vi.fn();

    await collect(makeRunner(), request(), { keepAlive: true, onSandboxReady });

    expect(onSandboxReady).toHaveBeenCalledWith('sbx-1');
    expect(provider.handle('sbx-1').destroyCount).toBe(0);
  });

  it('reconnects for reuse and uploads only what changed', async () => {
    const runner = makeRunner();
    const resident = new ResidentFiles();
    await collect(runner, request({ prompt: 'first' }), { keepAlive: true, resident });

    const onSandboxReady = vi.fn();
    const lines = await collect(runner, request({ prompt: 'second' }), {
      keepAlive: true,
      resident,
      sandboxId: 'sbx-1',
      onSandboxReady,
    });

    expect(lines).toEqual([assistantLine('hi'), resultLine()]);
    expect(provider.creates).toHaveLength(1);
    expect(provider.connects.map((c) => c.sandboxId)).toEqual(['sbx-1']);
    expect(onSandboxReady).not.toHaveBeenCalled();

    const handle = provider.handle('sbx-1');
    expect(handle.runnerRuns).toBe(2);
    expect(handle.writes[1].map((entry) => entry.path)).toEqual([AGENT_CONFIG_PATH]);
    expect(parseJson(handle.writtenFile(AGENT_CONFIG_PATH))).toMatchObject({ prompt: 'second' });
    expect(handle.destroyCount).toBe(0);
  });

  it('uploads binary files with the text files and skips both once resident', async () => {
    const runner = makeRunner();
    const resident = new ResidentFiles();
    const files = { 'notes.txt': 'hi' };

    await collect(runner, request({ prompt: 'first', files }), {
      keepAlive: true,
      resident,
      binaryFiles: { 'chart.png': bytes('PNG') },
    });
    await collect(runner, request({ prompt: 'second', files }), {
      keepAlive: true,
      resident,
      sandboxId: 'sbx-1',
      binaryFiles: { 'chart.png': bytes('PNG') },
    });

    const handle = provider.handle('sbx-1');
    expect(handle.writes[0].map((entry) => entry.path)).toEqual(['/home/user/notes.txt', '/home/user/chart.png']);
    expect(handle.writtenFile('/home/user/chart.png')).toBe('PNG');
    expect(handle.writes).toHaveLength(3);
    expect(handle.writes[2].map((entry) => entry.path)).toEqual([AGENT_CONFIG_PATH]);
  });
});
