import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { streamToChat } from '../src/channels/chat-stream.js';
import type { ChatStreamer, RunSummary } from '../src/channels/types.js';
import { RunStore } from '../src/store/run-store.js';

class RecordingStreamer implements ChatStreamer {
  readonly appended: string[] = [];
  readonly stops: Array<RunSummary | undefined> = [];

  async append(markdown: string): Promise<void> {
    this.appended.push(markdown);
  }

  async stop(summary?: RunSummary): Promise<void> {
    this.stops.push(summary);
  }
}

async function* fromLines(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line;
}

/** 1.234s between the first and every later reading. */
function fakeClock(): () => number {
  return vi.fn<() => number>().mockReturnValueOnce(1_000).mockReturnValue(2_234);
}

const SYSTEM_INIT = JSON.stringify({ type: 'system', subtype: 'init', model: 'claude-sonnet' });
const ASSISTANT = JSON.stringify({
  type: 'assistant',
  message: {
    content: [
      { type: 'text', text: 'Hello' },
      { type: 'tool_use', name: 'Bash', input: { command: 'ls' } },
    ],
  },
});
const RESULT = JSON.stringify({ type: 'result', subtype: 'success', num_turns: 2, total_cost_usd: 0.03 });

let tempDir: string;
let streamer: RecordingStreamer;

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'debug').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  tempDir = mkdtempSync(join(tmpdir(), 'sandbay-chat-test-'));
  streamer = new RecordingStreamer();
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('streamToChat', () => {
  it('streams text, reports progress and finishes with a summary', async () => {
    const store = new RunStore(join(tempDir, 'runs.jsonl'));
    const setStatus = vi.fn(async (_status: string) => {});

    const metadata = await streamToChat(fromLines([SYSTEM_INIT, ASSISTANT, RESULT]), streamer, {
      runId: 'r1',
      prompt: 'list files',
      store,
      setStatus,
      now: fakeClock(),
    });

    expect(metadata).toEqual({
      model: 'claude-sonnet',
      costUsd: 0.03,
      numTurns: 2,
      durationSecs: 1.2,
      error: null,
    });
    expect(streamer.appended).toEqual(['Hello']);
    expect(streamer.stops).toEqual([
      { runId: 'r1', model: 'claude-sonnet', costUsd: 0.03, numTurns: 2, durationSecs: 1.2 },
    ]);
    expect(setStatus.mock.calls).toEqual([['Running agent on claude-sonnet...'], ['Using Bash...']]);
    expect(store.get('r1')).toMatchObject({ status: 'completed', model: 'claude-sonnet', numTurns: 2 });
  });

  it('shows an error event in the reply and records the failure', async () => {
    const store = new RunStore(join(tempDir, 'runs.jsonl'));

    const metadata = await streamToChat(
      fromLines([JSON.stringify({ type: 'error', error: 'Sandbox creation failed' })]),
      streamer,
      { runId: 'r2', prompt: 'p', store, now: fakeClock() },
    );

    expect(metadata.error).toBe('Sandbox creation failed');
    expect(metadata.durationSecs).toBe(1.2);
    expect(streamer.appended).toEqual(['\n:warning: Error: Sandbox creation failed']);
    expect(streamer.stops).toEqual([undefined]);
    expect(store.get('r2')).toMatchObject({ status: 'error', error: 'Sandbox creation failed' });
  });

  it('captures a failing sequence in the metadata and still stops the reply', async () => {
    async function* failing(): AsyncGenerator<string> {
      yield ASSISTANT;
      throw new Error('connection lost');
    }

    const metadata = await streamToChat(failing(), streamer, { runId: 'r3', prompt: 'p', now: fakeClock() });

    expect(metadata.error).toBe('connection lost');
    expect(streamer.appended).toEqual(['Hello']);
    expect(streamer.stops).toEqual([undefined]);
  });

  it('ignores lines that are not JSON objects', async () => {
    const metadata = await streamToChat(fromLines(['garbage', '[1,2]', RESULT]), streamer, {
      runId: 'r4',
      prompt: 'p',
      now: fakeClock(),
    });

    expect(metadata.numTurns).toBe(2);
    expect(streamer.appended).toEqual([]);
    expect(streamer.stops).toHaveLength(1);
  });

  it('keeps streaming when a status update fails', async () => {
    const setStatus = vi.fn(async () => {
      throw new Error('rate limited');
    });

    const metadata = await streamToChat(fromLines([ASSISTANT, RESULT]), streamer, {
      runId: 'r5',
      prompt: 'p',
      setStatus,
      now: fakeClock(),
    });

    expect(metadata.error).toBeNull();
    expect(console.warn).toHaveBeenCalledWith('[r5] Failed to set status: rate limited');
  });
});
