// Sandbay Chat Stream - Render an execution's event lines into a chat reply

import { describeError } from '../core/errors.js';
import { assistantText, parseStreamEvent, toolUseNames } from '../core/stream-events.js';
import type { RunStore } from '../store/run-store.js';
import type { ChatStreamer, RunMetadata, StatusCallback } from './types.js';

export interface StreamToChatOptions {
  runId: string;
  prompt: string;
  model?: string | null;
  filesCount?: number;
  store?: RunStore;
  setStatus?: StatusCallback;
  /** Milliseconds clock, injectable for tests. */
  now?: () => number;
}

function elapsedSecs(start: number, now: () => number): number {
  return Math.round((now() - start) / 100) / 10;
}

async function reportStatus(runId: string, setStatus: StatusCallback | undefined, status: string): Promise<void> {
  if (!setStatus) return;
  try {
    await setStatus(status);
  } catch (err) {
    console.warn(`[${runId}] Failed to set status: ${describeError(err)}`);
  }
}

/**
 * Consume `lines` into `streamer`. Never throws: failures of the sequence end
 * up in `metadata.error`, and the streamer is always stopped.
 */
export async function streamToChat(
  lines: AsyncIterable<string>,
  streamer: ChatStreamer,
  options: StreamToChatOptions,
): Promise<RunMetadata> {
  const { runId, store } = options;
  const now = options.now ?? Date.now;
  const metadata: RunMetadata = {
    model: null,
    costUsd: null,
    numTurns: null,
    durationSecs: null,
    error: null,
  };

  const start = now();
  let stopped = false;
  store?.create(runId, options.prompt, options.model ?? null, options.filesCount ?? 0);

  try {
    for await (const line of lines) {
      const event = parseStreamEvent(line);
      if (!event) continue;
      console.debug(`[${runId}] Event: ${event.type}`);

      switch (event.type) {
        case 'system':
          if (event.subtype === 'init' && event.model) {
            metadata.model = event.model;
            await reportStatus(runId, options.setStatus, `Running agent on ${event.model}...`);
          }
          break;

        case 'assistant':
          for (const text of assistantText(event)) {
            try {
              await streamer.append(text);
            } catch (err) {
              console.error(`[${runId}] Failed to append to chat: ${describeError(err)}`);
            }
          }
          for (const tool of toolUseNames(event)) {
            console.info(`[${runId}] Tool: ${tool}`);
            await reportStatus(runId, options.setStatus, `Using ${tool}...`);
          }
          break;

        case 'result': {
          metadata.costUsd = event.total_cost_usd ?? event.cost_usd ?? null;
          metadata.numTurns = event.num_turns ?? null;
          metadata.durationSecs = elapsedSecs(start, now);
          metadata.model = event.model || metadata.model;
          console.info(`[${runId}] Result: turns=${metadata.numTurns} cost=${metadata.costUsd}`);

          try {
            await streamer.stop({
              runId,
              model: metadata.model,
              costUsd: metadata.costUsd,
              numTurns: metadata.numTurns,
              durationSecs: metadata.durationSecs,
            });
            stopped = true;
          } catch (err) {
            console.error(`[${runId}] Failed to finish chat reply: ${describeError(err)}`);
          }

          store?.complete(runId, {
            costUsd: metadata.costUsd,
            numTurns: metadata.numTurns,
            durationSecs: metadata.durationSecs,
            model: metadata.model,
          });
          break;
        }

        case 'error':
          metadata.error = event.error;
          metadata.durationSecs = elapsedSecs(start, now);
          console.error(`[${runId}] Agent error: ${event.error}`);

          try {
            await streamer.append(`\n:warning: Error: ${event.error}`);
            await streamer.stop();
            stopped = true;
          } catch (err) {
            console.error(`[${runId}] Failed to report error in chat: ${describeError(err)}`);
          }

          store?.fail(runId, event.error, metadata.durationSecs);
          break;

        default:
          break;
      }
    }
  } catch (err) {
    metadata.error = describeError(err);
    metadata.durationSecs = elapsedSecs(start, now);
    console.error(`[${runId}] Stream error: ${metadata.error}`);
    store?.fail(runId, metadata.error, metadata.durationSecs);
  } finally {
    if (!stopped) {
      try {
        await streamer.stop();
      } catch (err) {
        console.warn(`[${runId}] Failed to stop chat reply: ${describeError(err)}`);
      }
    }
  }

  return metadata;
}
