// Sandbay Slack Streamer - Post a threaded reply, then edit it as text arrives

import type { types } from '@slack/bolt';
type KnownBlock = types.KnownBlock;
import type { ChatStreamer, RunSummary } from '../types.js';
import { buildMetadataBlocks, formatForSlack, summaryLine } from './slack-format.js';

/** The two chat calls the streamer needs; satisfied by a thin wrapper over Bolt's WebClient. */
export interface SlackChatApi {
  postMessage(args: { channel: string; thread_ts: string; text: string; blocks?: KnownBlock[] }): Promise<{ ts?: string }>;
  update(args: { channel: string; ts: string; text: string }): Promise<unknown>;
}

export interface SlackStreamerOptions {
  channel: string;
  threadTs: string;
  /** Minimum milliseconds between intermediate edits. */
  minUpdateIntervalMs?: number;
  now?: () => number;
}

export class SlackStreamer implements ChatStreamer {
  private text = '';
  private ts: string | null = null;
  private lastUpdate = 0;
  private dirty = false;
  private stopped = false;
  private readonly minUpdateIntervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly api: SlackChatApi,
    private readonly options: SlackStreamerOptions,
  ) {
    this.minUpdateIntervalMs = options.minUpdateIntervalMs ?? 1000;
    this.now = options.now ?? Date.now;
  }

  get messageTs(): string | null {
    return this.ts;
  }

  get content(): string {
    return this.text;
  }

  async append(markdown: string): Promise<void> {
    if (this.stopped || !markdown) return;
    this.text += markdown;
    this.dirty = true;

    if (this.ts === null) {
      await this.post();
      return;
    }
    if (this.now() - this.lastUpdate >= this.minUpdateIntervalMs) {
      await this.flush();
    }
  }

  async stop(summary?: RunSummary): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.ts === null && this.text) {
      await this.post();
    } else if (this.dirty) {
      await this.flush();
    }

    if (summary) {
      await this.api.postMessage({
        channel: this.options.channel,
        thread_ts: this.options.threadTs,
        text: summaryLine(summary) || 'Run finished',
        blocks: buildMetadataBlocks(summary),
      });
    }
  }

  private async post(): Promise<void> {
    const result = await this.api.postMessage({
      channel: this.options.channel,
      thread_ts: this.options.threadTs,
      text: formatForSlack(this.text),
    });
    this.ts = result.ts ?? null;
    this.lastUpdate = this.now();
    this.dirty = false;
  }

  private async flush(): Promise<void> {
    if (this.ts === null) return;
    await this.api.update({
      channel: this.options.channel,
      ts: this.ts,
      text: formatForSlack(this.text),
    });
    this.lastUpdate = this.now();
    this.dirty = false;
  }
}
