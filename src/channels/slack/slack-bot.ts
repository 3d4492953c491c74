// Sandbay Slack Bot - Bolt app (Socket Mode) running mentions and DMs in pooled sandboxes

import type { App, BlockAction, ButtonAction } from '@slack/bolt';
import type { SlackBotConfig } from '../../config/default-config.js';
import { describeError } from '../../core/errors.js';
import type { ExecutionRequest } from '../../core/types.js';
import { conversationKey, type ExecutionPool } from '../../pool/execution-pool.js';
import { newRequestId, type RunOptions } from '../../sandbox/agent-runner.js';
import { DEFAULT_SANDBOX_CONFIG } from '../../sandbox/sandbox-config.js';
import type { RunStore } from '../../store/run-store.js';
import { ChannelAdapter } from '../channel-adapter.js';
import { streamToChat } from '../chat-stream.js';
import type { Channel, IncomingMessage, RunMetadata, StatusCallback, ThreadMessage } from '../types.js';
import {
  FEEDBACK_NEGATIVE_ACTION,
  FEEDBACK_POSITIVE_ACTION,
  buildMetadataBlocks,
  buildSlackRequest,
  buildThreadPrompt,
  feedbackBlock,
  gatherThreadContext,
  stripMentions,
  withFileListing,
} from './slack-format.js';
import { downloadThreadFiles, slackDownloader, type FileDownloader, type ThreadFiles } from './slack-files.js';
import { SlackStreamer, type SlackChatApi } from './slack-streamer.js';

type SlackClient = App['client'];

const IN_FLIGHT_REACTION = 'eyes';

/** Anything that turns a request into a line sequence; `AgentRunner` in production. */
export interface ExecutionRunner {
  run(request: ExecutionRequest, options: RunOptions): AsyncIterable<string>;
}

export interface SlackBotDeps {
  runner: ExecutionRunner;
  pool: ExecutionPool;
  store?: RunStore;
  /** Sandbox working directory that thread attachments are listed under. */
  workdir?: string;
}

/** Per-thread I/O the request handler needs, independent of Bolt. */
export interface ThreadIo {
  chat: SlackChatApi;
  botUserId: string;
  fetchThread(): Promise<ThreadMessage[]>;
  /** Without one, attachments are only named in the thread context. */
  download?: FileDownloader;
  setStatus?: StatusCallback;
}

export class SlackBot extends ChannelAdapter {
  public readonly channel: Channel = 'slack';
  private app: App | null = null;

  constructor(
    private readonly config: SlackBotConfig,
    private readonly deps: SlackBotDeps,
  ) {
    super();
  }

  async connect(): Promise<void> {
    if (!this.config.enabled) {
      throw new Error('Slack bot is not configured: set SLACK_BOT_TOKEN and SLACK_APP_TOKEN');
    }

    this.setStatus('reconnecting');

    try {
      const { App } = await import('@slack/bolt');
      const app = new App({
        token: this.config.botToken,
        appToken: this.config.appToken,
        signingSecret: this.config.signingSecret || undefined,
        socketMode: true,
      });

      app.event('app_mention', async ({ event, client, context }) => {
        const threadTs = event.thread_ts ?? event.ts;
        await this.onRequest(client, {
          channel: event.channel,
          threadTs,
          ts: event.ts,
          user: event.user ?? 'unknown',
          text: event.text,
          botUserId: context.botUserId ?? '',
          emptyReply: 'Mention me with a task!',
        });
      });

      app.message(async ({ message, client, context }) => {
        if (message.subtype !== undefined || message.channel_type !== 'im' || message.bot_id) return;
        await this.onRequest(client, {
          channel: message.channel,
          threadTs: message.thread_ts ?? message.ts,
          ts: message.ts,
          user: message.user,
          text: message.text ?? '',
          botUserId: context.botUserId ?? '',
          emptyReply: 'Please provide a prompt.',
        });
      });

      app.action<BlockAction<ButtonAction>>(FEEDBACK_POSITIVE_ACTION, async ({ ack, body, action, client }) => {
        await ack();
        await this.recordFeedback(client, body, action, true);
      });

      app.action<BlockAction<ButtonAction>>(FEEDBACK_NEGATIVE_ACTION, async ({ ack, body, action, client }) => {
        await ack();
        await this.recordFeedback(client, body, action, false);
      });

      app.error(async (error) => {
        console.error(`[SlackBot] ${describeError(error)}`);
        this.setStatus('error');
      });

      await app.start();
      this.app = app;
      this.setStatus('connected');
      console.info('[SlackBot] Connected (Socket Mode)');
    } catch (error) {
      this.setStatus('error');
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.app) {
      await this.app.stop();
      this.app = null;
    }
    this.setStatus('disconnected');
  }

  /**
   * Run one chat request through the pool: every request in a thread shares
   * (and is serialized on) that thread's sandbox.
   */
  async handleRequest(message: IncomingMessage, io: ThreadIo): Promise<RunMetadata> {
    const runId = newRequestId();
    const thread = await io.fetchThread();
    const files: ThreadFiles = io.download
      ? await downloadThreadFiles(thread, io.botUserId, io.download, runId)
      : { text: {}, binary: {} };
    const fileNames = [...Object.keys(files.text), ...Object.keys(files.binary)];

    const prompt = withFileListing(
      buildThreadPrompt(message.text, gatherThreadContext(thread, io.botUserId)),
      fileNames,
      this.deps.workdir ?? DEFAULT_SANDBOX_CONFIG.workdir,
    );
    const request = buildSlackRequest(prompt, {
      model: this.config.model,
      timeout: this.config.timeout,
      files: files.text,
    });
    const key = conversationKey(message.groupId, message.threadId);

    console.info(`[${runId}] Slack request from ${message.senderId} in ${key} (${fileNames.length} file(s))`);
    return this.deps.pool.execute(key, async (lease) => {
      const streamer = new SlackStreamer(io.chat, { channel: message.groupId, threadTs: message.threadId });
      const lines = this.deps.runner.run(request, { requestId: runId, ...lease, binaryFiles: files.binary });
      return streamToChat(lines, streamer, {
        runId,
        prompt: request.prompt,
        model: request.model,
        filesCount: fileNames.length,
        store: this.deps.store,
        setStatus: io.setStatus,
      });
    });
  }

  private async onRequest(
    client: SlackClient,
    event: {
      channel: string;
      threadTs: string;
      ts: string;
      user: string;
      text: string;
      botUserId: string;
      emptyReply: string;
    },
  ): Promise<void> {
    const text = stripMentions(event.text);
    if (!text) {
      await client.chat.postMessage({ channel: event.channel, thread_ts: event.threadTs, text: event.emptyReply });
      return;
    }

    await this.react(client, 'add', event.channel, event.ts);
    try {
      const message: IncomingMessage = {
        id: event.ts,
        channel: 'slack',
        senderId: event.user,
        text,
        groupId: event.channel,
        threadId: event.threadTs,
      };
      await this.handleRequest(message, this.threadIo(client, event.channel, event.threadTs, event.botUserId));
    } finally {
      await this.react(client, 'remove', event.channel, event.ts);
    }
  }

  private threadIo(client: SlackClient, channel: string, threadTs: string, botUserId: string): ThreadIo {
    return {
      botUserId,
      chat: {
        postMessage: (args) => client.chat.postMessage(args),
        update: (args) => client.chat.update(args),
      },
      fetchThread: () => this.fetchThread(client, channel, threadTs),
      download: slackDownloader(this.config.botToken),
    };
  }

  private async fetchThread(client: SlackClient, channel: string, threadTs: string): Promise<ThreadMessage[]> {
    const messages: ThreadMessage[] = [];
    try {
      let cursor: string | undefined;
      do {
        const result = await client.conversations.replies({ channel, ts: threadTs, limit: 200, cursor });
        for (const msg of result.messages ?? []) {
          messages.push({
            user: msg.user ?? 'unknown',
            text: msg.text ?? '',
            files: (msg.files ?? []).map((file) => ({
              name: file.name ?? 'unknown',
              mimetype: file.mimetype ?? 'unknown',
              size: file.size ?? 0,
              url: file.url_private_download ?? file.url_private,
            })),
          });
        }
        cursor = result.response_metadata?.next_cursor || undefined;
      } while (cursor);
    } catch (err) {
      console.warn(`[SlackBot] Failed to fetch thread replies: ${describeError(err)}`);
      return [];
    }
    return messages;
  }

  private async react(client: SlackClient, op: 'add' | 'remove', channel: string, timestamp: string): Promise<void> {
    try {
      if (op === 'add') {
        await client.reactions.add({ channel, timestamp, name: IN_FLIGHT_REACTION });
      } else {
        await client.reactions.remove({ channel, timestamp, name: IN_FLIGHT_REACTION });
      }
    } catch (err) {
      console.debug(`[SlackBot] Reaction ${op} failed: ${describeError(err)}`);
    }
  }

  private async recordFeedback(
    client: SlackClient,
    body: BlockAction<ButtonAction>,
    action: ButtonAction,
    positive: boolean,
  ): Promise<void> {
    const runId = action.value;
    if (!runId) return;
    const user = body.user.id;
    this.deps.store?.setFeedback(runId, positive ? 'positive' : 'negative', user);

    const channel = body.channel?.id;
    const ts = body.message?.ts;
    if (!channel || !ts) return;

    const run = this.deps.store?.get(runId);
    const blocks = run
      ? buildMetadataBlocks(
          {
            runId,
            model: run.model,
            costUsd: run.costUsd,
            numTurns: run.numTurns,
            durationSecs: run.durationSecs,
          },
          { feedback: false },
        )
      : [];
    blocks.push(feedbackBlock(user, positive));

    try {
      await client.chat.update({ channel, ts, text: 'Feedback recorded', blocks });
    } catch (err) {
      console.warn(`[SlackBot] Failed to update feedback message: ${describeError(err)}`);
    }
  }
}
