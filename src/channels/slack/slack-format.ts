// Sandbay Slack Format - mrkdwn conversion, thread context and Block Kit footers

import { posix } from 'node:path';
import type { types } from '@slack/bolt';
type ActionsBlock = types.ActionsBlock;
type ContextBlock = types.ContextBlock;
type KnownBlock = types.KnownBlock;
import type { ExecutionRequest } from '../../core/types.js';
import type { RunSummary, ThreadMessage } from '../types.js';

export const FEEDBACK_POSITIVE_ACTION = 'sandbay_feedback_positive';
export const FEEDBACK_NEGATIVE_ACTION = 'sandbay_feedback_negative';

export const BOT_LABEL = 'Sandbay';

/** Slack uses mrkdwn: convert standard markdown bold (**text**) to *text*. */
export function formatForSlack(text: string): string {
  return text.replace(/\*\*(.+?)\*\*/g, '*$1*');
}

export function stripMentions(text: string): string {
  return text.replace(/<@[A-Z0-9]+>/g, '').trim();
}

export function summaryLine(summary: RunSummary): string {
  const parts: string[] = [];
  if (summary.model) parts.push(`Model: ${summary.model}`);
  if (summary.numTurns !== null) parts.push(`Turns: ${summary.numTurns}`);
  if (summary.costUsd !== null) parts.push(`Cost: $${summary.costUsd.toFixed(4)}`);
  if (summary.durationSecs !== null) parts.push(`Duration: ${summary.durationSecs.toFixed(1)}s`);
  return parts.join(' | ');
}

/** Context line (model | turns | cost | duration), then feedback buttons unless disabled. */
export function buildMetadataBlocks(summary: RunSummary, options: { feedback?: boolean } = {}): KnownBlock[] {
  const blocks: KnownBlock[] = [];
  const line = summaryLine(summary);
  if (line) {
    const context: ContextBlock = {
      type: 'context',
      elements: [{ type: 'mrkdwn', text: line }],
    };
    blocks.push(context);
  }

  if (options.feedback ?? true) {
    const actions: ActionsBlock = {
      type: 'actions',
      elements: [
        {
          type: 'button',
          text: { type: 'plain_text', text: '\u{1F44D} Helpful' },
          action_id: FEEDBACK_POSITIVE_ACTION,
          value: summary.runId,
        },
        {
          type: 'button',
          text: { type: 'plain_text', text: '\u{1F44E} Not helpful' },
          action_id: FEEDBACK_NEGATIVE_ACTION,
          value: summary.runId,
        },
      ],
    };
    blocks.push(actions);
  }
  return blocks;
}

export function feedbackBlock(userId: string, positive: boolean): ContextBlock {
  const emoji = positive ? '\u{1F44D}' : '\u{1F44E}';
  const label = positive ? 'found this helpful' : 'found this not helpful';
  return {
    type: 'context',
    elements: [{ type: 'mrkdwn', text: `${emoji} <@${userId}> ${label}` }],
  };
}

/**
 * One line per message: `[user] text`. The bot's own replies are labelled
 * and their attachments skipped.
 */
export function gatherThreadContext(messages: ThreadMessage[], botUserId: string): string {
  const lines: string[] = [];
  for (const message of messages) {
    const text = message.text.trim();

    if (message.user === botUserId) {
      if (text) lines.push(`[${BOT_LABEL}] ${text}`);
      continue;
    }

    if (text) lines.push(`[${message.user}] ${text}`);
    for (const file of message.files) {
      const sizeKb = Math.round(file.size / 1024);
      lines.push(`[${message.user}] [attached: ${file.name} (${file.mimetype}, ${sizeKb}KB)]`);
    }
  }
  return lines.join('\n');
}

export function buildThreadPrompt(prompt: string, threadContext: string): string {
  if (!threadContext) return prompt;
  return `Thread context:\n${threadContext}\n\nUser request: ${prompt}`;
}

/** Append the absolute paths of files placed in the sandbox working directory. */
export function withFileListing(prompt: string, fileNames: string[], workdir: string): string {
  if (fileNames.length === 0) return prompt;
  const listing = fileNames.map((name) => `- ${posix.join(workdir, name)}`).join('\n');
  return `${prompt}\n\nFiles available in your working directory:\n${listing}`;
}

export function buildSlackRequest(
  prompt: string,
  options: { model?: string; timeout: number; files?: Record<string, string> },
): ExecutionRequest {
  const request: ExecutionRequest = {
    prompt,
    model: options.model,
    timeout: options.timeout,
  };
  if (options.files && Object.keys(options.files).length > 0) {
    request.files = options.files;
  }
  return request;
}
