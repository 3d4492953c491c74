// Sandbay Slack Files - Download thread attachments for upload into the sandbox

import { posix } from 'node:path';
import { describeError } from '../../core/errors.js';
import type { ThreadMessage } from '../types.js';

export const MAX_ATTACHMENT_BYTES = 10 * 1024 * 1024;

const BINARY_MIME_PREFIXES = ['image/', 'audio/', 'video/', 'application/pdf', 'application/zip'];

export type FileDownloader = (url: string) => Promise<ArrayBuffer>;

export interface ThreadFiles {
  /** Decoded as UTF-8 and sent as request files. */
  text: Record<string, string>;
  /** Uploaded as raw bytes. */
  binary: Record<string, ArrayBuffer>;
}

export function isBinaryMimetype(mimetype: string): boolean {
  return BINARY_MIME_PREFIXES.some((prefix) => mimetype.startsWith(prefix));
}

/** Base name of an attachment, or null when nothing usable is left. */
export function attachmentFileName(name: string): string | null {
  const base = posix.basename(name.replace(/\\/g, '/'));
  if (!base || base === '.' || base === '..') return null;
  return base;
}

/** Private Slack file URLs need the bot token. */
export function slackDownloader(token: string, fetchImpl: typeof fetch = fetch): FileDownloader {
  return async (url) => {
    const response = await fetchImpl(url, { headers: { Authorization: `Bearer ${token}` } });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    return response.arrayBuffer();
  };
}

/**
 * Fetch every attachment users shared in the thread. The bot's own files,
 * files over the size limit and failed downloads are skipped; a later file
 * with the same name replaces an earlier one.
 */
export async function downloadThreadFiles(
  messages: ThreadMessage[],
  botUserId: string,
  download: FileDownloader,
  requestId: string,
): Promise<ThreadFiles> {
  const files: ThreadFiles = { text: {}, binary: {} };

  for (const message of messages) {
    if (message.user === botUserId) continue;

    for (const file of message.files) {
      const name = attachmentFileName(file.name);
      if (!name || !file.url) continue;
      if (file.size > MAX_ATTACHMENT_BYTES) {
        console.warn(`[${requestId}] Skipping large file: ${file.name} (${file.size} bytes)`);
        continue;
      }

      let data: ArrayBuffer;
      try {
        data = await download(file.url);
      } catch (err) {
        console.warn(`[${requestId}] Failed to download ${file.name}: ${describeError(err)}`);
        continue;
      }

      if (isBinaryMimetype(file.mimetype)) {
        delete files.text[name];
        files.binary[name] = data;
      } else {
        delete files.binary[name];
        files.text[name] = Buffer.from(data).toString('utf-8');
      }
    }
  }

  return files;
}
