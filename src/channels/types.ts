// Sandbay Channels - Chat surface types

export type Channel = 'slack';

export type ChannelStatus = 'connected' | 'disconnected' | 'reconnecting' | 'error';

/** Payload of a channel adapter's `status` event. */
export interface ChannelStatusChange {
  channel: Channel;
  status: ChannelStatus;
  previous: ChannelStatus;
}

/** A chat request that will run as one execution. */
export interface IncomingMessage {
  id: string;
  channel: Channel;
  senderId: string;
  /** Mention-stripped user text. */
  text: string;
  /** Conversation scope (channel id). */
  groupId: string;
  /** Root message of the thread; sandboxes are reused per thread. */
  threadId: string;
}

export interface ThreadAttachment {
  name: string;
  mimetype: string;
  size: number;
  /** Private download URL, when Slack provides one. */
  url?: string;
}

export interface ThreadMessage {
  user: string;
  text: string;
  files: ThreadAttachment[];
}

/** Footer data shown once a run finishes. */
export interface RunSummary {
  runId: string;
  model: string | null;
  costUsd: number | null;
  numTurns: number | null;
  durationSecs: number | null;
}

export interface RunMetadata {
  model: string | null;
  costUsd: number | null;
  numTurns: number | null;
  durationSecs: number | null;
  error: string | null;
}

/** Incrementally rendered reply in a chat thread. */
export interface ChatStreamer {
  append(markdown: string): Promise<void>;
  /** Finalize the reply; a summary adds the metadata footer. */
  stop(summary?: RunSummary): Promise<void>;
}

export type StatusCallback = (status: string) => Promise<void>;
