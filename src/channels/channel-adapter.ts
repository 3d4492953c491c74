// Sandbay Channel Adapter - Abstract base for chat surfaces that drive executions

import { EventEmitter } from 'node:events';
import type { Channel, ChannelStatus, ChannelStatusChange } from './types.js';

/** Emits `status` with a ChannelStatusChange whenever the connection state changes. */
export abstract class ChannelAdapter extends EventEmitter {
  protected status: ChannelStatus = 'disconnected';
  public abstract readonly channel: Channel;

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;

  protected setStatus(status: ChannelStatus): void {
    const previous = this.status;
    this.status = status;
    if (previous !== status) {
      const change: ChannelStatusChange = { channel: this.channel, status, previous };
      this.emit('status', change);
    }
  }
}
