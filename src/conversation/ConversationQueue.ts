/**
 * Conversation Queue
 * Serializes work per sender while letting distinct senders run concurrently
 */

import { EventEmitter } from 'eventemitter3';
import { ConversationTask, IConversationQueue } from '../core/interfaces.js';
import { Logger, silentLogger } from '../utils/Logger.js';

type QueueEvents = {
  'conversation:active': [senderId: string];
  'conversation:idle': [senderId: string];
  'task:dropped': [senderId: string];
  'queue:aborted': [activeConversations: number];
};

export class ConversationQueue extends EventEmitter<QueueEvents> implements IConversationQueue {
  // Tail of each sender's chain; present only while the sender has work
  private chains: Map<string, Promise<void>> = new Map();
  private pendingTasks: Map<string, number> = new Map();
  private controller = new AbortController();
  private open = true;

  constructor(private logger: Logger = silentLogger) {
    super();
  }

  public get accepting(): boolean {
    return this.open;
  }

  public get activeConversations(): number {
    return this.chains.size;
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public pending(senderId: string): number {
    return this.pendingTasks.get(senderId) ?? 0;
  }

  /**
   * Appends a task to the sender's chain. Synchronous, so tasks enqueued
   * in a given order start in that order.
   */
  public enqueue(senderId: string, task: ConversationTask): boolean {
    if (!this.open) {
      this.logger.warn({ senderId }, 'Conversation queue closed, task rejected');
      return false;
    }

    const previous = this.chains.get(senderId);
    if (!previous) {
      this.emit('conversation:active', senderId);
    }
    this.pendingTasks.set(senderId, this.pending(senderId) + 1);

    const tail: Promise<void> = (previous ?? Promise.resolve())
      .then(() => this.run(senderId, task))
      .then(() => this.settle(senderId, tail));
    this.chains.set(senderId, tail);
    return true;
  }

  public async idle(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all(Array.from(this.chains.values()));
    }
  }

  /**
   * Stops accepting work and waits up to `graceMs` for every chain to empty.
   * On timeout the shared signal is aborted: tasks not yet started are
   * dropped, running ones see `signal.aborted`. Resolves `true` when drained.
   */
  public async drain(graceMs: number): Promise<boolean> {
    this.open = false;
    if (this.chains.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });
    const result = await Promise.race([this.idle().then(() => 'idle' as const), timeout]);
    clearTimeout(timer);

    if (result === 'timeout') {
      this.logger.warn(
        { activeConversations: this.chains.size, graceMs },
        'Conversations still running after grace period, aborting'
      );
      this.controller.abort();
      this.emit('queue:aborted', this.chains.size);
      return false;
    }
    return true;
  }

  private async run(senderId: string, task: ConversationTask): Promise<void> {
    const signal = this.controller.signal;
    if (signal.aborted) {
      this.logger.warn({ senderId }, 'Dropping queued task after abort');
      this.emit('task:dropped', senderId);
      return;
    }
    try {
      await task(signal);
    } catch (error) {
      this.logger.error({ err: error, senderId }, 'Conversation task failed');
    }
  }

  private settle(senderId: string, tail: Promise<void>): void {
    const remaining = this.pending(senderId) - 1;
    if (remaining > 0) {
      this.pendingTasks.set(senderId, remaining);
    } else {
      this.pendingTasks.delete(senderId);
    }

    if (this.chains.get(senderId) === tail) {
      this.chains.delete(senderId);
      this.logger.debug({ senderId }, 'Conversation idle');
      this.emit('conversation:idle', senderId);
    }
  }
}
