/**
 * Update Dispatcher
 * Runs routed handlers per sender and sends their replies
 */

import { EventEmitter } from 'eventemitter3';
import {
  DispatchSummary,
  HandlerResult,
  IUpdateDispatcher,
  RegisteredHandler,
  ReplyContext
} from '../core/interfaces.js';
import { GatewayError } from '../core/errors.js';
import { OutboundMessage, SendResult, Update } from '../core/types.js';
import { ConversationQueue } from '../conversation/ConversationQueue.js';
import { mediaAttachment } from '../messages/templates.js';
import { AttachmentCache } from '../services/attachmentCache.js';
import { SendClient } from '../services/sendClient.js';
import { Logger, silentLogger } from '../utils/Logger.js';
import { UpdateRouter } from './UpdateRouter.js';

export interface HandlerErrorEvent {
  error: unknown;
  update: Update;
  handler: string;
}

type DispatcherEvents = {
  'update:queued': [update: Update];
  'update:processed': [update: Update];
  'handler:error': [event: HandlerErrorEvent];
};

export interface UpdateDispatcherOptions {
  router: UpdateRouter;
  sendClient: SendClient;
  queue?: ConversationQueue;
  attachments?: AttachmentCache;
  logger?: Logger;
}

function isMessage(result: HandlerResult): result is OutboundMessage {
  return typeof result === 'object' && result !== null;
}

// Plain strings are sent as text; an empty string means no reply
function toReply(result: HandlerResult): OutboundMessage | undefined {
  if (typeof result === 'string') {
    return result.length > 0 ? { text: result } : undefined;
  }
  return isMessage(result) ? result : undefined;
}

export class UpdateDispatcher extends EventEmitter<DispatcherEvents> implements IUpdateDispatcher {
  private readonly router: UpdateRouter;
  private readonly sendClient: SendClient;
  private readonly queue: ConversationQueue;
  private readonly attachments?: AttachmentCache;
  private readonly logger: Logger;

  constructor(options: UpdateDispatcherOptions) {
    super();
    this.router = options.router;
    this.sendClient = options.sendClient;
    this.logger = options.logger ?? silentLogger;
    this.queue = options.queue ?? new ConversationQueue(this.logger);
    this.attachments = options.attachments;
  }

  public get accepting(): boolean {
    return this.queue.accepting;
  }

  public get activeConversations(): number {
    return this.queue.activeConversations;
  }

  /**
   * Queues each update on its sender's chain, in iteration order.
   */
  public dispatch(updates: Iterable<Update>): DispatchSummary {
    const summary: DispatchSummary = { queued: 0, rejected: 0 };
    for (const update of updates) {
      if (this.queue.enqueue(update.senderId, (signal) => this.process(update, signal))) {
        summary.queued++;
        this.emit('update:queued', update);
      } else {
        summary.rejected++;
      }
    }
    return summary;
  }

  public idle(): Promise<void> {
    return this.queue.idle();
  }

  public shutdown(graceMs: number): Promise<boolean> {
    return this.queue.drain(graceMs);
  }

  private async process(update: Update, signal: AbortSignal): Promise<void> {
    const handlers = this.router.handlersFor(update.kind);
    if (handlers.length === 0) {
      this.logger.debug({ kind: update.kind, senderId: update.senderId }, 'No handler for update');
      this.emit('update:processed', update);
      return;
    }

    const context = this.createContext(update, signal);
    for (const handler of handlers) {
      if (signal.aborted) {
        this.logger.warn({ kind: update.kind, senderId: update.senderId }, 'Skipping remaining handlers after abort');
        break;
      }
      await this.runHandler(handler, update, context, signal);
    }
    this.emit('update:processed', update);
  }

  private async runHandler(
    handler: RegisteredHandler,
    update: Update,
    context: ReplyContext,
    signal: AbortSignal
  ): Promise<void> {
    let reply: OutboundMessage | undefined;
    try {
      reply = toReply(await handler.invoke(update, context));
    } catch (error) {
      this.logger.error(
        { err: error, handler: handler.name, kind: update.kind, senderId: update.senderId },
        'Update handler failed'
      );
      this.emit('handler:error', { error, update, handler: handler.name });
      return;
    }

    if (!reply) return;
    let result: SendResult;
    try {
      result = await this.sendClient.send(update.senderId, reply, { signal });
    } catch (error) {
      this.logger.error(
        { err: error, handler: handler.name, kind: update.kind, senderId: update.senderId },
        'Handler reply could not be sent'
      );
      this.emit('handler:error', { error, update, handler: handler.name });
      return;
    }
    if (!result.ok) {
      this.logger.warn(
        { handler: handler.name, senderId: update.senderId, failure: result.failure },
        'Handler reply was not delivered'
      );
    }
  }

  private createContext(update: Update, signal: AbortSignal): ReplyContext {
    const { sendClient, attachments } = this;
    const recipientId = update.senderId;
    return {
      update,
      signal,
      acknowledge: () => sendClient.acknowledge(recipientId, { signal }),
      respond: (message) =>
        sendClient.send(recipientId, typeof message === 'string' ? { text: message } : message, { signal }),
      sendAction: (action) => sendClient.sendAction(recipientId, action, { signal }),
      hostAttachment: (type, localPath, options) => {
        if (!attachments) {
          throw new GatewayError('No attachment cache configured', 'ATTACHMENT_CACHE_MISSING');
        }
        const hosted = attachments.host(localPath, options);
        if (!hosted.url) {
          attachments.remove(hosted.token);
          throw new GatewayError(
            'Hosting attachments requires a public base URL (PUBLIC_BASE_URL)',
            'ATTACHMENT_URL_UNAVAILABLE'
          );
        }
        return mediaAttachment(type, hosted.url);
      }
    };
  }
}
