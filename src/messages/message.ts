import { MessageValidationError } from '../core/errors.js';
import type { OutboundAttachment, OutboundMessage, OutboundQuickReply } from '../core/types.js';
import { MAX_QUICK_REPLIES, serializeQuickReply } from './quickReplies.js';
import { serializeAttachment } from './templates.js';

export const MAX_TEXT_LENGTH = 2000;

export interface MessageInit {
  text?: string;
  attachment?: OutboundAttachment;
  quickReplies?: OutboundQuickReply[];
  metadata?: string;
}

export function assertValidMessage(message: OutboundMessage): void {
  if (message.text === undefined && message.attachment === undefined) {
    throw new MessageValidationError('Message requires either text or an attachment');
  }
  if (message.text !== undefined && message.text.length > MAX_TEXT_LENGTH) {
    throw new MessageValidationError(`Message text exceeds ${MAX_TEXT_LENGTH} characters`);
  }
  if (message.quickReplies && message.quickReplies.length > MAX_QUICK_REPLIES) {
    throw new MessageValidationError(`At most ${MAX_QUICK_REPLIES} quick replies are allowed`);
  }
}

export function createMessage(init: MessageInit): OutboundMessage {
  const message: OutboundMessage = {
    ...(init.text !== undefined ? { text: init.text } : {}),
    ...(init.attachment !== undefined ? { attachment: init.attachment } : {}),
    ...(init.quickReplies && init.quickReplies.length > 0 ? { quickReplies: [...init.quickReplies] } : {}),
    ...(init.metadata !== undefined ? { metadata: init.metadata } : {})
  };
  assertValidMessage(message);
  return Object.freeze(message);
}

export function textMessage(text: string, quickReplies?: OutboundQuickReply[]): OutboundMessage {
  return createMessage({ text, ...(quickReplies ? { quickReplies } : {}) });
}

/**
 * Serializes a message into the Send API `message` object.
 */
export function toSendApiMessage(message: OutboundMessage): Record<string, unknown> {
  return {
    ...(message.text !== undefined ? { text: message.text } : {}),
    ...(message.attachment !== undefined ? { attachment: serializeAttachment(message.attachment) } : {}),
    ...(message.quickReplies && message.quickReplies.length > 0
      ? { quick_replies: message.quickReplies.map(serializeQuickReply) }
      : {}),
    ...(message.metadata !== undefined ? { metadata: message.metadata } : {})
  };
}
