import { MessageValidationError } from '../core/errors.js';
import type { OutboundQuickReply } from '../core/types.js';

export const MAX_QUICK_REPLIES = 13;
export const MAX_QUICK_REPLY_TITLE = 20;

export function textQuickReply(title: string, payload: string, imageUrl?: string): OutboundQuickReply {
  if (title.trim().length === 0 || title.length > MAX_QUICK_REPLY_TITLE) {
    throw new MessageValidationError(`Quick reply title must be 1-${MAX_QUICK_REPLY_TITLE} characters`);
  }
  if (payload.length === 0) {
    throw new MessageValidationError('Quick reply requires a payload');
  }
  return { contentType: 'text', title, payload, ...(imageUrl ? { imageUrl } : {}) };
}

export function locationQuickReply(): OutboundQuickReply {
  return { contentType: 'location' };
}

export function serializeQuickReply(reply: OutboundQuickReply): Record<string, unknown> {
  return {
    content_type: reply.contentType,
    ...(reply.title !== undefined ? { title: reply.title } : {}),
    ...(reply.payload !== undefined ? { payload: reply.payload } : {}),
    ...(reply.imageUrl !== undefined ? { image_url: reply.imageUrl } : {})
  };
}
