import { MessageValidationError } from '../core/errors.js';
import type { MediaType, OutboundAttachment, OutboundButton, TemplateElement } from '../core/types.js';
import { serializeButton } from './buttons.js';

export const MAX_TEMPLATE_BUTTONS = 3;
export const MAX_GENERIC_ELEMENTS = 10;
export const MAX_BUTTON_TEMPLATE_TEXT = 640;

function checkButtons(buttons: readonly OutboundButton[], min: number): void {
  if (buttons.length < min || buttons.length > MAX_TEMPLATE_BUTTONS) {
    throw new MessageValidationError(`Templates take ${min}-${MAX_TEMPLATE_BUTTONS} buttons, got ${buttons.length}`);
  }
}

export function mediaAttachment(
  type: MediaType,
  url: string,
  options: { isReusable?: boolean } = {}
): OutboundAttachment {
  return { kind: 'media', type, url, ...(options.isReusable ? { isReusable: true } : {}) };
}

export function reusableAttachment(type: MediaType, attachmentId: string): OutboundAttachment {
  return { kind: 'reusable', type, attachmentId };
}

export function buttonTemplate(text: string, buttons: OutboundButton[]): OutboundAttachment {
  if (text.length === 0 || text.length > MAX_BUTTON_TEMPLATE_TEXT) {
    throw new MessageValidationError(`Button template text must be 1-${MAX_BUTTON_TEMPLATE_TEXT} characters`);
  }
  checkButtons(buttons, 1);
  return { kind: 'button_template', text, buttons };
}

export function element(
  title: string,
  options: Omit<TemplateElement, 'title'> = {}
): TemplateElement {
  if (title.length === 0) {
    throw new MessageValidationError('Template element requires a title');
  }
  if (options.buttons) checkButtons(options.buttons, 0);
  return { title, ...options };
}

export function genericTemplate(elements: TemplateElement[]): OutboundAttachment {
  if (elements.length === 0 || elements.length > MAX_GENERIC_ELEMENTS) {
    throw new MessageValidationError(`Generic template takes 1-${MAX_GENERIC_ELEMENTS} elements, got ${elements.length}`);
  }
  return { kind: 'generic_template', elements };
}

function serializeElement(el: TemplateElement): Record<string, unknown> {
  return {
    title: el.title,
    ...(el.subtitle !== undefined ? { subtitle: el.subtitle } : {}),
    ...(el.imageUrl !== undefined ? { image_url: el.imageUrl } : {}),
    ...(el.defaultActionUrl !== undefined
      ? { default_action: { type: 'web_url', url: el.defaultActionUrl } }
      : {}),
    ...(el.buttons && el.buttons.length > 0 ? { buttons: el.buttons.map(serializeButton) } : {})
  };
}

export function serializeAttachment(attachment: OutboundAttachment): Record<string, unknown> {
  switch (attachment.kind) {
    case 'media':
      return {
        type: attachment.type,
        payload: { url: attachment.url, ...(attachment.isReusable ? { is_reusable: true } : {}) }
      };
    case 'reusable':
      return { type: attachment.type, payload: { attachment_id: attachment.attachmentId } };
    case 'button_template':
      return {
        type: 'template',
        payload: {
          template_type: 'button',
          text: attachment.text,
          buttons: attachment.buttons.map(serializeButton)
        }
      };
    case 'generic_template':
      return {
        type: 'template',
        payload: {
          template_type: 'generic',
          elements: attachment.elements.map(serializeElement)
        }
      };
  }
}
