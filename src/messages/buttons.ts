import { MessageValidationError } from '../core/errors.js';
import type { OutboundButton } from '../core/types.js';

export const MAX_BUTTON_TITLE = 20;

function checkTitle(title: string): void {
  if (title.trim().length === 0) {
    throw new MessageValidationError('Button title must not be empty');
  }
  if (title.length > MAX_BUTTON_TITLE) {
    throw new MessageValidationError(`Button title exceeds ${MAX_BUTTON_TITLE} characters: "${title}"`);
  }
}

export function urlButton(title: string, url: string): OutboundButton {
  checkTitle(title);
  if (!/^https?:\/\//i.test(url)) {
    throw new MessageValidationError(`URL button requires an http(s) url, got "${url}"`);
  }
  return { type: 'web_url', title, url };
}

export function postbackButton(title: string, payload: string): OutboundButton {
  checkTitle(title);
  if (payload.length === 0) {
    throw new MessageValidationError('Postback button requires a payload');
  }
  return { type: 'postback', title, payload };
}

// Phone numbers must be in +<country><number> form
export function callButton(title: string, phoneNumber: string): OutboundButton {
  checkTitle(title);
  if (!/^\+\d{6,15}$/.test(phoneNumber)) {
    throw new MessageValidationError(`Call button requires a +<digits> phone number, got "${phoneNumber}"`);
  }
  return { type: 'phone_number', title, payload: phoneNumber };
}

export function serializeButton(button: OutboundButton): Record<string, unknown> {
  switch (button.type) {
    case 'web_url':
      return { type: 'web_url', title: button.title, url: button.url };
    case 'postback':
    case 'phone_number':
      return { type: button.type, title: button.title, payload: button.payload };
  }
}
