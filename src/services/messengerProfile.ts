import { GatewayError } from '../core/errors.js'
import type { OutboundButton, SendOutcome } from '../core/types.js'
import { serializeButton } from '../messages/buttons.js'
import { silentLogger, type Logger } from '../utils/Logger.js'
import type { CallOptions, SendClient } from './sendClient.js'

export const MAX_GREETING_LENGTH = 160
export const MAX_MENU_ITEMS = 20

export type ProfileField =
  | 'greeting'
  | 'get_started'
  | 'persistent_menu'
  | 'whitelisted_domains'
  | 'account_linking_url'

export interface ProfileSettings {
  greeting?: string
  getStartedPayload?: string
  persistentMenu?: OutboundButton[]
  whitelistedDomains?: string[]
  accountLinkingUrl?: string
}

function invalid(message: string): GatewayError {
  return new GatewayError(message, 'PROFILE_INVALID')
}

function isHttpsUrl(value: string): boolean {
  return /^https:\/\/[^\s/]+/i.test(value)
}

export function toProfileBody(settings: ProfileSettings): Record<string, unknown> {
  const body: Record<string, unknown> = {}

  if (settings.greeting !== undefined) {
    if (settings.greeting.length === 0 || settings.greeting.length > MAX_GREETING_LENGTH) {
      throw invalid(`Greeting must be 1-${MAX_GREETING_LENGTH} characters`)
    }
    body.greeting = [{ locale: 'default', text: settings.greeting }]
  }
  if (settings.getStartedPayload !== undefined) {
    if (settings.getStartedPayload.length === 0) throw invalid('Get started payload must not be empty')
    body.get_started = { payload: settings.getStartedPayload }
  }
  if (settings.persistentMenu !== undefined) {
    const items = settings.persistentMenu
    if (items.length === 0 || items.length > MAX_MENU_ITEMS) {
      throw invalid(`Persistent menu takes 1-${MAX_MENU_ITEMS} items`)
    }
    body.persistent_menu = [
      { locale: 'default', composer_input_disabled: false, call_to_actions: items.map(serializeButton) }
    ]
  }
  if (settings.whitelistedDomains !== undefined) {
    const bad = settings.whitelistedDomains.filter((domain) => !isHttpsUrl(domain))
    if (bad.length > 0) throw invalid(`Whitelisted domains must be https urls: ${bad.join(', ')}`)
    body.whitelisted_domains = [...settings.whitelistedDomains]
  }
  if (settings.accountLinkingUrl !== undefined) {
    if (!isHttpsUrl(settings.accountLinkingUrl)) throw invalid('Account linking url must be https')
    body.account_linking_url = settings.accountLinkingUrl
  }

  if (Object.keys(body).length === 0) throw invalid('No profile settings given')
  return body
}

/**
 * Page-level settings shown before and around conversations.
 */
export class MessengerProfile {
  private readonly logger: Logger

  constructor(private readonly client: SendClient, logger?: Logger) {
    this.logger = logger ?? silentLogger
  }

  async set(settings: ProfileSettings, options: CallOptions = {}): Promise<SendOutcome<unknown>> {
    const body = toProfileBody(settings)
    const result = await this.client.callApi('/me/messenger_profile', body, options)
    if (result.ok) {
      this.logger.info({ fields: Object.keys(body) }, 'Messenger profile updated')
    }
    return result
  }

  async clear(fields: ProfileField[], options: CallOptions = {}): Promise<SendOutcome<unknown>> {
    if (fields.length === 0) throw invalid('No profile fields to clear')
    const result = await this.client.callApi('/me/messenger_profile', { fields: [...fields] }, { ...options, method: 'DELETE' })
    if (result.ok) {
      this.logger.info({ fields }, 'Messenger profile fields cleared')
    }
    return result
  }
}
