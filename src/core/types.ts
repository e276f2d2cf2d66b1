/**
 * Core types for the webhook gateway
 */

export enum UpdateKind {
  MESSAGE_RECEIVED = 'message_received',
  MESSAGE_ECHOED = 'message_echoed',
  DELIVERY_CONFIRMED = 'delivery_confirmed',
  READ_CONFIRMED = 'read_confirmed',
  POSTBACK_RECEIVED = 'postback_received',
  OPTIN_RECEIVED = 'optin_received',
  REFERRAL_RECEIVED = 'referral_received',
  ACCOUNT_LINKED = 'account_linked'
}

export type MediaType = 'image' | 'audio' | 'video' | 'file';

export type InboundAttachment =
  | {
      type: 'location';
      latitude: number;
      longitude: number;
      title?: string;
    }
  | {
      type: MediaType | 'fallback' | 'template';
      url?: string;
      title?: string;
    };

export interface QuickReplyPayload {
  payload: string;
}

export interface ReferralInfo {
  ref?: string;
  source?: string;
  referralType?: string;
}

interface UpdateBase<K extends UpdateKind> {
  readonly kind: K;
  readonly senderId: string;  // platform user id (page id for echoes)
  readonly recipientId?: string;
  readonly timestamp: number; // platform epoch millis
  readonly raw: Readonly<Record<string, unknown>>;
}

export interface MessageReceived extends UpdateBase<UpdateKind.MESSAGE_RECEIVED> {
  readonly messageId: string;
  readonly text?: string;
  readonly attachments: readonly InboundAttachment[];
  readonly quickReply?: QuickReplyPayload;
  readonly sequence?: number;
}

export interface MessageEchoed extends UpdateBase<UpdateKind.MESSAGE_ECHOED> {
  readonly messageId: string;
  readonly text?: string;
  readonly attachments: readonly InboundAttachment[];
  readonly appId?: string;
  readonly metadata?: string;
}

export interface DeliveryConfirmed extends UpdateBase<UpdateKind.DELIVERY_CONFIRMED> {
  readonly watermark: number;
  readonly messageIds: readonly string[];
  readonly sequence?: number;
}

export interface ReadConfirmed extends UpdateBase<UpdateKind.READ_CONFIRMED> {
  readonly watermark: number;
  readonly sequence?: number;
}

export interface PostbackReceived extends UpdateBase<UpdateKind.POSTBACK_RECEIVED> {
  readonly payload: string;
  readonly title?: string;
  readonly referral?: ReferralInfo;
}

export interface OptinReceived extends UpdateBase<UpdateKind.OPTIN_RECEIVED> {
  readonly ref?: string;
  readonly userRef?: string;
}

export interface ReferralReceived extends UpdateBase<UpdateKind.REFERRAL_RECEIVED>, ReferralInfo {}

export interface AccountLinked extends UpdateBase<UpdateKind.ACCOUNT_LINKED> {
  readonly status: 'linked' | 'unlinked';
  readonly authorizationCode?: string;
}

export type Update =
  | MessageReceived
  | MessageEchoed
  | DeliveryConfirmed
  | ReadConfirmed
  | PostbackReceived
  | OptinReceived
  | ReferralReceived
  | AccountLinked;

export type UpdateOfKind<K extends UpdateKind> = Extract<Update, { kind: K }>;

// Outbound

export type SenderAction = 'mark_seen' | 'typing_on' | 'typing_off';

export type MessagingType = 'RESPONSE' | 'UPDATE' | 'MESSAGE_TAG';

export interface OutboundButton {
  type: 'web_url' | 'postback' | 'phone_number';
  title: string;
  url?: string;
  payload?: string;
}

export interface OutboundQuickReply {
  contentType: 'text' | 'location';
  title?: string;
  payload?: string;
  imageUrl?: string;
}

export interface TemplateElement {
  title: string;
  subtitle?: string;
  imageUrl?: string;
  defaultActionUrl?: string;
  buttons?: OutboundButton[];
}

export type OutboundAttachment =
  | { kind: 'media'; type: MediaType; url: string; isReusable?: boolean }
  | { kind: 'reusable'; type: MediaType; attachmentId: string }
  | { kind: 'button_template'; text: string; buttons: OutboundButton[] }
  | { kind: 'generic_template'; elements: TemplateElement[] };

export interface OutboundMessage {
  readonly text?: string;
  readonly attachment?: OutboundAttachment;
  readonly quickReplies?: readonly OutboundQuickReply[];
  readonly metadata?: string;
}

export type FailureKind = 'retryable' | 'fatal';

export interface SendFailure {
  kind: FailureKind;
  reason: string;
  status?: number;
  code?: number;
  attempts: number;
}

export type SendOutcome<T> =
  | { ok: true; data: T; attempts: number }
  | { ok: false; failure: SendFailure };

export type SendResult = SendOutcome<{ messageId: string; recipientId: string }>;
export type ActionResult = SendOutcome<{ recipientId: string }>;
export type UploadResult = SendOutcome<{ attachmentId: string }>;

// Attachment hosting

export type EvictionPolicy = 'serve-once' | 'ttl';

export interface CacheEntry {
  readonly token: string;
  readonly localPath: string;
  readonly contentType?: string;
  readonly createdAt: number;
  readonly expiresAt: number;
  state: 'unconsumed' | 'served';
  serveCount: number;
}

export interface HostedAttachment {
  token: string;
  path: string;
  url?: string;
}
