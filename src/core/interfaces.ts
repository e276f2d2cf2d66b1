/**
 * Core interfaces for the update routing and dispatch layer
 */

import {
  ActionResult,
  MediaType,
  OutboundAttachment,
  OutboundMessage,
  SendResult,
  SenderAction,
  Update,
  UpdateKind,
  UpdateOfKind
} from './types.js';

/**
 * What a handler may hand back: a message (or plain text) to send to the
 * update's sender, or nothing.
 */
export type HandlerResult = OutboundMessage | string | undefined | void;

export type UpdateHandler<U extends Update = Update> = (
  update: U,
  context: ReplyContext
) => HandlerResult | Promise<HandlerResult>;

/**
 * Per-update reply capability, bound to the update's sender.
 */
export interface ReplyContext {
  readonly update: Update;
  readonly signal: AbortSignal;
  acknowledge(): void;
  respond(message: OutboundMessage | string): Promise<SendResult>;
  sendAction(action: SenderAction): Promise<ActionResult>;
  hostAttachment(type: MediaType, localPath: string, options?: { contentType?: string }): OutboundAttachment;
}

export interface RegisteredHandler {
  readonly name: string;
  readonly kinds: readonly UpdateKind[];
  invoke(update: Update, context: ReplyContext): HandlerResult | Promise<HandlerResult>;
}

/**
 * Class-style registration: methods named after the update they accept.
 */
export interface UpdateHandlers {
  messageReceived?: UpdateHandler<UpdateOfKind<UpdateKind.MESSAGE_RECEIVED>>;
  messageEchoed?: UpdateHandler<UpdateOfKind<UpdateKind.MESSAGE_ECHOED>>;
  deliveryConfirmed?: UpdateHandler<UpdateOfKind<UpdateKind.DELIVERY_CONFIRMED>>;
  readConfirmed?: UpdateHandler<UpdateOfKind<UpdateKind.READ_CONFIRMED>>;
  postbackReceived?: UpdateHandler<UpdateOfKind<UpdateKind.POSTBACK_RECEIVED>>;
  optinReceived?: UpdateHandler<UpdateOfKind<UpdateKind.OPTIN_RECEIVED>>;
  referralReceived?: UpdateHandler<UpdateOfKind<UpdateKind.REFERRAL_RECEIVED>>;
  accountLinked?: UpdateHandler<UpdateOfKind<UpdateKind.ACCOUNT_LINKED>>;
}

export interface IUpdateRouter {
  handle<K extends UpdateKind>(kinds: K | K[], handler: UpdateHandler<UpdateOfKind<K>>, name?: string): void;
  registerHandlers(target: UpdateHandlers, name?: string): number;
  handlersFor(kind: UpdateKind): readonly RegisteredHandler[];
  freeze(): void;
}

export type ConversationTask = (signal: AbortSignal) => Promise<void>;

export interface IConversationQueue {
  readonly accepting: boolean;
  readonly activeConversations: number;
  enqueue(senderId: string, task: ConversationTask): boolean;
  idle(): Promise<void>;
  drain(graceMs: number): Promise<boolean>;
}

export interface DispatchSummary {
  queued: number;
  rejected: number;
}

export interface IUpdateDispatcher {
  readonly accepting: boolean;
  readonly activeConversations: number;
  dispatch(updates: Iterable<Update>): DispatchSummary;
  idle(): Promise<void>;
  shutdown(graceMs: number): Promise<boolean>;
}
