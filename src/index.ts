export { MessengerGateway, WEBHOOK_PATH, ATTACHMENT_PATH, type GatewayDependencies } from './MessengerGateway.js'
export { createGatewayFromEnv, runGateway } from './server.js'
export { loadConfig, type GatewayConfig } from './infra/config.js'
export * from './core/types.js'
export * from './core/interfaces.js'
export * from './core/errors.js'
export { UpdateRouter } from './routing/UpdateRouter.js'
export { UpdateDispatcher, type HandlerErrorEvent, type UpdateDispatcherOptions } from './routing/UpdateDispatcher.js'
export { ConversationQueue } from './conversation/ConversationQueue.js'
export { parseWebhookPayload, UpdateBatch } from './services/eventParser.js'
export { AttachmentCache, type AttachmentCacheOptions, type ClaimedAttachment } from './services/attachmentCache.js'
export { SendClient, classifyResponse, RETRYABLE_GRAPH_CODES, type SendClientOptions, type SendOptions, type UploadSource } from './services/sendClient.js'
export { FetchTransport, type HttpTransport, type TransportResponse } from './services/httpTransport.js'
export { MessengerProfile, toProfileBody, type ProfileSettings, type ProfileField } from './services/messengerProfile.js'
export { computeSignature, verifySignature, safeEqual, SIGNATURE_HEADERS, type SignatureAlgorithm } from './utils/signature.js'
export { createLogger, type Logger } from './utils/Logger.js'
export { createMessage, textMessage, toSendApiMessage } from './messages/message.js'
export { urlButton, postbackButton, callButton } from './messages/buttons.js'
export { textQuickReply, locationQuickReply } from './messages/quickReplies.js'
export { mediaAttachment, reusableAttachment, buttonTemplate, genericTemplate, element } from './messages/templates.js'
