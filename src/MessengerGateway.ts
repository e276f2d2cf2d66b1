/**
 * Messenger Webhook Gateway
 * Wires the webhook endpoint, dispatcher, send client and attachment host
 */

import type { Server } from 'http';
import type { AddressInfo } from 'net';
import express, { type ErrorRequestHandler } from 'express';
import { EventEmitter } from 'eventemitter3';
import { ConversationQueue } from './conversation/ConversationQueue.js';
import { UpdateHandler, UpdateHandlers } from './core/interfaces.js';
import { UpdateKind, UpdateOfKind } from './core/types.js';
import type { GatewayConfig } from './infra/config.js';
import { createAttachmentHandler } from './routes/attachments.js';
import { createHealthHandler } from './routes/health.js';
import { createWebhookRouter } from './routes/webhook.js';
import { HandlerErrorEvent, UpdateDispatcher } from './routing/UpdateDispatcher.js';
import { UpdateRouter } from './routing/UpdateRouter.js';
import { AttachmentCache } from './services/attachmentCache.js';
import { FetchTransport, HttpTransport } from './services/httpTransport.js';
import { MessengerProfile } from './services/messengerProfile.js';
import { SendClient } from './services/sendClient.js';
import { createLogger, Logger } from './utils/Logger.js';
import type { Sleep } from './utils/retry.js';

export const WEBHOOK_PATH = '/webhook';
export const ATTACHMENT_PATH = '/attachments';

/**
 * Collaborators that can be swapped, mostly for tests
 */
export interface GatewayDependencies {
  transport?: HttpTransport;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
}

type GatewayEvents = {
  'gateway:started': [address: AddressInfo];
  'gateway:stopped': [drained: boolean];
  'handler:error': [event: HandlerErrorEvent];
};

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export class MessengerGateway extends EventEmitter<GatewayEvents> {
  public readonly app: express.Express;
  public readonly router: UpdateRouter;
  public readonly sendClient: SendClient;
  public readonly attachments: AttachmentCache;
  public readonly dispatcher: UpdateDispatcher;
  public readonly profile: MessengerProfile;

  private logger: Logger;
  private server: Server | null = null;
  private isRunning: boolean = false;

  constructor(private config: GatewayConfig, dependencies: GatewayDependencies = {}) {
    super();
    this.logger = dependencies.logger ?? createLogger('MessengerGateway', config.logLevel);

    this.router = new UpdateRouter(this.logger);
    this.sendClient = new SendClient({
      pageAccessToken: config.pageAccessToken,
      graphApiUrl: config.graphApiUrl,
      maxAttempts: config.send.maxAttempts,
      backoffBaseMs: config.send.backoffBaseMs,
      backoffCapMs: config.send.backoffCapMs,
      transport: dependencies.transport ?? new FetchTransport(config.send.timeoutMs),
      logger: this.logger,
      ...(dependencies.sleep ? { sleep: dependencies.sleep } : {}),
      ...(dependencies.random ? { random: dependencies.random } : {})
    });
    this.attachments = new AttachmentCache({
      ttlMs: config.attachments.ttlMs,
      policy: config.attachments.policy,
      sweepIntervalMs: config.attachments.sweepIntervalMs,
      routePrefix: ATTACHMENT_PATH,
      logger: this.logger,
      ...(config.attachments.publicBaseUrl ? { publicBaseUrl: config.attachments.publicBaseUrl } : {}),
      ...(dependencies.now ? { now: dependencies.now } : {})
    });
    this.dispatcher = new UpdateDispatcher({
      router: this.router,
      sendClient: this.sendClient,
      queue: new ConversationQueue(this.logger),
      attachments: this.attachments,
      logger: this.logger
    });
    this.profile = new MessengerProfile(this.sendClient, this.logger);

    this.dispatcher.on('handler:error', (event) => this.emit('handler:error', event));
    this.app = this.createApp();
  }

  private createApp(): express.Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/health', createHealthHandler({ dispatcher: this.dispatcher, attachments: this.attachments }));
    app.use(
      WEBHOOK_PATH,
      createWebhookRouter({
        verifyToken: this.config.verifyToken,
        appSecret: this.config.appSecret,
        signatureAlgorithm: this.config.signatureAlgorithm,
        dispatcher: this.dispatcher,
        logger: this.logger
      })
    );
    app.get(`${ATTACHMENT_PATH}/:token`, createAttachmentHandler(this.attachments, this.logger));

    const onError: ErrorRequestHandler = (err, req, res, next) => {
      const status = statusOf(err);
      if (status >= 500) {
        this.logger.error({ err, method: req.method, path: req.path }, 'Unhandled request error');
      } else {
        this.logger.warn({ err, method: req.method, path: req.path, status }, 'Request rejected');
      }
      if (res.headersSent) {
        next(err);
        return;
      }
      res.status(status).json({ success: false, error: status >= 500 ? 'Internal server error' : 'Bad request' });
    };
    app.use(onError);

    return app;
  }

  /**
   * Register a handler for one or more update kinds
   */
  public handle<K extends UpdateKind>(
    kinds: K | K[],
    handler: UpdateHandler<UpdateOfKind<K>>,
    name?: string
  ): this {
    this.router.handle(kinds, handler, name);
    return this;
  }

  /**
   * Register the handler methods of an object (messageReceived, postbackReceived, ...)
   */
  public registerHandlers(target: UpdateHandlers, name?: string): this {
    this.router.registerHandlers(target, name);
    return this;
  }

  /**
   * Start listening; handler registration closes here
   */
  public async start(): Promise<AddressInfo> {
    if (this.isRunning && this.server) {
      this.logger.warn('Gateway is already running');
      return this.address(this.server);
    }

    this.router.freeze();
    this.attachments.start();

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = this.app.listen(this.config.port, this.config.host, () => {
        listening.off('error', reject);
        resolve(listening);
      });
      listening.once('error', reject);
    });
    this.server = server;
    this.isRunning = true;

    const address = this.address(server);
    this.logger.info({ host: address.address, port: address.port }, 'Messenger gateway listening');
    this.emit('gateway:started', address);
    return address;
  }

  /**
   * Stop accepting webhooks, let conversations finish within the grace
   * period, then release timers and pending acknowledgements
   */
  public async stop(): Promise<boolean> {
    if (!this.isRunning) {
      this.logger.warn('Gateway is not running');
      return true;
    }
    this.isRunning = false;

    const drained = this.dispatcher.shutdown(this.config.shutdownGraceMs);
    const closed = this.closeServer();
    const result = await drained;
    await closed;
    this.attachments.stop();
    await this.sendClient.settle();

    this.logger.info({ drained: result }, 'Messenger gateway stopped');
    this.emit('gateway:stopped', result);
    return result;
  }

  /**
   * Get gateway status
   */
  public getStatus(): {
    running: boolean;
    accepting: boolean;
    handlers: number;
    activeConversations: number;
    hostedAttachments: number;
  } {
    return {
      running: this.isRunning,
      accepting: this.dispatcher.accepting,
      handlers: this.router.size,
      activeConversations: this.dispatcher.activeConversations,
      hostedAttachments: this.attachments.size
    };
  }

  private address(server: Server): AddressInfo {
    const address = server.address();
    if (address === null || typeof address === 'string') {
      return { address: this.config.host, family: 'IPv4', port: this.config.port };
    }
    return address;
  }

  private closeServer(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });
  }
}
