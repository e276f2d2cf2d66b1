/**
 * Update Router
 * Holds the dispatch table from update kind to handlers
 */

import { EventEmitter } from 'eventemitter3';
import {
  IUpdateRouter,
  RegisteredHandler,
  UpdateHandler,
  UpdateHandlers
} from '../core/interfaces.js';
import { RegistrationError } from '../core/errors.js';
import { Update, UpdateKind, UpdateOfKind } from '../core/types.js';
import { Logger, silentLogger } from '../utils/Logger.js';

type RouterEvents = {
  'handler:registered': [handler: RegisteredHandler];
  'router:frozen': [handlerCount: number];
};

function isOfKind<K extends UpdateKind>(update: Update, kinds: readonly K[]): update is UpdateOfKind<K> {
  return kinds.some((kind) => kind === update.kind);
}

export class UpdateRouter extends EventEmitter<RouterEvents> implements IUpdateRouter {
  private handlers: RegisteredHandler[] = [];
  private frozen = false;

  constructor(private logger: Logger = silentLogger) {
    super();
  }

  public get isFrozen(): boolean {
    return this.frozen;
  }

  public get size(): number {
    return this.handlers.length;
  }

  public handle<K extends UpdateKind>(
    kinds: K | K[],
    handler: UpdateHandler<UpdateOfKind<K>>,
    name?: string
  ): void {
    if (this.frozen) {
      throw new RegistrationError('Handlers cannot be registered after the gateway has started');
    }
    const accepted: K[] = Array.isArray(kinds) ? [...kinds] : [kinds];
    if (accepted.length === 0) {
      throw new RegistrationError('A handler must accept at least one update kind');
    }

    const registered: RegisteredHandler = {
      name: name || handler.name || 'anonymous',
      kinds: Object.freeze([...accepted]),
      invoke: (update, context) => (isOfKind(update, accepted) ? handler(update, context) : undefined)
    };
    this.handlers.push(registered);

    this.logger.debug({ handler: registered.name, kinds: registered.kinds }, 'Update handler registered');
    this.emit('handler:registered', registered);
  }

  /**
   * Registers every recognised method of `target`, bound to it.
   * Returns the number of handlers added.
   */
  public registerHandlers(target: UpdateHandlers, name: string = target.constructor.name): number {
    const before = this.handlers.length;
    const bind = <K extends UpdateKind>(
      kind: K,
      method: UpdateHandler<UpdateOfKind<K>> | undefined,
      methodName: string
    ): void => {
      if (method) {
        this.handle(kind, method.bind(target), `${name}.${methodName}`);
      }
    };

    bind(UpdateKind.MESSAGE_RECEIVED, target.messageReceived, 'messageReceived');
    bind(UpdateKind.MESSAGE_ECHOED, target.messageEchoed, 'messageEchoed');
    bind(UpdateKind.DELIVERY_CONFIRMED, target.deliveryConfirmed, 'deliveryConfirmed');
    bind(UpdateKind.READ_CONFIRMED, target.readConfirmed, 'readConfirmed');
    bind(UpdateKind.POSTBACK_RECEIVED, target.postbackReceived, 'postbackReceived');
    bind(UpdateKind.OPTIN_RECEIVED, target.optinReceived, 'optinReceived');
    bind(UpdateKind.REFERRAL_RECEIVED, target.referralReceived, 'referralReceived');
    bind(UpdateKind.ACCOUNT_LINKED, target.accountLinked, 'accountLinked');

    const added = this.handlers.length - before;
    if (added === 0) {
      this.logger.warn({ target: name }, 'No handler methods found on registered object');
    }
    return added;
  }

  public handlersFor(kind: UpdateKind): readonly RegisteredHandler[] {
    return this.handlers.filter((handler) => handler.kinds.includes(kind));
  }

  public freeze(): void {
    if (this.frozen) return;
    this.frozen = true;
    this.logger.info({ handlers: this.handlers.length }, 'Update router frozen');
    this.emit('router:frozen', this.handlers.length);
  }
}
