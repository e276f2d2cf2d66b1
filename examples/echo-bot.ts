/**
 * Echo bot example
 *
 * Set VERIFY_TOKEN, PAGE_ACCESS_TOKEN and APP_SECRET (see .env.example),
 * point the page webhook at /webhook and run `npm run build && npm start`.
 */

import {
  MessageReceived,
  PostbackReceived,
  ReplyContext,
  buttonTemplate,
  createGatewayFromEnv,
  createLogger,
  createMessage,
  postbackButton,
  runGateway,
  textQuickReply,
  UpdateHandlers,
  UpdateKind
} from '../src/index.js';

const logger = createLogger('echo-bot');

class EchoBot implements UpdateHandlers {
  private echoed = 0;

  messageReceived(update: MessageReceived, context: ReplyContext) {
    context.acknowledge();
    this.echoed++;

    if (update.text === 'menu') {
      return createMessage({
        attachment: buttonTemplate('What next?', [
          postbackButton('Count', 'COUNT'),
          postbackButton('Reset', 'RESET')
        ])
      });
    }
    if (update.attachments.length > 0) {
      return `Got ${update.attachments.length} attachment(s)`;
    }
    return createMessage({
      text: update.text ?? '',
      quickReplies: [textQuickReply('Menu', 'MENU')]
    });
  }

  postbackReceived(update: PostbackReceived) {
    if (update.payload === 'RESET') {
      this.echoed = 0;
      return 'Counter reset';
    }
    return `Echoed ${this.echoed} message(s) so far`;
  }
}

async function main() {
  const gateway = createGatewayFromEnv();
  gateway.registerHandlers(new EchoBot());
  gateway.handle(UpdateKind.DELIVERY_CONFIRMED, (update) => {
    logger.debug({ senderId: update.senderId, watermark: update.watermark }, 'Delivered');
  });
  gateway.on('handler:error', ({ handler, update }) => {
    logger.warn({ handler, senderId: update.senderId }, 'Handler error');
  });
  await runGateway(gateway, logger);
}

main().catch((err) => {
  logger.error({ err }, 'Echo bot failed to start');
  process.exitCode = 1;
});
