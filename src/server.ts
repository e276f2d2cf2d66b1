import dotenv from 'dotenv'
import { MessengerGateway, type GatewayDependencies } from './MessengerGateway.js'
import { loadConfig } from './infra/config.js'
import { createLogger, type Logger } from './utils/Logger.js'

/**
 * Loads `.env` (or ENV_PATH), validates it and builds a gateway.
 * Throws ConfigError when required settings are missing.
 */
export function createGatewayFromEnv(dependencies: GatewayDependencies = {}): MessengerGateway {
  dotenv.config({ path: process.env.ENV_PATH || '.env' })
  const config = loadConfig(process.env)
  return new MessengerGateway(config, {
    logger: createLogger('MessengerGateway', config.logLevel),
    ...dependencies
  })
}

// Starts the gateway and stops it gracefully on SIGINT/SIGTERM
export async function runGateway(gateway: MessengerGateway, logger: Logger = createLogger('server')): Promise<void> {
  await gateway.start()

  let stopping = false
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return
    stopping = true
    logger.info({ signal }, 'Shutdown requested')
    gateway
      .stop()
      .then((drained) => {
        process.exitCode = drained ? 0 : 1
      })
      .catch((err) => {
        logger.error({ err }, 'Gateway failed to stop cleanly')
        process.exitCode = 1
      })
  }

  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}
