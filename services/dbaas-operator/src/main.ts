import { ManagedRuntime } from 'effect'

import { loadOperatorConfig, type OperatorConfig } from '~/config'
import { makeDbaasOperatorLayer, startDbaasOperatorEffect } from '~/controllers'
import { ConfigurationError } from '~/errors'
import { createKubernetesClient } from '~/kube/client'
import { logger } from '~/logger'

const main = async () => {
  let config: OperatorConfig
  try {
    config = loadOperatorConfig()
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ err: error }, 'invalid configuration')
      process.exit(1)
    }
    throw error
  }

  const runtime = ManagedRuntime.make(makeDbaasOperatorLayer(createKubernetesClient(), config, logger))

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down')
    runtime.dispose().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'shutdown failed')
        process.exit(1)
      },
    )
  }
  process.once('SIGTERM', shutdown)
  process.once('SIGINT', shutdown)

  await runtime.runPromise(startDbaasOperatorEffect)
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'operator failed to start')
  process.exit(1)
})
