import { loadEnv } from './config/env.js'
import { loggerOptions } from './config/logger.js'
import { buildApp } from './app.js'

const env = loadEnv()

const fastify = await buildApp({
  logger: loggerOptions(env),
  suggestionLimit: env.SUGGESTION_LIMIT
})

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, function () {
    fastify.log.info({ signal }, 'shutting down')
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error(err)
        process.exit(1)
      }
    )
  })
}

fastify.listen({ port: env.PORT, host: env.HOST }, function (err) {
  if (err) {
    fastify.log.error(err)
    process.exit(1)
  }
})
