import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify'
import type { ActivityStore } from '../database/index.js'
import { storePlugin } from './plugins/store.plugin.js'
import {
  categories,
  filterOptions,
  listActivities,
  search,
  signup,
  suggestions,
  unregisterStudent,
} from './modules/activities.controller.js'

export interface BuildAppOptions {
  store?: ActivityStore
  logger?: FastifyServerOptions['logger']
  suggestionLimit?: number
}

const DEFAULT_SUGGESTION_LIMIT = 10

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? true
  })

  await fastify.register(storePlugin, { store: options.store })

  const suggestionLimit = options.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT

  fastify.get('/health', function (_, reply) {
    reply.send({ status: 'ok' })
  })

  fastify.get('/activities', async function () {
    return listActivities(fastify.store)
  })

  fastify.get('/activities/search', async function (request, reply) {
    // Pass raw query; Zod is the single source of validation and defaults.
    const result = search(fastify.store, request.query, request.log)

    if ('status' in result) {
      return reply.status(result.status).send({ error: result.error })
    }
    return reply.send(result)
  })

  fastify.get('/activities/categories', async function () {
    return categories(fastify.store)
  })

  fastify.get('/activities/filters', async function () {
    return filterOptions(fastify.store)
  })

  fastify.get('/activities/suggestions', async function (request, reply) {
    const result = suggestions(fastify.store, request.query, suggestionLimit, request.log)

    if ('status' in result) {
      return reply.status(result.status).send({ error: result.error })
    }
    return reply.send(result)
  })

  fastify.post('/activities/:activityName/signup', async function (request, reply) {
    const result = signup(fastify.store, request.params, request.query)

    if ('status' in result) {
      return reply.status(result.status).send({ error: result.error })
    }
    return reply.send(result)
  })

  fastify.delete('/activities/:activityName/unregister', async function (request, reply) {
    const result = unregisterStudent(fastify.store, request.params, request.query)

    if ('status' in result) {
      return reply.status(result.status).send({ error: result.error })
    }
    return reply.send(result)
  })

  return fastify
}
