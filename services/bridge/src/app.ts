import fs from 'node:fs'
import path from 'node:path'

import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'
import fastifyStatic from '@fastify/static'
import type { Dispatcher } from 'undici'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@pvbridge/logging'

import type { BridgeConfig } from './config.js'
import { parseBoolSafe, parseIntSafe } from './core/env.js'
import type { RegisterClientFactory } from './devices/inverter/types.js'
import bridgePlugin from './plugins/bridge.js'
import dashboardRoutes from './routes/dashboard.js'

export interface BuildAppOptions {
    config: BridgeConfig
    fastify?: FastifyServerOptions
    clientBuf?: ClientLogBuffer
    createClient?: RegisterClientFactory
    dispatcher?: Dispatcher
    autoStart?: boolean
    /** Directory served under /static/; found next to the sources by default. */
    publicDir?: string
}

/** Works from src (ts-jest) and from the compiled tree under dist. */
export function resolvePublicDir(): string {
    const candidates = [
        path.resolve(__dirname, '../public'),
        path.resolve(__dirname, '../../../../services/bridge/public'),
        path.resolve(process.cwd(), 'services/bridge/public'),
        path.resolve(process.cwd(), 'public'),
    ]
    return candidates.find(dir => fs.existsSync(dir)) ?? candidates[0]
}

/** chart.js resolves to its CommonJS build; the UMD bundle sits in the same dist folder. */
export function resolveChartJsDir(): string {
    return path.dirname(require.resolve('chart.js'))
}

export function buildApp(opts: BuildAppOptions): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('bridge', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    // ---- Request logging config (env) ----
    const REQUEST_VERBOSE = parseBoolSafe(process.env.REQUEST_VERBOSE, false)
    const REQUEST_SAMPLE = Math.max(1, parseIntSafe(process.env.REQUEST_SAMPLE, 1))

    const startedAt = new Map<string, number>()
    const sampledIds = new Set<string>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })

    app.decorate('clientBuf', clientBuf)

    // CORS
    void app.register(cors, { origin: true })

    // Poller + state
    void app.register(bridgePlugin, {
        config: opts.config,
        createClient: opts.createClient,
        dispatcher: opts.dispatcher,
        autoStart: opts.autoStart,
    })

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        sampledIds.add(req.id)
        startedAt.set(req.id, Date.now())
        logReq.debug(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            logReq.debug('request detail', { id: req.id, ip: req.ip, ua: req.headers['user-agent'] ?? null })
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        if (!sampledIds.has(req.id)) return
        sampledIds.delete(req.id)

        const start = startedAt.get(req.id)
        if (start !== undefined) startedAt.delete(req.id)
        const ms = start !== undefined ? Date.now() - start : undefined

        logReq.debug(`${req.method} ${req.url} → ${reply.statusCode}${ms !== undefined ? ` (${ms} ms)` : ''}`)
    })
    // ---------------------------------------------------

    // Health
    app.get('/health', async () => ({ status: 'ok' }))

    void app.register(dashboardRoutes)

    void app.register(fastifyStatic, {
        root: opts.publicDir ?? resolvePublicDir(),
        prefix: '/static/',
    })

    // Chart.js for the dashboard, served from node_modules
    void app.register(fastifyStatic, {
        root: resolveChartJsDir(),
        prefix: '/vendor/chart.js/',
        decorateReply: false,
    })

    app.setNotFoundHandler((_req, reply) => {
        reply.status(404).send({ error: 'Not found' })
    })

    logApp.info('bridge app built')
    return app
}
