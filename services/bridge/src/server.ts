import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'

import { createLogger, LogChannel } from '@pvbridge/logging'

import { buildApp } from './app.js'
import { buildBridgeConfig, summarizeConfig } from './config.js'
import { ConfigError } from './errors.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'production')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]
    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

async function start() {
    // DEBUG raises the level unless LOG_LEVEL was set explicitly.
    if (process.env.LOG_LEVEL === undefined && /^(1|true|yes)$/i.test(process.env.DEBUG ?? '')) {
        process.env.LOG_LEVEL = 'debug'
    }

    const { channel } = createLogger('bridge')
    const logBridge = channel(LogChannel.bridge)

    let app: FastifyInstance | null = null

    try {
        const config = buildBridgeConfig(process.env)
        logBridge.info('config loaded', summarizeConfig(config))
        if (config.pvoutput.dryRun) {
            logBridge.warn('DRY_RUN=true, status will be logged instead of uploaded')
        }

        app = buildApp({ config })
        await app.listen({ port: config.api.port, host: config.api.host })

        logBridge.info(`listening host=${config.api.host} port=${config.api.port}`)

        // Graceful shutdown
        let closing = false
        const shutdown = async (signal: NodeJS.Signals) => {
            if (closing) return
            closing = true
            try {
                logBridge.info(`received ${signal}, shutting down`)
                await app?.close()
                logBridge.info('bridge closed')
                process.exit(0)
            } catch (err) {
                logBridge.error('error during shutdown', { err: err instanceof Error ? err.message : String(err) })
                process.exit(1)
            }
        }

        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        if (err instanceof ConfigError) {
            for (const problem of err.problems) logBridge.fatal(`kind=config-invalid problem=${JSON.stringify(problem)}`)
        } else {
            logBridge.fatal(`failed to start err=${JSON.stringify(err instanceof Error ? err.message : String(err))}`)
        }
        try {
            await app?.close()
        } catch (closeErr) {
            logBridge.warn('error closing after failed start', {
                err: closeErr instanceof Error ? closeErr.message : String(closeErr),
            })
        }
        process.exit(1)
    }
}

void start()
