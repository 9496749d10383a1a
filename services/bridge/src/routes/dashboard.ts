// services/bridge/src/routes/dashboard.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'

import { parseIntSafe } from '../core/env.js'
import { buildChartData, buildStatusView } from '../dashboard/view.js'
import { renderDashboardPage } from '../dashboard/page.js'

interface LogsQuery {
    n?: string
}

/**
 * Read-only views over the bridge snapshot. Nothing here reaches the
 * inverter; /raw serves the block captured by the last successful poll.
 */
const dashboardRoutes: FastifyPluginAsync = async (app: FastifyInstance) => {
    app.get('/', async (_req, reply) => {
        const view = buildStatusView(app.bridgeState.getSnapshot())
        reply.type('text/html; charset=utf-8')
        return renderDashboardPage(view)
    })

    app.get('/status', async () => buildStatusView(app.bridgeState.getSnapshot()))

    app.get('/data', async () => buildChartData(app.bridgeState.getSnapshot()))

    app.get('/raw', async (_req, reply) => {
        const snap = app.bridgeState.getSnapshot()
        const raw = snap.inverter.rawRegisters
        if (!raw) {
            reply.code(503)
            return { error: 'no reading yet' }
        }
        return {
            timestamp: raw.readAt,
            start: raw.start,
            count: raw.registers.length,
            registers: raw.registers,
            phase: snap.inverter.phase,
            lastError: snap.inverter.message ?? null,
        }
    })

    app.get<{ Querystring: LogsQuery }>('/api/logs', async req => {
        const n = Math.min(1000, Math.max(0, parseIntSafe(req.query.n, 200)))
        return { logs: app.clientBuf.getLatest(n) }
    })
}

export default dashboardRoutes
