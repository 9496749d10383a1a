// services/bridge/src/dashboard/view.ts

import type { BridgeState } from '../core/state.js'
import type { ChartRecord } from '../core/baseline/types.js'
import type { InverterStatus } from '../devices/inverter/types.js'
import { plausibleGridVoltage } from '../devices/inverter/utils.js'
import { formatClock, formatLocal, localDate } from '../core/time.js'

export type DataQualityText = 'STARTING' | 'LIVE' | 'STALE' | 'NO DATA' | 'OFFLINE'

export type DataQuality = {
    text: DataQualityText
    tone: 'dq_ok' | 'dq_warn' | 'dq_off'
}

/**
 * Freshness of the last good sample relative to the poll interval:
 * under 1.5 intervals is live, under 3 is stale, beyond that no data.
 */
export function assessDataQuality(args: {
    cycles: number
    connected: boolean
    lastSampleAt: string | null
    pollIntervalMs: number
    now: Date
}): DataQuality {
    if (args.cycles === 0) return { text: 'STARTING', tone: 'dq_warn' }
    if (!args.connected) return { text: 'OFFLINE', tone: 'dq_off' }

    const last = args.lastSampleAt ? Date.parse(args.lastSampleAt) : Number.NaN
    if (Number.isNaN(last)) return { text: 'NO DATA', tone: 'dq_off' }

    const ageMs = args.now.getTime() - last
    if (ageMs < args.pollIntervalMs * 1.5) return { text: 'LIVE', tone: 'dq_ok' }
    if (ageMs < args.pollIntervalMs * 3) return { text: 'STALE', tone: 'dq_warn' }
    return { text: 'NO DATA', tone: 'dq_off' }
}

export function formatUptime(minutes: number): string {
    const total = Math.max(0, Math.floor(minutes))
    return `${Math.floor(total / 60)}h ${total % 60}m`
}

export type StatusView = {
    generatedAt: string
    timeZone: string
    status: InverterStatus
    dataQuality: DataQuality
    inverter: {
        phase: BridgeState['inverter']['phase']
        message: string | null
        powerW: number | null
        voltageV: number | null
        frequencyHz: number | null
        temperatureC: number | null
        lifetimeEnergyKwh: number | null
        statusCode: number | null
        night: boolean
        lastPoll: string | null
    }
    today: {
        date: string
        energyWh: number
        energyKwh: number
        peakPowerW: number
        uptimeMinutes: number
        uptime: string
        baselineEnergyWh: number | null
    }
    uploader: {
        mode: BridgeState['uploader']['mode']
        lastResult: BridgeState['uploader']['lastResult']
        lastUpload: string | null
        lastError: string | null
    }
    poller: {
        phase: BridgeState['poller']['phase']
        intervalSeconds: number
        cycles: number
        skippedTicks: number
        lastOutcome: BridgeState['poller']['lastOutcome']
    }
}

const kwh = (wh: number): number => Math.round(wh) / 1000

/**
 * Read-only projection of a snapshot for /status and the page. Values of a
 * previous local day are reported as zero for today.
 */
export function buildStatusView(snap: BridgeState, now: Date = new Date()): StatusView {
    const tz = snap.serverConfig.timeZone
    const today = localDate(now, tz)
    const isToday = snap.daily.date === today
    const reading = snap.inverter.lastReading
    const energyWh = isToday ? snap.daily.energyTodayWh : 0

    return {
        generatedAt: now.toISOString(),
        timeZone: tz,
        status: snap.inverter.status,
        dataQuality: assessDataQuality({
            cycles: snap.poller.cycles,
            connected: snap.inverter.phase === 'online',
            lastSampleAt: snap.daily.lastSampleAt,
            pollIntervalMs: snap.serverConfig.pollIntervalMs,
            now,
        }),
        inverter: {
            phase: snap.inverter.phase,
            message: snap.inverter.message ?? null,
            powerW: reading ? reading.powerW : null,
            voltageV: reading && snap.inverter.phase !== 'offline' ? plausibleGridVoltage(reading.voltageV) : null,
            frequencyHz: reading && snap.inverter.phase !== 'offline' ? reading.frequencyHz : null,
            temperatureC: reading && snap.inverter.phase !== 'offline' ? reading.temperatureC : null,
            lifetimeEnergyKwh: reading ? kwh(reading.lifetimeEnergyWh) : null,
            statusCode: reading ? reading.statusCode : null,
            night: reading ? reading.night : false,
            lastPoll: formatLocal(snap.daily.lastSampleAt, tz),
        },
        today: {
            date: today,
            energyWh,
            energyKwh: kwh(energyWh),
            peakPowerW: isToday ? snap.daily.peakPowerW : 0,
            uptimeMinutes: isToday ? snap.daily.uptimeMinutes : 0,
            uptime: formatUptime(isToday ? snap.daily.uptimeMinutes : 0),
            baselineEnergyWh: isToday ? snap.daily.baselineEnergyWh : null,
        },
        uploader: {
            mode: snap.uploader.mode,
            lastResult: snap.uploader.lastResult,
            lastUpload: formatLocal(snap.uploader.lastUploadAt, tz),
            lastError: snap.uploader.lastError ?? null,
        },
        poller: {
            phase: snap.poller.phase,
            intervalSeconds: Math.round(snap.poller.intervalMs / 1000),
            cycles: snap.poller.cycles,
            skippedTicks: snap.poller.skippedTicks,
            lastOutcome: snap.poller.lastOutcome,
        },
    }
}

export type ChartPoint = ChartRecord & { label: string }

/** Today's chart records with a local HH:mm label each. */
export function buildChartData(snap: BridgeState, now: Date = new Date()): { date: string; records: ChartPoint[] } {
    const tz = snap.serverConfig.timeZone
    const today = localDate(now, tz)
    const records = snap.daily.date === today ? snap.records : []
    return {
        date: today,
        records: records.map(r => ({ ...r, label: formatClock(r.timestamp, tz) })),
    }
}
