// services/bridge/src/core/state.ts
import type { InverterStatus } from '../devices/inverter/types.js'
import type { BaselineTransition, ChartRecord } from './baseline/types.js'

/**
 * Client-consumable server configuration shipped inside the state snapshot.
 */
export type ServerConfig = {
    timeZone: string
    pollIntervalMs: number
    dryRun: boolean
}

/* -------------------------------------------------------------------------- */
/*  Inverter snapshot                                                         */
/* -------------------------------------------------------------------------- */

export type InverterSnapshot = {
    phase: 'unknown' | 'online' | 'night' | 'offline'
    message?: string
    status: InverterStatus
    stats: {
        totalReads: number
        failedReads: number
        lastReadAt: number | null
        lastErrorAt: number | null
    }
    lastReading: {
        timestamp: string
        powerW: number
        voltageV: number
        frequencyHz: number
        temperatureC: number
        lifetimeEnergyWh: number
        statusCode: number
        night: boolean
    } | null
    /** Register block behind lastReading, for diagnostics. */
    rawRegisters: {
        readAt: string
        start: number
        registers: number[]
    } | null
}

/* -------------------------------------------------------------------------- */
/*  Daily snapshot                                                            */
/* -------------------------------------------------------------------------- */

export type DailySnapshot = {
    date: string | null
    baselineEnergyWh: number | null
    lifetimeEnergyWh: number | null
    energyTodayWh: number
    uptimeStartTimestamp: string | null
    peakPowerW: number
    uptimeMinutes: number
    lastSampleAt: string | null
    lastTransition: BaselineTransition | null
    persisted: boolean
}

/* -------------------------------------------------------------------------- */
/*  Uploader + poller snapshots                                               */
/* -------------------------------------------------------------------------- */

export type UploaderSnapshot = {
    mode: 'dry-run' | 'live'
    lastResult: 'ok' | 'failed' | 'skipped' | null
    lastAttemptAt: string | null
    lastUploadAt: string | null
    lastError?: string
    stats: {
        uploads: number
        failures: number
        skipped: number
    }
}

export type PollerSnapshot = {
    phase: 'stopped' | 'idle' | 'polling'
    intervalMs: number
    cycles: number
    skippedTicks: number
    lastStartedAt: string | null
    lastFinishedAt: string | null
    lastDurationMs: number | null
    lastOutcome: 'ok' | 'partial' | 'failed' | null
}

/* -------------------------------------------------------------------------- */
/*  Full BridgeState                                                          */
/* -------------------------------------------------------------------------- */

export type BridgeState = {
    version: number
    meta: { startedAt: string; status: 'booting' | 'ready' | 'error' }
    serverConfig: ServerConfig
    inverter: InverterSnapshot
    daily: DailySnapshot
    records: ChartRecord[]
    uploader: UploaderSnapshot
    poller: PollerSnapshot
}

function clone<T>(v: T): T {
    return JSON.parse(JSON.stringify(v)) as T
}

export function initialBridgeState(serverConfig: ServerConfig, startedAt: Date = new Date()): BridgeState {
    return {
        version: 1,
        meta: { startedAt: startedAt.toISOString(), status: 'booting' },
        serverConfig: { ...serverConfig },
        inverter: {
            phase: 'unknown',
            message: undefined,
            status: { text: 'Unknown', tone: 'muted' },
            stats: {
                totalReads: 0,
                failedReads: 0,
                lastReadAt: null,
                lastErrorAt: null,
            },
            lastReading: null,
            rawRegisters: null,
        },
        daily: {
            date: null,
            baselineEnergyWh: null,
            lifetimeEnergyWh: null,
            energyTodayWh: 0,
            uptimeStartTimestamp: null,
            peakPowerW: 0,
            uptimeMinutes: 0,
            lastSampleAt: null,
            lastTransition: null,
            persisted: true,
        },
        records: [],
        uploader: {
            mode: serverConfig.dryRun ? 'dry-run' : 'live',
            lastResult: null,
            lastAttemptAt: null,
            lastUploadAt: null,
            lastError: undefined,
            stats: { uploads: 0, failures: 0, skipped: 0 },
        },
        poller: {
            phase: 'stopped',
            intervalMs: serverConfig.pollIntervalMs,
            cycles: 0,
            skippedTicks: 0,
            lastStartedAt: null,
            lastFinishedAt: null,
            lastDurationMs: null,
            lastOutcome: null,
        },
    }
}

/**
 * BridgeStateStore
 *
 * Single writer (the poll loop's state adapter), many readers. Every write
 * replaces the top-level slice and bumps `version`; every read returns a deep
 * copy, so HTTP handlers never observe a half-applied update.
 */
export class BridgeStateStore {
    private state: BridgeState

    constructor(initial: BridgeState) {
        this.state = clone(initial)
    }

    public getSnapshot(): BridgeState {
        return clone(this.state)
    }

    public set<K extends Exclude<keyof BridgeState, 'version'>>(key: K, value: BridgeState[K]): void {
        this.state = {
            ...this.state,
            [key]: clone(value),
            version: this.state.version + 1,
        }
    }

    public setStatus(status: BridgeState['meta']['status']): void {
        this.set('meta', { ...this.state.meta, status })
    }

    public updateInverter(partial: {
        phase?: InverterSnapshot['phase']
        message?: string
        status?: InverterSnapshot['status']
        stats?: Partial<InverterSnapshot['stats']>
        lastReading?: InverterSnapshot['lastReading']
        rawRegisters?: InverterSnapshot['rawRegisters']
    }): void {
        const prev = this.state.inverter
        const merged: InverterSnapshot = {
            phase: partial.phase ?? prev.phase,
            // An explicit phase change without a message clears the old one.
            message: partial.message ?? (partial.phase ? undefined : prev.message),
            status: partial.status ?? prev.status,
            stats: { ...prev.stats, ...(partial.stats ?? {}) },
            lastReading: partial.lastReading !== undefined ? partial.lastReading : prev.lastReading,
            rawRegisters: partial.rawRegisters !== undefined ? partial.rawRegisters : prev.rawRegisters,
        }
        this.set('inverter', merged)
    }

    public updateDaily(partial: Partial<DailySnapshot>): void {
        this.set('daily', { ...this.state.daily, ...partial })
    }

    public setRecords(records: ChartRecord[]): void {
        this.set('records', records)
    }

    public updateUploader(partial: {
        lastResult?: UploaderSnapshot['lastResult']
        lastAttemptAt?: string | null
        lastUploadAt?: string | null
        lastError?: string | null
        stats?: Partial<UploaderSnapshot['stats']>
    }): void {
        const prev = this.state.uploader
        const merged: UploaderSnapshot = {
            mode: prev.mode,
            lastResult: partial.lastResult !== undefined ? partial.lastResult : prev.lastResult,
            lastAttemptAt: partial.lastAttemptAt !== undefined ? partial.lastAttemptAt : prev.lastAttemptAt,
            lastUploadAt: partial.lastUploadAt !== undefined ? partial.lastUploadAt : prev.lastUploadAt,
            lastError: partial.lastError === null ? undefined : (partial.lastError ?? prev.lastError),
            stats: { ...prev.stats, ...(partial.stats ?? {}) },
        }
        this.set('uploader', merged)
    }

    public updatePoller(partial: Partial<PollerSnapshot>): void {
        this.set('poller', { ...this.state.poller, ...partial })
    }
}
