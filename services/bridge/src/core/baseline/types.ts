// services/bridge/src/core/baseline/types.ts

/** The active day's baseline. Exactly one exists at a time. */
export interface DailyState {
    /** Local calendar day (YYYY-MM-DD) in the configured time zone. */
    date: string
    /** Lifetime counter captured when the day (or a counter reset) began. */
    baselineEnergyWh: number
    lastKnownLifetimeEnergyWh: number
    /** ISO timestamp of the first reading of this baseline's day. */
    uptimeStartTimestamp: string
}

export interface ChartRecord {
    timestamp: string
    powerW: number
    /** Energy generated today at this sample. */
    energyWh: number
}

/** Per-day extras kept next to the baseline; cleared on a new day. */
export interface DaySummary {
    peakPowerW: number
    /** Minutes spent generating (> 5 W, not night). */
    uptimeMinutes: number
    lastSampleAt: string | null
    records: ChartRecord[]
}

export interface PersistedState {
    version: 1
    daily: DailyState
    today: DaySummary
}

/**
 * How an update relates to the previous state:
 *   - initial:       no state yet, first baseline
 *   - same-day:      baseline kept
 *   - new-day:       local date rolled over, baseline reset
 *   - counter-reset: lifetime counter went backwards, baseline reset
 */
export type BaselineTransition = 'initial' | 'same-day' | 'new-day' | 'counter-reset'

export interface DailyUpdate {
    daily: DailyState
    today: DaySummary
    dailyEnergyWh: number
    transition: BaselineTransition
    /** False when the state file could not be written this cycle. */
    persisted: boolean
}

export interface BaselineConfig {
    statePath: string
    timeZone: string
    /** Used to cap uptime gaps after downtime. */
    pollIntervalMs: number
    /** Chart records kept per day. */
    maxRecords: number
}

export interface BaselineEventSink {
    publish(evt: BaselineEvent): void
}

export type BaselineEvent =
    | {
        kind: 'baseline-loaded'
        at: number
        source: 'file' | 'none'
        date: string | null
    }
    | {
        kind: 'baseline-corrupt'
        at: number
        path: string
        error: string
    }
    | {
        kind: 'baseline-reset'
        at: number
        transition: Exclude<BaselineTransition, 'same-day'>
        date: string
        baselineEnergyWh: number
        previousLifetimeEnergyWh: number | null
    }
    | {
        kind: 'baseline-updated'
        at: number
        date: string
        dailyEnergyWh: number
    }
    | {
        kind: 'baseline-persist-failed'
        at: number
        path: string
        error: string
    }
