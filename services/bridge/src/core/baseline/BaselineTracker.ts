import { StateCorruptError } from '../../errors.js'
import type { Reading } from '../../devices/inverter/types.js'
import { localDate } from '../time.js'
import { readStateFile, writeStateFile } from './stateFile.js'
import type {
    BaselineConfig,
    BaselineEventSink,
    BaselineTransition,
    DailyState,
    DailyUpdate,
    DaySummary,
    PersistedState,
} from './types.js'

interface BaselineTrackerDeps {
    events: BaselineEventSink
}

/** Below this output the inverter is idling, not generating. */
const GENERATING_MIN_W = 5

const roundWh = (n: number): number => Math.round(n * 1000) / 1000

export function dailyEnergyOf(daily: DailyState): number {
    return roundWh(Math.max(0, daily.lastKnownLifetimeEnergyWh - daily.baselineEnergyWh))
}

export function classifyTransition(
    prev: DailyState | null,
    today: string,
    lifetimeEnergyWh: number
): BaselineTransition {
    if (!prev) return 'initial'
    if (prev.date !== today) return 'new-day'
    if (lifetimeEnergyWh < prev.lastKnownLifetimeEnergyWh) return 'counter-reset'
    return 'same-day'
}

/**
 * Pure state step: previous persisted state + reading → next state.
 * BaselineTracker wraps this with persistence and events.
 */
export function applyReading(
    prev: PersistedState | null,
    reading: Reading,
    now: Date,
    opts: { timeZone: string; pollIntervalMs: number; maxRecords: number }
): Omit<DailyUpdate, 'persisted'> {
    const today = localDate(now, opts.timeZone)
    const lifetime = reading.lifetimeEnergyWh
    const transition = classifyTransition(prev?.daily ?? null, today, lifetime)
    const nowIso = now.toISOString()

    let daily: DailyState
    let summary: DaySummary

    if (prev === null || transition === 'initial' || transition === 'new-day') {
        daily = {
            date: today,
            baselineEnergyWh: lifetime,
            lastKnownLifetimeEnergyWh: lifetime,
            uptimeStartTimestamp: nowIso,
        }
        summary = { peakPowerW: 0, uptimeMinutes: 0, lastSampleAt: null, records: [] }
    } else if (transition === 'counter-reset') {
        // Same day, so uptime start and the day's chart survive the reset.
        daily = { ...prev.daily, baselineEnergyWh: lifetime, lastKnownLifetimeEnergyWh: lifetime }
        summary = cloneSummary(prev.today)
    } else {
        daily = { ...prev.daily, lastKnownLifetimeEnergyWh: lifetime }
        summary = cloneSummary(prev.today)
    }

    const dailyEnergyWh = dailyEnergyOf(daily)

    if (!reading.night && reading.powerW > GENERATING_MIN_W && summary.lastSampleAt) {
        const elapsedMs = now.getTime() - Date.parse(summary.lastSampleAt)
        // Cap gaps after downtime so a restart does not count as uptime.
        const cappedMin = Math.min(elapsedMs, opts.pollIntervalMs * 2) / 60_000
        if (cappedMin > 0) {
            summary.uptimeMinutes = Math.round((summary.uptimeMinutes + cappedMin) * 10) / 10
        }
    }
    summary.lastSampleAt = nowIso
    summary.peakPowerW = Math.max(summary.peakPowerW, reading.powerW)

    summary.records.push({ timestamp: nowIso, powerW: Math.round(reading.powerW), energyWh: Math.round(dailyEnergyWh) })
    if (summary.records.length > opts.maxRecords) {
        summary.records.splice(0, summary.records.length - opts.maxRecords)
    }

    return { daily, today: summary, dailyEnergyWh, transition }
}

function cloneSummary(s: DaySummary): DaySummary {
    return { ...s, records: s.records.map(r => ({ ...r })) }
}

/**
 * BaselineTracker
 *
 * Owns the single DailyState and its day summary. Every update is written to
 * the state file before returning; a failed write is reported through the
 * event sink and the in-memory state is still returned.
 */
export class BaselineTracker {
    private readonly config: BaselineConfig
    private readonly deps: BaselineTrackerDeps

    private state: PersistedState | null = null

    constructor(config: BaselineConfig, deps: BaselineTrackerDeps) {
        this.config = config
        this.deps = deps
    }

    /**
     * Restore from disk. Missing file: start empty. Corrupt file: report it
     * and start empty; the next reading establishes a fresh baseline.
     */
    public async load(): Promise<void> {
        const at = Date.now()
        try {
            this.state = await readStateFile(this.config.statePath)
        } catch (err) {
            this.state = null
            const corrupt = err instanceof StateCorruptError
                ? err
                : new StateCorruptError(this.config.statePath, err instanceof Error ? err.message : String(err), err)
            this.deps.events.publish({
                kind: 'baseline-corrupt',
                at,
                path: this.config.statePath,
                error: corrupt.message,
            })
        }

        this.deps.events.publish({
            kind: 'baseline-loaded',
            at,
            source: this.state ? 'file' : 'none',
            date: this.state?.daily.date ?? null,
        })
    }

    public async update(reading: Reading, now: Date = new Date()): Promise<DailyUpdate> {
        const prevLifetime = this.state?.daily.lastKnownLifetimeEnergyWh ?? null
        const step = applyReading(this.state, reading, now, this.config)

        this.state = { version: 1, daily: step.daily, today: step.today }

        if (step.transition !== 'same-day') {
            this.deps.events.publish({
                kind: 'baseline-reset',
                at: now.getTime(),
                transition: step.transition,
                date: step.daily.date,
                baselineEnergyWh: step.daily.baselineEnergyWh,
                previousLifetimeEnergyWh: prevLifetime,
            })
        }

        let persisted = true
        try {
            await writeStateFile(this.config.statePath, this.state)
        } catch (err) {
            persisted = false
            this.deps.events.publish({
                kind: 'baseline-persist-failed',
                at: Date.now(),
                path: this.config.statePath,
                error: err instanceof Error ? err.message : String(err),
            })
        }

        this.deps.events.publish({
            kind: 'baseline-updated',
            at: now.getTime(),
            date: step.daily.date,
            dailyEnergyWh: step.dailyEnergyWh,
        })

        return { ...step, daily: { ...step.daily }, today: cloneSummary(step.today), persisted }
    }

    /**
     * Energy generated on the local day of `now`. A day with no reading yet
     * has no baseline and reports 0.
     */
    public dailyEnergyFor(now: Date = new Date()): number {
        if (!this.state) return 0
        if (this.state.daily.date !== localDate(now, this.config.timeZone)) return 0
        return dailyEnergyOf(this.state.daily)
    }

    /** Copy of the current persisted shape, if any. */
    public getState(): PersistedState | null {
        if (!this.state) return null
        return { version: 1, daily: { ...this.state.daily }, today: cloneSummary(this.state.today) }
    }
}
