// services/bridge/src/adapters/bridgeState.adapter.ts

import type { BridgeStateStore } from '../core/state.js'
import type { PersistedState } from '../core/baseline/types.js'
import { dailyEnergyOf } from '../core/baseline/BaselineTracker.js'
import type { PollEvent } from '../core/poll/types.js'
import { describeStatus } from '../devices/inverter/utils.js'

/**
 * BridgeStateAdapter
 *
 * Listens to PollEvent objects emitted by the PollLoop and translates them
 * into BridgeState changes. It is the only writer of the store.
 *
 * The adapter keeps no copy of its own; counters are read back from the
 * current snapshot and incremented.
 */
export class BridgeStateAdapter {
    private readonly store: BridgeStateStore
    /** First register of the block each Reading was decoded from. */
    private readonly registerStart: number

    constructor(store: BridgeStateStore, opts: { registerStart: number }) {
        this.store = store
        this.registerStart = opts.registerStart
    }

    /**
     * Seed the daily slice from the persisted state at startup. A file from a
     * previous day carries no energy for today.
     */
    restore(state: PersistedState | null, today: string): void {
        if (!state || state.daily.date !== today) return

        this.store.updateDaily({
            date: state.daily.date,
            baselineEnergyWh: state.daily.baselineEnergyWh,
            lifetimeEnergyWh: state.daily.lastKnownLifetimeEnergyWh,
            energyTodayWh: dailyEnergyOf(state.daily),
            uptimeStartTimestamp: state.daily.uptimeStartTimestamp,
            peakPowerW: state.today.peakPowerW,
            uptimeMinutes: state.today.uptimeMinutes,
            lastSampleAt: state.today.lastSampleAt,
        })
        this.store.setRecords(state.today.records)
    }

    handle(evt: PollEvent): void {
        switch (evt.kind) {
            /* ------------------------------------------------------------------ */
            /*  LOOP LIFECYCLE                                                    */
            /* ------------------------------------------------------------------ */

            case 'poller-started': {
                this.store.updatePoller({ phase: 'idle', intervalMs: evt.intervalMs })
                this.store.setStatus('ready')
                return
            }

            case 'poller-stopped': {
                this.store.updatePoller({ phase: 'stopped' })
                return
            }

            case 'poll-tick-skipped': {
                const snap = this.store.getSnapshot()
                this.store.updatePoller({ skippedTicks: snap.poller.skippedTicks + 1 })
                return
            }

            case 'poll-started': {
                this.store.updatePoller({
                    phase: 'polling',
                    cycles: evt.cycle,
                    lastStartedAt: new Date(evt.at).toISOString(),
                })
                return
            }

            case 'poll-finished': {
                const snap = this.store.getSnapshot()
                this.store.updatePoller({
                    // A stop() during the cycle already moved us to 'stopped'.
                    phase: snap.poller.phase === 'stopped' ? 'stopped' : 'idle',
                    lastFinishedAt: new Date(evt.at).toISOString(),
                    lastDurationMs: evt.durationMs,
                    lastOutcome: evt.outcome,
                })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  DEVICE                                                            */
            /* ------------------------------------------------------------------ */

            case 'poll-read-ok': {
                const r = evt.reading
                const stats = this.store.getSnapshot().inverter.stats

                this.store.updateInverter({
                    phase: r.night ? 'night' : 'online',
                    status: describeStatus(r),
                    stats: {
                        totalReads: stats.totalReads + 1,
                        lastReadAt: evt.at,
                    },
                    lastReading: {
                        timestamp: r.timestamp,
                        powerW: r.powerW,
                        voltageV: r.voltageV,
                        frequencyHz: r.frequencyHz,
                        temperatureC: r.temperatureC,
                        lifetimeEnergyWh: r.lifetimeEnergyWh,
                        statusCode: r.statusCode,
                        night: r.night,
                    },
                    rawRegisters: {
                        readAt: r.timestamp,
                        start: this.registerStart,
                        registers: [...r.rawRegisters],
                    },
                })
                return
            }

            case 'poll-read-failed': {
                const stats = this.store.getSnapshot().inverter.stats

                this.store.updateInverter({
                    phase: 'offline',
                    message: evt.error.message,
                    status: { text: 'Offline', tone: 'muted' },
                    stats: {
                        totalReads: stats.totalReads + 1,
                        failedReads: stats.failedReads + 1,
                        lastErrorAt: evt.at,
                    },
                })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  BASELINE                                                          */
            /* ------------------------------------------------------------------ */

            case 'poll-baseline-updated': {
                const { daily, today, dailyEnergyWh, transition, persisted } = evt.update
                this.store.updateDaily({
                    date: daily.date,
                    baselineEnergyWh: daily.baselineEnergyWh,
                    lifetimeEnergyWh: daily.lastKnownLifetimeEnergyWh,
                    energyTodayWh: dailyEnergyWh,
                    uptimeStartTimestamp: daily.uptimeStartTimestamp,
                    peakPowerW: today.peakPowerW,
                    uptimeMinutes: today.uptimeMinutes,
                    lastSampleAt: today.lastSampleAt,
                    lastTransition: transition,
                    persisted,
                })
                this.store.setRecords(today.records)
                return
            }

            case 'poll-baseline-failed': {
                this.store.updateDaily({ persisted: false })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  UPLOAD                                                            */
            /* ------------------------------------------------------------------ */

            case 'poll-upload-ok': {
                const stats = this.store.getSnapshot().uploader.stats
                this.store.updateUploader({
                    lastResult: 'ok',
                    lastAttemptAt: evt.receipt.publishedAt,
                    lastUploadAt: evt.receipt.publishedAt,
                    lastError: null,
                    stats: { uploads: stats.uploads + 1 },
                })
                return
            }

            case 'poll-upload-failed': {
                const stats = this.store.getSnapshot().uploader.stats
                this.store.updateUploader({
                    lastResult: 'failed',
                    lastAttemptAt: new Date(evt.at).toISOString(),
                    lastError: evt.error.message,
                    stats: { failures: stats.failures + 1 },
                })
                return
            }

            case 'poll-upload-skipped': {
                const stats = this.store.getSnapshot().uploader.stats
                this.store.updateUploader({
                    lastResult: 'skipped',
                    stats: { skipped: stats.skipped + 1 },
                })
                return
            }
        }
    }
}
