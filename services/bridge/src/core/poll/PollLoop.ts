import { toErrorShape } from '../../errors.js'
import type { Reading } from '../../devices/inverter/types.js'
import type { DailyUpdate } from '../baseline/types.js'
import type {
    DailyTracker,
    PollEventSink,
    PollLoopConfig,
    PollOutcome,
    PollPhase,
    ReadingSource,
    StatusUploader,
} from './types.js'

interface PollLoopDeps {
    reader: ReadingSource
    tracker: DailyTracker
    uploader: StatusUploader
    events: PollEventSink
    now?: () => Date
}

/**
 * PollLoop
 *
 * Two phases:
 *   idle    --tick-->                polling
 *   polling --sequence done/failed--> idle
 *
 * A tick that arrives while polling is skipped. Each stage's failure is
 * caught, reported and ends the cycle; nothing escapes to the timer.
 */
export class PollLoop {
    private readonly config: PollLoopConfig
    private readonly deps: PollLoopDeps
    private readonly now: () => Date

    private phase: PollPhase = 'idle'
    private timer: NodeJS.Timeout | null = null
    private inFlight: Promise<void> | null = null
    private cycle = 0

    constructor(config: PollLoopConfig, deps: PollLoopDeps) {
        this.config = config
        this.deps = deps
        this.now = deps.now ?? (() => new Date())
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    /** Poll once right away, then on every interval. */
    public start(): void {
        if (this.timer) return

        this.deps.events.publish({
            kind: 'poller-started',
            at: Date.now(),
            intervalMs: this.config.intervalMs,
        })

        void this.tick()
        this.timer = setInterval(() => {
            void this.tick()
        }, this.config.intervalMs)
    }

    /** Stop the timer and wait for an in-flight cycle to finish. */
    public async stop(): Promise<void> {
        const wasRunning = this.timer !== null
        if (this.timer) {
            clearInterval(this.timer)
            this.timer = null
        }
        if (this.inFlight) {
            await this.inFlight
        }
        if (wasRunning) {
            this.deps.events.publish({ kind: 'poller-stopped', at: Date.now() })
        }
    }

    public isRunning(): boolean {
        return this.timer !== null
    }

    public getPhase(): PollPhase {
        return this.phase
    }

    /**
     * Timer entry point; also usable directly to force a cycle. Resolves when
     * the cycle it started (or was skipped in favour of) is done.
     */
    public tick(): Promise<void> {
        if (this.phase === 'polling') {
            this.deps.events.publish({
                kind: 'poll-tick-skipped',
                at: Date.now(),
                cycle: this.cycle,
            })
            return this.inFlight ?? Promise.resolve()
        }

        this.phase = 'polling'
        this.cycle += 1
        const run = this.runCycle(this.cycle).finally(() => {
            this.phase = 'idle'
            this.inFlight = null
        })
        this.inFlight = run
        return run
    }

    /* ---------------------------------------------------------------------- */
    /*  Cycle                                                                 */
    /* ---------------------------------------------------------------------- */

    private async runCycle(cycle: number): Promise<void> {
        const { events } = this.deps
        const startedAt = this.now()
        const startedMs = Date.now()

        events.publish({ kind: 'poll-started', at: startedMs, cycle })

        const outcome = await this.runStages(startedAt)

        events.publish({
            kind: 'poll-finished',
            at: Date.now(),
            cycle,
            durationMs: Date.now() - startedMs,
            outcome,
        })
    }

    private async runStages(now: Date): Promise<PollOutcome> {
        const { reader, tracker, uploader, events } = this.deps

        // 1) Device
        let reading: Reading
        try {
            reading = await reader.read()
        } catch (err) {
            events.publish({ kind: 'poll-read-failed', at: Date.now(), error: toErrorShape(err) })
            return 'failed'
        }
        events.publish({ kind: 'poll-read-ok', at: Date.now(), reading })

        // 2) Baseline
        let update: DailyUpdate
        try {
            update = await tracker.update(reading, now)
        } catch (err) {
            events.publish({ kind: 'poll-baseline-failed', at: Date.now(), error: toErrorShape(err) })
            return 'partial'
        }
        events.publish({ kind: 'poll-baseline-updated', at: Date.now(), update })

        // 3) Upload
        if (!uploader.shouldUpload(reading)) {
            events.publish({ kind: 'poll-upload-skipped', at: Date.now(), reason: 'night' })
            return 'ok'
        }
        try {
            const receipt = await uploader.upload(reading, update.dailyEnergyWh, now)
            events.publish({ kind: 'poll-upload-ok', at: Date.now(), receipt })
            return 'ok'
        } catch (err) {
            events.publish({ kind: 'poll-upload-failed', at: Date.now(), error: toErrorShape(err) })
            return 'partial'
        }
    }
}
