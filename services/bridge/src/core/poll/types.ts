// services/bridge/src/core/poll/types.ts

import type { BridgeErrorShape } from '../../errors.js'
import type { Reading } from '../../devices/inverter/types.js'
import type { DailyUpdate } from '../baseline/types.js'
import type { UploadReceipt } from '../sinks/pvoutput/pvoutput.sink.js'

export type PollPhase = 'idle' | 'polling'

export type PollOutcome = 'ok' | 'partial' | 'failed'

/* -------------------------------------------------------------------------- */
/*  Stage contracts                                                           */
/* -------------------------------------------------------------------------- */

export interface ReadingSource {
    read(): Promise<Reading>
}

export interface DailyTracker {
    update(reading: Reading, now: Date): Promise<DailyUpdate>
}

export interface StatusUploader {
    shouldUpload(reading: Reading): boolean
    upload(reading: Reading, dailyEnergyWh: number, now: Date): Promise<UploadReceipt>
}

export interface PollLoopConfig {
    intervalMs: number
}

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export interface PollEventSink {
    publish(evt: PollEvent): void
}

export type PollEvent =
    | {
        kind: 'poller-started'
        at: number
        intervalMs: number
    }
    | {
        kind: 'poller-stopped'
        at: number
    }
    | {
        kind: 'poll-tick-skipped'
        at: number
        cycle: number
    }
    | {
        kind: 'poll-started'
        at: number
        cycle: number
    }
    | {
        kind: 'poll-read-ok'
        at: number
        reading: Reading
    }
    | {
        kind: 'poll-read-failed'
        at: number
        error: BridgeErrorShape
    }
    | {
        kind: 'poll-baseline-updated'
        at: number
        update: DailyUpdate
    }
    | {
        kind: 'poll-baseline-failed'
        at: number
        error: BridgeErrorShape
    }
    | {
        kind: 'poll-upload-ok'
        at: number
        receipt: UploadReceipt
    }
    | {
        kind: 'poll-upload-failed'
        at: number
        error: BridgeErrorShape
    }
    | {
        kind: 'poll-upload-skipped'
        at: number
        reason: 'night'
    }
    | {
        kind: 'poll-finished'
        at: number
        cycle: number
        durationMs: number
        outcome: PollOutcome
    }
