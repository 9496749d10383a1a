// services/bridge/src/devices/inverter/types.ts

/* -------------------------------------------------------------------------- */
/*  Core configuration                                                        */
/* -------------------------------------------------------------------------- */

/**
 * Word offsets inside the register block, relative to `start`.
 * Register layouts differ between firmware and hardware revisions, so the
 * whole map is configuration.
 */
export interface RegisterMap {
    /** First holding register of the contiguous block. */
    start: number
    /** Number of registers read per poll. */
    count: number

    voltage: { offset: number; scale: number }
    power: { offset: number }
    frequency: { offset: number; scale: number }
    temperature: { offset: number; scale: number }
    statusCode: { offset: number }

    /**
     * Lifetime energy as a 32-bit value across two consecutive words plus a
     * signed int16 power-of-ten scale factor (SunSpec style).
     */
    lifetimeEnergy: {
        offset: number
        wordOrder: 'high-first' | 'low-first'
        scaleFactorOffset: number
    }
}

export interface InverterConfig {
    host: string
    port: number
    unitId: number
    /** Connect + read timeout for a single poll. */
    timeoutMs: number
    registerMap: RegisterMap
    /** Below this AC voltage the inverter is considered asleep. */
    nightVoltageThreshold: number
    /** Log the raw register block on every read. */
    debugFrames: boolean
}

/* -------------------------------------------------------------------------- */
/*  Reading                                                                   */
/* -------------------------------------------------------------------------- */

/** One decoded poll result. Never mutated after construction. */
export interface Reading {
    /** ISO timestamp when *we* read the block. */
    readonly timestamp: string

    readonly powerW: number
    readonly voltageV: number
    readonly frequencyHz: number
    readonly temperatureC: number
    readonly lifetimeEnergyWh: number
    readonly statusCode: number

    /** Voltage under the night threshold; power has been forced to 0. */
    readonly night: boolean

    /** Power as decoded, before night-mode forcing. */
    readonly rawPowerW: number

    /** The register block the reading was decoded from. */
    readonly rawRegisters: readonly number[]
}

export type StatusTone = 'ok' | 'sleep' | 'error' | 'muted' | 'night'

export interface InverterStatus {
    text: string
    tone: StatusTone
}

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export interface InverterEventSink {
    publish(evt: InverterEvent): void
}

export type InverterEvent =
    | {
        kind: 'inverter-connect'
        at: number
        host: string
        port: number
        unitId: number
    }
    | {
        kind: 'inverter-frame'
        at: number
        start: number
        registers: readonly number[]
    }
    | {
        kind: 'inverter-reading'
        at: number
        reading: Reading
    }
    | {
        kind: 'inverter-night'
        at: number
        voltageV: number
        rawPowerW: number
    }
    | {
        kind: 'inverter-read-failed'
        at: number
        code: string
        error: string
    }
    | {
        kind: 'inverter-close-failed'
        at: number
        error: string
    }

/* -------------------------------------------------------------------------- */
/*  Field-bus client contract                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Minimal contract the reader expects from the field-bus client library.
 * The concrete implementation lives in modbusClient.ts.
 */
export interface RegisterClient {
    connect(host: string, port: number, timeoutMs: number): Promise<void>
    readHoldingRegisters(unitId: number, start: number, count: number): Promise<number[]>
    close(): Promise<void>
}

export type RegisterClientFactory = () => RegisterClient
