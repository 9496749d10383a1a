// Shared test data for the bridge service.

import type { Reading, RegisterClient } from '../devices/inverter/types.js'

export type BlockValues = {
    voltage?: number
    power?: number
    frequency?: number
    status?: number
    energyHigh?: number
    energyLow?: number
    scaleFactor?: number
    temperature?: number
}

/**
 * A 40-word block laid out like the default register map:
 * 230.1 V, 1500 W, 50.01 Hz, status 4, 66536 Wh, 41.5 C.
 */
export function makeBlock(values: BlockValues = {}): number[] {
    const block = new Array<number>(40).fill(0)
    block[0] = values.voltage ?? 2301
    block[4] = values.power ?? 1500
    block[6] = values.frequency ?? 5001
    block[8] = values.status ?? 4
    block[14] = values.energyHigh ?? 1
    block[15] = values.energyLow ?? 1000
    block[16] = values.scaleFactor ?? 0
    block[26] = values.temperature ?? 415
    return block
}

export function makeReading(overrides: Partial<Reading> = {}): Reading {
    return {
        timestamp: '2025-06-01T12:00:00.000Z',
        powerW: 1500,
        voltageV: 230.1,
        frequencyHz: 50.01,
        temperatureC: 41.5,
        lifetimeEnergyWh: 66536,
        statusCode: 4,
        night: false,
        rawPowerW: 1500,
        rawRegisters: makeBlock(),
        ...overrides,
    }
}

/** In-process stand-in for the Modbus TCP client. */
export class FakeRegisterClient implements RegisterClient {
    connected = false
    closed = false
    calls: Array<{ unitId: number; start: number; count: number }> = []

    constructor(
        private readonly block: number[] = makeBlock(),
        private readonly failures: { connect?: Error; read?: Error; close?: Error } = {}
    ) {}

    async connect(): Promise<void> {
        if (this.failures.connect) throw this.failures.connect
        this.connected = true
    }

    async readHoldingRegisters(unitId: number, start: number, count: number): Promise<number[]> {
        this.calls.push({ unitId, start, count })
        if (this.failures.read) throw this.failures.read
        return [...this.block]
    }

    async close(): Promise<void> {
        if (this.failures.close) throw this.failures.close
        this.closed = true
    }
}

export type Deferred<T> = {
    promise: Promise<T>
    resolve: (value: T) => void
    reject: (err: unknown) => void
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined
    let reject: (err: unknown) => void = () => undefined
    const promise = new Promise<T>((res, rej) => {
        resolve = res
        reject = rej
    })
    return { promise, resolve, reject }
}
