// services/bridge/src/devices/inverter/utils.ts

import { DecodeError } from '../../errors.js'
import { isObject, parseBoolSafe, parseFloatSafe, parseIntSafe, parseStringSafe } from '../../core/env.js'
import {
    type InverterConfig,
    type InverterStatus,
    type Reading,
    type RegisterMap,
} from './types.js'

/* -------------------------------------------------------------------------- */
/*  Register map                                                              */
/* -------------------------------------------------------------------------- */

/**
 * Single-phase inverter behind a VSN300 data logger, block 80..119.
 *
 *   +0  AC voltage   (x0.1 V)
 *   +4  AC power     (W)
 *   +6  frequency    (x0.01 Hz)
 *   +8  status code
 *   +14 +15 lifetime energy (32-bit, high word first)
 *   +16 energy scale factor (int16, power of ten)
 *   +26 temperature  (x0.1 degC)
 */
export const DEFAULT_REGISTER_MAP: RegisterMap = {
    start: 80,
    count: 40,
    voltage: { offset: 0, scale: 0.1 },
    power: { offset: 4 },
    frequency: { offset: 6, scale: 0.01 },
    temperature: { offset: 26, scale: 0.1 },
    statusCode: { offset: 8 },
    lifetimeEnergy: { offset: 14, wordOrder: 'high-first', scaleFactorOffset: 16 },
}

export const DEFAULT_NIGHT_VOLTAGE = 100

/* -------------------------------------------------------------------------- */
/*  Decoding                                                                  */
/* -------------------------------------------------------------------------- */

export function toInt16(word: number): number {
    return word >= 0x8000 ? word - 0x10000 : word
}

export function u32FromWords(first: number, second: number, order: 'high-first' | 'low-first'): number {
    const high = order === 'high-first' ? first : second
    const low = order === 'high-first' ? second : first
    // Multiplication instead of `<<`, which would go negative above 2^31.
    return high * 0x10000 + low
}

function round(value: number, digits: number): number {
    const f = 10 ** digits
    return Math.round(value * f) / f
}

function requiredLength(map: RegisterMap): number {
    return Math.max(
        map.voltage.offset,
        map.power.offset,
        map.frequency.offset,
        map.temperature.offset,
        map.statusCode.offset,
        map.lifetimeEnergy.offset + 1,
        map.lifetimeEnergy.scaleFactorOffset,
    ) + 1
}

/**
 * Decode one register block into a Reading.
 *
 * Throws DecodeError when the block is too short for the map or holds
 * anything that is not a 16-bit word.
 */
export function decodeRegisters(
    registers: readonly number[],
    map: RegisterMap,
    opts: { nightVoltageThreshold: number; now?: Date },
): Reading {
    const need = requiredLength(map)
    if (registers.length < need) {
        throw new DecodeError(`register block too short: got ${registers.length}, need ${need}`)
    }

    const bad = registers.findIndex(w => !Number.isInteger(w) || w < 0 || w > 0xffff)
    if (bad >= 0) {
        throw new DecodeError(`register ${map.start + bad} is not a 16-bit word: ${String(registers[bad])}`)
    }

    const voltageV = round(registers[map.voltage.offset] * map.voltage.scale, 1)
    const rawPowerW = toInt16(registers[map.power.offset])
    const frequencyHz = round(registers[map.frequency.offset] * map.frequency.scale, 2)
    const temperatureC = round(toInt16(registers[map.temperature.offset]) * map.temperature.scale, 1)
    const statusCode = registers[map.statusCode.offset]

    const e = map.lifetimeEnergy
    const energyRaw = u32FromWords(registers[e.offset], registers[e.offset + 1], e.wordOrder)
    const sf = toInt16(registers[e.scaleFactorOffset])
    if (sf < -6 || sf > 6) {
        throw new DecodeError(`energy scale factor out of range: ${sf}`)
    }
    const lifetimeEnergyWh = round(energyRaw * 10 ** sf, Math.max(0, -sf))

    const values = { voltageV, rawPowerW, frequencyHz, temperatureC, lifetimeEnergyWh }
    for (const [name, v] of Object.entries(values)) {
        if (!Number.isFinite(v)) {
            throw new DecodeError(`decoded ${name} is not finite`)
        }
    }

    const night = voltageV < opts.nightVoltageThreshold

    return Object.freeze({
        timestamp: (opts.now ?? new Date()).toISOString(),
        powerW: night ? 0 : Math.max(0, rawPowerW),
        voltageV,
        frequencyHz,
        temperatureC,
        lifetimeEnergyWh,
        statusCode,
        night,
        rawPowerW,
        rawRegisters: Object.freeze([...registers]),
    })
}

/* -------------------------------------------------------------------------- */
/*  Status                                                                    */
/* -------------------------------------------------------------------------- */

const STATUS_CODES: Record<number, InverterStatus> = {
    0: { text: 'Off', tone: 'muted' },
    1: { text: 'Sleep', tone: 'sleep' },
    4: { text: 'ON', tone: 'ok' },
    5: { text: 'Fault', tone: 'error' },
    91: { text: 'ON', tone: 'ok' },
    92: { text: 'Sleep', tone: 'sleep' },
}

/** Night mode wins over whatever the status register says. */
export function describeStatus(reading: Pick<Reading, 'statusCode' | 'night'>): InverterStatus {
    if (reading.night) return { text: 'Night', tone: 'night' }
    return STATUS_CODES[reading.statusCode] ?? { text: 'Unknown', tone: 'muted' }
}

/** Voltage is only shown when it lies inside a plausible grid band. */
export function plausibleGridVoltage(v: number | null | undefined): number | null {
    if (v == null) return null
    return v >= 150 && v <= 270 ? v : null
}

/* -------------------------------------------------------------------------- */
/*  Config builder from environment                                           */
/* -------------------------------------------------------------------------- */

function offsetOf(x: unknown, fallback: number): number {
    return typeof x === 'number' && Number.isInteger(x) && x >= 0 ? x : fallback
}

function scaleOf(x: unknown, fallback: number): number {
    return typeof x === 'number' && Number.isFinite(x) && x !== 0 ? x : fallback
}

/**
 * Merge a partial register map (parsed JSON) over the defaults. Unknown keys
 * are ignored; invalid values fall back to the default for that field.
 */
export function mergeRegisterMap(override: unknown, base: RegisterMap = DEFAULT_REGISTER_MAP): RegisterMap {
    if (!isObject(override)) return base

    const pick = (key: string): Record<string, unknown> => {
        const v = override[key]
        return isObject(v) ? v : {}
    }

    const voltage = pick('voltage')
    const power = pick('power')
    const frequency = pick('frequency')
    const temperature = pick('temperature')
    const statusCode = pick('statusCode')
    const energy = pick('lifetimeEnergy')

    const wordOrder = energy.wordOrder === 'high-first' || energy.wordOrder === 'low-first'
        ? energy.wordOrder
        : base.lifetimeEnergy.wordOrder

    return {
        start: offsetOf(override.start, base.start),
        count: offsetOf(override.count, base.count) || base.count,
        voltage: {
            offset: offsetOf(voltage.offset, base.voltage.offset),
            scale: scaleOf(voltage.scale, base.voltage.scale),
        },
        power: { offset: offsetOf(power.offset, base.power.offset) },
        frequency: {
            offset: offsetOf(frequency.offset, base.frequency.offset),
            scale: scaleOf(frequency.scale, base.frequency.scale),
        },
        temperature: {
            offset: offsetOf(temperature.offset, base.temperature.offset),
            scale: scaleOf(temperature.scale, base.temperature.scale),
        },
        statusCode: { offset: offsetOf(statusCode.offset, base.statusCode.offset) },
        lifetimeEnergy: {
            offset: offsetOf(energy.offset, base.lifetimeEnergy.offset),
            wordOrder,
            scaleFactorOffset: offsetOf(energy.scaleFactorOffset, base.lifetimeEnergy.scaleFactorOffset),
        },
    }
}

/**
 * Build an InverterConfig from process.env-style input.
 *
 * Expected env vars (see .env.example):
 *   - MODBUS_HOST, MODBUS_PORT, MODBUS_UNIT_ID, MODBUS_TIMEOUT_MS
 *   - INVERTER_REGISTER_MAP_JSON
 *   - INVERTER_NIGHT_VOLTAGE
 *   - DEBUG
 *
 * Returns the JSON parse error (if any) alongside so the caller can decide
 * whether it is fatal.
 */
export function buildInverterConfigFromEnv(env: NodeJS.ProcessEnv): {
    config: InverterConfig
    registerMapError: string | null
} {
    let registerMap = DEFAULT_REGISTER_MAP
    let registerMapError: string | null = null

    const raw = env.INVERTER_REGISTER_MAP_JSON
    if (raw && raw.trim().length > 0) {
        try {
            const parsed: unknown = JSON.parse(raw)
            if (!isObject(parsed)) throw new Error('expected a JSON object')
            registerMap = mergeRegisterMap(parsed)
        } catch (e) {
            registerMapError = e instanceof Error ? e.message : String(e)
        }
    }

    if (registerMap.count < requiredLength(registerMap)) {
        registerMapError = registerMapError
            ?? `register count ${registerMap.count} does not cover offset ${requiredLength(registerMap) - 1}`
    }

    return {
        config: {
            host: parseStringSafe(env.MODBUS_HOST, '192.168.1.220'),
            port: parseIntSafe(env.MODBUS_PORT, 502),
            unitId: parseIntSafe(env.MODBUS_UNIT_ID, 2),
            timeoutMs: parseIntSafe(env.MODBUS_TIMEOUT_MS, 4000),
            registerMap,
            nightVoltageThreshold: parseFloatSafe(env.INVERTER_NIGHT_VOLTAGE, DEFAULT_NIGHT_VOLTAGE),
            debugFrames: parseBoolSafe(env.DEBUG, false),
        },
        registerMapError,
    }
}
