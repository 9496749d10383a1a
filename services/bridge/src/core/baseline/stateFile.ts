// services/bridge/src/core/baseline/stateFile.ts

import { promises as fs } from 'node:fs'
import path from 'node:path'

import { StateCorruptError } from '../../errors.js'
import { isObject } from '../env.js'
import type { ChartRecord, DailyState, DaySummary, PersistedState } from './types.js'

/* -------------------------
   Minimal validation helpers
--------------------------*/
const isNum = (x: unknown): x is number => typeof x === 'number' && Number.isFinite(x)
const isStr = (x: unknown): x is string => typeof x === 'string'
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/

function toDailyState(x: unknown): DailyState | null {
    if (!isObject(x)) return null
    const { date, baselineEnergyWh, lastKnownLifetimeEnergyWh, uptimeStartTimestamp } = x
    if (!isStr(date) || !DATE_RE.test(date)) return null
    if (!isNum(baselineEnergyWh) || !isNum(lastKnownLifetimeEnergyWh)) return null
    if (!isStr(uptimeStartTimestamp) || Number.isNaN(Date.parse(uptimeStartTimestamp))) return null
    return { date, baselineEnergyWh, lastKnownLifetimeEnergyWh, uptimeStartTimestamp }
}

function toRecord(x: unknown): ChartRecord | null {
    if (!isObject(x)) return null
    const { timestamp, powerW, energyWh } = x
    if (!isStr(timestamp) || !isNum(powerW) || !isNum(energyWh)) return null
    return { timestamp, powerW, energyWh }
}

/** Summary fields are best-effort: bad entries are dropped, not fatal. */
function toDaySummary(x: unknown): DaySummary {
    const empty: DaySummary = { peakPowerW: 0, uptimeMinutes: 0, lastSampleAt: null, records: [] }
    if (!isObject(x)) return empty
    const records = Array.isArray(x.records)
        ? x.records.map(toRecord).filter((r): r is ChartRecord => r !== null)
        : []
    return {
        peakPowerW: isNum(x.peakPowerW) ? x.peakPowerW : 0,
        uptimeMinutes: isNum(x.uptimeMinutes) ? x.uptimeMinutes : 0,
        lastSampleAt: isStr(x.lastSampleAt) ? x.lastSampleAt : null,
        records,
    }
}

export function parsePersistedState(file: string, text: string): PersistedState {
    let parsed: unknown
    try {
        parsed = JSON.parse(text)
    } catch (err) {
        throw new StateCorruptError(file, 'not valid JSON', err)
    }
    if (!isObject(parsed)) throw new StateCorruptError(file, 'expected a JSON object')
    if (parsed.version !== 1) throw new StateCorruptError(file, `unsupported version ${String(parsed.version)}`)

    const daily = toDailyState(parsed.daily)
    if (!daily) throw new StateCorruptError(file, 'missing or invalid daily state')

    return { version: 1, daily, today: toDaySummary(parsed.today) }
}

/**
 * Read the state file. Resolves null when it does not exist; rejects with
 * StateCorruptError when it exists but cannot be used.
 */
export async function readStateFile(file: string): Promise<PersistedState | null> {
    let text: string
    try {
        text = await fs.readFile(file, 'utf8')
    } catch (err) {
        if (isObject(err) && err.code === 'ENOENT') return null
        throw new StateCorruptError(file, `unreadable: ${err instanceof Error ? err.message : String(err)}`, err)
    }
    return parsePersistedState(file, text)
}

/**
 * Write-temp-then-rename so a crash mid-write leaves the previous file intact.
 */
export async function writeStateFile(file: string, data: PersistedState): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true })
    const tmp = file + '.tmp'
    const handle = await fs.open(tmp, 'w')
    try {
        await handle.writeFile(JSON.stringify(data, null, 2) + '\n', 'utf8')
        await handle.sync()
    } finally {
        await handle.close()
    }
    await fs.rename(tmp, file)
}
