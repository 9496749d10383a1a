import type { Reading } from '../../../devices/inverter/types.js'
import { serviceDateTime } from '../../time.js'

/**
 * Outbound "add status" fields:
 *   d  date yyyymmdd      t  time HH:MM
 *   v1 energy today (Wh)  v2 power (W)
 *   v5 temperature (C)    v6 voltage (V)
 */
export type UploadRecord = {
    d: string
    t: string
    v1: number
    v2: number
    v5?: number
    v6?: number
}

const round1 = (n: number): number => Math.round(n * 10) / 10

export function buildUploadRecord(
    reading: Pick<Reading, 'powerW' | 'voltageV' | 'temperatureC'>,
    dailyEnergyWh: number,
    now: Date,
    timeZone: string
): UploadRecord {
    const { d, t } = serviceDateTime(now, timeZone)
    const rec: UploadRecord = {
        d,
        t,
        v1: Math.round(dailyEnergyWh),
        v2: Math.round(reading.powerW),
    }
    if (Number.isFinite(reading.temperatureC)) rec.v5 = round1(reading.temperatureC)
    if (Number.isFinite(reading.voltageV)) rec.v6 = round1(reading.voltageV)
    return rec
}

export function toFormBody(rec: UploadRecord): string {
    const params = new URLSearchParams({
        d: rec.d,
        t: rec.t,
        v1: String(rec.v1),
        v2: String(rec.v2),
    })
    if (rec.v5 !== undefined) params.set('v5', String(rec.v5))
    if (rec.v6 !== undefined) params.set('v6', String(rec.v6))
    return params.toString()
}

/** key=value form used for dry-run logging. */
export function describeUploadRecord(rec: UploadRecord): string {
    const parts = [`v1=${rec.v1}Wh`, `v2=${rec.v2}W`]
    if (rec.v6 !== undefined) parts.push(`v6=${rec.v6}V`)
    if (rec.v5 !== undefined) parts.push(`v5=${rec.v5}C`)
    return `d=${rec.d} t=${rec.t} ${parts.join(' ')}`
}
