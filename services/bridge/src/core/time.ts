// services/bridge/src/core/time.ts

import { fromDate, toCalendarDate, type ZonedDateTime } from '@internationalized/date'

const pad2 = (n: number): string => String(n).padStart(2, '0')

export function isValidTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone })
        return true
    } catch {
        return false
    }
}

/**
 * TIMEZONE wins over TZ; otherwise the zone Node resolved for the process.
 * TZ values like ":/etc/localtime" are not IANA names and are skipped.
 */
export function resolveTimeZone(env: NodeJS.ProcessEnv): string {
    for (const candidate of [env.TIMEZONE, env.TZ]) {
        const tz = candidate?.trim()
        if (tz && !tz.startsWith(':')) return tz
    }
    return Intl.DateTimeFormat().resolvedOptions().timeZone
}

export function zoned(now: Date, timeZone: string): ZonedDateTime {
    return fromDate(now, timeZone)
}

/** Local calendar day as YYYY-MM-DD. */
export function localDate(now: Date, timeZone: string): string {
    return toCalendarDate(zoned(now, timeZone)).toString()
}

/** Date/time pair in the compact form the monitoring API expects. */
export function serviceDateTime(now: Date, timeZone: string): { d: string; t: string } {
    const z = zoned(now, timeZone)
    return {
        d: `${z.year}${pad2(z.month)}${pad2(z.day)}`,
        t: `${pad2(z.hour)}:${pad2(z.minute)}`,
    }
}

/** "YYYY-MM-DD HH:mm:ss" in the given zone, for the dashboard. */
export function formatLocal(iso: string | null, timeZone: string): string | null {
    if (!iso) return null
    const ms = Date.parse(iso)
    if (Number.isNaN(ms)) return null
    const z = zoned(new Date(ms), timeZone)
    return `${z.year}-${pad2(z.month)}-${pad2(z.day)} ${pad2(z.hour)}:${pad2(z.minute)}:${pad2(z.second)}`
}

/** "HH:mm" label used on the chart axis. */
export function formatClock(iso: string, timeZone: string): string {
    const ms = Date.parse(iso)
    if (Number.isNaN(ms)) return ''
    const z = zoned(new Date(ms), timeZone)
    return `${pad2(z.hour)}:${pad2(z.minute)}`
}
