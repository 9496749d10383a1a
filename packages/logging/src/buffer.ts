import { type ClientLog, type ClientLogBuffer } from './types.js'

export function makeClientBuffer(limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? 500)): ClientLogBuffer {
    const buf: ClientLog[] = []
    const cap = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : 500

    const push = (log: ClientLog): void => {
        buf.push(log)
        if (buf.length > cap) buf.shift()
    }

    const getLatest = (n: number): ClientLog[] => {
        if (n <= 0) return []
        return buf.slice(-n)
    }

    return { push, getLatest }
}
