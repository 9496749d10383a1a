// services/bridge/src/core/env.ts

export function parseIntSafe(value: string | undefined, fallback: number): number {
    if (value == null || value.trim() === '') return fallback
    const n = Number.parseInt(value, 10)
    return Number.isNaN(n) ? fallback : n
}

export function parseFloatSafe(value: string | undefined, fallback: number): number {
    if (value == null || value.trim() === '') return fallback
    const n = Number(value)
    return Number.isFinite(n) ? n : fallback
}

export function parseBoolSafe(value: string | undefined, fallback: boolean): boolean {
    if (value == null || value === '') return fallback
    const v = value.trim().toLowerCase()
    if (v === 'true' || v === '1' || v === 'yes') return true
    if (v === 'false' || v === '0' || v === 'no') return false
    return fallback
}

export function parseStringSafe(value: string | undefined, fallback: string): string {
    if (value == null) return fallback
    const v = value.trim()
    return v === '' ? fallback : v
}

export function isObject(x: unknown): x is Record<string, unknown> {
    return x !== null && typeof x === 'object' && !Array.isArray(x)
}
