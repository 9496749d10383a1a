import { parseBoolSafe, parseIntSafe, parseStringSafe } from '../../env.js'

export const PVOUTPUT_ADDSTATUS_URL = 'https://pvoutput.org/service/r2/addstatus.jsp'

export type PvOutputConfig = {
    dryRun: boolean
    url: string
    apiKey: string | null
    systemId: string | null
    timeoutMs: number
    /** Keep uploading while the inverter reports night mode. */
    uploadAtNight: boolean
}

/**
 * Build PvOutputConfig from environment.
 *
 * SAFETY: This loader does NOT throw. Call `validatePvOutputConfigForWrites(cfg)`
 * before the poll loop starts.
 */
export function buildPvOutputConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PvOutputConfig {
    const apiKey = (env.PVOUTPUT_API_KEY ?? '').trim()
    const systemId = (env.PVOUTPUT_SYSTEM_ID ?? '').trim()

    return {
        dryRun: parseBoolSafe(env.DRY_RUN, false),
        url: parseStringSafe(env.PVOUTPUT_URL, PVOUTPUT_ADDSTATUS_URL),
        apiKey: apiKey || null,
        systemId: systemId || null,
        timeoutMs: Math.max(1000, parseIntSafe(env.PVOUTPUT_TIMEOUT_MS, 10_000)),
        uploadAtNight: parseBoolSafe(env.UPLOAD_AT_NIGHT, false),
    }
}

/** Problems that make live uploads impossible. Empty in dry-run mode. */
export function validatePvOutputConfigForWrites(cfg: PvOutputConfig): string[] {
    if (cfg.dryRun) return []

    const problems: string[] = []
    if (!cfg.apiKey) problems.push('PVOUTPUT_API_KEY is required unless DRY_RUN=true')
    if (!cfg.systemId) problems.push('PVOUTPUT_SYSTEM_ID is required unless DRY_RUN=true')
    try {
        const u = new URL(cfg.url)
        if (u.protocol !== 'https:' && u.protocol !== 'http:') problems.push(`PVOUTPUT_URL must be http(s): ${cfg.url}`)
    } catch {
        problems.push(`PVOUTPUT_URL is not a URL: ${cfg.url}`)
    }
    return problems
}
