// services/bridge/src/config.ts

import path from 'node:path'

import { ConfigError } from './errors.js'
import { parseBoolSafe, parseIntSafe, parseStringSafe } from './core/env.js'
import { isValidTimeZone, resolveTimeZone } from './core/time.js'
import type { InverterConfig } from './devices/inverter/types.js'
import { buildInverterConfigFromEnv } from './devices/inverter/utils.js'
import {
    buildPvOutputConfigFromEnv,
    validatePvOutputConfigForWrites,
    type PvOutputConfig,
} from './core/sinks/pvoutput/pvoutput.config.js'

/** Polling faster than this only loads the data logger. */
export const MIN_POLL_SECONDS = 30

/** One day of samples at the default 5-minute interval. */
export const MAX_CHART_RECORDS = 288

export type BridgeConfig = {
    api: { host: string; port: number }
    pollIntervalMs: number
    stateDir: string
    statePath: string
    timeZone: string
    debug: boolean
    maxChartRecords: number
    inverter: InverterConfig
    pvoutput: PvOutputConfig
}

/**
 * Build the whole service configuration from environment, once, at startup.
 *
 * Throws ConfigError listing every problem found: missing upload credentials
 * (unless DRY_RUN), an unknown time zone, or an unusable register map.
 */
export function buildBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
    const problems: string[] = []

    const { config: inverter, registerMapError } = buildInverterConfigFromEnv(env)
    if (registerMapError) problems.push(`INVERTER_REGISTER_MAP_JSON: ${registerMapError}`)

    const pvoutput = buildPvOutputConfigFromEnv(env)
    problems.push(...validatePvOutputConfigForWrites(pvoutput))

    const timeZone = resolveTimeZone(env)
    if (!isValidTimeZone(timeZone)) problems.push(`unknown time zone: ${timeZone}`)

    const pollSeconds = Math.max(MIN_POLL_SECONDS, parseIntSafe(env.POLL_SECONDS, 300))
    const stateDir = parseStringSafe(env.STATE_DIR, '/data')

    if (problems.length > 0) throw new ConfigError(problems)

    return {
        api: {
            host: parseStringSafe(env.API_HOST, '0.0.0.0'),
            port: parseIntSafe(env.API_PORT, 8080),
        },
        pollIntervalMs: pollSeconds * 1000,
        stateDir,
        statePath: path.join(stateDir, 'state.json'),
        timeZone,
        debug: parseBoolSafe(env.DEBUG, false),
        maxChartRecords: MAX_CHART_RECORDS,
        inverter,
        pvoutput,
    }
}

/** Loggable view: credentials reduced to presence flags. */
export function summarizeConfig(cfg: BridgeConfig): Record<string, unknown> {
    return {
        modbus: `${cfg.inverter.host}:${cfg.inverter.port}`,
        unitId: cfg.inverter.unitId,
        pollSeconds: cfg.pollIntervalMs / 1000,
        stateDir: cfg.stateDir,
        timeZone: cfg.timeZone,
        dryRun: cfg.pvoutput.dryRun,
        uploadAtNight: cfg.pvoutput.uploadAtNight,
        apiKey: cfg.pvoutput.apiKey ? '(set)' : '(missing)',
        systemId: cfg.pvoutput.systemId ?? '(missing)',
        debug: cfg.debug,
    }
}
