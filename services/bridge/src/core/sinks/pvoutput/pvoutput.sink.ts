import { request, type Dispatcher } from 'undici'

import { NetworkError, RejectedByServiceError } from '../../../errors.js'
import type { Reading } from '../../../devices/inverter/types.js'
import type { PvOutputConfig } from './pvoutput.config.js'
import {
    buildUploadRecord,
    describeUploadRecord,
    toFormBody,
    type UploadRecord,
} from './pvoutput.payload.js'

export type LoggerLike = {
    info(msg: string, extra?: Record<string, unknown>): void
    warn(msg: string, extra?: Record<string, unknown>): void
    debug(msg: string, extra?: Record<string, unknown>): void
}

const noopLogger: LoggerLike = {
    info: () => undefined,
    warn: () => undefined,
    debug: () => undefined,
}

export type UploadReceipt = {
    sinkId: string
    publishedAt: string // ISO
    dryRun: boolean
    record: UploadRecord
    statusCode?: number
    responseText?: string
}

/**
 * PvOutputUploader
 *
 * One POST per call, no retry. Resolves with a receipt on success; rejects
 * with NetworkError (no response) or RejectedByServiceError (non-2xx, or a
 * 200 whose body starts with "ERROR").
 *
 * Logging format convention:
 * - Message strings should be "key=value key=value" to match other subsystems.
 */
export class PvOutputUploader {
    readonly id = 'pvoutput'

    private readonly config: PvOutputConfig
    private readonly timeZone: string
    private readonly log: LoggerLike
    private readonly dispatcher?: Dispatcher

    constructor(
        config: PvOutputConfig,
        opts: { timeZone: string; logger?: LoggerLike; dispatcher?: Dispatcher }
    ) {
        this.config = config
        this.timeZone = opts.timeZone
        this.log = opts.logger ?? noopLogger
        this.dispatcher = opts.dispatcher
    }

    public isDryRun(): boolean {
        return this.config.dryRun
    }

    /** A sleeping inverter has nothing to report unless configured otherwise. */
    public shouldUpload(reading: Pick<Reading, 'night'>): boolean {
        return this.config.uploadAtNight || !reading.night
    }

    public async upload(reading: Reading, dailyEnergyWh: number, now: Date = new Date()): Promise<UploadReceipt> {
        const record = buildUploadRecord(reading, dailyEnergyWh, now, this.timeZone)
        const publishedAt = now.toISOString()

        if (this.config.dryRun) {
            this.log.info(`kind=upload-dry-run ${describeUploadRecord(record)}`)
            return { sinkId: this.id, publishedAt, dryRun: true, record }
        }

        const headers: Record<string, string> = {
            'content-type': 'application/x-www-form-urlencoded',
            'X-Pvoutput-Apikey': this.config.apiKey ?? '',
            'X-Pvoutput-SystemId': this.config.systemId ?? '',
        }

        let statusCode: number
        let responseText: string
        try {
            const res = await request(this.config.url, {
                method: 'POST',
                headers,
                body: toFormBody(record),
                headersTimeout: this.config.timeoutMs,
                bodyTimeout: this.config.timeoutMs,
                ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
            })
            statusCode = res.statusCode
            responseText = (await res.body.text()).trim()
        } catch (err) {
            const msg = err instanceof Error ? err.message : String(err)
            throw new NetworkError(`POST ${this.config.url} failed: ${msg}`, err)
        }

        const ok = statusCode >= 200 && statusCode < 300 && !responseText.toUpperCase().startsWith('ERROR')
        if (!ok) {
            throw new RejectedByServiceError(statusCode, responseText)
        }

        this.log.debug(`kind=upload-response status=${statusCode} body=${JSON.stringify(responseText)}`)
        return { sinkId: this.id, publishedAt, dryRun: false, record, statusCode, responseText }
    }
}
