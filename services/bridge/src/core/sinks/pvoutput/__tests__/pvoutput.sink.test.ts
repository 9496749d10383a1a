import { MockAgent } from 'undici'

import { NetworkError, RejectedByServiceError } from '../../../../errors.js'
import { makeReading } from '../../../../__tests__/fixtures.js'
import type { PvOutputConfig } from '../pvoutput.config.js'
import { PvOutputUploader, type LoggerLike } from '../pvoutput.sink.js'

const ORIGIN = 'https://pvoutput.test'
const PATH = '/service/r2/addstatus.jsp'
const NOW = new Date('2025-06-01T12:00:00Z')

const liveConfig: PvOutputConfig = {
    dryRun: false,
    url: `${ORIGIN}${PATH}`,
    apiKey: 'test-key',
    systemId: '12345',
    timeoutMs: 1000,
    uploadAtNight: false,
}

/** Header lookup that does not care how the dispatcher received them. */
function headerOf(headers: unknown, name: string): string | undefined {
    const wanted = name.toLowerCase()
    if (headers instanceof Headers) return headers.get(wanted) ?? undefined
    if (Array.isArray(headers)) {
        for (let i = 0; i + 1 < headers.length; i += 2) {
            if (String(headers[i]).toLowerCase() === wanted) return String(headers[i + 1])
        }
        return undefined
    }
    if (headers !== null && typeof headers === 'object') {
        for (const [k, v] of Object.entries(headers)) {
            if (k.toLowerCase() === wanted) return String(v)
        }
    }
    return undefined
}

function recordingLogger(): LoggerLike & { lines: string[] } {
    const lines: string[] = []
    return {
        lines,
        info: msg => { lines.push(msg) },
        warn: msg => { lines.push(msg) },
        debug: msg => { lines.push(msg) },
    }
}

describe('PvOutputUploader', () => {
    let agent: MockAgent

    beforeEach(() => {
        agent = new MockAgent()
        agent.disableNetConnect()
    })

    afterEach(async () => {
        await agent.close()
    })

    it('posts the status form with credentials in headers', async () => {
        let seenBody = ''
        let seenKey: string | undefined
        let seenSystem: string | undefined

        agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(opts => {
            seenBody = String(opts.body)
            seenKey = headerOf(opts.headers, 'X-Pvoutput-Apikey')
            seenSystem = headerOf(opts.headers, 'X-Pvoutput-SystemId')
            return { statusCode: 200, data: 'OK 200: Added Status' }
        })

        const uploader = new PvOutputUploader(liveConfig, { timeZone: 'UTC', dispatcher: agent })
        const receipt = await uploader.upload(makeReading(), 1234.4, NOW)

        expect(seenBody).toBe('d=20250601&t=12%3A00&v1=1234&v2=1500&v5=41.5&v6=230.1')
        expect(seenKey).toBe('test-key')
        expect(seenSystem).toBe('12345')
        expect(receipt).toEqual({
            sinkId: 'pvoutput',
            publishedAt: '2025-06-01T12:00:00.000Z',
            dryRun: false,
            record: { d: '20250601', t: '12:00', v1: 1234, v2: 1500, v5: 41.5, v6: 230.1 },
            statusCode: 200,
            responseText: 'OK 200: Added Status',
        })
    })

    it('uses local time of the configured zone', async () => {
        const uploader = new PvOutputUploader({ ...liveConfig, dryRun: true }, { timeZone: 'Europe/Amsterdam' })
        const receipt = await uploader.upload(makeReading(), 0, NOW)

        expect(receipt.record.d).toBe('20250601')
        expect(receipt.record.t).toBe('14:00')
    })

    it('treats a 200 with an ERROR body as a rejection', async () => {
        agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(200, 'ERROR 400: Invalid date')

        const uploader = new PvOutputUploader(liveConfig, { timeZone: 'UTC', dispatcher: agent })
        const err = await uploader.upload(makeReading(), 100, NOW).catch((e: unknown) => e)

        expect(err).toBeInstanceOf(RejectedByServiceError)
        expect(err).toMatchObject({ statusCode: 200, responseText: 'ERROR 400: Invalid date', retryable: false })
    })

    it('rejects non-2xx responses with the status and body', async () => {
        agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(401, 'Unauthorized 401: Invalid API Key')

        const uploader = new PvOutputUploader(liveConfig, { timeZone: 'UTC', dispatcher: agent })

        await expect(uploader.upload(makeReading(), 100, NOW)).rejects.toThrow(
            'service rejected status (http 401): Unauthorized 401: Invalid API Key'
        )
    })

    it('marks server errors as retryable', async () => {
        agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(503, 'Service Unavailable')

        const uploader = new PvOutputUploader(liveConfig, { timeZone: 'UTC', dispatcher: agent })
        const err = await uploader.upload(makeReading(), 100, NOW).catch((e: unknown) => e)

        expect(err).toMatchObject({ code: 'REJECTED_BY_SERVICE', statusCode: 503, retryable: true })
    })

    it('wraps transport failures as NetworkError', async () => {
        agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).replyWithError(new Error('socket hang up'))

        const uploader = new PvOutputUploader(liveConfig, { timeZone: 'UTC', dispatcher: agent })

        const err = await uploader.upload(makeReading(), 100, NOW).catch((e: unknown) => e)

        expect(err).toBeInstanceOf(NetworkError)
        expect(err).toMatchObject({
            code: 'NETWORK_ERROR',
            retryable: true,
            message: `POST ${ORIGIN}${PATH} failed: socket hang up`,
        })
    })

    it('logs instead of posting in dry-run mode', async () => {
        const logger = recordingLogger()
        const uploader = new PvOutputUploader({ ...liveConfig, dryRun: true }, { timeZone: 'UTC', logger, dispatcher: agent })

        const receipt = await uploader.upload(makeReading(), 1234.4, NOW)

        expect(receipt.dryRun).toBe(true)
        expect(receipt.statusCode).toBeUndefined()
        expect(logger.lines).toEqual([
            'kind=upload-dry-run d=20250601 t=12:00 v1=1234Wh v2=1500W v6=230.1V v5=41.5C',
        ])
    })

    it('skips night readings unless uploads at night are enabled', () => {
        const day = new PvOutputUploader(liveConfig, { timeZone: 'UTC' })
        const always = new PvOutputUploader({ ...liveConfig, uploadAtNight: true }, { timeZone: 'UTC' })

        expect(day.shouldUpload({ night: true })).toBe(false)
        expect(day.shouldUpload({ night: false })).toBe(true)
        expect(always.shouldUpload({ night: true })).toBe(true)
    })
})
