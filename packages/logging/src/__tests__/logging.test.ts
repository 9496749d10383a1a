import fs from 'node:fs'
import path from 'node:path'

import { makeClientBuffer } from '../buffer.js'
import { createLogger } from '../pino.js'
import { LogChannel, type ClientLog } from '../types.js'

function entry(message: string): ClientLog {
    return { ts: 1, channel: LogChannel.app, emoji: '📦', color: 'blue', level: 'info', message }
}

describe('makeClientBuffer', () => {
    it('keeps only the newest entries up to the limit', () => {
        const buf = makeClientBuffer(2)
        buf.push(entry('a'))
        buf.push(entry('b'))
        buf.push(entry('c'))

        expect(buf.getLatest(10).map(l => l.message)).toEqual(['b', 'c'])
        expect(buf.getLatest(1).map(l => l.message)).toEqual(['c'])
        expect(buf.getLatest(0)).toEqual([])
    })
})

describe('createLogger', () => {
    const prevLevel = process.env.LOG_LEVEL

    afterEach(() => {
        if (prevLevel === undefined) delete process.env.LOG_LEVEL
        else process.env.LOG_LEVEL = prevLevel
    })

    it('fans out enabled levels to the client buffer with channel metadata', () => {
        process.env.LOG_LEVEL = 'error'
        const buf = makeClientBuffer(10)
        const { channel } = createLogger('test', buf)
        const log = channel(LogChannel.uploader)

        log.info('kind=upload-ok')
        log.error('kind=upload-failed')

        const latest = buf.getLatest(10)
        expect(latest).toHaveLength(1)
        expect(latest[0].channel).toBe(LogChannel.uploader)
        expect(latest[0].level).toBe('error')
        expect(latest[0].message).toBe('kind=upload-failed')
        expect(latest[0].emoji).toBe('☁️')
    })
})

describe('package entry points', () => {
    const pkgDir = path.resolve(__dirname, '../..')
    const readJson = (file: string): unknown =>
        JSON.parse(fs.readFileSync(path.join(pkgDir, file), 'utf8'))

    it('resolves at run time to the compiled build, not the TypeScript sources', () => {
        expect(readJson('package.json')).toMatchObject({
            main: 'dist/index.js',
            types: 'src/index.ts',
            scripts: { build: 'tsc -p tsconfig.build.json' },
        })
    })

    it('compiles src/index.ts to the file main points at', () => {
        expect(readJson('tsconfig.build.json')).toMatchObject({
            compilerOptions: { rootDir: 'src', outDir: 'dist' },
            include: ['src/**/*.ts'],
        })
    })
})
