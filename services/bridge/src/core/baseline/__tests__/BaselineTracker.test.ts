import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { makeReading } from '../../../__tests__/fixtures.js'
import { BaselineTracker, applyReading, classifyTransition, dailyEnergyOf } from '../BaselineTracker.js'
import type { BaselineEvent, PersistedState } from '../types.js'

const FIVE_MIN = 5 * 60_000
const at = (iso: string): Date => new Date(iso)
const plus = (d: Date, ms: number): Date => new Date(d.getTime() + ms)

describe('classifyTransition', () => {
    const prev = {
        date: '2025-06-01',
        baselineEnergyWh: 1000,
        lastKnownLifetimeEnergyWh: 1200,
        uptimeStartTimestamp: '2025-06-01T06:00:00.000Z',
    }

    it('distinguishes the four transitions', () => {
        expect(classifyTransition(null, '2025-06-01', 1200)).toBe('initial')
        expect(classifyTransition(prev, '2025-06-01', 1250)).toBe('same-day')
        expect(classifyTransition(prev, '2025-06-01', 1200)).toBe('same-day')
        expect(classifyTransition(prev, '2025-06-01', 1199)).toBe('counter-reset')
        expect(classifyTransition(prev, '2025-06-02', 1100)).toBe('new-day')
    })

    it('never reports negative daily energy', () => {
        expect(dailyEnergyOf({ ...prev, lastKnownLifetimeEnergyWh: 900 })).toBe(0)
        expect(dailyEnergyOf(prev)).toBe(200)
    })
})

describe('applyReading', () => {
    const opts = { timeZone: 'UTC', pollIntervalMs: FIVE_MIN, maxRecords: 288 }

    it('accumulates uptime only between generating samples', () => {
        const t0 = at('2025-06-01T10:00:00Z')
        let state: PersistedState | null = null
        const step = (now: Date, powerW: number, night = false) => {
            const next = applyReading(state, makeReading({ powerW, night, lifetimeEnergyWh: 1000 }), now, opts)
            state = { version: 1, daily: next.daily, today: next.today }
            return next
        }

        expect(step(t0, 1000).today.uptimeMinutes).toBe(0)
        expect(step(plus(t0, FIVE_MIN), 1000).today.uptimeMinutes).toBe(5)
        // One hour gap after an outage counts as two intervals at most.
        expect(step(plus(t0, FIVE_MIN + 3_600_000), 1000).today.uptimeMinutes).toBe(15)
        expect(step(plus(t0, 2 * FIVE_MIN + 3_600_000), 3).today.uptimeMinutes).toBe(15)
        const last = step(plus(t0, 3 * FIVE_MIN + 3_600_000), 0, true)

        expect(last.today.uptimeMinutes).toBe(15)
        expect(last.today.peakPowerW).toBe(1000)
        expect(last.today.records).toHaveLength(5)
        expect(last.today.lastSampleAt).toBe('2025-06-01T11:15:00.000Z')
    })

    it('keeps only the newest chart records', () => {
        const t0 = at('2025-06-01T10:00:00Z')
        let state: PersistedState | null = null
        for (let i = 0; i < 3; i++) {
            const next = applyReading(state, makeReading({ powerW: 100 * (i + 1), lifetimeEnergyWh: 1000 + i }), plus(t0, i * FIVE_MIN), {
                ...opts,
                maxRecords: 2,
            })
            state = { version: 1, daily: next.daily, today: next.today }
        }

        expect(state).not.toBeNull()
        expect(state?.today.records).toEqual([
            { timestamp: '2025-06-01T10:05:00.000Z', powerW: 200, energyWh: 1 },
            { timestamp: '2025-06-01T10:10:00.000Z', powerW: 300, energyWh: 2 },
        ])
    })
})

describe('BaselineTracker', () => {
    let dir: string
    let statePath: string
    let events: BaselineEvent[]

    const make = (file = statePath) => new BaselineTracker(
        { statePath: file, timeZone: 'UTC', pollIntervalMs: FIVE_MIN, maxRecords: 288 },
        { events: { publish: evt => { events.push(evt) } } }
    )

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pvbridge-baseline-'))
        statePath = path.join(dir, 'state.json')
        events = []
    })

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('tracks daily energy across a counter reset', async () => {
        const tracker = make()
        await tracker.load()
        const t0 = at('2025-06-01T10:00:00Z')

        const results: number[] = []
        const transitions: string[] = []
        const lifetimes = [1000, 1050, 1050, 900, 950]
        for (let i = 0; i < lifetimes.length; i++) {
            const u = await tracker.update(makeReading({ lifetimeEnergyWh: lifetimes[i] }), plus(t0, i * FIVE_MIN))
            results.push(u.dailyEnergyWh)
            transitions.push(u.transition)
        }

        expect(results).toEqual([0, 50, 50, 0, 50])
        expect(transitions).toEqual(['initial', 'same-day', 'same-day', 'counter-reset', 'same-day'])
        expect(tracker.getState()?.daily.uptimeStartTimestamp).toBe('2025-06-01T10:00:00.000Z')
    })

    it('starts a new baseline at local midnight', async () => {
        const tracker = make()
        await tracker.load()

        await tracker.update(makeReading({ lifetimeEnergyWh: 5000 }), at('2025-06-01T23:55:00Z'))
        const rolled = await tracker.update(makeReading({ lifetimeEnergyWh: 5000 }), at('2025-06-02T00:05:00Z'))
        const later = await tracker.update(makeReading({ lifetimeEnergyWh: 5020 }), at('2025-06-02T00:10:00Z'))

        expect(rolled.transition).toBe('new-day')
        expect(rolled.daily.date).toBe('2025-06-02')
        expect(rolled.dailyEnergyWh).toBe(0)
        expect(rolled.today.records).toHaveLength(1)
        expect(later.dailyEnergyWh).toBe(20)
        expect(events.filter(e => e.kind === 'baseline-reset').map(e => e.kind === 'baseline-reset' && e.transition))
            .toEqual(['initial', 'new-day'])
    })

    it('uses the configured time zone for the calendar day', async () => {
        const tracker = new BaselineTracker(
            { statePath, timeZone: 'Asia/Tokyo', pollIntervalMs: FIVE_MIN, maxRecords: 288 },
            { events: { publish: () => undefined } }
        )
        await tracker.load()

        const u = await tracker.update(makeReading(), at('2025-06-01T16:00:00Z'))
        expect(u.daily.date).toBe('2025-06-02')
    })

    it('persists every update and resumes after a restart', async () => {
        const first = make()
        await first.load()
        await first.update(makeReading({ lifetimeEnergyWh: 1000 }), at('2025-06-01T10:00:00Z'))
        await first.update(makeReading({ lifetimeEnergyWh: 1200 }), at('2025-06-01T10:05:00Z'))

        const onDisk: unknown = JSON.parse(await fs.readFile(statePath, 'utf8'))
        expect(onDisk).toMatchObject({
            version: 1,
            daily: { date: '2025-06-01', baselineEnergyWh: 1000, lastKnownLifetimeEnergyWh: 1200 },
        })

        const second = make()
        await second.load()
        expect(second.dailyEnergyFor(at('2025-06-01T10:07:00Z'))).toBe(200)
        expect(second.dailyEnergyFor(at('2025-06-02T08:00:00Z'))).toBe(0)

        const resumed = await second.update(makeReading({ lifetimeEnergyWh: 1250 }), at('2025-06-01T10:10:00Z'))
        expect(resumed.transition).toBe('same-day')
        expect(resumed.dailyEnergyWh).toBe(250)
        expect(resumed.today.records).toHaveLength(3)
        expect(events).toContainEqual(expect.objectContaining({ kind: 'baseline-loaded', source: 'file', date: '2025-06-01' }))
    })

    it('starts fresh when the state file is missing', async () => {
        const tracker = make()
        await tracker.load()

        expect(tracker.getState()).toBeNull()
        expect(tracker.dailyEnergyFor(at('2025-06-01T10:00:00Z'))).toBe(0)
        expect(events).toEqual([expect.objectContaining({ kind: 'baseline-loaded', source: 'none', date: null })])
    })

    it('reports a corrupt state file and starts a fresh baseline', async () => {
        await fs.writeFile(statePath, 'not json{', 'utf8')
        const tracker = make()
        await tracker.load()

        expect(events.map(e => e.kind)).toEqual(['baseline-corrupt', 'baseline-loaded'])

        const u = await tracker.update(makeReading({ lifetimeEnergyWh: 3000 }), at('2025-06-01T10:00:00Z'))
        expect(u.transition).toBe('initial')
        expect(u.dailyEnergyWh).toBe(0)
        expect(u.persisted).toBe(true)
    })

    it('keeps working in memory when the state file cannot be written', async () => {
        const blocker = path.join(dir, 'blocker')
        await fs.writeFile(blocker, 'x', 'utf8')
        const tracker = make(path.join(blocker, 'state.json'))
        await tracker.load()

        await tracker.update(makeReading({ lifetimeEnergyWh: 1000 }), at('2025-06-01T10:00:00Z'))
        const u = await tracker.update(makeReading({ lifetimeEnergyWh: 1010 }), at('2025-06-01T10:05:00Z'))

        expect(u.persisted).toBe(false)
        expect(u.dailyEnergyWh).toBe(10)
        expect(events.filter(e => e.kind === 'baseline-persist-failed')).toHaveLength(2)
    })
})
