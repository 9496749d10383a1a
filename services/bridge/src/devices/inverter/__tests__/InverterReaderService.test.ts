import { DecodeError, DeviceUnreachableError } from '../../../errors.js'
import { FakeRegisterClient, makeBlock } from '../../../__tests__/fixtures.js'
import { InverterReaderService } from '../InverterReaderService.js'
import type { InverterConfig, InverterEvent } from '../types.js'
import { DEFAULT_REGISTER_MAP } from '../utils.js'

const config: InverterConfig = {
    host: 'inverter.test',
    port: 502,
    unitId: 2,
    timeoutMs: 1000,
    registerMap: DEFAULT_REGISTER_MAP,
    nightVoltageThreshold: 100,
    debugFrames: true,
}

function setup(client: FakeRegisterClient) {
    const events: InverterEvent[] = []
    const service = new InverterReaderService(config, {
        events: { publish: evt => { events.push(evt) } },
        createClient: () => client,
    })
    return { service, events, kinds: () => events.map(e => e.kind) }
}

describe('InverterReaderService', () => {
    it('reads, decodes and closes the connection', async () => {
        const client = new FakeRegisterClient()
        const { service, kinds, events } = setup(client)

        const reading = await service.read()

        expect(reading.powerW).toBe(1500)
        expect(client.calls).toEqual([{ unitId: 2, start: 80, count: 40 }])
        expect(client.closed).toBe(true)
        expect(kinds()).toEqual(['inverter-connect', 'inverter-frame', 'inverter-reading'])
        expect(events[events.length - 1]).toMatchObject({ kind: 'inverter-reading', reading })
    })

    it('publishes a night event when the grid voltage is low', async () => {
        const { service, kinds } = setup(new FakeRegisterClient(makeBlock({ voltage: 0 })))

        const reading = await service.read()

        expect(reading.night).toBe(true)
        expect(kinds()).toContain('inverter-night')
    })

    it('wraps connection failures as DeviceUnreachableError', async () => {
        const client = new FakeRegisterClient(makeBlock(), { connect: new Error('ECONNREFUSED') })
        const { service, events } = setup(client)

        const err = await service.read().catch((e: unknown) => e)

        expect(err).toBeInstanceOf(DeviceUnreachableError)
        expect(err).toMatchObject({ message: 'connect inverter.test:502 failed: ECONNREFUSED' })
        expect(client.closed).toBe(true)
        expect(events[events.length - 1]).toMatchObject({
            kind: 'inverter-read-failed',
            code: 'DEVICE_UNREACHABLE',
        })
        expect(events.some(e => e.kind === 'inverter-reading')).toBe(false)
    })

    it('wraps read timeouts as DeviceUnreachableError', async () => {
        const client = new FakeRegisterClient(makeBlock(), { read: new Error('Timed out') })
        const { service } = setup(client)

        await expect(service.read()).rejects.toBeInstanceOf(DeviceUnreachableError)
        expect(client.closed).toBe(true)
    })

    it('reports a short block as DecodeError', async () => {
        const { service, events } = setup(new FakeRegisterClient(makeBlock().slice(0, 5)))

        await expect(service.read()).rejects.toBeInstanceOf(DecodeError)
        expect(events[events.length - 1]).toMatchObject({ kind: 'inverter-read-failed', code: 'DECODE_ERROR' })
    })

    it('still returns the reading when closing fails', async () => {
        const client = new FakeRegisterClient(makeBlock(), { close: new Error('already closed') })
        const { service, events } = setup(client)

        const reading = await service.read()

        expect(reading.lifetimeEnergyWh).toBe(66536)
        expect(events).toContainEqual(expect.objectContaining({
            kind: 'inverter-close-failed',
            error: 'already closed',
        }))
    })
})
