import { BridgeError, DecodeError, DeviceUnreachableError, toErrorShape } from '../../errors.js'
import {
    type InverterConfig,
    type InverterEventSink,
    type Reading,
    type RegisterClientFactory,
} from './types.js'
import { decodeRegisters } from './utils.js'
import { createModbusRegisterClient } from './modbusClient.js'

interface InverterReaderServiceDeps {
    events: InverterEventSink
    /** Defaults to a modbus-serial TCP client. */
    createClient?: RegisterClientFactory
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

/**
 * InverterReaderService
 *
 * - Opens a transient field-bus connection per read and always closes it.
 * - Reads the configured register block and decodes it into a Reading.
 * - Applies night mode (low AC voltage forces power to 0).
 * - Never retries; the poll loop's next tick is the retry.
 */
export class InverterReaderService {
    private readonly config: InverterConfig
    private readonly deps: InverterReaderServiceDeps
    private readonly createClient: RegisterClientFactory

    constructor(config: InverterConfig, deps: InverterReaderServiceDeps) {
        this.config = config
        this.deps = deps
        this.createClient = deps.createClient ?? createModbusRegisterClient
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    /**
     * Read and decode one block.
     *
     * Rejects with DeviceUnreachableError (connect/read) or DecodeError.
     */
    public async read(): Promise<Reading> {
        try {
            const registers = await this.readBlock()
            const reading = decodeRegisters(registers, this.config.registerMap, {
                nightVoltageThreshold: this.config.nightVoltageThreshold,
            })

            const at = Date.now()

            if (reading.night) {
                this.deps.events.publish({
                    kind: 'inverter-night',
                    at,
                    voltageV: reading.voltageV,
                    rawPowerW: reading.rawPowerW,
                })
            }
            this.deps.events.publish({
                kind: 'inverter-reading',
                at,
                reading,
            })
            return reading
        } catch (err) {
            const wrapped = err instanceof BridgeError
                ? err
                : new DecodeError(`decode failed: ${describe(err)}`, err)

            const shape = toErrorShape(wrapped)
            this.deps.events.publish({
                kind: 'inverter-read-failed',
                at: Date.now(),
                code: shape.code ?? 'UNKNOWN',
                error: shape.message,
            })
            throw wrapped
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Field-bus access                                                      */
    /* ---------------------------------------------------------------------- */

    private async readBlock(): Promise<number[]> {
        const { host, port, unitId, timeoutMs, registerMap } = this.config
        const client = this.createClient()

        try {
            this.deps.events.publish({ kind: 'inverter-connect', at: Date.now(), host, port, unitId })

            try {
                await client.connect(host, port, timeoutMs)
            } catch (err) {
                throw new DeviceUnreachableError(`connect ${host}:${port} failed: ${describe(err)}`, err)
            }

            let registers: number[]
            try {
                registers = await client.readHoldingRegisters(unitId, registerMap.start, registerMap.count)
            } catch (err) {
                throw new DeviceUnreachableError(
                    `read ${registerMap.start}+${registerMap.count} (unit ${unitId}) failed: ${describe(err)}`,
                    err
                )
            }

            if (this.config.debugFrames) {
                this.deps.events.publish({
                    kind: 'inverter-frame',
                    at: Date.now(),
                    start: registerMap.start,
                    registers,
                })
            }
            return registers
        } finally {
            await client.close().catch((err: unknown) => {
                this.deps.events.publish({
                    kind: 'inverter-close-failed',
                    at: Date.now(),
                    error: describe(err),
                })
            })
        }
    }
}
