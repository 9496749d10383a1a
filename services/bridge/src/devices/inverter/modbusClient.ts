// services/bridge/src/devices/inverter/modbusClient.ts

import ModbusRTU from 'modbus-serial'

import type { RegisterClient } from './types.js'

/**
 * RegisterClient backed by modbus-serial over TCP. One instance per poll;
 * the reader always closes it, success or not.
 */
export class ModbusTcpRegisterClient implements RegisterClient {
    private readonly client = new ModbusRTU()

    async connect(host: string, port: number, timeoutMs: number): Promise<void> {
        this.client.setTimeout(timeoutMs)
        await this.client.connectTCP(host, { port, timeout: timeoutMs })
    }

    async readHoldingRegisters(unitId: number, start: number, count: number): Promise<number[]> {
        this.client.setID(unitId)
        const res = await this.client.readHoldingRegisters(start, count)
        return [...res.data]
    }

    close(): Promise<void> {
        if (!this.client.isOpen) return Promise.resolve()
        return new Promise<void>(resolve => {
            this.client.close(() => resolve())
        })
    }
}

export function createModbusRegisterClient(): RegisterClient {
    return new ModbusTcpRegisterClient()
}
