// packages/logging/src/types.ts

export enum LogChannel {
    bridge = 'bridge',
    app = 'app',
    request = 'request',
    inverter = 'inverter',
    baseline = 'baseline',
    uploader = 'uploader',
    poller = 'poller',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ClientLog {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
}

export interface ClientLogBuffer {
    push: (log: ClientLog) => void
    getLatest: (n: number) => ClientLog[]
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: import('pino').Logger
    channel: (ch: LogChannel) => ChannelLogger
}
