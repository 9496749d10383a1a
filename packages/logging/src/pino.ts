import pino, { type Logger, type LoggerOptions } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET } from './channels.js'

export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
    }

    const destination = PRETTY
        ? pinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,             // ← allow multi-line objects
            // keep these ignored fields out of output
            ignore: 'pid,hostname,service,channel'
        })
        : undefined

    const base: Logger = destination ? pino(options, destination) : pino(options)

    // Channel prefix is only rendered for humans; JSON lines carry `channel` as a field.
    const prefixFor = (ch: LogChannel): string => {
        if (!PRETTY) return ''
        const meta = CHANNELS[ch]
        return `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET} `
    }

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        if (!base.isLevelEnabled(level)) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const write = (ch: LogChannel, level: ClientLogLevel, msg: string, extra?: Record<string, unknown>): void => {
        const obj = extra ? { channel: ch, ...extra } : { channel: ch }
        base[level](obj, `${prefixFor(ch)}${msg}`)
        fanout(ch, level, msg)
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg: string, extra?: Record<string, unknown>): void => write(ch, 'debug', msg, extra),
        info: (msg: string, extra?: Record<string, unknown>): void => write(ch, 'info', msg, extra),
        warn: (msg: string, extra?: Record<string, unknown>): void => write(ch, 'warn', msg, extra),
        error: (msg: string, extra?: Record<string, unknown>): void => write(ch, 'error', msg, extra),
        fatal: (msg: string, extra?: Record<string, unknown>): void => write(ch, 'fatal', msg, extra),
    })

    return { base, channel }
}
