// services/bridge/src/plugins/bridge.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'
import type { Dispatcher } from 'undici'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@pvbridge/logging'

import type { BridgeConfig } from '../config.js'
import { BridgeStateStore, initialBridgeState } from '../core/state.js'
import { localDate } from '../core/time.js'
import { BaselineTracker } from '../core/baseline/BaselineTracker.js'
import type { BaselineEvent, BaselineEventSink } from '../core/baseline/types.js'
import { PollLoop } from '../core/poll/PollLoop.js'
import type { PollEvent, PollEventSink } from '../core/poll/types.js'
import { PvOutputUploader } from '../core/sinks/pvoutput/pvoutput.sink.js'
import { InverterReaderService } from '../devices/inverter/InverterReaderService.js'
import type {
    InverterEvent,
    InverterEventSink,
    RegisterClientFactory,
} from '../devices/inverter/types.js'
import { BridgeStateAdapter } from '../adapters/bridgeState.adapter.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        bridgeState: BridgeStateStore
        pollLoop: PollLoop
        clientBuf: ClientLogBuffer
    }
}

export interface BridgePluginOptions {
    config: BridgeConfig
    /** Field-bus client override; defaults to modbus-serial over TCP. */
    createClient?: RegisterClientFactory
    /** undici dispatcher for uploads (a MockAgent in tests). */
    dispatcher?: Dispatcher
    /** Start polling once the server is ready. Default true. */
    autoStart?: boolean
}

// ---- Event sinks using bridge logging --------------------------------------

class InverterLoggerEventSink implements InverterEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: InverterEvent): void {
        switch (evt.kind) {
            case 'inverter-connect':
                this.log.debug(`kind=${evt.kind} host=${evt.host} port=${evt.port} unit=${evt.unitId}`)
                break
            case 'inverter-frame':
                this.log.debug(`kind=${evt.kind} start=${evt.start} registers=${JSON.stringify(evt.registers)}`)
                break
            case 'inverter-reading': {
                const r = evt.reading
                this.log.info(
                    `kind=${evt.kind} power=${r.powerW}W voltage=${r.voltageV}V freq=${r.frequencyHz}Hz ` +
                    `temp=${r.temperatureC}C lifetime=${r.lifetimeEnergyWh}Wh status=${r.statusCode}`
                )
                break
            }
            case 'inverter-night':
                this.log.info(`kind=${evt.kind} voltage=${evt.voltageV}V rawPower=${evt.rawPowerW}W`)
                break
            case 'inverter-read-failed':
                this.log.warn(`kind=${evt.kind} code=${evt.code} error=${JSON.stringify(evt.error)}`)
                break
            case 'inverter-close-failed':
                this.log.debug(`kind=${evt.kind} error=${JSON.stringify(evt.error)}`)
                break
        }
    }
}

class BaselineLoggerEventSink implements BaselineEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: BaselineEvent): void {
        switch (evt.kind) {
            case 'baseline-loaded':
                this.log.info(`kind=${evt.kind} source=${evt.source} date=${evt.date ?? 'none'}`)
                break
            case 'baseline-corrupt':
                this.log.warn(`kind=${evt.kind} path=${evt.path} error=${JSON.stringify(evt.error)}`)
                break
            case 'baseline-reset':
                this.log.info(
                    `kind=${evt.kind} transition=${evt.transition} date=${evt.date} ` +
                    `baseline=${evt.baselineEnergyWh}Wh previous=${evt.previousLifetimeEnergyWh ?? 'none'}`
                )
                break
            case 'baseline-updated':
                this.log.debug(`kind=${evt.kind} date=${evt.date} today=${evt.dailyEnergyWh}Wh`)
                break
            case 'baseline-persist-failed':
                this.log.error(`kind=${evt.kind} path=${evt.path} error=${JSON.stringify(evt.error)}`)
                break
        }
    }
}

class PollLoggerEventSink implements PollEventSink {
    constructor(
        private readonly logPoll: ChannelLogger,
        private readonly logUpload: ChannelLogger
    ) {}

    publish(evt: PollEvent): void {
        switch (evt.kind) {
            case 'poller-started':
                this.logPoll.info(`kind=${evt.kind} interval=${evt.intervalMs / 1000}s`)
                break
            case 'poller-stopped':
                this.logPoll.info(`kind=${evt.kind}`)
                break
            case 'poll-tick-skipped':
                this.logPoll.debug(`kind=${evt.kind} cycle=${evt.cycle} reason=in-flight`)
                break
            case 'poll-read-failed':
                this.logPoll.warn(`kind=${evt.kind} code=${evt.error.code ?? 'unknown'} error=${JSON.stringify(evt.error.message)}`)
                break
            case 'poll-baseline-failed':
                this.logPoll.error(`kind=${evt.kind} error=${JSON.stringify(evt.error.message)}`)
                break
            case 'poll-upload-ok':
                if (!evt.receipt.dryRun) {
                    this.logUpload.info(`kind=${evt.kind} status=${evt.receipt.statusCode ?? 'unknown'} v1=${evt.receipt.record.v1}Wh v2=${evt.receipt.record.v2}W`)
                }
                break
            case 'poll-upload-failed':
                this.logUpload.error(`kind=${evt.kind} code=${evt.error.code ?? 'unknown'} error=${JSON.stringify(evt.error.message)}`)
                break
            case 'poll-upload-skipped':
                this.logUpload.debug(`kind=${evt.kind} reason=${evt.reason}`)
                break
            case 'poll-finished':
                this.logPoll.debug(`kind=${evt.kind} cycle=${evt.cycle} outcome=${evt.outcome} durationMs=${evt.durationMs}`)
                break
            case 'poll-started':
            case 'poll-read-ok':
            case 'poll-baseline-updated':
                // Covered by the inverter and baseline channels.
                break
        }
    }
}

// ---- Fanout sink: logger + state adapter -----------------------------------

export class FanoutEventSink<E> {
    private readonly sinks: Array<{ publish(evt: E): void }>
    private readonly log: ChannelLogger

    constructor(log: ChannelLogger, ...sinks: Array<{ publish(evt: E): void }>) {
        this.log = log
        this.sinks = sinks
    }

    publish(evt: E): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                // A throwing consumer is logged and skipped.
                this.log.warn(`kind=sink-failed error=${JSON.stringify(err instanceof Error ? err.message : String(err))}`)
            }
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const bridgePlugin: FastifyPluginAsync<BridgePluginOptions> = async (
    app: FastifyInstance,
    opts: BridgePluginOptions
) => {
    const { config } = opts
    const { channel } = createLogger('bridge', app.clientBuf)
    const logPlugin = channel(LogChannel.app)
    const logInverter = channel(LogChannel.inverter)
    const logBaseline = channel(LogChannel.baseline)
    const logUpload = channel(LogChannel.uploader)
    const logPoll = channel(LogChannel.poller)

    // 1) State
    const store = new BridgeStateStore(initialBridgeState({
        timeZone: config.timeZone,
        pollIntervalMs: config.pollIntervalMs,
        dryRun: config.pvoutput.dryRun,
    }))
    const adapter = new BridgeStateAdapter(store, { registerStart: config.inverter.registerMap.start })

    // 2) Stages
    const inverter = new InverterReaderService(config.inverter, {
        events: new FanoutEventSink<InverterEvent>(logPlugin, new InverterLoggerEventSink(logInverter)),
        createClient: opts.createClient,
    })

    const tracker = new BaselineTracker(
        {
            statePath: config.statePath,
            timeZone: config.timeZone,
            pollIntervalMs: config.pollIntervalMs,
            maxRecords: config.maxChartRecords,
        },
        { events: new FanoutEventSink<BaselineEvent>(logPlugin, new BaselineLoggerEventSink(logBaseline)) }
    )

    const uploader = new PvOutputUploader(config.pvoutput, {
        timeZone: config.timeZone,
        logger: logUpload,
        dispatcher: opts.dispatcher,
    })

    // 3) Loop
    const pollEvents = new FanoutEventSink<PollEvent>(
        logPlugin,
        new PollLoggerEventSink(logPoll, logUpload),
        {
            publish(evt: PollEvent): void {
                adapter.handle(evt)
            },
        }
    )
    const loop = new PollLoop({ intervalMs: config.pollIntervalMs }, {
        reader: inverter,
        tracker,
        uploader,
        events: pollEvents,
    })

    app.decorate('bridgeState', store)
    app.decorate('pollLoop', loop)

    // 4) Lifecycle hooks
    app.addHook('onReady', async () => {
        await tracker.load()
        adapter.restore(tracker.getState(), localDate(new Date(), config.timeZone))

        if (opts.autoStart ?? true) {
            logPlugin.info(`starting poll loop mode=${uploader.isDryRun() ? 'dry-run' : 'live'}`)
            loop.start()
        } else {
            store.setStatus('ready')
        }
    })

    app.addHook('onClose', async () => {
        logPlugin.info('stopping poll loop')
        await loop.stop().catch((err: unknown) => {
            logPlugin.warn('error stopping poll loop', {
                err: err instanceof Error ? err.message : String(err),
            })
        })
    })
}

export default fp(bridgePlugin, {
    name: 'bridge-plugin',
})
