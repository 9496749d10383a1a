// services/bridge/src/errors.ts

export type BridgeErrorCode =
    | 'DEVICE_UNREACHABLE'
    | 'DECODE_ERROR'
    | 'NETWORK_ERROR'
    | 'REJECTED_BY_SERVICE'
    | 'STATE_CORRUPT'
    | 'CONFIG_ERROR'

export type BridgeErrorShape = {
    message: string
    code?: string
    retryable?: boolean
}

/**
 * Base for every error the bridge raises on purpose. `retryable` means the
 * next poll cycle may succeed without operator action.
 */
export class BridgeError extends Error {
    readonly code: BridgeErrorCode
    readonly retryable: boolean

    constructor(code: BridgeErrorCode, message: string, opts: { retryable: boolean; cause?: unknown }) {
        super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined)
        this.name = new.target.name
        this.code = code
        this.retryable = opts.retryable
    }
}

/** Field-bus connect or read failure. */
export class DeviceUnreachableError extends BridgeError {
    constructor(message: string, cause?: unknown) {
        super('DEVICE_UNREACHABLE', message, { retryable: true, cause })
    }
}

/** Register block too short or holding values that do not decode. */
export class DecodeError extends BridgeError {
    constructor(message: string, cause?: unknown) {
        super('DECODE_ERROR', message, { retryable: true, cause })
    }
}

/** Upload request never produced an HTTP response. */
export class NetworkError extends BridgeError {
    constructor(message: string, cause?: unknown) {
        super('NETWORK_ERROR', message, { retryable: true, cause })
    }
}

export class RejectedByServiceError extends BridgeError {
    readonly statusCode: number
    readonly responseText: string

    constructor(statusCode: number, responseText: string) {
        super('REJECTED_BY_SERVICE', `service rejected status (http ${statusCode}): ${responseText}`, {
            retryable: statusCode >= 500,
        })
        this.statusCode = statusCode
        this.responseText = responseText
    }
}

/** Persisted state unreadable or invalid; recovered by starting a fresh baseline. */
export class StateCorruptError extends BridgeError {
    readonly path: string

    constructor(path: string, message: string, cause?: unknown) {
        super('STATE_CORRUPT', `${path}: ${message}`, { retryable: false, cause })
        this.path = path
    }
}

export class ConfigError extends BridgeError {
    readonly problems: string[]

    constructor(problems: string[]) {
        super('CONFIG_ERROR', `invalid configuration: ${problems.join('; ')}`, { retryable: false })
        this.problems = problems
    }
}

export function toErrorShape(err: unknown): BridgeErrorShape {
    if (err instanceof BridgeError) {
        return { message: err.message, code: err.code, retryable: err.retryable }
    }
    if (err instanceof Error) {
        const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined
        return { message: err.message, code }
    }
    return { message: String(err) }
}
