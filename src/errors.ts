// ── Error Taxonomy ────────────────────────────────────────────────
// None of these escape GameMonitor.query(): they are logged and carried
// on the query outcome so callers can tell why a record is missing.

export type GameMonitorErrorCode =
    | "CONFIG"
    | "TRANSPORT"
    | "CACHE_UNAVAILABLE"
    | "PERSIST";

export class GameMonitorError extends Error {
    constructor(public code: GameMonitorErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Host or port could not be resolved from the arguments or the defaults */
export class ConfigError extends GameMonitorError {
    constructor(message: string) {
        super("CONFIG", message);
    }
}

/** Request failed, returned a non-2xx status, or produced no usable body */
export class TransportFailure extends GameMonitorError {
    constructor(message: string, public status?: number, options?: { cause?: unknown }) {
        super("TRANSPORT", message, options);
    }
}

export class CacheUnavailable extends GameMonitorError {
    constructor(public file: string, options?: { cause?: unknown }) {
        super("CACHE_UNAVAILABLE", `Cache file ${file} could not be read`, options);
    }
}

export class PersistFailure extends GameMonitorError {
    constructor(public file: string, options?: { cause?: unknown }) {
        super("PERSIST", `Cache file ${file} could not be written`, options);
    }
}

export function describeError(e: unknown): string {
    if (e instanceof Error) {
        const cause = e.cause instanceof Error ? ` (${e.cause.message})` : "";
        return `${e.message}${cause}`;
    }
    return String(e);
}
