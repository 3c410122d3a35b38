import type { GameMonitorOptions } from "./monitor.js";

// Env vars: GAMEMON_HOST, GAMEMON_PORT, GAMEMON_FRESH, GAMEMON_STORE_FILE,
// GAMEMON_DEBUG_LOG, GAMEMON_DEBUG_LEVEL, GAMEMON_BASE_URL.
// The CLI loads .env through dotenv before calling loadConfig().

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === "") return undefined;
    const n = Number(value);
    return Number.isInteger(n) && n >= 0 ? n : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
    return value && value.trim() ? value.trim() : undefined;
}

export function loadConfig(env: Env = process.env): GameMonitorOptions {
    const options: GameMonitorOptions = {};

    const host = nonEmpty(env.GAMEMON_HOST);
    if (host) options.host = host;
    const port = nonEmpty(env.GAMEMON_PORT);
    if (port) options.port = port;

    const fresh = parseNumber(env.GAMEMON_FRESH);
    if (fresh !== undefined && fresh > 0) options.fresh = fresh;

    const storeFile = nonEmpty(env.GAMEMON_STORE_FILE);
    if (storeFile) options.storeFile = storeFile;
    const debugLog = nonEmpty(env.GAMEMON_DEBUG_LOG);
    if (debugLog) options.debugLog = debugLog;

    const debugLevel = parseNumber(env.GAMEMON_DEBUG_LEVEL);
    if (debugLevel !== undefined) options.debugLevel = debugLevel;

    const baseUrl = nonEmpty(env.GAMEMON_BASE_URL);
    if (baseUrl) options.baseUrl = baseUrl;

    return options;
}

export interface CliFlags {
    store?: string;
    fresh?: string;
    debugLog?: string;
    debugLevel?: string;
}

/** CLI flags win over the environment; unparsable numbers are ignored */
export function mergeCliFlags(base: GameMonitorOptions, flags: CliFlags): GameMonitorOptions {
    const options: GameMonitorOptions = { ...base };
    if (flags.store) options.storeFile = flags.store;
    if (flags.debugLog) options.debugLog = flags.debugLog;

    const fresh = parseNumber(flags.fresh);
    if (fresh !== undefined && fresh > 0) options.fresh = fresh;
    const debugLevel = parseNumber(flags.debugLevel);
    if (debugLevel !== undefined) options.debugLevel = debugLevel;

    return options;
}
