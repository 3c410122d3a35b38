import { cacheKey, type CacheStore } from "../cache.js";
import { GameMonitorError, PersistFailure, TransportFailure, describeError } from "../errors.js";
import { fetchServerInfo, type ServerRecord, type Transport } from "../fetcher.js";
import type { DebugLogger } from "../logger.js";

// ── Freshness ──────────────────────────────────────────────────────
//
// MISS           no cached record
// STALE_VERSION  cached by a client with another schema version (any age)
// FRESH          cached no more than `ttl` seconds ago
// STALE_AGE      cached longer ago than that

export type FreshnessState = "MISS" | "STALE_VERSION" | "FRESH" | "STALE_AGE";

export interface FreshnessOptions {
    /** Seconds a record stays fresh */
    ttl: number;
    schemaVersion: string;
    /** Current Unix time in seconds */
    now: number;
}

export function assessFreshness(record: ServerRecord | undefined, options: FreshnessOptions): FreshnessState {
    if (!record) return "MISS";
    if (record.schemaVersion !== options.schemaVersion) return "STALE_VERSION";
    if (options.now - record.updated <= options.ttl) return "FRESH";
    return "STALE_AGE";
}

// ── Resolution ────────────────────────────────────────────────────

export type RecordSource = "cache" | "remote" | "fallback" | "none";

export interface QueryOutcome {
    /** What the cache held before any fetch; a refreshed fresh record stays FRESH */
    state: FreshnessState;
    source: RecordSource;
    record: ServerRecord | null;
    /** Why the remote fetch, or saving its result, did not succeed */
    error?: GameMonitorError;
}

export interface ResolveContext extends Omit<FreshnessOptions, "now"> {
    store: CacheStore;
    transport: Transport;
    logger: DebugLogger;
    now: () => number;
    baseUrl?: string;
    /** Fetch even when the record is fresh; fallback still applies */
    refresh?: boolean;
}

function asGameMonitorError(e: unknown): GameMonitorError {
    if (e instanceof GameMonitorError) return e;
    return new TransportFailure(describeError(e), undefined, { cause: e });
}

/**
 * Returns the record for host:port from the cache when fresh, otherwise
 * from the remote source, otherwise whatever the cache holds. Never
 * rejects.
 */
export async function resolveServer(host: string, port: string | number, ctx: ResolveContext): Promise<QueryOutcome> {
    const key = cacheKey(host, port);
    const cached = ctx.store.get(key);
    const state = assessFreshness(cached, { ttl: ctx.ttl, schemaVersion: ctx.schemaVersion, now: ctx.now() });

    if (state === "FRESH" && cached) {
        if (!ctx.refresh) {
            ctx.logger.emit(3, "Store data is fresh. Returning store data.");
            return { state, source: "cache", record: cached };
        }
        ctx.logger.emit(3, "Refresh requested. Fetching from source.");
    } else if (state === "MISS") {
        ctx.logger.emit(3, "There is no store data for this host/port. Fetching from source.");
    } else if (state === "STALE_VERSION") {
        ctx.logger.emit(2, "Store data was written by another client version. Fetching from source.");
    } else {
        ctx.logger.emit(2, "Store is not fresh enough. Fetching from source.");
    }

    let record: ServerRecord;
    try {
        const info = await fetchServerInfo(host, port, { transport: ctx.transport, baseUrl: ctx.baseUrl });
        record = { ...info, updated: ctx.now(), schemaVersion: ctx.schemaVersion };
    } catch (e: unknown) {
        const error = asGameMonitorError(e);
        ctx.logger.emit(2, `Could not fetch data from source: ${describeError(error)}`);
        if (cached) {
            ctx.logger.emit(2, "Going to provide stale store data instead of failing.");
            return { state, source: "fallback", record: cached, error };
        }
        ctx.logger.emit(3, "There is no store data to return.");
        return { state, source: "none", record: null, error };
    }

    try {
        ctx.store.put(key, record);
    } catch (e: unknown) {
        const error = e instanceof PersistFailure ? e : new PersistFailure(ctx.store.file, { cause: e });
        ctx.logger.emit(2, `${describeError(error)}. Returning fetched data anyway.`);
        return { state, source: "remote", record, error };
    }

    return { state, source: "remote", record };
}
