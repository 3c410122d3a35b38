import { CacheStore, DEFAULT_STORE_FILE } from "./cache.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_BASE_URL, createFetchTransport, type ServerRecord, type Transport } from "./fetcher.js";
import { createDebugLogger, type DebugLogger } from "./logger.js";
import { resolveServer, type QueryOutcome } from "./policy/index.js";

/** Stamped on every fetched record; records with another tag are refetched */
export const CLIENT_VERSION = "0.1.0";

export const DEFAULT_FRESH_SECONDS = 600;
export const DEFAULT_DEBUG_LOG = "gmDebug.log";

export interface GameMonitorOptions {
    /** Default host queried when none is passed */
    host?: string;
    /** Default port queried when none is passed */
    port?: string | number;
    /** Seconds a cached record stays fresh */
    fresh?: number;
    storeFile?: string;
    debugLog?: string;
    /** 0 disables the debug log; larger values log more */
    debugLevel?: number;
    /** Replaces the file logger built from debugLog/debugLevel */
    logger?: DebugLogger;
    transport?: Transport;
    schemaVersion?: string;
    baseUrl?: string;
    /** Current Unix time in seconds */
    now?: () => number;
}

export interface ResolveOptions {
    refresh?: boolean;
}

/**
 * Game-Monitor client with a file-backed cache.
 *
 * ```ts
 * const gm = new GameMonitor({ host: "10.0.0.5", port: 16567 });
 * const server = await gm.query();
 * if (server) console.log(`${server.name}: ${server.count.current}/${server.count.max} on ${server.map}`);
 * ```
 */
export class GameMonitor {
    readonly host?: string;
    readonly port?: string | number;
    readonly fresh: number;
    readonly schemaVersion: string;
    readonly store: CacheStore;
    private logger: DebugLogger;
    private transport: Transport;
    private baseUrl: string;
    private now: () => number;

    constructor(options: GameMonitorOptions = {}) {
        this.logger = options.logger ?? createDebugLogger(options.debugLog || DEFAULT_DEBUG_LOG, options.debugLevel ?? 0);
        this.host = options.host || undefined;
        this.port = options.port || undefined;
        this.fresh = options.fresh || DEFAULT_FRESH_SECONDS;
        this.schemaVersion = options.schemaVersion ?? CLIENT_VERSION;
        this.transport = options.transport ?? createFetchTransport();
        this.baseUrl = options.baseUrl || DEFAULT_BASE_URL;
        this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
        this.store = new CacheStore(options.storeFile || DEFAULT_STORE_FILE, this.logger);

        this.logger.emit(7, "Client options:\n" + JSON.stringify({
            host: this.host ?? null,
            port: this.port ?? null,
            fresh: this.fresh,
            storeFile: this.store.file,
            storedServers: this.store.size,
            schemaVersion: this.schemaVersion,
            baseUrl: this.baseUrl,
        }, null, 2));
    }

    /** Status of host:port (or the defaults), or null when nothing is available */
    async query(host?: string, port?: string | number): Promise<ServerRecord | null> {
        const outcome = await this.resolve(host, port);
        return outcome.record;
    }

    /** Like query(), but reports where the record came from and what failed */
    async resolve(host?: string, port?: string | number, options: ResolveOptions = {}): Promise<QueryOutcome> {
        const h = host || this.host;
        const p = port || this.port;
        if (!h || !p) {
            const error = new ConfigError("No host/port given and no default configured");
            this.logger.emit(2, error.message);
            return { state: "MISS", source: "none", record: null, error };
        }

        return resolveServer(h, p, {
            store: this.store,
            transport: this.transport,
            logger: this.logger,
            ttl: this.fresh,
            schemaVersion: this.schemaVersion,
            now: this.now,
            baseUrl: this.baseUrl,
            refresh: options.refresh,
        });
    }
}
