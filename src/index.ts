export { GameMonitor, CLIENT_VERSION, DEFAULT_FRESH_SECONDS, DEFAULT_DEBUG_LOG } from "./monitor.js";
export type { GameMonitorOptions, ResolveOptions } from "./monitor.js";
export { CacheStore, cacheKey, loadCacheDocument, DEFAULT_STORE_FILE } from "./cache.js";
export type { CacheDocument } from "./cache.js";
export {
    buildQueryUrl,
    createFetchTransport,
    fetchServerInfo,
    parseServerXml,
    reshapeServer,
    toArray,
    DEFAULT_BASE_URL,
} from "./fetcher.js";
export type {
    Player,
    PlayerCount,
    ServerInfo,
    ServerRecord,
    Transport,
    XmlNode,
    XmlValue,
} from "./fetcher.js";
export { assessFreshness, resolveServer } from "./policy/index.js";
export type { FreshnessState, QueryOutcome, RecordSource } from "./policy/index.js";
export { FileDebugLogger, createDebugLogger, silentLogger } from "./logger.js";
export type { DebugLogger } from "./logger.js";
export { loadConfig } from "./config.js";
export {
    GameMonitorError,
    ConfigError,
    TransportFailure,
    CacheUnavailable,
    PersistFailure,
} from "./errors.js";
