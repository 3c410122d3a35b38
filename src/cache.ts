import fs from "fs";
import path from "path";
import { CacheUnavailable, PersistFailure, describeError } from "./errors.js";
import { isXmlNode, type ServerRecord } from "./fetcher.js";
import { silentLogger, type DebugLogger } from "./logger.js";

export const DEFAULT_STORE_FILE = "gameServerInfoCache.json";

export interface CacheDocument {
    [key: string]: ServerRecord;
}

/** `ip_<host>_<port>` with every dot replaced, e.g. ip_1_2_3_4_9999 */
export function cacheKey(host: string, port: string | number): string {
    return `ip_${host}_${port}`.replace(/\./g, "_");
}

function isServerRecord(value: unknown): value is ServerRecord {
    if (!isXmlNode(value)) return false;
    const v: Record<string, unknown> = value;
    return (
        typeof v.ip === "string" &&
        typeof v.port === "number" &&
        typeof v.name === "string" &&
        typeof v.map === "string" &&
        isXmlNode(v.game) &&
        isXmlNode(v.extra) &&
        typeof v.updated === "number" &&
        typeof v.schemaVersion === "string" &&
        isXmlNode(v.count) &&
        Array.isArray(v.players) &&
        isXmlNode(v.variables)
    );
}

/**
 * Reads a cache document from disk. Never throws: a missing file, a read
 * error or unparsable content all produce an empty document, and entries
 * that are not server records are dropped.
 */
export function loadCacheDocument(file: string, logger: DebugLogger = silentLogger): CacheDocument {
    if (!fs.existsSync(file)) {
        logger.emit(3, `No cache file at ${file}. Starting with an empty store.`);
        return {};
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (e: unknown) {
        const err = new CacheUnavailable(file, { cause: e });
        logger.emit(2, `${describeError(err)}. Starting with an empty store.`);
        return {};
    }

    if (!isXmlNode(parsed)) {
        logger.emit(2, `Cache file ${file} is not a key/record mapping. Starting with an empty store.`);
        return {};
    }

    const doc: CacheDocument = {};
    for (const [key, value] of Object.entries(parsed)) {
        if (isServerRecord(value)) doc[key] = value;
        else logger.emit(3, `Dropping malformed cache entry ${key}.`);
    }
    return doc;
}

/**
 * Single-file store of server records keyed by cacheKey(). The whole
 * document is rewritten on every put: written to a sibling temp file and
 * renamed over the original, so a failed write leaves the previous
 * document intact.
 */
export class CacheStore {
    private records: CacheDocument;

    constructor(
        public readonly file: string = DEFAULT_STORE_FILE,
        private logger: DebugLogger = silentLogger,
    ) {
        this.records = loadCacheDocument(file, logger);
    }

    /** Re-reads the document from disk, replacing the in-memory copy */
    load(): CacheDocument {
        this.records = loadCacheDocument(this.file, this.logger);
        return { ...this.records };
    }

    /** Returns a copy; changing it does not touch the store */
    get(key: string): ServerRecord | undefined {
        return Object.hasOwn(this.records, key) ? structuredClone(this.records[key]) : undefined;
    }

    get size(): number {
        return Object.keys(this.records).length;
    }

    keys(): string[] {
        return Object.keys(this.records);
    }

    /**
     * Inserts or overwrites `key` and rewrites the document.
     * Throws PersistFailure when the file cannot be replaced; the in-memory
     * record is kept either way.
     */
    put(key: string, record: ServerRecord): void {
        this.records[key] = structuredClone(record);

        const payload = JSON.stringify(this.records, null, 2);
        if (!payload) {
            this.logger.emit(2, "Serialized cache is empty. Keeping the existing file.");
            return;
        }

        const tmp = `${this.file}.tmp`;
        try {
            const dir = path.dirname(this.file);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
            fs.writeFileSync(tmp, payload, "utf-8");
            fs.renameSync(tmp, this.file);
        } catch (e: unknown) {
            try {
                fs.rmSync(tmp, { force: true, recursive: true });
            } catch (cleanup: unknown) {
                this.logger.emit(2, `Could not remove ${tmp}: ${describeError(cleanup)}`);
            }
            throw new PersistFailure(this.file, { cause: e });
        }
        this.logger.emit(3, `Stored ${key} in ${this.file}.`);
    }
}
