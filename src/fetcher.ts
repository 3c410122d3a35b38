import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ConfigError, TransportFailure, describeError } from "./errors.js";

// ── Data Source ────────────────────────────────────────────────────
// Game-Monitor publishes per-server status as XML for servers listed
// under a premium account. No API key is sent; access is tied to the
// queried server's listing, not to the caller.

export const DEFAULT_BASE_URL = "http://www.game-monitor.com";
export const USER_AGENT = "gamemon/0.1.0";
const DEFAULT_TIMEOUT_MS = 10_000;

// ── Types ──────────────────────────────────────────────────────────

export type XmlValue = string | XmlNode | XmlValue[];

export interface XmlNode {
    [key: string]: XmlValue;
}

export type Player = XmlNode;

export interface PlayerCount {
    current: number;
    max: number;
}

/** Reshaped server status, before the client stamps it */
export interface ServerInfo {
    ip: string;
    port: number;
    name: string;
    map: string;
    game: XmlNode;
    count: PlayerCount;
    players: Player[];
    variables: Record<string, string>;
    /** Top-level response fields with no dedicated slot above */
    extra: XmlNode;
}

export interface ServerRecord extends ServerInfo {
    /** Unix time in seconds of the last successful fetch */
    updated: number;
    schemaVersion: string;
}

export interface ServerIdentity {
    host: string;
    port: string | number;
}

/** Fetches a URL and resolves to its body; rejects on any failure */
export type Transport = (url: string) => Promise<string>;

// ── Transport ──────────────────────────────────────────────────────

export function buildQueryUrl(host: string, port: string | number, baseUrl = DEFAULT_BASE_URL): string {
    return `${baseUrl.replace(/\/+$/, "")}/client/server-xml.php?rules=1&ip=${host}:${port}`;
}

export function createFetchTransport(timeout = DEFAULT_TIMEOUT_MS): Transport {
    return async (url) => {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeout);
        try {
            const res = await fetch(url, {
                headers: { "User-Agent": USER_AGENT },
                signal: controller.signal,
            });
            if (!res.ok) throw new TransportFailure(`HTTP ${res.status} for ${url}`, res.status);
            return await res.text();
        } catch (e: unknown) {
            if (e instanceof TransportFailure) throw e;
            throw new TransportFailure(`Request to ${url} failed`, undefined, { cause: e });
        } finally {
            clearTimeout(timer);
        }
    };
}

// ── Parsing ────────────────────────────────────────────────────────

// Attributes and child elements share one namespace, so
// <player name="x"/> and <player><name>x</name></player> read the same.
const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "",
    textNodeName: "#text",
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
});

export function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses a server-xml response into the content of its root element.
 * Throws TransportFailure when the body is empty, not well-formed, or has
 * no element root.
 */
export function parseServerXml(body: string): XmlNode {
    if (!body.trim()) throw new TransportFailure("Empty response body");

    const valid = XMLValidator.validate(body);
    if (valid !== true) {
        throw new TransportFailure(`Malformed XML at line ${valid.err.line}: ${valid.err.msg}`);
    }

    const doc: unknown = parser.parse(body);
    if (!isXmlNode(doc)) throw new TransportFailure("Response has no root element");

    const rootName = Object.keys(doc).find((k) => !k.startsWith("?"));
    const root = rootName === undefined ? undefined : doc[rootName];
    if (!isXmlNode(root)) throw new TransportFailure("Response root element is empty");
    return root;
}

// ── Reshaping ──────────────────────────────────────────────────────

/** One element parses to a bare node and many to an array; absent to nothing */
export function toArray(value: XmlValue | undefined): XmlValue[] {
    if (value === undefined || value === "") return [];
    return Array.isArray(value) ? value : [value];
}

export function nodeText(value: XmlValue | undefined): string {
    if (typeof value === "string") return value;
    if (isXmlNode(value)) {
        const inner = value["#text"];
        return typeof inner === "string" ? inner : "";
    }
    return "";
}

function toInt(value: XmlValue | undefined, fallback = 0): number {
    const n = parseInt(nodeText(value), 10);
    return Number.isNaN(n) ? fallback : n;
}

const SHAPED_FIELDS = new Set(["ip", "port", "name", "map", "game", "players", "variables"]);

export function reshapeServer(raw: XmlNode, identity: ServerIdentity): ServerInfo {
    const playersBlock: XmlNode = isXmlNode(raw.players) ? raw.players : {};
    const count: PlayerCount = {
        current: toInt(playersBlock.current),
        max: toInt(playersBlock.max),
    };
    const players = toArray(playersBlock.player).filter(isXmlNode);

    const variablesBlock: XmlNode = isXmlNode(raw.variables) ? raw.variables : {};
    const variables: Record<string, string> = {};
    for (const variable of toArray(variablesBlock.variable)) {
        if (!isXmlNode(variable)) continue;
        const name = nodeText(variable.name);
        if (!name) continue;
        // defineProperty so that names like __proto__ become own keys
        Object.defineProperty(variables, name, {
            value: nodeText(variable.value),
            enumerable: true,
            writable: true,
            configurable: true,
        });
    }

    const extra: XmlNode = {};
    for (const [key, value] of Object.entries(raw)) {
        if (!SHAPED_FIELDS.has(key)) extra[key] = value;
    }

    return {
        ip: nodeText(raw.ip) || identity.host,
        port: toInt(raw.port, toInt(String(identity.port))),
        name: nodeText(raw.name),
        map: nodeText(raw.map),
        game: isXmlNode(raw.game) ? raw.game : {},
        count,
        players,
        variables,
        extra,
    };
}

// ── Fetch ──────────────────────────────────────────────────────────

export interface FetchOptions {
    transport: Transport;
    baseUrl?: string;
}

/**
 * Issues one request for host:port and reshapes the answer.
 * Rejects with ConfigError before any network call when either part of
 * the identity is missing, and with TransportFailure otherwise.
 */
export async function fetchServerInfo(
    host: string,
    port: string | number,
    options: FetchOptions,
): Promise<ServerInfo> {
    if (!host || !port) throw new ConfigError("Host and port are both required");

    const url = buildQueryUrl(host, port, options.baseUrl);
    let body: string;
    try {
        body = await options.transport(url);
    } catch (e: unknown) {
        if (e instanceof TransportFailure) throw e;
        throw new TransportFailure(`Request to ${url} failed: ${describeError(e)}`, undefined, { cause: e });
    }

    return reshapeServer(parseServerXml(body), { host, port });
}
