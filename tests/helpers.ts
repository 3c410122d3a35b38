import fs from "fs";
import os from "os";
import path from "path";
import type { ServerRecord } from "../src/fetcher.js";

export const NOW = 1_700_000_000;

export function tempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "gamemon-"));
}

export function makeRecord(overrides: Partial<ServerRecord> = {}): ServerRecord {
    return {
        ip: "1.2.3.4",
        port: 9999,
        name: "Cached Server",
        map: "dust",
        game: { name: "bf2", longname: "Battlefield 2" },
        count: { current: 1, max: 32 },
        players: [{ name: "alice", score: "5" }],
        variables: { gamemode: "conquest" },
        extra: {},
        updated: NOW,
        schemaVersion: "0.1.0",
        ...overrides,
    };
}

interface XmlOptions {
    ip?: string;
    port?: number;
    players?: string[];
    variables?: [string, string][];
    current?: number;
    max?: number;
}

export function serverXml(options: XmlOptions = {}): string {
    const {
        ip = "1.2.3.4",
        port = 9999,
        players = [],
        variables = [],
        current = players.length,
        max = 64,
    } = options;
    return [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<server>`,
        `  <ip>${ip}</ip>`,
        `  <port>${port}</port>`,
        `  <name>Test Server</name>`,
        `  <map>strike_at_karkand</map>`,
        `  <game><name>bf2</name><longname>Battlefield 2</longname></game>`,
        `  <status>online</status>`,
        `  <players>`,
        `    <current>${current}</current>`,
        `    <max>${max}</max>`,
        ...players.map((p, i) => `    <player><name>${p}</name><score>${i * 10}</score></player>`),
        `  </players>`,
        `  <variables>`,
        ...variables.map(([n, v]) => `    <variable><name>${n}</name><value>${v}</value></variable>`),
        `  </variables>`,
        `</server>`,
    ].join("\n");
}
