import { describe, it, expect, vi } from "vitest";
import fs from "fs";
import path from "path";
import { GameMonitor, CLIENT_VERSION } from "../src/monitor.js";
import { NOW, makeRecord, serverXml, tempDir } from "./helpers.js";

function failingTransport() {
    return vi.fn(async (): Promise<string> => {
        throw new Error("socket hang up");
    });
}

describe("GameMonitor", () => {
    it("applies defaults", () => {
        const gm = new GameMonitor({ storeFile: path.join(tempDir(), "cache.json") });
        expect(gm.fresh).toBe(600);
        expect(gm.schemaVersion).toBe(CLIENT_VERSION);
        expect(gm.host).toBeUndefined();
        expect(gm.port).toBeUndefined();
    });

    it("queries the constructor defaults when called without arguments", async () => {
        const transport = vi.fn(async () => serverXml({ players: ["alice"] }));
        const gm = new GameMonitor({
            host: "1.2.3.4",
            port: 9999,
            storeFile: path.join(tempDir(), "cache.json"),
            transport,
            now: () => NOW,
        });

        const server = await gm.query();
        expect(transport).toHaveBeenCalledWith("http://www.game-monitor.com/client/server-xml.php?rules=1&ip=1.2.3.4:9999");
        expect(server?.count).toEqual({ current: 1, max: 64 });
        expect(server?.updated).toBe(NOW);
    });

    it("prefers arguments over defaults", async () => {
        const transport = vi.fn(async () => serverXml({ ip: "5.6.7.8", port: 1111 }));
        const gm = new GameMonitor({
            host: "1.2.3.4",
            port: 9999,
            storeFile: path.join(tempDir(), "cache.json"),
            transport,
        });

        const server = await gm.query("5.6.7.8", 1111);
        expect(transport).toHaveBeenCalledWith("http://www.game-monitor.com/client/server-xml.php?rules=1&ip=5.6.7.8:1111");
        expect(server?.ip).toBe("5.6.7.8");
        expect(gm.store.keys()).toEqual(["ip_5_6_7_8_1111"]);
    });

    it("returns null without a host or port and makes no request", async () => {
        const transport = vi.fn(async () => serverXml());
        const gm = new GameMonitor({ port: 9999, storeFile: path.join(tempDir(), "cache.json"), transport });

        expect(await gm.query()).toBeNull();
        const outcome = await gm.resolve(undefined, 9999);
        expect(outcome.error?.code).toBe("CONFIG");
        expect(transport).not.toHaveBeenCalled();
    });

    it("serves records cached by an earlier instance", async () => {
        const file = path.join(tempDir(), "cache.json");
        const cached = makeRecord({ updated: NOW - 100 });
        fs.writeFileSync(file, JSON.stringify({ ip_1_2_3_4_9999: cached }));
        const transport = failingTransport();

        const gm = new GameMonitor({ storeFile: file, transport, now: () => NOW });
        expect(await gm.query("1.2.3.4", 9999)).toEqual(cached);
        expect(transport).not.toHaveBeenCalled();
    });

    it("returns nothing on a total miss", async () => {
        const gm = new GameMonitor({
            storeFile: path.join(tempDir(), "cache.json"),
            transport: failingTransport(),
            now: () => NOW,
        });
        expect(await gm.query("5.6.7.8", 1111)).toBeNull();
    });

    it("honours a custom TTL", async () => {
        const file = path.join(tempDir(), "cache.json");
        fs.writeFileSync(file, JSON.stringify({ ip_1_2_3_4_9999: makeRecord({ updated: NOW - 120 }) }));
        const transport = vi.fn(async () => serverXml());

        const gm = new GameMonitor({ storeFile: file, transport, fresh: 60, now: () => NOW });
        const outcome = await gm.resolve("1.2.3.4", 9999);
        expect(outcome.state).toBe("STALE_AGE");
        expect(transport).toHaveBeenCalledTimes(1);
    });

    it("writes decisions to the debug log at the configured level", async () => {
        const dir = tempDir();
        const log = path.join(dir, "debug.log");
        const file = path.join(dir, "cache.json");
        fs.writeFileSync(file, JSON.stringify({ ip_1_2_3_4_9999: makeRecord({ updated: NOW }) }));

        const gm = new GameMonitor({ storeFile: file, debugLog: log, debugLevel: 3, transport: failingTransport(), now: () => NOW });
        await gm.query("1.2.3.4", 9999);

        const lines = fs.readFileSync(log, "utf-8").trimEnd().split("\n");
        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatch(/^\[[^\]]+\] Store data is fresh\. Returning store data\.$/);
    });

    it("writes nothing when the debug level is 0", async () => {
        const dir = tempDir();
        const log = path.join(dir, "debug.log");
        const gm = new GameMonitor({ storeFile: path.join(dir, "cache.json"), debugLog: log, transport: failingTransport() });
        await gm.query("1.2.3.4", 9999);
        expect(fs.existsSync(log)).toBe(false);
    });
});
