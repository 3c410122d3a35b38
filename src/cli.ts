#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import dotenv from "dotenv";
import { queryCommand } from "./commands/query.js";
import { loadConfig, mergeCliFlags } from "./config.js";
import { CLIENT_VERSION, DEFAULT_FRESH_SECONDS } from "./monitor.js";
import { DEFAULT_STORE_FILE } from "./cache.js";

dotenv.config();

type GlobalOptions = {
    output: string;
    refresh?: boolean;
    store?: string;
    fresh?: string;
    debugLog?: string;
    debugLevel?: string;
};

const program = new Command();

program
    .name("gamemon")
    .description(
        chalk.bold("Game-Monitor server status client") +
        "\n  Player counts, map and server variables for servers listed on Game-Monitor." +
        `\n  Results are cached locally (${DEFAULT_STORE_FILE}) for ${DEFAULT_FRESH_SECONDS / 60} minutes by default.` +
        chalk.dim("\n\n  Defaults can be set with GAMEMON_HOST and GAMEMON_PORT (also read from .env).")
    )
    .version(CLIENT_VERSION)
    .option("-o, --output <format>", "Output format: table or json", "table")
    .option("--refresh", "Bypass fresh cache data and ask Game-Monitor")
    .option("--store <file>", "Cache file path")
    .option("--fresh <seconds>", "Seconds cached data stays fresh")
    .option("--debug-log <file>", "Debug log path")
    .option("--debug-level <level>", "Debug verbosity (0 = off)");

// gamemon query 10.0.0.5 16567
// gamemon query            (uses GAMEMON_HOST / GAMEMON_PORT)
program
    .command("query")
    .description("Show the status of a game server")
    .argument("[host]", "Server host (IP address)")
    .argument("[port]", "Server query port")
    .action(async (host: string | undefined, port: string | undefined) => {
        const { output, refresh, store, fresh, debugLog, debugLevel } = program.opts<GlobalOptions>();
        const monitor = mergeCliFlags(loadConfig(), { store, fresh, debugLog, debugLevel });
        await queryCommand(host, port, { output, refresh, monitor });
    });

program.parseAsync().catch((err: unknown) => {
    console.error(chalk.red(`\n  ✗ Error: ${err instanceof Error ? err.message : String(err)}\n`));
    process.exit(1);
});
