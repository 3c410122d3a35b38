import chalk from "chalk";
import Table from "cli-table3";
import { GameMonitor, type GameMonitorOptions } from "../monitor.js";
import { nodeText, type ServerRecord } from "../fetcher.js";
import type { QueryOutcome } from "../policy/index.js";
import { describeError } from "../errors.js";

interface QueryOptions {
    output: string;
    refresh?: boolean;
    monitor: GameMonitorOptions;
}

const SOURCE_LABELS: Record<QueryOutcome["source"], string> = {
    cache: "cache (fresh)",
    remote: "Game-Monitor",
    fallback: "cache (stale, source unavailable)",
    none: "-",
};

export async function queryCommand(host: string | undefined, port: string | undefined, options: QueryOptions): Promise<void> {
    const isJson = options.output === "json";
    const gm = new GameMonitor(options.monitor);
    const outcome = await gm.resolve(host, port, { refresh: options.refresh });
    const server = outcome.record;

    if (!server) {
        const reason = outcome.error ? describeError(outcome.error) : "no data available";
        if (isJson) {
            console.log(JSON.stringify({ error: reason }));
            process.exitCode = 1;
            return;
        }
        console.log(chalk.yellow(`\n  ⚠  No server data: ${reason}\n`));
        process.exitCode = 1;
        return;
    }

    if (isJson) {
        console.log(JSON.stringify({ source: outcome.source, state: outcome.state, server }, null, 2));
        return;
    }

    printServer(server, outcome);
}

function printServer(server: ServerRecord, outcome: QueryOutcome): void {
    const game = nodeText(server.game.longname) || nodeText(server.game.name) || "(unknown game)";

    console.log("");
    console.log(chalk.bold.cyan(`  🎮 ${server.name || "(unnamed server)"}`));
    console.log(chalk.dim("  " + "─".repeat(58)));

    const infoTable = new Table({
        chars: { mid: "", "left-mid": "", "mid-mid": "", "right-mid": "" },
        colWidths: [16, 46],
        style: { head: [], border: ["dim"], "padding-left": 2, "padding-right": 1 },
    });
    infoTable.push(
        [chalk.bold("Address"), chalk.white(`${server.ip}:${server.port}`)],
        [chalk.bold("Game"), chalk.white.bold(trunc(game, 42))],
        [chalk.bold("Map"), chalk.white(server.map || "-")],
        [chalk.bold("Players"), playerCount(server)],
        [chalk.bold("Updated"), chalk.dim(new Date(server.updated * 1000).toISOString())],
        [chalk.bold("Source"), sourceLabel(outcome)],
    );
    console.log(infoTable.toString());

    console.log(chalk.bold("\n  👥 Players"));
    if (server.players.length) {
        const columns = playerColumns(server.players);
        const playerTable = new Table({
            head: columns.map((c) => chalk.bold(c)),
            style: { head: [], border: ["dim"], "padding-left": 2, "padding-right": 1 },
        });
        for (const player of server.players) {
            playerTable.push(columns.map((c) => trunc(nodeText(player[c]), 24)));
        }
        console.log(playerTable.toString());
    } else {
        console.log(chalk.dim("  (nobody online)"));
    }

    const names = Object.keys(server.variables).sort();
    if (names.length) {
        console.log(chalk.bold("\n  ⚙️  Variables"));
        const varTable = new Table({
            colWidths: [26, 36],
            style: { head: [], border: ["dim"], "padding-left": 2, "padding-right": 1 },
        });
        for (const name of names) {
            varTable.push([chalk.dim(trunc(name, 24)), trunc(server.variables[name], 34)]);
        }
        console.log(varTable.toString());
    }

    if (outcome.error) {
        console.log(chalk.yellow(`\n  ⚠  ${describeError(outcome.error)}`));
    }
    console.log("");
}

function playerCount(server: ServerRecord): string {
    const { current, max } = server.count;
    const ratio = max > 0 ? current / max : 0;
    const color = ratio >= 0.9 ? chalk.red : ratio >= 0.5 ? chalk.yellow : chalk.green;
    return color(`${current}/${max}`);
}

function sourceLabel(outcome: QueryOutcome): string {
    const label = SOURCE_LABELS[outcome.source];
    return outcome.source === "fallback" ? chalk.yellow(label) : chalk.cyan(label);
}

/** Union of scalar fields across players, in first-seen order */
function playerColumns(players: ServerRecord["players"]): string[] {
    const seen = new Set<string>();
    for (const player of players) {
        for (const [key, value] of Object.entries(player)) {
            if (typeof value === "string") seen.add(key);
        }
    }
    return [...seen];
}

function trunc(s: string, n: number): string {
    return s.length > n ? s.slice(0, n - 1) + "…" : s;
}
