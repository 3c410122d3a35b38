import fs from "fs";
import { describeError } from "./errors.js";

// ── Debug Logging ─────────────────────────────────────────────────
// Levels: 2 = fetch/fallback notices, 3 = cache decisions, 7 = dumps.
// Nothing is written unless the configured level is at least the
// message's own level.

export interface DebugLogger {
    emit(level: number, message: string): void;
}

export const silentLogger: DebugLogger = {
    emit() {},
};

function timestamp(date: Date): string {
    return date.toString().replace(/ \(.*\)$/, "");
}

/** Formats one message as `[time] line` entries, one per line of content */
export function formatLogLines(message: string, date: Date = new Date()): string[] {
    const time = timestamp(date);
    return message.split(/\r?\n/).map((line) => `[${time}] ${line}`);
}

export class FileDebugLogger implements DebugLogger {
    private warned = false;

    constructor(
        public readonly file: string,
        public readonly level: number,
        private clock: () => Date = () => new Date(),
    ) {}

    emit(level: number, message: string): void {
        if (this.level <= 0 || this.level < level) return;

        const lines = formatLogLines(message, this.clock());
        try {
            fs.appendFileSync(this.file, lines.join("\n") + "\n", "utf-8");
        } catch (e: unknown) {
            // The debug log is a side channel; report once and keep going
            if (!this.warned) {
                this.warned = true;
                process.stderr.write(`gamemon: debug log ${this.file} is not writable: ${describeError(e)}\n`);
            }
        }
    }
}

/** Builds the logger for a (path, level) pair; level 0 means off */
export function createDebugLogger(file: string, level: number): DebugLogger {
    if (!file || level <= 0) return silentLogger;
    return new FileDebugLogger(file, level);
}
