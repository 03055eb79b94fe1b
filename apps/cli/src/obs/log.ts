import { appendFileSync, mkdirSync } from "node:fs";
import * as path from "node:path";
import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogFields = Record<string, unknown>;

/** Fire-and-forget structured event sink. */
export type Logger = (
	level: LogLevel,
	message: string,
	fields?: LogFields,
) => void;

const levelRank: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

export const silentLogger: Logger = () => {};

/** One JSON object per line: timestamp, level, message, then the fields. */
export const createLogger = (opts: {
	write: (line: string) => void;
	minLevel?: LogLevel;
	now?: () => Date;
}): Logger => {
	const minRank = levelRank[opts.minLevel ?? "debug"];
	const now = opts.now ?? (() => new Date());
	return (level, message, fields) => {
		if (levelRank[level] < minRank) return;
		const payload = {
			timestamp: now().toISOString(),
			level,
			message,
			...(fields ?? {}),
		};
		opts.write(JSON.stringify(payload));
	};
};

/** Appends to `filePath`. Failures are reported once and never thrown. */
export const createFileWriter = (filePath: string) => {
	let dirReady = false;
	let reported = false;
	return (line: string) => {
		try {
			if (!dirReady) {
				mkdirSync(path.dirname(filePath), { recursive: true });
				dirReady = true;
			}
			appendFileSync(filePath, `${line}\n`, "utf-8");
		} catch (e) {
			if (reported) return;
			reported = true;
			// eslint-disable-next-line no-console
			console.error(`Logging to ${filePath} failed: ${String(e)}`);
		}
	};
};
