import * as path from "node:path";
import { BoardBoundsSchema } from "@standoff/engine";
import { z } from "zod";
import { type LogLevel, LogLevelSchema } from "./obs/log";

export type CaptainBotType = "random" | "chaser";

/** Runtime configuration for the command line entry point */
export interface CliConfig {
	/** JSON file holding the win counts */
	scorePath: string;
	/** JSON-lines event log */
	logPath: string;
	logLevel: LogLevel;
	/** Seed for the random source; a fresh one is drawn when null */
	seed: number | null;
	/** Fixed board bounds; the player is asked each match when null */
	bounds: { minCoord: number; maxCoord: number } | null;
	/** Matches played by `tourney` */
	games: number;
	/** Cycle cap for `tourney` matches */
	maxCycles: number;
	/** Captain used by `tourney` */
	captainBot: CaptainBotType;
}

/** Schema for validating CLI configuration */
export const CliConfigSchema = z.object({
	scorePath: z.string().min(1, "scorePath cannot be empty"),
	logPath: z.string().min(1, "logPath cannot be empty"),
	logLevel: LogLevelSchema,
	seed: z.number().int("seed must be an integer").nullable(),
	bounds: BoardBoundsSchema.nullable(),
	games: z.number().int().positive("games must be a positive number"),
	maxCycles: z.number().int().positive("maxCycles must be a positive number"),
	captainBot: z.enum(["random", "chaser"]),
});

/** Default configuration values */
export const defaultCliConfig: CliConfig = {
	scorePath: path.join(".standoff", "score.json"),
	logPath: path.join(".standoff", "standoff.log"),
	logLevel: "info",
	seed: null,
	bounds: null,
	games: 200,
	maxCycles: 500,
	captainBot: "random",
};

/**
 * Creates a full CliConfig from partial options, applying defaults
 */
export function createCliConfig(options: Partial<CliConfig> = {}): CliConfig {
	const merged: CliConfig = { ...defaultCliConfig, ...options };

	const result = CliConfigSchema.safeParse(merged);

	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new Error(`Invalid configuration: ${errors}`);
	}

	return merged;
}

type RawArgs = Record<string, unknown>;

function num(v: unknown): number | undefined {
	const n =
		typeof v === "string" && v.trim() !== ""
			? Number(v)
			: typeof v === "number"
				? v
				: Number.NaN;
	return Number.isFinite(n) ? n : undefined;
}

function str(v: unknown): string | undefined {
	return typeof v === "string" && v.length > 0 ? v : undefined;
}

/**
 * Reads overrides from parsed flags, falling back to STANDOFF_* environment
 * variables. Flags that are absent leave the default in place.
 */
export function cliConfigFromArgs(
	argv: RawArgs,
	env: Record<string, string | undefined> = process.env,
): Partial<CliConfig> {
	const out: Partial<CliConfig> = {};

	const scorePath = str(argv.scorePath) ?? str(env.STANDOFF_SCORE_PATH);
	if (scorePath) out.scorePath = scorePath;

	const logPath = str(argv.logPath) ?? str(env.STANDOFF_LOG_PATH);
	if (logPath) out.logPath = logPath;

	const logLevel = LogLevelSchema.safeParse(
		str(argv.logLevel) ?? str(env.STANDOFF_LOG_LEVEL),
	);
	if (logLevel.success) out.logLevel = logLevel.data;

	const seed = num(argv.seed);
	if (seed !== undefined) out.seed = seed;

	const minCoord = num(argv.min);
	const maxCoord = num(argv.max);
	if (minCoord !== undefined || maxCoord !== undefined) {
		if (minCoord === undefined || maxCoord === undefined) {
			throw new Error("--min and --max must be given together");
		}
		out.bounds = { minCoord, maxCoord };
	}

	const games = num(argv.games);
	if (games !== undefined) out.games = games;

	const maxCycles = num(argv.maxCycles);
	if (maxCycles !== undefined) out.maxCycles = maxCycles;

	const captainBot = str(argv.captain);
	if (captainBot === "random" || captainBot === "chaser") {
		out.captainBot = captainBot;
	} else if (captainBot) {
		throw new Error(`Unknown --captain ${captainBot} (random|chaser)`);
	}

	return out;
}
