import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import type { Agent } from "@standoff/engine";
import { z } from "zod";

export type Score = Record<Agent, number>;

export const ScoreSchema = z.object({
	Captain: z.number().int().nonnegative(),
	Alien: z.number().int().nonnegative(),
});

export type LoadScoreResult =
	| { status: "ok"; score: Score }
	| { status: "not_found" }
	| { status: "decode_error"; error: string }
	| { status: "io_error"; error: string };

export type SaveScoreResult = { ok: true } | { ok: false; error: string };

export interface ScoreStore {
	readonly location: string;
	load(): LoadScoreResult;
	save(score: Score): SaveScoreResult;
}

/** The score file exists but could not be read; the game cannot continue. */
export class ScoreReadError extends Error {
	constructor(
		readonly location: string,
		readonly detail: string,
	) {
		super(`Could not read the score file at ${location}: ${detail}`);
		this.name = "ScoreReadError";
	}
}

export const zeroScore = (): Score => ({ Captain: 0, Alien: 0 });

export function recordWin(score: Score, winner: Agent): Score {
	return { ...score, [winner]: score[winner] + 1 };
}

export function serializeScore(score: Score): string {
	return JSON.stringify({ Captain: score.Captain, Alien: score.Alien });
}

const errorCode = (e: unknown): string | undefined => {
	if (typeof e === "object" && e !== null && "code" in e) {
		return typeof e.code === "string" ? e.code : undefined;
	}
	return undefined;
};

const errorMessage = (e: unknown): string =>
	e instanceof Error ? e.message : String(e);

/**
 * JSON score file, e.g. `{"Captain":3,"Alien":5}`. The parent directory is
 * created on the first write.
 */
export function createFileScoreStore(filePath: string): ScoreStore {
	return {
		location: filePath,

		load() {
			let raw: string;
			try {
				raw = readFileSync(filePath, "utf-8");
			} catch (e) {
				if (errorCode(e) === "ENOENT") return { status: "not_found" };
				return { status: "io_error", error: errorMessage(e) };
			}

			let payload: unknown;
			try {
				payload = JSON.parse(raw);
			} catch (e) {
				return { status: "decode_error", error: errorMessage(e) };
			}

			const result = ScoreSchema.safeParse(payload);
			if (!result.success) {
				const errors = result.error.errors
					.map((e) => `${e.path.join(".")}: ${e.message}`)
					.join("; ");
				return { status: "decode_error", error: errors };
			}
			return { status: "ok", score: result.data };
		},

		save(score) {
			try {
				mkdirSync(path.dirname(filePath), { recursive: true });
				writeFileSync(filePath, serializeScore(score), "utf-8");
				return { ok: true };
			} catch (e) {
				return { ok: false, error: errorMessage(e) };
			}
		},
	};
}
