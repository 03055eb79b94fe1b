import type { BoardConfig, Rng } from "@standoff/engine";
import { playMatch } from "./match";
import { type Logger, silentLogger } from "./obs/log";
import {
	recordWin,
	type SaveScoreResult,
	type Score,
	ScoreReadError,
	type ScoreStore,
	zeroScore,
} from "./score/scoreStore";
import type { Bot, SessionIO } from "./types";

export type SessionOptions = {
	io: SessionIO;
	captain: Bot;
	alien: Bot;
	store: ScoreStore;
	rng: Rng;
	logger?: Logger;
	/** Fixed bounds for every match; the player is asked when omitted. */
	board?: BoardConfig;
	maxPlacementAttempts?: number;
};

export type SessionSummary = {
	matches: number;
	score: Score;
};

/**
 * Back-to-back matches until the player stops. Each match starts from the
 * stored score, adds one win for the winner and writes it back.
 */
export class StandoffSession {
	private score: Score = zeroScore();
	private baselineLoaded = false;
	private matches = 0;
	private readonly logger: Logger;

	constructor(private readonly opts: SessionOptions) {
		this.logger = opts.logger ?? silentLogger;
	}

	get currentScore(): Score {
		return { ...this.score };
	}

	async run(): Promise<SessionSummary> {
		const { io } = this.opts;
		this.logger("debug", "session_start");
		io.showIntro();

		let playAgain = true;
		while (playAgain) {
			this.score = this.loadBaseline();
			io.showScore(this.score);

			const board = this.opts.board ?? (await io.promptBoardBounds());
			this.logger("info", "board_ready", { ...board });

			const outcome = await playMatch({
				board,
				captain: this.opts.captain,
				alien: this.opts.alien,
				rng: this.opts.rng,
				logger: this.logger,
				renderer: io,
				maxPlacementAttempts: this.opts.maxPlacementAttempts,
			});
			if (!outcome.winner) {
				throw new Error("Match ended without a winner.");
			}

			await io.announceResult(outcome);
			this.score = recordWin(this.score, outcome.winner);
			this.matches += 1;
			this.persist();

			playAgain = await io.promptPlayAgain();
			this.logger("debug", playAgain ? "new_match" : "session_end", {
				matches: this.matches,
			});
		}

		return { matches: this.matches, score: this.currentScore };
	}

	/** Flushes the in-memory score, e.g. when the player presses Ctrl+C. */
	interrupt(): SaveScoreResult | null {
		this.logger("info", "interrupted", { matches: this.matches });
		if (!this.baselineLoaded) return null;
		return this.persist();
	}

	private loadBaseline(): Score {
		const { store } = this.opts;
		const loaded = store.load();
		switch (loaded.status) {
			case "ok":
				this.baselineLoaded = true;
				return loaded.score;
			case "not_found":
			case "decode_error": {
				this.logger("warn", "score_reset", {
					location: store.location,
					status: loaded.status,
					...(loaded.status === "decode_error" ? { error: loaded.error } : {}),
				});
				this.score = zeroScore();
				this.baselineLoaded = true;
				this.persist();
				return this.score;
			}
			case "io_error":
				this.logger("error", "score_read_failed", {
					location: store.location,
					error: loaded.error,
				});
				throw new ScoreReadError(store.location, loaded.error);
		}
	}

	private persist(): SaveScoreResult {
		const result = this.opts.store.save(this.score);
		if (result.ok) {
			this.logger("info", "score_saved", { ...this.score });
		} else {
			this.logger("error", "score_write_failed", {
				location: this.opts.store.location,
				error: result.error,
			});
			this.opts.io.warn(`The score could not be saved: ${result.error}`);
		}
		return result;
	}
}
