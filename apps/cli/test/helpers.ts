import type { Agent, BoardConfig, Move } from "@standoff/engine";
import type { LogFields, Logger, LogLevel } from "../src/obs/log";
import type {
	LoadScoreResult,
	SaveScoreResult,
	Score,
	ScoreStore,
} from "../src/score/scoreStore";
import type { Bot, MatchOutcome, SessionIO } from "../src/types";

export {
	noRandom,
	sequenceRng,
	stateAt,
} from "../../../packages/engine/test/helpers";

// Setup draws on the (-5, 5) board: Captain (0,0), Alien (5,5).
export const PLACE_APART = [0.5, 0.5, 0.99, 0.99];
export const CAPTAIN_STARTS = [...PLACE_APART, 0.1];
export const ALIEN_STARTS = [...PLACE_APART, 0.9];

export const scriptedBot = (agent: Agent, moves: Move[]): Bot => {
	const queue = [...moves];
	return {
		agent,
		name: `Scripted${agent}`,
		chooseMove: () => {
			const move = queue.shift();
			if (!move) throw new Error(`${agent} script ran out of moves`);
			return move;
		},
	};
};

export const repeat = (move: Move, times: number): Move[] =>
	Array.from({ length: times }, () => move);

export type LogEntry = { level: LogLevel; message: string; fields?: LogFields };

export const captureLogger = (): { logger: Logger; entries: LogEntry[] } => {
	const entries: LogEntry[] = [];
	return {
		entries,
		logger: (level, message, fields) => {
			entries.push({ level, message, fields });
		},
	};
};

export class MemoryScoreStore implements ScoreStore {
	readonly location = "memory://score";
	readonly saved: Score[] = [];

	constructor(
		private loadResult: LoadScoreResult,
		private readonly saveResult: SaveScoreResult = { ok: true },
	) {}

	load(): LoadScoreResult {
		return this.loadResult;
	}

	save(score: Score): SaveScoreResult {
		this.saved.push({ ...score });
		if (this.saveResult.ok) {
			this.loadResult = { status: "ok", score: { ...score } };
		}
		return this.saveResult;
	}
}

export class FakeSessionIO implements SessionIO {
	readonly scores: Score[] = [];
	readonly results: MatchOutcome[] = [];
	readonly warnings: string[] = [];
	starts = 0;
	moves = 0;
	onBoardPrompt: () => void = () => {};

	constructor(
		private readonly boards: BoardConfig[],
		private readonly playAgain: boolean[],
	) {}

	showIntro(): void {}

	showScore(score: Score): void {
		this.scores.push({ ...score });
	}

	async promptBoardBounds(): Promise<BoardConfig> {
		this.onBoardPrompt();
		const board = this.boards.shift();
		if (!board) throw new Error("no board left");
		return board;
	}

	async announceResult(outcome: MatchOutcome): Promise<void> {
		this.results.push(outcome);
	}

	async promptPlayAgain(): Promise<boolean> {
		const answer = this.playAgain.shift();
		if (answer === undefined) throw new Error("no answer left");
		return answer;
	}

	warn(message: string): void {
		this.warnings.push(message);
	}

	showStart(): void {
		this.starts += 1;
	}

	showMove(): void {
		this.moves += 1;
	}
}
