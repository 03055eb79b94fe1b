import type {
	Agent,
	Axis,
	BoardConfig,
	MatchState,
	Move,
	Position,
	Rng,
} from "@standoff/engine";
import type { Score } from "./score/scoreStore";

export type {
	Agent,
	Axis,
	BoardConfig,
	EngineEvent,
	MatchState,
	Move,
	Position,
	Rng,
} from "@standoff/engine";

export type MatchOutcome = {
	reason: "terminal" | "maxCycles";
	winner: Agent | null;
	axis: Axis | null;
	starter: Agent;
	cycles: number;
	positions: Record<Agent, Position>;
	log?: MatchLog;
};

export type RecordedMove = { agent: Agent; move: Move };

export type MatchLog = {
	board: BoardConfig;
	starter: Agent;
	startPositions: Record<Agent, Position>;
	moves: RecordedMove[];
	finalPositions: Record<Agent, Position>;
	winner: Agent | null;
};

export type Bot = {
	agent: Agent;
	name: string;
	chooseMove: (ctx: {
		state: MatchState;
		cycle: number;
		rng: Rng;
	}) => Promise<Move> | Move;
};

/** Purely observational: nothing it returns is consumed by the match. */
export interface Renderer {
	showStart(state: MatchState): void;
	showMove(agent: Agent, move: Move, state: MatchState): void;
}

export interface MovePrompter {
	promptMove(): Promise<Move>;
}

export interface SessionIO extends Renderer {
	showIntro(): void;
	showScore(score: Score): void;
	promptBoardBounds(): Promise<BoardConfig>;
	announceResult(outcome: MatchOutcome): Promise<void>;
	promptPlayAgain(): Promise<boolean>;
	warn(message: string): void;
}
