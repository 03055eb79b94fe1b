import { z } from "zod";
import { pickOne, randomInt, type Rng } from "./rng";

// Cosmic Standoff: two agents on an integer grid; the first to line up with
// the other on either axis wins.

export * from "./alienPolicy";
export * from "./rng";

export const AGENTS = ["Captain", "Alien"] as const;
export type Agent = (typeof AGENTS)[number];

export const MOVES = ["Up", "Down", "Left", "Right", "Still"] as const;
export type Move = (typeof MOVES)[number];

export type Axis = "x" | "y";

export type Position = { x: number; y: number };

/** Per-axis absolute difference between the Captain and the Alien. */
export type Distance = { x: number; y: number };

export type BoardConfig = {
	minCoord: number;
	maxCoord: number;
	boardSize: number;
	/** Minimum separation on both axes when the agents are placed. */
	startDistance: number;
};

export type MatchPhase = "awaiting_start" | "in_progress" | "over";

export type TurnState = {
	starter: Agent | null;
	lastMover: Agent | null;
	captainMove: Move | null;
	alienMove: Move | null;
};

export type MatchState = {
	board: BoardConfig;
	phase: MatchPhase;
	positions: Record<Agent, Position>;
	distance: Distance;
	turns: TurnState;
	cycle: number;
	halfTurn: 0 | 1;
};

export type MatchResult = {
	winner: Agent;
	axis: Axis;
	starter: Agent;
	cycles: number;
	positions: Record<Agent, Position>;
};

export type TerminalState =
	| { ended: false }
	| { ended: true; winner: Agent; axis: Axis };

export type MoveRejectionReason = "not_started" | "terminal" | "out_of_turn";

export type EngineEvent =
	| {
			type: "match_start";
			starter: Agent;
			board: BoardConfig;
			positions: Record<Agent, Position>;
			distance: Distance;
	  }
	| {
			type: "move";
			cycle: number;
			agent: Agent;
			move: Move;
			from: Position;
			to: Position;
			distance: Distance;
	  }
	| {
			type: "match_end";
			cycle: number;
			winner: Agent;
			axis: Axis;
			positions: Record<Agent, Position>;
	  }
	| {
			type: "reject";
			cycle: number;
			agent: Agent;
			move: Move;
			reason: MoveRejectionReason;
	  };

export type ApplyMoveResult =
	| { ok: true; state: MatchState; engineEvents: EngineEvent[] }
	| {
			ok: false;
			state: MatchState;
			engineEvents: EngineEvent[];
			reason: MoveRejectionReason;
			error: string;
	  };

export type SetupOptions = {
	maxPlacementAttempts?: number;
};

export type SetupResult = {
	state: MatchState;
	engineEvents: EngineEvent[];
};

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MIN_BOARD_SIZE = 10;
export const DEFAULT_MAX_PLACEMENT_ATTEMPTS = 10_000;
/** Bounds stay far enough inside the safe-integer range for unit steps. */
export const MAX_COORD_MAGNITUDE = 1_000_000_000;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const MoveSchema = z.enum(MOVES);

function coordinateSchema(name: string) {
	const range = `${name} must be between ${-MAX_COORD_MAGNITUDE} and ${MAX_COORD_MAGNITUDE}`;
	return z
		.number()
		.int(`${name} must be an integer`)
		.min(-MAX_COORD_MAGNITUDE, range)
		.max(MAX_COORD_MAGNITUDE, range);
}

export const BoardBoundsSchema = z
	.object({
		minCoord: coordinateSchema("minCoord"),
		maxCoord: coordinateSchema("maxCoord"),
	})
	.refine((b) => b.maxCoord - b.minCoord + 1 >= MIN_BOARD_SIZE, {
		message: `The board must span at least ${MIN_BOARD_SIZE} units`,
		path: ["maxCoord"],
	});

// ---------------------------------------------------------------------------
// Board & grid helpers
// ---------------------------------------------------------------------------

export function startDistanceFor(boardSize: number): number {
	return Math.floor(boardSize / 2);
}

export function createBoardConfig(
	minCoord: number,
	maxCoord: number,
): BoardConfig {
	const result = BoardBoundsSchema.safeParse({ minCoord, maxCoord });
	if (!result.success) {
		const errors = result.error.errors.map((e) => e.message).join("; ");
		throw new Error(`Invalid board bounds: ${errors}`);
	}
	const boardSize = maxCoord - minCoord + 1;
	return {
		minCoord,
		maxCoord,
		boardSize,
		startDistance: startDistanceFor(boardSize),
	};
}

export function movePosition(position: Position, move: Move): Position {
	switch (move) {
		case "Up":
			return { x: position.x, y: position.y + 1 };
		case "Down":
			return { x: position.x, y: position.y - 1 };
		case "Left":
			return { x: position.x - 1, y: position.y };
		case "Right":
			return { x: position.x + 1, y: position.y };
		case "Still":
			return { x: position.x, y: position.y };
	}
}

export function oppositeMove(move: Move): Move {
	switch (move) {
		case "Up":
			return "Down";
		case "Down":
			return "Up";
		case "Left":
			return "Right";
		case "Right":
			return "Left";
		case "Still":
			return "Still";
	}
}

/** Case-insensitive lookup of a move label, e.g. " lEfT " -> "Left". */
export function parseMove(text: string): Move | null {
	const normalized = text.trim().toLowerCase();
	const label = normalized.charAt(0).toUpperCase() + normalized.slice(1);
	const result = MoveSchema.safeParse(label);
	return result.success ? result.data : null;
}

export function otherAgent(agent: Agent): Agent {
	return agent === "Captain" ? "Alien" : "Captain";
}

export function axisDistance(
	positions: Record<Agent, Position>,
	axis: Axis,
): number {
	return Math.abs(positions.Captain[axis] - positions.Alien[axis]);
}

export function computeDistance(positions: Record<Agent, Position>): Distance {
	return {
		x: axisDistance(positions, "x"),
		y: axisDistance(positions, "y"),
	};
}

export function placeRandomly(board: BoardConfig, rng: Rng): Position {
	return {
		x: randomInt(board.minCoord, board.maxCoord, rng),
		y: randomInt(board.minCoord, board.maxCoord, rng),
	};
}

export function isValidStartingDistance(
	distance: Distance,
	board: BoardConfig,
): boolean {
	return (
		distance.x >= board.startDistance && distance.y >= board.startDistance
	);
}

function clonePositions(
	positions: Record<Agent, Position>,
): Record<Agent, Position> {
	return {
		Captain: { ...positions.Captain },
		Alien: { ...positions.Alien },
	};
}

function winningAxis(distance: Distance): Axis {
	return distance.y === 0 ? "y" : "x";
}

// ---------------------------------------------------------------------------
// Public API: setup
// ---------------------------------------------------------------------------

export function createMatch(board: BoardConfig): MatchState {
	const origin: Position = { x: board.minCoord, y: board.minCoord };
	return {
		board,
		phase: "awaiting_start",
		positions: { Captain: { ...origin }, Alien: { ...origin } },
		distance: { x: 0, y: 0 },
		turns: {
			starter: null,
			lastMover: null,
			captainMove: null,
			alienMove: null,
		},
		cycle: 0,
		halfTurn: 0,
	};
}

/**
 * Places both agents and draws the starter, moving the match to
 * `in_progress`.
 *
 * The Captain lands anywhere on the board; the Alien is re-sampled until it is
 * at least `startDistance` away on both axes. A placement exists for every
 * valid board, so running out of attempts means the random source is broken.
 */
export function setupMatch(
	state: MatchState,
	rng: Rng,
	options: SetupOptions = {},
): SetupResult {
	if (state.phase !== "awaiting_start") {
		throw new Error("Match has already been set up.");
	}
	const maxAttempts =
		options.maxPlacementAttempts ?? DEFAULT_MAX_PLACEMENT_ATTEMPTS;
	if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
		throw new Error("maxPlacementAttempts must be a positive integer.");
	}

	const { board } = state;
	const captain = placeRandomly(board, rng);
	let alien: Position | null = null;
	for (let attempt = 0; attempt < maxAttempts; attempt++) {
		const candidate = placeRandomly(board, rng);
		const distance = computeDistance({ Captain: captain, Alien: candidate });
		if (isValidStartingDistance(distance, board)) {
			alien = candidate;
			break;
		}
	}
	if (!alien) {
		throw new Error(
			`Could not place the Alien ${board.startDistance} units away from the Captain after ${maxAttempts} attempts.`,
		);
	}

	const starter = pickOne(AGENTS, rng);
	const positions: Record<Agent, Position> = { Captain: captain, Alien: alien };
	const distance = computeDistance(positions);
	const next: MatchState = {
		board,
		phase: "in_progress",
		positions,
		distance,
		turns: {
			starter,
			lastMover: null,
			captainMove: null,
			alienMove: null,
		},
		cycle: 1,
		halfTurn: 0,
	};

	return {
		state: next,
		engineEvents: [
			{
				type: "match_start",
				starter,
				board,
				positions: clonePositions(positions),
				distance: { ...distance },
			},
		],
	};
}

export function createInitialState(
	board: BoardConfig,
	rng: Rng,
	options?: SetupOptions,
): MatchState {
	return setupMatch(createMatch(board), rng, options).state;
}

/**
 * In-progress match from known positions, skipping random placement. Used to
 * replay recorded matches and to stage scenarios.
 */
export function createMatchAt(
	board: BoardConfig,
	positions: Record<Agent, Position>,
	starter: Agent,
): MatchState {
	const placed = clonePositions(positions);
	return {
		...createMatch(board),
		phase: "in_progress",
		positions: placed,
		distance: computeDistance(placed),
		turns: {
			starter,
			lastMover: null,
			captainMove: null,
			alienMove: null,
		},
		cycle: 1,
		halfTurn: 0,
	};
}

// ---------------------------------------------------------------------------
// Public API: query functions
// ---------------------------------------------------------------------------

/** Half-turn order for the whole match: the starter, then the other agent. */
export function turnOrder(state: MatchState): [Agent, Agent] {
	const { starter } = state.turns;
	if (!starter) {
		throw new Error("Match has not started.");
	}
	return [starter, otherAgent(starter)];
}

export function currentPlayer(state: MatchState): Agent {
	const [first, second] = turnOrder(state);
	return state.halfTurn === 0 ? first : second;
}

/** A half-turn may only be played while both axes are still apart. */
export function isTurnPossible(state: MatchState): boolean {
	return (
		state.phase === "in_progress" &&
		state.distance.x > 0 &&
		state.distance.y > 0
	);
}

export function isTerminal(state: MatchState): TerminalState {
	if (state.phase === "awaiting_start") return { ended: false };
	if (state.distance.x > 0 && state.distance.y > 0) return { ended: false };
	const winner = state.turns.lastMover;
	if (!winner) {
		throw new Error("Distance reached zero before any agent moved.");
	}
	return { ended: true, winner, axis: winningAxis(state.distance) };
}

export function winner(state: MatchState): Agent | null {
	const terminal = isTerminal(state);
	return terminal.ended ? terminal.winner : null;
}

export function matchResult(state: MatchState): MatchResult | null {
	const terminal = isTerminal(state);
	if (!terminal.ended) return null;
	const [starter] = turnOrder(state);
	return {
		winner: terminal.winner,
		axis: terminal.axis,
		starter,
		cycles: state.cycle,
		positions: clonePositions(state.positions),
	};
}

// ---------------------------------------------------------------------------
// Public API: applyMove
// ---------------------------------------------------------------------------

export function validateTurn(
	state: MatchState,
	agent: Agent,
):
	| { ok: true }
	| { ok: false; reason: MoveRejectionReason; error: string } {
	if (state.phase === "awaiting_start") {
		return {
			ok: false,
			reason: "not_started",
			error: "Match has not started.",
		};
	}
	if (!isTurnPossible(state)) {
		return { ok: false, reason: "terminal", error: "Match already ended." };
	}
	const active = currentPlayer(state);
	if (agent !== active) {
		return {
			ok: false,
			reason: "out_of_turn",
			error: `It is the ${active}'s turn.`,
		};
	}
	return { ok: true };
}

/**
 * Moves `agent` one step, recomputes the distances from the new positions and
 * advances the half-turn. The match is over as soon as either distance reaches
 * zero; the agent that just moved is the winner.
 */
export function applyMove(
	state: MatchState,
	agent: Agent,
	move: Move,
): ApplyMoveResult {
	const validation = validateTurn(state, agent);
	if (!validation.ok) {
		return {
			ok: false,
			state,
			engineEvents: [
				{
					type: "reject",
					cycle: state.cycle,
					agent,
					move,
					reason: validation.reason,
				},
			],
			reason: validation.reason,
			error: validation.error,
		};
	}

	const from = state.positions[agent];
	const to = movePosition(from, move);
	const positions: Record<Agent, Position> = {
		...clonePositions(state.positions),
		[agent]: to,
	};
	const distance = computeDistance(positions);
	const turns: TurnState =
		agent === "Captain"
			? { ...state.turns, lastMover: agent, captainMove: move }
			: { ...state.turns, lastMover: agent, alienMove: move };
	const over = distance.x === 0 || distance.y === 0;
	const closesCycle = state.halfTurn === 1;

	const nextState: MatchState = {
		...state,
		phase: over ? "over" : "in_progress",
		positions,
		distance,
		turns,
		cycle: closesCycle && !over ? state.cycle + 1 : state.cycle,
		halfTurn: closesCycle ? 0 : 1,
	};

	const engineEvents: EngineEvent[] = [
		{
			type: "move",
			cycle: state.cycle,
			agent,
			move,
			from: { ...from },
			to: { ...to },
			distance: { ...distance },
		},
	];
	if (over) {
		engineEvents.push({
			type: "match_end",
			cycle: state.cycle,
			winner: agent,
			axis: winningAxis(distance),
			positions: clonePositions(positions),
		});
	}

	return { ok: true, state: nextState, engineEvents };
}
