import {
	type Agent,
	applyMove,
	type BoardConfig,
	createMatch,
	createMatchAt,
	type EngineEvent,
	isTerminal,
	isTurnPossible,
	type MatchState,
	matchResult,
	type Position,
	type Rng,
	setupMatch,
	turnOrder,
} from "@standoff/engine";
import { type Logger, silentLogger } from "./obs/log";
import type {
	Bot,
	MatchLog,
	MatchOutcome,
	RecordedMove,
	Renderer,
} from "./types";

export async function playMatch(opts: {
	board: BoardConfig;
	captain: Bot;
	alien: Bot;
	rng: Rng;
	logger?: Logger;
	renderer?: Renderer;
	/** Unbounded when omitted; simulations set it. */
	maxCycles?: number;
	maxPlacementAttempts?: number;
	record?: boolean;
}): Promise<MatchOutcome> {
	if (opts.captain.agent !== "Captain" || opts.alien.agent !== "Alien") {
		throw new Error("playMatch requires a Captain bot and an Alien bot.");
	}
	const logger = opts.logger ?? silentLogger;
	const bots: Record<Agent, Bot> = {
		Captain: opts.captain,
		Alien: opts.alien,
	};

	const setup = setupMatch(createMatch(opts.board), opts.rng, {
		maxPlacementAttempts: opts.maxPlacementAttempts,
	});
	let state: MatchState = setup.state;
	logEngineEvents(logger, setup.engineEvents);
	opts.renderer?.showStart(state);

	const order = turnOrder(state);
	const [starter] = order;
	const startPositions = clonePositions(state.positions);
	const moves: RecordedMove[] = [];

	const logIfNeeded = (winner: Agent | null): MatchLog | undefined => {
		if (!opts.record) return undefined;
		return {
			board: opts.board,
			starter,
			startPositions,
			moves: [...moves],
			finalPositions: clonePositions(state.positions),
			winner,
		};
	};

	for (
		let cycle = 1;
		opts.maxCycles === undefined || cycle <= opts.maxCycles;
		cycle++
	) {
		for (const agent of order) {
			// A finished match never plays another half-turn.
			if (!isTurnPossible(state)) continue;

			const move = await bots[agent].chooseMove({
				state,
				cycle: state.cycle,
				rng: opts.rng,
			});
			const result = applyMove(state, agent, move);
			logEngineEvents(logger, result.engineEvents);
			if (!result.ok) {
				throw new Error(
					`Engine rejected ${agent} move ${move}: ${result.error}`,
				);
			}
			state = result.state;
			moves.push({ agent, move });
			opts.renderer?.showMove(agent, move, state);
		}

		const outcome = matchResult(state);
		if (outcome) {
			logger("info", "winner", {
				winner: outcome.winner,
				axis: outcome.axis,
				cycles: outcome.cycles,
			});
			return {
				reason: "terminal",
				winner: outcome.winner,
				axis: outcome.axis,
				starter: outcome.starter,
				cycles: outcome.cycles,
				positions: outcome.positions,
				log: logIfNeeded(outcome.winner),
			};
		}
	}

	logger("warn", "max_cycles_reached", { maxCycles: opts.maxCycles });
	return {
		reason: "maxCycles",
		winner: null,
		axis: null,
		starter,
		cycles: state.cycle - 1,
		positions: clonePositions(state.positions),
		log: logIfNeeded(null),
	};
}

/** Re-applies a recorded match and checks it ends where the log says. */
export function replayMatch(log: MatchLog): {
	ok: boolean;
	mismatchAt?: number;
	error?: string;
} {
	let state = createMatchAt(log.board, log.startPositions, log.starter);

	for (let i = 0; i < log.moves.length; i++) {
		const recorded = log.moves[i];
		if (!recorded) break;
		const result = applyMove(state, recorded.agent, recorded.move);
		if (!result.ok) {
			return { ok: false, mismatchAt: i, error: result.error };
		}
		state = result.state;
	}

	if (!samePositions(state.positions, log.finalPositions)) {
		return { ok: false, error: "Final positions mismatch." };
	}
	const terminal = isTerminal(state);
	const winner = terminal.ended ? terminal.winner : null;
	if (winner !== log.winner) {
		return { ok: false, error: "Winner mismatch." };
	}
	return { ok: true };
}

function logEngineEvents(logger: Logger, events: EngineEvent[]): void {
	for (const event of events) {
		const { type, ...fields } = event;
		logger(type === "reject" ? "warn" : "info", type, fields);
	}
}

function clonePositions(
	positions: Record<Agent, Position>,
): Record<Agent, Position> {
	return {
		Captain: { ...positions.Captain },
		Alien: { ...positions.Alien },
	};
}

function samePositions(
	a: Record<Agent, Position>,
	b: Record<Agent, Position>,
): boolean {
	return (
		a.Captain.x === b.Captain.x &&
		a.Captain.y === b.Captain.y &&
		a.Alien.x === b.Alien.x &&
		a.Alien.y === b.Alien.y
	);
}
