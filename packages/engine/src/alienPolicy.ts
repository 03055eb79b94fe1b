import {
	type Axis,
	type Distance,
	type MatchState,
	MOVES,
	type Move,
	oppositeMove,
	type Position,
} from "./index";
import { pickOne, type Rng } from "./rng";

// Alien decision policy: a tiered strategy picked fresh on every Alien
// half-turn from the current distances and the Captain's last move.

export const WIN_DISTANCE = 1;
export const LOSE_DISTANCE = 2;
/** Chance the Alien stays bold when the Captain is one step from winning. */
export const NOT_AFRAID_PROBABILITY = 0.2;

export type AlienTier =
	| "win_imminent"
	| "lose_imminent"
	| "aggressive_flee"
	| "default";

export type AlienMood = "afraid" | "not_afraid";

export type AlienTactic =
	| "close_in"
	| "mirror"
	| "chase"
	| "flee"
	| "freeze"
	| "random";

/** Everything the policy is allowed to look at. */
export type AlienView = {
	alien: Position;
	captain: Position;
	distance: Distance;
	startDistance: number;
	/** null until the Captain has moved at least once. */
	captainMove: Move | null;
};

export type AlienDecision = {
	tier: AlienTier;
	mood: AlienMood | null;
	tactic: AlienTactic;
	move: Move;
};

const NOT_AFRAID_TACTICS: readonly AlienTactic[] = [
	"mirror",
	"chase",
	"random",
];
const AFRAID_TACTICS: readonly AlienTactic[] = ["flee", "freeze"];
const AGGRESSIVE_FLEE_TACTICS: readonly AlienTactic[] = [
	"mirror",
	"chase",
	"flee",
];
const CHASE_AXES: readonly Axis[] = ["x", "y"];

export function alienViewOf(state: MatchState): AlienView {
	return {
		alien: { ...state.positions.Alien },
		captain: { ...state.positions.Captain },
		distance: { ...state.distance },
		startDistance: state.board.startDistance,
		captainMove: state.turns.captainMove,
	};
}

/**
 * First match wins: an axis one step from closing, an axis two steps from
 * closing, an axis inside the starting distance, otherwise the default tier.
 */
export function classifyTier(
	distance: Distance,
	startDistance: number,
): AlienTier {
	const distances = [distance.x, distance.y];
	if (distances.includes(WIN_DISTANCE)) return "win_imminent";
	if (distances.includes(LOSE_DISTANCE)) return "lose_imminent";
	if (distances.some((d) => d > LOSE_DISTANCE && d < startDistance)) {
		return "aggressive_flee";
	}
	return "default";
}

/** Step along `axis` that brings the Alien toward the Captain. */
export function pursueMove(
	axis: Axis,
	alien: Position,
	captain: Position,
): Move {
	if (axis === "y") return alien.y > captain.y ? "Down" : "Up";
	return alien.x > captain.x ? "Left" : "Right";
}

export function randomMove(rng: Rng): Move {
	return pickOne(MOVES, rng);
}

function closeInMove(view: AlienView): Move {
	if (view.distance.y === WIN_DISTANCE) {
		return pursueMove("y", view.alien, view.captain);
	}
	return pursueMove("x", view.alien, view.captain);
}

export function mirrorMove(captainMove: Move | null, rng: Rng): Move {
	if (captainMove === null || captainMove === "Still") return randomMove(rng);
	return oppositeMove(captainMove);
}

export function chaseMove(view: AlienView, rng: Rng): Move {
	const { x, y } = view.distance;
	const axis = x > y ? "x" : x < y ? "y" : pickOne(CHASE_AXES, rng);
	return pursueMove(axis, view.alien, view.captain);
}

export function fleeMove(captainMove: Move | null, rng: Rng): Move {
	if (captainMove === null || captainMove === "Still") return randomMove(rng);
	return captainMove;
}

function runTactic(tactic: AlienTactic, view: AlienView, rng: Rng): Move {
	switch (tactic) {
		case "close_in":
			return closeInMove(view);
		case "mirror":
			return mirrorMove(view.captainMove, rng);
		case "chase":
			return chaseMove(view, rng);
		case "flee":
			return fleeMove(view.captainMove, rng);
		case "freeze":
			return "Still";
		case "random":
			return randomMove(rng);
	}
}

export function decideAlienMove(view: AlienView, rng: Rng): AlienDecision {
	const tier = classifyTier(view.distance, view.startDistance);
	switch (tier) {
		case "win_imminent":
			return { tier, mood: null, tactic: "close_in", move: closeInMove(view) };
		case "lose_imminent": {
			const mood: AlienMood =
				rng() < NOT_AFRAID_PROBABILITY ? "not_afraid" : "afraid";
			const tactic = pickOne(
				mood === "not_afraid" ? NOT_AFRAID_TACTICS : AFRAID_TACTICS,
				rng,
			);
			return { tier, mood, tactic, move: runTactic(tactic, view, rng) };
		}
		case "aggressive_flee": {
			const tactic = pickOne(AGGRESSIVE_FLEE_TACTICS, rng);
			return { tier, mood: null, tactic, move: runTactic(tactic, view, rng) };
		}
		case "default":
			return { tier, mood: null, tactic: "random", move: randomMove(rng) };
	}
}
