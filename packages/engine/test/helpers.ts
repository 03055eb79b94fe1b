import {
	type Agent,
	createBoardConfig,
	createMatchAt,
	type MatchState,
	type Position,
	type Rng,
} from "@standoff/engine";

/** Replays `values` in order and fails the test once they run out. */
export const sequenceRng = (values: number[]): Rng => {
	let i = 0;
	return () => {
		const value = values[i];
		if (value === undefined) {
			throw new Error(`sequenceRng exhausted after ${values.length} values`);
		}
		i += 1;
		return value;
	};
};

export const noRandom: Rng = () => {
	throw new Error("rng should not be called");
};

/** In-progress match on the (-5, 5) board with the given positions. */
export const stateAt = (
	captain: Position,
	alien: Position,
	starter: Agent = "Captain",
): MatchState =>
	createMatchAt(
		createBoardConfig(-5, 5),
		{ Captain: captain, Alien: alien },
		starter,
	);
