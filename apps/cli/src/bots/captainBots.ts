import { MOVES, type Move, pickOne } from "@standoff/engine";
import type { Bot, MovePrompter } from "../types";

/** Captain whose moves are typed in by the player. */
export function makeTerminalCaptain(prompter: MovePrompter): Bot {
	return {
		agent: "Captain",
		name: "Player",
		chooseMove: () => prompter.promptMove(),
	};
}

export function makeRandomCaptainBot(): Bot {
	return {
		agent: "Captain",
		name: "RandomCaptain",
		chooseMove: ({ rng }) => pickOne(MOVES, rng),
	};
}

/**
 * Steps toward the Alien along the axis that is closer to lining up, ignoring
 * the danger of ending one step away.
 */
export function makeChaserCaptainBot(): Bot {
	return {
		agent: "Captain",
		name: "ChaserCaptain",
		chooseMove: ({ state }): Move => {
			const { Captain: captain, Alien: alien } = state.positions;
			if (state.distance.x <= state.distance.y) {
				return captain.x < alien.x ? "Right" : "Left";
			}
			return captain.y < alien.y ? "Up" : "Down";
		},
	};
}
