import { alienViewOf, decideAlienMove } from "@standoff/engine";
import { type Logger, silentLogger } from "../obs/log";
import type { Bot } from "../types";

/** The computer-controlled Alien, driven by the tiered decision policy. */
export function makeAlienBot(logger: Logger = silentLogger): Bot {
	return {
		agent: "Alien",
		name: "AlienPolicy",
		chooseMove: ({ state, cycle, rng }) => {
			const decision = decideAlienMove(alienViewOf(state), rng);
			logger("info", "alien_decision", { cycle, ...decision });
			return decision.move;
		},
	};
}
