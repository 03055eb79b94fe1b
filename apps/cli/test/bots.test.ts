import type { Position } from "@standoff/engine";
import { describe, expect, test } from "vitest";
import { makeAlienBot } from "../src/bots/alienBot";
import {
	makeChaserCaptainBot,
	makeTerminalCaptain,
} from "../src/bots/captainBots";
import { captureLogger, noRandom, stateAt } from "./helpers";

describe("makeAlienBot", () => {
	test("closes in when one step away and logs the decision", async () => {
		const { logger, entries } = captureLogger();
		const bot = makeAlienBot(logger);

		const move = await bot.chooseMove({
			state: stateAt({ x: 0, y: 0 }, { x: 3, y: 1 }),
			cycle: 4,
			rng: noRandom,
		});

		expect(move).toBe("Down");
		expect(entries).toEqual([
			{
				level: "info",
				message: "alien_decision",
				fields: {
					cycle: 4,
					tier: "win_imminent",
					mood: null,
					tactic: "close_in",
					move: "Down",
				},
			},
		]);
	});
});

describe("captain bots", () => {
	test("the chaser steps along the nearer axis", async () => {
		const bot = makeChaserCaptainBot();

		const toward = (alien: Position) =>
			bot.chooseMove({
				state: stateAt({ x: 0, y: 0 }, alien),
				cycle: 1,
				rng: noRandom,
			});

		expect(await toward({ x: 3, y: 4 })).toBe("Right");
		expect(await toward({ x: 4, y: -3 })).toBe("Down");
	});

	test("the terminal captain plays what the prompter returns", async () => {
		const bot = makeTerminalCaptain({ promptMove: async () => "Up" });

		expect(bot.agent).toBe("Captain");
		const move = await bot.chooseMove({
			state: stateAt({ x: 0, y: 0 }, { x: 3, y: 4 }),
			cycle: 1,
			rng: noRandom,
		});
		expect(move).toBe("Up");
	});
});
