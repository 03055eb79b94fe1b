import { createBoardConfig, mulberry32 } from "@standoff/engine";
import { describe, expect, test } from "vitest";
import { makeAlienBot } from "../src/bots/alienBot";
import { makeRandomCaptainBot } from "../src/bots/captainBots";
import { playMatch, replayMatch } from "../src/match";
import {
	ALIEN_STARTS,
	CAPTAIN_STARTS,
	captureLogger,
	FakeSessionIO,
	repeat,
	scriptedBot,
	sequenceRng,
} from "./helpers";

const board = createBoardConfig(-5, 5);

describe("playMatch", () => {
	test("the Captain closes the x axis on the fifth cycle", async () => {
		const result = await playMatch({
			board,
			captain: scriptedBot("Captain", repeat("Right", 5)),
			alien: scriptedBot("Alien", repeat("Still", 4)),
			rng: sequenceRng(CAPTAIN_STARTS),
		});

		expect(result).toEqual({
			reason: "terminal",
			winner: "Captain",
			axis: "x",
			starter: "Captain",
			cycles: 5,
			positions: { Captain: { x: 5, y: 0 }, Alien: { x: 5, y: 5 } },
			log: undefined,
		});
	});

	test("the Alien moves first and wins on y when it starts", async () => {
		const result = await playMatch({
			board,
			captain: scriptedBot("Captain", repeat("Still", 4)),
			alien: scriptedBot("Alien", repeat("Down", 5)),
			rng: sequenceRng(ALIEN_STARTS),
		});

		expect(result.winner).toBe("Alien");
		expect(result.axis).toBe("y");
		expect(result.starter).toBe("Alien");
		expect(result.cycles).toBe(5);
		expect(result.positions.Alien).toEqual({ x: 5, y: 0 });
	});

	test("renders the start and every applied move", async () => {
		const io = new FakeSessionIO([], []);
		await playMatch({
			board,
			captain: scriptedBot("Captain", repeat("Right", 5)),
			alien: scriptedBot("Alien", repeat("Still", 4)),
			rng: sequenceRng(CAPTAIN_STARTS),
			renderer: io,
		});
		expect(io.starts).toBe(1);
		expect(io.moves).toBe(9);
	});

	test("logs the starter, each move and the winner", async () => {
		const { logger, entries } = captureLogger();
		await playMatch({
			board,
			captain: scriptedBot("Captain", repeat("Right", 5)),
			alien: scriptedBot("Alien", repeat("Still", 4)),
			rng: sequenceRng(CAPTAIN_STARTS),
			logger,
		});

		const messages = entries.map((e) => e.message);
		expect(messages[0]).toBe("match_start");
		expect(entries[0]?.fields).toMatchObject({ starter: "Captain" });
		expect(messages.filter((m) => m === "move")).toHaveLength(9);
		expect(messages.slice(-2)).toEqual(["match_end", "winner"]);
		expect(entries.at(-1)?.fields).toEqual({
			winner: "Captain",
			axis: "x",
			cycles: 5,
		});
	});

	test("stops at the cycle cap without a winner", async () => {
		const result = await playMatch({
			board,
			captain: scriptedBot("Captain", repeat("Still", 3)),
			alien: scriptedBot("Alien", repeat("Still", 3)),
			rng: sequenceRng(CAPTAIN_STARTS),
			maxCycles: 3,
		});

		expect(result).toMatchObject({
			reason: "maxCycles",
			winner: null,
			axis: null,
			cycles: 3,
			positions: { Captain: { x: 0, y: 0 }, Alien: { x: 5, y: 5 } },
		});
	});

	test("bots must match their seats", async () => {
		await expect(
			playMatch({
				board,
				captain: scriptedBot("Alien", []),
				alien: scriptedBot("Alien", []),
				rng: sequenceRng(CAPTAIN_STARTS),
			}),
		).rejects.toThrow("playMatch requires a Captain bot and an Alien bot.");
	});

	test("a win is only reported once the agents share an axis", async () => {
		for (let seed = 1; seed <= 50; seed++) {
			const result = await playMatch({
				board,
				captain: makeRandomCaptainBot(),
				alien: makeAlienBot(),
				rng: mulberry32(seed),
				maxCycles: 2000,
				record: true,
			});
			if (result.reason !== "terminal") continue;

			const { Captain: c, Alien: a } = result.positions;
			expect(c.x === a.x || c.y === a.y).toBe(true);
			expect(result.winner).toBe(result.log?.moves.at(-1)?.agent);
		}
	});
});

describe("replayMatch", () => {
	const recorded = () =>
		playMatch({
			board,
			captain: scriptedBot("Captain", repeat("Right", 5)),
			alien: scriptedBot("Alien", repeat("Still", 4)),
			rng: sequenceRng(CAPTAIN_STARTS),
			record: true,
		});

	test("a recorded match replays to the same ending", async () => {
		const { log } = await recorded();
		if (!log) throw new Error("expected a match log");

		expect(log.moves).toHaveLength(9);
		expect(log.startPositions).toEqual({
			Captain: { x: 0, y: 0 },
			Alien: { x: 5, y: 5 },
		});
		expect(replayMatch(log)).toEqual({ ok: true });
	});

	test("a tampered winner is detected", async () => {
		const { log } = await recorded();
		if (!log) throw new Error("expected a match log");

		expect(replayMatch({ ...log, winner: "Alien" })).toEqual({
			ok: false,
			error: "Winner mismatch.",
		});
	});

	test("an out-of-order move is reported with its index", async () => {
		const { log } = await recorded();
		if (!log) throw new Error("expected a match log");

		const moves = [
			{ agent: "Alien" as const, move: "Up" as const },
			...log.moves,
		];
		expect(replayMatch({ ...log, moves })).toEqual({
			ok: false,
			mismatchAt: 0,
			error: "It is the Captain's turn.",
		});
	});
});
