import { type BoardConfig, mulberry32 } from "@standoff/engine";
import { playMatch } from "./match";
import { type Score, zeroScore } from "./score/scoreStore";
import type { Bot, MatchOutcome } from "./types";

export async function runTournament(opts: {
	games: number;
	seed: number;
	board: BoardConfig;
	maxCycles: number;
	captain: Bot;
	alien: Bot;
}) {
	const results: MatchOutcome[] = [];
	for (let i = 0; i < opts.games; i++) {
		const matchSeed = (opts.seed + i) >>> 0;
		const r = await playMatch({
			board: opts.board,
			captain: opts.captain,
			alien: opts.alien,
			rng: mulberry32(matchSeed),
			maxCycles: opts.maxCycles,
		});
		results.push(r);
	}

	const wins: Score = zeroScore();
	const winsByAxis = { x: 0, y: 0 };
	let unfinished = 0;
	let totalCycles = 0;

	for (const r of results) {
		totalCycles += r.cycles;
		if (r.winner == null) unfinished++;
		else wins[r.winner] += 1;
		if (r.axis) winsByAxis[r.axis] += 1;
	}

	const summary = {
		games: opts.games,
		seed: opts.seed,
		board: { minCoord: opts.board.minCoord, maxCoord: opts.board.maxCoord },
		captain: opts.captain.name,
		wins,
		winsByAxis,
		unfinished,
		avgCycles: Number((totalCycles / Math.max(1, opts.games)).toFixed(2)),
	};

	return { summary, results };
}
