import {
	AGENTS,
	type Agent,
	type BoardConfig,
	createBoardConfig,
	MAX_COORD_MAGNITUDE,
	MIN_BOARD_SIZE,
	MOVES,
	type Move,
	parseMove,
	type Position,
} from "@standoff/engine";
import type { Score } from "../score/scoreStore";

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

export const INTRO = `
                            ***Cosmic Standoff***

In a far away galaxy, you are the captain of an ultra-advanced spaceship,
your species last hope.

Looming nearby is an alien spaceship, ready for battle.
It's a high-stakes standoff: one wrong move could be your last.
Will your strategic skills lead to victory, or will the alien outmaneuver you?
Prepare yourself, Captain. The fate of your species is in your hands.


How to Play:
  - You and the alien take turns to move on the game board.
  - On your turn, you can move: Up, Down, Left, Right or stay Still.
  - The alien will also be able to choose between the same directions.
  - NOTE: Press Ctrl + C at any time to quit the game.

How to Win:
  - Your goal is to reach the alien's position, either in the X or Y coordinate.
  - The alien is also trying to reach you, so you must stay alert.
  - The first one to match the opponent's position in either axis, wins.`;

const STEP_MOVES = MOVES.filter((m) => m !== "Still").join(", ");

export const MOVE_PROMPT = [
	"",
	"Captain, where do you want to move?",
	`Type ${STEP_MOVES} to move, or Still to stay in place.`,
].join("\n");

export const BOARD_INSTRUCTIONS = [
	"",
	"How large should the board be at the start of the game?",
	"",
	`Provide the minimum and maximum coordinates, at least ${MIN_BOARD_SIZE} units apart.`,
	"",
	"Example:",
	"(-5, 5) spans 11 units.",
	"",
	"Note: A larger difference between the coordinates may increase game duration.",
	"",
].join("\n");

export function parseMoveInput(text: string): Parsed<Move> {
	const move = parseMove(text);
	if (move) return { ok: true, value: move };
	return {
		ok: false,
		error: `\n'${text.trim()}' is not a valid move, Captain.\nChoose between: ${STEP_MOVES}, or Still.`,
	};
}

export function parseCoordinate(text: string): Parsed<number> {
	const trimmed = text.trim();
	if (!/^[+-]?\d+$/.test(trimmed)) {
		return { ok: false, error: `'${trimmed}' is not a whole number.` };
	}
	const value = Number.parseInt(trimmed, 10);
	if (!inCoordinateRange(value)) {
		return { ok: false, error: `'${trimmed}' is too far out. ${RANGE_HINT}` };
	}
	return { ok: true, value };
}

const RANGE_HINT = `Coordinates must be between ${-MAX_COORD_MAGNITUDE} and ${MAX_COORD_MAGNITUDE}.`;

const inCoordinateRange = (value: number): boolean =>
	Math.abs(value) <= MAX_COORD_MAGNITUDE;

export function parseBoardBounds(
	minCoord: number,
	maxCoord: number,
): Parsed<BoardConfig> {
	if (!inCoordinateRange(minCoord) || !inCoordinateRange(maxCoord)) {
		return { ok: false, error: RANGE_HINT };
	}
	const boardSize = maxCoord - minCoord + 1;
	if (boardSize < MIN_BOARD_SIZE) {
		return {
			ok: false,
			error: `The board size must be at least ${MIN_BOARD_SIZE} units apart.\nYou chose a board of ${boardSize} units.\n`,
		};
	}
	return { ok: true, value: createBoardConfig(minCoord, maxCoord) };
}

export function parseYesNo(text: string): boolean | null {
	switch (text.trim().toLowerCase()) {
		case "y":
		case "yes":
			return true;
		case "n":
		case "no":
			return false;
		default:
			return null;
	}
}

export function formatPositions(positions: Record<Agent, Position>): string {
	const lines = [""];
	for (const agent of AGENTS) {
		lines.push(`-- ${agent} X: ${positions[agent].x}`);
		lines.push(`-- ${agent} Y: ${positions[agent].y}`);
	}
	return lines.join("\n");
}

export function formatScore(score: Score): string {
	return [
		"",
		"Current score:",
		"",
		...AGENTS.map((agent) => `-- ${agent}: ${score[agent]}`),
	].join("\n");
}
