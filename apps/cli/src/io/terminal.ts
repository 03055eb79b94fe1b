import { createInterface } from "node:readline/promises";
import type { Agent, BoardConfig, MatchState, Move } from "@standoff/engine";
import type { Score } from "../score/scoreStore";
import type { MatchOutcome, MovePrompter, SessionIO } from "../types";
import {
	BOARD_INSTRUCTIONS,
	formatPositions,
	formatScore,
	INTRO,
	MOVE_PROMPT,
	parseBoardBounds,
	parseCoordinate,
	parseMoveInput,
	parseYesNo,
} from "./prompts";

export type Ask = (query: string) => Promise<string>;
export type Write = (text: string) => void;

/**
 * Text front end: prompts re-ask until the answer is valid, everything else is
 * printed as-is.
 */
export class TerminalIO implements SessionIO, MovePrompter {
	constructor(
		private readonly ask: Ask,
		private readonly write: Write,
	) {}

	showIntro(): void {
		this.write(INTRO);
	}

	showScore(score: Score): void {
		this.write(formatScore(score));
	}

	async promptBoardBounds(): Promise<BoardConfig> {
		this.write(BOARD_INSTRUCTIONS);
		while (true) {
			const minCoord = await this.promptCoordinate("Minimum Coordinate: ");
			const maxCoord = await this.promptCoordinate("Maximum Coordinate: ");
			const bounds = parseBoardBounds(minCoord, maxCoord);
			if (bounds.ok) {
				this.write(`Your board size: ${bounds.value.boardSize} units.`);
				return bounds.value;
			}
			this.write(bounds.error);
		}
	}

	async promptMove(): Promise<Move> {
		this.write(MOVE_PROMPT);
		while (true) {
			const parsed = parseMoveInput(await this.ask(""));
			if (parsed.ok) return parsed.value;
			this.write(parsed.error);
		}
	}

	async promptPlayAgain(): Promise<boolean> {
		this.write("\nDo you want to play again? Type: (yes or no).");
		while (true) {
			const answer = parseYesNo(await this.ask(""));
			if (answer !== null) return answer;
			this.write("Please enter 'yes' or 'no'.");
		}
	}

	showStart(state: MatchState): void {
		this.write(
			"\nThe initial positions of your ship and the alien vessel, Captain.",
		);
		this.write("Prepare for battle!");
		this.write(formatPositions(state.positions));
		this.write(
			"\nThe stars have aligned, Captain.\nThe Universe rolls the dice to decide who takes the first move.",
		);
		if (state.turns.starter) {
			this.write(`The ${state.turns.starter} goes first.`);
		}
	}

	showMove(agent: Agent, move: Move, state: MatchState): void {
		if (agent === "Captain") {
			this.write(`\nCaptain, you moved ${move}.`);
			this.write(
				move === "Still"
					? "Your position did not change:"
					: "Your new position:",
			);
		} else if (move === "Still") {
			this.write(`\nAlien stayed '${move}'.`);
			this.write("The positions did not change, Captain:");
		} else {
			this.write(`\nThe Alien has moved '${move}'.`);
			this.write("Here are the updated positions, Captain:");
		}
		this.write(formatPositions(state.positions));
	}

	async announceResult(outcome: MatchOutcome): Promise<void> {
		switch (outcome.winner) {
			case "Captain":
				this.write("\nAlien at sight, Captain. Prepare to engage.");
				await this.ask("Press ENTER to shoot! ");
				this.write("\nBOOM! Direct hit, Captain!");
				this.write(
					"\nCongratulations Captain, you destroyed the alien and saved your species.",
				);
				this.write("The galaxy is safe once again.");
				return;
			case "Alien":
				this.write(
					"\nThe Alien has reached you, Captain. It's getting ready to shoot.",
				);
				this.write("\nYou have lost the battle, Captain.");
				this.write("The invasion continues. Our fate is uncertain.");
				return;
			case null:
				this.write("\nThe standoff drags on with no winner.");
				return;
		}
	}

	warn(message: string): void {
		this.write(`Warning: ${message}`);
	}

	fatal(message: string): void {
		this.write(`\n${message}`);
	}

	farewell(): void {
		this.write("\nExiting the game...");
	}

	private async promptCoordinate(label: string): Promise<number> {
		while (true) {
			const parsed = parseCoordinate(await this.ask(label));
			if (parsed.ok) return parsed.value;
			this.write(parsed.error);
		}
	}
}

export type InterruptSource = {
	once(event: "SIGINT", listener: () => void): unknown;
};

/**
 * Runs `handler` for the first SIGINT any source reports. readline claims
 * Ctrl+C typed at the prompt; a signal sent to the process arrives on
 * `process` instead.
 */
export function onFirstInterrupt(
	sources: InterruptSource[],
	handler: () => void,
): void {
	let fired = false;
	const fire = () => {
		if (fired) return;
		fired = true;
		handler();
	};
	for (const source of sources) source.once("SIGINT", fire);
}

/** TerminalIO over stdin/stdout. Ctrl+C is routed to `onInterrupt`. */
export function createReadlineTerminal(): {
	io: TerminalIO;
	onInterrupt: (handler: () => void) => void;
	close: () => void;
} {
	const rl = createInterface({ input: process.stdin, output: process.stdout });
	const io = new TerminalIO(
		(query) => rl.question(query),
		(text) => {
			process.stdout.write(`${text}\n`);
		},
	);
	return {
		io,
		onInterrupt: (handler) => onFirstInterrupt([rl, process], handler),
		close: () => rl.close(),
	};
}
