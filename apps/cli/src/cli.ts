import {
	createBoardConfig,
	mulberry32,
	randomSeed,
} from "@standoff/engine";
import minimist from "minimist";
import { makeAlienBot } from "./bots/alienBot";
import {
	makeChaserCaptainBot,
	makeRandomCaptainBot,
	makeTerminalCaptain,
} from "./bots/captainBots";
import { type CliConfig, cliConfigFromArgs, createCliConfig } from "./config";
import { createReadlineTerminal } from "./io/terminal";
import { createFileWriter, createLogger, type Logger } from "./obs/log";
import { createFileScoreStore, ScoreReadError } from "./score/scoreStore";
import { StandoffSession } from "./session";
import { runTournament } from "./tournament";

type Args = ReturnType<typeof minimist>;

function createCliLogger(config: CliConfig): Logger {
	return createLogger({
		write: createFileWriter(config.logPath),
		minLevel: config.logLevel,
	});
}

async function handlePlayCommand(config: CliConfig): Promise<void> {
	const logger = createCliLogger(config);
	const seed = config.seed ?? randomSeed();
	const terminal = createReadlineTerminal();
	const session = new StandoffSession({
		io: terminal.io,
		captain: makeTerminalCaptain(terminal.io),
		alien: makeAlienBot(logger),
		store: createFileScoreStore(config.scorePath),
		rng: mulberry32(seed),
		logger,
		board: config.bounds
			? createBoardConfig(config.bounds.minCoord, config.bounds.maxCoord)
			: undefined,
	});
	logger("debug", "config", { seed, scorePath: config.scorePath });

	terminal.onInterrupt(() => {
		terminal.io.farewell();
		session.interrupt();
		terminal.close();
		process.exit(0);
	});

	try {
		const summary = await session.run();
		logger("info", "session_summary", { ...summary });
		terminal.io.farewell();
	} catch (e) {
		if (!(e instanceof ScoreReadError)) throw e;
		terminal.io.fatal(
			"An error occurred while reading the score file.\nCheck the file permissions and restart the game.",
		);
		process.exitCode = 1;
	} finally {
		terminal.close();
	}
}

async function handleTourneyCommand(config: CliConfig): Promise<void> {
	const logger = createCliLogger(config);
	const seed = config.seed ?? 1;
	const bounds = config.bounds ?? { minCoord: -5, maxCoord: 5 };
	const { summary } = await runTournament({
		games: config.games,
		seed,
		board: createBoardConfig(bounds.minCoord, bounds.maxCoord),
		maxCycles: config.maxCycles,
		captain:
			config.captainBot === "chaser"
				? makeChaserCaptainBot()
				: makeRandomCaptainBot(),
		alien: makeAlienBot(),
	});
	logger("info", "tourney_summary", summary);

	console.log(JSON.stringify(summary, null, 2));
	console.log(
		`games=${summary.games} captain=${summary.wins.Captain} alien=${summary.wins.Alien} unfinished=${summary.unfinished} avgCycles=${summary.avgCycles}`,
	);
}

function printUsage(): void {
	console.error("Usage: standoff <command> [options]");
	console.error("");
	console.error("Commands:");
	console.error("  play      Play against the Alien in the terminal (default)");
	console.error("  tourney   Pit a Captain bot against the Alien and summarize");
	console.error("  help      Show this message");
	console.error("");
	console.error("Options:");
	console.error("  --seed N          Seed for the random source");
	console.error("  --min=N --max=N   Fixed board bounds (skips the prompt)");
	console.error("  --scorePath FILE  Score file (default: .standoff/score.json)");
	console.error("  --logPath FILE    Event log (default: .standoff/standoff.log)");
	console.error("  --logLevel LEVEL  debug|info|warn|error (default: info)");
	console.error("  --games N         tourney: matches to play (default: 200)");
	console.error("  --maxCycles N     tourney: cycle cap per match (default: 500)");
	console.error("  --captain BOT     tourney: random|chaser (default: random)");
}

async function main() {
	const argv: Args = minimist(process.argv.slice(2), {
		string: ["scorePath", "logPath", "logLevel", "captain"],
	});
	const cmd = argv._[0] ?? "play";

	switch (cmd) {
		case "play":
			await handlePlayCommand(createCliConfig(cliConfigFromArgs(argv)));
			return;
		case "tourney":
			await handleTourneyCommand(createCliConfig(cliConfigFromArgs(argv)));
			return;
		case "help":
			printUsage();
			return;
		default:
			printUsage();
			process.exit(1);
	}
}

main().catch((e) => {
	console.error(e);
	process.exit(1);
});
