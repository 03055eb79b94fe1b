import {
	mkdirSync,
	mkdtempSync,
	readFileSync,
	rmSync,
	writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
	createFileScoreStore,
	recordWin,
	serializeScore,
	zeroScore,
} from "../src/score/scoreStore";

let dir: string;

beforeEach(() => {
	dir = mkdtempSync(path.join(tmpdir(), "standoff-score-"));
});

afterEach(() => {
	rmSync(dir, { recursive: true, force: true });
});

describe("score helpers", () => {
	test("recordWin adds one to the winner only", () => {
		const score = { Captain: 2, Alien: 1 };
		expect(recordWin(score, "Alien")).toEqual({ Captain: 2, Alien: 2 });
		expect(score).toEqual({ Captain: 2, Alien: 1 });
	});

	test("serializeScore writes a fixed key order", () => {
		expect(serializeScore({ Alien: 4, Captain: 7 })).toBe(
			'{"Captain":7,"Alien":4}',
		);
		expect(serializeScore(zeroScore())).toBe('{"Captain":0,"Alien":0}');
	});
});

describe("createFileScoreStore", () => {
	test("a missing file is reported as not_found", () => {
		const store = createFileScoreStore(path.join(dir, "score.json"));
		expect(store.load()).toEqual({ status: "not_found" });
	});

	test("a Captain win is written back on top of the stored score", () => {
		const file = path.join(dir, "score.json");
		writeFileSync(file, '{"Captain": 2, "Alien": 1}');
		const store = createFileScoreStore(file);

		const loaded = store.load();
		if (loaded.status !== "ok") throw new Error(`unexpected ${loaded.status}`);
		expect(store.save(recordWin(loaded.score, "Captain"))).toEqual({
			ok: true,
		});

		expect(readFileSync(file, "utf-8")).toBe('{"Captain":3,"Alien":1}');
		expect(store.load()).toEqual({
			status: "ok",
			score: { Captain: 3, Alien: 1 },
		});
	});

	test("the parent directory is created on first save", () => {
		const file = path.join(dir, "nested", "deeper", "score.json");
		const store = createFileScoreStore(file);

		expect(store.save({ Captain: 0, Alien: 5 })).toEqual({ ok: true });
		expect(readFileSync(file, "utf-8")).toBe('{"Captain":0,"Alien":5}');
	});

	test("malformed JSON is a decode error", () => {
		const file = path.join(dir, "score.json");
		writeFileSync(file, "Captain=2");
		expect(createFileScoreStore(file).load()).toMatchObject({
			status: "decode_error",
		});
	});

	test("a missing key is a decode error naming the key", () => {
		const file = path.join(dir, "score.json");
		writeFileSync(file, '{"Captain": 1}');
		expect(createFileScoreStore(file).load()).toEqual({
			status: "decode_error",
			error: "Alien: Required",
		});
	});

	test("negative or fractional counts are decode errors", () => {
		const file = path.join(dir, "score.json");
		const store = createFileScoreStore(file);

		writeFileSync(file, '{"Captain": -1, "Alien": 0}');
		expect(store.load()).toMatchObject({ status: "decode_error" });

		writeFileSync(file, '{"Captain": 1.5, "Alien": 0}');
		expect(store.load()).toMatchObject({ status: "decode_error" });
	});

	test("a path that cannot be read is an io error", () => {
		const asDirectory = path.join(dir, "score.json");
		mkdirSync(asDirectory);
		expect(createFileScoreStore(asDirectory).load()).toMatchObject({
			status: "io_error",
		});
	});

	test("a failed write is returned, not thrown", () => {
		const blocker = path.join(dir, "blocker");
		writeFileSync(blocker, "");
		const store = createFileScoreStore(path.join(blocker, "score.json"));

		expect(store.save({ Captain: 1, Alien: 1 })).toMatchObject({ ok: false });
	});
});
