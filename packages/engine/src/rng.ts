/** Random source in [0, 1). Every random decision goes through one. */
export type Rng = () => number;

export function mulberry32(seed: number): Rng {
	let t = seed >>> 0;
	return function () {
		t += 0x6d2b79f5;
		let x = t;
		x = Math.imul(x ^ (x >>> 15), x | 1);
		x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
		return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
	};
}

export function pickOne<T>(arr: readonly T[], rng: Rng): T {
	if (arr.length === 0) throw new Error("pickOne called with empty array");
	const idx = Math.floor(rng() * arr.length);
	const item = arr[Math.min(idx, arr.length - 1)];
	if (item === undefined) throw new Error("pickOne index out of range");
	return item;
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(min: number, max: number, rng: Rng): number {
	if (max < min) {
		throw new Error(`randomInt called with max ${max} < min ${min}`);
	}
	const span = max - min + 1;
	return min + Math.min(Math.floor(rng() * span), span - 1);
}

/** Seed drawn from Math.random, for runs without an explicit --seed. */
export function randomSeed(): number {
	return Math.floor(Math.random() * 4294967296) >>> 0;
}
