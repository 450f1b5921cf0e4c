export function mulberry32(seed: number) {
	let t = seed >>> 0;
	return () => {
		t += 0x6d2b79f5;
		let x = t;
		x = Math.imul(x ^ (x >>> 15), x | 1);
		x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
		return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
	};
}

export function pickOne<T>(arr: readonly T[], rng: () => number): T {
	const idx = Math.min(Math.floor(rng() * arr.length), arr.length - 1);
	const item = arr[idx];
	if (arr.length === 0 || item === undefined) {
		throw new Error("pickOne called with empty array");
	}
	return item;
}
