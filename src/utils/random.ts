/**
 * Injectable random sources
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

/**
 * Seeded PRNG (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function resolveRandom(options?: { seed?: number; random?: RandomSource }): RandomSource {
    if (options?.random) return options.random;
    if (options?.seed !== undefined) return createSeededRandom(options.seed);
    return Math.random;
}

/**
 * Pick one element uniformly at random. The list must not be empty.
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
    const index = Math.min(items.length - 1, Math.floor(random() * items.length));
    return items[index];
}
