/**
 * Seedable randomness. Every random choice in the project goes through a
 * `RandomSource` so that a seed reproduces a whole game.
 */
export type RandomSource = () => number;

// mulberry32: 32-bit state, uniform in [0, 1)
export function mulberry32(seed: number): RandomSource {
    let t = seed >>> 0;
    return () => {
        t += 0x6D2B79F5;
        let x = t;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
}

export function createRandomSource(seed?: number): RandomSource {
    return mulberry32(seed ?? Date.now());
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | null {
    if (items.length === 0) return null;
    return items[Math.floor(random() * items.length)];
}

/**
 * Partial Fisher-Yates: `count` distinct items drawn uniformly from `items`.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: RandomSource): T[] {
    const pool = [...items];
    const picked = Math.min(count, pool.length);
    for (let i = 0; i < picked; i++) {
        const j = i + Math.floor(random() * (pool.length - i));
        [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, picked);
}
