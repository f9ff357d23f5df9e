// ============================================================================
// Random — Seedable random source for reproducible workloads
// ============================================================================

/** Returns floats in [0, 1), like Math.random. */
export type RandomSource = () => number;

/** mulberry32: small 32-bit generator, identical sequence for identical seeds. */
export function mulberry32(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Uniform integer in [min, max] (inclusive). */
export function randomInt(rng: RandomSource, min: number, max: number): number {
    return min + Math.floor(rng() * (max - min + 1));
}
