/**
 * Pure helpers shared by the simulation systems.
 */

/**
 * Linear congruential generator. `hash` is called repeatedly on its own
 * output to produce the sequence, so a seed stored in State fully
 * determines every spawn.
 */
class RNG {
    private static m = 0x80000000;

    private static a = 1103515245;

    private static c = 12345;

    static hash = (seed: number) => (RNG.a * seed + RNG.c) % RNG.m;
    /** Maps a hash onto [0, 1], both ends reachable */
    static scale01 = (hash: number) => hash / (RNG.m - 1);
}

type RandomResult = Readonly<{ value: number; seed: number }>;

/**
 * Draw a value from the closed range [minValue, maxValue].
 *
 * @returns the value together with the seed to use for the next draw
 */
export const randomBetween = (
    currentSeed: number,
    minValue: number,
    maxValue: number,
): RandomResult => {
    const nextSeed = RNG.hash(currentSeed);
    const randomValue =
        RNG.scale01(nextSeed) * (maxValue - minValue) + minValue;
    return { value: randomValue, seed: nextSeed };
};

export const clamp = (
    inputValue: number,
    minBound: number,
    maxBound: number,
): number => Math.max(minBound, Math.min(maxBound, inputValue));

/** Frame deltas that are negative or not finite count as no time passing */
export const sanitizeDelta = (deltaSeconds: number): number =>
    Number.isFinite(deltaSeconds) && deltaSeconds > 0 ? deltaSeconds : 0;
