/** Returns a number in [0, 1), like Math.random. */
export type RandomSource = () => number;

export function uniform(random: RandomSource, min: number, max: number): number {
    return min + (max - min) * random();
}

// Inclusive on both ends
export function randomInt(random: RandomSource, min: number, max: number): number {
    return min + Math.floor(random() * (max - min + 1));
}
