/**
 * Sources d'aléa injectables.
 *
 * @module core/random
 */

/**
 * Retourne un réel dans [0, 1).
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Générateur congruentiel linéaire, reproductible pour une graine donnée.
 */
export function createSeededRandom(seed: number): RandomSource {
    let currentSeed = Math.abs(Math.floor(seed)) & 0x7fffffff;
    return () => {
        currentSeed = (Math.imul(currentSeed, 1103515245) + 12345) & 0x7fffffff;
        return currentSeed / 0x80000000;
    };
}

/**
 * Réel uniforme dans [min, max).
 */
export function randomBetween(random: RandomSource, min: number, max: number): number {
    return min + random() * (max - min);
}
