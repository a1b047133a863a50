/**
 * Historique complet d'un tir.
 *
 * @module domain/projectile/Trajectory
 */

import type { PositionVelocityTime } from '../../core/types/PhysicsState';
import { InvalidTimeStepError } from '../../core/errors';

/**
 * Lecture seule d'une trajectoire : aucun moyen d'ajouter ou de retirer un échantillon.
 */
export interface ReadonlyTrajectory extends Iterable<PositionVelocityTime> {
    readonly length: number;
    isEmpty(): boolean;
    first(): PositionVelocityTime | undefined;
    last(): PositionVelocityTime | undefined;
    /** Copie des échantillons */
    toArray(): readonly PositionVelocityTime[];
    /** Durée couverte (0 si moins de deux échantillons) */
    duration(): number;
    /** Altitude maximale, plancher à 0 */
    maxAltitude(): number;
    /** Distance horizontale entre le premier et le dernier échantillon */
    horizontalDistance(): number;
}

function durationOf(samples: readonly PositionVelocityTime[]): number {
    const first = samples[0];
    const last = samples[samples.length - 1];
    if (!first || !last || samples.length < 2) return 0;
    return last.timestamp - first.timestamp;
}

function maxAltitudeOf(samples: readonly PositionVelocityTime[]): number {
    let max = 0;
    for (const sample of samples) {
        max = Math.max(max, sample.position.y);
    }
    return max;
}

function horizontalDistanceOf(samples: readonly PositionVelocityTime[]): number {
    const first = samples[0];
    const last = samples[samples.length - 1];
    if (!first || !last || samples.length < 2) return 0;
    return Math.abs(last.position.x - first.position.x);
}

/**
 * Vue sur un tableau vivant : suit les ajouts sans les permettre.
 */
function createView(samples: readonly PositionVelocityTime[]): ReadonlyTrajectory {
    return {
        get length() {
            return samples.length;
        },
        isEmpty: () => samples.length === 0,
        first: () => samples[0],
        last: () => samples[samples.length - 1],
        toArray: () => samples.slice(),
        [Symbol.iterator]: () => samples[Symbol.iterator](),
        duration: () => durationOf(samples),
        maxAltitude: () => maxAltitudeOf(samples),
        horizontalDistance: () => horizontalDistanceOf(samples),
    };
}

/**
 * Séquence ordonnée d'échantillons, en ajout seul.
 *
 * Invariant : horodatages strictement croissants. Seul clear() retire des éléments.
 */
export class Trajectory implements ReadonlyTrajectory {
    // Tableau jamais réaffecté : la vue en lecture seule le partage
    private readonly samples: PositionVelocityTime[] = [];
    private readonly view = createView(this.samples);

    get length(): number {
        return this.samples.length;
    }

    isEmpty(): boolean {
        return this.samples.length === 0;
    }

    first(): PositionVelocityTime | undefined {
        return this.samples[0];
    }

    last(): PositionVelocityTime | undefined {
        return this.samples[this.samples.length - 1];
    }

    append(sample: PositionVelocityTime): void {
        const last = this.last();
        if (last && sample.timestamp <= last.timestamp) {
            throw new InvalidTimeStepError(
                `Horodatage non croissant : ${sample.timestamp} s après ${last.timestamp} s`,
                sample.timestamp - last.timestamp,
            );
        }
        this.samples.push(sample);
    }

    clear(): void {
        this.samples.length = 0;
    }

    /**
     * Vue partagée, sans append ni clear.
     */
    asReadonly(): ReadonlyTrajectory {
        return this.view;
    }

    toArray(): readonly PositionVelocityTime[] {
        return this.samples.slice();
    }

    [Symbol.iterator](): Iterator<PositionVelocityTime> {
        return this.samples[Symbol.iterator]();
    }

    duration(): number {
        return durationOf(this.samples);
    }

    maxAltitude(): number {
        return maxAltitudeOf(this.samples);
    }

    horizontalDistance(): number {
        return horizontalDistanceOf(this.samples);
    }
}
