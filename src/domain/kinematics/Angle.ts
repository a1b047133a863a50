/**
 * Direction dans le plan de tir.
 *
 * Convention : 0 = vers le haut, croissant dans le sens horaire.
 * Composantes unitaires : dx = sin θ, dy = cos θ.
 *
 * @module domain/kinematics/Angle
 */

import * as THREE from 'three';
import { InvalidPhysicalParameterError } from '../../core/errors';

const TWO_PI = 2 * Math.PI;

/** Tolérance de comparaison (rad) */
export const ANGLE_EPSILON = 1e-6;

/**
 * Angle immuable, toujours normalisé dans [0, 2π).
 */
export class Angle {
    /** Valeur normalisée (rad) */
    public readonly radians: number;

    private constructor(radians: number) {
        if (!Number.isFinite(radians)) {
            throw new InvalidPhysicalParameterError('angle', radians, 'doit être fini');
        }
        this.radians = Angle.normalize(radians);
    }

    /**
     * Ramène n'importe quel réel dans [0, 2π).
     */
    static normalize(radians: number): number {
        const wrapped = THREE.MathUtils.euclideanModulo(radians, TWO_PI);
        // fmod peut rendre exactement 2π pour un négatif infime
        return wrapped >= TWO_PI ? 0 : wrapped;
    }

    static fromRadians(radians: number): Angle {
        return new Angle(radians);
    }

    static fromDegrees(degrees: number): Angle {
        return new Angle(THREE.MathUtils.degToRad(degrees));
    }

    /**
     * Angle d'un vecteur (dx, dy) selon la convention « 0 = haut ».
     */
    static fromComponents(dx: number, dy: number): Angle {
        return new Angle(Math.atan2(dx, dy));
    }

    static up(): Angle {
        return new Angle(0);
    }

    static right(): Angle {
        return new Angle(Math.PI / 2);
    }

    static down(): Angle {
        return new Angle(Math.PI);
    }

    static left(): Angle {
        return new Angle(Math.PI + Math.PI / 2);
    }

    get degrees(): number {
        return THREE.MathUtils.radToDeg(this.radians);
    }

    /** Composante horizontale unitaire */
    get dx(): number {
        return Math.sin(this.radians);
    }

    /** Composante verticale unitaire */
    get dy(): number {
        return Math.cos(this.radians);
    }

    isRight(): boolean {
        return this.radians > 0 && this.radians < Math.PI;
    }

    isLeft(): boolean {
        return this.radians > Math.PI && this.radians < TWO_PI;
    }

    /**
     * Ajoute un delta en radians.
     */
    add(deltaRadians: number): Angle {
        return new Angle(this.radians + deltaRadians);
    }

    addDegrees(deltaDegrees: number): Angle {
        return this.add(THREE.MathUtils.degToRad(deltaDegrees));
    }

    plus(other: Angle): Angle {
        return new Angle(this.radians + other.radians);
    }

    minus(other: Angle): Angle {
        return new Angle(this.radians - other.radians);
    }

    opposite(): Angle {
        return new Angle(this.radians + Math.PI);
    }

    /**
     * Rotation la plus courte vers la cible, dans [-π, π].
     * Positive = sens horaire.
     */
    shortestRotationTo(target: Angle): number {
        let diff = target.radians - this.radians;
        if (diff > Math.PI) diff -= TWO_PI;
        if (diff < -Math.PI) diff += TWO_PI;
        return diff;
    }

    isClockwiseTo(target: Angle): boolean {
        return this.shortestRotationTo(target) > 0;
    }

    isCounterClockwiseTo(target: Angle): boolean {
        return this.shortestRotationTo(target) < 0;
    }

    equals(other: Angle, epsilon = ANGLE_EPSILON): boolean {
        return Math.abs(this.radians - other.radians) < epsilon;
    }

    toString(): string {
        return `${this.degrees}°`;
    }
}
