/**
 * Accélération 2D (m/s²), même repère que Position.
 *
 * @module domain/kinematics/Acceleration
 */

import type { Angle } from './Angle';
import { requireNonNegative } from '../../core/errors';
import { VECTOR_EPSILON, requireFinite } from './Position';

export class Acceleration {
    constructor(
        /** Composante horizontale (m/s²) */
        public readonly ddx = 0,
        /** Composante verticale (m/s²) */
        public readonly ddy = 0,
    ) {
        requireFinite('ddx', ddx);
        requireFinite('ddy', ddy);
    }

    static zero(): Acceleration {
        return new Acceleration(0, 0);
    }

    /**
     * Construit une accélération à partir d'une direction et d'une norme.
     */
    static fromAngle(angle: Angle, magnitude: number): Acceleration {
        requireNonNegative('magnitude', magnitude);
        return new Acceleration(magnitude * angle.dx, magnitude * angle.dy);
    }

    get magnitude(): number {
        return Math.sqrt(this.ddx * this.ddx + this.ddy * this.ddy);
    }

    add(other: Acceleration): Acceleration {
        return new Acceleration(this.ddx + other.ddx, this.ddy + other.ddy);
    }

    difference(other: Acceleration): Acceleration {
        return new Acceleration(this.ddx - other.ddx, this.ddy - other.ddy);
    }

    scale(factor: number): Acceleration {
        return new Acceleration(this.ddx * factor, this.ddy * factor);
    }

    isZero(): boolean {
        return Math.abs(this.ddx) < VECTOR_EPSILON && Math.abs(this.ddy) < VECTOR_EPSILON;
    }

    equals(other: Acceleration, epsilon = VECTOR_EPSILON): boolean {
        return Math.abs(this.ddx - other.ddx) < epsilon && Math.abs(this.ddy - other.ddy) < epsilon;
    }

    toString(): string {
        return `(${this.ddx} m/s², ${this.ddy} m/s²)`;
    }
}
