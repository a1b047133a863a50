/**
 * Vitesse 2D (m/s), même repère que Position.
 *
 * @module domain/kinematics/Velocity
 */

import { Angle } from './Angle';
import type { Acceleration } from './Acceleration';
import { requireNonNegative, requirePositive, requireTimeStep } from '../../core/errors';
import { VECTOR_EPSILON, requireFinite } from './Position';

export class Velocity {
    constructor(
        /** Composante horizontale (m/s) */
        public readonly dx = 0,
        /** Composante verticale (m/s) */
        public readonly dy = 0,
    ) {
        requireFinite('dx', dx);
        requireFinite('dy', dy);
    }

    static zero(): Velocity {
        return new Velocity(0, 0);
    }

    /**
     * Forme polaire → cartésienne : dx = v·sin θ, dy = v·cos θ.
     */
    static fromAngle(angle: Angle, magnitude: number): Velocity {
        requireNonNegative('magnitude', magnitude);
        return new Velocity(magnitude * Math.sin(angle.radians), magnitude * Math.cos(angle.radians));
    }

    /** Norme (m/s) */
    get speed(): number {
        return Math.sqrt((this.dx * this.dx) + (this.dy * this.dy));
    }

    /** Direction du déplacement */
    get angle(): Angle {
        return Angle.fromComponents(this.dx, this.dy);
    }

    add(other: Velocity): Velocity {
        return new Velocity(this.dx + other.dx, this.dy + other.dy);
    }

    difference(other: Velocity): Velocity {
        return new Velocity(this.dx - other.dx, this.dy - other.dy);
    }

    scale(factor: number): Velocity {
        return new Velocity(this.dx * factor, this.dy * factor);
    }

    reverse(): Velocity {
        return new Velocity(-this.dx, -this.dy);
    }

    /**
     * v' = v + a·Δt
     */
    accelerate(acceleration: Acceleration, deltaTime: number): Velocity {
        requireTimeStep(deltaTime);
        return new Velocity(
            this.dx + acceleration.ddx * deltaTime,
            this.dy + acceleration.ddy * deltaTime,
        );
    }

    /**
     * Énergie cinétique ½·m·v² (J).
     */
    kineticEnergy(mass: number): number {
        requirePositive('mass', mass);
        return 0.5 * mass * this.speed * this.speed;
    }

    isZero(): boolean {
        return Math.abs(this.dx) < VECTOR_EPSILON && Math.abs(this.dy) < VECTOR_EPSILON;
    }

    equals(other: Velocity, epsilon = VECTOR_EPSILON): boolean {
        return Math.abs(this.dx - other.dx) < epsilon && Math.abs(this.dy - other.dy) < epsilon;
    }

    toString(): string {
        return `(${this.dx} m/s, ${this.dy} m/s)`;
    }
}
