/**
 * Position 2D en mètres.
 *
 * x = portée horizontale, y = altitude au-dessus du plan de référence (0 = niveau de tir).
 * La conversion en pixels n'appartient pas à la physique : voir ScreenMapping.
 *
 * @module domain/kinematics/Position
 */

import * as THREE from 'three';
import type { Velocity } from './Velocity';
import type { Acceleration } from './Acceleration';
import { InvalidPhysicalParameterError, requireTimeStep } from '../../core/errors';

/** Tolérance de comparaison des vecteurs (accumulation flottante sur de nombreux pas) */
export const VECTOR_EPSILON = 1e-10;

/**
 * Refuse NaN et ±Infinity dans une composante.
 */
export function requireFinite(component: string, value: number): void {
    if (!Number.isFinite(value)) {
        throw new InvalidPhysicalParameterError(component, value, 'doit être fini');
    }
}

export class Position {
    constructor(
        /** Portée horizontale (m) */
        public readonly x = 0,
        /** Altitude (m) */
        public readonly y = 0,
    ) {
        requireFinite('x', x);
        requireFinite('y', y);
    }

    static origin(): Position {
        return new Position(0, 0);
    }

    withX(x: number): Position {
        return new Position(x, this.y);
    }

    withY(y: number): Position {
        return new Position(this.x, y);
    }

    add(other: Position): Position {
        return new Position(this.x + other.x, this.y + other.y);
    }

    difference(other: Position): Position {
        return new Position(this.x - other.x, this.y - other.y);
    }

    scale(factor: number): Position {
        return new Position(this.x * factor, this.y * factor);
    }

    distanceTo(other: Position): number {
        const dx = other.x - this.x;
        const dy = other.y - this.y;
        return Math.sqrt(dx * dx + dy * dy);
    }

    isOrigin(): boolean {
        return Math.abs(this.x) < VECTOR_EPSILON && Math.abs(this.y) < VECTOR_EPSILON;
    }

    /**
     * s' = s + v·Δt + ½·a·Δt²
     */
    advance(velocity: Velocity, acceleration: Acceleration, deltaTime: number): Position {
        requireTimeStep(deltaTime);
        return new Position(
            this.x + velocity.dx * deltaTime + 0.5 * acceleration.ddx * deltaTime * deltaTime,
            this.y + velocity.dy * deltaTime + 0.5 * acceleration.ddy * deltaTime * deltaTime,
        );
    }

    equals(other: Position, epsilon = VECTOR_EPSILON): boolean {
        return Math.abs(this.x - other.x) < epsilon && Math.abs(this.y - other.y) < epsilon;
    }

    toVector2(): THREE.Vector2 {
        return new THREE.Vector2(this.x, this.y);
    }

    toString(): string {
        return `(${this.x}m, ${this.y}m)`;
    }
}
