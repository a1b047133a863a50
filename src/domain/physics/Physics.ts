/**
 * Lois du mouvement et de la traînée.
 *
 * @module domain/physics/Physics
 */

import { requireNonNegative, requirePositive, requireTimeStep } from '../../core/errors';

/**
 * Aire frontale d'un disque : π·r²
 */
export function areaFromRadius(radius: number): number {
    requireNonNegative('radius', radius);
    return Math.PI * (radius * radius);
}

/**
 * Force de traînée : F = ½·ρ·Cd·π·r²·v²
 *
 * @param density - Densité de l'air (kg/m³)
 * @param dragCoefficient - Cd (sans dimension)
 * @param radius - Rayon de l'obus (m)
 * @param speed - Norme de la vitesse (m/s)
 * @returns Force (N)
 */
export function forceFromDrag(density: number, dragCoefficient: number, radius: number, speed: number): number {
    requireNonNegative('density', density);
    requireNonNegative('dragCoefficient', dragCoefficient);
    requireNonNegative('speed', speed);
    return 0.5 * density * dragCoefficient * areaFromRadius(radius) * (speed * speed);
}

/**
 * a = F / m
 */
export function accelerationFromForce(force: number, mass: number): number {
    requirePositive('mass', mass);
    return force / mass;
}

/**
 * v = a·t
 */
export function velocityFromAcceleration(acceleration: number, time: number): number {
    requireTimeStep(time);
    return acceleration * time;
}
