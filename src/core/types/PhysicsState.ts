/**
 * Types pour représenter l'état physique d'un tir.
 *
 * @module core/types/PhysicsState
 */

import type { Position } from '../../domain/kinematics/Position';
import type { Velocity } from '../../domain/kinematics/Velocity';
import type { Angle } from '../../domain/kinematics/Angle';
import type { Acceleration } from '../../domain/kinematics/Acceleration';

/**
 * Instantané immuable d'un point de la trajectoire.
 */
export interface PositionVelocityTime {
    /** Position (m) */
    readonly position: Position;

    /** Vitesse (m/s) */
    readonly velocity: Velocity;

    /** Horodatage (s de simulation) */
    readonly timestamp: number;
}

/**
 * Caractéristiques physiques de l'obus.
 */
export interface ProjectileProperties {
    /** Masse (kg) */
    mass: number;

    /** Rayon (m) */
    radius: number;
}

/**
 * Décomposition de l'accélération appliquée sur un pas.
 */
export interface AccelerationBreakdown {
    /** Gravité, toujours verticale vers le bas (m/s²) */
    gravity: Acceleration;

    /** Traînée, opposée à la vitesse (m/s²) */
    drag: Acceleration;

    /** Somme (m/s²) */
    total: Acceleration;
}

/**
 * Paramètres de tir produits par l'obusier et consommés par Projectile.fire.
 */
export interface FiringSolution {
    position: Position;
    elevation: Angle;
    /** Vitesse initiale (m/s) */
    muzzleVelocity: number;
}

/**
 * Statistiques agrégées d'un vol.
 */
export interface FlightStatistics {
    /** Altitude maximale atteinte, plancher à 0 (m) */
    maxAltitude: number;

    /** Dernier horodatage - premier (s) */
    flightTime: number;

    /** |x_final - x_initial| (m) */
    totalDistance: number;

    /** Vitesse courante (m/s) */
    currentSpeed: number;

    /** Nombre d'échantillons */
    sampleCount: number;
}

/**
 * Fin de tir.
 */
export type ShotOutcome = 'ground' | 'timeout';

/**
 * Bilan d'un tir terminé.
 */
export interface ShotReport {
    /** Numéro du tir dans la partie (1 = premier) */
    shot: number;

    hit: boolean;
    outcome: ShotOutcome;

    /** Dernière position de l'obus (m) */
    impact: Position;
    target: Position;
    distanceToTarget: number;

    flightTime: number;
    maxAltitude: number;
    totalDistance: number;
}

/**
 * Crée un échantillon gelé.
 */
export function createSample(position: Position, velocity: Velocity, timestamp: number): PositionVelocityTime {
    return Object.freeze({ position, velocity, timestamp });
}
