/**
 * Modèle atmosphérique : altitude → gravité, densité, vitesse du son ; Mach → Cd.
 *
 * Fonctions pures sur des tables chargées une seule fois au démarrage.
 * Les appelants bornent l'altitude à ≥ 0 ; hors tables, la valeur est celle du nœud extrême.
 *
 * @module domain/physics/atmosphere/AtmosphericModel
 */

import { LookupTable } from './LookupTable';
import {
    GRAVITY_TABLE,
    DENSITY_TABLE,
    SPEED_OF_SOUND_TABLE,
    DRAG_COEFFICIENT_TABLE,
} from './StandardAtmosphere';
import { requirePositive } from '../../../core/errors';

export const gravityTable = LookupTable.fromPairs(GRAVITY_TABLE, 'gravité');
export const densityTable = LookupTable.fromPairs(DENSITY_TABLE, 'densité');
export const speedOfSoundTable = LookupTable.fromPairs(SPEED_OF_SOUND_TABLE, 'vitesse du son');
export const dragCoefficientTable = LookupTable.fromPairs(DRAG_COEFFICIENT_TABLE, 'traînée M795');

/**
 * Grandeurs atmosphériques à une altitude donnée.
 */
export interface AtmosphericConditions {
    /** Altitude (m) */
    altitude: number;

    /** Gravité (m/s²) */
    gravity: number;

    /** Densité de l'air (kg/m³) */
    density: number;

    /** Vitesse du son (m/s) */
    speedOfSound: number;
}

/** Gravité (m/s²), 9.807 au niveau de la mer */
export function gravityFromAltitude(altitude: number): number {
    return gravityTable.interpolate(altitude);
}

/** Densité de l'air (kg/m³) */
export function densityFromAltitude(altitude: number): number {
    return densityTable.interpolate(altitude);
}

/** Vitesse du son (m/s) */
export function speedSoundFromAltitude(altitude: number): number {
    return speedOfSoundTable.interpolate(altitude);
}

/** Coefficient de traînée (sans dimension) */
export function dragFromMach(machNumber: number): number {
    return dragCoefficientTable.interpolate(machNumber);
}

/**
 * Nombre de Mach d'une vitesse à une altitude donnée.
 */
export function machFromSpeed(speed: number, altitude: number): number {
    const speedSound = requirePositive('speedOfSound', speedSoundFromAltitude(altitude));
    return speed / speedSound;
}

/**
 * Échantillonne toutes les grandeurs d'un coup (logging, diagnostic).
 */
export function atmosphereAt(altitude: number): AtmosphericConditions {
    return {
        altitude,
        gravity: gravityFromAltitude(altitude),
        density: densityFromAltitude(altitude),
        speedOfSound: speedSoundFromAltitude(altitude),
    };
}
