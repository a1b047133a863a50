/**
 * Interfaces pour les intégrateurs numériques.
 *
 * @module domain/physics/integrators/Integrator
 */

import type { PositionVelocityTime } from '../../../core/types/PhysicsState';
import type { Acceleration } from '../../kinematics/Acceleration';

/**
 * Interface pour les intégrateurs numériques.
 *
 * Un intégrateur calcule l'échantillon suivant à partir de l'échantillon courant
 * et d'une accélération supposée constante sur tout le pas.
 */
export interface IIntegrator {
    /**
     * @param sample - Échantillon au début du pas
     * @param acceleration - Accélération totale (m/s²)
     * @param timestamp - Horodatage cible (s), ≥ sample.timestamp
     * @returns Nouvel échantillon horodaté à `timestamp`
     */
    integrate(sample: PositionVelocityTime, acceleration: Acceleration, timestamp: number): PositionVelocityTime;

    /**
     * Nom de l'intégrateur (pour debug).
     */
    readonly name: string;
}
