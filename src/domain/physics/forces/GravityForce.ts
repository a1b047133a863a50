/**
 * Calculateur de gravité dépendant de l'altitude.
 *
 * @module domain/physics/forces/GravityForce
 */

import { Acceleration } from '../../kinematics/Acceleration';
import type { PositionVelocityTime } from '../../../core/types/PhysicsState';
import type { IGravityForceCalculator } from './ForceCalculator';
import { gravityFromAltitude } from '../atmosphere/AtmosphericModel';

/**
 * Gravité toujours verticale vers le bas, intensité lue dans la table d'altitude.
 */
export class GravityForceCalculator implements IGravityForceCalculator {
    public readonly name = 'GravityForce';

    gravityAt(altitude: number): number {
        return gravityFromAltitude(Math.max(0, altitude));
    }

    calculate(sample: PositionVelocityTime): Acceleration {
        return new Acceleration(0, -this.gravityAt(sample.position.y));
    }
}
