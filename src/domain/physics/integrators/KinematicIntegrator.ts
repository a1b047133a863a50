/**
 * Intégrateur cinématique à accélération constante.
 *
 * @module domain/physics/integrators/KinematicIntegrator
 */

import { createSample, type PositionVelocityTime } from '../../../core/types/PhysicsState';
import type { Acceleration } from '../../kinematics/Acceleration';
import { requireTimeStep } from '../../../core/errors';
import type { IIntegrator } from './Integrator';

/**
 * Schéma du premier ordre, sans sous-pas :
 *   s' = s + v·Δt + ½·a·Δt²
 *   v' = v + a·Δt
 *
 * L'accélération est évaluée au début du pas et n'est pas réévaluée en cours de pas.
 * La précision dépend donc directement de Δt (référence : 0.5 s).
 */
export class KinematicIntegrator implements IIntegrator {
    public readonly name = 'KinematicIntegrator';

    integrate(sample: PositionVelocityTime, acceleration: Acceleration, timestamp: number): PositionVelocityTime {
        const deltaTime = requireTimeStep(timestamp - sample.timestamp);

        const position = sample.position.advance(sample.velocity, acceleration, deltaTime);
        const velocity = sample.velocity.accelerate(acceleration, deltaTime);

        return createSample(position, velocity, timestamp);
    }
}
