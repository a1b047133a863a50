/**
 * Calculateur de traînée aérodynamique (Cd fonction du Mach).
 *
 * Chaîne de calcul :
 *   altitude (≥ 0) → densité, vitesse du son → Mach → Cd
 *   → F = ½·ρ·Cd·π·r²·v² → a = F / m → direction opposée à la vitesse
 *
 * @module domain/physics/forces/DragForce
 */

import { Acceleration } from '../../kinematics/Acceleration';
import type { PositionVelocityTime, ProjectileProperties } from '../../../core/types/PhysicsState';
import type { IDragForceCalculator, DragForceResult } from './ForceCalculator';
import {
    densityFromAltitude,
    speedSoundFromAltitude,
    machFromSpeed,
    dragFromMach,
} from '../atmosphere/AtmosphericModel';
import { forceFromDrag, accelerationFromForce } from '../Physics';

export class DragForceCalculator implements IDragForceCalculator {
    public readonly name = 'DragForce';

    calculate(sample: PositionVelocityTime, body: ProjectileProperties): Acceleration {
        return this.calculateDetailed(sample, body).acceleration;
    }

    calculateDetailed(sample: PositionVelocityTime, body: ProjectileProperties): DragForceResult {
        const altitude = Math.max(0, sample.position.y);
        const density = densityFromAltitude(altitude);
        const speedOfSound = speedSoundFromAltitude(altitude);
        const speed = sample.velocity.speed;

        // Vitesse nulle : pas de direction, pas de traînée
        if (speed === 0) {
            return {
                acceleration: Acceleration.zero(),
                altitude,
                density,
                speedOfSound,
                mach: 0,
                dragCoefficient: 0,
                force: 0,
            };
        }

        const mach = machFromSpeed(speed, altitude);
        const dragCoefficient = dragFromMach(mach);
        const force = forceFromDrag(density, dragCoefficient, body.radius, speed);
        const magnitude = accelerationFromForce(force, body.mass);

        const acceleration = new Acceleration(
            -magnitude * (sample.velocity.dx / speed),
            -magnitude * (sample.velocity.dy / speed),
        );

        return { acceleration, altitude, density, speedOfSound, mach, dragCoefficient, force };
    }
}
