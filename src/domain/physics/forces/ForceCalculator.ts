/**
 * Interfaces pour les calculateurs d'accélération.
 *
 * @module domain/physics/forces/ForceCalculator
 */

import { Acceleration } from '../../kinematics/Acceleration';
import type { AccelerationBreakdown, PositionVelocityTime, ProjectileProperties } from '../../../core/types/PhysicsState';

/**
 * Interface commune pour toutes les causes d'accélération.
 *
 * Pattern Strategy : permet d'ajouter de nouvelles causes sans modifier l'intégrateur.
 */
export interface IForceCalculator {
    /**
     * Calcule l'accélération à appliquer sur l'obus.
     *
     * @param sample - Échantillon courant (début du pas)
     * @param body - Masse et rayon de l'obus
     */
    calculate(sample: PositionVelocityTime, body: ProjectileProperties): Acceleration;

    /**
     * Nom du calculateur (pour debug/logging).
     */
    readonly name: string;
}

/**
 * Résultat détaillé d'un calcul de traînée (pour debug).
 */
export interface DragForceResult {
    /** Accélération de traînée (m/s²) */
    acceleration: Acceleration;

    /** Altitude utilisée, bornée à 0 (m) */
    altitude: number;

    /** Densité de l'air (kg/m³) */
    density: number;

    /** Vitesse du son (m/s) */
    speedOfSound: number;

    /** Nombre de Mach */
    mach: number;

    /** Coefficient de traînée */
    dragCoefficient: number;

    /** Force de traînée (N) */
    force: number;
}

/**
 * Interface étendue pour la traînée.
 */
export interface IDragForceCalculator extends IForceCalculator {
    calculateDetailed(sample: PositionVelocityTime, body: ProjectileProperties): DragForceResult;
}

/**
 * Interface pour la gravité.
 */
export interface IGravityForceCalculator extends IForceCalculator {
    /**
     * Intensité (m/s²) à une altitude.
     */
    gravityAt(altitude: number): number;
}

export function isGravityCalculator(calculator: IForceCalculator): calculator is IGravityForceCalculator {
    return 'gravityAt' in calculator && typeof calculator.gravityAt === 'function';
}

export function isDragCalculator(calculator: IForceCalculator): calculator is IDragForceCalculator {
    return 'calculateDetailed' in calculator && typeof calculator.calculateDetailed === 'function';
}

/**
 * Gestionnaire des accélérations combinées.
 *
 * Les causes sont indépendantes et s'additionnent dans l'ordre d'enregistrement.
 */
export class ForceManager {
    private calculators: IForceCalculator[] = [];

    /**
     * Ajoute un calculateur.
     */
    addCalculator(calculator: IForceCalculator): void {
        this.calculators.push(calculator);
    }

    /**
     * Retire un calculateur.
     */
    removeCalculator(calculator: IForceCalculator): void {
        const index = this.calculators.indexOf(calculator);
        if (index > -1) {
            this.calculators.splice(index, 1);
        }
    }

    /**
     * Accélération totale, évaluée une seule fois au début du pas.
     */
    calculateTotal(sample: PositionVelocityTime, body: ProjectileProperties): Acceleration {
        let total = Acceleration.zero();

        for (const calculator of this.calculators) {
            total = total.add(calculator.calculate(sample, body));
        }

        return total;
    }

    /**
     * Accélération de chaque calculateur, indexée par nom.
     */
    calculateEach(sample: PositionVelocityTime, body: ProjectileProperties): Map<string, Acceleration> {
        const result = new Map<string, Acceleration>();
        for (const calculator of this.calculators) {
            result.set(calculator.name, calculator.calculate(sample, body));
        }
        return result;
    }

    /**
     * Décomposition gravité / traînée / totale, chaque calculateur étant évalué une fois.
     *
     * Gravité et traînée sont reconnues par type, quel que soit leur nom ;
     * les autres causes ne comptent que dans le total.
     */
    calculateBreakdown(sample: PositionVelocityTime, body: ProjectileProperties): AccelerationBreakdown {
        let gravity = Acceleration.zero();
        let drag = Acceleration.zero();
        let total = Acceleration.zero();

        for (const calculator of this.calculators) {
            const acceleration = calculator.calculate(sample, body);
            total = total.add(acceleration);
            if (isGravityCalculator(calculator)) {
                gravity = gravity.add(acceleration);
            } else if (isDragCalculator(calculator)) {
                drag = drag.add(acceleration);
            }
        }

        return { gravity, drag, total };
    }

    /**
     * Retourne tous les calculateurs enregistrés.
     */
    getCalculators(): readonly IForceCalculator[] {
        return this.calculators;
    }

    /**
     * Nettoie tous les calculateurs.
     */
    clear(): void {
        this.calculators = [];
    }
}
