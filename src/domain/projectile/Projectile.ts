/**
 * Modèle métier de l'obus (logique domaine, pas de rendu).
 *
 * @module domain/projectile/Projectile
 */

import { Position } from '../kinematics/Position';
import { Velocity } from '../kinematics/Velocity';
import type { Angle } from '../kinematics/Angle';
import {
    createSample,
    type AccelerationBreakdown,
    type FlightStatistics,
    type PositionVelocityTime,
    type ProjectileProperties,
} from '../../core/types/PhysicsState';
import { InvalidTimeStepError, requireNonNegative, requirePositive } from '../../core/errors';
import { Trajectory, type ReadonlyTrajectory } from './Trajectory';
import type { IIntegrator } from '../physics/integrators/Integrator';
import { KinematicIntegrator } from '../physics/integrators/KinematicIntegrator';
import { GravityForceCalculator } from '../physics/forces/GravityForce';
import { DragForceCalculator } from '../physics/forces/DragForce';
import { ForceManager, type DragForceResult } from '../physics/forces/ForceCalculator';

/** Masse de l'obus M795 (kg) */
export const DEFAULT_PROJECTILE_MASS = 46.7;

/** Rayon de l'obus M795, calibre 155 mm (m) */
export const DEFAULT_PROJECTILE_RADIUS = 0.077545;

/**
 * Dépendances injectables du moteur de l'obus.
 */
export interface ProjectileDependencies {
    integrator?: IIntegrator;
    /** Causes d'accélération ; par défaut gravité puis traînée */
    forceManager?: ForceManager;
}

/**
 * Gestionnaire par défaut : gravité puis traînée.
 */
export function createDefaultForceManager(): ForceManager {
    const manager = new ForceManager();
    manager.addCalculator(new GravityForceCalculator());
    manager.addCalculator(new DragForceCalculator());
    return manager;
}

/**
 * Obus d'artillerie et sa machine à états cinétique.
 *
 * États :
 * - Repos : construit ou réinitialisé, trajectoire vide, inactif
 * - En vol : actif, au moins un échantillon
 *
 * Repos → En vol par fire() ; En vol → Repos à l'impact (y < 0) ou par reset().
 */
export class Projectile {
    private mass: number;
    private radius: number;
    private active = false;

    private readonly trajectory = new Trajectory();
    private readonly integrator: IIntegrator;
    private readonly forceManager: ForceManager;
    private readonly dragDiagnostics = new DragForceCalculator();

    // Cache de la dernière décomposition (pour debug/logging)
    private lastAccelerations: AccelerationBreakdown | null = null;

    constructor(properties?: Partial<ProjectileProperties>, dependencies?: ProjectileDependencies) {
        this.mass = requirePositive('mass', properties?.mass ?? DEFAULT_PROJECTILE_MASS);
        this.radius = requirePositive('radius', properties?.radius ?? DEFAULT_PROJECTILE_RADIUS);

        this.integrator = dependencies?.integrator ?? new KinematicIntegrator();
        this.forceManager = dependencies?.forceManager ?? createDefaultForceManager();
    }

    /**
     * Lance l'obus. Toute trajectoire précédente est abandonnée.
     *
     * @param position - Position de départ (m)
     * @param angle - Direction du tir (0 = vertical)
     * @param muzzleVelocity - Vitesse initiale (m/s), ≥ 0
     * @param time - Horodatage du départ (s), ≥ 0
     */
    fire(position: Position, angle: Angle, muzzleVelocity: number, time: number): void {
        requireNonNegative('muzzleVelocity', muzzleVelocity);
        if (Number.isNaN(time) || time < 0) {
            throw new InvalidTimeStepError(`Horodatage de tir négatif : ${time} s`, time);
        }

        this.trajectory.clear();
        this.lastAccelerations = null;
        this.trajectory.append(createSample(position, Velocity.fromAngle(angle, muzzleVelocity), time));
        this.active = true;
    }

    /**
     * Avance l'obus jusqu'à `simulationTime`.
     *
     * Sans effet (retourne false) si l'obus est au repos ou si `simulationTime`
     * n'est pas strictement postérieur au dernier échantillon.
     *
     * @returns true si un échantillon a été ajouté
     */
    advance(simulationTime: number): boolean {
        const current = this.trajectory.last();
        if (!this.active || !current) {
            return false;
        }

        if (!(simulationTime > current.timestamp)) {
            return false;
        }

        const accelerations = this.calculateAccelerations(current);
        const next = this.integrator.integrate(current, accelerations.total, simulationTime);

        this.trajectory.append(next);
        this.lastAccelerations = accelerations;

        // Impact : passage sous le plan de référence
        if (next.position.y < 0) {
            this.active = false;
        }

        return true;
    }

    /**
     * Retour aux caractéristiques M795, trajectoire vidée, inactif.
     */
    reset(): void {
        this.mass = DEFAULT_PROJECTILE_MASS;
        this.radius = DEFAULT_PROJECTILE_RADIUS;
        this.active = false;
        this.lastAccelerations = null;
        this.trajectory.clear();
    }

    /**
     * Gravité + traînée, évaluées au début du pas.
     */
    private calculateAccelerations(sample: PositionVelocityTime): AccelerationBreakdown {
        return this.forceManager.calculateBreakdown(sample, this.getProperties());
    }

    // ========================================================================
    // ACCESSEURS
    // ========================================================================

    isActive(): boolean {
        return this.active;
    }

    isFlying(): boolean {
        return this.active && !this.trajectory.isEmpty();
    }

    /**
     * Trajectoire en lecture seule ; seul l'obus la modifie.
     */
    getTrajectory(): ReadonlyTrajectory {
        return this.trajectory.asReadonly();
    }

    getSamples(): readonly PositionVelocityTime[] {
        return this.trajectory.toArray();
    }

    getPosition(): Position {
        return this.trajectory.last()?.position ?? Position.origin();
    }

    getVelocity(): Velocity {
        return this.trajectory.last()?.velocity ?? Velocity.zero();
    }

    /** Altitude courante, plancher à 0 */
    getAltitude(): number {
        const last = this.trajectory.last();
        return last ? Math.max(0, last.position.y) : 0;
    }

    getSpeed(): number {
        return this.trajectory.last()?.velocity.speed ?? 0;
    }

    getFlightTime(): number {
        return this.trajectory.duration();
    }

    getMaxAltitude(): number {
        return this.trajectory.maxAltitude();
    }

    getTotalDistance(): number {
        return this.trajectory.horizontalDistance();
    }

    getStatistics(): FlightStatistics {
        return {
            maxAltitude: this.getMaxAltitude(),
            flightTime: this.getFlightTime(),
            totalDistance: this.getTotalDistance(),
            currentSpeed: this.getSpeed(),
            sampleCount: this.trajectory.length,
        };
    }

    getForceManager(): ForceManager {
        return this.forceManager;
    }

    getLastAccelerations(): AccelerationBreakdown | null {
        return this.lastAccelerations;
    }

    /**
     * Diagnostic de traînée sur l'échantillon courant (null si trajectoire vide).
     */
    inspectDrag(): DragForceResult | null {
        const last = this.trajectory.last();
        return last ? this.dragDiagnostics.calculateDetailed(last, this.getProperties()) : null;
    }

    getProperties(): ProjectileProperties {
        return { mass: this.mass, radius: this.radius };
    }

    getMass(): number {
        return this.mass;
    }

    getRadius(): number {
        return this.radius;
    }

    setMass(mass: number): void {
        this.mass = requirePositive('mass', mass);
    }

    setRadius(radius: number): void {
        this.radius = requirePositive('radius', radius);
    }
}

/**
 * Fabrique d'obus.
 */
export class ProjectileFactory {
    /**
     * Obus M795 standard.
     */
    static createM795(dependencies?: ProjectileDependencies): Projectile {
        return new Projectile(undefined, dependencies);
    }

    static createCustom(properties: ProjectileProperties, dependencies?: ProjectileDependencies): Projectile {
        return new Projectile(properties, dependencies);
    }
}
