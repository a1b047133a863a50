/**
 * Orchestrateur du tir, sans affichage.
 *
 * Boucle de jeu : commandes → tir → ticks fixes → impact → score.
 *
 * @module core/Simulation
 */

import { mergeConfig, type PartialSimulationConfig, type SimulationConfig } from './SimulationConfig';
import { EventBus, SimulationEventType, type TerrainLayout } from './types/Events';
import type { ShotOutcome, ShotReport } from './types/PhysicsState';
import { InvalidTimeStepError } from './errors';
import { defaultRandom, type RandomSource } from './random';

// Domain
import { Position } from '../domain/kinematics/Position';
import { Projectile } from '../domain/projectile/Projectile';
import { Howitzer } from '../domain/howitzer/Howitzer';
import { Ground, type Terrain } from '../domain/ground/Ground';

// Application
import { Logger, type FlightSnapshot } from '../application/logging/Logger';

/**
 * État des commandes pour un tick.
 */
export interface ControlInput {
    left?: boolean;
    right?: boolean;
    up?: boolean;
    down?: boolean;
    fire?: boolean;
}

export interface SimulationOptions {
    config?: PartialSimulationConfig;
    /** Terrain de remplacement ; par défaut un Ground généré avec `random` */
    terrain?: Terrain;
    random?: RandomSource;
    eventBus?: EventBus;
    logger?: Logger;
}

/**
 * Simulation d'artillerie.
 *
 * Un seul obus en vol à la fois. L'obus n'avance que pendant un tir ;
 * le tir se termine au contact du relief ou au plafond de durée de vol.
 */
export class Simulation {
    // Configuration
    private readonly config: SimulationConfig;

    // Core
    private readonly eventBus: EventBus;
    private readonly logger: Logger;
    private readonly random: RandomSource;

    // Domain
    private readonly terrain: Terrain;
    private readonly howitzer: Howitzer;
    private readonly projectile: Projectile;

    // État
    private time = 0;
    private firing = false;
    private hit = false;
    private score = 0;
    private shotsAttempted = 0;
    private trail: Position[] = [];
    private lastReport: ShotReport | null = null;

    constructor(options: SimulationOptions = {}) {
        this.config = mergeConfig(options.config);

        // 1. Initialiser core
        this.eventBus = options.eventBus ?? new EventBus();
        this.logger = options.logger ?? new Logger(this.config.logging);
        this.random = options.random ?? defaultRandom;

        // 2. Initialiser domain
        this.terrain = options.terrain ?? new Ground(this.config.ground, this.random);
        this.howitzer = new Howitzer(new Position(this.terrain.getWidth() / 2, 0), this.config.howitzer);
        this.projectile = new Projectile(this.config.projectile);

        // 3. Premier terrain, canon au centre
        this.howitzer.setPosition(this.terrain.reset(this.howitzer.getPosition()));

        this.logger.info('Simulation initialisée', {
            howitzer: this.howitzer.getPosition().toString(),
            target: this.terrain.getTarget().toString(),
        });
    }

    // ========================================================================
    // COMMANDES
    // ========================================================================

    /**
     * Applique les commandes d'un tick : pointage puis tir.
     */
    handleInput(input: ControlInput): void {
        const { rotateStep, raiseStep } = this.config.howitzer;
        const previous = this.howitzer.getElevationDegrees();

        if (input.right) this.howitzer.rotate(rotateStep);
        if (input.left) this.howitzer.rotate(-rotateStep);
        if (input.up) this.howitzer.raise(raiseStep);
        if (input.down) this.howitzer.raise(-raiseStep);

        const current = this.howitzer.getElevationDegrees();
        if (current !== previous) {
            this.logger.control(`Élévation ${previous.toFixed(2)}° → ${current.toFixed(2)}°`);
            this.eventBus.publish(SimulationEventType.HOWITZER_ELEVATION_CHANGE, { previous, current }, 'Simulation');
        }

        if (input.fire) {
            this.fire();
        }
    }

    /**
     * Lance un obus depuis la position du canon.
     *
     * @returns false si un obus est déjà en vol ou si le canon ne peut pas tirer
     */
    fire(): boolean {
        if (this.firing || !this.howitzer.canFire()) {
            return false;
        }

        this.time = 0;
        this.shotsAttempted++;

        const solution = this.howitzer.getFiringSolution();
        this.projectile.fire(solution.position, solution.elevation, solution.muzzleVelocity, this.time);
        this.howitzer.recordFiring(this.time);

        this.firing = true;
        this.hit = false;
        this.trail = [];

        this.logger.shot(`Coup n°${this.shotsAttempted} à ${solution.elevation.degrees.toFixed(2)}°`, {
            position: solution.position.toString(),
            muzzleVelocity: solution.muzzleVelocity,
        });
        this.eventBus.publish(SimulationEventType.PROJECTILE_FIRED, { shot: this.shotsAttempted, solution }, 'Simulation');
        return true;
    }

    // ========================================================================
    // BOUCLE
    // ========================================================================

    /**
     * Avance d'un tick.
     *
     * @param timeStep - Durée du tick (s), > 0
     * @returns Le bilan si le tir s'est terminé pendant ce tick, sinon null
     */
    update(timeStep: number = this.config.physics.timeStep): ShotReport | null {
        if (!Number.isFinite(timeStep) || timeStep <= 0) {
            throw new InvalidTimeStepError(`Tick non positif : ${timeStep} s`, timeStep);
        }

        if (!this.firing) {
            return null;
        }

        this.time += timeStep;
        this.projectile.advance(this.time);
        this.updateTrail();
        this.logger.logFlightSnapshot(this.createSnapshot());

        if (this.checkGroundCollision()) {
            return this.endShot('ground');
        }
        if (this.time >= this.config.physics.maxFlightTime) {
            return this.endShot('timeout');
        }
        return null;
    }

    /**
     * Enchaîne les ticks jusqu'à la fin du tir en cours.
     */
    runUntilImpact(timeStep: number = this.config.physics.timeStep): ShotReport | null {
        let report: ShotReport | null = null;
        while (this.firing) {
            report = this.update(timeStep);
        }
        return report;
    }

    /**
     * Nouveau terrain, même score.
     */
    reset(): void {
        this.abortShot();
        this.time = 0;
        this.hit = false;
        this.howitzer.setPosition(this.terrain.reset(this.howitzer.getPosition()));

        this.logger.info('Terrain régénéré');
        this.eventBus.publish(SimulationEventType.SIMULATION_RESET, this.layout(), 'Simulation');
    }

    /**
     * Nouvelle partie : score effacé, canon replacé et réinitialisé.
     */
    newGame(): void {
        this.abortShot();
        this.time = 0;
        this.hit = false;
        this.score = 0;
        this.shotsAttempted = 0;
        this.lastReport = null;

        this.howitzer.reset();
        const position = this.howitzer.generatePosition(this.terrain.getWidth(), this.random);
        this.howitzer.setPosition(this.terrain.reset(position));

        this.logger.info('Nouvelle partie');
        this.eventBus.publish(SimulationEventType.SIMULATION_NEW_GAME, this.layout(), 'Simulation');
    }

    private checkGroundCollision(): boolean {
        if (!this.projectile.isActive()) {
            return true;
        }
        const position = this.projectile.getPosition();
        return position.y <= this.terrain.getElevationMeters(position);
    }

    private endShot(outcome: ShotOutcome): ShotReport {
        const impact = this.projectile.getPosition();
        const target = this.terrain.getTarget();
        const distanceToTarget = impact.distanceTo(target);
        const hit = outcome === 'ground' && distanceToTarget < this.config.game.hitTolerance;
        const stats = this.projectile.getStatistics();

        const report: ShotReport = {
            shot: this.shotsAttempted,
            hit,
            outcome,
            impact,
            target,
            distanceToTarget,
            flightTime: stats.flightTime,
            maxAltitude: stats.maxAltitude,
            totalDistance: stats.totalDistance,
        };

        this.firing = false;
        this.hit = hit;
        this.lastReport = report;

        this.logger.impact(
            `Coup n°${report.shot} ${hit ? 'au but' : 'manqué'} à ${distanceToTarget.toFixed(1)} m de la cible`,
            { outcome, flightTime: report.flightTime },
        );
        this.eventBus.publish(SimulationEventType.PROJECTILE_IMPACT, report, 'Simulation');

        if (hit) {
            this.score++;
            this.eventBus.publish(SimulationEventType.TARGET_HIT, report, 'Simulation');
            // Nouveau terrain pour le coup suivant
            this.howitzer.setPosition(this.terrain.reset(this.howitzer.getPosition()));
        } else {
            this.eventBus.publish(SimulationEventType.TARGET_MISS, report, 'Simulation');
        }

        this.resetProjectile();
        this.eventBus.publish(SimulationEventType.PROJECTILE_RESET, { shot: report.shot }, 'Simulation');

        return report;
    }

    private abortShot(): void {
        this.firing = false;
        this.resetProjectile();
    }

    /**
     * reset() ramène l'obus au M795 ; les caractéristiques configurées sont réappliquées.
     */
    private resetProjectile(): void {
        this.projectile.reset();
        this.projectile.setMass(this.config.projectile.mass);
        this.projectile.setRadius(this.config.projectile.radius);
        this.trail = [];
    }

    /**
     * Traînée : positions récentes, la plus récente en tête.
     */
    private updateTrail(): void {
        this.trail.unshift(this.projectile.getPosition());
        if (this.trail.length > this.config.game.trailLength) {
            this.trail.length = this.config.game.trailLength;
        }
    }

    private createSnapshot(): FlightSnapshot {
        const position = this.projectile.getPosition();
        const velocity = this.projectile.getVelocity();
        const drag = this.projectile.inspectDrag();
        const accelerations = this.projectile.getLastAccelerations();
        const planar = (vector: { ddx: number; ddy: number } | undefined) => ({
            x: vector?.ddx ?? 0,
            y: vector?.ddy ?? 0,
        });

        return {
            time: this.time,
            position: { x: position.x, y: position.y },
            velocity: { x: velocity.dx, y: velocity.dy },
            speed: velocity.speed,
            altitude: this.projectile.getAltitude(),
            mach: drag?.mach ?? 0,
            dragCoefficient: drag?.dragCoefficient ?? 0,
            accelerations: {
                gravity: planar(accelerations?.gravity),
                drag: planar(accelerations?.drag),
                total: planar(accelerations?.total),
            },
        };
    }

    private layout(): TerrainLayout {
        return { howitzer: this.howitzer.getPosition(), target: this.terrain.getTarget() };
    }

    // ========================================================================
    // ACCESSEURS
    // ========================================================================

    getTime(): number {
        return this.time;
    }

    isFiring(): boolean {
        return this.firing;
    }

    isTargetHit(): boolean {
        return this.hit;
    }

    getScore(): number {
        return this.score;
    }

    getShotsAttempted(): number {
        return this.shotsAttempted;
    }

    /** Ratio coups au but / coups tirés (0 sans tir) */
    getHitRate(): number {
        return this.shotsAttempted === 0 ? 0 : this.score / this.shotsAttempted;
    }

    getTrail(): readonly Position[] {
        return this.trail;
    }

    getLastShotReport(): ShotReport | null {
        return this.lastReport;
    }

    getHowitzer(): Howitzer {
        return this.howitzer;
    }

    getProjectile(): Projectile {
        return this.projectile;
    }

    getTerrain(): Terrain {
        return this.terrain;
    }

    getEventBus(): EventBus {
        return this.eventBus;
    }

    getLogger(): Logger {
        return this.logger;
    }

    getConfig(): SimulationConfig {
        return this.config;
    }
}
