/**
 * Modèle métier de l'obusier M777 (plateforme de tir).
 *
 * @module domain/howitzer/Howitzer
 */

import * as THREE from 'three';
import { Position } from '../kinematics/Position';
import { Velocity } from '../kinematics/Velocity';
import { Angle } from '../kinematics/Angle';
import type { FiringSolution } from '../../core/types/PhysicsState';
import type { HowitzerConfig } from '../../core/SimulationConfig';
import { DEFAULT_CONFIG } from '../../core/SimulationConfig';
import { InvalidPhysicalParameterError, requirePositive } from '../../core/errors';
import { defaultRandom, randomBetween, type RandomSource } from '../../core/random';
import { gravityFromAltitude } from '../physics/atmosphere/AtmosphericModel';

/**
 * Obusier : position, élévation bornée, vitesse initiale, comptage des tirs.
 *
 * L'élévation suit la convention des angles du domaine : 0° = tir vertical,
 * croissant vers la droite. Elle reste toujours dans [minElevation, maxElevation].
 * Le canon ne référence aucun obus ; il produit seulement une solution de tir.
 */
export class Howitzer {
    private position: Position;
    private muzzleVelocity: number;
    private elevationDegrees: number;
    private roundsFired = 0;
    private lastFireTime: number | null = null;

    private readonly config: HowitzerConfig;

    constructor(position: Position = Position.origin(), config: Partial<HowitzerConfig> = {}) {
        this.config = { ...DEFAULT_CONFIG.howitzer, ...config };

        if (this.config.minElevation > this.config.maxElevation) {
            throw new InvalidPhysicalParameterError(
                'minElevation',
                this.config.minElevation,
                `doit être ≤ maxElevation (${this.config.maxElevation})`,
            );
        }
        requirePositive('barrelLength', this.config.barrelLength);

        this.position = position;
        this.muzzleVelocity = requirePositive('muzzleVelocity', this.config.muzzleVelocity);
        this.elevationDegrees = this.clampDegrees(this.config.defaultElevation);
    }

    // ========================================================================
    // POSITION
    // ========================================================================

    getPosition(): Position {
        return this.position;
    }

    setPosition(position: Position): void {
        this.position = position;
    }

    /**
     * Place le canon au hasard entre 10 % et 90 % de la largeur, au niveau 0.
     */
    generatePosition(width: number, random: RandomSource = defaultRandom): Position {
        requirePositive('width', width);
        this.position = new Position(randomBetween(random, width * 0.1, width * 0.9), 0);
        return this.position;
    }

    // ========================================================================
    // VITESSE INITIALE
    // ========================================================================

    getMuzzleVelocity(): number {
        return this.muzzleVelocity;
    }

    setMuzzleVelocity(velocity: number): void {
        this.muzzleVelocity = requirePositive('muzzleVelocity', velocity);
    }

    canFire(): boolean {
        return this.muzzleVelocity > 0;
    }

    // ========================================================================
    // ÉLÉVATION
    // ========================================================================

    getElevation(): Angle {
        return Angle.fromDegrees(this.elevationDegrees);
    }

    getElevationDegrees(): number {
        return this.elevationDegrees;
    }

    getElevationLimits(): { min: number; max: number } {
        return { min: this.config.minElevation, max: this.config.maxElevation };
    }

    /**
     * Fixe l'élévation ; la valeur normalisée en degrés est bornée, jamais repliée.
     */
    setElevation(angle: Angle): void {
        this.elevationDegrees = this.clampDegrees(angle.degrees);
    }

    setElevationDegrees(degrees: number): void {
        if (!Number.isFinite(degrees)) {
            throw new InvalidPhysicalParameterError('elevation', degrees, 'doit être finie');
        }
        this.elevationDegrees = this.clampDegrees(degrees);
    }

    /**
     * Rotation de `radians` (positif = vers l'horizontale droite), bornée.
     */
    rotate(radians: number): void {
        this.addDegrees(THREE.MathUtils.radToDeg(radians));
    }

    /**
     * Hausse de `radians`, bornée.
     *
     * Même addition bornée que rotate() : seule l'amplitude du pas d'entrée diffère.
     */
    raise(radians: number): void {
        this.addDegrees(THREE.MathUtils.radToDeg(radians));
    }

    setMaxElevation(): void {
        this.elevationDegrees = this.config.maxElevation;
    }

    setMinElevation(): void {
        this.elevationDegrees = this.config.minElevation;
    }

    /**
     * Élévation ramenée à 0°, dans la limite des butées.
     */
    setHorizontal(): void {
        this.elevationDegrees = this.clampDegrees(0);
    }

    private addDegrees(deltaDegrees: number): void {
        if (!Number.isFinite(deltaDegrees)) {
            throw new InvalidPhysicalParameterError('elevationDelta', deltaDegrees, 'doit être fini');
        }
        this.elevationDegrees = this.clampDegrees(this.elevationDegrees + deltaDegrees);
    }

    private clampDegrees(degrees: number): number {
        return THREE.MathUtils.clamp(degrees, this.config.minElevation, this.config.maxElevation);
    }

    // ========================================================================
    // TIRS
    // ========================================================================

    recordFiring(time: number): void {
        this.lastFireTime = time;
        this.roundsFired++;
    }

    getRoundsFired(): number {
        return this.roundsFired;
    }

    /** null tant qu'aucun coup n'a été tiré */
    getLastFireTime(): number | null {
        return this.lastFireTime;
    }

    /**
     * Élévation et vitesse par défaut, compteurs remis à zéro. La position est conservée.
     */
    reset(): void {
        this.elevationDegrees = this.clampDegrees(this.config.defaultElevation);
        this.muzzleVelocity = this.config.muzzleVelocity;
        this.lastFireTime = null;
        this.roundsFired = 0;
    }

    getBarrelLength(): number {
        return this.config.barrelLength;
    }

    /**
     * Extrémité du tube : position + longueur du tube selon l'élévation.
     */
    getMuzzlePosition(): Position {
        const elevation = this.getElevation();
        const length = this.config.barrelLength;
        return new Position(this.position.x + elevation.dx * length, this.position.y + elevation.dy * length);
    }

    getMuzzleVelocityVector(): Velocity {
        return Velocity.fromAngle(this.getElevation(), this.muzzleVelocity);
    }

    /**
     * Triplet consommé par Projectile.fire().
     */
    getFiringSolution(): FiringSolution {
        return {
            position: this.position,
            elevation: this.getElevation(),
            muzzleVelocity: this.muzzleVelocity,
        };
    }

    // ========================================================================
    // ESTIMATIONS (vide, gravité à l'altitude du canon)
    // ========================================================================

    /**
     * Portée horizontale dans le vide pour l'élévation courante.
     *
     * @param targetElevation - Hauteur de la cible relative au canon (m)
     * @returns Portée (m), ou null si la cible est hors d'atteinte verticale
     */
    estimateRange(targetElevation = 0): number | null {
        const g = this.localGravity();
        const velocity = this.getMuzzleVelocityVector();
        const discriminant = velocity.dy * velocity.dy - 2 * g * targetElevation;
        if (discriminant < 0) return null;

        const flightTime = (velocity.dy + Math.sqrt(discriminant)) / g;
        return Math.abs(velocity.dx * flightTime);
    }

    /**
     * Élévation de trajectoire tendue pour atteindre `range` dans le vide.
     *
     * @returns Angle borné aux butées, ou null si la portée est inatteignable
     */
    estimateAngleForRange(range: number, targetElevation = 0): Angle | null {
        requirePositive('range', range);
        const g = this.localGravity();
        const v2 = this.muzzleVelocity * this.muzzleVelocity;
        const discriminant = v2 * v2 - g * (g * range * range + 2 * targetElevation * v2);
        if (discriminant < 0) return null;

        // Angle au-dessus de l'horizontale, racine basse
        const aboveHorizon = Math.atan((v2 - Math.sqrt(discriminant)) / (g * range));
        const fromVertical = THREE.MathUtils.radToDeg(Math.PI / 2 - aboveHorizon);
        return Angle.fromDegrees(this.clampDegrees(fromVertical));
    }

    private localGravity(): number {
        return gravityFromAltitude(Math.max(0, this.position.y));
    }
}
