/**
 * Terrain et cible.
 *
 * @module domain/ground/Ground
 */

import * as THREE from 'three';
import { Position } from '../kinematics/Position';
import { LookupTable } from '../physics/atmosphere/LookupTable';
import type { GroundConfig } from '../../core/SimulationConfig';
import { DEFAULT_CONFIG } from '../../core/SimulationConfig';
import { InvalidPhysicalParameterError, requirePositive, requireNonNegative } from '../../core/errors';
import { defaultRandom, type RandomSource } from '../../core/random';

/**
 * Ce dont l'orchestrateur a besoin d'un terrain.
 */
export interface Terrain {
    /**
     * Génère un nouveau relief et une nouvelle cible.
     *
     * @returns Position du canon posée sur le relief
     */
    reset(howitzerPosition: Position): Position;

    /** Hauteur du relief à l'abscisse de `position` (m) */
    getElevationMeters(position: Position): number;

    getTarget(): Position;

    getWidth(): number;

    /** Dans la largeur et au-dessus du relief */
    isValidPosition(position: Position): boolean;

    /** Points du profil, abscisses croissantes (pour l'affichage) */
    getProfile(): readonly Position[];
}

/** Demi-largeur (colonnes) des plateaux sous le canon et la cible */
const PLATEAU_HALF_WIDTH = 2;

/** Amplitude maximale d'une colonne à la suivante, en fraction de maxHeight */
const SLOPE_RATIO = 0.02;

/**
 * Relief en colonnes régulièrement espacées, généré par marche aléatoire.
 *
 * Avant le premier reset() : sol plat au niveau 0, cible au centre.
 */
export class Ground implements Terrain {
    private readonly config: GroundConfig;
    private readonly random: RandomSource;
    private heights: number[];
    private profile: LookupTable;
    private target: Position;

    constructor(config: Partial<GroundConfig> = {}, random: RandomSource = defaultRandom) {
        this.config = { ...DEFAULT_CONFIG.ground, ...config };
        requirePositive('width', this.config.width);
        requirePositive('resolution', this.config.resolution);
        requireNonNegative('maxHeight', this.config.maxHeight);
        requireNonNegative('minTargetDistance', this.config.minTargetDistance);
        if (this.config.resolution > this.config.width) {
            throw new InvalidPhysicalParameterError('resolution', this.config.resolution, 'doit être ≤ width');
        }

        this.random = random;
        this.heights = new Array<number>(this.getColumnCount()).fill(0);
        this.profile = this.buildProfile();
        this.target = new Position(this.config.width / 2, 0);
    }

    reset(howitzerPosition: Position): Position {
        const columns = this.getColumnCount();
        const howitzerX = THREE.MathUtils.clamp(howitzerPosition.x, 0, this.config.width);
        const howitzerColumn = Math.min(columns - 1, Math.round(howitzerX / this.config.resolution));
        const targetColumn = this.pickTargetColumn(howitzerColumn, columns);

        this.heights = this.generateHeights(columns);
        this.flatten(howitzerColumn);
        this.flatten(targetColumn);
        this.profile = this.buildProfile();

        this.target = new Position(targetColumn * this.config.resolution, this.heights[targetColumn] ?? 0);

        const lifted = new Position(howitzerX, 0);
        return lifted.withY(this.getElevationMeters(lifted));
    }

    getElevationMeters(position: Position): number {
        return this.profile.interpolate(THREE.MathUtils.clamp(position.x, 0, this.config.width));
    }

    getTarget(): Position {
        return this.target;
    }

    getWidth(): number {
        return this.config.width;
    }

    getResolution(): number {
        return this.config.resolution;
    }

    getColumnCount(): number {
        return Math.floor(this.config.width / this.config.resolution) + 1;
    }

    /** Hauteur d'une colonne (0 hors limites) */
    getGroundHeight(column: number): number {
        return this.heights[column] ?? 0;
    }

    isValidPosition(position: Position): boolean {
        if (position.x < 0 || position.x > this.config.width) return false;
        return position.y >= this.getElevationMeters(position);
    }

    getProfile(): readonly Position[] {
        return this.profile.knots.map((knot) => new Position(knot.domain, knot.range));
    }

    private pickTargetColumn(howitzerColumn: number, columns: number): number {
        const margin = Math.round(columns * 0.05);
        const minColumns = Math.ceil(this.config.minTargetDistance / this.config.resolution);

        const candidates: number[] = [];
        for (let column = margin; column <= columns - 1 - margin; column++) {
            if (Math.abs(column - howitzerColumn) >= minColumns) {
                candidates.push(column);
            }
        }

        const picked = candidates[Math.floor(this.random() * candidates.length)];
        if (picked === undefined) {
            throw new InvalidPhysicalParameterError(
                'minTargetDistance',
                this.config.minTargetDistance,
                `aucune colonne disponible sur ${this.config.width} m`,
            );
        }
        return picked;
    }

    private generateHeights(columns: number): number[] {
        const maxHeight = this.config.maxHeight;
        const maxStep = maxHeight * SLOPE_RATIO;
        const heights: number[] = [];

        let height = this.random() * maxHeight * 0.25;
        for (let column = 0; column < columns; column++) {
            height = THREE.MathUtils.clamp(height + (this.random() * 2 - 1) * maxStep, 0, maxHeight);
            heights.push(height);
        }
        return heights;
    }

    private flatten(center: number): void {
        const level = this.heights[center] ?? 0;
        const from = Math.max(0, center - PLATEAU_HALF_WIDTH);
        const to = Math.min(this.heights.length - 1, center + PLATEAU_HALF_WIDTH);
        for (let column = from; column <= to; column++) {
            this.heights[column] = level;
        }
    }

    private buildProfile(): LookupTable {
        return new LookupTable(
            this.heights.map((height, column) => ({ domain: column * this.config.resolution, range: height })),
            'terrain',
        );
    }
}
