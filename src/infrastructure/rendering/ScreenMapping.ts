/**
 * Conversion mètres ↔ pixels, à la frontière d'affichage uniquement.
 *
 * La physique ne lit jamais cette échelle.
 *
 * @module infrastructure/rendering/ScreenMapping
 */

import * as THREE from 'three';
import { Position } from '../../domain/kinematics/Position';
import type { RenderingConfig } from '../../core/SimulationConfig';
import { requirePositive } from '../../core/errors';

/**
 * Échelle immuable, fixée au démarrage. Axe Y vers le haut dans les deux repères.
 */
export class ScreenMapping {
    constructor(public readonly metersPerPixel: number) {
        requirePositive('metersPerPixel', metersPerPixel);
    }

    static fromConfig(rendering: Pick<RenderingConfig, 'metersPerPixel'>): ScreenMapping {
        return new ScreenMapping(rendering.metersPerPixel);
    }

    toPixels(meters: number): number {
        return meters / this.metersPerPixel;
    }

    toMeters(pixels: number): number {
        return pixels * this.metersPerPixel;
    }

    toScreen(position: Position): THREE.Vector2 {
        return position.toVector2().divideScalar(this.metersPerPixel);
    }

    fromScreen(pixels: THREE.Vector2): Position {
        return new Position(this.toMeters(pixels.x), this.toMeters(pixels.y));
    }
}
