/**
 * Visualiseurs de la scène de tir (géométrie uniquement, aucun rendu GPU ici).
 *
 * @module infrastructure/rendering/visualizers/VisualizersBundle
 */

import * as THREE from 'three';
import type { Position } from '../../../domain/kinematics/Position';
import type { PositionVelocityTime } from '../../../core/types/PhysicsState';
import type { Terrain } from '../../../domain/ground/Ground';
import { MaterialFactory } from '../materials/MaterialFactory';
import type { ScreenMapping } from '../ScreenMapping';

/**
 * Trajectoire ou traînée de l'obus, en pixels.
 */
export class TrajectoryVisualizer {
    private line: THREE.Line;
    private positionAttribute: THREE.BufferAttribute;
    private pointCount = 0;

    constructor(private readonly mapping: ScreenMapping, private readonly maxPoints = 2000) {
        // Buffer préalloué pour toutes les positions
        this.positionAttribute = new THREE.BufferAttribute(new Float32Array(maxPoints * 3), 3);
        this.positionAttribute.setUsage(THREE.DynamicDrawUsage);

        const geometry = new THREE.BufferGeometry();
        geometry.setAttribute('position', this.positionAttribute);
        geometry.setDrawRange(0, 0); // Initialement, aucun point à dessiner

        this.line = new THREE.Line(geometry, MaterialFactory.createTrajectoryMaterial());
        this.line.frustumCulled = false;
    }

    /**
     * Trace les échantillons d'une trajectoire (les plus anciens au-delà de maxPoints sont ignorés).
     */
    setSamples(samples: Iterable<PositionVelocityTime>): void {
        const positions: Position[] = [];
        for (const sample of samples) {
            positions.push(sample.position);
        }
        this.setPositions(positions);
    }

    setPositions(positions: readonly Position[]): void {
        const visible = positions.slice(Math.max(0, positions.length - this.maxPoints));

        // Mettre à jour le buffer existant au lieu de recréer la géométrie
        visible.forEach((position, index) => {
            const pixels = this.mapping.toScreen(position);
            this.positionAttribute.setXYZ(index, pixels.x, pixels.y, 0);
        });
        this.positionAttribute.needsUpdate = true;

        this.pointCount = visible.length;
        this.line.geometry.setDrawRange(0, this.pointCount);
    }

    clear(): void {
        this.pointCount = 0;
        this.line.geometry.setDrawRange(0, 0);
    }

    getPointCount(): number {
        return this.pointCount;
    }

    getPoint(index: number): THREE.Vector2 | null {
        if (index < 0 || index >= this.pointCount) return null;
        return new THREE.Vector2(this.positionAttribute.getX(index), this.positionAttribute.getY(index));
    }

    getObject(): THREE.Line {
        return this.line;
    }

    dispose(): void {
        this.line.geometry.dispose();
    }
}

/**
 * Profil du terrain et repère de la cible, en pixels.
 */
export class TerrainVisualizer {
    private group = new THREE.Group();
    private profile: THREE.Line;
    private target: THREE.Points;

    constructor(private readonly mapping: ScreenMapping) {
        this.profile = new THREE.Line(new THREE.BufferGeometry(), MaterialFactory.createTerrainMaterial());

        const targetGeometry = new THREE.BufferGeometry();
        targetGeometry.setAttribute('position', new THREE.Float32BufferAttribute([0, 0, 0], 3));
        this.target = new THREE.Points(targetGeometry, MaterialFactory.createTargetMaterial());

        this.group.add(this.profile, this.target);
    }

    /**
     * Reconstruit la géométrie après un nouveau terrain.
     */
    update(terrain: Terrain): void {
        const points = terrain.getProfile().map((position) => {
            const pixels = this.mapping.toScreen(position);
            return new THREE.Vector3(pixels.x, pixels.y, 0);
        });

        this.profile.geometry.dispose();
        this.profile.geometry = new THREE.BufferGeometry().setFromPoints(points);

        const target = this.mapping.toScreen(terrain.getTarget());
        this.target.position.set(target.x, target.y, 0);
    }

    getProfilePointCount(): number {
        return this.profile.geometry.getAttribute('position')?.count ?? 0;
    }

    getTargetPosition(): THREE.Vector2 {
        return new THREE.Vector2(this.target.position.x, this.target.position.y);
    }

    getObject(): THREE.Group {
        return this.group;
    }

    dispose(): void {
        this.profile.geometry.dispose();
        this.target.geometry.dispose();
    }
}
