/**
 * Factory pour matériaux réutilisables.
 *
 * @module infrastructure/rendering/materials/MaterialFactory
 */

import * as THREE from 'three';

/**
 * Factory centralisée pour créer des matériaux Three.js.
 */
export class MaterialFactory {
    private static lineCache = new Map<string, THREE.LineBasicMaterial>();
    private static pointsCache = new Map<string, THREE.PointsMaterial>();

    /**
     * Matériau pour la traînée de l'obus.
     */
    static createTrajectoryMaterial(): THREE.LineBasicMaterial {
        return this.cachedLine('trajectory', () => new THREE.LineBasicMaterial({
            color: 0xffffff,
            linewidth: 1,
            transparent: true,
            opacity: 0.8,
        }));
    }

    /**
     * Matériau pour le profil du terrain.
     */
    static createTerrainMaterial(): THREE.LineBasicMaterial {
        return this.cachedLine('terrain', () => new THREE.LineBasicMaterial({
            color: 0x3a7d2c,
            linewidth: 2,
        }));
    }

    /**
     * Matériau pour le repère de la cible.
     */
    static createTargetMaterial(): THREE.PointsMaterial {
        const existing = this.pointsCache.get('target');
        if (existing) return existing;
        const material = new THREE.PointsMaterial({ color: 0xff0000, size: 6, sizeAttenuation: false });
        this.pointsCache.set('target', material);
        return material;
    }

    /**
     * Nettoie tous les matériaux cachés.
     */
    static dispose(): void {
        this.lineCache.forEach((material) => material.dispose());
        this.pointsCache.forEach((material) => material.dispose());
        this.lineCache.clear();
        this.pointsCache.clear();
    }

    private static cachedLine(key: string, create: () => THREE.LineBasicMaterial): THREE.LineBasicMaterial {
        const existing = this.lineCache.get(key);
        if (existing) return existing;
        const material = create();
        this.lineCache.set(key, material);
        return material;
    }
}
