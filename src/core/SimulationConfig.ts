/**
 * Configuration centralisée de la simulation.
 *
 * Toutes les grandeurs physiques sont en unités SI (m, s, kg).
 * Les angles du canon sont en degrés, mesurés depuis la verticale (0° = tir vertical).
 *
 * La configuration est fixée à la construction ; rien ne la modifie en cours de vol.
 *
 * @module core/SimulationConfig
 */

/**
 * Configuration complète de la simulation.
 */
export interface SimulationConfig {
    /** Configuration physique */
    physics: PhysicsConfig;

    /** Caractéristiques de l'obus */
    projectile: ProjectileConfig;

    /** Configuration du canon */
    howitzer: HowitzerConfig;

    /** Génération du terrain */
    ground: GroundConfig;

    /** Règles de jeu */
    game: GameConfig;

    /** Configuration du rendu (frontière d'affichage uniquement) */
    rendering: RenderingConfig;

    /** Configuration des logs */
    logging: LoggingConfig;
}

export interface PhysicsConfig {
    timeStep: number; // s - Pas de référence par tick
    maxFlightTime: number; // s - Plafond de sécurité pour les exécutions sans affichage
}

export interface ProjectileConfig {
    mass: number; // kg
    radius: number; // m
}

export interface HowitzerConfig {
    muzzleVelocity: number; // m/s
    defaultElevation: number; // deg
    minElevation: number; // deg
    maxElevation: number; // deg
    barrelLength: number; // m
    rotateStep: number; // rad - Pas des flèches gauche/droite
    raiseStep: number; // rad - Pas des flèches haut/bas
}

export interface GroundConfig {
    width: number; // m
    resolution: number; // m par colonne de terrain
    maxHeight: number; // m
    minTargetDistance: number; // m - Écart minimal canon/cible
}

export interface GameConfig {
    hitTolerance: number; // m
    trailLength: number; // nombre de positions conservées
}

export interface RenderingConfig {
    metersPerPixel: number;
    screenWidth: number; // px - Fixe la largeur du terrain : screenWidth × metersPerPixel
}

export interface LoggingConfig {
    enabled: boolean;
    bufferSize: number;
    consoleOutput: boolean;
}

/**
 * Configuration partielle, section par section.
 */
export type PartialSimulationConfig = {
    [K in keyof SimulationConfig]?: Partial<SimulationConfig[K]>;
};

/**
 * Configuration par défaut.
 */
export const DEFAULT_CONFIG: SimulationConfig = {
    physics: {
        timeStep: 0.5, // s - Pas de référence (précision du premier ordre)
        maxFlightTime: 600,
    },
    projectile: {
        // Obus M795, calibre 155 mm
        mass: 46.7,
        radius: 0.077545,
    },
    howitzer: {
        // Obusier M777
        muzzleVelocity: 827,
        defaultElevation: 45,
        minElevation: 0,
        maxElevation: 85,
        barrelLength: 6,
        rotateStep: 0.05,
        raiseStep: 0.003,
    },
    ground: {
        width: 28000, // 700 px × 40 m
        resolution: 40, // une colonne par pixel
        maxHeight: 6000,
        minTargetDistance: 4000,
    },
    game: {
        hitTolerance: 175,
        trailLength: 20,
    },
    rendering: {
        metersPerPixel: 40,
        screenWidth: 700,
    },
    logging: {
        enabled: true,
        bufferSize: 32,
        consoleOutput: false,
    },
};

/**
 * Fusionne une configuration partielle sur les valeurs par défaut.
 */
export function mergeConfig(partial: PartialSimulationConfig = {}): SimulationConfig {
    const rendering = { ...DEFAULT_CONFIG.rendering, ...partial.rendering };

    return {
        physics: { ...DEFAULT_CONFIG.physics, ...partial.physics },
        projectile: { ...DEFAULT_CONFIG.projectile, ...partial.projectile },
        howitzer: { ...DEFAULT_CONFIG.howitzer, ...partial.howitzer },
        // Largeur du terrain dérivée de l'écran, sauf valeur explicite
        ground: {
            ...DEFAULT_CONFIG.ground,
            width: rendering.screenWidth * rendering.metersPerPixel,
            ...partial.ground,
        },
        game: { ...DEFAULT_CONFIG.game, ...partial.game },
        rendering,
        logging: { ...DEFAULT_CONFIG.logging, ...partial.logging },
    };
}
