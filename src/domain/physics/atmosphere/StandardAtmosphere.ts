/**
 * Tables empiriques de l'atmosphère standard et de la traînée de l'obus M795.
 * Altitudes en mètres, du niveau de la mer à 80 km.
 *
 * @module domain/physics/atmosphere/StandardAtmosphere
 */

type Table = ReadonlyArray<readonly [number, number]>;

// ============================================================================
// GRAVITÉ (m/s²)
// ============================================================================

export const GRAVITY_TABLE: Table = [
    [0, 9.807],
    [1000, 9.804],
    [2000, 9.801],
    [3000, 9.797],
    [4000, 9.794],
    [5000, 9.791],
    [6000, 9.788],
    [7000, 9.785],
    [8000, 9.782],
    [9000, 9.779],
    [10000, 9.776],
    [15000, 9.761],
    [20000, 9.745],
    [25000, 9.730],
    [30000, 9.715],
    [40000, 9.684],
    [50000, 9.654],
    [60000, 9.624],
    [70000, 9.594],
    [80000, 9.564],
];

// ============================================================================
// DENSITÉ DE L'AIR (kg/m³)
// ============================================================================

export const DENSITY_TABLE: Table = [
    [0, 1.225],
    [1000, 1.112],
    [2000, 1.007],
    [3000, 0.9093],
    [4000, 0.8194],
    [5000, 0.7364],
    [6000, 0.6601],
    [7000, 0.5900],
    [8000, 0.5258],
    [9000, 0.4671],
    [10000, 0.4135],
    [15000, 0.1948],
    [20000, 0.08891],
    [25000, 0.04008],
    [30000, 0.01841],
    [40000, 0.003996],
    [50000, 0.001027],
    [60000, 0.0003097],
    [70000, 0.0000828],
    [80000, 0.0000185],
];

// ============================================================================
// VITESSE DU SON (m/s) - creux dans la tropopause puis remontée
// ============================================================================

export const SPEED_OF_SOUND_TABLE: Table = [
    [0, 340],
    [1000, 336],
    [2000, 332],
    [3000, 328],
    [4000, 324],
    [5000, 320],
    [6000, 316],
    [7000, 312],
    [8000, 308],
    [9000, 303],
    [10000, 299],
    [15000, 295],
    [20000, 295],
    [25000, 295],
    [30000, 305],
    [40000, 324],
    [50000, 337],
    [60000, 319],
    [70000, 289],
    [80000, 269],
];

// ============================================================================
// COEFFICIENT DE TRAÎNÉE M795 EN FONCTION DU MACH - pic transsonique à Mach 1.06
// ============================================================================

export const DRAG_COEFFICIENT_TABLE: Table = [
    [0.0, 0.0],
    [0.1, 0.0543],
    [0.3, 0.1629],
    [0.5, 0.1659],
    [0.7, 0.2031],
    [0.89, 0.2597],
    [0.92, 0.3010],
    [0.96, 0.3287],
    [0.98, 0.4002],
    [1.00, 0.4258],
    [1.02, 0.4335],
    [1.06, 0.4483],
    [1.24, 0.4064],
    [1.53, 0.3663],
    [1.99, 0.2897],
    [2.87, 0.2297],
    [2.89, 0.2306],
    [5.00, 0.2656],
];
