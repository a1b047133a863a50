/**
 * Point d'entrée public : moteur balistique, plateforme de tir, terrain et orchestrateur.
 *
 * @module howitzer-ballistics
 */

// Core
export * from './core/errors';
export * from './core/random';
export * from './core/SimulationConfig';
export * from './core/types/Events';
export * from './core/types/PhysicsState';
export { Simulation, type ControlInput, type SimulationOptions } from './core/Simulation';

// Domain - cinématique
export { Angle, ANGLE_EPSILON } from './domain/kinematics/Angle';
export { Position, VECTOR_EPSILON } from './domain/kinematics/Position';
export { Velocity } from './domain/kinematics/Velocity';
export { Acceleration } from './domain/kinematics/Acceleration';

// Domain - physique
export { LookupTable, linearInterpolation, type Mapping } from './domain/physics/atmosphere/LookupTable';
export * from './domain/physics/atmosphere/AtmosphericModel';
export * from './domain/physics/Physics';
export * from './domain/physics/forces/ForceCalculator';
export { GravityForceCalculator } from './domain/physics/forces/GravityForce';
export { DragForceCalculator } from './domain/physics/forces/DragForce';
export type { IIntegrator } from './domain/physics/integrators/Integrator';
export { KinematicIntegrator } from './domain/physics/integrators/KinematicIntegrator';

// Domain - entités
export { Trajectory, type ReadonlyTrajectory } from './domain/projectile/Trajectory';
export * from './domain/projectile/Projectile';
export { Howitzer } from './domain/howitzer/Howitzer';
export { Ground, type Terrain } from './domain/ground/Ground';

// Application
export * from './application/logging/Logger';

// Infrastructure
export { ScreenMapping } from './infrastructure/rendering/ScreenMapping';
export { MaterialFactory } from './infrastructure/rendering/materials/MaterialFactory';
export { TrajectoryVisualizer, TerrainVisualizer } from './infrastructure/rendering/visualizers/VisualizersBundle';
export { formatHud } from './infrastructure/rendering/Hud';
