/**
 * Système d'événements centralisé pour communication découplée entre modules.
 *
 * @module core/types/Events
 */

import type { Position } from '../../domain/kinematics/Position';
import type { FiringSolution, ShotReport } from './PhysicsState';

/**
 * Types d'événements disponibles dans la simulation.
 */
export enum SimulationEventType {
    // Événements obus
    PROJECTILE_FIRED = 'projectile:fired',
    PROJECTILE_IMPACT = 'projectile:impact',
    PROJECTILE_RESET = 'projectile:reset',

    // Événements cible
    TARGET_HIT = 'target:hit',
    TARGET_MISS = 'target:miss',

    // Événements canon
    HOWITZER_ELEVATION_CHANGE = 'howitzer:elevation:change',

    // Événements simulation
    SIMULATION_RESET = 'simulation:reset',
    SIMULATION_NEW_GAME = 'simulation:new-game',
}

/**
 * Placement du canon et de la cible après génération d'un terrain.
 */
export interface TerrainLayout {
    howitzer: Position;
    target: Position;
}

/**
 * Données associées à chaque type d'événement.
 */
export interface SimulationEventPayloads {
    [SimulationEventType.PROJECTILE_FIRED]: { shot: number; solution: FiringSolution };
    [SimulationEventType.PROJECTILE_IMPACT]: ShotReport;
    [SimulationEventType.PROJECTILE_RESET]: { shot: number };
    [SimulationEventType.TARGET_HIT]: ShotReport;
    [SimulationEventType.TARGET_MISS]: ShotReport;
    [SimulationEventType.HOWITZER_ELEVATION_CHANGE]: { previous: number; current: number }; // deg
    [SimulationEventType.SIMULATION_RESET]: TerrainLayout;
    [SimulationEventType.SIMULATION_NEW_GAME]: TerrainLayout;
}

/**
 * Structure de base pour tous les événements.
 */
export interface SimulationEvent<K extends SimulationEventType = SimulationEventType> {
    /** Type d'événement */
    type: K;

    /** Timestamp de l'événement (ms depuis epoch) */
    timestamp: number;

    /** Données associées à l'événement */
    data: SimulationEventPayloads[K];

    /** Source de l'événement (optionnel) */
    source?: string;
}

/**
 * Callback pour les listeners d'événements.
 */
export type EventListener<K extends SimulationEventType> = (event: SimulationEvent<K>) => void;

type ListenerRegistry = {
    [K in SimulationEventType]?: Set<EventListener<K>>;
};

/**
 * Bus d'événements central pour communication découplée.
 *
 * @example
 * ```typescript
 * const eventBus = new EventBus();
 *
 * // S'abonner
 * eventBus.subscribe(SimulationEventType.TARGET_HIT, (event) => {
 *   console.log('Cible touchée !', event.data.distanceToTarget);
 * });
 * ```
 */
export class EventBus {
    private listeners: ListenerRegistry = {};
    private oneTimeListeners: ListenerRegistry = {};

    /**
     * S'abonne à un type d'événement.
     *
     * @returns Fonction de désabonnement
     */
    subscribe<K extends SimulationEventType>(type: K, callback: EventListener<K>): () => void {
        this.listenersOf(this.listeners, type).add(callback);

        // Retourner fonction de désabonnement
        return () => this.unsubscribe(type, callback);
    }

    /**
     * S'abonne à un événement pour une seule exécution.
     */
    subscribeOnce<K extends SimulationEventType>(type: K, callback: EventListener<K>): void {
        this.listenersOf(this.oneTimeListeners, type).add(callback);
    }

    /**
     * Se désabonne d'un type d'événement.
     */
    unsubscribe<K extends SimulationEventType>(type: K, callback: EventListener<K>): void {
        this.listenersOf(this.listeners, type).delete(callback);
        this.listenersOf(this.oneTimeListeners, type).delete(callback);
    }

    /**
     * Publie un événement à tous les abonnés.
     *
     * Un listener qui lève une erreur est signalé sans interrompre les autres.
     */
    publish<K extends SimulationEventType>(type: K, data: SimulationEventPayloads[K], source?: string): void {
        const event: SimulationEvent<K> = { type, timestamp: Date.now(), data, source };

        // Appeler listeners permanents
        for (const callback of [...this.listenersOf(this.listeners, type)]) {
            this.deliver(callback, event);
        }

        // Appeler et retirer listeners one-time
        const oneTime = [...this.listenersOf(this.oneTimeListeners, type)];
        this.listenersOf(this.oneTimeListeners, type).clear();
        for (const callback of oneTime) {
            this.deliver(callback, event);
        }
    }

    /**
     * Supprime tous les listeners d'un type spécifique.
     */
    clear(type: SimulationEventType): void {
        delete this.listeners[type];
        delete this.oneTimeListeners[type];
    }

    /**
     * Supprime tous les listeners de tous les types.
     */
    clearAll(): void {
        this.listeners = {};
        this.oneTimeListeners = {};
    }

    /**
     * Nombre total de listeners (permanents + one-time) pour un type.
     */
    getListenerCount(type: SimulationEventType): number {
        const permanent = this.listeners[type]?.size ?? 0;
        const oneTime = this.oneTimeListeners[type]?.size ?? 0;
        return permanent + oneTime;
    }

    private listenersOf<K extends SimulationEventType>(registry: { [P in K]?: Set<EventListener<P>> }, type: K): Set<EventListener<K>> {
        const existing = registry[type];
        if (existing) {
            return existing;
        }
        const created = new Set<EventListener<K>>();
        registry[type] = created;
        return created;
    }

    private deliver<K extends SimulationEventType>(callback: EventListener<K>, event: SimulationEvent<K>): void {
        try {
            callback(event);
        } catch (error) {
            console.error(`Erreur dans listener pour ${event.type}:`, error);
        }
    }
}
