/**
 * Erreurs de contrat du noyau balistique.
 *
 * Le noyau est un calcul numérique pur : une erreur signale toujours un appelant
 * qui viole une précondition, jamais une panne transitoire. Les cas dégénérés
 * prévus (vitesse nulle, avance sans vol) ne lèvent rien.
 *
 * @module core/errors
 */

/**
 * Codes d'erreur distinguant les trois familles de violation.
 */
export enum BallisticsErrorCode {
    INVALID_TIME_STEP = 'INVALID_TIME_STEP',
    INVALID_PHYSICAL_PARAMETER = 'INVALID_PHYSICAL_PARAMETER',
    MALFORMED_LOOKUP_TABLE = 'MALFORMED_LOOKUP_TABLE',
}

/**
 * Classe de base de toutes les erreurs du noyau.
 */
export abstract class BallisticsError extends Error {
    abstract readonly code: BallisticsErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Pas de temps négatif, horodatage non croissant ou tick non positif.
 */
export class InvalidTimeStepError extends BallisticsError {
    readonly code = BallisticsErrorCode.INVALID_TIME_STEP;

    constructor(message: string, public readonly timeStep: number) {
        super(message);
    }
}

/**
 * Masse, rayon, vitesse ou autre grandeur physique hors de son domaine.
 */
export class InvalidPhysicalParameterError extends BallisticsError {
    readonly code = BallisticsErrorCode.INVALID_PHYSICAL_PARAMETER;

    constructor(public readonly parameter: string, public readonly value: number, expectation: string) {
        super(`${parameter} invalide (${value}) : ${expectation}`);
    }
}

/**
 * Table d'interpolation vide ou dont les domaines ne sont pas strictement croissants.
 */
export class MalformedLookupTableError extends BallisticsError {
    readonly code = BallisticsErrorCode.MALFORMED_LOOKUP_TABLE;
}

/**
 * Vérifie qu'une grandeur est finie et positive ou nulle.
 */
export function requireNonNegative(parameter: string, value: number): number {
    if (!Number.isFinite(value) || value < 0) {
        throw new InvalidPhysicalParameterError(parameter, value, 'doit être fini et >= 0');
    }
    return value;
}

/**
 * Vérifie qu'une grandeur est finie et strictement positive.
 */
export function requirePositive(parameter: string, value: number): number {
    if (!Number.isFinite(value) || value <= 0) {
        throw new InvalidPhysicalParameterError(parameter, value, 'doit être fini et > 0');
    }
    return value;
}

/**
 * Vérifie qu'un pas de temps est positif ou nul.
 */
export function requireTimeStep(deltaTime: number): number {
    if (Number.isNaN(deltaTime) || deltaTime < 0) {
        throw new InvalidTimeStepError(`Pas de temps négatif : ${deltaTime} s`, deltaTime);
    }
    return deltaTime;
}
