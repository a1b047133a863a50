/**
 * Table de correspondance domaine → valeur avec interpolation linéaire par morceaux.
 *
 * @module domain/physics/atmosphere/LookupTable
 */

import { MalformedLookupTableError } from '../../../core/errors';

/**
 * Un nœud de la table.
 */
export interface Mapping {
    readonly domain: number;
    readonly range: number;
}

/**
 * Interpolation entre deux points :
 *   r = r0 + (r1 - r0) · (d - d0) / (d1 - d0)
 */
export function linearInterpolation(d0: number, r0: number, d1: number, r1: number, d: number): number {
    if (d1 === d0) {
        throw new MalformedLookupTableError(`Intervalle dégénéré : d0 = d1 = ${d0}`);
    }
    return r0 + (r1 - r0) * (d - d0) / (d1 - d0);
}

/**
 * Table immuable, validée à la construction.
 *
 * - exacte sur les nœuds
 * - bornée aux extrémités (aucune extrapolation)
 * - recherche dichotomique de l'intervalle encadrant
 */
export class LookupTable {
    private readonly mappings: readonly Mapping[];

    constructor(mappings: readonly Mapping[], public readonly name = 'table') {
        if (mappings.length === 0) {
            throw new MalformedLookupTableError(`Table « ${name} » vide`);
        }
        for (let i = 0; i < mappings.length; i++) {
            const { domain, range } = mappings[i];
            if (!Number.isFinite(domain) || !Number.isFinite(range)) {
                throw new MalformedLookupTableError(`Table « ${name} » : nœud ${i} non fini`);
            }
            if (i > 0 && domain <= mappings[i - 1].domain) {
                throw new MalformedLookupTableError(
                    `Table « ${name} » : domaines non strictement croissants au nœud ${i} (${mappings[i - 1].domain} → ${domain})`,
                );
            }
        }
        this.mappings = Object.freeze(mappings.map(({ domain, range }) => Object.freeze({ domain, range })));
    }

    /**
     * Construit une table à partir de couples [domaine, valeur].
     */
    static fromPairs(pairs: ReadonlyArray<readonly [number, number]>, name?: string): LookupTable {
        return new LookupTable(pairs.map(([domain, range]) => ({ domain, range })), name);
    }

    get knots(): readonly Mapping[] {
        return this.mappings;
    }

    get size(): number {
        return this.mappings.length;
    }

    get minDomain(): number {
        return this.mappings[0].domain;
    }

    get maxDomain(): number {
        return this.mappings[this.mappings.length - 1].domain;
    }

    interpolate(domain: number): number {
        const first = this.mappings[0];
        const last = this.mappings[this.mappings.length - 1];

        if (domain <= first.domain) return first.range;
        if (domain >= last.domain) return last.range;

        let left = 0;
        let right = this.mappings.length - 1;
        while (left < right - 1) {
            const mid = left + Math.floor((right - left) / 2);
            if (this.mappings[mid].domain <= domain) {
                left = mid;
            } else {
                right = mid;
            }
        }

        const lower = this.mappings[left];
        const upper = this.mappings[right];
        return linearInterpolation(lower.domain, lower.range, upper.domain, upper.range, domain);
    }
}
