/**
 * Interpolation linéaire par morceaux sur tables ordonnées
 */

import { describe, it, expect } from 'vitest'

import { LookupTable, linearInterpolation } from '../src/domain/physics/atmosphere/LookupTable'
import { MalformedLookupTableError } from '../src/core/errors'
import { GRAVITY_TABLE, DENSITY_TABLE, SPEED_OF_SOUND_TABLE, DRAG_COEFFICIENT_TABLE } from '../src/domain/physics/atmosphere/StandardAtmosphere'

describe('LookupTable', () => {
  const table = LookupTable.fromPairs([
    [0, 10],
    [10, 20],
    [30, 0],
  ], 'essai')

  it('est exacte sur chaque nœud', () => {
    expect(table.interpolate(0)).toBe(10)
    expect(table.interpolate(10)).toBe(20)
    expect(table.interpolate(30)).toBe(0)
  })

  it('interpole linéairement entre deux nœuds', () => {
    expect(table.interpolate(5)).toBe(15)
    expect(table.interpolate(20)).toBe(10)
    expect(table.interpolate(25)).toBe(5)
  })

  it('borne aux extrémités sans extrapoler', () => {
    expect(table.interpolate(-100)).toBe(10)
    expect(table.interpolate(1e9)).toBe(0)
  })

  it('expose ses bornes et sa taille', () => {
    expect(table.size).toBe(3)
    expect(table.minDomain).toBe(0)
    expect(table.maxDomain).toBe(30)
    expect(table.name).toBe('essai')
  })

  it('accepte une table à un seul nœud', () => {
    const single = LookupTable.fromPairs([[5, 42]])
    expect(single.interpolate(-1)).toBe(42)
    expect(single.interpolate(5)).toBe(42)
    expect(single.interpolate(99)).toBe(42)
  })

  it('rejette une table vide', () => {
    expect(() => new LookupTable([])).toThrow(MalformedLookupTableError)
  })

  it('rejette des domaines non strictement croissants', () => {
    expect(() => LookupTable.fromPairs([[0, 1], [0, 2]])).toThrow(MalformedLookupTableError)
    expect(() => LookupTable.fromPairs([[0, 1], [2, 2], [1, 3]])).toThrow(MalformedLookupTableError)
  })

  it('rejette un nœud non fini', () => {
    expect(() => LookupTable.fromPairs([[0, Number.NaN]])).toThrow(MalformedLookupTableError)
  })

  it('ne se laisse pas modifier après construction', () => {
    const knots = table.knots
    expect(Object.isFrozen(knots)).toBe(true)
    expect(Object.isFrozen(knots[0])).toBe(true)
  })

  it.each([
    ['gravité', GRAVITY_TABLE],
    ['densité', DENSITY_TABLE],
    ['vitesse du son', SPEED_OF_SOUND_TABLE],
    ['traînée', DRAG_COEFFICIENT_TABLE],
  ])('table standard %s : exacte sur tous ses nœuds', (_name, pairs) => {
    const standard = LookupTable.fromPairs(pairs)
    for (const [domain, range] of pairs) {
      expect(standard.interpolate(domain)).toBe(range)
    }
  })
})

describe('linearInterpolation', () => {
  it('calcule r0 + (r1 - r0)·(d - d0)/(d1 - d0)', () => {
    expect(linearInterpolation(0, 0, 10, 100, 2.5)).toBe(25)
    expect(linearInterpolation(1000, 336, 2000, 332, 1500)).toBe(334)
  })

  it('rejette un intervalle de largeur nulle', () => {
    expect(() => linearInterpolation(3, 1, 3, 2, 3)).toThrow(MalformedLookupTableError)
  })
})
