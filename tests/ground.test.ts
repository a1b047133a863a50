/**
 * Terrain, cible et aléa reproductible
 */

import { describe, it, expect } from 'vitest'

import { Ground } from '../src/domain/ground/Ground'
import { Position } from '../src/domain/kinematics/Position'
import { createSeededRandom, randomBetween } from '../src/core/random'
import { InvalidPhysicalParameterError } from '../src/core/errors'

describe('createSeededRandom', () => {
  it('reproductible pour une même graine', () => {
    const a = createSeededRandom(42)
    const b = createSeededRandom(42)
    const first = Array.from({ length: 5 }, () => a())
    const second = Array.from({ length: 5 }, () => b())
    expect(second).toEqual(first)
  })

  it('valeurs dans [0, 1)', () => {
    const random = createSeededRandom(123)
    for (let i = 0; i < 1000; i++) {
      const value = random()
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })

  it('graines différentes, suites différentes', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)())
  })

  it('randomBetween', () => {
    expect(randomBetween(() => 0.25, 10, 20)).toBe(12.5)
  })
})

describe('Ground', () => {
  it('sol plat et cible au centre avant le premier reset', () => {
    const ground = new Ground()
    expect(ground.getElevationMeters(new Position(12345, 0))).toBe(0)
    expect(ground.getTarget()).toEqual(new Position(14000, 0))
    expect(ground.getColumnCount()).toBe(701)
    expect(ground.getWidth()).toBe(28000)
  })

  it('relief déterministe et interpolé entre colonnes', () => {
    const ground = new Ground(
      { width: 400, resolution: 100, maxHeight: 1000, minTargetDistance: 0 },
      () => 0.999,
    )
    const howitzer = ground.reset(Position.origin())

    // marche : 249.75 puis +19.96 par colonne ; plateaux canon (0..2) puis cible (2..4)
    expect(ground.getGroundHeight(0)).toBeCloseTo(269.71, 8)
    expect(ground.getGroundHeight(1)).toBeCloseTo(269.71, 8)
    expect(ground.getGroundHeight(2)).toBeCloseTo(349.55, 8)
    expect(ground.getGroundHeight(4)).toBeCloseTo(349.55, 8)
    expect(ground.getGroundHeight(99)).toBe(0)

    expect(howitzer.x).toBe(0)
    expect(howitzer.y).toBeCloseTo(269.71, 8)
    expect(ground.getTarget().x).toBe(400)
    expect(ground.getTarget().y).toBeCloseTo(349.55, 8)

    expect(ground.getElevationMeters(new Position(150, 0))).toBeCloseTo(309.63, 8)
    expect(ground.getElevationMeters(new Position(-50, 0))).toBeCloseTo(269.71, 8)
    expect(ground.getElevationMeters(new Position(1000, 0))).toBeCloseTo(349.55, 8)
  })

  it('cible à distance minimale du canon, dans la zone utile', () => {
    const ground = new Ground({}, createSeededRandom(2024))
    for (let round = 0; round < 20; round++) {
      const howitzer = ground.reset(new Position(14000, 0))
      const target = ground.getTarget()

      expect(Math.abs(target.x - howitzer.x)).toBeGreaterThanOrEqual(4000)
      expect(target.x).toBeGreaterThanOrEqual(1400)
      expect(target.x).toBeLessThanOrEqual(26600)
      expect(target.y).toBeCloseTo(ground.getElevationMeters(target), 8)
      expect(howitzer.y).toBeCloseTo(ground.getElevationMeters(howitzer), 8)
    }
  })

  it('hauteurs dans [0, maxHeight]', () => {
    const ground = new Ground({ maxHeight: 3000 }, createSeededRandom(99))
    ground.reset(new Position(5000, 0))
    for (let column = 0; column < ground.getColumnCount(); column++) {
      expect(ground.getGroundHeight(column)).toBeGreaterThanOrEqual(0)
      expect(ground.getGroundHeight(column)).toBeLessThanOrEqual(3000)
    }
  })

  it('même graine, même terrain', () => {
    const a = new Ground({}, createSeededRandom(5))
    const b = new Ground({}, createSeededRandom(5))
    a.reset(new Position(9000, 0))
    b.reset(new Position(9000, 0))
    expect(b.getProfile()).toEqual(a.getProfile())
    expect(b.getTarget()).toEqual(a.getTarget())
  })

  it('profil ordonné couvrant toute la largeur', () => {
    const ground = new Ground({}, createSeededRandom(3))
    ground.reset(new Position(14000, 0))
    const profile = ground.getProfile()
    expect(profile).toHaveLength(701)
    expect(profile[0].x).toBe(0)
    expect(profile[700].x).toBe(28000)
  })

  it('positions valides : dans la largeur et au-dessus du relief', () => {
    const ground = new Ground({ width: 400, resolution: 100, maxHeight: 1000, minTargetDistance: 0 }, () => 0.999)
    ground.reset(Position.origin())
    expect(ground.isValidPosition(new Position(150, 400))).toBe(true)
    expect(ground.isValidPosition(new Position(150, 300))).toBe(false)
    expect(ground.isValidPosition(new Position(-1, 5000))).toBe(false)
    expect(ground.isValidPosition(new Position(401, 5000))).toBe(false)
  })

  it('rejette une configuration impossible', () => {
    expect(() => new Ground({ width: 100, resolution: 200 })).toThrow(InvalidPhysicalParameterError)
    expect(() => new Ground({ width: 0 })).toThrow(InvalidPhysicalParameterError)

    const ground = new Ground({ width: 400, resolution: 100, minTargetDistance: 10000 })
    expect(() => ground.reset(Position.origin())).toThrow(InvalidPhysicalParameterError)
  })
})
