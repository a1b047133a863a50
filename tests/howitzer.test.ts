/**
 * Obusier : élévation bornée, solution de tir, estimations dans le vide
 */

import { describe, it, expect, beforeEach } from 'vitest'

import { Howitzer } from '../src/domain/howitzer/Howitzer'
import { Position } from '../src/domain/kinematics/Position'
import { Angle } from '../src/domain/kinematics/Angle'
import { createSeededRandom } from '../src/core/random'
import { InvalidPhysicalParameterError } from '../src/core/errors'

describe('Howitzer', () => {
  let howitzer: Howitzer

  beforeEach(() => {
    howitzer = new Howitzer()
  })

  it('spécifications M777 par défaut', () => {
    expect(howitzer.getPosition()).toEqual(Position.origin())
    expect(howitzer.getMuzzleVelocity()).toBe(827)
    expect(howitzer.getElevationDegrees()).toBe(45)
    expect(howitzer.getElevation().degrees).toBeCloseTo(45, 10)
    expect(howitzer.getElevationLimits()).toEqual({ min: 0, max: 85 })
    expect(howitzer.getBarrelLength()).toBe(6)
    expect(howitzer.getRoundsFired()).toBe(0)
    expect(howitzer.getLastFireTime()).toBeNull()
    expect(howitzer.canFire()).toBe(true)
  })

  describe('élévation', () => {
    it.each([0, 10, 45, 84.99])('hausser depuis %s° bute exactement à 85°', (start) => {
      howitzer.setElevationDegrees(start)
      for (let i = 0; i < 100; i++) {
        howitzer.raise(0.05)
        expect(howitzer.getElevationDegrees()).toBeLessThanOrEqual(85)
      }
      expect(howitzer.getElevationDegrees()).toBe(85)
    })

    it('rotation à gauche bute exactement à 0° sans repli', () => {
      howitzer.setElevationDegrees(1)
      howitzer.rotate(-0.05)
      expect(howitzer.getElevationDegrees()).toBe(0)
      howitzer.rotate(-0.05)
      expect(howitzer.getElevationDegrees()).toBe(0)
    })

    it('rotate et raise ajoutent le delta en degrés', () => {
      howitzer.rotate(0.05)
      expect(howitzer.getElevationDegrees()).toBeCloseTo(47.864788975654115, 10)

      howitzer.setElevationDegrees(45)
      howitzer.raise(0.003)
      expect(howitzer.getElevationDegrees()).toBeCloseTo(45.17188733853925, 10)

      howitzer.raise(-0.003)
      expect(howitzer.getElevationDegrees()).toBeCloseTo(45, 10)
    })

    it('setElevation borne la valeur normalisée', () => {
      howitzer.setElevation(Angle.fromDegrees(30))
      expect(howitzer.getElevationDegrees()).toBeCloseTo(30, 10)

      howitzer.setElevation(Angle.fromDegrees(-10))
      expect(howitzer.getElevationDegrees()).toBe(85)

      howitzer.setElevationDegrees(-10)
      expect(howitzer.getElevationDegrees()).toBe(0)

      howitzer.setElevationDegrees(120)
      expect(howitzer.getElevationDegrees()).toBe(85)
    })

    it('préréglages', () => {
      howitzer.setMinElevation()
      expect(howitzer.getElevationDegrees()).toBe(0)
      howitzer.setMaxElevation()
      expect(howitzer.getElevationDegrees()).toBe(85)
      howitzer.setElevationDegrees(20)
      howitzer.setHorizontal()
      expect(howitzer.getElevationDegrees()).toBe(0)
    })

    it('setHorizontal respecte la butée basse', () => {
      const raised = new Howitzer(Position.origin(), { minElevation: 15 })
      raised.setElevationDegrees(60)
      raised.setHorizontal()
      expect(raised.getElevationDegrees()).toBe(15)
    })

    it('rejette une élévation non finie', () => {
      expect(() => howitzer.setElevationDegrees(Number.NaN)).toThrow(InvalidPhysicalParameterError)
      expect(() => howitzer.raise(Infinity)).toThrow(InvalidPhysicalParameterError)
    })

    it('butées personnalisées', () => {
      const custom = new Howitzer(Position.origin(), { minElevation: 20, maxElevation: 60, defaultElevation: 70 })
      expect(custom.getElevationDegrees()).toBe(60)
      expect(() => new Howitzer(Position.origin(), { minElevation: 50, maxElevation: 40 })).toThrow(InvalidPhysicalParameterError)
    })
  })

  describe('vitesse initiale', () => {
    it('strictement positive', () => {
      howitzer.setMuzzleVelocity(500)
      expect(howitzer.getMuzzleVelocity()).toBe(500)
      expect(() => howitzer.setMuzzleVelocity(0)).toThrow(InvalidPhysicalParameterError)
      expect(() => howitzer.setMuzzleVelocity(-5)).toThrow(InvalidPhysicalParameterError)
      expect(howitzer.getMuzzleVelocity()).toBe(500)
    })
  })

  describe('position', () => {
    it('générée entre 10 % et 90 % de la largeur, au niveau 0', () => {
      expect(howitzer.generatePosition(28000, () => 0.5)).toEqual(new Position(14000, 0))
      expect(howitzer.generatePosition(28000, () => 0).x).toBe(2800)

      const random = createSeededRandom(7)
      for (let i = 0; i < 50; i++) {
        const position = howitzer.generatePosition(28000, random)
        expect(position.x).toBeGreaterThanOrEqual(2800)
        expect(position.x).toBeLessThan(25200)
        expect(position.y).toBe(0)
      }
    })

    it('extrémité du tube selon l\'élévation', () => {
      howitzer.setPosition(new Position(1000, 50))
      const muzzle = howitzer.getMuzzlePosition()
      expect(muzzle.x).toBeCloseTo(1000 + 4.242640687119285, 10)
      expect(muzzle.y).toBeCloseTo(50 + 4.242640687119285, 10)
    })
  })

  describe('tirs', () => {
    it('solution de tir', () => {
      howitzer.setPosition(new Position(1000, 0))
      const solution = howitzer.getFiringSolution()
      expect(solution.position).toEqual(new Position(1000, 0))
      expect(solution.elevation.degrees).toBeCloseTo(45, 10)
      expect(solution.muzzleVelocity).toBe(827)

      const velocity = howitzer.getMuzzleVelocityVector()
      expect(velocity.dx).toBeCloseTo(584.7773080412748, 8)
      expect(velocity.dy).toBeCloseTo(584.7773080412748, 8)
    })

    it('comptage des coups et reset', () => {
      howitzer.setPosition(new Position(1000, 0))
      howitzer.recordFiring(0)
      howitzer.recordFiring(3.5)
      howitzer.setElevationDegrees(70)
      howitzer.setMuzzleVelocity(400)

      expect(howitzer.getRoundsFired()).toBe(2)
      expect(howitzer.getLastFireTime()).toBe(3.5)

      howitzer.reset()
      expect(howitzer.getRoundsFired()).toBe(0)
      expect(howitzer.getLastFireTime()).toBeNull()
      expect(howitzer.getElevationDegrees()).toBe(45)
      expect(howitzer.getMuzzleVelocity()).toBe(827)
      expect(howitzer.getPosition()).toEqual(new Position(1000, 0))
    })
  })

  describe('estimations dans le vide', () => {
    it('portée à 45° : v²/g', () => {
      expect(howitzer.estimateRange()).toBeCloseTo(69738.86, 1)
    })

    it('portée nulle pour une cible hors d\'atteinte verticale', () => {
      expect(howitzer.estimateRange(1e6)).toBeNull()
    })

    it('élévation de trajectoire tendue', () => {
      expect(howitzer.estimateAngleForRange(20000)?.degrees).toBeCloseTo(81.66723718333594, 6)
    })

    it('bornée à la butée haute quand la trajectoire tendue la dépasse', () => {
      expect(howitzer.estimateAngleForRange(10000)?.degrees).toBeCloseTo(85, 10)
    })

    it('null au-delà de la portée maximale', () => {
      expect(howitzer.estimateAngleForRange(80000)).toBeNull()
      expect(() => howitzer.estimateAngleForRange(0)).toThrow(InvalidPhysicalParameterError)
    })
  })
})
