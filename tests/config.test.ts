/**
 * Configuration par défaut et fusion partielle
 */

import { describe, it, expect } from 'vitest'

import { DEFAULT_CONFIG, mergeConfig } from '../src/core/SimulationConfig'
import { Simulation } from '../src/core/Simulation'
import { createSeededRandom } from '../src/core/random'

describe('SimulationConfig', () => {
  it('valeurs par défaut de l\'obusier et de l\'obus', () => {
    expect(DEFAULT_CONFIG.howitzer.muzzleVelocity).toBe(827)
    expect(DEFAULT_CONFIG.howitzer.defaultElevation).toBe(45)
    expect(DEFAULT_CONFIG.howitzer.maxElevation).toBe(85)
    expect(DEFAULT_CONFIG.projectile).toEqual({ mass: 46.7, radius: 0.077545 })
  })

  it('terrain aligné sur l\'échelle d\'affichage', () => {
    const { ground, rendering } = DEFAULT_CONFIG
    expect(ground.width).toBe(rendering.screenWidth * rendering.metersPerPixel)
    expect(ground.resolution).toBe(rendering.metersPerPixel)
  })

  it('largeur du terrain dérivée de l\'écran', () => {
    expect(mergeConfig({ rendering: { screenWidth: 500 } }).ground.width).toBe(20000)
    expect(mergeConfig({ rendering: { metersPerPixel: 10 } }).ground.width).toBe(7000)
  })

  it('terrain de la simulation dimensionné par l\'écran', () => {
    const simulation = new Simulation({
      config: { rendering: { screenWidth: 500 }, logging: { enabled: false } },
      random: createSeededRandom(4),
    })
    expect(simulation.getTerrain().getWidth()).toBe(20000)
  })

  it('largeur explicite prioritaire sur l\'écran', () => {
    const config = mergeConfig({ rendering: { screenWidth: 500 }, ground: { width: 12000 } })
    expect(config.ground.width).toBe(12000)
  })

  it('sans argument : copie des valeurs par défaut', () => {
    const config = mergeConfig()
    expect(config).toEqual(DEFAULT_CONFIG)
    expect(config.physics).not.toBe(DEFAULT_CONFIG.physics)
  })

  it('fusion section par section', () => {
    const config = mergeConfig({ physics: { timeStep: 0.1 }, game: { hitTolerance: 50 } })

    expect(config.physics).toEqual({ timeStep: 0.1, maxFlightTime: 600 })
    expect(config.game).toEqual({ hitTolerance: 50, trailLength: 20 })
    expect(config.howitzer).toEqual(DEFAULT_CONFIG.howitzer)
  })

  it('ne modifie pas les valeurs par défaut', () => {
    const config = mergeConfig({ logging: { enabled: false } })
    config.howitzer.barrelLength = 10

    expect(DEFAULT_CONFIG.logging.enabled).toBe(true)
    expect(DEFAULT_CONFIG.howitzer.barrelLength).toBe(6)
  })
})
