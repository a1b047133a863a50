/**
 * Erreurs de contrat et gardes
 */

import { describe, it, expect } from 'vitest'

import {
  BallisticsError,
  BallisticsErrorCode,
  InvalidPhysicalParameterError,
  InvalidTimeStepError,
  MalformedLookupTableError,
  requireNonNegative,
  requirePositive,
} from '../src/core/errors'

describe('Erreurs', () => {
  it('codes et noms distincts par famille', () => {
    const timeStep = new InvalidTimeStepError('pas négatif', -1)
    const parameter = new InvalidPhysicalParameterError('mass', 0, 'doit être > 0')
    const table = new MalformedLookupTableError('table vide')

    expect(timeStep.code).toBe(BallisticsErrorCode.INVALID_TIME_STEP)
    expect(timeStep.timeStep).toBe(-1)
    expect(timeStep.name).toBe('InvalidTimeStepError')

    expect(parameter.code).toBe(BallisticsErrorCode.INVALID_PHYSICAL_PARAMETER)
    expect(parameter.message).toBe('mass invalide (0) : doit être > 0')
    expect(parameter.parameter).toBe('mass')

    expect(table.code).toBe(BallisticsErrorCode.MALFORMED_LOOKUP_TABLE)
    expect(table).toBeInstanceOf(BallisticsError)
    expect(table).toBeInstanceOf(Error)
  })

  it('requirePositive', () => {
    expect(requirePositive('radius', 0.5)).toBe(0.5)
    expect(() => requirePositive('radius', 0)).toThrow('radius invalide (0) : doit être fini et > 0')
    expect(() => requirePositive('radius', Number.POSITIVE_INFINITY)).toThrow(InvalidPhysicalParameterError)
  })

  it('requireNonNegative', () => {
    expect(requireNonNegative('speed', 0)).toBe(0)
    expect(() => requireNonNegative('speed', -1)).toThrow('speed invalide (-1) : doit être fini et >= 0')
    expect(() => requireNonNegative('speed', Number.NaN)).toThrow(InvalidPhysicalParameterError)
  })
})
