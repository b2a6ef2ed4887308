import { describe, it, expect } from 'vitest'
import * as life from '@/index'

describe('public exports', () => {
  it('exposes the engine, helpers and runtime entry points only', () => {
    expect(Object.keys(life).sort()).toEqual(
      [
        'Cell',
        'DIFF_SENTINEL',
        'InvalidConfigError',
        'InvalidCoordinateError',
        'InvalidUniverseOptionsError',
        'PatternParseError',
        'SystemStartError',
        'UnknownPatternError',
        'applyDiff',
        'countAlive',
        'createLifeSystemConfig',
        'createUniverse',
        'diffLength',
        'eventKeywords',
        'forEachChanged',
        'getIndex',
        'getPattern',
        'nextCellState',
        'parseLifeConfig',
        'parsePattern',
        'patternKeywords',
        'patternLibrary',
        'readDiff',
        'renderTextFrame',
        'startLifeSystem',
        'stampPattern',
        'stepGrid',
        'systemConfig',
        'toRows',
        'wrap',
      ].sort()
    )
  })
})
