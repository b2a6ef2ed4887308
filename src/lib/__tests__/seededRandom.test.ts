import { describe, it, expect } from 'vitest'
import { createSeededRNG, generateRandomSeed } from '@/lib/seededRandom'

function take(next: () => number, count: number): number[] {
  return Array.from({ length: count }, () => next())
}

describe('createSeededRNG', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createSeededRNG('test-seed').domain('randomize')
    const b = createSeededRNG('test-seed').domain('randomize')

    expect(take(a.next, 10)).toEqual(take(b.next, 10))
  })

  it('keeps domains independent', () => {
    const rng = createSeededRNG('test-seed')
    const fill = take(rng.domain('randomize').next, 5)

    const other = createSeededRNG('test-seed')
    other.domain('placement').next()
    other.domain('placement').next()

    expect(take(other.domain('randomize').next, 5)).toEqual(fill)
  })

  it('returns the same domain instance on repeated lookups', () => {
    const rng = createSeededRNG(42)

    expect(rng.domain('randomize')).toBe(rng.domain('randomize'))
    expect(rng.getDomains()).toEqual(['randomize'])
  })

  it('keeps numeric seeds as given', () => {
    const rng = createSeededRNG(42)

    expect(rng.getMasterSeed()).toBe('42')
    expect(rng.getMasterSeedNumber()).toBe(42)
  })

  it('stays within the requested ranges', () => {
    const domain = createSeededRNG('test-seed').domain('placement')

    for (let i = 0; i < 200; i++) {
      const value = domain.next()
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)

      const int = domain.intRange(3, 7)
      expect(Number.isInteger(int)).toBe(true)
      expect(int).toBeGreaterThanOrEqual(3)
      expect(int).toBeLessThan(7)
    }
  })

  it('answers chance(0) and chance(1) deterministically', () => {
    const domain = createSeededRNG('test-seed').domain('randomize')

    expect(domain.chance(0)).toBe(false)
    expect(domain.chance(1)).toBe(true)
  })
})

describe('generateRandomSeed', () => {
  it('produces a timestamp-prefixed seed', () => {
    expect(generateRandomSeed()).toMatch(/^\d+-[a-z0-9]+$/)
  })
})
