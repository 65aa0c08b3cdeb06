import { describe, it, expect } from 'vitest'
import { parseMedal, medalPosition } from '../../../src/core/normalizers/medal'

describe('Medal Normalizer', () => {
  describe('parseMedal', () => {
    it('should read the first word of a label', () => {
      expect(parseMedal('Gold Medal')).toBe('gold')
      expect(parseMedal('Silver Medal')).toBe('silver')
      expect(parseMedal('bronze')).toBe('bronze')
    })

    it('should accept single-letter labels', () => {
      expect(parseMedal('G')).toBe('gold')
      expect(parseMedal('s')).toBe('silver')
    })

    it('should read blank and placeholder labels as none', () => {
      expect(parseMedal('')).toBe('none')
      expect(parseMedal(null)).toBe('none')
      expect(parseMedal('None')).toBe('none')
      expect(parseMedal('n/a')).toBe('none')
    })

    it('should return null for unrecognised labels', () => {
      expect(parseMedal('Platinum')).toBeNull()
    })
  })

  describe('medalPosition', () => {
    it('should map medals to finishing positions', () => {
      expect(medalPosition('gold')).toBe('1')
      expect(medalPosition('silver')).toBe('2')
      expect(medalPosition('bronze')).toBe('3')
      expect(medalPosition('none')).toBe('')
    })
  })
})
