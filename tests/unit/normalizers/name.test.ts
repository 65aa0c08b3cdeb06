import { describe, it, expect } from 'vitest'
import {
  displayName,
  reverseSurnameFirst,
  personNameKey,
  countryNameKey,
} from '../../../src/core/normalizers/name'

describe('Name Normalizers', () => {
  describe('displayName', () => {
    it('should title-case and collapse whitespace', () => {
      expect(displayName('  LÉON   MARCHAND ')).toBe('Léon Marchand')
      expect(displayName('sifan hassan')).toBe('Sifan Hassan')
    })

    it('should keep particles lowercase after the first word', () => {
      expect(displayName('anna VAN DER berg')).toBe('Anna van der Berg')
      expect(displayName('DE GRASSE andre')).toBe('De Grasse Andre')
    })

    it('should handle Mc, O\' and hyphenated names', () => {
      expect(displayName('mcdonald')).toBe('McDonald')
      expect(displayName("o'brien")).toBe("O'Brien")
      expect(displayName('jean-claude')).toBe('Jean-Claude')
    })

    it('should return null for blank input', () => {
      expect(displayName('')).toBeNull()
      expect(displayName('   ')).toBeNull()
      expect(displayName(null)).toBeNull()
    })
  })

  describe('reverseSurnameFirst', () => {
    it('should move the uppercase surname to the end', () => {
      expect(reverseSurnameFirst('BOERS Isayah')).toBe('Isayah BOERS')
      expect(reverseSurnameFirst('VAN DER BERG Anna')).toBe('Anna VAN DER BERG')
    })

    it('should take the first word as surname when none is uppercase', () => {
      expect(reverseSurnameFirst('Hassan Sifan')).toBe('Sifan Hassan')
    })

    it('should keep at least one word as the given name', () => {
      expect(reverseSurnameFirst('MARCHAND LEON')).toBe('LEON MARCHAND')
    })

    it('should leave single words alone', () => {
      expect(reverseSurnameFirst('MARCHAND')).toBe('MARCHAND')
      expect(reverseSurnameFirst('')).toBe('')
    })
  })

  describe('personNameKey', () => {
    it('should fold accents and case', () => {
      expect(personNameKey('Léon  Marchand')).toBe('leon marchand')
    })

    it('should read hyphens as spaces and drop other punctuation', () => {
      expect(personNameKey("Jean-Luc O'Brien")).toBe('jean luc obrien')
    })

    it('should keep letters that have no accent to fold', () => {
      expect(personNameKey('Øystein  Berg')).toBe('øystein berg')
      expect(personNameKey('Łukasz Groß')).toBe('łukasz groß')
    })

    it('should keep names outside the Latin alphabet', () => {
      expect(personNameKey('张伟')).toBe('张伟')
      expect(personNameKey('Иван Петров')).toBe('иван петров')
    })

    it('should return null when nothing is left', () => {
      expect(personNameKey('')).toBeNull()
      expect(personNameKey('!!!')).toBeNull()
      expect(personNameKey(null)).toBeNull()
    })
  })

  describe('countryNameKey', () => {
    it('should fold accents and drop apostrophes', () => {
      expect(countryNameKey('Côte d’Ivoire')).toBe('cote divoire')
    })

    it('should read ampersands as and', () => {
      expect(countryNameKey('Trinidad & Tobago')).toBe('trinidad and tobago')
    })

    it('should drop a leading article', () => {
      expect(countryNameKey('The Bahamas')).toBe('bahamas')
    })

    it('should keep letters outside ASCII', () => {
      expect(countryNameKey('Ísland')).toBe('island')
      expect(countryNameKey('Føroyar')).toBe('føroyar')
    })

    it('should treat commas as spaces', () => {
      expect(countryNameKey('Korea, South')).toBe('korea south')
    })
  })
})
