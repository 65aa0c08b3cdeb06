import { describe, it, expect } from 'vitest'
import { parseCsv, formatCsv } from '../../../src/io/csv'

describe('CSV codec', () => {
  describe('parseCsv', () => {
    it('should read the header and rows', () => {
      expect(parseCsv('noc,country\nFRA,France\nGBR,United Kingdom\n')).toEqual({
        header: ['noc', 'country'],
        rows: [
          { noc: 'FRA', country: 'France' },
          { noc: 'GBR', country: 'United Kingdom' },
        ],
      })
    })

    it('should drop a byte order mark and trim header names', () => {
      expect(parseCsv('\uFEFF noc , country\nFRA,France\n').header).toEqual(['noc', 'country'])
    })

    it('should read quoted cells', () => {
      expect(parseCsv('noc,country\nKOR,"Korea, South"\n').rows).toEqual([
        { noc: 'KOR', country: 'Korea, South' },
      ])
    })

    it('should fill missing cells and ignore extra ones', () => {
      expect(parseCsv('a,b,c\n1,2\n4,5,6,7\n').rows).toEqual([
        { a: '1', b: '2', c: '' },
        { a: '4', b: '5', c: '6' },
      ])
    })

    it('should skip blank lines', () => {
      expect(parseCsv('a\n1\n\n   \n2\n').rows).toEqual([{ a: '1' }, { a: '2' }])
    })
  })

  describe('formatCsv', () => {
    it('should quote cells that need it and end with a newline', () => {
      expect(
        formatCsv(
          ['noc', 'country'],
          [
            { noc: 'KOR', country: 'Korea, South' },
            { noc: 'CIV', country: 'Say "Ivoire"' },
          ]
        )
      ).toBe('noc,country\nKOR,"Korea, South"\nCIV,"Say ""Ivoire"""\n')
    })

    it('should follow the header order and blank missing columns', () => {
      expect(formatCsv(['b', 'a', 'c'], [{ a: '1', b: '2' }])).toBe('b,a,c\n2,1,\n')
    })

    it('should write only the header for an empty table', () => {
      expect(formatCsv(['a', 'b'], [])).toBe('a,b\n')
    })

    it('should prefix a byte order mark when asked', () => {
      expect(formatCsv(['a'], [{ a: '1' }], { bom: true })).toBe('\uFEFFa\n1\n')
    })
  })
})
