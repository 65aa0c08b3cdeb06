import { describe, it, expect } from 'vitest'
import { KeyedTable } from '../../../src/core/merge/keyed-table'
import type { CountryRecord } from '../../../src/types/tables'
import { createCountry } from '../../fixtures/records'

describe('KeyedTable', () => {
  it('should insert rows in order', () => {
    const table = new KeyedTable((row: CountryRecord) => row.noc)

    expect(table.upsert(createCountry('FRA', 'France'))).toBe('inserted')
    expect(table.upsert(createCountry('GBR', 'United Kingdom'))).toBe('inserted')

    expect(table.values().map((row) => row.noc)).toEqual(['FRA', 'GBR'])
    expect(table.size).toBe(2)
  })

  it('should replace a row with the same key in place', () => {
    const table = new KeyedTable((row: CountryRecord) => row.noc)
    table.upsert(createCountry('FRA', 'France'))
    table.upsert(createCountry('GBR', 'United Kingdom'))

    expect(table.upsert(createCountry('FRA', 'French Republic'))).toBe('updated')

    expect(table.values().map((row) => row.country)).toEqual(['French Republic', 'United Kingdom'])
  })

  it('should combine rows with a merge function', () => {
    const table = new KeyedTable((row: CountryRecord) => row.noc)
    table.upsert(createCountry('FRA', 'France'))

    table.upsert(createCountry('FRA', 'French Republic'), (existing) => existing)

    expect(table.get('FRA')?.country).toBe('France')
    expect(table.has('GBR')).toBe(false)
  })
})
