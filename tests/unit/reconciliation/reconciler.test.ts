import { describe, it, expect } from 'vitest'
import { Reconciler, indexIdentity } from '../../../src/core/reconciliation/reconciler'
import {
  NaturalKeyIndex,
  composeKey,
  compareIdentifiers,
} from '../../../src/core/reconciliation/natural-key-index'
import {
  SequentialIdMinter,
  CountryCodeMinter,
} from '../../../src/core/reconciliation/identifier-minter'
import type { MatchStrategy } from '../../../src/core/reconciliation/strategy'
import { DuplicateIdentifierCollisionError } from '../../../src/utils/errors'

interface Row {
  label: string
  group: string
}

interface Identity {
  label: string | null
  group: string | null
}

const strategies: MatchStrategy<Identity>[] = [
  { name: 'label', confidence: 'high', keyOf: (identity) => identity.label },
  { name: 'group', confidence: 'low', keyOf: (identity) => identity.group },
]

const identify = (row: Row): Identity => ({
  label: row.label.trim().toLowerCase() || null,
  group: row.group || null,
})

function createReconciler(existing: Array<{ id: string; row: Row }>): Reconciler<Row, Identity> {
  const index = new NaturalKeyIndex()
  for (const { id, row } of existing) {
    indexIdentity(index, strategies, identify(row), id)
  }
  return new Reconciler({
    table: 'things',
    strategies,
    identify,
    naturalKey: (identity) => identity.label,
    minter: new SequentialIdMinter(
      'things',
      existing.map(({ id }) => id)
    ),
    index,
  })
}

describe('Natural Key Index', () => {
  it('should compose keys only when every part is present', () => {
    expect(composeKey(['leon marchand', '17-May-2002'])).toBe('leon marchand\u001f17-May-2002')
    expect(composeKey(['leon marchand', null])).toBeNull()
    expect(composeKey(['leon marchand', ''])).toBeNull()
  })

  it('should order numeric identifiers numerically', () => {
    expect(['10', '9', '100'].sort(compareIdentifiers)).toEqual(['9', '10', '100'])
    expect(['GBR', 'FRA', 'AUS'].sort(compareIdentifiers)).toEqual(['AUS', 'FRA', 'GBR'])
  })

  it('should return identifiers lowest first', () => {
    const index = new NaturalKeyIndex()
    index.add('name', 'x', '21')
    index.add('name', 'x', '3')
    index.add('name', 'x', '21')

    expect(index.lookup('name', 'x')).toEqual(['3', '21'])
    expect(index.lookup('name', 'y')).toEqual([])
    expect(index.lookup('other', 'x')).toEqual([])
    expect(index.keyCount('name')).toBe(1)
  })
})

describe('Identifier Minters', () => {
  it('should mint above the highest numeric identifier', () => {
    const minter = new SequentialIdMinter('athletes', ['7', '12', 'x9'])

    expect(minter.mint()).toBe('13')
    expect(minter.mint()).toBe('14')
  })

  it('should start at 1 for an empty table', () => {
    expect(new SequentialIdMinter('athletes', []).mint()).toBe('1')
  })

  it('should keep a free preferred country code', () => {
    const minter = new CountryCodeMinter(['FRA'])

    expect(minter.mint('eor')).toBe('EOR')
  })

  it('should generate namespaced codes when none is given', () => {
    const minter = new CountryCodeMinter(['X01'])

    expect(minter.mint()).toBe('X02')
    expect(minter.mint('  ')).toBe('X03')
  })

  it('should throw when a preferred code is taken', () => {
    const minter = new CountryCodeMinter(['FRA'])

    expect(() => minter.mint('FRA')).toThrow(DuplicateIdentifierCollisionError)
    expect(() => minter.mint('FRA')).toThrow("Identifier 'FRA' already exists in table 'countries'")
  })
})

describe('Reconciler', () => {
  describe('resolve', () => {
    it('should match the first tier that finds an identifier', () => {
      const reconciler = createReconciler([
        { id: '1', row: { label: 'Alpha', group: 'g1' } },
        { id: '2', row: { label: 'Beta', group: 'g2' } },
      ])

      expect(reconciler.resolve({ label: ' ALPHA ', group: 'g2' })).toEqual({
        status: 'matched',
        id: '1',
        strategy: 'label',
        confidence: 'high',
        candidates: 1,
      })
      expect(reconciler.resolve({ label: 'Gamma', group: 'g2' })).toEqual({
        status: 'matched',
        id: '2',
        strategy: 'group',
        confidence: 'low',
        candidates: 1,
      })
    })

    it('should pick the lowest identifier among candidates', () => {
      const reconciler = createReconciler([
        { id: '21', row: { label: 'Alpha', group: '' } },
        { id: '3', row: { label: 'Alpha', group: '' } },
      ])

      expect(reconciler.resolve({ label: 'alpha', group: '' })).toEqual({
        status: 'matched',
        id: '3',
        strategy: 'label',
        confidence: 'high',
        candidates: 2,
      })
    })

    it('should mint once per natural key', () => {
      const reconciler = createReconciler([{ id: '5', row: { label: 'Alpha', group: '' } }])

      const first = reconciler.resolve({ label: 'Delta', group: '' })
      const second = reconciler.resolve({ label: 'delta', group: '' })

      expect(first).toEqual({ status: 'minted', id: '6', naturalKey: 'delta' })
      expect(second).toEqual({ status: 'minted', id: '6', naturalKey: 'delta' })
    })

    it('should let later rows match a minted identifier', () => {
      const reconciler = createReconciler([])

      reconciler.resolve({ label: 'Delta', group: 'g9' })

      expect(reconciler.resolve({ label: 'Epsilon', group: 'g9' })).toEqual({
        status: 'matched',
        id: '1',
        strategy: 'group',
        confidence: 'low',
        candidates: 1,
      })
    })

    it('should reject rows without a natural key', () => {
      const reconciler = createReconciler([])

      expect(reconciler.resolve({ label: '  ', group: 'g1' })).toEqual({
        status: 'rejected',
        reason: 'natural key is empty',
      })
    })
  })

  describe('reconcileAll', () => {
    it('should mint in natural-key order whatever the input order', () => {
      const rows: Row[] = [
        { label: 'Zulu', group: '' },
        { label: 'Alpha', group: '' },
        { label: 'Mike', group: '' },
      ]

      const forward = createReconciler([]).reconcileAll(rows)
      const backward = createReconciler([]).reconcileAll([...rows].reverse())

      const idsOf = (resolved: typeof forward) =>
        Object.fromEntries(
          resolved.map(({ row, resolution }) => [
            row.label,
            resolution.status === 'rejected' ? null : resolution.id,
          ])
        )

      expect(idsOf(forward)).toEqual({ Alpha: '1', Mike: '2', Zulu: '3' })
      expect(idsOf(backward)).toEqual(idsOf(forward))
    })

    it('should prefer existing identifiers over ones minted in the same batch', () => {
      const reconciler = createReconciler([{ id: '40', row: { label: 'Old', group: 'g1' } }])

      const resolved = reconciler.reconcileAll([
        { label: 'Aaa', group: '' },
        { label: 'Bbb', group: 'g1' },
      ])

      expect(resolved.map(({ resolution }) => resolution)).toEqual([
        { status: 'minted', id: '41', naturalKey: 'aaa' },
        { status: 'matched', id: '40', strategy: 'group', confidence: 'low', candidates: 1 },
      ])
    })

    it('should return resolutions in input order', () => {
      const resolved = createReconciler([]).reconcileAll([
        { label: 'B', group: '' },
        { label: '', group: '' },
        { label: 'A', group: '' },
      ])

      expect(resolved.map(({ row }) => row.label)).toEqual(['B', '', 'A'])
      expect(resolved.map(({ resolution }) => resolution.status)).toEqual([
        'minted',
        'rejected',
        'minted',
      ])
    })
  })
})
