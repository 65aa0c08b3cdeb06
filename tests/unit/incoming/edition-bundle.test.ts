import { describe, it, expect, beforeEach } from 'vitest'
import { assembleEditionBundle, bundleAthleteName } from '../../../src/incoming/edition-bundle'
import type { BundleCsvTables } from '../../../src/incoming/edition-bundle'
import { IssueLog } from '../../../src/core/issue-log'
import { parseCsv } from '../../../src/io/csv'
import { SchemaError } from '../../../src/utils/errors'
import { createIncomingAthlete, createIncomingResult } from '../../fixtures/records'

const lines = (...rows: string[]) => parseCsv(rows.join('\n'))

function bundleTables(): BundleCsvTables {
  return {
    athletes: lines(
      'code,name,name_tv,gender,country_code,country_long,nationality_code,birth_date,height,weight,disciplines,events',
      `1001,MARCHAND Leon,Leon MARCHAND,Male,FRA,France,FRA,2002-05-17,187,0,['Swimming'],"['200m Butterfly', '400m IM']"`,
      `1002,HASSAN Sifan,,Female,NED,Netherlands,ETH,1993-01-01,0,,['Athletics'],['Marathon']`,
      `1001,MARCHAND Leon,,Male,FRA,France,FRA,,,,['Swimming'],['400m IM']`,
      `1003,SMITH Anna,Anna SMITH,Female,USA,United States,USA,,,,['Athletics'],"['4x100m Relay', 'Unlisted']"`
    ),
    events: lines(
      'sport,event',
      'Swimming,200m Butterfly',
      'Swimming,400m IM',
      'Athletics,Marathon',
      'Athletics,4x100m Relay'
    ),
    nocs: lines('code,country_long', 'FRA,France', 'NED,Netherlands', 'USA,United States'),
    teams: lines('discipline,events,athletes_codes', `Athletics,4x100m Relay,"['1003', '1009']"`),
    medallists: lines(
      'code_athlete,discipline,event,medal_type',
      '1001,Swimming,200m Butterfly,Gold Medal',
      '1001,Swimming,200m Butterfly,Gold Medal',
      '1002,Athletics,10000m,Bronze Medal',
      '9999,Athletics,Marathon,Silver Medal',
      '1003,Athletics,4x100m Relay,Shiny'
    ),
  }
}

describe('Edition Bundle', () => {
  let issues: IssueLog

  beforeEach(() => {
    issues = new IssueLog()
  })

  describe('bundleAthleteName', () => {
    it('should prefer the TV name', () => {
      expect(bundleAthleteName('LEON MARCHAND', 'MARCHAND Leon')).toBe('Leon Marchand')
    })

    it('should reorder a surname-first name', () => {
      expect(bundleAthleteName('', 'BOERS Isayah')).toBe('Isayah Boers')
      expect(bundleAthleteName('', '')).toBe('')
    })
  })

  describe('assembleEditionBundle', () => {
    it('should read countries from the NOC table', () => {
      const bundle = assembleEditionBundle(bundleTables(), { issues })

      expect(bundle.countries).toEqual([
        { code: 'FRA', name: 'France', rowNumber: 1 },
        { code: 'NED', name: 'Netherlands', rowNumber: 2 },
        { code: 'USA', name: 'United States', rowNumber: 3 },
      ])
    })

    it('should read athletes once each with zero measurements blanked', () => {
      const bundle = assembleEditionBundle(bundleTables(), { issues })

      expect(bundle.athletes).toEqual([
        createIncomingAthlete({
          sourceCode: '1001',
          name: 'Leon Marchand',
          sex: 'Male',
          born: '17-May-2002',
          height: '187',
          weight: '',
          nationalityCode: 'FRA',
          countryCode: 'FRA',
          country: 'France',
          rowNumber: 1,
        }),
        createIncomingAthlete({
          sourceCode: '1002',
          name: 'Sifan Hassan',
          sex: 'Female',
          born: '01-Jan-1993',
          nationalityCode: 'ETH',
          countryCode: 'NED',
          country: 'Netherlands',
          rowNumber: 2,
        }),
        createIncomingAthlete({
          sourceCode: '1003',
          name: 'Anna Smith',
          sex: 'Female',
          nationalityCode: 'USA',
          countryCode: 'USA',
          country: 'United States',
          rowNumber: 4,
        }),
      ])
    })

    it('should expand event lists and attach medals', () => {
      const bundle = assembleEditionBundle(bundleTables(), { issues })

      expect(bundle.results).toEqual([
        createIncomingResult({
          athleteCode: '1001',
          sport: 'Swimming',
          event: '200m Butterfly',
          countryCode: 'FRA',
          medal: 'gold',
          rowNumber: 1,
        }),
        createIncomingResult({
          athleteCode: '1001',
          sport: 'Swimming',
          event: '400m IM',
          countryCode: 'FRA',
          rowNumber: 1,
        }),
        createIncomingResult({
          athleteCode: '1002',
          sport: 'Athletics',
          event: 'Marathon',
          countryCode: 'NED',
          rowNumber: 2,
        }),
        createIncomingResult({
          athleteCode: '1003',
          sport: 'Athletics',
          event: '4x100m Relay',
          countryCode: 'USA',
          isTeamSport: true,
          rowNumber: 4,
        }),
        createIncomingResult({
          athleteCode: '1002',
          sport: 'Athletics',
          event: '10000m',
          countryCode: 'NED',
          medal: 'bronze',
          origin: 'medallist',
          rowNumber: 3,
        }),
      ])
    })

    it('should report duplicates, unknown medals and unknown athletes', () => {
      assembleEditionBundle(bundleTables(), { issues })

      expect(issues.toArray().map((issue) => [issue.kind, issue.source, issue.rowNumber])).toEqual([
        ['duplicate-row', 'bundle.medallists', 2],
        ['unknown-medal', 'bundle.medallists', 5],
        ['duplicate-row', 'bundle.athletes', 3],
        ['unknown-athlete-code', 'bundle.medallists', 4],
      ])
    })

    it('should throw a SchemaError when a bundle table lacks a column', () => {
      const tables = { ...bundleTables(), events: lines('sport', 'Swimming') }

      expect(() => assembleEditionBundle(tables, { issues })).toThrow(SchemaError)
    })
  })
})
