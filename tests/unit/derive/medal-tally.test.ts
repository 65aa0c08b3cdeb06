import { describe, it, expect } from 'vitest'
import { buildMedalTally } from '../../../src/core/derive/medal-tally'
import type { EventResultRecord, MedalType } from '../../../src/types/tables'
import { createCountry, createGames, createResult } from '../../fixtures/records'

const games = [
  createGames({ editionId: '63', edition: '2024 Summer Olympics', year: 2024, startDate: '26-Jul-2024' }),
  createGames({ editionId: '61', edition: '2020 Summer Olympics', year: 2021, startDate: '23-Jul-2021' }),
]

const countries = [
  createCountry('FRA', 'France'),
  createCountry('USA', 'United States'),
  createCountry('JPN', 'Japan'),
]

function result(
  editionId: string,
  countryNoc: string,
  athleteId: string,
  event: string,
  medal: MedalType
): EventResultRecord {
  return createResult({ editionId, resultId: event, athleteId, countryNoc, sport: 'Sport', event, medal })
}

const results = [
  result('63', 'FRA', 'a1', '200m Butterfly', 'gold'),
  result('63', 'FRA', 'a2', 'Judo -90kg', 'gold'),
  result('63', 'FRA', 'a1', '400m IM', 'silver'),
  result('63', 'FRA', 'a3', 'Marathon', 'none'),
  result('63', 'USA', 'b1', '4x100m Relay', 'gold'),
  result('63', 'USA', 'b2', '4x100m Relay', 'gold'),
  result('63', 'USA', 'b3', 'Shot Put', 'bronze'),
  result('63', 'JPN', 'c1', 'Marathon', 'none'),
  result('61', 'JPN', 'c1', 'Marathon', 'gold'),
]

describe('Medal Tally', () => {
  it('should count medals, athletes and medal winners per country', () => {
    const tally = buildMedalTally(results, countries, games)

    expect(tally[1]).toEqual({
      edition: '2024 Summer Olympics',
      editionId: '63',
      country: 'France',
      noc: 'FRA',
      athleteCount: 3,
      medalAthleteCount: 2,
      gold: 2,
      silver: 1,
      bronze: 0,
      total: 3,
    })
  })

  it('should order by edition, then total descending, then code', () => {
    const tally = buildMedalTally(results, countries, games)

    expect(tally.map((row) => [row.editionId, row.noc, row.total])).toEqual([
      ['61', 'JPN', 1],
      ['63', 'FRA', 3],
      ['63', 'USA', 3],
      ['63', 'JPN', 0],
    ])
  })

  it('should include countries that took part without winning', () => {
    const tally = buildMedalTally(results, countries, games)

    expect(tally[3]).toEqual({
      edition: '2024 Summer Olympics',
      editionId: '63',
      country: 'Japan',
      noc: 'JPN',
      athleteCount: 1,
      medalAthleteCount: 0,
      gold: 0,
      silver: 0,
      bronze: 0,
      total: 0,
    })
  })

  it('should count a team medal once when configured', () => {
    const tally = buildMedalTally(results, countries, games, { countTeamMedalsOnce: true })

    const usa = tally.find((row) => row.noc === 'USA')
    expect(usa).toMatchObject({ gold: 1, bronze: 1, total: 2, medalAthleteCount: 3 })
    expect(tally.map((row) => [row.editionId, row.noc])).toEqual([
      ['61', 'JPN'],
      ['63', 'FRA'],
      ['63', 'USA'],
      ['63', 'JPN'],
    ])
  })

  it('should leave the country name blank for an unknown code', () => {
    const tally = buildMedalTally([result('63', 'ZZZ', 'z1', 'Marathon', 'gold')], countries, games)

    expect(tally).toEqual([
      {
        edition: '2024 Summer Olympics',
        editionId: '63',
        country: '',
        noc: 'ZZZ',
        athleteCount: 1,
        medalAthleteCount: 1,
        gold: 1,
        silver: 0,
        bronze: 0,
        total: 1,
      },
    ])
  })
})
