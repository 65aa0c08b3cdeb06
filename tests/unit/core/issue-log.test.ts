import { describe, it, expect, vi } from 'vitest'
import { IssueLog } from '../../../src/core/issue-log'
import type { Logger } from '../../../src/utils/logger'

function createSpyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger
}

describe('IssueLog', () => {
  it('should record issues with their details', () => {
    const issues = new IssueLog()

    const issue = issues.record('malformed-date', 'athletes', "Unusable born '1879' (partial)", {
      rowNumber: 12,
      context: { raw: '1879' },
    })

    expect(issue).toEqual({
      kind: 'malformed-date',
      source: 'athletes',
      message: "Unusable born '1879' (partial)",
      rowNumber: 12,
      context: { raw: '1879' },
    })
    expect(issues.toArray()).toEqual([issue])
  })

  it('should warn through the logger', () => {
    const logger = createSpyLogger()
    const issues = new IssueLog(logger)

    issues.record('unknown-medal', 'results', "Unknown medal 'Platinum' read as none", {
      rowNumber: 3,
      context: { medal: 'Platinum' },
    })

    expect(logger.warn).toHaveBeenCalledWith("Unknown medal 'Platinum' read as none", {
      kind: 'unknown-medal',
      source: 'results',
      rowNumber: 3,
      medal: 'Platinum',
    })
  })

  it('should count issues per kind', () => {
    const issues = new IssueLog()
    issues.record('duplicate-row', 'results', 'first')
    issues.record('duplicate-row', 'athletes', 'second')
    issues.record('referential-gap', 'results', 'third')

    expect(issues.count()).toBe(3)
    expect(issues.count('duplicate-row')).toBe(2)
    expect(issues.count('invalid-row')).toBe(0)
    expect(issues.summary()).toEqual({ 'duplicate-row': 2, 'referential-gap': 1 })
  })

  it('should return a copy of its entries', () => {
    const issues = new IssueLog()
    issues.record('invalid-row', 'games', 'bad row')

    issues.toArray().pop()

    expect(issues.count()).toBe(1)
  })
})
