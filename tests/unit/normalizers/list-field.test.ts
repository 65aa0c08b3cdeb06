import { describe, it, expect } from 'vitest'
import { parseListField } from '../../../src/core/normalizers/list-field'

describe('List Field Parser', () => {
  it('should parse single-quoted items', () => {
    expect(parseListField("['Cycling Road', 'Cycling Track']")).toEqual([
      'Cycling Road',
      'Cycling Track',
    ])
  })

  it('should keep apostrophes inside quoted items', () => {
    expect(parseListField('["Men\'s 100m"]')).toEqual(["Men's 100m"])
    expect(parseListField("['Men's 100m', 'Men's 200m']")).toEqual([
      "Men's 100m",
      "Men's 200m",
    ])
  })

  it('should accept bare items', () => {
    expect(parseListField('[Invalid, Other ]')).toEqual(['Invalid', 'Other'])
  })

  it('should unwrap a quoted field', () => {
    expect(parseListField("\"['Swimming']\"")).toEqual(['Swimming'])
  })

  it('should return an empty list for anything but a bracketed list', () => {
    expect(parseListField('Athletics')).toEqual([])
    expect(parseListField('[]')).toEqual([])
    expect(parseListField('')).toEqual([])
    expect(parseListField(null)).toEqual([])
  })
})
