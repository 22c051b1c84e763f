import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '@/utils/errors'
import { parseLayoutJson, parseLayoutJsonText } from './layoutJson'

describe('parseLayoutJson', () => {
  it('reads wells as arrays or range strings and sanitizes names', () => {
    const config = parseLayoutJson({
      groups: [{ name: 'LB', blank: '1-2', samples: { WT: [3, 4], 'KO 1': '5,6' } }],
    })
    expect(config).toEqual([
      {
        name: 'LB',
        blankWells: [1, 2],
        samples: [
          { name: 'WT', wells: [3, 4] },
          { name: 'KO_1', wells: [5, 6] },
        ],
      },
    ])
  })

  it('lets a regular sample be called blank', () => {
    const config = parseLayoutJson({ groups: [{ name: 'A', samples: [{ name: 'blank', wells: [1] }] }] })
    expect(config).toEqual([{ name: 'A', samples: [{ name: 'blank', wells: [1] }] }])
  })

  it('accepts a group holding only a blank', () => {
    const config = parseLayoutJson({ groups: [{ name: 'A', blank: [7, 8] }] })
    expect(config).toEqual([{ name: 'A', blankWells: [7, 8], samples: [] }])
  })

  it('reports the path of the first schema problem', () => {
    expect(() => parseLayoutJson({ groups: [] })).toThrow(/invalid JSON layout at groups:/)
    expect(() => parseLayoutJson({ groups: [{ name: 'A', blank: 'x', samples: {} }] })).toThrow(
      /invalid JSON layout at groups\.0\.blank:/
    )
    expect(() => parseLayoutJson([])).toThrow(ConfigurationError)
  })

  it('runs the same validation as the other builders', () => {
    expect(() =>
      parseLayoutJson({ groups: [{ name: 'A', samples: [] }, { name: 'A', blank: [1] }] })
    ).toThrow(/group A declares no samples/)
  })
})

describe('parseLayoutJsonText', () => {
  it('rejects text that is not JSON', () => {
    expect(() => parseLayoutJsonText('{groups:')).toThrow(/^Configuration Error: invalid JSON layout: /)
  })
})
