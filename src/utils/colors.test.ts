import { describe, expect, it } from 'vitest'
import { generateDistinctColors, hslToHex, resolveLineColors } from './colors'

describe('colors', () => {
  it('converts hsl to hex', () => {
    expect(hslToHex(120, 100, 50)).toBe('#00ff00')
    expect(hslToHex(0, 70, 45)).toBe('#c32222')
  })

  it('generates a stable palette', () => {
    expect(generateDistinctColors(0)).toEqual([])
    expect(generateDistinctColors(1)).toEqual(['#c32222'])
    expect(generateDistinctColors(4)).toEqual(generateDistinctColors(4))
    expect(new Set(generateDistinctColors(6)).size).toBe(6)
  })

  it('repeats a single color and cycles a short list', () => {
    expect(resolveLineColors(3, 'blue')).toEqual(['blue', 'blue', 'blue'])
    expect(resolveLineColors(3, ['red', 'green'])).toEqual(['red', 'green', 'red'])
    expect(resolveLineColors(2, [])).toEqual(generateDistinctColors(2))
  })
})
