import { describe, it, expect } from 'vitest'
import { findPaletteNameByColor } from './findPaletteNameByColor'
import { pickPaletteName } from './pickPaletteName'

describe('pickPaletteName', () => {
  const chain = { preferred: ['Keyword', 'Purple', 'Blue'], fallback: 'Text' }

  it('should return the first preferred name present', () => {
    const palette = new Map([
      ['Blue', '#0000FF'],
      ['Purple', '#800080'],
    ])
    expect(pickPaletteName(chain, palette)).toBe('Purple')
  })

  it('should fall through the preference list', () => {
    expect(pickPaletteName(chain, new Map([['Blue', '#0000FF']]))).toBe('Blue')
  })

  it('should use the fallback when no preferred name is present', () => {
    const palette = new Map([
      ['Base', '#101010'],
      ['Text', '#EEEEEE'],
    ])
    expect(pickPaletteName(chain, palette)).toBe('Text')
  })

  it('should use the first palette entry when the fallback is missing too', () => {
    expect(pickPaletteName(chain, new Map([['Base', '#101010']]))).toBe('Base')
  })

  it('should return the fallback for an empty palette', () => {
    expect(pickPaletteName(chain, new Map())).toBe('Text')
  })
})

describe('findPaletteNameByColor', () => {
  const palette = new Map([
    ['Base', '#101010'],
    ['Text', '#EEEEEE'],
  ])

  it('should find a name by its normalized color', () => {
    expect(findPaletteNameByColor('eee', palette, 'Fallback')).toBe('Text')
  })

  it('should not match similar colors', () => {
    expect(findPaletteNameByColor('#EEEEEF', palette, 'Fallback')).toBe('Fallback')
  })

  it('should return the fallback for non-hex or absent input', () => {
    expect(findPaletteNameByColor('white', palette, 'Fallback')).toBe('Fallback')
    expect(findPaletteNameByColor(undefined, palette, 'Fallback')).toBe('Fallback')
  })

  it('should return the fallback for an empty palette', () => {
    expect(findPaletteNameByColor('#101010', new Map(), 'Fallback')).toBe('Fallback')
  })
})
