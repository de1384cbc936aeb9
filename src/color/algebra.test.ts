import { describe, it, expect } from 'vitest'
import { adjustBrightness } from './adjustBrightness'
import { adjustSaturation } from './adjustSaturation'
import { withAlpha, withoutAlpha } from './alpha'
import { normalizeColor } from './normalizeColor'
import { perceivedBrightness } from './perceivedBrightness'
import { relativeLuminance } from './relativeLuminance'
import { shiftChannels } from './shiftChannels'

describe('adjustBrightness', () => {
  it('should darken with a factor below 1', () => {
    expect(adjustBrightness('#808080', 0.5)).toBe('#404040')
  })

  it('should truncate fractional channels', () => {
    expect(adjustBrightness('#2B2B2B', 1.2)).toBe('#333333')
  })

  it('should clamp to 255', () => {
    expect(adjustBrightness('#C8C8C8', 1.5)).toBe('#FFFFFF')
  })

  it('should keep the alpha channel', () => {
    expect(adjustBrightness('#10203080', 2)).toBe('#20406080')
  })

  it('should equal normalization with a factor of 1', () => {
    for (const color of ['abc', '#2b2b2b', '#A9B7C6', '#010203']) {
      expect(adjustBrightness(color, 1)).toBe(normalizeColor(color))
    }
  })
})

describe('shiftChannels', () => {
  it('should add the delta to every channel', () => {
    expect(shiftChannels('#2B2B2B', 20)).toBe('#3F3F3F')
  })

  it('should clamp at both ends', () => {
    expect(shiftChannels('#F0F0F0', 20)).toBe('#FFFFFF')
    expect(shiftChannels('#0A0A0A', -17)).toBe('#000000')
  })
})

describe('adjustSaturation', () => {
  it('should desaturate fully with factor 0', () => {
    expect(adjustSaturation('#FF0000', 0)).toBe('#7F7F7F')
  })

  it('should leave the color unchanged with factor 1', () => {
    expect(adjustSaturation('#FF0000', 1)).toBe('#FF0000')
  })

  it('should exaggerate with a factor above 1', () => {
    expect(adjustSaturation('#C04040', 2)).toBe('#FF0000')
  })

  it('should not touch gray colors', () => {
    expect(adjustSaturation('#808080', 0.3)).toBe('#808080')
  })
})

describe('withAlpha', () => {
  it('should append a rounded alpha byte', () => {
    expect(withAlpha('#566dda', 0.24)).toBe('#566DDA3D')
    expect(withAlpha('#566DDA', 1)).toBe('#566DDAFF')
  })

  it('should replace an existing alpha', () => {
    expect(withAlpha('#11223344', 0)).toBe('#11223300')
  })

  it('should clamp the fraction', () => {
    expect(withAlpha('#112233', 1.5)).toBe('#112233FF')
    expect(withAlpha('#112233', -1)).toBe('#11223300')
  })
})

describe('withoutAlpha', () => {
  it('should drop the alpha channel', () => {
    expect(withoutAlpha('#11223344')).toBe('#112233')
  })
})

describe('relativeLuminance', () => {
  it('should span 0 to 1', () => {
    expect(relativeLuminance('#000000')).toBe(0)
    expect(relativeLuminance('#FFFFFF')).toBeCloseTo(1, 6)
  })

  it('should be monotonic in each channel', () => {
    const channels = [
      (v: string) => `#${v}4080`,
      (v: string) => `#40${v}80`,
      (v: string) => `#4080${v}`,
    ]
    for (const build of channels) {
      let previous = -1
      for (let value = 0; value <= 255; value += 5) {
        const luminance = relativeLuminance(build(value.toString(16).padStart(2, '0')))
        expect(luminance).toBeGreaterThan(previous)
        previous = luminance
      }
    }
  })
})

describe('perceivedBrightness', () => {
  it('should weight the channels', () => {
    expect(perceivedBrightness('#101010')).toBe(16)
    expect(perceivedBrightness('#FFFFFF')).toBe(255)
    expect(perceivedBrightness('#FF0000')).toBeCloseTo(76.245, 6)
  })
})
