import { afterEach, describe, expect, it, vi } from 'vitest'
import { stopwatch } from './stopwatch'

describe('stopwatch', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should time a synchronous conversion in whole milliseconds', async () => {
    vi.spyOn(performance, 'now').mockReturnValueOnce(10).mockReturnValueOnce(52.4)

    const [result, elapsed] = await stopwatch(() => ({ name: 'Dusk' }))

    expect(result).toEqual({ name: 'Dusk' })
    expect(elapsed).toBe(42)
  })

  it('should wait for an asynchronous callback', async () => {
    vi.spyOn(performance, 'now').mockReturnValueOnce(0).mockReturnValueOnce(7.6)

    const [result, elapsed] = await stopwatch(async () => 'written')

    expect(result).toBe('written')
    expect(elapsed).toBe(8)
  })

  it('should propagate errors from the callback', async () => {
    await expect(
      stopwatch(() => {
        throw new Error('unresolved reference')
      }),
    ).rejects.toThrow('unresolved reference')
  })
})
