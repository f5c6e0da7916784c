import { describe, expect, it } from 'vitest'
import { Lock } from '../../src'

describe('Lock', () => {
  it('should serialize exclusive sections in arrival order', async () => {
    const lock = new Lock()
    const events: string[] = []
    const section = (name: string, delay: number) =>
      lock.runExclusive(async () => {
        events.push(`${name}:start`)
        await new Promise((resolve) => setTimeout(resolve, delay))
        events.push(`${name}:end`)
        return name
      })

    const results = await Promise.all([
      section('a', 20),
      section('b', 0),
      section('c', 5),
    ])

    expect(results).toEqual(['a', 'b', 'c'])
    expect(events).toEqual([
      'a:start',
      'a:end',
      'b:start',
      'b:end',
      'c:start',
      'c:end',
    ])
    expect(lock.isLocked).toBe(false)
  })

  it('should release the permit when the section throws', async () => {
    const lock = new Lock()
    await expect(
      lock.runExclusive(() => {
        throw new Error('fail')
      }),
    ).rejects.toThrow('fail')
    expect(lock.isLocked).toBe(false)
    expect(await lock.runExclusive(() => 1)).toBe(1)
  })
})
