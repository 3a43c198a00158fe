import { describe, it, expect } from 'vitest'
import { AsyncMutex, Latch, settlesWithin } from '../../../src/lib/logwriter/async-primitives.js'

describe('AsyncMutex', () => {
  it('should run exclusive sections one at a time, in order', async () => {
    const mutex = new AsyncMutex()
    const events: string[] = []

    const section = (name: string) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`)
        await new Promise((resolve) => setTimeout(resolve, 5))
        events.push(`${name}:end`)
        return name
      })

    const results = await Promise.all([section('a'), section('b')])

    expect(results).toEqual(['a', 'b'])
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end'])
  })

  it('should release the lock when a section throws', async () => {
    const mutex = new AsyncMutex()

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('failed')
      })
    ).rejects.toThrow('failed')

    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next')
  })
})

describe('Latch', () => {
  it('should settle its promise once released', async () => {
    const latch = new Latch()
    expect(latch.isReleased).toBe(false)

    latch.release()
    latch.release()

    await expect(latch.promise).resolves.toBeUndefined()
    expect(latch.isReleased).toBe(true)
  })
})

describe('settlesWithin', () => {
  it('should report whether a promise settled in time', async () => {
    await expect(settlesWithin(Promise.resolve(), 10)).resolves.toBe(true)
    await expect(settlesWithin(Promise.reject(new Error('x')), 10)).resolves.toBe(true)
    await expect(settlesWithin(new Latch().promise, 10)).resolves.toBe(false)
  })
})
