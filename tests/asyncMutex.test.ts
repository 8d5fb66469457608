import { describe, expect, test } from 'vitest'
import { setTimeout as sleep } from 'node:timers/promises'
import { AsyncMutex } from '../src/shared/asyncMutex.js'

describe('AsyncMutex', () => {
  test('runs critical sections one at a time in call order', async () => {
    const mutex = new AsyncMutex()
    const trace: string[] = []

    await Promise.all(
      [30, 10, 0].map((delay, i) =>
        mutex.runExclusive(async () => {
          trace.push(`start ${i}`)
          await sleep(delay)
          trace.push(`end ${i}`)
        })
      )
    )

    expect(trace).toEqual(['start 0', 'end 0', 'start 1', 'end 1', 'start 2', 'end 2'])
  })

  test('releases the lock when a section throws', async () => {
    const mutex = new AsyncMutex()

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42)
    expect(mutex.pending).toBe(0)
  })

  test('counts queued callers', async () => {
    const mutex = new AsyncMutex()
    const first = mutex.runExclusive(() => sleep(5))
    const second = mutex.runExclusive(() => undefined)

    expect(mutex.pending).toBe(2)
    await Promise.all([first, second])
    expect(mutex.pending).toBe(0)
  })
})
