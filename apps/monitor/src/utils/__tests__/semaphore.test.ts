import { describe, it, expect } from 'vitest'
import { mapWithConcurrency, Semaphore } from '../semaphore.js'

describe('Semaphore', () => {
  it('queues callers beyond the limit and serves them in order', async () => {
    const semaphore = new Semaphore(2)
    const order: string[] = []

    const releaseA = await semaphore.acquire()
    const releaseB = await semaphore.acquire()
    const waitingC = semaphore.acquire().then(release => {
      order.push('C')
      return release
    })
    const waitingD = semaphore.acquire().then(release => {
      order.push('D')
      return release
    })

    expect(semaphore.inUse).toBe(2)
    expect(semaphore.waiting).toBe(2)

    releaseA()
    const releaseC = await waitingC
    expect(order).toEqual(['C'])

    releaseB()
    const releaseD = await waitingD
    expect(order).toEqual(['C', 'D'])

    releaseC()
    releaseD()
    expect(semaphore.inUse).toBe(0)
  })

  it('ignores a second release of the same slot', async () => {
    const semaphore = new Semaphore(1)
    const release = await semaphore.acquire()
    release()
    release()
    expect(semaphore.inUse).toBe(0)
  })

  it('rejects a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrowError(RangeError)
  })
})

describe('mapWithConcurrency', () => {
  it('never runs more than the limit at once and keeps result order', async () => {
    let running = 0
    let peak = 0

    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (delay, index) => {
      running++
      peak = Math.max(peak, running)
      await new Promise(resolve => setTimeout(resolve, delay))
      running--
      return index
    })

    expect(results).toEqual([0, 1, 2, 3])
    expect(peak).toBe(2)
  })
})
