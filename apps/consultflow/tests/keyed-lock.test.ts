import { describe, expect, it } from 'vitest'
import { KeyedLock } from '@/lib/concurrency/keyed-lock'

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('KeyedLock', () => {
  it('runs tasks for one key in call order', async () => {
    const lock = new KeyedLock()
    const gate = deferred()
    const order: string[] = []

    const first = lock.run('thread-1', async () => {
      await gate.promise
      order.push('first')
    })
    const second = lock.run('thread-1', async () => {
      order.push('second')
    })

    expect(lock.isLocked('thread-1')).toBe(true)
    gate.resolve()
    await Promise.all([first, second])

    expect(order).toEqual(['first', 'second'])
    expect(lock.isLocked('thread-1')).toBe(false)
  })

  it('does not block other keys', async () => {
    const lock = new KeyedLock()
    const gate = deferred()
    const order: string[] = []

    const slow = lock.run('a', async () => {
      await gate.promise
      order.push('a')
    })
    await lock.run('b', async () => {
      order.push('b')
    })

    expect(order).toEqual(['b'])
    gate.resolve()
    await slow
    expect(order).toEqual(['b', 'a'])
  })

  it('releases the key when a task throws', async () => {
    const lock = new KeyedLock()

    await expect(
      lock.run('k', async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    await expect(lock.run('k', async () => 'next')).resolves.toBe('next')
  })
})
