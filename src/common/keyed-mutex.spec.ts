import { KeyedMutex } from './keyed-mutex'

const deferred = () => {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((r) => {
    resolve = () => r()
  })
  return { promise, resolve }
}

describe('KeyedMutex', () => {
  it('runs tasks for one key one after another', async () => {
    const mutex = new KeyedMutex()
    const order: string[] = []
    const gate = deferred()

    const first = mutex.runExclusive('a', async () => {
      order.push('first:start')
      await gate.promise
      order.push('first:end')
    })
    const second = mutex.runExclusive('a', () => {
      order.push('second')
    })

    await Promise.resolve()
    expect(order).toEqual(['first:start'])
    gate.resolve()
    await Promise.all([first, second])

    expect(order).toEqual(['first:start', 'first:end', 'second'])
  })

  it('does not hold up other keys', async () => {
    const mutex = new KeyedMutex()
    const gate = deferred()
    let released = false
    const blocked = mutex.runExclusive('a', async () => {
      await gate.promise
      released = true
    })

    await expect(mutex.runExclusive('b', () => 42)).resolves.toBe(42)
    expect(released).toBe(false)

    gate.resolve()
    await blocked
    expect(released).toBe(true)
  })

  it('hands a failure to its own caller and keeps the queue going', async () => {
    const mutex = new KeyedMutex()
    const failing = mutex.runExclusive('a', () => {
      throw new Error('boom')
    })
    const next = mutex.runExclusive('a', () => 'ok')

    await expect(failing).rejects.toThrow('boom')
    await expect(next).resolves.toBe('ok')
  })
})
